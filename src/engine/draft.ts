// src/engine/draft.ts

import type { Coord, Direction, GameState, RoomId } from "../types";
import { getRoom } from "./catalog";
import { DRAFT_SIZE } from "./constants";
import { eligibleRooms } from "./placement";
import { type Rng, pick } from "./rng";
import { drawWeight } from "./rulesConstants";

/**
 * One weighted draw over deck copies. Each copy weighs 1/3^rarity, so a room
 * with several copies is proportionally more likely.
 */
export function weightedPick(rng: Rng, pool: readonly RoomId[]): RoomId {
  if (pool.length === 0) throw new Error("weightedPick: empty pool");

  const weights = pool.map((id) => drawWeight(getRoom(id).rarity));
  const total = weights.reduce((a, b) => a + b, 0);
  const r = rng.next() * total;

  let cum = 0;
  for (let i = 0; i < pool.length; i++) {
    cum += weights[i];
    if (r < cum) return pool[i];
  }
  return pool[pool.length - 1];
}

/** Up to `k` distinct rooms, weighted, without replacement. */
export function weightedSampleDistinct(rng: Rng, pool: readonly RoomId[], k: number): RoomId[] {
  const picked: RoomId[] = [];
  for (let i = 0; i < k; i++) {
    const available = pool.filter((id) => !picked.includes(id));
    if (available.length === 0) break;
    picked.push(weightedPick(rng, available));
  }
  return picked;
}

/**
 * Draft candidates for an unexplored cell.
 * When none of the drawn rooms is free but a free one is eligible, the last
 * candidate is swapped for a free room.
 */
export function drawCandidates(
  state: GameState,
  target: Coord,
  fromDirection: Direction,
  rng: Rng
): RoomId[] {
  const pool = eligibleRooms(state, target, fromDirection);
  const picked = weightedSampleDistinct(rng, pool, DRAFT_SIZE);

  if (picked.length > 0 && !picked.some((id) => getRoom(id).gemCost === 0)) {
    const free = [...new Set(pool)].filter((id) => getRoom(id).gemCost === 0 && !picked.includes(id));
    if (free.length > 0) picked[picked.length - 1] = pick(rng, free);
  }

  return picked;
}
