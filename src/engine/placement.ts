// src/engine/placement.ts

import type { Coord, Direction, GameState, RoomDef, RoomId } from "../types";
import { getRoom } from "./catalog";
import { DIRECTIONS, opposite, stepFrom } from "./directions";
import { inBounds, isEdgeCell, roomAt } from "./stateUtils";

/**
 * Whether `room` may be placed at `target` when entered moving `fromDirection`.
 *
 * 1. It needs a door facing the cell it is entered from.
 * 2. No door may lead off the grid, except on edge rooms: their outer doors
 *    open onto the grounds and are never walkable.
 * 3. Doors must match every placed neighbour, both ways.
 * 4. Edge rooms only go on the outer ring.
 */
export function canPlaceRoom(
  state: GameState,
  room: RoomDef,
  target: Coord,
  fromDirection: Direction
): boolean {
  if (!room.doors[opposite(fromDirection)]) return false;

  if (room.placement === "edge" && !isEdgeCell(state, target)) return false;

  for (const d of DIRECTIONS) {
    const n = stepFrom(target, d);
    const inside = inBounds(state, n);

    if (room.doors[d] && !inside && room.placement !== "edge") return false;
    if (!inside) continue;

    const neighbour = roomAt(state, n);
    if (!neighbour) continue;

    const back = neighbour.doors[opposite(d)];
    if (room.doors[d] !== back) return false;
  }

  return true;
}

export function isAffordable(state: GameState, room: RoomDef): boolean {
  return room.gemCost === 0 || room.gemCost <= state.inventory.consumables.gems;
}

/**
 * Deck copies that may go at `target`, narrowed to affordable ones when at
 * least one is affordable.
 */
export function eligibleRooms(state: GameState, target: Coord, fromDirection: Direction): RoomId[] {
  const placeable = state.deck.filter((id) => canPlaceRoom(state, getRoom(id), target, fromDirection));
  const affordable = placeable.filter((id) => isAffordable(state, getRoom(id)));
  return affordable.length > 0 ? affordable : placeable;
}
