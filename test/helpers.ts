import type {
  Consumable,
  Coord,
  Direction,
  GameState,
  InteractableKind,
  LockLevel,
  Permanent,
  RoomId,
} from "../src/types";
import { makeState as makeEngineState, type MakeStateOptions } from "../src/engine/makeState";
import type { Rng } from "../src/engine/rng";

/**
 * Replays a fixed list of draws, then keeps returning `fallback`.
 * 0.999 misses every chance roll in the rules.
 */
export class ScriptedRng implements Rng {
  private i = 0;

  constructor(
    private readonly values: readonly number[],
    private readonly fallback = 0.999
  ) {}

  next(): number {
    if (this.i < this.values.length) return this.values[this.i++];
    this.i++;
    return this.fallback;
  }

  get used(): number {
    return this.i;
  }
}

export const rng = (...values: number[]) => new ScriptedRng(values);

export function makeState(opts: Partial<MakeStateOptions> = {}): GameState {
  return makeEngineState({ seed: "test-seed", ...opts });
}

// Entrance Hall position on the default 9x5 grid.
export const START: Coord = { row: 8, col: 2 };
export const ABOVE_START: Coord = { row: 7, col: 2 };

export type PlaceOptions = {
  doors?: Partial<Record<Direction, LockLevel>>;
  visited?: boolean;
  interactable?: { kind: InteractableKind; opened?: boolean };
};

export function placeRoom(state: GameState, at: Coord, roomId: RoomId, opts: PlaceOptions = {}): GameState {
  const next = structuredClone(state);
  const cell = next.grid[at.row][at.col];
  cell.roomId = roomId;
  cell.visited = opts.visited ?? false;
  cell.doors = { ...cell.doors, ...opts.doors };
  cell.interactable = opts.interactable
    ? { kind: opts.interactable.kind, opened: opts.interactable.opened ?? false }
    : null;
  return next;
}

export function withPlayer(state: GameState, at: Coord): GameState {
  return { ...structuredClone(state), player: { ...at } };
}

export function withDeck(state: GameState, deck: RoomId[]): GameState {
  return { ...structuredClone(state), deck: deck.slice() };
}

export function withInventory(
  state: GameState,
  patch: { consumables?: Partial<Record<Consumable, number>>; permanents?: Partial<Record<Permanent, boolean>> }
): GameState {
  const next = structuredClone(state);
  next.inventory.consumables = { ...next.inventory.consumables, ...patch.consumables };
  next.inventory.permanents = { ...next.inventory.permanents, ...patch.permanents };
  return next;
}

/** Player standing in a fresh room just above the Entrance Hall. */
export function standingIn(roomId: RoomId, opts: PlaceOptions = {}): GameState {
  return withPlayer(placeRoom(makeState(), ABOVE_START, roomId, { visited: true, ...opts }), ABOVE_START);
}
