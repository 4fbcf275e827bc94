import type { Cell, GameId, GameState, RoomId } from "../types";
import { ROOM_CATALOG, START_ROOM_ID } from "./catalog";
import { GRID_COLS, GRID_ROWS, WELCOME_MESSAGE } from "./constants";
import { makeInventory } from "./inventory";
import { XorShiftRng, seedFromString, shuffle } from "./rng";
import { BASE_FIND_CHANCE, DECK_COPIES_BY_RARITY } from "./rulesConstants";
import { emptyCell } from "./stateUtils";

export function asGameId(s: string): GameId {
  return s as GameId;
}

export type MakeStateOptions = {
  seed: string;
  gameId?: string;

  /** Base chance of a random find on entering a room. Default 0.08. */
  findChance?: number;

  rows?: number;
  cols?: number;
};

/** Unshuffled starting deck: every draftable room, copies by rarity. */
export function buildDeck(): RoomId[] {
  const deck: RoomId[] = [];
  for (const room of ROOM_CATALOG) {
    if (!room.draftable) continue;
    const copies = DECK_COPIES_BY_RARITY[room.rarity];
    for (let i = 0; i < copies; i++) deck.push(room.id);
  }
  return deck;
}

/**
 * Fresh game:
 * - phase: "exploring"
 * - Entrance Hall at the bottom middle cell, player on it
 * - starting inventory, shuffled deck
 * - rngState seeded from `seed`
 */
export function makeState(opts: MakeStateOptions): GameState {
  const rows = opts.rows ?? GRID_ROWS;
  const cols = opts.cols ?? GRID_COLS;
  if (!Number.isInteger(rows) || rows < 2) throw new Error(`makeState: rows must be an integer >= 2, got ${rows}`);
  if (!Number.isInteger(cols) || cols < 1) throw new Error(`makeState: cols must be an integer >= 1, got ${cols}`);

  const findChance = opts.findChance ?? BASE_FIND_CHANCE;
  if (!(findChance >= 0 && findChance <= 1)) {
    throw new Error(`makeState: findChance must be within [0, 1], got ${findChance}`);
  }

  const rng = new XorShiftRng(seedFromString(opts.seed));

  const grid: Cell[][] = Array.from({ length: rows }, () => Array.from({ length: cols }, emptyCell));

  const start = { row: rows - 1, col: Math.floor(cols / 2) };
  const startCell = grid[start.row][start.col];
  startCell.roomId = START_ROOM_ID;
  startCell.visited = true;

  const deck = shuffle(rng, buildDeck());

  return {
    gameId: asGameId(opts.gameId ?? `g_${opts.seed}`),
    phase: "exploring",
    config: { rows, cols, findChance, seed: opts.seed },
    grid,
    player: start,
    inventory: makeInventory(),
    deck,
    rngState: rng.state,
    turn: 0,
    messages: [WELCOME_MESSAGE],
  };
}
