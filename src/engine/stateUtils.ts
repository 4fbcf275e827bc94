// src/engine/stateUtils.ts

import type { Cell, Coord, GameState, RoomDef } from "../types";
import { getRoom } from "./catalog";

export function inBounds(state: GameState, c: Coord): boolean {
  return c.row >= 0 && c.row < state.config.rows && c.col >= 0 && c.col < state.config.cols;
}

export function getCell(state: GameState, c: Coord): Cell {
  const row = state.grid[c.row];
  const cell = row ? row[c.col] : undefined;
  if (!cell) throw new Error(`cell out of bounds: ${c.row},${c.col}`);
  return cell;
}

export function currentCell(state: GameState): Cell {
  return getCell(state, state.player);
}

export function roomAt(state: GameState, c: Coord): RoomDef | null {
  const cell = getCell(state, c);
  return cell.roomId ? getRoom(cell.roomId) : null;
}

export function isEdgeCell(state: GameState, c: Coord): boolean {
  return c.row === 0 || c.row === state.config.rows - 1 || c.col === 0 || c.col === state.config.cols - 1;
}

export function emptyCell(): Cell {
  return {
    roomId: null,
    doors: { up: null, down: null, left: null, right: null },
    interactable: null,
    visited: false,
  };
}

export function cloneState(state: GameState): GameState {
  // Every field is plain JSON data.
  return structuredClone(state);
}
