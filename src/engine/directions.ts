// src/engine/directions.ts

import type { Coord, Direction } from "../types";

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

const OFFSETS: Readonly<Record<Direction, Coord>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

const OPPOSITE: Readonly<Record<Direction, Direction>> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function opposite(d: Direction): Direction {
  return OPPOSITE[d];
}

export function stepFrom(from: Coord, d: Direction): Coord {
  const o = OFFSETS[d];
  return { row: from.row + o.row, col: from.col + o.col };
}

/** Direction of a single orthogonal step from a to b, or null. */
export function directionBetween(a: Coord, b: Coord): Direction | null {
  for (const d of DIRECTIONS) {
    const o = OFFSETS[d];
    if (a.row + o.row === b.row && a.col + o.col === b.col) return d;
  }
  return null;
}

export function isDirection(x: unknown): x is Direction {
  return x === "up" || x === "down" || x === "left" || x === "right";
}
