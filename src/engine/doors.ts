// src/engine/doors.ts

import type { LockLevel } from "../types";
import type { Rng } from "./rng";

/**
 * Lock level of a freshly placed door. Doors get harder to open towards the
 * top of the mansion: the bottom row is always open, the top row always
 * level 2, and rows in between interpolate.
 */
export function lockLevelForRow(row: number, rows: number, rng: Rng): LockLevel {
  if (rows <= 1) return 0;
  if (row === rows - 1) return 0;
  if (row === 0) return 2;

  // 0 at the bottom row, 1 at the top row.
  const t = (rows - 1 - row) / (rows - 1);

  const p2 = 0.1 + 0.7 * t;
  const p0 = 0.7 - 0.6 * t;
  const p1 = Math.max(0, 1 - p0 - p2);

  const r = rng.next();
  if (r < p0) return 0;
  if (r < p0 + p1) return 1;
  return 2;
}
