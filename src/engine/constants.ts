// src/engine/constants.ts

import type { Consumable, Permanent } from "../types";

// Mansion grid: 9 rows by 5 columns, Entrance Hall at the bottom middle.
export const GRID_ROWS = 9;
export const GRID_COLS = 5;

export const DRAFT_SIZE = 3;

export const STARTING_CONSUMABLES: Readonly<Record<Consumable, number>> = {
  steps: 70,
  coins: 0,
  gems: 2,
  keys: 0,
  dice: 0,
};

export const PERMANENTS: readonly Permanent[] = [
  "shovel",
  "hammer",
  "lockpickKit",
  "metalDetector",
  "rabbitFoot",
];

export const CONSUMABLES: readonly Consumable[] = ["steps", "coins", "gems", "keys", "dice"];

export const WELCOME_MESSAGE = "Welcome to Blue Manor.";
