// src/engine/rulesConstants.ts

import type { Consumable, Rarity } from "../types";

// Chance of a random find when entering a room.
export const BASE_FIND_CHANCE = 0.08;
export const RABBIT_FOOT_FIND_BONUS = 0.05;

// Copies of each draftable room in the starting deck, by rarity.
export const DECK_COPIES_BY_RARITY: Readonly<Record<Rarity, number>> = {
  0: 7,
  1: 5,
  2: 3,
  3: 1,
};

// Draw weight of one deck copy.
export function drawWeight(rarity: Rarity): number {
  return 1 / 3 ** rarity;
}

export type FindEntry = { item: Consumable; amount: number };

export const FIND_TABLE: readonly FindEntry[] = [
  { item: "gems", amount: 1 },
  { item: "keys", amount: 1 },
  { item: "dice", amount: 1 },
  { item: "coins", amount: 5 },
  { item: "steps", amount: 3 },
];

// Metal detector: these finds are listed twice.
export const METAL_DETECTOR_ITEMS: ReadonlySet<Consumable> = new Set(["keys", "coins"]);
