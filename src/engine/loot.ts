// src/engine/loot.ts

import type { Consumable } from "../types";
import type { Rng } from "./rng";

export type LootEntry = {
  item: Consumable;
  amount: number;
  chance: number;
};

export type LootDrop = { item: Consumable; amount: number };

export const CHEST_LOOT: readonly LootEntry[] = [
  { item: "gems", amount: 1, chance: 0.35 },
  { item: "keys", amount: 1, chance: 0.4 },
  { item: "coins", amount: 15, chance: 0.5 },
];

export const LOCKER_LOOT: readonly LootEntry[] = [
  { item: "keys", amount: 1, chance: 0.6 },
  { item: "coins", amount: 10, chance: 0.3 },
];

export const DIG_LOOT: readonly LootEntry[] = [
  { item: "coins", amount: 8, chance: 0.5 },
  { item: "keys", amount: 1, chance: 0.2 },
  { item: "gems", amount: 1, chance: 0.2 },
];

// Chance that an opened chest also holds a tool the player lacks.
export const CHEST_TOOL_CHANCE = 0.15;

export const CONSOLATION: LootDrop = { item: "coins", amount: 5 };

/** Independent roll per entry, in table order. Never empty. */
export function rollLoot(table: readonly LootEntry[], rng: Rng): LootDrop[] {
  const out: LootDrop[] = [];
  for (const e of table) {
    if (rng.next() < e.chance) out.push({ item: e.item, amount: e.amount });
  }
  return out.length > 0 ? out : [{ ...CONSOLATION }];
}
