// src/engine/inventory.ts

import type { Consumable, Inventory, Permanent } from "../types";
import { PERMANENTS, STARTING_CONSUMABLES } from "./constants";

export function makeInventory(): Inventory {
  return {
    consumables: { ...STARTING_CONSUMABLES },
    permanents: {
      shovel: false,
      hammer: false,
      lockpickKit: false,
      metalDetector: false,
      rabbitFoot: false,
    },
  };
}

export function addConsumable(inv: Inventory, item: Consumable, amount: number): void {
  inv.consumables[item] += amount;
}

/** Removes `amount` only when that many are held. */
export function removeConsumable(inv: Inventory, item: Consumable, amount: number): boolean {
  if (inv.consumables[item] < amount) return false;
  inv.consumables[item] -= amount;
  return true;
}

export function grantPermanent(inv: Inventory, item: Permanent): void {
  inv.permanents[item] = true;
}

export function hasPermanent(inv: Inventory, item: Permanent): boolean {
  return inv.permanents[item];
}

export function missingPermanents(inv: Inventory): Permanent[] {
  return PERMANENTS.filter((p) => !inv.permanents[p]);
}
