// src/engine/labels.ts
//
// Player-facing wording shared by messages and the UI.

import type { Consumable, InteractableKind, Permanent } from "../types";

const CONSUMABLE_NAMES: Readonly<Record<Consumable, [singular: string, plural: string]>> = {
  steps: ["step", "steps"],
  coins: ["coin", "coins"],
  gems: ["gem", "gems"],
  keys: ["key", "keys"],
  dice: ["die", "dice"],
};

export function consumableLabel(item: Consumable, amount: number): string {
  const [one, many] = CONSUMABLE_NAMES[item];
  return amount === 1 ? one : many;
}

export const PERMANENT_LABELS: Readonly<Record<Permanent, string>> = {
  shovel: "shovel",
  hammer: "hammer",
  lockpickKit: "lockpick kit",
  metalDetector: "metal detector",
  rabbitFoot: "rabbit's foot",
};

export const INTERACTABLE_LABELS: Readonly<Record<InteractableKind, string>> = {
  chest: "a chest",
  locker: "a locker",
  digSite: "a dig site",
};

export const INTERACTABLE_BADGES: Readonly<Record<InteractableKind, string>> = {
  chest: "▣",
  locker: "▤",
  digSite: "✕",
};
