// src/engine/interactables.ts

import type { GameState, Interactable, InteractableKind } from "../types";
import { addConsumable, grantPermanent, hasPermanent, missingPermanents, removeConsumable } from "./inventory";
import { PERMANENT_LABELS } from "./labels";
import { CHEST_LOOT, CHEST_TOOL_CHANCE, DIG_LOOT, LOCKER_LOOT, type LootDrop, rollLoot } from "./loot";
import { type Rng, pick } from "./rng";
import { currentCell } from "./stateUtils";

export function makeInteractable(kind: InteractableKind): Interactable {
  return { kind, opened: false };
}

function grantLoot(state: GameState, drops: readonly LootDrop[]): string {
  let suffix = "";
  for (const d of drops) {
    addConsumable(state.inventory, d.item, d.amount);
    suffix += ` → +${d.amount} ${d.item}`;
  }
  return suffix;
}

function openChest(state: GameState, it: Interactable, rng: Rng): string {
  if (it.opened) return "The chest is empty.";

  let opening: string;
  if (removeConsumable(state.inventory, "keys", 1)) {
    opening = "Used a key to open the chest.";
  } else if (hasPermanent(state.inventory, "hammer")) {
    opening = "Used the hammer to smash the chest.";
  } else {
    return "A chest is here. You need a key or the hammer.";
  }

  it.opened = true;
  let msg = opening + grantLoot(state, rollLoot(CHEST_LOOT, rng));

  const toolRoll = rng.next();
  const missing = missingPermanents(state.inventory);
  if (toolRoll < CHEST_TOOL_CHANCE && missing.length > 0) {
    const tool = pick(rng, missing);
    grantPermanent(state.inventory, tool);
    msg += ` → found the ${PERMANENT_LABELS[tool]}`;
  }
  return msg;
}

function openLocker(state: GameState, it: Interactable, rng: Rng): string {
  if (it.opened) return "The locker is empty.";
  if (!removeConsumable(state.inventory, "keys", 1)) return "A locker is here. You need a key.";

  it.opened = true;
  return "Locker opened" + grantLoot(state, rollLoot(LOCKER_LOOT, rng));
}

function digSite(state: GameState, it: Interactable, rng: Rng): string {
  if (it.opened) return "Nothing left to dig here.";
  if (!hasPermanent(state.inventory, "shovel")) return "You found a dig site. You need a shovel.";

  it.opened = true;
  return "You dug the site" + grantLoot(state, rollLoot(DIG_LOOT, rng));
}

/** Interact with whatever sits in the player's cell. Mutates `state`. */
export function interactHere(state: GameState, rng: Rng): string {
  const it = currentCell(state).interactable;
  if (!it) return "Nothing to interact with.";

  switch (it.kind) {
    case "chest":
      return openChest(state, it, rng);
    case "locker":
      return openLocker(state, it, rng);
    case "digSite":
      return digSite(state, it, rng);
    default: {
      const _exhaustive: never = it.kind;
      throw new Error(`Unsupported interactable: ${String(_exhaustive)}`);
    }
  }
}
