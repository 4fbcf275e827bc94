// src/engine/movement.ts

import type { Cell, Direction, GameState } from "../types";
import { getRoom } from "./catalog";
import { opposite, stepFrom } from "./directions";
import { drawCandidates } from "./draft";
import { applyEnterEffects } from "./effects";
import { hasPermanent, removeConsumable } from "./inventory";
import type { Rng } from "./rng";
import { getCell, inBounds, roomAt } from "./stateUtils";

export const WALL_MESSAGE = "A wall. Can't go there.";
export const DRAFT_PROMPT = "Choose a room (ENTER) or press R to redraw (spend a die).";

/** Opens the lock on the door between `here` and `there`, both sides. */
function unlockDoor(state: GameState, here: Cell, there: Cell, d: Direction, messages: string[]): boolean {
  const lock = there.doors[opposite(d)] ?? 0;
  if (lock === 0) return true;

  if (lock === 1 && hasPermanent(state.inventory, "lockpickKit")) {
    messages.push("Used the lockpick kit to open a level 1 door.");
  } else if (removeConsumable(state.inventory, "keys", 1)) {
    messages.push("Used a key to open the door.");
  } else {
    messages.push("Door is locked and you have no key/kit.");
    return false;
  }

  here.doors[d] = 0;
  there.doors[opposite(d)] = 0;
  return true;
}

/**
 * One step in `d`: walk into a placed room, or start drafting for an
 * unexplored cell. Mutates `state`.
 */
export function moveOrDraft(state: GameState, d: Direction, rng: Rng, messages: string[]): void {
  const target = stepFrom(state.player, d);
  const here = roomAt(state, state.player);

  if (!inBounds(state, target) || !here || !here.doors[d]) {
    messages.push(WALL_MESSAGE);
    return;
  }

  const there = getCell(state, target);

  if (there.roomId === null) {
    const candidates = drawCandidates(state, target, d, rng);
    if (candidates.length === 0) {
      messages.push("No room fits there.");
      return;
    }
    state.phase = "drafting";
    state.selection = { target, direction: d, candidates, cursor: 0 };
    messages.push(DRAFT_PROMPT);
    return;
  }

  if (state.inventory.consumables.steps <= 0) {
    messages.push("No steps left! You can't move.");
    return;
  }

  if (!unlockDoor(state, getCell(state, state.player), there, d, messages)) return;

  removeConsumable(state.inventory, "steps", 1);
  state.player = target;
  applyEnterEffects(state, there, getRoom(there.roomId), rng, messages);
}
