// src/engine/applyAction.ts
//
// Applies one player Action to GameState.
// Contract is { state: GameState } and the input state is never mutated.

import type { Action, GameState } from "../types";
import { interactHere } from "./interactables";
import { moveOrDraft } from "./movement";
import { evaluateOutcome } from "./outcome";
import { type Rng, XorShiftRng } from "./rng";
import { cancelSelection, confirmSelection, moveCursor, rerollCandidates } from "./selection";
import { cloneState } from "./stateUtils";
import { validateState } from "./validateState";

const NOT_SELECTING = "Not in selection mode.";
const SELECTING = "Choose a room first (ENTER), or press R to redraw.";

/**
 * Apply `action` drawing randomness from `rng`. `rngState` is left as is;
 * `applyAction` is the entry point that threads it.
 */
export function applyActionWithRng(state: GameState, action: Action, rng: Rng): { state: GameState } {
  if (state.phase === "ended") return { state };

  const next = cloneState(state);
  const messages: string[] = [];
  next.messages = messages;
  next.turn = state.turn + 1;

  const selection = next.phase === "drafting" ? next.selection : undefined;

  switch (action.kind) {
    case "move":
      if (selection) messages.push(SELECTING);
      else moveOrDraft(next, action.direction, rng, messages);
      break;
    case "interact":
      if (selection) messages.push(SELECTING);
      else messages.push(interactHere(next, rng));
      break;
    case "cursor":
      if (selection) moveCursor(selection, action.delta);
      else messages.push(NOT_SELECTING);
      break;
    case "confirm":
      if (selection) confirmSelection(next, selection, rng, messages);
      else messages.push(NOT_SELECTING);
      break;
    case "reroll":
      if (selection) rerollCandidates(next, selection, rng, messages);
      else messages.push(NOT_SELECTING);
      break;
    case "cancel":
      if (selection) cancelSelection(next, messages);
      else messages.push(NOT_SELECTING);
      break;
    default: {
      const _exhaustive: never = action;
      throw new Error(`Unsupported action: ${JSON.stringify(_exhaustive)}`);
    }
  }

  evaluateOutcome(next);
  validateState(next, `applyAction:${action.kind}`);
  return { state: next };
}

export function applyAction(state: GameState, action: Action): { state: GameState } {
  const rng = new XorShiftRng(state.rngState);
  const { state: next } = applyActionWithRng(state, action, rng);
  if (next === state) return { state };
  next.rngState = rng.state;
  return { state: next };
}
