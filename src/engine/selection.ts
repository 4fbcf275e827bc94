// src/engine/selection.ts
//
// Drafting phase: cursor, confirm, reroll, cancel.

import type { GameState, Selection } from "../types";
import { getRoom } from "./catalog";
import { opposite } from "./directions";
import { lockLevelForRow } from "./doors";
import { drawCandidates } from "./draft";
import { applyDrawEffect } from "./effects";
import { removeConsumable } from "./inventory";
import { moveOrDraft } from "./movement";
import type { Rng } from "./rng";
import { getCell } from "./stateUtils";

function endSelection(state: GameState): void {
  state.selection = undefined;
  state.phase = "exploring";
}

export function moveCursor(selection: Selection, delta: -1 | 1): void {
  const last = selection.candidates.length - 1;
  selection.cursor = Math.max(0, Math.min(last, selection.cursor + delta));
}

export function confirmSelection(state: GameState, selection: Selection, rng: Rng, messages: string[]): void {
  const roomId = selection.candidates[selection.cursor];
  const room = getRoom(roomId);

  if (!removeConsumable(state.inventory, "gems", room.gemCost)) {
    messages.push("Not enough gems to choose that room.");
    return;
  }

  const { target, direction } = selection;
  const placed = getCell(state, target);
  placed.roomId = roomId;

  const lock = lockLevelForRow(target.row, state.config.rows, rng);
  getCell(state, state.player).doors[direction] = lock;
  placed.doors[opposite(direction)] = lock;

  const copy = state.deck.indexOf(roomId);
  if (copy >= 0) state.deck.splice(copy, 1);

  messages.push(`Placed ${room.name} (lock ${lock}).`);
  applyDrawEffect(state, room, rng, messages);

  endSelection(state);
  moveOrDraft(state, direction, rng, messages);
}

/** Spend exactly one die to redraw the candidates. */
export function rerollCandidates(state: GameState, selection: Selection, rng: Rng, messages: string[]): void {
  if (!removeConsumable(state.inventory, "dice", 1)) {
    messages.push("No dice to spend.");
    return;
  }

  const candidates = drawCandidates(state, selection.target, selection.direction, rng);
  if (candidates.length === 0) {
    endSelection(state);
    messages.push("No room fits there.");
    return;
  }

  selection.candidates = candidates;
  selection.cursor = 0;
  messages.push("Redrew candidates (spent a die).");
}

export function cancelSelection(state: GameState, messages: string[]): void {
  endSelection(state);
  messages.push("You step back from the door.");
}
