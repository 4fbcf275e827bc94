// src/engine/legalMoves.ts

import type { Action, GameState } from "../types";
import { getRoom } from "./catalog";
import { DIRECTIONS, opposite, stepFrom } from "./directions";
import { hasPermanent } from "./inventory";
import { canPlaceRoom, isAffordable } from "./placement";
import { getCell, inBounds, roomAt } from "./stateUtils";

/**
 * True when the player can still go somewhere: through an openable door into
 * a placed room, or into an empty cell some deck room fits and is affordable.
 */
export function hasLegalMoves(state: GameState): boolean {
  const here = roomAt(state, state.player);
  if (!here) return false;

  const keys = state.inventory.consumables.keys;
  const kit = hasPermanent(state.inventory, "lockpickKit");

  for (const d of DIRECTIONS) {
    if (!here.doors[d]) continue;

    const target = stepFrom(state.player, d);
    if (!inBounds(state, target)) continue;

    const cell = getCell(state, target);

    if (cell.roomId !== null) {
      const lock = cell.doors[opposite(d)] ?? 0;
      if (lock === 0) return true;
      if (lock === 1 && (kit || keys > 0)) return true;
      if (lock === 2 && keys > 0) return true;
      continue;
    }

    const fits = state.deck.some((id) => {
      const room = getRoom(id);
      return canPlaceRoom(state, room, target, d) && isAffordable(state, room);
    });
    if (fits) return true;
  }

  return false;
}

/** Which action kinds the current phase accepts. */
export function isActionAllowed(state: GameState, action: Action): boolean {
  switch (state.phase) {
    case "ended":
      return false;
    case "exploring":
      return action.kind === "move" || action.kind === "interact";
    case "drafting":
      return action.kind !== "move" && action.kind !== "interact";
    default: {
      const _exhaustive: never = state.phase;
      throw new Error(`Unsupported phase: ${String(_exhaustive)}`);
    }
  }
}
