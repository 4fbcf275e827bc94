// src/engine/outcome.ts

import type { GameState } from "../types";
import { hasLegalMoves } from "./legalMoves";

/**
 * Ends the game when it is won, when steps run out, or when the player is
 * stuck. Runs after every action. Mutates `state`.
 */
export function evaluateOutcome(state: GameState): void {
  if (state.phase === "ended") return;

  if (state.outcome?.kind === "won") {
    state.phase = "ended";
    state.selection = undefined;
    return;
  }

  if (state.inventory.consumables.steps <= 0) {
    state.outcome = { kind: "lost", reason: "out_of_steps" };
    state.phase = "ended";
    state.selection = undefined;
    state.messages.push("You ran out of steps! Game Over.");
    return;
  }

  if (state.phase !== "drafting" && !hasLegalMoves(state)) {
    state.outcome = { kind: "lost", reason: "blocked" };
    state.phase = "ended";
    state.messages.push("No legal move left. Game Over.");
  }
}
