import type { GameState } from "../types";
import { parseAction } from "./actions";
import { isActionAllowed } from "./legalMoves";
import { applyActionWithSync, type SyncResult } from "./replay";

export type EngineErrorCode = "INVALID_INPUT" | "WRONG_PHASE" | "GAME_ENDED";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

// Envelope sent back for every proposed action.
export type ActionResponse = { ok: true; result: SyncResult } | { ok: false; error: EngineError };

/**
 * Validate a proposed action and return a server-style response.
 *
 * - Input is untrusted: anything that is not an Action is INVALID_INPUT.
 * - Ended games accept nothing.
 * - Exploring accepts move/interact; drafting accepts cursor/confirm/reroll/cancel.
 *
 * Rule refusals inside a phase (locked door, no dice, not enough gems) are not
 * errors: the action applies and explains itself in `messages`.
 */
export function tryApplyActionWithResponse(state: GameState, input: unknown): ActionResponse {
  const action = parseAction(input);
  if (!action) {
    return {
      ok: false,
      error: { code: "INVALID_INPUT", message: "Input is not a valid action." },
    };
  }

  if (state.phase === "ended") {
    return {
      ok: false,
      error: { code: "GAME_ENDED", message: "Game is over." },
    };
  }

  if (!isActionAllowed(state, action)) {
    return {
      ok: false,
      error: {
        code: "WRONG_PHASE",
        message: `Action "${action.kind}" is not allowed while ${state.phase}.`,
      },
    };
  }

  return { ok: true, result: applyActionWithSync(state, action) };
}
