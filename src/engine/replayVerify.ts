import type { GameState } from "../types";
import { applyAction } from "./applyAction";
import type { ReplayFile } from "./replay";
import { hashState } from "./serialization";

export type ReplayVerification =
  | { ok: true; finalState: GameState; steps: number }
  | { ok: false; index: number; reason: "before_hash_mismatch" | "after_hash_mismatch"; expected: string; actual: string };

/**
 * Re-apply every logged action from the initial state and compare hashes.
 * Stops at the first divergence.
 */
export function verifyReplay(replay: ReplayFile): ReplayVerification {
  let state = replay.initialState;

  for (let i = 0; i < replay.log.length; i++) {
    const entry = replay.log[i];

    const before = hashState(state);
    if (before !== entry.beforeHash) {
      return { ok: false, index: i, reason: "before_hash_mismatch", expected: entry.beforeHash, actual: before };
    }

    state = applyAction(state, entry.action).state;

    const after = hashState(state);
    if (after !== entry.afterHash) {
      return { ok: false, index: i, reason: "after_hash_mismatch", expected: entry.afterHash, actual: after };
    }
  }

  return { ok: true, finalState: state, steps: replay.log.length };
}
