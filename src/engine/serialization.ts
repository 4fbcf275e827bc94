import { createHash } from "node:crypto";
import type { GameState } from "../types";
import { validateState } from "./validateState";

// States are plain JSON: key order comes from construction, so equal games
// built the same way serialize (and hash) identically.
export function serializeState(state: GameState): string {
  return JSON.stringify(state);
}

export function deserializeState(json: string): GameState {
  const state: GameState = JSON.parse(json);
  validateState(state, "deserializeState");
  return state;
}

/** sha256 of the serialized state, hex. Shared by replays, saves and client sync. */
export function hashState(state: GameState): string {
  return createHash("sha256").update(serializeState(state)).digest("hex");
}
