import type { Action, GameState } from "../types";
import { applyAction } from "./applyAction";
import { hashState } from "./serialization";

export const REPLAY_FORMAT_VERSION = 1 as const;

/** One applied action, pinned between the hashes of the states around it. */
export type ReplayEntry = {
  beforeHash: string;
  action: Action;
  afterHash: string;
};

export type ReplayLog = ReplayEntry[];

export type ReplayFile = {
  formatVersion: typeof REPLAY_FORMAT_VERSION;
  createdAt: string; // ISO

  // Replays start here; the seed and rngState inside make every step reproducible.
  initialState: GameState;
  log: ReplayLog;
};

export type SyncResult = {
  nextState: GameState;
  afterHash: string;
  replayEntry: ReplayEntry;
};

/**
 * Apply an action and return what a client needs to stay in step:
 * the next state, its hash and the log entry for the transition.
 */
export function applyActionWithSync(state: GameState, action: Action): SyncResult {
  const beforeHash = hashState(state);
  const nextState = applyAction(state, action).state;
  const afterHash = hashState(nextState);
  return { nextState, afterHash, replayEntry: { beforeHash, action, afterHash } };
}

export type ApplyAndRecordResult = {
  nextState: GameState;
  nextLog: ReplayLog;
};

/** Append an entry without applying anything; `log` is left untouched. */
export function recordAction(log: ReplayLog, entry: ReplayEntry): ReplayLog {
  return [...log, entry];
}

export function applyAndRecord(state: GameState, action: Action, log: ReplayLog): ApplyAndRecordResult {
  const { nextState, replayEntry } = applyActionWithSync(state, action);
  return { nextState, nextLog: recordAction(log, replayEntry) };
}
