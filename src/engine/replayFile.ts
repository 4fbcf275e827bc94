import type { GameState } from "../types";
import { parseAction } from "./actions";
import { REPLAY_FORMAT_VERSION, type ReplayFile } from "./replay";
import { validateState } from "./validateState";

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

/** Throws on the first structural problem; the message names the field. */
export function validateReplayFile(replay: unknown): asserts replay is ReplayFile {
  if (!isObject(replay)) throw new Error("Invalid replay: not an object");

  if (replay.formatVersion !== REPLAY_FORMAT_VERSION) {
    throw new Error(`Invalid replay formatVersion: ${String(replay.formatVersion)}`);
  }

  if (!isIsoDateString(replay.createdAt)) {
    throw new Error(`Invalid replay createdAt: ${String(replay.createdAt)}`);
  }

  const initial = replay.initialState;
  if (!isObject(initial)) throw new Error("Invalid replay initialState");
  // Shape is checked field by field inside validateState.
  const initialState: GameState = JSON.parse(JSON.stringify(initial));
  validateState(initialState, "replay.initialState");

  const log = replay.log;
  if (!Array.isArray(log)) throw new Error("Invalid replay log");

  log.forEach((e: unknown, i) => {
    if (!isObject(e)) throw new Error(`Invalid replay log[${i}]`);
    if (typeof e.beforeHash !== "string") throw new Error(`Invalid replay log[${i}].beforeHash`);
    if (parseAction(e.action) === null) throw new Error(`Invalid replay log[${i}].action`);
    if (typeof e.afterHash !== "string") throw new Error(`Invalid replay log[${i}].afterHash`);
  });
}

export function serializeReplay(replay: ReplayFile): string {
  return JSON.stringify(replay);
}

export function deserializeReplay(json: string): ReplayFile {
  const parsed: unknown = JSON.parse(json);
  validateReplayFile(parsed);
  return parsed;
}
