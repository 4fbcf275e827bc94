import fs from "node:fs";
import path from "node:path";
import type { SessionState } from "./handleMessage";
import type { ReplayLog } from "../engine/replay";
import { parseAction } from "../engine/actions";
import { serializeState, deserializeState, hashState } from "../engine";

export type PersistedSessionV1 = {
  version: 1;
  savedAt: string; // ISO
  gameState: string; // serialized GameState
  stateHash: string;
  log: ReplayLog;
};

export type PersistenceOptions = {
  /** Full path to the JSON file used for persistence. */
  filePath: string;
};

// Game codes double as file names.
const GAME_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function isSafeGameId(gameId: string): boolean {
  return GAME_ID_PATTERN.test(gameId);
}

export function sessionFilePath(persistenceDir: string, gameId: string): string {
  if (!isSafeGameId(gameId)) {
    throw new Error(`Game id not usable as a file name: ${JSON.stringify(gameId)}`);
  }
  return path.join(persistenceDir, `${gameId}.json`);
}

function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
}

export function saveSession(session: SessionState, opts: PersistenceOptions): void {
  const payload: PersistedSessionV1 = {
    version: 1,
    savedAt: new Date().toISOString(),
    gameState: serializeState(session.game),
    stateHash: hashState(session.game),
    log: session.log,
  };

  ensureDirForFile(opts.filePath);
  fs.writeFileSync(opts.filePath, JSON.stringify(payload, null, 2), "utf8");
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function parseLog(x: unknown): ReplayLog {
  if (!Array.isArray(x)) {
    throw new Error("Persisted session log is not an array.");
  }

  return x.map((e: unknown, i) => {
    if (!isObject(e)) throw new Error(`Persisted session log[${i}] is not an object.`);
    const beforeHash = e["beforeHash"];
    const afterHash = e["afterHash"];
    const action = parseAction(e["action"]);
    if (typeof beforeHash !== "string" || typeof afterHash !== "string" || !action) {
      throw new Error(`Persisted session log[${i}] is malformed.`);
    }
    return { beforeHash, action, afterHash };
  });
}

export function loadSession(opts: PersistenceOptions): SessionState {
  const raw = fs.readFileSync(opts.filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);

  if (!isObject(parsed)) {
    throw new Error("Persisted session is not an object.");
  }

  const version = parsed["version"];
  if (version !== 1) {
    throw new Error(`Unsupported persisted session version: ${String(version)}`);
  }

  const savedAt = parsed["savedAt"];
  if (typeof savedAt !== "string") {
    throw new Error("Persisted session missing savedAt string.");
  }

  const gameState = parsed["gameState"];
  if (typeof gameState !== "string") {
    throw new Error("Persisted session missing gameState string.");
  }

  const stateHash = parsed["stateHash"];
  if (typeof stateHash !== "string") {
    throw new Error("Persisted session missing stateHash string.");
  }

  const log = parseLog(parsed["log"]);

  const game = deserializeState(gameState);
  const computedHash = hashState(game);

  if (computedHash !== stateHash) {
    throw new Error(
      `Persisted session hash mismatch. Expected ${stateHash}, computed ${computedHash}.`
    );
  }

  return { game, log };
}

/**
 * Utility: return true if the persistence file exists.
 */
export function hasPersistedSession(opts: PersistenceOptions): boolean {
  return fs.existsSync(opts.filePath);
}
