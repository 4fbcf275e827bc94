import type { ClientMessage, ServerMessage, ServerErrorCode } from "./protocol";
import { handleClientMessage, mkStateSync, newSession, type SessionState } from "./handleMessage";
import {
  hasPersistedSession,
  isSafeGameId,
  loadSession,
  saveSession,
  sessionFilePath,
} from "./persistence";
import { makeState } from "../engine";
import { WebSocketServer, type WebSocket, type RawData } from "ws";

export const SERVER_VERSION = "blue-manor/1";

export type WsServerOptions = {
  port: number;

  // Base seed for games created without one; each new game gets a numbered suffix.
  seed?: string;

  findChance?: number;
  persistenceDir?: string;

  // Start-up and failure lines; defaults to silence.
  log?: (line: string) => void;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

type Session = {
  gameId: string;
  state: SessionState;
  sockets: Set<WebSocket>;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function optionalString(x: Record<string, unknown>, key: string): boolean {
  return !(key in x) || typeof x[key] === "string";
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x["reqId"];
  return typeof v === "string" ? v : undefined;
}

export function parseClientMessage(x: unknown): ClientMessage | null {
  if (!isPlainObject(x)) return null;
  if (!optionalString(x, "reqId")) return null;
  const reqId = getReqId(x);
  const gameId = x["gameId"];

  switch (x["type"]) {
    case "hello": {
      const clientId = x["clientId"];
      if (clientId !== undefined && typeof clientId !== "string") return null;
      return { type: "hello", clientId, reqId };
    }

    case "newGame": {
      const seed = x["seed"];
      if (seed !== undefined && typeof seed !== "string") return null;
      return { type: "newGame", seed, reqId };
    }

    case "joinGame":
      return typeof gameId === "string" ? { type: "joinGame", gameId, reqId } : null;

    case "getState":
      return typeof gameId === "string" ? { type: "getState", gameId, reqId } : null;

    case "action":
      return typeof gameId === "string" && "action" in x
        ? { type: "action", gameId, action: x["action"], reqId }
        : null;

    default:
      return null;
  }
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

function makeError(code: ServerErrorCode, message: string, reqId?: string): ServerMessage {
  return reqId ? { type: "error", code, message, reqId } : { type: "error", code, message };
}

function makeGameCode(): string {
  const alphabet = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
  let out = "";
  for (let i = 0; i < 6; i++) out += alphabet[Math.floor(Math.random() * alphabet.length)];
  return out;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * One session per game id. Each socket sits in at most one session at a time;
 * joining another game leaves the previous one.
 */
export async function startWsServer(opts: WsServerOptions): Promise<WsServerHandle> {
  const log = opts.log ?? (() => undefined);
  const wss = new WebSocketServer({ port: opts.port });

  await new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", reject);
  });

  const sessions = new Map<string, Session>();
  const wsGame = new Map<WebSocket, string>();
  const wsClientId = new Map<WebSocket, string>();

  let clientCounter = 0;
  let gameCounter = 0;

  function persist(session: Session) {
    if (!opts.persistenceDir) return;
    try {
      saveSession(session.state, { filePath: sessionFilePath(opts.persistenceDir, session.gameId) });
    } catch (err) {
      log(`failed to persist ${session.gameId}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  function restore(gameId: string): Session | null {
    if (!opts.persistenceDir || !isSafeGameId(gameId)) return null;
    const filePath = sessionFilePath(opts.persistenceDir, gameId);
    if (!hasPersistedSession({ filePath })) return null;

    const state = loadSession({ filePath });
    const session: Session = { gameId, state, sockets: new Set() };
    sessions.set(gameId, session);
    return session;
  }

  function createGame(seed: string | undefined): Session {
    let gameId = makeGameCode();
    while (sessions.has(gameId)) gameId = makeGameCode();

    gameCounter += 1;
    const gameSeed = seed ?? (opts.seed ? `${opts.seed}-${gameCounter}` : `${gameId}-${Date.now()}`);
    const game = makeState({ seed: gameSeed, gameId, findChance: opts.findChance });

    const session: Session = { gameId, state: newSession(game), sockets: new Set() };
    sessions.set(gameId, session);
    persist(session);
    return session;
  }

  function join(ws: WebSocket, session: Session) {
    const prev = wsGame.get(ws);
    if (prev && prev !== session.gameId) sessions.get(prev)?.sockets.delete(ws);

    session.sockets.add(ws);
    wsGame.set(ws, session.gameId);
  }

  wss.on("connection", (ws) => {
    clientCounter += 1;
    wsClientId.set(ws, `c${clientCounter}`);

    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: wsClientId.get(ws) });

    ws.on("message", (data) => {
      const parsed = safeParseJson(rawToString(data));
      const reqId = getReqId(parsed);
      const msg = parseClientMessage(parsed);

      if (!msg) {
        send(ws, makeError("BAD_MESSAGE", "Invalid client message.", reqId));
        return;
      }

      const clientId = () => wsClientId.get(ws) ?? "";

      switch (msg.type) {
        case "hello": {
          if (msg.clientId) wsClientId.set(ws, msg.clientId);
          send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: clientId(), reqId });
          return;
        }

        case "newGame": {
          let session: Session;
          try {
            session = createGame(msg.seed);
          } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            log(`failed to create a game: ${detail}`);
            send(ws, makeError("CREATE_FAILED", detail, reqId));
            return;
          }
          join(ws, session);
          send(ws, { type: "gameJoined", gameId: session.gameId, clientId: clientId(), created: true, reqId });
          send(ws, mkStateSync(session.state, reqId));
          return;
        }

        case "joinGame": {
          let session = sessions.get(msg.gameId) ?? null;
          if (!session) {
            try {
              session = restore(msg.gameId);
            } catch (err) {
              const detail = err instanceof Error ? err.message : String(err);
              log(`failed to restore ${msg.gameId}: ${detail}`);
              send(ws, makeError("PERSISTENCE_ERROR", detail, reqId));
              return;
            }
          }
          if (!session) {
            send(ws, makeError("UNKNOWN_GAME", `No game with id ${msg.gameId}.`, reqId));
            return;
          }

          join(ws, session);
          send(ws, { type: "gameJoined", gameId: session.gameId, clientId: clientId(), created: false, reqId });
          send(ws, mkStateSync(session.state, reqId));
          return;
        }

        case "action":
        case "getState": {
          const session = sessions.get(msg.gameId);
          if (!session) {
            send(ws, makeError("UNKNOWN_GAME", `No game with id ${msg.gameId}.`, reqId));
            return;
          }
          if (wsGame.get(ws) !== msg.gameId) {
            send(ws, makeError("NOT_IN_GAME", "Join the game first.", reqId));
            return;
          }

          const result = handleClientMessage(session.state, msg);
          const changed = result.nextState !== session.state;
          session.state = result.nextState;
          if (changed) persist(session);

          if (result.serverMessage.type === "actionResult") {
            for (const socket of session.sockets) send(socket, result.serverMessage);
          } else {
            send(ws, result.serverMessage);
          }
          return;
        }
      }
    });

    ws.on("close", () => {
      const gameId = wsGame.get(ws);

      wsClientId.delete(ws);
      wsGame.delete(ws);

      if (gameId) sessions.get(gameId)?.sockets.delete(ws);
    });

    ws.on("error", (err) => {
      log(`socket error: ${err.message}`);
    });
  });

  const address = wss.address();

  return {
    port: typeof address === "string" ? opts.port : address.port,
    close: async () => {
      for (const session of sessions.values()) {
        for (const ws of session.sockets) ws.terminate();
      }
      for (const ws of wsClientId.keys()) ws.terminate();
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
