// src/server/protocol.ts

import type { ActionResponse } from "../engine/tryApply";

export type GameCode = string;

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage =
  | HelloMessage
  | NewGameMessage
  | JoinGameMessage
  | ActionMessage
  | GetStateMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/** Starts a fresh single-player game and joins it. */
export interface NewGameMessage {
  type: "newGame";
  seed?: string;
  reqId?: string;
}

/** Joins a live game, or restores it from disk when persistence is on. */
export interface JoinGameMessage {
  type: "joinGame";
  gameId: GameCode;
  reqId?: string;
}

/**
 * `action` stays unknown here: the engine envelope decides whether it is a
 * valid Action and answers INVALID_INPUT otherwise.
 */
export interface ActionMessage {
  type: "action";
  gameId: GameCode;
  action: unknown;
  reqId?: string;
}

export interface GetStateMessage {
  type: "getState";
  gameId: GameCode;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | GameJoinedMessage
  | StateSyncMessage
  | ActionResultMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface GameJoinedMessage {
  type: "gameJoined";
  gameId: GameCode;
  clientId: string;

  // False when an existing (or persisted) game was joined.
  created: boolean;
  reqId?: string;
}

export interface StateSyncMessage {
  type: "stateSync";
  gameId: GameCode;

  // Serialized GameState.
  state: string;
  stateHash: string;
  reqId?: string;
}

export interface ActionResultMessage {
  type: "actionResult";
  gameId: GameCode;
  response: ActionResponse;
  reqId?: string;
}

export type ServerErrorCode =
  | "BAD_MESSAGE"
  | "UNKNOWN_GAME"
  | "NOT_IN_GAME"
  | "CREATE_FAILED"
  | "PERSISTENCE_ERROR";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  reqId?: string;
}
