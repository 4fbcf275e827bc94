import type { GameState } from "../types";
import type { ReplayLog } from "../engine/replay";
import type { ActionMessage, GetStateMessage, ServerMessage } from "./protocol";
import { tryApplyActionWithResponse, serializeState, hashState } from "../engine";

export type SessionState = {
  game: GameState;

  // Every applied transition since the session was created.
  log: ReplayLog;
};

export type HandleResult = {
  nextState: SessionState;
  serverMessage: ServerMessage;
};

/** Messages that address one game session. */
export type SessionMessage = ActionMessage | GetStateMessage;

export function newSession(game: GameState): SessionState {
  return { game, log: [] };
}

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

export function mkStateSync(s: SessionState, reqId?: string): ServerMessage {
  return withReqId(
    {
      type: "stateSync",
      gameId: s.game.gameId,
      state: serializeState(s.game),
      stateHash: hashState(s.game),
    },
    reqId
  );
}

/**
 * Pure session step. The caller routes only messages whose gameId matches the
 * session; socket bookkeeping stays in the server.
 */
export function handleClientMessage(state: SessionState, msg: SessionMessage): HandleResult {
  switch (msg.type) {
    case "getState":
      return { nextState: state, serverMessage: mkStateSync(state, msg.reqId) };

    case "action": {
      const response = tryApplyActionWithResponse(state.game, msg.action);
      const serverMessage = withReqId<ServerMessage>(
        { type: "actionResult", gameId: state.game.gameId, response },
        msg.reqId
      );

      if (!response.ok) return { nextState: state, serverMessage };

      return {
        nextState: {
          game: response.result.nextState,
          log: [...state.log, response.result.replayEntry],
        },
        serverMessage,
      };
    }

    default: {
      const unreachable: never = msg;
      throw new Error(`Unhandled session message: ${JSON.stringify(unreachable)}`);
    }
  }
}
