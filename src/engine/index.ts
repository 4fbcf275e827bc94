// Public engine surface

export { makeState, buildDeck, asGameId } from "./makeState";
export type { MakeStateOptions } from "./makeState";

export { applyAction, applyActionWithRng } from "./applyAction";
export { parseAction } from "./actions";

export { hasLegalMoves, isActionAllowed } from "./legalMoves";

export { ROOM_CATALOG, getRoom } from "./catalog";

// State serialization + hash
export { serializeState, deserializeState, hashState } from "./serialization";

// Replay log and files
export { REPLAY_FORMAT_VERSION, applyActionWithSync, applyAndRecord, recordAction } from "./replay";
export type { ReplayEntry, ReplayFile, ReplayLog, SyncResult } from "./replay";
export { validateReplayFile, serializeReplay, deserializeReplay } from "./replayFile";
export { verifyReplay } from "./replayVerify";
export type { ReplayVerification } from "./replayVerify";

// Untrusted input
export { tryApplyActionWithResponse } from "./tryApply";
export type { ActionResponse, EngineError, EngineErrorCode } from "./tryApply";
