// Public engine surface

export { JOKER, TILE_KINDS, matches, isBlockKind, charToKind } from "./blockKind";
export { LevelError, validateLevel } from "./validateLevel";
export { parseLevels, levelIdFor } from "./levelLoader";

// Board + rules
export { createBoard, movePlayer, rowBlocks, countBlocks, isBoardEmpty } from "./board";
export { resolveThrow, type ThrowResolution } from "./resolveThrow";
export { canThrowAt, throwableRows, evaluateStatus } from "./gameStatus";

// Action acceptance
export type { ActionResponse, StartResponse, EngineError, EngineErrorCode } from "./envelope";
export { tryApplyAction } from "./tryApply";

// Deterministic board hash
export { hashBoard } from "./boardHash";

// Time
export { RealClock, VirtualClock, type Clock, type CancelTimer } from "./clock";

// Replays
export { REPLAY_FORMAT_VERSION, SUPPORTED_REPLAY_VERSIONS, isSupportedReplayVersion } from "./replayFormat";
export { serializeReplay, deserializeReplay } from "./replayIO";
export { validateReplayRecord } from "./replayValidate";
export { ActionRecorder } from "./replayRecorder";
export { compressReplay } from "./replayCompress";
export { ReplayPlayer, type ReplayPlayerState, type ReplayHooks } from "./replayPlayer";
