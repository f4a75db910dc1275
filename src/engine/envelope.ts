import type { ActionResult, Board } from "../types";

export type EngineErrorCode =
  | "GAME_OVER"
  | "UNSUPPORTED_VERSION"
  | "LEVEL_MISMATCH"
  | "INVALID_STATE"
  | "NO_REPLAY"
  | "REPLAY_ACTIVE"
  | "DEMO_ONLY";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type EngineErr = {
  ok: false;
  error: EngineError;
};

export type ActionOk = {
  ok: true;

  /** Board after the action; identical to the input for no-op moves and rejected throws. */
  board: Board;
  result: ActionResult;
};

export type ActionResponse = ActionOk | EngineErr;

export type StartResponse = { ok: true } | EngineErr;

export function engineError(code: EngineErrorCode, message: string): EngineErr {
  return { ok: false, error: { code, message } };
}
