// src/server/protocol.ts

import type { ActionResult, LevelScore, SessionResult } from "../types";
import type { EngineErrorCode } from "../engine/envelope";
import type { SessionSnapshot } from "../session/sessionController";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage =
  | HelloMessage
  | ListLevelsMessage
  | StartLevelMessage
  | ActionMessage
  | RestartMessage
  | AbortMessage
  | SaveReplayMessage
  | StartReplayMessage
  | StopReplayMessage
  | WatchDemoMessage
  | GetStateMessage;

export interface HelloMessage {
  type: "hello";
  reqId?: string;
}

export interface ListLevelsMessage {
  type: "listLevels";
  reqId?: string;
}

/**
 * Starts (or switches to) a level. Any running attempt is aborted first.
 */
export interface StartLevelMessage {
  type: "startLevel";
  level: number;
  reqId?: string;
}

export interface ActionMessage {
  type: "action";
  action: "moveUp" | "moveDown" | "throw";
  reqId?: string;
}

export interface RestartMessage {
  type: "restart";
  reqId?: string;
}

export interface AbortMessage {
  type: "abort";
  reqId?: string;
}

export interface SaveReplayMessage {
  type: "saveReplay";
  reqId?: string;
}

export interface StartReplayMessage {
  type: "startReplay";
  reqId?: string;
}

/** Interrupts a playing replay, or closes a finished one. */
export interface StopReplayMessage {
  type: "stopReplay";
  reqId?: string;
}

/**
 * Opens the demo level (level 0) for watching its built-in replay. The demo
 * cannot be played.
 */
export interface WatchDemoMessage {
  type: "watchDemo";
  reqId?: string;
}

export interface GetStateMessage {
  type: "getState";
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | LevelListMessage
  | StateSyncMessage
  | ActionResultMessage
  | ReplaySavedMessage
  | SessionResultMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  levelCount: number;
  reqId?: string;
}

export interface LevelSummary {
  index: number;
  id: string;
  label: string;
  locked: boolean;
  demo: boolean;
  par?: number;
  score: LevelScore;
}

export interface LevelListMessage {
  type: "levelList";
  maxLevel: number;
  levels: LevelSummary[];
  reqId?: string;
}

export interface StateSyncMessage {
  type: "stateSync";
  session: SessionSnapshot;
  boardHash: string;
  reqId?: string;
}

export interface ActionResultMessage {
  type: "actionResult";
  action: ActionMessage["action"];
  result: ActionResult;
  reqId?: string;
}

export interface ReplaySavedMessage {
  type: "replaySaved";
  saved: boolean;
  actions: number;
  reqId?: string;
}

export interface SessionResultMessage {
  type: "sessionResult";
  result: SessionResult;
  reqId?: string;
}

export type ServerErrorCode =
  | "BAD_MESSAGE"
  | "NO_SESSION"
  | "UNKNOWN_LEVEL"
  | "LEVEL_LOCKED"
  | "REPLAY_UNREADABLE"
  | "INTERNAL";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode | EngineErrorCode;
  message: string;
  reqId?: string;
}
