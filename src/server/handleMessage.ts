// src/server/handleMessage.ts

import type { GameProgress, Level, SessionResult } from "../types";
import { hashBoard } from "../engine/boardHash";
import type { Clock } from "../engine/clock";
import type { EngineErrorCode, StartResponse } from "../engine/envelope";
import { SessionController } from "../session/sessionController";
import { scoreFor } from "../session/progress";
import type { ReplayStore, ScoreStore } from "../session/stores";
import type { ClientMessage, LevelSummary, ServerErrorCode, ServerMessage } from "./protocol";

export const SERVER_VERSION = "blockthrow-ws-0.1.0";

// Level 0 is only ever watched through its built-in replay.
export const DEMO_LEVEL_INDEX = 0;

/**
 * Score store that also tracks which levels are unlocked.
 */
export interface ProgressBook extends ScoreStore {
  readonly progress: GameProgress;
  unlockAfter(levelIndex: number, levelCount: number): void;
}

export type ServerContext = {
  levels: readonly Level[];
  clock: Clock;
  replays: ReplayStore;
  progress: ProgressBook;
  unlockAll?: boolean;
};

/**
 * Per-connection state. `emit` carries messages the session produces on its
 * own: state changes during replay playback and attempt results.
 */
export type Connection = {
  ctx: ServerContext;
  emit: (msg: ServerMessage) => void;
  session: SessionController | null;
};

export function createConnection(ctx: ServerContext, emit: (msg: ServerMessage) => void): Connection {
  return { ctx, emit, session: null };
}

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function mkError(code: ServerErrorCode | EngineErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

export function mkStateSync(session: SessionController, reqId?: string): ServerMessage {
  const snapshot = session.snapshot();
  return withReqId({ type: "stateSync", session: snapshot, boardHash: hashBoard(snapshot.board) }, reqId);
}

function mkSessionResult(result: SessionResult, reqId?: string): ServerMessage {
  return withReqId({ type: "sessionResult", result }, reqId);
}

function isLocked(ctx: ServerContext, index: number): boolean {
  if (index === DEMO_LEVEL_INDEX) return true;
  return !ctx.unlockAll && index > ctx.progress.progress.maxLevel;
}

function levelSummaries(ctx: ServerContext): LevelSummary[] {
  return ctx.levels.map((level) => ({
    index: level.index,
    id: level.id,
    label: level.label,
    locked: isLocked(ctx, level.index),
    demo: level.index === DEMO_LEVEL_INDEX,
    ...(level.par !== undefined ? { par: level.par } : {}),
    score: scoreFor(ctx.progress.progress, level.id),
  }));
}

function startLevel(conn: Connection, index: number, reqId?: string): ServerMessage[] {
  const { ctx } = conn;
  const level = ctx.levels[index];
  if (!level) {
    return [mkError("UNKNOWN_LEVEL", `No level ${index}; levels are 0..${ctx.levels.length - 1}.`, reqId)];
  }
  if (index === DEMO_LEVEL_INDEX) {
    return [mkError("LEVEL_LOCKED", `Level ${index} is the demo; use watchDemo.`, reqId)];
  }
  if (isLocked(ctx, index)) {
    return [mkError("LEVEL_LOCKED", `Level ${index} is locked.`, reqId)];
  }

  const session = openSession(conn, level, false);
  return [mkStateSync(session, reqId)];
}

function watchDemo(conn: Connection, reqId?: string): ServerMessage[] {
  const level = conn.ctx.levels[DEMO_LEVEL_INDEX];
  if (!level) {
    return [mkError("UNKNOWN_LEVEL", "This level pack has no demo level.", reqId)];
  }

  const session = openSession(conn, level, true);
  const started = startReplay(session, reqId);
  if (started.length > 0) {
    conn.session = null;
    return started;
  }
  return [mkStateSync(session, reqId)];
}

function openSession(conn: Connection, level: Level, demo: boolean): SessionController {
  const { ctx } = conn;

  // Switching levels leaves the current one.
  if (conn.session) {
    conn.session.abort();
    conn.session = null;
  }

  const session: SessionController = new SessionController({
    level,
    demo,
    clock: ctx.clock,
    replays: ctx.replays,
    ...(demo ? {} : { scores: ctx.progress }),
    hooks: {
      onChange: () => {
        if (conn.session === session) conn.emit(mkStateSync(session));
      },
      onResult: (result) => {
        if (demo) return;
        if (result.outcome === "won") ctx.progress.unlockAfter(level.index, ctx.levels.length);
        conn.emit(mkSessionResult(result));
      },
    },
  });
  conn.session = session;
  return session;
}

/** Empty on success; the error reply otherwise. */
function startReplay(session: SessionController, reqId?: string): ServerMessage[] {
  let res: StartResponse;
  try {
    res = session.startReplay();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return [mkError("REPLAY_UNREADABLE", `Stored replay could not be read: ${detail}`, reqId)];
  }
  if (!res.ok) return [mkError(res.error.code, res.error.message, reqId)];
  return [];
}

export function handleClientMessage(conn: Connection, msg: ClientMessage): ServerMessage[] {
  const { ctx } = conn;
  const reqId = msg.reqId;

  switch (msg.type) {
    case "hello":
      return [withReqId({ type: "welcome", serverVersion: SERVER_VERSION, levelCount: ctx.levels.length }, reqId)];

    case "listLevels":
      return [
        withReqId(
          { type: "levelList", maxLevel: ctx.progress.progress.maxLevel, levels: levelSummaries(ctx) },
          reqId
        ),
      ];

    case "startLevel":
      return startLevel(conn, msg.level, reqId);

    case "watchDemo":
      return watchDemo(conn, reqId);

    default:
      break;
  }

  const session = conn.session;
  if (!session) {
    return [mkError("NO_SESSION", "Start a level first.", reqId)];
  }

  switch (msg.type) {
    case "getState":
      return [mkStateSync(session, reqId)];

    case "action": {
      const res = session.dispatch(msg.action);
      if (!res.ok) return [mkError(res.error.code, res.error.message, reqId)];
      return [withReqId({ type: "actionResult", action: msg.action, result: res.result }, reqId)];
    }

    case "restart":
      session.restart();
      return [];

    case "abort": {
      const before = session.result;
      const result = session.abort();
      conn.session = null;

      // A fresh abort result was already emitted through the session hook,
      // except for the demo, which reports no results.
      return result === before || session.demo ? [mkSessionResult(result, reqId)] : [];
    }

    case "saveReplay": {
      const saved = session.saveReplay();
      return [
        withReqId(
          { type: "replaySaved", saved: saved.saved, actions: saved.saved ? saved.record.actions.length : 0 },
          reqId
        ),
      ];
    }

    case "startReplay":
      return startReplay(session, reqId);

    case "stopReplay":
      if (!session.stopReplay()) return [mkError("INVALID_STATE", "No replay is open.", reqId)];
      return [];
  }
}

/**
 * Connection closed: an unfinished attempt is abandoned.
 */
export function closeConnection(conn: Connection): void {
  if (!conn.session) return;
  conn.session.abort();
  conn.session = null;
}
