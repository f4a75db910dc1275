import type { Action, ActionKind, LevelId, ReplayRecord } from "../types";
import { REPLAY_FORMAT_VERSION } from "./replayFormat";

/**
 * Captures the accepted actions of one live attempt, each with the virtual time
 * elapsed since the previous one.
 *
 * Nothing is written anywhere from here: saving goes through the session's
 * explicit save, which compresses a snapshot.
 */
export class ActionRecorder {
  private actions: Action[] = [];

  constructor(readonly levelId: LevelId) {}

  record(kind: ActionKind, elapsed: number): void {
    if (!Number.isFinite(elapsed) || elapsed < 0) {
      throw new Error(`ActionRecorder.record: elapsed must be >= 0, got ${elapsed}`);
    }
    this.actions.push({ kind, elapsed: Math.round(elapsed) });
  }

  /** Drop everything captured so far (level start, restart, fail). */
  reset(): void {
    this.actions = [];
  }

  get length(): number {
    return this.actions.length;
  }

  get throwCount(): number {
    return this.actions.filter((a) => a.kind === "throw").length;
  }

  /**
   * Non-destructive read of the captured stream.
   */
  snapshot(createdAt: Date = new Date()): ReplayRecord {
    return {
      version: REPLAY_FORMAT_VERSION,
      levelId: this.levelId,
      createdAt: createdAt.toISOString(),
      actions: this.actions.map((a) => ({ ...a })),
    };
  }
}
