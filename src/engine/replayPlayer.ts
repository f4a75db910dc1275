// src/engine/replayPlayer.ts
//
// Plays a stored action stream back on a fresh board:
//
//   idle -> playing -> finished
//                  \-> interrupted
//
// Each action waits out its recorded delay on the injected clock and is then fed
// through tryApplyAction, the same acceptance path live input uses.

import type { Action, ActionResult, Board, Level, ReplayRecord } from "../types";
import { createBoard } from "./board";
import type { CancelTimer, Clock } from "./clock";
import { engineError, type ActionResponse, type StartResponse } from "./envelope";
import { isSupportedReplayVersion, SUPPORTED_REPLAY_VERSIONS } from "./replayFormat";
import { tryApplyAction } from "./tryApply";

export type ReplayPlayerState = "idle" | "playing" | "finished" | "interrupted";

export type ReplayHooks = {
  onAction?: (action: Action, response: ActionResponse, board: Board) => void;
  onStateChange?: (state: ReplayPlayerState) => void;
};

export class ReplayPlayer {
  private _state: ReplayPlayerState = "idle";
  private _board: Board;
  private idx = 0;
  private cancelPending: CancelTimer | null = null;
  private readonly _results: ActionResult[] = [];

  constructor(
    private readonly level: Level,
    private readonly record: ReplayRecord,
    private readonly clock: Clock,
    private readonly hooks: ReplayHooks = {}
  ) {
    this._board = createBoard(level);
  }

  get state(): ReplayPlayerState {
    return this._state;
  }

  get board(): Board {
    return this._board;
  }

  /** Results of the delivered actions, in order (rejected actions are not listed). */
  get results(): readonly ActionResult[] {
    return this._results;
  }

  get delivered(): number {
    return this.idx;
  }

  get total(): number {
    return this.record.actions.length;
  }

  /** Share of actions delivered, 0..100. */
  get progress(): number {
    if (this.total === 0) return this._state === "finished" ? 100 : 0;
    return Math.floor((this.idx * 100) / this.total);
  }

  start(): StartResponse {
    if (this._state !== "idle") {
      return engineError("INVALID_STATE", `Replay player already ${this._state}.`);
    }

    if (!isSupportedReplayVersion(this.record.version)) {
      return engineError(
        "UNSUPPORTED_VERSION",
        `Unsupported replay version ${this.record.version}; supported: ${SUPPORTED_REPLAY_VERSIONS.join(", ")}.`
      );
    }

    if (this.record.levelId !== this.level.id) {
      return engineError(
        "LEVEL_MISMATCH",
        `Replay is for ${this.record.levelId}, not ${this.level.id}.`
      );
    }

    this.setState("playing");
    this.scheduleNext();
    return { ok: true };
  }

  /**
   * Stop a running playback. Returns false if there was nothing to stop.
   */
  cancel(): boolean {
    if (this._state !== "playing") return false;

    if (this.cancelPending) {
      this.cancelPending();
      this.cancelPending = null;
    }
    this.setState("interrupted");
    return true;
  }

  private scheduleNext(): void {
    const action = this.record.actions[this.idx];
    if (!action) {
      this.setState("finished");
      return;
    }
    this.cancelPending = this.clock.schedule(action.elapsed, () => this.deliver(action));
  }

  private deliver(action: Action): void {
    this.cancelPending = null;
    if (this._state !== "playing") return;

    this.idx++;
    const response = tryApplyAction(this._board, action.kind);
    if (response.ok) {
      this._board = response.board;
      this._results.push(response.result);
    }
    this.hooks.onAction?.(action, response, this._board);

    // a hook may have cancelled playback
    if (this._state === "playing") this.scheduleNext();
  }

  private setState(next: ReplayPlayerState): void {
    this._state = next;
    this.hooks.onStateChange?.(next);
  }
}
