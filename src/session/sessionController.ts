// src/session/sessionController.ts
//
// One attempt at a level: live play, an optional replay being watched, and the
// score bookkeeping that follows a win, a fail or an abort.
//
// LIVE/REPLAY MODEL:
// - Only one board is driven at a time. While a replay is open, live commands are
//   rejected (REPLAY_ACTIVE) and the live board stays exactly as it was.
// - Closing the replay (stopReplay) returns to the live board.
//
// RECORDING:
// - Every accepted live action is recorded with the clock time since the previous one.
//   Throws that resolve to noMatch are not accepted and are not recorded.
// - The recording is reset at level start, restart, fail and abort; it reaches a
//   store only through saveReplay().
//
// DEMO:
// - A demo session is watch-only: live commands fail with DEMO_ONLY and no score
//   is written, not even the help mark a watched replay sets.

import type {
  ActionKind,
  ActionResult,
  Board,
  BoardStatus,
  Level,
  LevelScore,
  ReplayRecord,
  SessionOutcome,
  SessionResult,
} from "../types";
import { createBoard } from "../engine/board";
import type { Clock } from "../engine/clock";
import { MIN_THROWS_FOR_ATTEMPT } from "../engine/constants";
import { engineError, type ActionResponse, type StartResponse } from "../engine/envelope";
import { evaluateStatus, throwableRows } from "../engine/gameStatus";
import { compressReplay } from "../engine/replayCompress";
import { ReplayPlayer, type ReplayPlayerState } from "../engine/replayPlayer";
import { ActionRecorder } from "../engine/replayRecorder";
import { tryApplyAction } from "../engine/tryApply";
import { emptyScore, isNewHiscore, markHelpUsed, recordFail, recordWin } from "./progress";
import type { ReplayStore, ScoreStore } from "./stores";

export type SessionStatus = BoardStatus | "aborted";
export type SessionMode = "live" | "replay";

export type SessionHooks = {
  /** Any observable change: live actions, replay steps, status changes. */
  onChange?: () => void;
  onResult?: (result: SessionResult) => void;
};

export type SessionOptions = {
  level: Level;
  clock: Clock;

  /** Caller-owned score for this level; read from `scores` when omitted. */
  score?: LevelScore;
  replays?: ReplayStore;
  scores?: ScoreStore;
  hooks?: SessionHooks;

  /** Calendar source for first-win dates and replay timestamps. */
  now?: () => Date;

  /** Watch-only session: live actions are refused and scores are never written. */
  demo?: boolean;
};

export type SaveResult = { saved: false } | { saved: true; record: ReplayRecord };

export type ReplayView = {
  state: ReplayPlayerState;
  board: Board;
  results: readonly ActionResult[];
  progress: number;
  delivered: number;
  total: number;
};

export type SessionSnapshot = {
  levelId: string;
  board: Board;
  throws: number;
  status: SessionStatus;
  mode: SessionMode;
  demo: boolean;
  targets: number[];
  canSave: boolean;
  score: LevelScore;
  replay: ReplayView | null;
};

export class SessionController {
  readonly level: Level;
  readonly demo: boolean;

  private readonly clock: Clock;
  private readonly replays?: ReplayStore;
  private readonly scores?: ScoreStore;
  private readonly hooks: SessionHooks;
  private readonly now: () => Date;

  private board: Board;
  private status: SessionStatus = "playing";
  private throws = 0;
  private readonly recorder: ActionRecorder;
  private lastActionAt: number;

  private _score: LevelScore;
  private _result: SessionResult | null = null;

  // Survives restarts: a replay seen in any attempt of this session counts.
  private replayWatched = false;
  private player: ReplayPlayer | null = null;

  constructor(opts: SessionOptions) {
    this.level = opts.level;
    this.clock = opts.clock;
    this.replays = opts.replays;
    this.scores = opts.scores;
    this.hooks = opts.hooks ?? {};
    this.now = opts.now ?? (() => new Date());
    this.demo = opts.demo ?? false;

    this.board = createBoard(opts.level);
    this.recorder = new ActionRecorder(opts.level.id);
    this.lastActionAt = this.clock.now();
    this._score = opts.score ?? opts.scores?.loadScore(opts.level.id) ?? emptyScore();
  }

  get score(): LevelScore {
    return this._score;
  }

  /** Final result of the current attempt, once it is won, failed or aborted. */
  get result(): SessionResult | null {
    return this._result;
  }

  get mode(): SessionMode {
    return this.player ? "replay" : "live";
  }

  /* =========================
   * Live input
   * ========================= */

  moveUp(): ActionResponse {
    return this.act("moveUp");
  }

  moveDown(): ActionResponse {
    return this.act("moveDown");
  }

  throwBlock(): ActionResponse {
    return this.act("throw");
  }

  dispatch(kind: ActionKind): ActionResponse {
    return this.act(kind);
  }

  private act(kind: ActionKind): ActionResponse {
    if (this.player) {
      return engineError("REPLAY_ACTIVE", "Close the replay before playing.");
    }
    if (this.demo) {
      return engineError("DEMO_ONLY", `${this.level.id} can only be watched.`);
    }
    if (this.status === "aborted") {
      return engineError("GAME_OVER", "Session was aborted.");
    }

    const at = this.clock.now();
    const response = tryApplyAction(this.board, kind);
    if (!response.ok) return response;

    const { result } = response;
    if (result.kind === "throw" && result.outcome.status === "noMatch") {
      return response;
    }

    this.recorder.record(kind, at - this.lastActionAt);
    this.lastActionAt = at;
    this.board = response.board;

    if (result.kind === "throw") {
      this.throws++;
      this.settle();
    }

    this.changed();
    return response;
  }

  private settle(): void {
    const status = evaluateStatus(this.board);
    if (status === "won") this.finishWon();
    else if (status === "failed") this.finishFailed();
  }

  private finishWon(): void {
    const before = this._score;
    const firstSolve = before.wins === 0;
    const newHiscore = isNewHiscore(before, this.throws);

    this.setScore(recordWin(before, this.throws, this.now()));
    this.status = "won";
    this.finish("won", {
      firstSolve,
      newHiscore,
      // only a first solve can be helped; later wins stand on their own
      cheated: firstSolve && (this.replayWatched || before.helpUsed),
    });
  }

  private finishFailed(): void {
    this.setScore(recordFail(this._score));
    this.recorder.reset();
    this.status = "failed";
    this.finish("failed", { firstSolve: false, newHiscore: false, cheated: false });
  }

  private finish(
    outcome: SessionOutcome,
    flags: Pick<SessionResult, "firstSolve" | "newHiscore" | "cheated">
  ): SessionResult {
    const result: SessionResult = {
      levelId: this.level.id,
      throws: this.throws,
      outcome,
      ...flags,
      score: this._score,
    };
    this._result = result;
    this.hooks.onResult?.(result);
    return result;
  }

  /* =========================
   * Attempt lifecycle
   * ========================= */

  /**
   * Start the level over. Leaving an unfinished attempt after MIN_THROWS_FOR_ATTEMPT
   * throws counts as a failed attempt.
   */
  restart(): void {
    this.closeReplay();
    this.countAbandonedAttempt();

    this.board = createBoard(this.level);
    this.throws = 0;
    this.status = "playing";
    this._result = null;
    this.recorder.reset();
    this.lastActionAt = this.clock.now();
    this.changed();
  }

  /**
   * Leave the level. Returns the attempt's result; an attempt that already ended
   * keeps its won/failed result.
   */
  abort(): SessionResult {
    this.closeReplay();

    if (this.status !== "playing" && this._result) {
      return this._result;
    }

    this.countAbandonedAttempt();
    this.recorder.reset();
    this.status = "aborted";
    const result = this.finish("aborted", { firstSolve: false, newHiscore: false, cheated: false });
    this.changed();
    return result;
  }

  private countAbandonedAttempt(): void {
    if (this.status === "playing" && this.throws >= MIN_THROWS_FOR_ATTEMPT) {
      this.setScore(recordFail(this._score));
    }
  }

  /* =========================
   * Replays
   * ========================= */

  /**
   * Compress and store the current recording. Nothing is stored (and no error is
   * raised) when the recording holds no throw.
   */
  saveReplay(): SaveResult {
    if (!this.replays || this.recorder.throwCount === 0) {
      return { saved: false };
    }

    const record = compressReplay(this.recorder.snapshot(this.now()));
    this.replays.saveReplay(this.level.id, record);
    return { saved: true, record };
  }

  /**
   * Open a replay of this level (the stored one unless `record` is given) and
   * start playing it on the session clock.
   */
  startReplay(record?: ReplayRecord): StartResponse {
    if (this.player) {
      return engineError("REPLAY_ACTIVE", "A replay is already open.");
    }

    const source = record ?? this.replays?.loadReplay(this.level.id) ?? null;
    if (!source) {
      return engineError("NO_REPLAY", `No replay saved for ${this.level.id}.`);
    }

    const player: ReplayPlayer = new ReplayPlayer(this.level, source, this.clock, {
      onAction: () => {
        if (this.player === player) this.changed();
      },
      onStateChange: (state) => {
        // closeReplay detaches the player before cancelling it
        if (this.player !== player) return;
        if (state === "playing") this.noteReplayWatched();
        this.changed();
      },
    });

    this.player = player;
    const started = player.start();
    if (!started.ok) {
      this.player = null;
    }
    return started;
  }

  /**
   * Close the open replay, interrupting it if it is still playing.
   * Returns false when no replay was open.
   */
  stopReplay(): boolean {
    if (!this.closeReplay()) return false;
    this.changed();
    return true;
  }

  private closeReplay(): boolean {
    const player = this.player;
    if (!player) return false;

    this.player = null;
    player.cancel();
    return true;
  }

  private noteReplayWatched(): void {
    this.replayWatched = true;
    if (this.demo) return;
    const marked = markHelpUsed(this._score);
    if (marked !== this._score) this.setScore(marked);
  }

  /* =========================
   * Presentation
   * ========================= */

  snapshot(): SessionSnapshot {
    const player = this.player;

    return {
      levelId: this.level.id,
      board: this.board,
      throws: this.throws,
      status: this.status,
      mode: this.mode,
      demo: this.demo,
      targets: this.status === "playing" && !this.demo ? throwableRows(this.board) : [],
      canSave: this.recorder.throwCount > 0,
      score: this._score,
      replay: player
        ? {
            state: player.state,
            board: player.board,
            results: [...player.results],
            progress: player.progress,
            delivered: player.delivered,
            total: player.total,
          }
        : null,
    };
  }

  private setScore(score: LevelScore): void {
    if (this.demo) return;
    this._score = score;
    this.scores?.saveScore(this.level.id, score);
  }

  private changed(): void {
    this.hooks.onChange?.();
  }
}
