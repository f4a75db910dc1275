import type { BlockKind, Board, Cell, GameProgress, Level, LevelId, LevelScore, ReplayRecord } from "../src/types";
import { charToKind } from "../src/engine/blockKind";
import { createBoard } from "../src/engine/board";
import { levelIdFor } from "../src/engine/levelLoader";
import { emptyProgress, unlockNext, withScore } from "../src/session/progress";
import type { ReplayStore, ScoreStore } from "../src/session/stores";
import type { ProgressBook } from "../src/server/handleMessage";

export interface MakeLevelArgs {
  start?: BlockKind;
  row?: number;
  index?: number;
  label?: string;
  par?: number;
}

function toCell(ch: string): Cell {
  if (ch === ".") return null;
  const kind = charToKind(ch);
  if (kind === null) throw new Error(`test level: unknown block "${ch}"`);
  return kind;
}

/**
 * Level from block lines, e.g. ["SX.", "XSS"]. Lines must be the same width.
 */
export function makeLevel(lines: readonly string[], args: MakeLevelArgs = {}): Level {
  const index = args.index ?? 1;
  const cells = lines.map((line) => line.split("").map(toCell));
  return {
    id: levelIdFor(index),
    index,
    label: args.label ?? "test",
    rows: cells.length,
    cols: cells[0]?.length ?? 0,
    cells,
    player: { row: args.row ?? cells.length - 1, block: args.start ?? "S" },
    ...(args.par !== undefined ? { par: args.par } : {}),
  };
}

export function makeBoard(lines: readonly string[], args: MakeLevelArgs = {}): Board {
  return createBoard(makeLevel(lines, args));
}

/** Board cells back as block lines, "." for empty. */
export function rowsOf(board: Board): string[] {
  return board.cells.map((line) => line.map((c) => c ?? ".").join(""));
}

export const FIXED_NOW = new Date("2025-03-14T12:00:00.000Z");

export class MemoryReplayStore implements ReplayStore {
  readonly saved = new Map<LevelId, ReplayRecord>();
  saves = 0;

  loadReplay(levelId: LevelId): ReplayRecord | null {
    return this.saved.get(levelId) ?? null;
  }

  saveReplay(levelId: LevelId, record: ReplayRecord): void {
    this.saves++;
    this.saved.set(levelId, record);
  }
}

export class MemoryScoreStore implements ScoreStore {
  readonly scores = new Map<LevelId, LevelScore>();
  writes = 0;

  loadScore(levelId: LevelId): LevelScore | null {
    return this.scores.get(levelId) ?? null;
  }

  saveScore(levelId: LevelId, score: LevelScore): void {
    this.writes++;
    this.scores.set(levelId, score);
  }
}

export class MemoryProgressBook implements ProgressBook {
  progress: GameProgress;

  constructor(progress: GameProgress = emptyProgress()) {
    this.progress = progress;
  }

  loadScore(levelId: LevelId): LevelScore | null {
    return this.progress.levels[levelId] ?? null;
  }

  saveScore(levelId: LevelId, score: LevelScore): void {
    this.progress = withScore(this.progress, levelId, score);
  }

  unlockAfter(levelIndex: number, levelCount: number): void {
    this.progress = unlockNext(this.progress, levelIndex, levelCount);
  }
}
