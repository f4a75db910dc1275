// src/types.ts

export type LevelId = string;

/** Regular block kinds. "?" (JOKER) matches every one of them. */
export type TileKind = "S" | "X" | "O" | "T" | "Z" | "W";
export type BlockKind = TileKind | "?";

export type Cell = BlockKind | null;

export interface CellPos {
  row: number;
  col: number;
}

export interface RowBlock {
  col: number;
  kind: BlockKind;
}

/**
 * Immutable level description. Owned by the caller; the engine only reads it
 * when a session starts or restarts.
 */
export interface Level {
  id: LevelId;
  index: number;
  label: string;
  rows: number;
  cols: number;
  cells: readonly (readonly Cell[])[];
  player: {
    row: number;
    block: BlockKind;
  };

  // Best known throw count for the level (informational only)
  par?: number;
}

export interface Board {
  rows: number;
  cols: number;

  // cells[row][col]; row 0 is the top row, the player stands right of the last column
  cells: readonly (readonly Cell[])[];

  player: {
    row: number;

    // null once the grid is cleared, or when a throw ran out of row without a pickup
    block: BlockKind | null;
  };
}

export type Direction = "up" | "down";

export type BoardStatus = "playing" | "won" | "failed";

export type ThrowOutcome =
  | {
      status: "noMatch";
      reason: "emptyRow" | "mismatch";
    }
  | {
      status: "continue";
      removed: readonly CellPos[];

      // Cell the new player block was taken from (null: row exhausted)
      picked: CellPos | null;
      block: BlockKind | null;
    }
  | {
      status: "win";
      removed: readonly CellPos[];
      picked: CellPos | null;
    };

export type ActionKind = "moveUp" | "moveDown" | "throw";

export interface Action {
  kind: ActionKind;

  /** Virtual milliseconds since the previous action (or since recording started). */
  elapsed: number;
}

export type ActionResult =
  | { kind: "move"; moved: boolean }
  | { kind: "throw"; outcome: ThrowOutcome };

export interface ReplayRecord {
  version: number;
  levelId: LevelId;

  // ISO timestamp string
  createdAt: string;

  actions: readonly Action[];
}

export interface LevelScore {
  attempts: number;
  wins: number;

  // Fewest throws in a win; 0 until the level is solved
  hiscore: number;

  // ISO date (YYYY-MM-DD) of the first win
  firstWin: string | null;

  // A replay was watched before the level was ever solved
  helpUsed: boolean;
}

export interface GameProgress {
  // Highest level index the player may start
  maxLevel: number;
  levels: Record<LevelId, LevelScore>;
}

export type SessionOutcome = "won" | "failed" | "aborted";

export interface SessionResult {
  levelId: LevelId;
  throws: number;
  outcome: SessionOutcome;
  firstSolve: boolean;
  cheated: boolean;
  newHiscore: boolean;
  score: LevelScore;
}
