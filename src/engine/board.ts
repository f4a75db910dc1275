// src/engine/board.ts

import type { Board, Direction, Level, RowBlock } from "../types";
import { validateLevel } from "./validateLevel";

/**
 * Fresh board for a level. Throws LevelError on malformed level data.
 */
export function createBoard(level: Level): Board {
  validateLevel(level);

  return {
    rows: level.rows,
    cols: level.cols,
    cells: level.cells.map((line) => [...line]),
    player: { row: level.player.row, block: level.player.block },
  };
}

/**
 * Shift the player one row. Returns the same board and moved=false at the edge.
 */
export function movePlayer(board: Board, direction: Direction): { board: Board; moved: boolean } {
  const row = board.player.row + (direction === "up" ? -1 : 1);
  if (row < 0 || row >= board.rows) return { board, moved: false };

  return {
    board: { ...board, player: { ...board.player, row } },
    moved: true,
  };
}

/**
 * Occupied cells of a row, nearest to the player first.
 * The player stands to the right of the grid, so this walks columns right to left.
 */
export function rowBlocks(board: Board, row: number): RowBlock[] {
  const line = board.cells[row];
  if (!line) return [];

  const out: RowBlock[] = [];
  for (let col = line.length - 1; col >= 0; col--) {
    const kind = line[col];
    if (kind !== null) out.push({ col, kind });
  }
  return out;
}

export function countBlocks(board: Board): number {
  let n = 0;
  for (const line of board.cells) {
    for (const cell of line) {
      if (cell !== null) n++;
    }
  }
  return n;
}

export function isBoardEmpty(board: Board): boolean {
  return board.cells.every((line) => line.every((cell) => cell === null));
}
