import type { Board, BoardStatus } from "../types";
import { JOKER, matches } from "./blockKind";
import { isBoardEmpty, rowBlocks } from "./board";

/**
 * True if throwing the held block along `row` would hit a matching block.
 */
export function canThrowAt(board: Board, row: number): boolean {
  const held = board.player.block;
  if (held === null) return false;

  const first = rowBlocks(board, row)[0];
  return first !== undefined && matches(held, first.kind);
}

/**
 * Rows where a throw would be accepted, top to bottom.
 * Presentation uses this to mark targets; evaluateStatus uses it to detect a dead end.
 */
export function throwableRows(board: Board): number[] {
  const rows: number[] = [];
  for (let row = 0; row < board.rows; row++) {
    if (canThrowAt(board, row)) rows.push(row);
  }
  return rows;
}

/**
 * won:    grid is empty
 * failed: no block held, or no row's nearest block matches the held block
 * playing otherwise
 */
export function evaluateStatus(board: Board): BoardStatus {
  if (isBoardEmpty(board)) return "won";

  const held = board.player.block;
  if (held === null) return "failed";

  // A joker hits whatever it reaches, and a non-empty grid always has a reachable block.
  if (held === JOKER) return "playing";

  return throwableRows(board).length > 0 ? "playing" : "failed";
}
