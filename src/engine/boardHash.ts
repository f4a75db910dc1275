import type { Board } from "../types";

/**
 * Deterministic hash of a Board.
 * Used to check that a replay reaches the same board the recording did.
 */
export function hashBoard(board: Board): string {
  // Keys are listed explicitly so the text does not depend on how the board was built.
  return JSON.stringify({
    rows: board.rows,
    cols: board.cols,
    cells: board.cells,
    player: { row: board.player.row, block: board.player.block },
  });
}
