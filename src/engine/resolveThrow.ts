// src/engine/resolveThrow.ts
//
// Resolves one throw of the player's block along a row.
//
// Rules:
// - The nearest occupied cell must match the held block (joker-aware), otherwise
//   the throw is rejected and the board is returned untouched.
// - Matching cells are annihilated one after another, each compared against the
//   block that was THROWN (not against the previous cell).
// - The first non-matching cell stops the chain; the player picks it up and it
//   leaves the grid.
// - An empty grid after the pickup is a win, whatever was picked up.

import type { Board, BlockKind, Cell, CellPos, ThrowOutcome } from "../types";
import { matches } from "./blockKind";
import { isBoardEmpty, rowBlocks } from "./board";

export type ThrowResolution = {
  board: Board;
  outcome: ThrowOutcome;
};

export function resolveThrow(board: Board, throwRow: number = board.player.row): ThrowResolution {
  const thrown = board.player.block;
  if (thrown === null) {
    // Callers gate on evaluateStatus first; a board in this state has already failed or been won.
    throw new Error("resolveThrow: player holds no block");
  }

  const targets = rowBlocks(board, throwRow);
  const first = targets[0];
  if (!first) {
    return { board, outcome: { status: "noMatch", reason: "emptyRow" } };
  }
  if (!matches(thrown, first.kind)) {
    return { board, outcome: { status: "noMatch", reason: "mismatch" } };
  }

  const removed: CellPos[] = [];
  let picked: CellPos | null = null;
  let nextBlock: BlockKind | null = null;

  for (const target of targets) {
    if (matches(thrown, target.kind)) {
      removed.push({ row: throwRow, col: target.col });
      continue;
    }
    picked = { row: throwRow, col: target.col };
    nextBlock = target.kind;
    break;
  }

  const cleared = new Set<number>(removed.map((p) => p.col));
  if (picked) cleared.add(picked.col);

  const cells = board.cells.map((line, row): readonly Cell[] =>
    row === throwRow ? line.map((cell, col) => (cleared.has(col) ? null : cell)) : line
  );

  const after: Board = { ...board, cells, player: { ...board.player, block: nextBlock } };

  if (isBoardEmpty(after)) {
    return {
      board: { ...after, player: { ...after.player, block: null } },
      outcome: { status: "win", removed, picked },
    };
  }

  return {
    board: after,
    outcome: { status: "continue", removed, picked, block: nextBlock },
  };
}
