import type { Level } from "../types";
import { isBlockKind } from "./blockKind";
import { MAX_LEVEL_SIZE, MIN_LEVEL_SIZE } from "./constants";

/**
 * Malformed level data. Raised at construction time only: a level that fails
 * validation never reaches a session.
 */
export class LevelError extends Error {
  constructor(
    message: string,
    readonly where: string
  ) {
    super(`${where}: ${message}`);
    this.name = "LevelError";
  }
}

function assert(cond: unknown, msg: string, where: string): asserts cond {
  if (!cond) throw new LevelError(msg, where);
}

function inSizeRange(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_LEVEL_SIZE && n <= MAX_LEVEL_SIZE;
}

/**
 * validateLevel (shape + rules)
 *
 * - dimensions within 1..MAX_LEVEL_SIZE and consistent with the cell grid
 * - every cell empty or a known block kind
 * - player row inside the grid, player block a known kind
 * - at least one block on the grid
 */
export function validateLevel(level: Level): void {
  const where = `level ${level.id || "?"}`;

  assert(typeof level.id === "string" && level.id !== "", "id missing", where);
  assert(inSizeRange(level.rows), `rows must be ${MIN_LEVEL_SIZE}..${MAX_LEVEL_SIZE}, got ${level.rows}`, where);
  assert(inSizeRange(level.cols), `cols must be ${MIN_LEVEL_SIZE}..${MAX_LEVEL_SIZE}, got ${level.cols}`, where);
  assert(Array.isArray(level.cells), "cells missing", where);
  assert(level.cells.length === level.rows, `expected ${level.rows} rows, found ${level.cells.length}`, where);

  let blocks = 0;
  level.cells.forEach((line, row) => {
    assert(Array.isArray(line), `row ${row} missing`, where);
    assert(line.length === level.cols, `row ${row} has ${line.length} cells, expected ${level.cols}`, where);
    line.forEach((cell, col) => {
      if (cell === null) return;
      assert(isBlockKind(cell), `unknown block ${String(cell)} at ${row}:${col}`, where);
      blocks++;
    });
  });
  assert(blocks > 0, "grid has no blocks", where);

  const { row, block } = level.player;
  assert(Number.isInteger(row) && row >= 0 && row < level.rows, `player row ${row} out of range`, where);
  assert(isBlockKind(block), `unknown player block ${String(block)}`, where);
}
