// src/engine/blockKind.ts

import type { BlockKind, TileKind } from "../types";

export const JOKER = "?" as const;

export const TILE_KINDS: readonly TileKind[] = ["S", "X", "O", "T", "Z", "W"];

// Level packs accept a letter (either case), a symbol or a digit per tile kind.
const CHAR_TO_KIND: ReadonlyMap<string, BlockKind> = new Map<string, BlockKind>([
  ..."Ss$1".split("").map((c): [string, BlockKind] => [c, "S"]),
  ..."Xx%2".split("").map((c): [string, BlockKind] => [c, "X"]),
  ..."Oo@3".split("").map((c): [string, BlockKind] => [c, "O"]),
  ..."Tt=4".split("").map((c): [string, BlockKind] => [c, "T"]),
  ..."Zz+5".split("").map((c): [string, BlockKind] => [c, "Z"]),
  ..."Ww:6".split("").map((c): [string, BlockKind] => [c, "W"]),
  [JOKER, JOKER],
]);

export function isBlockKind(x: unknown): x is BlockKind {
  return x === JOKER || TILE_KINDS.some((k) => k === x);
}

/**
 * Two blocks annihilate when they are the same kind or either one is a joker.
 */
export function matches(a: BlockKind, b: BlockKind): boolean {
  return a === b || a === JOKER || b === JOKER;
}

/** Returns null for characters that do not encode a block (including "."). */
export function charToKind(c: string): BlockKind | null {
  return CHAR_TO_KIND.get(c) ?? null;
}
