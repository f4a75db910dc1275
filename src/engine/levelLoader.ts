// src/engine/levelLoader.ts
//
// Level pack text format:
//
//   ; comment line
//   # 01 optional label          <- starts a new level
//   start:S                      <- player's first block (default "?")
//   row:3                        <- player's starting row (default: bottom row)
//   par:4                        <- best known throw count
//   SX.O                         <- block lines, "." is an empty cell
//   XXO
//
// Block lines rest against the left wall; shorter lines are padded with empty
// cells on the right. Level ids are assigned by position: level-00, level-01, ...
// Level 0 is the demo level.

import type { BlockKind, Cell, Level } from "../types";
import { charToKind, JOKER } from "./blockKind";
import { LevelError, validateLevel } from "./validateLevel";

const DEFAULT_PLAYER_BLOCK: BlockKind = JOKER;

type Draft = {
  label: string;
  start: BlockKind;
  row?: number;
  par?: number;
  lines: string[];
};

function emptyDraft(label = ""): Draft {
  return { label, start: DEFAULT_PLAYER_BLOCK, lines: [] };
}

export function levelIdFor(index: number): string {
  return `level-${String(index).padStart(2, "0")}`;
}

function parseIntField(value: string, name: string, where: string): number {
  const n = Number(value.trim());
  if (!Number.isInteger(n) || n < 0) {
    throw new LevelError(`${name} must be a non-negative integer, got "${value.trim()}"`, where);
  }
  return n;
}

function buildLevel(draft: Draft, index: number): Level {
  const id = levelIdFor(index);
  const cols = draft.lines.reduce((mx, l) => Math.max(mx, l.length), 0);

  const cells: Cell[][] = draft.lines.map((line, r) => {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      const ch = line[c] ?? ".";
      if (ch === ".") {
        row.push(null);
        continue;
      }
      const kind = charToKind(ch);
      if (kind === null) throw new LevelError(`unknown block "${ch}" at ${r}:${c}`, `level ${id}`);
      row.push(kind);
    }
    return row;
  });

  const rows = cells.length;
  const level: Level = {
    id,
    index,
    label: draft.label,
    rows,
    cols,
    cells,
    player: { row: draft.row ?? rows - 1, block: draft.start },
    ...(draft.par !== undefined ? { par: draft.par } : {}),
  };

  validateLevel(level);
  return level;
}

/**
 * Parse a level pack. Any malformed level is fatal: the whole pack is rejected
 * with a LevelError naming the level.
 */
export function parseLevels(text: string): Level[] {
  const levels: Level[] = [];
  let draft = emptyDraft();

  const flush = () => {
    if (draft.lines.length > 0) levels.push(buildLevel(draft, levels.length));
  };

  for (const raw of text.split(/\r?\n/)) {
    const s = raw.trimEnd();
    if (s === "" || s.startsWith(";")) continue;

    const where = `level ${levelIdFor(levels.length)}`;

    if (s.startsWith("#")) {
      flush();
      draft = emptyDraft(s.slice(1).trim());
      continue;
    }

    if (s.startsWith("start:")) {
      const c = s.slice("start:".length).trim();
      if (c === "") continue;
      const kind = charToKind(c[0] ?? "");
      if (kind === null) throw new LevelError(`unknown start block "${c}"`, where);
      draft.start = kind;
      continue;
    }

    if (s.startsWith("row:")) {
      draft.row = parseIntField(s.slice("row:".length), "row", where);
      continue;
    }

    if (s.startsWith("par:")) {
      draft.par = parseIntField(s.slice("par:".length), "par", where);
      continue;
    }

    draft.lines.push(s);
  }

  flush();
  return levels;
}
