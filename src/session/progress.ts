// src/session/progress.ts
//
// Per-level score bookkeeping. Pure functions: callers load a score before a
// session and write back whatever the session returns.

import type { GameProgress, LevelId, LevelScore } from "../types";
import { MAX_HISCORE } from "../engine/constants";

export function emptyScore(): LevelScore {
  return { attempts: 0, wins: 0, hiscore: 0, firstWin: null, helpUsed: false };
}

export function emptyProgress(): GameProgress {
  return { maxLevel: 1, levels: {} };
}

/** YYYY-MM-DD in local time. */
export function toIsoDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

export function isNewHiscore(score: LevelScore, throws: number): boolean {
  return score.hiscore === 0 || throws < score.hiscore;
}

export function recordWin(score: LevelScore, throws: number, now: Date = new Date()): LevelScore {
  const wins = score.wins + 1;
  return {
    ...score,
    wins,
    attempts: score.attempts + 1,
    firstWin: wins === 1 ? toIsoDate(now) : score.firstWin,
    hiscore: isNewHiscore(score, throws) ? Math.min(throws, MAX_HISCORE) : score.hiscore,
  };
}

export function recordFail(score: LevelScore): LevelScore {
  return { ...score, attempts: score.attempts + 1 };
}

/**
 * Watching a replay of an unsolved level marks it. Levels already solved are
 * left alone.
 */
export function markHelpUsed(score: LevelScore): LevelScore {
  if (score.wins > 0 || score.helpUsed) return score;
  return { ...score, helpUsed: true };
}

export function scoreFor(progress: GameProgress, levelId: LevelId): LevelScore {
  return progress.levels[levelId] ?? emptyScore();
}

export function withScore(progress: GameProgress, levelId: LevelId, score: LevelScore): GameProgress {
  return { ...progress, levels: { ...progress.levels, [levelId]: score } };
}

/**
 * After a win on `levelIndex`, the next level becomes available (up to the last one).
 */
export function unlockNext(progress: GameProgress, levelIndex: number, levelCount: number): GameProgress {
  const next = Math.min(levelIndex + 1, levelCount - 1);
  if (next <= progress.maxLevel) return progress;
  return { ...progress, maxLevel: next };
}
