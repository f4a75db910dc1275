import type { LevelId, LevelScore, ReplayRecord } from "../types";

/**
 * Where saved replays live. The session calls it only on explicit save and when
 * a replay is requested.
 */
export interface ReplayStore {
  loadReplay(levelId: LevelId): ReplayRecord | null;
  saveReplay(levelId: LevelId, record: ReplayRecord): void;
}

/**
 * Where level scores live. The session writes after a win, a counted fail, or
 * the first replay watched on an unsolved level.
 */
export interface ScoreStore {
  loadScore(levelId: LevelId): LevelScore | null;
  saveScore(levelId: LevelId, score: LevelScore): void;
}
