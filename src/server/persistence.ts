import fs from "node:fs";
import path from "node:path";
import type { GameProgress, Level, LevelId, LevelScore, ReplayRecord } from "../types";
import { parseLevels } from "../engine/levelLoader";
import { deserializeReplay, serializeReplay } from "../engine/replayIO";
import { emptyProgress, scoreFor, unlockNext, withScore } from "../session/progress";
import type { ReplayStore, ScoreStore } from "../session/stores";

export type PersistedProgressV1 = {
  version: 1;
  savedAt: string; // ISO
  progress: GameProgress;
};

function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isCount(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

/* =========================
 * Levels
 * ========================= */

export function loadLevelPack(filePath: string): Level[] {
  const text = fs.readFileSync(filePath, "utf8");
  return parseLevels(text);
}

/* =========================
 * Replays
 * ========================= */

export type FileReplayStoreOptions = {
  /** Directory holding one JSON file per level. */
  dir: string;

  /** Replays shipped with the game, used when no file exists for the level. */
  builtin?: ReadonlyMap<LevelId, ReplayRecord>;
};

export class FileReplayStore implements ReplayStore {
  constructor(private readonly opts: FileReplayStoreOptions) {}

  filePath(levelId: LevelId): string {
    return path.join(this.opts.dir, `${levelId}.json`);
  }

  /**
   * Returns null when the level has no replay. A file that exists but cannot be
   * parsed throws.
   */
  loadReplay(levelId: LevelId): ReplayRecord | null {
    const fp = this.filePath(levelId);
    if (!fs.existsSync(fp)) {
      return this.opts.builtin?.get(levelId) ?? null;
    }
    return deserializeReplay(fs.readFileSync(fp, "utf8"));
  }

  /** Overwrites any replay previously saved for the level. */
  saveReplay(levelId: LevelId, record: ReplayRecord): void {
    const fp = this.filePath(levelId);
    ensureDirForFile(fp);
    fs.writeFileSync(fp, serializeReplay(record), "utf8");
  }
}

export function loadReplayFile(filePath: string): ReplayRecord {
  return deserializeReplay(fs.readFileSync(filePath, "utf8"));
}

/* =========================
 * Progress
 * ========================= */

function parseScore(x: unknown, where: string): LevelScore {
  if (!isObject(x)) throw new Error(`${where} is not an object.`);

  const { attempts, wins, hiscore, firstWin, helpUsed } = x;
  if (!isCount(attempts) || !isCount(wins) || !isCount(hiscore)) {
    throw new Error(`${where} must have integer attempts/wins/hiscore.`);
  }
  if (firstWin !== null && typeof firstWin !== "string") {
    throw new Error(`${where}.firstWin must be a date string or null.`);
  }
  if (typeof helpUsed !== "boolean") {
    throw new Error(`${where}.helpUsed must be boolean.`);
  }
  return { attempts, wins, hiscore, firstWin, helpUsed };
}

export function parseProgress(raw: string): GameProgress {
  const parsed: unknown = JSON.parse(raw);

  if (!isObject(parsed)) {
    throw new Error("Persisted progress is not an object.");
  }

  const version = parsed["version"];
  if (version !== 1) {
    throw new Error(`Unsupported persisted progress version: ${String(version)}`);
  }

  const progress = parsed["progress"];
  if (!isObject(progress)) {
    throw new Error("Persisted progress missing progress object.");
  }

  const maxLevel = progress["maxLevel"];
  if (!isCount(maxLevel)) {
    throw new Error("Persisted progress maxLevel must be a non-negative integer.");
  }

  const levels = progress["levels"];
  if (!isObject(levels)) {
    throw new Error("Persisted progress missing levels object.");
  }

  const out: Record<LevelId, LevelScore> = {};
  for (const [id, score] of Object.entries(levels)) {
    out[id] = parseScore(score, `levels.${id}`);
  }

  return { maxLevel, levels: out };
}

/**
 * Progress kept in one JSON file. Every change is written through immediately.
 */
export class FileProgressStore implements ScoreStore {
  private _progress: GameProgress;

  constructor(readonly filePath: string) {
    this._progress = fs.existsSync(filePath)
      ? parseProgress(fs.readFileSync(filePath, "utf8"))
      : emptyProgress();
  }

  get progress(): GameProgress {
    return this._progress;
  }

  loadScore(levelId: LevelId): LevelScore | null {
    return this._progress.levels[levelId] ?? null;
  }

  saveScore(levelId: LevelId, score: LevelScore): void {
    this._progress = withScore(this._progress, levelId, score);
    this.write();
  }

  scoreFor(levelId: LevelId): LevelScore {
    return scoreFor(this._progress, levelId);
  }

  unlockAfter(levelIndex: number, levelCount: number): void {
    const next = unlockNext(this._progress, levelIndex, levelCount);
    if (next === this._progress) return;
    this._progress = next;
    this.write();
  }

  private write(): void {
    const payload: PersistedProgressV1 = {
      version: 1,
      savedAt: new Date().toISOString(),
      progress: this._progress,
    };
    ensureDirForFile(this.filePath);
    fs.writeFileSync(this.filePath, JSON.stringify(payload, null, 2), "utf8");
  }
}
