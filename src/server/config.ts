// src/server/config.ts
//
// Environment variables (all optional):
// - BLOCKTHROW_WS_PORT:      WebSocket port (default 8787)
// - BLOCKTHROW_DATA_DIR:     directory for progress.json and replays/ (default ./data)
// - BLOCKTHROW_LEVELS_FILE:  level pack (default ./levels/std-levels.txt)
// - BLOCKTHROW_DEMO_REPLAY:  built-in replay of level 0 (default ./levels/demo.replay.json)
// - BLOCKTHROW_UNLOCK_ALL:   "1" | "true" | "yes" | "on" lets any level be started

import path from "node:path";

export type ServerConfig = {
  port: number;
  dataDir: string;
  levelsFile: string;
  demoReplayFile: string;
  unlockAll: boolean;
};

type Env = Record<string, string | undefined>;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function envString(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? defaultValue : v.trim();
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ServerConfig {
  return {
    port: envInt(env, "BLOCKTHROW_WS_PORT", 8787),
    dataDir: path.resolve(cwd, envString(env, "BLOCKTHROW_DATA_DIR", "data")),
    levelsFile: path.resolve(cwd, envString(env, "BLOCKTHROW_LEVELS_FILE", "levels/std-levels.txt")),
    demoReplayFile: path.resolve(cwd, envString(env, "BLOCKTHROW_DEMO_REPLAY", "levels/demo.replay.json")),
    unlockAll: envFlag(env, "BLOCKTHROW_UNLOCK_ALL"),
  };
}
