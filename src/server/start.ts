import fs from "node:fs";
import path from "node:path";
import type { LevelId, ReplayRecord } from "../types";
import { levelIdFor } from "../engine/levelLoader";
import { loadConfig } from "./config";
import { FileProgressStore, FileReplayStore, loadLevelPack, loadReplayFile } from "./persistence";
import { startWsServer } from "./wsServer";

function main() {
  const config = loadConfig();
  const levels = loadLevelPack(config.levelsFile);

  const builtin = new Map<LevelId, ReplayRecord>();
  if (fs.existsSync(config.demoReplayFile)) {
    builtin.set(levelIdFor(0), loadReplayFile(config.demoReplayFile));
  } else {
    console.warn(`Demo replay not found at ${config.demoReplayFile}; level 0 has no built-in replay.`);
  }

  const replays = new FileReplayStore({ dir: path.join(config.dataDir, "replays"), builtin });
  const progress = new FileProgressStore(path.join(config.dataDir, "progress.json"));

  const server = startWsServer({
    port: config.port,
    levels,
    replays,
    progress,
    unlockAll: config.unlockAll,
  });

  console.log(`blockthrow WS server listening on ws://localhost:${server.port}`);
  console.log(
    "Options:",
    JSON.stringify(
      {
        levels: levels.length,
        maxLevel: progress.progress.maxLevel,
        dataDir: config.dataDir,
        unlockAll: config.unlockAll,
      },
      null,
      2
    )
  );

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
