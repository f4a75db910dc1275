import type { ReplayRecord } from "../types";
import { validateReplayRecord } from "./replayValidate";

/**
 * Serialize a replay record to JSON.
 */
export function serializeReplay(replay: ReplayRecord): string {
  return JSON.stringify(replay);
}

/**
 * Deserialize JSON into a replay record and validate its shape.
 */
export function deserializeReplay(json: string): ReplayRecord {
  const parsed: unknown = JSON.parse(json);
  return validateReplayRecord(parsed);
}
