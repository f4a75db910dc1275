import type { ReplayRecord } from "../types";
import { MAX_ACTION_DELAY_MS } from "./constants";

/**
 * Clamp every gap between actions to MAX_ACTION_DELAY_MS.
 * Order, kinds and shorter gaps are kept as recorded. Pure and idempotent.
 *
 * Applied once, when a replay is saved.
 */
export function compressReplay(record: ReplayRecord): ReplayRecord {
  return {
    ...record,
    actions: record.actions.map((a) =>
      a.elapsed > MAX_ACTION_DELAY_MS ? { ...a, elapsed: MAX_ACTION_DELAY_MS } : { ...a }
    ),
  };
}
