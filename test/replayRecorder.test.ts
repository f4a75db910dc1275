import { describe, it, expect } from "vitest";
import { ActionRecorder, compressReplay, REPLAY_FORMAT_VERSION } from "../src/engine";
import type { ReplayRecord } from "../src/types";

describe("ActionRecorder", () => {
  it("captures actions with their gaps and counts throws", () => {
    const rec = new ActionRecorder("level-03");
    rec.record("moveUp", 120);
    rec.record("throw", 450.6);
    rec.record("throw", 0);

    expect(rec.length).toBe(3);
    expect(rec.throwCount).toBe(2);
    expect(rec.snapshot(new Date("2025-01-02T03:04:05.000Z"))).toEqual({
      version: REPLAY_FORMAT_VERSION,
      levelId: "level-03",
      createdAt: "2025-01-02T03:04:05.000Z",
      actions: [
        { kind: "moveUp", elapsed: 120 },
        { kind: "throw", elapsed: 451 },
        { kind: "throw", elapsed: 0 },
      ],
    });
  });

  it("snapshot does not share state with the recorder", () => {
    const rec = new ActionRecorder("level-01");
    rec.record("throw", 10);
    const snap = rec.snapshot();
    rec.record("moveDown", 10);
    expect(snap.actions).toHaveLength(1);
  });

  it("reset drops everything", () => {
    const rec = new ActionRecorder("level-01");
    rec.record("throw", 10);
    rec.reset();
    expect(rec.length).toBe(0);
    expect(rec.throwCount).toBe(0);
  });

  it("rejects negative gaps", () => {
    const rec = new ActionRecorder("level-01");
    expect(() => rec.record("throw", -1)).toThrow(/elapsed must be >= 0/);
  });
});

describe("compressReplay", () => {
  const record: ReplayRecord = {
    version: 1,
    levelId: "level-02",
    createdAt: "2025-01-02T03:04:05.000Z",
    actions: [
      { kind: "throw", elapsed: 12_000 },
      { kind: "moveUp", elapsed: 3000 },
      { kind: "moveUp", elapsed: 3001 },
      { kind: "throw", elapsed: 250 },
    ],
  };

  it("clamps long gaps and keeps everything else", () => {
    expect(compressReplay(record)).toEqual({
      ...record,
      actions: [
        { kind: "throw", elapsed: 3000 },
        { kind: "moveUp", elapsed: 3000 },
        { kind: "moveUp", elapsed: 3000 },
        { kind: "throw", elapsed: 250 },
      ],
    });
  });

  it("is idempotent", () => {
    const once = compressReplay(record);
    expect(compressReplay(once)).toEqual(once);
  });

  it("leaves the input untouched", () => {
    compressReplay(record);
    expect(record.actions[0]).toEqual({ kind: "throw", elapsed: 12_000 });
  });
});
