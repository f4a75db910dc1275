import { describe, it, expect } from "vitest";
import { deserializeReplay, serializeReplay, validateReplayRecord } from "../src/engine";
import type { ReplayRecord } from "../src/types";

const RECORD: ReplayRecord = {
  version: 1,
  levelId: "level-04",
  createdAt: new Date("2026-01-11T00:00:00.000Z").toISOString(),
  actions: [
    { kind: "moveUp", elapsed: 300 },
    { kind: "throw", elapsed: 900 },
  ],
};

describe("Replay IO", () => {
  it("serializes and deserializes a replay without change", () => {
    expect(deserializeReplay(serializeReplay(RECORD))).toEqual(RECORD);
  });

  it("keeps unknown versions for the player to reject", () => {
    const json = serializeReplay({ ...RECORD, version: 7 });
    expect(deserializeReplay(json).version).toBe(7);
  });

  it("throws on text that is not JSON", () => {
    expect(() => deserializeReplay("{not json")).toThrow(SyntaxError);
  });
});

describe("validateReplayRecord", () => {
  it("rejects a non-object", () => {
    expect(() => validateReplayRecord([])).toThrow("Invalid replay: not an object");
  });

  it("rejects a bad version", () => {
    expect(() => validateReplayRecord({ ...RECORD, version: 0 })).toThrow("Invalid replay version: 0");
    expect(() => validateReplayRecord({ ...RECORD, version: "1" })).toThrow("Invalid replay version: 1");
  });

  it("rejects a createdAt that is not an ISO timestamp", () => {
    expect(() => validateReplayRecord({ ...RECORD, createdAt: "yesterday" })).toThrow(
      "Invalid replay createdAt: yesterday"
    );
  });

  it("rejects unknown action kinds and negative gaps", () => {
    expect(() =>
      validateReplayRecord({ ...RECORD, actions: [{ kind: "jump", elapsed: 1 }] })
    ).toThrow("Invalid replay actions[0].kind: jump");
    expect(() =>
      validateReplayRecord({ ...RECORD, actions: [{ kind: "throw", elapsed: 1 }, { kind: "throw", elapsed: -5 }] })
    ).toThrow("Invalid replay actions[1].elapsed: -5");
  });

  it("rejects fractional gaps", () => {
    expect(() => validateReplayRecord({ ...RECORD, actions: [{ kind: "throw", elapsed: 1.5 }] })).toThrow(
      "Invalid replay actions[0].elapsed: 1.5"
    );
  });

  it("drops unknown fields", () => {
    expect(validateReplayRecord({ ...RECORD, extra: true })).toEqual(RECORD);
  });
});
