import { describe, it, expect } from "vitest";
import { charToKind, isBlockKind, JOKER, matches, TILE_KINDS } from "../src/engine";
import type { BlockKind } from "../src/types";

const ALL: readonly BlockKind[] = [...TILE_KINDS, JOKER];

describe("block matching", () => {
  it("is symmetric for every pair of kinds", () => {
    for (const a of ALL) {
      for (const b of ALL) {
        expect(matches(a, b)).toBe(matches(b, a));
      }
    }
  });

  it("matches equal kinds and anything against a joker", () => {
    expect(matches("S", "S")).toBe(true);
    expect(matches("S", "X")).toBe(false);
    expect(matches("W", JOKER)).toBe(true);
    expect(matches(JOKER, "T")).toBe(true);
    expect(matches(JOKER, JOKER)).toBe(true);
  });
});

describe("charToKind", () => {
  it("accepts letters in either case, symbols and digits", () => {
    expect(charToKind("S")).toBe("S");
    expect(charToKind("x")).toBe("X");
    expect(charToKind("@")).toBe("O");
    expect(charToKind("4")).toBe("T");
    expect(charToKind("+")).toBe("Z");
    expect(charToKind(":")).toBe("W");
    expect(charToKind("?")).toBe("?");
  });

  it("returns null for empty cells and unknown characters", () => {
    expect(charToKind(".")).toBeNull();
    expect(charToKind("Q")).toBeNull();
    expect(charToKind("constructor")).toBeNull();
  });
});

describe("isBlockKind", () => {
  it("narrows known kinds only", () => {
    expect(isBlockKind("Z")).toBe(true);
    expect(isBlockKind("?")).toBe(true);
    expect(isBlockKind("s")).toBe(false);
    expect(isBlockKind(null)).toBe(false);
  });
});
