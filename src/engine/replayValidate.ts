import type { Action, ActionKind, ReplayRecord } from "../types";

const ACTION_KINDS: readonly ActionKind[] = ["moveUp", "moveDown", "throw"];

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isActionKind(x: unknown): x is ActionKind {
  return ACTION_KINDS.some((k) => k === x);
}

/**
 * Shape check for a replay read from storage.
 *
 * The version is only required to be a positive integer here: whether it can be
 * played is decided by the replay player, which reports unsupported versions
 * instead of throwing.
 */
export function validateReplayRecord(x: unknown): ReplayRecord {
  if (!isObject(x)) {
    throw new Error("Invalid replay: not an object");
  }

  const version = x["version"];
  if (typeof version !== "number" || !Number.isInteger(version) || version < 1) {
    throw new Error(`Invalid replay version: ${String(version)}`);
  }

  const levelId = x["levelId"];
  if (typeof levelId !== "string" || levelId === "") {
    throw new Error(`Invalid replay levelId: ${String(levelId)}`);
  }

  const createdAt = x["createdAt"];
  if (!isIsoDateString(createdAt)) {
    throw new Error(`Invalid replay createdAt: ${String(createdAt)}`);
  }

  const rawActions = x["actions"];
  if (!Array.isArray(rawActions)) {
    throw new Error("Invalid replay actions");
  }

  const actions: Action[] = rawActions.map((a: unknown, i) => {
    if (!isObject(a)) {
      throw new Error(`Invalid replay actions[${i}]`);
    }
    const kind = a["kind"];
    if (!isActionKind(kind)) {
      throw new Error(`Invalid replay actions[${i}].kind: ${String(kind)}`);
    }
    const elapsed = a["elapsed"];
    if (typeof elapsed !== "number" || !Number.isInteger(elapsed) || elapsed < 0) {
      throw new Error(`Invalid replay actions[${i}].elapsed: ${String(elapsed)}`);
    }
    return { kind, elapsed };
  });

  return { version, levelId, createdAt, actions };
}
