import { afterEach, describe, it, expect } from "vitest";
import WebSocket from "ws";
import { startWsServer, toClientMessage, type WsServerHandle } from "../src/server/wsServer";
import type { ServerMessage } from "../src/server/protocol";
import { makeLevel, MemoryProgressBook, MemoryReplayStore } from "./helpers";

function makeQueue(ws: WebSocket) {
  const q: string[] = [];
  let resolve: ((s: string) => void) | null = null;

  ws.on("message", (d) => {
    const s = d.toString();
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(s);
    } else {
      q.push(s);
    }
  });

  return async (): Promise<ServerMessage> => {
    const raw = q.shift() ?? (await new Promise<string>((r) => (resolve = r)));
    const parsed: ServerMessage = JSON.parse(raw);
    return parsed;
  };
}

async function nextWithTimeout(next: () => Promise<ServerMessage>, label: string, ms = 2000) {
  return await Promise.race([
    next(),
    new Promise<never>((_, reject) =>
      setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms)
    ),
  ]);
}

let server: WsServerHandle | null = null;
const sockets: WebSocket[] = [];

afterEach(async () => {
  for (const ws of sockets.splice(0)) ws.close();
  if (server) await server.close();
  server = null;
});

async function connect() {
  server = startWsServer({
    port: 0,
    levels: [makeLevel(["SX.", "XSS", "XS."], { start: "S", index: 0 }), makeLevel(["SX", "OS"], { start: "S", index: 1 })],
    replays: new MemoryReplayStore(),
    progress: new MemoryProgressBook(),
  });

  const ws = new WebSocket(`ws://localhost:${server.port}`);
  sockets.push(ws);
  const next = makeQueue(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });
  return { ws, next };
}

describe("wsServer integration", () => {
  it("welcome -> startLevel -> action -> sessionResult", async () => {
    const { ws, next } = await connect();

    expect(await nextWithTimeout(next, "welcome")).toMatchObject({ type: "welcome", levelCount: 2 });

    ws.send(JSON.stringify({ type: "startLevel", level: 1, reqId: "s1" }));
    const sync = await nextWithTimeout(next, "stateSync");
    expect(sync).toMatchObject({ type: "stateSync", reqId: "s1", session: { levelId: "level-01", status: "playing" } });

    // "SX" / "OS": the bottom row gives up the O, then nothing matches
    ws.send(JSON.stringify({ type: "action", action: "throw", reqId: "t1" }));
    const first = await nextWithTimeout(next, "first push");
    const second = await nextWithTimeout(next, "second push");
    const third = await nextWithTimeout(next, "actionResult");

    expect(first).toMatchObject({ type: "sessionResult", result: { outcome: "failed", throws: 1 } });
    expect(second).toMatchObject({ type: "stateSync", session: { status: "failed" } });
    expect(third).toMatchObject({ type: "actionResult", reqId: "t1", action: "throw" });
  });

  it("rejects bad JSON and unknown messages", async () => {
    const { ws, next } = await connect();
    await nextWithTimeout(next, "welcome");

    ws.send("{nope");
    expect(await nextWithTimeout(next, "bad json")).toEqual({
      type: "error",
      code: "BAD_MESSAGE",
      message: "Invalid JSON.",
    });

    ws.send(JSON.stringify({ type: "jump", reqId: "j" }));
    expect(await nextWithTimeout(next, "unknown")).toEqual({
      type: "error",
      code: "BAD_MESSAGE",
      message: "Unknown message type: jump",
      reqId: "j",
    });

    ws.send(JSON.stringify({ type: "action", action: "fly" }));
    expect(await nextWithTimeout(next, "bad action")).toEqual({
      type: "error",
      code: "BAD_MESSAGE",
      message: "action must be one of moveUp, moveDown, throw.",
    });
  });
});

describe("toClientMessage", () => {
  it("keeps only known fields", () => {
    expect(toClientMessage({ type: "startLevel", level: 3, extra: 1 })).toEqual({ type: "startLevel", level: 3 });
    expect(toClientMessage({ type: "getState", reqId: "g" })).toEqual({ type: "getState", reqId: "g" });
  });

  it("rejects malformed commands", () => {
    expect(toClientMessage({ type: "startLevel", level: 1.5 })).toBeNull();
    expect(toClientMessage({ type: "action" })).toBeNull();
    expect(toClientMessage("hello")).toBeNull();
  });
});
