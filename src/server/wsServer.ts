// src/server/wsServer.ts

import { WebSocketServer, type WebSocket } from "ws";
import type { Level } from "../types";
import { RealClock, type Clock } from "../engine/clock";
import type { ReplayStore } from "../session/stores";
import {
  closeConnection,
  createConnection,
  handleClientMessage,
  type Connection,
  type ProgressBook,
  type ServerContext,
  SERVER_VERSION,
} from "./handleMessage";
import type { ActionMessage, ClientMessage, ServerMessage, StartLevelMessage } from "./protocol";

export type WsServerOptions = {
  port: number;
  levels: readonly Level[];
  replays: ReplayStore;
  progress: ProgressBook;
  clock?: Clock;
  unlockAll?: boolean;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

type BareCommand = Exclude<ClientMessage, StartLevelMessage | ActionMessage>["type"];

const ACTIONS: readonly ActionMessage["action"][] = ["moveUp", "moveDown", "throw"];
const BARE_COMMANDS: readonly BareCommand[] = [
  "hello",
  "listLevels",
  "restart",
  "abort",
  "saveReplay",
  "startReplay",
  "stopReplay",
  "watchDemo",
  "getState",
];

function isAction(x: unknown): x is ActionMessage["action"] {
  return ACTIONS.some((a) => a === x);
}

function isBareCommand(x: unknown): x is BareCommand {
  return BARE_COMMANDS.some((c) => c === x);
}

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x["reqId"];
  return typeof v === "string" ? v : undefined;
}

/**
 * Narrows an incoming JSON value to a ClientMessage, or returns null.
 */
export function toClientMessage(x: unknown): ClientMessage | null {
  if (!isPlainObject(x)) return null;

  const type = x["type"];
  const reqId = getReqId(x);
  const base = reqId ? { reqId } : {};

  if (type === "startLevel") {
    const level = x["level"];
    if (typeof level !== "number" || !Number.isInteger(level)) return null;
    return { type: "startLevel", level, ...base };
  }

  if (type === "action") {
    const action = x["action"];
    if (!isAction(action)) return null;
    return { type: "action", action, ...base };
  }

  if (isBareCommand(type)) return { type, ...base };
  return null;
}

function describeInvalid(x: unknown): string {
  if (!isPlainObject(x)) return "Message must be a JSON object.";
  const type = x["type"];
  if (type === "startLevel") return "startLevel needs an integer level.";
  if (type === "action") return `action must be one of ${ACTIONS.join(", ")}.`;
  if (typeof type !== "string") return "Message has no type.";
  if (!isBareCommand(type)) return `Unknown message type: ${type}`;
  return "Invalid message.";
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

/**
 * One game session per connection. Levels and stores are shared.
 */
export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const wss = new WebSocketServer({ port: opts.port });

  const ctx: ServerContext = {
    levels: opts.levels,
    replays: opts.replays,
    progress: opts.progress,
    clock: opts.clock ?? new RealClock(),
    unlockAll: opts.unlockAll ?? false,
  };

  const connections = new Map<WebSocket, Connection>();

  wss.on("connection", (ws) => {
    const conn = createConnection(ctx, (msg) => send(ws, msg));
    connections.set(ws, conn);

    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, levelCount: ctx.levels.length });

    ws.on("message", (data) => {
      const raw = data.toString();
      const parsed = safeParseJson(raw);

      if (parsed === null) {
        send(ws, { type: "error", code: "BAD_MESSAGE", message: "Invalid JSON." });
        return;
      }

      const msg = toClientMessage(parsed);
      if (!msg) {
        const reqId = getReqId(parsed);
        send(ws, {
          type: "error",
          code: "BAD_MESSAGE",
          message: describeInvalid(parsed),
          ...(reqId ? { reqId } : {}),
        });
        return;
      }

      let replies: ServerMessage[];
      try {
        replies = handleClientMessage(conn, msg);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        console.error(`[ws] ${msg.type} failed: ${detail}`);
        send(ws, {
          type: "error",
          code: "INTERNAL",
          message: detail,
          ...(msg.reqId ? { reqId: msg.reqId } : {}),
        });
        return;
      }

      for (const reply of replies) send(ws, reply);
    });

    ws.on("close", () => {
      connections.delete(ws);
      try {
        closeConnection(conn);
      } catch (err) {
        console.warn("[ws] failed to close session:", err);
      }
    });

    ws.on("error", (err) => {
      console.warn("[ws] socket error:", err.message);
    });
  });

  const address = wss.address();

  return {
    port: typeof address === "object" && address !== null ? address.port : opts.port,
    close: async () => {
      for (const ws of connections.keys()) ws.close();
      await new Promise<void>((resolve, reject) =>
        wss.close((err) => (err ? reject(err) : resolve()))
      );
    },
  };
}
