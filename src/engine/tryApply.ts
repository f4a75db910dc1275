import type { ActionKind, Board } from "../types";
import { movePlayer } from "./board";
import { engineError, type ActionResponse } from "./envelope";
import { evaluateStatus } from "./gameStatus";
import { resolveThrow } from "./resolveThrow";

/**
 * Acceptance path for one player action. Live play and replay playback both go
 * through here, so a recorded stream resolves exactly as it did when recorded.
 *
 * - Actions on a board that is won or failed are rejected (GAME_OVER).
 * - Moves at the grid edge and throws resolving to noMatch are accepted as no-ops:
 *   the returned board is the input board.
 */
export function tryApplyAction(board: Board, kind: ActionKind): ActionResponse {
  const status = evaluateStatus(board);
  if (status !== "playing") {
    return engineError("GAME_OVER", `Action "${kind}" rejected: level already ${status}.`);
  }

  switch (kind) {
    case "moveUp":
    case "moveDown": {
      const { board: next, moved } = movePlayer(board, kind === "moveUp" ? "up" : "down");
      return { ok: true, board: next, result: { kind: "move", moved } };
    }
    case "throw": {
      const { board: next, outcome } = resolveThrow(board);
      return { ok: true, board: next, result: { kind: "throw", outcome } };
    }
  }
}
