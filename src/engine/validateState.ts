import type { Cell, GameState, LockLevel } from "../types";
import { isRoomId } from "./catalog";
import { CONSUMABLES, PERMANENTS } from "./constants";
import { envFlag } from "../config";

const VALIDATE = envFlag(process.env, "BM_VALIDATE_STATE", true);

/**
 * validateState (minimal / shape-only)
 *
 * Intent:
 * - Catch structural drift (bad grid shape, unknown room ids, negative counters,
 *   a selection that does not match the phase)
 * - Avoid rule duplication (NO placement checks, NO legal-move computation)
 *
 * Runs after every applied action and on every loaded state.
 */
export function validateState(state: GameState, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(state, "state missing", where);

  // ---------------------------
  // Core shape
  // ---------------------------

  assert(typeof state.gameId === "string" && state.gameId.length > 0, "gameId missing", where);
  assert(
    state.phase === "exploring" || state.phase === "drafting" || state.phase === "ended",
    "phase invalid",
    where
  );

  assert(state.config, "config missing", where);
  const { rows, cols } = state.config;
  assert(Number.isInteger(rows) && rows > 0, "config.rows invalid", where);
  assert(Number.isInteger(cols) && cols > 0, "config.cols invalid", where);
  assert(typeof state.config.findChance === "number", "config.findChance invalid", where);
  assert(typeof state.config.seed === "string", "config.seed invalid", where);

  assert(Number.isInteger(state.rngState) && state.rngState > 0, "rngState invalid", where);
  assert(Number.isInteger(state.turn) && state.turn >= 0, "turn invalid", where);
  assert(Array.isArray(state.messages), "messages not array", where);

  // ---------------------------
  // Grid
  // ---------------------------

  assert(Array.isArray(state.grid) && state.grid.length === rows, "grid row count mismatch", where);
  for (let r = 0; r < rows; r++) {
    const row = state.grid[r];
    assert(Array.isArray(row) && row.length === cols, `grid row ${r} length mismatch`, where);
    for (let c = 0; c < cols; c++) assertCell(row[c], `${r},${c}`, where);
  }

  // ---------------------------
  // Player + inventory
  // ---------------------------

  const { player } = state;
  assert(player && Number.isInteger(player.row) && Number.isInteger(player.col), "player invalid", where);
  assert(player.row >= 0 && player.row < rows && player.col >= 0 && player.col < cols, "player out of bounds", where);
  assert(state.grid[player.row][player.col].roomId !== null, "player stands on an empty cell", where);

  assert(state.inventory, "inventory missing", where);
  for (const item of CONSUMABLES) {
    const n = state.inventory.consumables[item];
    assert(Number.isInteger(n) && n >= 0, `consumable ${item} invalid`, where);
  }
  for (const item of PERMANENTS) {
    assert(typeof state.inventory.permanents[item] === "boolean", `permanent ${item} invalid`, where);
  }

  assert(Array.isArray(state.deck), "deck not array", where);
  for (const id of state.deck) assert(isRoomId(id), `deck holds unknown room: ${String(id)}`, where);

  // ---------------------------
  // Selection (drafting only)
  // ---------------------------

  if (state.phase === "drafting") {
    const sel = state.selection;
    assert(sel, "drafting phase requires selection", where);
    assert(sel.candidates.length > 0, "selection has no candidates", where);
    for (const id of sel.candidates) assert(isRoomId(id), `candidate unknown: ${String(id)}`, where);
    assert(sel.cursor >= 0 && sel.cursor < sel.candidates.length, "selection cursor out of range", where);
    assert(state.grid[sel.target.row]?.[sel.target.col]?.roomId === null, "selection target already placed", where);
  } else {
    assert(state.selection === undefined, "selection outside drafting phase", where);
  }

  // ---------------------------
  // Outcome (structural only)
  // ---------------------------

  if (state.phase === "ended") {
    assert(state.outcome, "ended phase requires outcome", where);
  }

  if (state.outcome) {
    if (state.outcome.kind === "lost") {
      assert(
        state.outcome.reason === "out_of_steps" || state.outcome.reason === "blocked",
        "outcome reason invalid",
        where
      );
    } else {
      assert(state.outcome.kind === "won", "outcome.kind invalid", where);
    }
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateState @ ${where}] ${message}`);
}

function isLockLevel(x: unknown): x is LockLevel {
  return x === 0 || x === 1 || x === 2;
}

function assertCell(cell: Cell | undefined, at: string, where: string): void {
  assert(cell && typeof cell === "object", `cell ${at} missing`, where);
  assert(cell.roomId === null || isRoomId(cell.roomId), `cell ${at} roomId invalid`, where);
  assert(typeof cell.visited === "boolean", `cell ${at} visited invalid`, where);
  assert(cell.doors && typeof cell.doors === "object", `cell ${at} doors missing`, where);
  for (const d of ["up", "down", "left", "right"] as const) {
    const lock = cell.doors[d];
    assert(lock === null || isLockLevel(lock), `cell ${at} door ${d} invalid`, where);
  }
  if (cell.interactable !== null) {
    const k = cell.interactable.kind;
    assert(k === "chest" || k === "locker" || k === "digSite", `cell ${at} interactable invalid`, where);
    assert(typeof cell.interactable.opened === "boolean", `cell ${at} interactable.opened invalid`, where);
  }
}
