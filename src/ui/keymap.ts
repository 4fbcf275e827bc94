// src/ui/keymap.ts
//
// Keyboard bindings (AZERTY, plus arrows).
//
// Exploring: Z/↑ S/↓ Q/← D/→ move, SPACE or E interacts.
// Drafting:  Q/← D/→ move the cursor, ENTER confirms, R rerolls (one die),
//            BACKSPACE steps back.
// Anywhere:  ESC or Ctrl+C quits.

import type { Action, GameState } from "../types";

/** Shape of readline's "keypress" key argument. */
export type KeyPress = {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
};

export type Command = { kind: "action"; action: Action } | { kind: "quit" };

const EXPLORING: Readonly<Record<string, Action>> = {
  z: { kind: "move", direction: "up" },
  up: { kind: "move", direction: "up" },
  s: { kind: "move", direction: "down" },
  down: { kind: "move", direction: "down" },
  q: { kind: "move", direction: "left" },
  left: { kind: "move", direction: "left" },
  d: { kind: "move", direction: "right" },
  right: { kind: "move", direction: "right" },
  space: { kind: "interact" },
  e: { kind: "interact" },
};

const DRAFTING: Readonly<Record<string, Action>> = {
  q: { kind: "cursor", delta: -1 },
  left: { kind: "cursor", delta: -1 },
  d: { kind: "cursor", delta: 1 },
  right: { kind: "cursor", delta: 1 },
  return: { kind: "confirm" },
  enter: { kind: "confirm" },
  r: { kind: "reroll" },
  backspace: { kind: "cancel" },
};

export function commandForKey(phase: GameState["phase"], key: KeyPress): Command | null {
  const name = key.name;
  if (!name) return null;

  if (name === "escape" || (key.ctrl && name === "c")) return { kind: "quit" };
  if (key.ctrl || key.meta) return null;

  const table = phase === "exploring" ? EXPLORING : phase === "drafting" ? DRAFTING : null;
  const action = table ? table[name] : undefined;
  return action ? { kind: "action", action } : null;
}
