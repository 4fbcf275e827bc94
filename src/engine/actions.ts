// src/engine/actions.ts
//
// Runtime validation for actions arriving from outside the engine
// (server messages, replay files).

import type { Action } from "../types";
import { isDirection } from "./directions";

function isObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function parseAction(x: unknown): Action | null {
  if (!isObject(x)) return null;

  switch (x["kind"]) {
    case "move": {
      const direction = x["direction"];
      return isDirection(direction) ? { kind: "move", direction } : null;
    }
    case "cursor": {
      const delta = x["delta"];
      return delta === -1 || delta === 1 ? { kind: "cursor", delta } : null;
    }
    case "interact":
      return { kind: "interact" };
    case "confirm":
      return { kind: "confirm" };
    case "reroll":
      return { kind: "reroll" };
    case "cancel":
      return { kind: "cancel" };
    default:
      return null;
  }
}
