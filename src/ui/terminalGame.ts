// src/ui/terminalGame.ts
//
// Interactive loop: keypresses from a TTY (or any stream that emits
// readline "keypress" events) drive a UiController; each change repaints.

import * as readline from "node:readline";
import type { ChalkInstance } from "chalk";
import type { AssetRegistry } from "../assets/assetRegistry";
import type { GameState } from "../types";
import { buildBoardView } from "./board/boardViewModel";
import { UiController } from "./index";
import type { KeyPress } from "./keymap";
import { createTerminalRenderer } from "./terminalRenderer";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

// Time the final frame stays up after the game ends.
export const END_DELAY_MS = 1500;

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export type TerminalGameOptions = {
  initialState: GameState;
  registry: AssetRegistry;
  input?: KeyInput;
  output?: NodeJS.WritableStream;
  chalk?: ChalkInstance;
  endDelayMs?: number;
};

export function runTerminalGame(opts: TerminalGameOptions): Promise<UiController> {
  const input: KeyInput = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const endDelayMs = opts.endDelayMs ?? END_DELAY_MS;

  const controller = new UiController(opts.initialState);
  const render = createTerminalRenderer(opts.chalk);

  const draw = () => {
    output.write(CLEAR_SCREEN + render(buildBoardView(controller.game, opts.registry)) + "\n");
  };

  readline.emitKeypressEvents(input);
  const raw = input.isTTY === true && typeof input.setRawMode === "function";
  if (raw) input.setRawMode?.(true);
  input.resume();

  output.write(HIDE_CURSOR);
  draw();

  return new Promise<UiController>((resolve) => {
    let done = false;
    let endTimer: NodeJS.Timeout | undefined;

    const finish = () => {
      if (done) return;
      done = true;
      if (endTimer) clearTimeout(endTimer);
      input.off("keypress", onKey);
      if (raw) input.setRawMode?.(false);
      input.pause();
      output.write(SHOW_CURSOR + "\n");
      resolve(controller);
    };

    const onKey = (_str: string | undefined, key: KeyPress | undefined) => {
      if (done || !key) return;

      const changed = controller.handleKey(key);
      if (controller.getState().quitRequested) {
        finish();
        return;
      }
      if (changed) draw();

      if (controller.game.phase === "ended" && !endTimer) {
        endTimer = setTimeout(finish, endDelayMs);
      }
    };

    input.on("keypress", onKey);
  });
}
