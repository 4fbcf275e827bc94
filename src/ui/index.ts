// src/ui/index.ts

import { REPLAY_FORMAT_VERSION, applyAndRecord, type ReplayFile } from "../engine/replay";
import type { GameState } from "../types";
import { commandForKey, type KeyPress } from "./keymap";
import { initialUiModel, type UiModel } from "./uiState";

// Key presses in, game state out. No rendering here.
export class UiController {
  private model: UiModel;

  constructor(initial: GameState) {
    this.model = initialUiModel(initial);
  }

  getState(): UiModel {
    return this.model;
  }

  get game(): GameState {
    return this.model.game;
  }

  isDone(): boolean {
    return this.model.quitRequested || this.model.game.phase === "ended";
  }

  /** Returns true when the key did something. */
  handleKey(key: KeyPress): boolean {
    const cmd = commandForKey(this.model.game.phase, key);

    if (!cmd) {
      this.model = { ...this.model, ignoredLastKey: true };
      return false;
    }

    if (cmd.kind === "quit") {
      this.model = { ...this.model, quitRequested: true, ignoredLastKey: false };
      return true;
    }

    const { nextState, nextLog } = applyAndRecord(this.model.game, cmd.action, this.model.log);
    this.model = { ...this.model, game: nextState, log: nextLog, ignoredLastKey: false };
    return true;
  }

  toReplayFile(createdAt: Date = new Date()): ReplayFile {
    return {
      formatVersion: REPLAY_FORMAT_VERSION,
      createdAt: createdAt.toISOString(),
      initialState: this.model.initial,
      log: this.model.log,
    };
  }
}

export { commandForKey } from "./keymap";
export type { Command, KeyPress } from "./keymap";
export type { UiModel } from "./uiState";
