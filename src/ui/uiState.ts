// src/ui/uiState.ts

// Local play model: the authoritative game state plus what the loop needs
// around it (recorded transitions, quit request).

import type { ReplayLog } from "../engine/replay";
import type { GameState } from "../types";

export type UiModel = {
  initial: GameState;
  game: GameState;
  log: ReplayLog;
  quitRequested: boolean;

  // Set when the last key press changed nothing.
  ignoredLastKey: boolean;
};

export function initialUiModel(state: GameState): UiModel {
  return {
    initial: state,
    game: state,
    log: [],
    quitRequested: false,
    ignoredLastKey: false,
  };
}
