// src/ui/board/boardViewModel.ts
//
// Draw list for one frame. Pure: GameState + asset registry in, plain data
// out. Renderers only paint what this returns.

import type { AssetRegistry, Size, Visual } from "../../assets/assetRegistry";
import { CARD_PLACEHOLDER_COLOR, TILE_SIZE, UNEXPLORED_COLOR } from "../../assets/assetRegistry";
import { CONSUMABLES, PERMANENTS } from "../../engine/constants";
import { getRoom } from "../../engine/catalog";
import { DIRECTIONS } from "../../engine/directions";
import { INTERACTABLE_BADGES, PERMANENT_LABELS } from "../../engine/labels";
import type { Consumable, Direction, GameState, LockLevel, Permanent, Rarity, RoomId } from "../../types";

export const CARD_SIZE: Size = { width: 155, height: 74 };

// level is null until the door has been rolled.
export type DoorMarker = { side: Direction; level: LockLevel | null };

export type TileView = {
  row: number;
  col: number;
  explored: boolean;
  visual: Visual;
  label: string | null;
  isPlayer: boolean;
  doors: readonly DoorMarker[];

  // Shown only while the interactable is still closed.
  badge: string | null;
};

export type CandidateView = {
  roomId: RoomId;
  name: string;
  gemCost: number;
  rarity: Rarity;
  visual: Visual;
  selected: boolean;
  affordable: boolean;
};

export type InventoryView = {
  consumables: ReadonlyArray<{ item: Consumable; count: number }>;
  permanents: ReadonlyArray<{ item: Permanent; label: string; owned: boolean }>;
};

export type BoardView = {
  rows: number;
  cols: number;
  tiles: TileView[][];
  inventory: InventoryView;
  message: string;
  status: string | null;
  draft: { prompt: string; candidates: CandidateView[] } | null;
};

export const DRAFT_TITLE = "Choose a room (ENTER) or R to redraw (spend die)";

function unexploredVisual(size: Size): Visual {
  return { kind: "placeholder", color: UNEXPLORED_COLOR, width: size.width, height: size.height };
}

function statusLine(state: GameState): string | null {
  const o = state.outcome;
  if (!o) return null;
  if (o.kind === "won") return "You win! Press ESC to quit.";
  return o.reason === "out_of_steps" ? "Game over: out of steps." : "Game over: no legal move left.";
}

export function buildBoardView(state: GameState, registry: AssetRegistry): BoardView {
  const tiles: TileView[][] = state.grid.map((cells, row) =>
    cells.map((cell, col) => {
      const room = cell.roomId ? getRoom(cell.roomId) : null;

      const doors: DoorMarker[] = [];
      for (const side of DIRECTIONS) {
        if (room && room.doors[side]) doors.push({ side, level: cell.doors[side] });
      }

      const it = cell.interactable;

      return {
        row,
        col,
        explored: room !== null,
        visual: room ? registry.resolveRoom(room) : unexploredVisual(TILE_SIZE),
        label: room ? room.name : null,
        isPlayer: state.player.row === row && state.player.col === col,
        doors,
        badge: it && !it.opened ? INTERACTABLE_BADGES[it.kind] : null,
      };
    })
  );

  const inv = state.inventory;
  const inventory: InventoryView = {
    consumables: CONSUMABLES.map((item) => ({ item, count: inv.consumables[item] })),
    permanents: PERMANENTS.map((item) => ({ item, label: PERMANENT_LABELS[item], owned: inv.permanents[item] })),
  };

  let draft: BoardView["draft"] = null;
  const sel = state.selection;
  if (state.phase === "drafting" && sel) {
    draft = {
      prompt: DRAFT_TITLE,
      candidates: sel.candidates.map((id, i) => {
        const room = getRoom(id);
        return {
          roomId: id,
          name: room.name,
          gemCost: room.gemCost,
          rarity: room.rarity,
          visual: registry.resolve(room.imageId, CARD_PLACEHOLDER_COLOR, CARD_SIZE),
          selected: i === sel.cursor,
          affordable: room.gemCost <= inv.consumables.gems,
        };
      }),
    };
  }

  return {
    rows: state.config.rows,
    cols: state.config.cols,
    tiles,
    inventory,
    message: state.messages.join(" "),
    status: statusLine(state),
    draft,
  };
}
