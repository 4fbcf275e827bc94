// src/ui/terminalRenderer.ts
//
// Paints a BoardView as ANSI text. Each tile is TILE_WIDTH columns by three
// lines; door markers sit on the tile edges, the badge in the top-right corner
// and the player marker in the bottom-left corner. Image-backed tiles print
// their file name where placeholder tiles print the room name.

import path from "node:path";
import chalk, { type ChalkInstance } from "chalk";
import type { Rgb, Visual } from "../assets/assetRegistry";
import type { Consumable, Direction, LockLevel } from "../types";
import type { BoardView, CandidateView, DoorMarker, TileView } from "./board/boardViewModel";

export const TILE_WIDTH = 16;

export const PLAYER_MARKER = "@";

const TEXT_COLOR: Rgb = [235, 235, 235];

const LOCK_COLORS: Readonly<Record<LockLevel, Rgb>> = {
  0: [150, 150, 150],
  1: [200, 120, 60],
  2: [200, 60, 60],
};

const CONSUMABLE_TITLES: Readonly<Record<Consumable, string>> = {
  steps: "Steps",
  coins: "Coins",
  gems: "Gems",
  keys: "Keys",
  dice: "Dice",
};

export function centerText(text: string, width: number): string {
  const t = text.length > width ? text.slice(0, width) : text;
  const left = Math.floor((width - t.length) / 2);
  return " ".repeat(left) + t + " ".repeat(width - t.length - left);
}

export type TerminalRenderer = (view: BoardView) => string;

export function createTerminalRenderer(c: ChalkInstance = chalk): TerminalRenderer {
  const marker = (door: DoorMarker | undefined): string => {
    if (!door) return " ";
    if (door.level === null) return c.rgb(...LOCK_COLORS[0])("+");
    return c.rgb(...LOCK_COLORS[door.level])(String(door.level));
  };

  const paint = (visual: Visual, text: string): string => {
    if (visual.kind === "image") return c.inverse(text);
    return c.bgRgb(...visual.color).rgb(...TEXT_COLOR)(text);
  };

  const tileLines = (tile: TileView): [string, string, string] => {
    const door = (side: Direction) => tile.doors.find((d) => d.side === side);
    const mid = Math.floor(TILE_WIDTH / 2);

    const top =
      " ".repeat(mid) + marker(door("up")) + " ".repeat(TILE_WIDTH - mid - 2) + (tile.badge ?? " ");

    const text = tile.visual.kind === "image" ? path.basename(tile.visual.path) : tile.label ?? "";
    const labelText = centerText(text, TILE_WIDTH - 2);
    const label = tile.isPlayer ? c.bold(labelText) : labelText;
    const middle = marker(door("left")) + label + marker(door("right"));

    const bottom =
      (tile.isPlayer ? c.bold(PLAYER_MARKER) : " ") +
      " ".repeat(mid - 1) +
      marker(door("down")) +
      " ".repeat(TILE_WIDTH - mid - 1);

    return [paint(tile.visual, top), paint(tile.visual, middle), paint(tile.visual, bottom)];
  };

  const swatch = (visual: Visual): string =>
    visual.kind === "image" ? `[${path.basename(visual.path)}]` : c.bgRgb(...visual.color)("    ");

  const candidateLine = (cand: CandidateView): string => {
    const head = `${cand.selected ? ">" : " "} ${swatch(cand.visual)} `;
    const name = cand.selected ? c.bold(cand.name) : cand.name;
    const cost = `  cost ${cand.gemCost}  rarity ${cand.rarity}`;
    return head + name + cost + (cand.affordable ? "" : c.red("  (not enough gems)"));
  };

  return (view) => {
    const lines: string[] = [];

    for (const row of view.tiles) {
      const rendered = row.map(tileLines);
      for (let i = 0; i < 3; i++) lines.push(rendered.map((t) => t[i]).join(" "));
    }

    lines.push("");
    lines.push(
      view.inventory.consumables.map(({ item, count }) => `${CONSUMABLE_TITLES[item]} ${count}`).join("  ")
    );
    const owned = view.inventory.permanents.filter((p) => p.owned).map((p) => p.label);
    lines.push(`Tools: ${owned.length > 0 ? owned.join(", ") : "none"}`);

    lines.push("");
    lines.push(`Msg: ${view.message}`);
    if (view.status) lines.push(c.bold.yellow(view.status));

    if (view.draft) {
      lines.push("");
      lines.push(c.bold(view.draft.prompt));
      for (const cand of view.draft.candidates) lines.push(candidateLine(cand));
    }

    return lines.join("\n");
  };
}
