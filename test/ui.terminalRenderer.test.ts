import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { AssetRegistry } from "../src/assets/assetRegistry";
import { applyActionWithRng } from "../src/engine/applyAction";
import { buildBoardView } from "../src/ui/board/boardViewModel";
import { TILE_WIDTH, centerText, createTerminalRenderer } from "../src/ui/terminalRenderer";
import { makeState, rng, withDeck, withInventory } from "./helpers";

const plain = createTerminalRenderer(new Chalk({ level: 0 }));
const noImages = new AssetRegistry("/no-images", () => false);

// Column where tile `col` starts in a grid line.
const at = (col: number) => col * (TILE_WIDTH + 1);

describe("ui: terminalRenderer", () => {
  it("centerText pads and truncates", () => {
    expect(centerText("ab", 6)).toBe("  ab  ");
    expect(centerText("abc", 6)).toBe(" abc  ");
    expect(centerText("abcdefgh", 6)).toBe("abcdef");
  });

  it("draws the Entrance Hall tile with its door and the player", () => {
    const lines = plain(buildBoardView(makeState(), noImages)).split("\n");

    expect(lines).toHaveLength(9 * 3 + 5);
    expect(lines[24].slice(at(2), at(2) + TILE_WIDTH)).toBe("        +       ");
    expect(lines[25].slice(at(2), at(2) + TILE_WIDTH)).toBe(" Entrance Hall  ");
    expect(lines[26].slice(at(2), at(2) + TILE_WIDTH)).toBe("@" + " ".repeat(15));
    expect(lines[25].slice(at(0), at(0) + TILE_WIDTH)).toBe(" ".repeat(TILE_WIDTH));
  });

  it("prints the inventory and the message", () => {
    const s = withInventory(makeState(), { permanents: { shovel: true, rabbitFoot: true } });
    const lines = plain(buildBoardView(s, noImages)).split("\n");

    expect(lines.slice(27)).toEqual([
      "",
      "Steps 70  Coins 0  Gems 2  Keys 0  Dice 0",
      "Tools: shovel, rabbit's foot",
      "",
      "Msg: Welcome to Blue Manor.",
    ]);
  });

  it("lists draft candidates with the cursor", () => {
    const s = withDeck(makeState(), ["empty_room", "den", "bedroom"]);
    const drafting = applyActionWithRng(s, { kind: "move", direction: "up" }, rng(0, 0, 0)).state;
    const lines = plain(buildBoardView(drafting, noImages)).split("\n");

    expect(lines.slice(-4)).toEqual([
      "Choose a room (ENTER) or R to redraw (spend die)",
      ">      Empty Room  cost 0  rarity 0",
      "       Den  cost 0  rarity 1",
      "       Bedroom  cost 0  rarity 1",
    ]);
  });

  it("image-backed tiles and cards print the image file name", () => {
    const allImages = new AssetRegistry("/assets", () => true);

    const lines = plain(buildBoardView(makeState(), allImages)).split("\n");
    expect(lines[25].slice(at(2), at(2) + TILE_WIDTH)).toBe(" Entrance_Hall_ ");
    // Unexplored cells stay placeholders.
    expect(lines[25].slice(at(0), at(0) + TILE_WIDTH)).toBe(" ".repeat(TILE_WIDTH));

    const s = withDeck(makeState(), ["empty_room", "den", "bedroom"]);
    const drafting = applyActionWithRng(s, { kind: "move", direction: "up" }, rng(0, 0, 0)).state;
    const draftLines = plain(buildBoardView(drafting, allImages)).split("\n");
    expect(draftLines.slice(-3)).toEqual([
      "> [Empty_Room_Icon.webp] Empty Room  cost 0  rarity 0",
      "  [Den_Icon.webp] Den  cost 0  rarity 1",
      "  [Bedroom_Icon.webp] Bedroom  cost 0  rarity 1",
    ]);
  });
});
