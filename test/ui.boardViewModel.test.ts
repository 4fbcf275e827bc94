import { describe, it, expect } from "vitest";
import { AssetRegistry, ROOM_COLORS } from "../src/assets/assetRegistry";
import { applyActionWithRng } from "../src/engine/applyAction";
import { CARD_SIZE, DRAFT_TITLE, buildBoardView } from "../src/ui/board/boardViewModel";
import { ABOVE_START, makeState, placeRoom, rng, standingIn, withDeck } from "./helpers";

const noImages = new AssetRegistry("/no-images", () => false);

describe("ui: boardViewModel", () => {
  it("fresh game: the Entrance Hall with the player, everything else dark", () => {
    const view = buildBoardView(makeState(), noImages);

    expect(view.rows).toBe(9);
    expect(view.cols).toBe(5);
    expect(view.tiles[8][2]).toEqual({
      row: 8,
      col: 2,
      explored: true,
      visual: { kind: "placeholder", color: ROOM_COLORS.blue, width: 70, height: 70 },
      label: "Entrance Hall",
      isPlayer: true,
      doors: [{ side: "up", level: null }],
      badge: null,
    });
    expect(view.tiles[0][0]).toEqual({
      row: 0,
      col: 0,
      explored: false,
      visual: { kind: "placeholder", color: [20, 20, 20], width: 70, height: 70 },
      label: null,
      isPlayer: false,
      doors: [],
      badge: null,
    });
    expect(view.message).toBe("Welcome to Blue Manor.");
    expect(view.status).toBeNull();
    expect(view.draft).toBeNull();
  });

  it("inventory panel lists consumables and tools in a fixed order", () => {
    const view = buildBoardView(makeState(), noImages);
    expect(view.inventory.consumables).toEqual([
      { item: "steps", count: 70 },
      { item: "coins", count: 0 },
      { item: "gems", count: 2 },
      { item: "keys", count: 0 },
      { item: "dice", count: 0 },
    ]);
    expect(view.inventory.permanents.map((p) => p.label)).toEqual([
      "shovel",
      "hammer",
      "lockpick kit",
      "metal detector",
      "rabbit's foot",
    ]);
  });

  it("rolled doors carry their lock level; closed interactables show a badge", () => {
    const s = placeRoom(standingIn("storage", { interactable: { kind: "chest" }, doors: { down: 1 } }), { row: 8, col: 2 }, "entrance_hall", {
      visited: true,
      doors: { up: 1 },
    });
    const view = buildBoardView(s, noImages);

    expect(view.tiles[7][2].badge).toBe("▣");
    expect(view.tiles[7][2].doors).toEqual([
      { side: "up", level: null },
      { side: "down", level: 1 },
      { side: "left", level: null },
      { side: "right", level: null },
    ]);
    expect(view.tiles[8][2].doors).toEqual([{ side: "up", level: 1 }]);
    expect(view.tiles[7][2].isPlayer).toBe(true);
    expect(view.tiles[8][2].isPlayer).toBe(false);
  });

  it("drafting adds the candidate cards with the card placeholder", () => {
    const s = withDeck(makeState(), ["empty_room", "den", "bedroom"]);
    const drafting = applyActionWithRng(s, { kind: "move", direction: "up" }, rng(0, 0, 0)).state;
    const view = buildBoardView(drafting, noImages);

    expect(view.draft?.prompt).toBe(DRAFT_TITLE);
    expect(view.draft?.candidates.map((c) => [c.name, c.selected])).toEqual([
      ["Empty Room", true],
      ["Den", false],
      ["Bedroom", false],
    ]);
    expect(view.draft?.candidates[0].visual).toEqual({
      kind: "placeholder",
      color: [100, 100, 120],
      width: CARD_SIZE.width,
      height: CARD_SIZE.height,
    });
  });

  it("a won game shows the status line", () => {
    const s = placeRoom(makeState(), ABOVE_START, "antechamber");
    const won = applyActionWithRng(s, { kind: "move", direction: "up" }, rng()).state;
    expect(buildBoardView(won, noImages).status).toBe("You win! Press ESC to quit.");
  });
});
