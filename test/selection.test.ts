import { describe, it, expect } from "vitest";
import { applyActionWithRng } from "../src/engine/applyAction";
import type { Action, GameState, RoomId } from "../src/types";
import { ABOVE_START, START, makeState, rng, withDeck, withInventory } from "./helpers";

const up: Action = { kind: "move", direction: "up" };
const confirm: Action = { kind: "confirm" };

/** Drafting state above the Entrance Hall; one draw per deck entry at 0. */
function drafting(deck: RoomId[], base: GameState = makeState()): GameState {
  const s = withDeck(base, deck);
  const { state } = applyActionWithRng(s, up, rng(0, 0, 0));
  expect(state.phase).toBe("drafting");
  return state;
}

describe("drafting: cursor and cancel", () => {
  it("cursor moves within the candidates", () => {
    let s = drafting(["empty_room", "den", "bedroom"]);
    const cursor = (delta: -1 | 1) => {
      s = applyActionWithRng(s, { kind: "cursor", delta }, rng()).state;
      return s.selection?.cursor;
    };

    expect(cursor(1)).toBe(1);
    expect(cursor(1)).toBe(2);
    expect(cursor(1)).toBe(2);
    expect(cursor(-1)).toBe(1);
    expect(s.messages).toEqual([]);
  });

  it("cancel steps back without placing anything", () => {
    const s = drafting(["empty_room", "den", "bedroom"]);
    const { state } = applyActionWithRng(s, { kind: "cancel" }, rng());

    expect(state.phase).toBe("exploring");
    expect(state.selection).toBeUndefined();
    expect(state.grid[7][2].roomId).toBeNull();
    expect(state.messages).toEqual(["You step back from the door."]);
  });

  it("drafting actions outside the draft are refused", () => {
    for (const kind of ["confirm", "reroll", "cancel"] as const) {
      const { state } = applyActionWithRng(makeState(), { kind }, rng());
      expect(state.messages).toEqual(["Not in selection mode."]);
    }
  });
});

describe("drafting: confirm", () => {
  it("places the room, rolls the lock and walks in", () => {
    const s = drafting(["empty_room", "den", "bedroom"]);
    // lock roll 0.5 -> level 0 on row 7, then the random find misses
    const r = rng(0.5);
    const { state } = applyActionWithRng(s, confirm, r);

    expect(state.phase).toBe("exploring");
    expect(state.selection).toBeUndefined();
    expect(state.grid[7][2].roomId).toBe("empty_room");
    expect(state.grid[7][2].doors.down).toBe(0);
    expect(state.grid[8][2].doors.up).toBe(0);
    expect(state.deck).toEqual(["den", "bedroom"]);
    expect(state.player).toEqual(ABOVE_START);
    expect(state.inventory.consumables.steps).toBe(69);
    expect(state.messages).toEqual(["Placed Empty Room (lock 0).", "Entered Empty Room."]);
    expect(r.used).toBe(2);
  });

  it("a locked new door still needs opening", () => {
    const s = drafting(["empty_room"]);
    const { state } = applyActionWithRng(s, confirm, rng(0.7));

    expect(state.grid[7][2].doors.down).toBe(1);
    expect(state.player).toEqual(START);
    expect(state.messages).toEqual([
      "Placed Empty Room (lock 1).",
      "Door is locked and you have no key/kit.",
      "No legal move left. Game Over.",
    ]);
  });

  it("confirming the cursor's candidate", () => {
    let s = drafting(["empty_room", "den", "bedroom"]);
    s = applyActionWithRng(s, { kind: "cursor", delta: 1 }, rng()).state;
    const { state } = applyActionWithRng(s, confirm, rng(0.5));

    expect(state.grid[7][2].roomId).toBe("den");
    expect(state.inventory.consumables.gems).toBe(3);
    expect(state.messages).toEqual(["Placed Den (lock 0).", "You drew the Den and found a gem!", "Entered Den."]);
  });

  it("refuses a room the player cannot pay for", () => {
    const rich = withInventory(makeState(), { consumables: { gems: 3 } });
    const s = withInventory(drafting(["vault"], rich), { consumables: { gems: 2 } });
    const { state } = applyActionWithRng(s, confirm, rng());

    expect(state.messages).toEqual(["Not enough gems to choose that room."]);
    expect(state.phase).toBe("drafting");
    expect(state.inventory.consumables.gems).toBe(2);
  });

  it("pays gems and collects the Vault's coins on the first visit only", () => {
    const rich = withInventory(makeState(), { consumables: { gems: 3 } });
    let s = applyActionWithRng(drafting(["vault"], rich), confirm, rng(0.5)).state;

    expect(s.inventory.consumables.gems).toBe(0);
    expect(s.inventory.consumables.coins).toBe(40);
    expect(s.messages).toEqual(["Placed Vault (lock 0).", "Found 40 coins!"]);

    s = applyActionWithRng(s, { kind: "move", direction: "down" }, rng()).state;
    expect(s.messages).toEqual(["Back at the Entrance."]);

    s = applyActionWithRng(s, up, rng()).state;
    expect(s.messages).toEqual(["Entered Vault."]);
    expect(s.inventory.consumables.coins).toBe(40);
    expect(s.inventory.consumables.steps).toBe(67);
  });

  it("the Maid's Chamber grants the rabbit's foot, which raises the find chance", () => {
    const s = drafting(["maids_chamber"]);
    // lock 0.5; find roll 0.1 hits only with the bonus (0.13); pick 0 -> 1 gem
    const { state } = applyActionWithRng(s, confirm, rng(0.5, 0.1, 0));

    expect(state.inventory.permanents.rabbitFoot).toBe(true);
    expect(state.inventory.consumables.gems).toBe(3);
    expect(state.messages).toEqual([
      "Placed Maid's Chamber (lock 0).",
      "You found the rabbit's foot.",
      "Entered Maid's Chamber.",
      "Found 1 gem.",
    ]);
  });

  it("the Furnace adds copies of itself to the deck", () => {
    const s = drafting(["furnace"]);
    const { state } = applyActionWithRng(s, confirm, rng(0.5));

    expect(state.deck).toEqual(["furnace", "furnace"]);
    expect(state.messages).toEqual([
      "Placed Furnace (lock 0).",
      "The Furnace makes similar rooms more common.",
      "Entered Furnace.",
    ]);
  });

  it("the Bedroom feeds the player once", () => {
    const s = drafting(["bedroom"]);
    const { state } = applyActionWithRng(s, confirm, rng(0.5));

    expect(state.inventory.consumables.steps).toBe(79);
    expect(state.messages).toEqual(["Placed Bedroom (lock 0).", "Ate food and regains 10 steps!"]);
  });
});

describe("drafting: reroll", () => {
  it("needs a die", () => {
    const s = drafting(["empty_room", "den", "bedroom"]);
    const r = rng();
    const { state } = applyActionWithRng(s, { kind: "reroll" }, r);

    expect(state.messages).toEqual(["No dice to spend."]);
    expect(state.selection?.candidates).toEqual(["empty_room", "den", "bedroom"]);
    expect(r.used).toBe(0);
  });

  it("spends exactly one die and redraws", () => {
    let s = drafting(["empty_room", "den", "bedroom"]);
    s = applyActionWithRng(s, { kind: "cursor", delta: 1 }, rng()).state;
    s = withInventory(s, { consumables: { dice: 2 } });

    const { state } = applyActionWithRng(s, { kind: "reroll" }, rng(0.99, 0.99, 0.99));

    expect(state.inventory.consumables.dice).toBe(1);
    expect(state.selection?.candidates).toEqual(["bedroom", "den", "empty_room"]);
    expect(state.selection?.cursor).toBe(0);
    expect(state.messages).toEqual(["Redrew candidates (spent a die)."]);
  });
});
