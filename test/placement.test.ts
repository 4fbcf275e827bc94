import { describe, it, expect } from "vitest";
import { getRoom } from "../src/engine/catalog";
import { canPlaceRoom, eligibleRooms } from "../src/engine/placement";
import { ABOVE_START, makeState, placeRoom, withDeck, withInventory } from "./helpers";

describe("placement", () => {
  it("accepts a four-door room above the Entrance Hall", () => {
    const s = makeState();
    expect(canPlaceRoom(s, getRoom("empty_room"), ABOVE_START, "up")).toBe(true);
  });

  it("needs a door facing the cell it is entered from", () => {
    const s = makeState();
    // Entered moving left: the room needs a right door. The Vault only has up/down.
    expect(canPlaceRoom(s, getRoom("vault"), { row: 7, col: 1 }, "left")).toBe(false);
    expect(canPlaceRoom(s, getRoom("vault"), ABOVE_START, "up")).toBe(true);
  });

  it("keeps edge rooms on the outer ring", () => {
    const s = makeState();
    expect(canPlaceRoom(s, getRoom("garden"), ABOVE_START, "up")).toBe(false);
    expect(canPlaceRoom(s, getRoom("garden"), { row: 7, col: 0 }, "left")).toBe(true);
  });

  it("refuses doors that lead off the grid, except on edge rooms", () => {
    const s = makeState();
    expect(canPlaceRoom(s, getRoom("empty_room"), { row: 7, col: 0 }, "left")).toBe(false);
    expect(canPlaceRoom(s, getRoom("veranda"), { row: 7, col: 4 }, "right")).toBe(true);
  });

  it("requires matching doors with placed neighbours, both ways", () => {
    // Vault at (6,1) has no right door, so (6,2) must not have a left door.
    const s = placeRoom(makeState(), { row: 6, col: 1 }, "vault");
    const target = { row: 6, col: 2 };

    expect(canPlaceRoom(s, getRoom("empty_room"), target, "up")).toBe(false);
    expect(canPlaceRoom(s, getRoom("maids_chamber"), target, "up")).toBe(true);
  });

  it("the Entrance Hall below forces a down door", () => {
    const s = makeState();
    // Furnace has D/L/R: fine. Veranda is edge-only. Antechamber has D/L/R.
    expect(canPlaceRoom(s, getRoom("furnace"), ABOVE_START, "up")).toBe(true);
    expect(canPlaceRoom(s, getRoom("antechamber"), ABOVE_START, "up")).toBe(true);
  });

  it("eligibleRooms narrows to affordable copies when any exist", () => {
    const base = withDeck(makeState(), ["vault", "empty_room", "empty_room"]);

    expect(eligibleRooms(base, ABOVE_START, "up")).toEqual(["empty_room", "empty_room"]);

    const rich = withInventory(base, { consumables: { gems: 3 } });
    expect(eligibleRooms(rich, ABOVE_START, "up")).toEqual(["vault", "empty_room", "empty_room"]);

    const onlyVault = withDeck(makeState(), ["vault"]);
    expect(eligibleRooms(onlyVault, ABOVE_START, "up")).toEqual(["vault"]);
  });
});
