// src/engine/catalog.ts
//
// Room catalog. Door flags are relative to the room: a door "up" leads to the
// cell one row above.

import type { Direction, RoomColor, RoomDef, RoomId } from "../types";

type Doors = Readonly<Record<Direction, boolean>>;

function doors(sides: string): Doors {
  // "UDLR" subset, e.g. "UD" = up + down.
  return {
    up: sides.includes("U"),
    down: sides.includes("D"),
    left: sides.includes("L"),
    right: sides.includes("R"),
  };
}

export const ROOM_CATALOG: readonly RoomDef[] = [
  {
    id: "entrance_hall",
    name: "Entrance Hall",
    imageId: "Entrance_Hall_Icon.webp",
    doors: doors("U"),
    gemCost: 0,
    rarity: 0,
    placement: "anywhere",
    color: "blue",
    onEnter: { kind: "start" },
    draftable: false,
  },
  {
    id: "antechamber",
    name: "Antechamber",
    imageId: "Antechamber_Icon.webp",
    doors: doors("DLR"),
    gemCost: 0,
    rarity: 3,
    placement: "anywhere",
    color: "blue",
    onEnter: { kind: "goal" },
    draftable: true,
  },
  {
    id: "vault",
    name: "Vault",
    imageId: "Vault_Icon.webp",
    doors: doors("UD"),
    gemCost: 3,
    rarity: 3,
    placement: "anywhere",
    color: "blue",
    onEnter: { kind: "coins", amount: 40 },
    draftable: true,
  },
  {
    id: "veranda",
    name: "Veranda",
    imageId: "Veranda_Icon.webp",
    doors: doors("UDL"),
    gemCost: 2,
    rarity: 2,
    placement: "edge",
    color: "green",
    onDraw: { kind: "boostColor", color: "green", copies: 2 },
    draftable: true,
  },
  {
    id: "den",
    name: "Den",
    imageId: "Den_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 1,
    placement: "anywhere",
    color: "blue",
    onDraw: { kind: "gemAlways" },
    draftable: true,
  },
  {
    id: "maids_chamber",
    name: "Maid's Chamber",
    imageId: "Maids_Chamber_Icon.webp",
    doors: doors("UDR"),
    gemCost: 0,
    rarity: 1,
    placement: "anywhere",
    color: "purple",
    onDraw: { kind: "grantPermanent", item: "rabbitFoot" },
    draftable: true,
  },
  {
    id: "garden",
    name: "Garden",
    imageId: "Garden_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 2,
    placement: "edge",
    color: "green",
    onEnter: { kind: "maybeGem", chance: 0.5 },
    draftable: true,
  },
  {
    id: "furnace",
    name: "Furnace",
    imageId: "Furnace_Icon.webp",
    doors: doors("DLR"),
    gemCost: 0,
    rarity: 2,
    placement: "anywhere",
    color: "orange",
    onDraw: { kind: "boostRoom", roomId: "furnace", copies: 2 },
    draftable: true,
  },
  {
    id: "bedroom",
    name: "Bedroom",
    imageId: "Bedroom_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 1,
    placement: "anywhere",
    color: "purple",
    onEnter: { kind: "food", amount: 10 },
    draftable: true,
  },
  {
    id: "empty_room",
    name: "Empty Room",
    imageId: "Empty_Room_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 0,
    placement: "anywhere",
    color: "blue",
    draftable: true,
  },
  {
    id: "storage",
    name: "Storage",
    imageId: "Storage_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 1,
    placement: "anywhere",
    color: "orange",
    onEnter: { kind: "spawn", spawn: "chest" },
    draftable: true,
  },
  {
    id: "locker_room",
    name: "Locker Room",
    imageId: "Locker_Room_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 1,
    placement: "anywhere",
    color: "orange",
    onEnter: { kind: "spawn", spawn: "locker" },
    draftable: true,
  },
  {
    id: "courtyard",
    name: "Courtyard",
    imageId: "Courtyard_Icon.webp",
    doors: doors("UDLR"),
    gemCost: 0,
    rarity: 1,
    placement: "edge",
    color: "green",
    onEnter: { kind: "spawn", spawn: "digSite" },
    draftable: true,
  },
];

const BY_ID: ReadonlyMap<RoomId, RoomDef> = new Map(ROOM_CATALOG.map((r) => [r.id, r]));

export function getRoom(id: RoomId): RoomDef {
  const room = BY_ID.get(id);
  if (!room) throw new Error(`unknown room: ${id}`);
  return room;
}

export function isRoomId(x: unknown): x is RoomId {
  return typeof x === "string" && ROOM_CATALOG.some((r) => r.id === x);
}

export function roomsOfColor(color: RoomColor): readonly RoomDef[] {
  return ROOM_CATALOG.filter((r) => r.draftable && r.color === color);
}

export const START_ROOM_ID: RoomId = "entrance_hall";
export const GOAL_ROOM_ID: RoomId = "antechamber";
