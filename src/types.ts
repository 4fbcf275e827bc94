// src/types.ts

export type GameId = string & { readonly __brand: "GameId" };

export type Direction = "up" | "down" | "left" | "right";

export interface Coord {
  row: number;
  col: number;
}

export type RoomId =
  | "entrance_hall"
  | "antechamber"
  | "vault"
  | "veranda"
  | "den"
  | "maids_chamber"
  | "garden"
  | "furnace"
  | "bedroom"
  | "empty_room"
  | "storage"
  | "locker_room"
  | "courtyard";

export type RoomColor = "blue" | "green" | "purple" | "orange";

export type Rarity = 0 | 1 | 2 | 3;

// "edge": only on the outer ring of the grid.
export type PlacementRule = "anywhere" | "edge";

export type LockLevel = 0 | 1 | 2;

export type Consumable = "steps" | "coins" | "gems" | "keys" | "dice";

export type Permanent = "shovel" | "hammer" | "lockpickKit" | "metalDetector" | "rabbitFoot";

export type InteractableKind = "chest" | "locker" | "digSite";

export type EnterEffect =
  | { kind: "start" }
  | { kind: "goal" }
  | { kind: "coins"; amount: number }
  | { kind: "food"; amount: number }
  | { kind: "maybeGem"; chance: number }
  | { kind: "spawn"; spawn: InteractableKind };

export type DrawEffect =
  | { kind: "gemAlways" }
  | { kind: "boostColor"; color: RoomColor; copies: number }
  | { kind: "boostRoom"; roomId: RoomId; copies: number }
  | { kind: "grantPermanent"; item: Permanent };

export interface RoomDef {
  id: RoomId;
  name: string;

  // File name looked up in the images directory.
  imageId: string;

  doors: Readonly<Record<Direction, boolean>>;
  gemCost: number;
  rarity: Rarity;
  placement: PlacementRule;
  color: RoomColor;
  onEnter?: EnterEffect;
  onDraw?: DrawEffect;

  // False for rooms that never enter the draft deck (the Entrance Hall).
  draftable: boolean;
}

export interface Interactable {
  kind: InteractableKind;
  opened: boolean;
}

export interface Cell {
  roomId: RoomId | null;

  // Lock level per side, null until a door has been rolled on that side.
  doors: Record<Direction, LockLevel | null>;

  interactable: Interactable | null;
  visited: boolean;
}

export interface Inventory {
  consumables: Record<Consumable, number>;
  permanents: Record<Permanent, boolean>;
}

export interface Selection {
  target: Coord;
  direction: Direction;
  candidates: readonly RoomId[];
  cursor: number;
}

export type GameOutcome =
  | { kind: "won" }
  | { kind: "lost"; reason: "out_of_steps" | "blocked" };

export interface GameConfig {
  rows: number;
  cols: number;

  // Base probability of a random find on entering a room.
  findChance: number;

  seed: string;
}

export interface GameState {
  gameId: GameId;
  phase: "exploring" | "drafting" | "ended";
  config: GameConfig;
  grid: Cell[][];
  player: Coord;
  inventory: Inventory;

  // One entry per copy; duplicates weight the draft.
  deck: RoomId[];

  selection?: Selection;

  // xorshift32 state, advanced by every action.
  rngState: number;

  turn: number;

  // Feedback produced by the last action.
  messages: string[];

  outcome?: GameOutcome;
}

export type Action =
  | { kind: "move"; direction: Direction }
  | { kind: "interact" }
  | { kind: "cursor"; delta: -1 | 1 }
  | { kind: "confirm" }
  | { kind: "reroll" }
  | { kind: "cancel" };
