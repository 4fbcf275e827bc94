// src/engine/effects.ts
//
// Room effects. Enter effects run every time the player walks into a room;
// resource payouts only on the first visit to a cell. Draw effects run once,
// when a room is chosen from the draft.

import type { Cell, GameState, RoomDef } from "../types";
import { roomsOfColor } from "./catalog";
import { addConsumable, grantPermanent, hasPermanent } from "./inventory";
import { makeInteractable } from "./interactables";
import { consumableLabel, INTERACTABLE_LABELS, PERMANENT_LABELS } from "./labels";
import { type Rng, pick } from "./rng";
import { FIND_TABLE, type FindEntry, METAL_DETECTOR_ITEMS, RABBIT_FOOT_FIND_BONUS } from "./rulesConstants";

function findTableFor(state: GameState): FindEntry[] {
  if (!hasPermanent(state.inventory, "metalDetector")) return FIND_TABLE.slice();
  return FIND_TABLE.flatMap((e) => (METAL_DETECTOR_ITEMS.has(e.item) ? [e, e] : [e]));
}

export function findChance(state: GameState): number {
  const bonus = hasPermanent(state.inventory, "rabbitFoot") ? RABBIT_FOOT_FIND_BONUS : 0;
  return state.config.findChance + bonus;
}

/** Possibly find something lying around. One draw, plus one more on a hit. */
export function rollRandomFind(state: GameState, rng: Rng, messages: string[]): void {
  if (rng.next() >= findChance(state)) return;

  const found = pick(rng, findTableFor(state));
  addConsumable(state.inventory, found.item, found.amount);
  messages.push(`Found ${found.amount} ${consumableLabel(found.item, found.amount)}.`);
}

export function applyEnterEffects(
  state: GameState,
  cell: Cell,
  room: RoomDef,
  rng: Rng,
  messages: string[]
): void {
  const firstVisit = !cell.visited;
  cell.visited = true;

  const effect = room.onEnter;
  const entered = `Entered ${room.name}.`;

  if (!effect) {
    messages.push(entered);
  } else {
    switch (effect.kind) {
      case "start":
        messages.push("Back at the Entrance.");
        break;
      case "goal":
        messages.push(`You reached the ${room.name}! You win!`);
        state.outcome = { kind: "won" };
        return;
      case "coins":
        if (firstVisit) {
          addConsumable(state.inventory, "coins", effect.amount);
          messages.push(`Found ${effect.amount} coins!`);
        } else {
          messages.push(entered);
        }
        break;
      case "food":
        if (firstVisit) {
          addConsumable(state.inventory, "steps", effect.amount);
          messages.push(`Ate food and regains ${effect.amount} steps!`);
        } else {
          messages.push(entered);
        }
        break;
      case "maybeGem":
        if (firstVisit && rng.next() < effect.chance) {
          addConsumable(state.inventory, "gems", 1);
          messages.push(`Found a gem in the ${room.name}!`);
        } else {
          messages.push(entered);
        }
        break;
      case "spawn": {
        if (!cell.interactable) {
          cell.interactable = makeInteractable(effect.spawn);
          messages.push(`You found ${INTERACTABLE_LABELS[effect.spawn]}! Press E to interact.`);
        } else if (!cell.interactable.opened) {
          messages.push(`There is ${INTERACTABLE_LABELS[cell.interactable.kind]} here. Press E to interact.`);
        } else {
          messages.push(entered);
        }
        break;
      }
      default: {
        const _exhaustive: never = effect;
        throw new Error(`Unsupported enter effect: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  rollRandomFind(state, rng, messages);
}

export function applyDrawEffect(state: GameState, room: RoomDef, rng: Rng, messages: string[]): void {
  const effect = room.onDraw;
  if (!effect) return;

  switch (effect.kind) {
    case "gemAlways":
      addConsumable(state.inventory, "gems", 1);
      messages.push(`You drew the ${room.name} and found a gem!`);
      return;
    case "boostColor": {
      const pool = roomsOfColor(effect.color);
      if (pool.length === 0) return;
      for (let i = 0; i < effect.copies; i++) state.deck.push(pick(rng, pool).id);
      messages.push(`The ${room.name} makes ${effect.color} rooms more common.`);
      return;
    }
    case "boostRoom":
      for (let i = 0; i < effect.copies; i++) state.deck.push(effect.roomId);
      messages.push(`The ${room.name} makes similar rooms more common.`);
      return;
    case "grantPermanent":
      grantPermanent(state.inventory, effect.item);
      messages.push(`You found the ${PERMANENT_LABELS[effect.item]}.`);
      return;
    default: {
      const _exhaustive: never = effect;
      throw new Error(`Unsupported draw effect: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
