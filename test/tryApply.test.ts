import { describe, it, expect } from "vitest";
import { tryApplyActionWithResponse } from "../src/engine/tryApply";
import { applyAction } from "../src/engine/applyAction";
import { hashState } from "../src/engine/serialization";
import { ABOVE_START, makeState, placeRoom } from "./helpers";

describe("tryApplyActionWithResponse", () => {
  it("returns ok:true with the sync payload for an allowed action", () => {
    const s = makeState();
    const res = tryApplyActionWithResponse(s, { kind: "move", direction: "up" });

    expect(res.ok).toBe(true);
    if (res.ok) {
      const expected = applyAction(s, { kind: "move", direction: "up" }).state;
      expect(res.result.nextState).toEqual(expected);
      expect(res.result.afterHash).toBe(hashState(expected));
      expect(res.result.replayEntry).toEqual({
        beforeHash: hashState(s),
        action: { kind: "move", direction: "up" },
        afterHash: hashState(expected),
      });
    }
  });

  it("rule refusals are not errors", () => {
    const res = tryApplyActionWithResponse(makeState(), { kind: "move", direction: "down" });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.result.nextState.messages).toEqual(["A wall. Can't go there."]);
  });

  it("INVALID_INPUT for anything that is not an action", () => {
    for (const input of [null, "up", { kind: "move" }, { kind: "move", direction: "north" }, { kind: "cursor", delta: 2 }]) {
      const res = tryApplyActionWithResponse(makeState(), input);
      expect(res).toEqual({
        ok: false,
        error: { code: "INVALID_INPUT", message: "Input is not a valid action." },
      });
    }
  });

  it("WRONG_PHASE for drafting actions while exploring", () => {
    const res = tryApplyActionWithResponse(makeState(), { kind: "confirm" });
    expect(res).toEqual({
      ok: false,
      error: { code: "WRONG_PHASE", message: 'Action "confirm" is not allowed while exploring.' },
    });
  });

  it("GAME_ENDED once the game is over", () => {
    const won = applyAction(placeRoom(makeState(), ABOVE_START, "antechamber"), {
      kind: "move",
      direction: "up",
    }).state;
    const res = tryApplyActionWithResponse(won, { kind: "move", direction: "down" });
    expect(res).toEqual({ ok: false, error: { code: "GAME_ENDED", message: "Game is over." } });
  });
});
