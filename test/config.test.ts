import { describe, it, expect } from "vitest";
import { DEFAULT_WS_PORT, envFlag, envInt, envString, loadConfig } from "../src/config";

describe("config", () => {
  it("defaults", () => {
    expect(loadConfig({})).toEqual({
      seed: undefined,
      imagesDir: undefined,
      wsPort: DEFAULT_WS_PORT,
      persistenceDir: undefined,
      findChance: undefined,
    });
  });

  it("reads the BM_ variables", () => {
    expect(
      loadConfig({
        BM_SEED: "test-seed",
        BM_IMAGES_DIR: "/tmp/images",
        BM_WS_PORT: "9001",
        BM_PERSISTENCE_DIR: "/tmp/games",
        BM_FIND_CHANCE: "0.25",
      })
    ).toEqual({
      seed: "test-seed",
      imagesDir: "/tmp/images",
      wsPort: 9001,
      persistenceDir: "/tmp/games",
      findChance: 0.25,
    });
  });

  it("ignores unusable values", () => {
    const cfg = loadConfig({ BM_WS_PORT: "eighty", BM_FIND_CHANCE: "often", BM_SEED: "   " });
    expect(cfg.wsPort).toBe(8787);
    expect(cfg.findChance).toBeUndefined();
    expect(cfg.seed).toBeUndefined();
  });

  it("drops a find chance outside [0, 1]", () => {
    expect(loadConfig({ BM_FIND_CHANCE: "1.5" }).findChance).toBeUndefined();
    expect(loadConfig({ BM_FIND_CHANCE: "-0.1" }).findChance).toBeUndefined();
    expect(loadConfig({ BM_FIND_CHANCE: "1" }).findChance).toBe(1);
    expect(loadConfig({ BM_FIND_CHANCE: "0" }).findChance).toBe(0);
  });

  it("helpers", () => {
    expect(envFlag({ X: "yes" }, "X")).toBe(true);
    expect(envFlag({ X: "0" }, "X", true)).toBe(false);
    expect(envFlag({}, "X", true)).toBe(true);
    expect(envInt({ X: "12" }, "X", 3)).toBe(12);
    expect(envInt({ X: "1.5" }, "X", 3)).toBe(3);
    expect(envString({ X: " a " }, "X")).toBe("a");
  });
});
