/**
 * Command-line interface: local terminal play, the WebSocket server and
 * replay verification.
 */

import fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { AssetRegistry, defaultImagesDir } from "../assets/assetRegistry";
import { loadConfig, type Env } from "../config";
import {
  deserializeReplay,
  hashState,
  makeState,
  serializeReplay,
  verifyReplay,
} from "../engine";
import { serve } from "../server/start";
import type { GameState } from "../types";
import { runTerminalGame } from "../ui/terminalGame";

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
};

const consoleIo: CliIo = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new InvalidArgumentError("Not a port number.");
  }
  return n;
}

function parseChance(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError("Must be a number between 0 and 1.");
  }
  return n;
}

export function outcomeSummary(state: GameState): string {
  const o = state.outcome;
  if (!o) return `Left the manor after ${state.turn} turns.`;
  if (o.kind === "won") return `Reached the Antechamber in ${state.turn} turns.`;
  return o.reason === "out_of_steps"
    ? `Ran out of steps after ${state.turn} turns.`
    : `Trapped with no legal move after ${state.turn} turns.`;
}

export function verifyReplayFile(filePath: string, io: CliIo): boolean {
  const replay = deserializeReplay(fs.readFileSync(filePath, "utf8"));
  const result = verifyReplay(replay);

  if (result.ok) {
    io.log(chalk.green(`Replay OK: ${result.steps} steps, final hash ${hashState(result.finalState)}`));
    return true;
  }

  io.error(
    chalk.red(
      `Replay diverged at entry ${result.index} (${result.reason}): expected ${result.expected}, got ${result.actual}`
    )
  );
  return false;
}

export function buildProgram(io: CliIo = consoleIo, env: Env = process.env): Command {
  const cfg = loadConfig(env);
  const program = new Command();

  const fail = (what: string, err: unknown) => {
    io.error(chalk.red(`${what}: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  };

  program
    .name("blue-manor")
    .description("Draft rooms, spend dice, reach the Antechamber.")
    .version("0.1.0");

  program
    .command("play")
    .description("Play in this terminal")
    .option("--seed <seed>", "seed for a reproducible run", cfg.seed)
    .option("--images <dir>", "directory holding room images", cfg.imagesDir)
    .option("--find-chance <p>", "base chance of a random find", parseChance, cfg.findChance)
    .option("--record <file>", "write a replay file when the game ends")
    .action(async (opts: { seed?: string; images?: string; findChance?: number; record?: string }) => {
      try {
        const seed = opts.seed ?? String(Date.now());
        const initialState = makeState({ seed, findChance: opts.findChance });
        const registry = new AssetRegistry(opts.images ?? defaultImagesDir());

        const controller = await runTerminalGame({ initialState, registry });

        io.log(outcomeSummary(controller.game));
        io.log(chalk.gray(`seed ${seed}`));

        if (opts.record) {
          fs.writeFileSync(opts.record, serializeReplay(controller.toReplayFile()), "utf8");
          io.log(chalk.blue(`Replay written to ${opts.record}`));
        }
      } catch (err) {
        fail("play failed", err);
      }
    });

  program
    .command("serve")
    .description("Host games over WebSocket")
    .option("--port <port>", "port to listen on", parsePort, cfg.wsPort)
    .option("--persist <dir>", "directory for saved games", cfg.persistenceDir)
    .option("--seed <seed>", "base seed for new games", cfg.seed)
    .option("--find-chance <p>", "base chance of a random find", parseChance, cfg.findChance)
    .action(async (opts: { port: number; persist?: string; seed?: string; findChance?: number }) => {
      try {
        const server = await serve({
          wsPort: opts.port,
          persistenceDir: opts.persist,
          seed: opts.seed,
          findChance: opts.findChance,
        });

        process.once("SIGINT", () => {
          server.close().then(
            () => io.log("Server closed."),
            (err: unknown) => fail("close failed", err)
          );
        });
      } catch (err) {
        fail("serve failed", err);
      }
    });

  program
    .command("verify <replayFile>")
    .description("Re-apply a recorded replay and check every hash")
    .action((replayFile: string) => {
      try {
        if (!verifyReplayFile(replayFile, io)) process.exitCode = 1;
      } catch (err) {
        fail("verify failed", err);
      }
    });

  return program;
}
