import { startWsServer } from "./wsServer";
import type { AppConfig } from "../config";

export type ServeOptions = Pick<AppConfig, "wsPort" | "seed" | "persistenceDir" | "findChance">;

// Process edge for the WebSocket server: logs to the console.
export async function serve(cfg: ServeOptions) {
  const server = await startWsServer({
    port: cfg.wsPort,
    seed: cfg.seed,
    findChance: cfg.findChance,
    persistenceDir: cfg.persistenceDir,
    log: (line) => console.error(`[ws] ${line}`),
  });

  console.log(`Blue Manor WS server listening on ws://localhost:${server.port}`);
  if (cfg.persistenceDir) console.log(`Persisting games under ${cfg.persistenceDir}`);

  return server;
}
