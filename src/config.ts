// src/config.ts
//
// Process configuration from the environment. CLI flags override these.

export type Env = Readonly<Record<string, string | undefined>>;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export function envNumber(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

export function envString(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = v.trim();
  return s === "" ? undefined : s;
}

export type AppConfig = {
  seed?: string;
  imagesDir?: string;
  wsPort: number;
  persistenceDir?: string;
  findChance?: number;
};

export const DEFAULT_WS_PORT = 8787;

export function loadConfig(env: Env = process.env): AppConfig {
  const findChance = env.BM_FIND_CHANCE === undefined ? undefined : envNumber(env, "BM_FIND_CHANCE", Number.NaN);

  return {
    seed: envString(env, "BM_SEED"),
    imagesDir: envString(env, "BM_IMAGES_DIR"),
    wsPort: envInt(env, "BM_WS_PORT", DEFAULT_WS_PORT),
    persistenceDir: envString(env, "BM_PERSISTENCE_DIR"),
    findChance: findChance !== undefined && findChance >= 0 && findChance <= 1 ? findChance : undefined,
  };
}
