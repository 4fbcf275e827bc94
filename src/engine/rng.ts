// src/engine/rng.ts
//
// Deterministic randomness. The generator state is a plain uint32 so it can
// live inside GameState and survive serialization.

export interface Rng {
  /** Float in [0, 1). */
  next(): number;
}

const FALLBACK_SEED = 0x6d2b79f5;

/** 32-bit FNV-1a. */
export function hashStringToUint32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** xorshift32 must never sit at zero. */
export function seedFromString(seed: string): number {
  const h = hashStringToUint32(seed);
  return h === 0 ? FALLBACK_SEED : h;
}

export class XorShiftRng implements Rng {
  private x: number;

  constructor(seed: number) {
    const s = seed >>> 0;
    this.x = s === 0 ? FALLBACK_SEED : s;
  }

  get state(): number {
    return this.x;
  }

  next(): number {
    let x = this.x;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.x = x >>> 0;
    return this.x / 0x100000000;
  }
}

export function pickIndex(rng: Rng, length: number): number {
  if (length <= 0) throw new Error("pickIndex: empty range");
  return Math.min(length - 1, Math.floor(rng.next() * length));
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  return items[pickIndex(rng, items.length)];
}

/** Fisher-Yates, returns a new array. */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = pickIndex(rng, i + 1);
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}
