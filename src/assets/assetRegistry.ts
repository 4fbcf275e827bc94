// src/assets/assetRegistry.ts
//
// Asset lookup with placeholder fallback.
// Every visual element asks the registry for its asset by file name. When the
// file is present under the images directory the image is used; otherwise a
// fixed-size solid-color rectangle stands in for it. Lookups never throw.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { RoomColor, RoomDef } from "../types";

export type Rgb = readonly [r: number, g: number, b: number];

export type Size = { width: number; height: number };

export type Visual =
  | { kind: "image"; path: string; width: number; height: number }
  | { kind: "placeholder"; color: Rgb; width: number; height: number };

export const TILE_SIZE: Size = { width: 70, height: 70 };

export const ROOM_COLORS: Readonly<Record<RoomColor, Rgb>> = {
  green: [60, 130, 60],
  purple: [110, 60, 110],
  orange: [200, 120, 60],
  blue: [60, 90, 160],
};

export const DEFAULT_COLOR: Rgb = [120, 120, 120];
export const CARD_PLACEHOLDER_COLOR: Rgb = [100, 100, 120];
export const UNEXPLORED_COLOR: Rgb = [20, 20, 20];

export type FileExists = (filePath: string) => boolean;

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/** `images/` at the project root. */
export function defaultImagesDir(): string {
  return fileURLToPath(new URL("../../images", import.meta.url));
}

export class AssetRegistry {
  private readonly cache = new Map<string, string | null>();

  constructor(
    readonly imagesDir: string,
    private readonly fileExists: FileExists = isFile
  ) {}

  /** Absolute path of the image for `name`, or null when it is absent. */
  imagePath(name: string | undefined): string | null {
    if (!name) return null;

    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    let found: string | null = null;
    // Names are plain file names; anything with a directory part is refused.
    if (path.basename(name) === name) {
      const candidate = path.resolve(this.imagesDir, name);
      try {
        found = this.fileExists(candidate) ? candidate : null;
      } catch {
        found = null;
      }
    }

    this.cache.set(name, found);
    return found;
  }

  resolve(name: string | undefined, fallback: Rgb, size: Size = TILE_SIZE): Visual {
    const found = this.imagePath(name);
    if (found) return { kind: "image", path: found, width: size.width, height: size.height };
    return { kind: "placeholder", color: fallback, width: size.width, height: size.height };
  }

  resolveRoom(room: RoomDef, size: Size = TILE_SIZE): Visual {
    return this.resolve(room.imageId, roomColor(room.color), size);
  }
}

export function roomColor(color: RoomColor): Rgb {
  return ROOM_COLORS[color] ?? DEFAULT_COLOR;
}
