import { promises as fs } from "fs";
import { dirname, join } from "path";

export interface TileCacheStore {
  /** Resolves null on a miss. */
  read(key: string): Promise<Uint8Array | null>;
  write(key: string, bytes: Uint8Array): Promise<void>;
}

export interface MemoryTileCacheOptions {
  maxEntries?: number;
}

const DEFAULT_MAX_ENTRIES = 2048;
const TILE_FILE_EXTENSION = ".jpg";
const CACHE_KEY_PATTERN = /^(labeled|unlabeled)\/[0-3]*$/;

/** Labeled and unlabeled tiles are different images, so they never share a key. */
export function buildTileCacheKey(labeled: boolean, quadKey: string): string {
  return `${labeled ? "labeled" : "unlabeled"}/${quadKey}`;
}

export class MemoryTileCache implements TileCacheStore {
  private maxEntries: number;
  private entries: Map<string, Uint8Array>;
  private lru: string[];

  constructor(options: MemoryTileCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.entries = new Map();
    this.lru = [];
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  async read(key: string): Promise<Uint8Array | null> {
    const value = this.entries.get(key);
    if (value === undefined) {
      return null;
    }
    this.touchKey(key);
    return value;
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    if (this.entries.has(key)) {
      this.entries.set(key, bytes);
      this.touchKey(key);
      return;
    }
    this.entries.set(key, bytes);
    this.lru.push(key);
    this.trimToSize();
  }

  private touchKey(key: string): void {
    const index = this.lru.indexOf(key);
    if (index >= 0) {
      this.lru.splice(index, 1);
    }
    this.lru.push(key);
  }

  private trimToSize(): void {
    while (this.lru.length > this.maxEntries) {
      const key = this.lru.shift();
      if (key !== undefined) {
        this.entries.delete(key);
      }
    }
  }
}

/**
 * One file per tile: <root>/<labeled|unlabeled>/<quadkey>.jpg. Writes land in
 * a temporary file first and are renamed into place, so a tile file is either
 * complete or absent.
 */
export class DiskTileCache implements TileCacheStore {
  readonly root: string;
  private writeSequence: number;

  constructor(root: string) {
    this.root = root;
    this.writeSequence = 0;
  }

  pathFor(key: string): string {
    if (!CACHE_KEY_PATTERN.test(key)) {
      throw new Error(`Malformed tile cache key "${key}".`);
    }
    const [partition, quadKey] = key.split("/");
    return join(this.root, partition, `${quadKey}${TILE_FILE_EXTENSION}`);
  }

  async read(key: string): Promise<Uint8Array | null> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    const path = this.pathFor(key);
    const tempPath = `${path}.${process.pid}.${this.writeSequence}.tmp`;
    this.writeSequence += 1;
    await fs.mkdir(dirname(path), { recursive: true });
    try {
      await fs.writeFile(tempPath, bytes);
      await fs.rename(tempPath, path);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
