import { describe, it, expect, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { DiskTileCache, MemoryTileCache, buildTileCacheKey } from "../tileCache";

describe("buildTileCacheKey", () => {
  it("partitions labeled and unlabeled tiles", () => {
    expect(buildTileCacheKey(true, "0231")).toBe("labeled/0231");
    expect(buildTileCacheKey(false, "0231")).toBe("unlabeled/0231");
  });
});

describe("MemoryTileCache", () => {
  it("stores and retrieves bytes", async () => {
    const cache = new MemoryTileCache();
    await cache.write("labeled/01", new Uint8Array([1, 2, 3]));
    expect(await cache.read("labeled/01")).toEqual(new Uint8Array([1, 2, 3]));
    expect(await cache.read("unlabeled/01")).toBeNull();
  });

  it("evicts the least recently used entry", async () => {
    const cache = new MemoryTileCache({ maxEntries: 2 });
    await cache.write("labeled/0", new Uint8Array([0]));
    await cache.write("labeled/1", new Uint8Array([1]));
    await cache.read("labeled/0");
    await cache.write("labeled/2", new Uint8Array([2]));

    expect(cache.size).toBe(2);
    expect(cache.has("labeled/0")).toBe(true);
    expect(cache.has("labeled/1")).toBe(false);
    expect(cache.has("labeled/2")).toBe(true);
  });
});

describe("DiskTileCache", () => {
  let root: string | null = null;

  afterEach(async () => {
    if (root) {
      await rm(root, { recursive: true, force: true });
      root = null;
    }
  });

  it("writes one jpg per tile under its partition", async () => {
    root = await mkdtemp(join(tmpdir(), "tile-cache-"));
    const cache = new DiskTileCache(root);
    await cache.write("unlabeled/0312", new Uint8Array([9, 8, 7]));

    const onDisk = await readFile(join(root, "unlabeled", "0312.jpg"));
    expect(Array.from(onDisk)).toEqual([9, 8, 7]);
    const cached = await cache.read("unlabeled/0312");
    expect(cached && Array.from(cached)).toEqual([9, 8, 7]);
  });

  it("reports a miss as null", async () => {
    root = await mkdtemp(join(tmpdir(), "tile-cache-"));
    const cache = new DiskTileCache(root);
    expect(await cache.read("labeled/0000")).toBeNull();
  });

  it("replaces an existing tile in one step", async () => {
    root = await mkdtemp(join(tmpdir(), "tile-cache-"));
    const cache = new DiskTileCache(root);
    await cache.write("labeled/02", new Uint8Array([1, 1, 1, 1]));
    await cache.write("labeled/02", new Uint8Array([2, 2]));

    expect(Array.from(await readFile(join(root, "labeled", "02.jpg")))).toEqual([2, 2]);
    expect(await readdir(join(root, "labeled"))).toEqual(["02.jpg"]);
  });

  it("leaves no partial file behind when a write fails", async () => {
    root = await mkdtemp(join(tmpdir(), "tile-cache-"));
    const cache = new DiskTileCache(root);
    // a directory where the tile file belongs makes the final rename fail
    await mkdir(join(root, "labeled", "0213.jpg"), { recursive: true });

    await expect(cache.write("labeled/0213", new Uint8Array([1, 2, 3]))).rejects.toThrow();

    expect(await readdir(join(root, "labeled"))).toEqual(["0213.jpg"]);
  });

  it("does not serve a write that never finished", async () => {
    root = await mkdtemp(join(tmpdir(), "tile-cache-"));
    const cache = new DiskTileCache(root);
    await mkdir(join(root, "labeled"), { recursive: true });
    await writeFile(join(root, "labeled", "0213.jpg.4242.0.tmp"), new Uint8Array([0xff, 0xd8]));

    expect(await cache.read("labeled/0213")).toBeNull();
  });

  it("refuses keys that are not partition/quadkey", () => {
    const cache = new DiskTileCache("/tmp/unused");
    expect(() => cache.pathFor("labeled/../../etc")).toThrow(/Malformed tile cache key/);
  });
});
