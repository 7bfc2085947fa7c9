import { BackgroundTasks } from "./backgroundTasks";
import { createDebugLog } from "./debug";
import type { ImageCodec } from "./imageCodec";
import { buildTileUrl, type TileUrlOverrides } from "./mapTiles";
import type { TileFetcher } from "./net/httpFetcher";
import type { NullTileDetector } from "./nullTile";
import type { RetrievalConfig } from "./settings";
import { buildTileCacheKey, type TileCacheStore } from "./tileCache";
import { TILE_SIZE } from "./tileSystem";
import type { RasterImage } from "./types";

export type TileFetchResult =
  | { kind: "ok"; image: RasterImage; source: "cache" | "network" }
  | { kind: "not-found" }
  | { kind: "error"; cause: unknown };

export interface TileGatewayDeps {
  fetcher: TileFetcher;
  cache: TileCacheStore;
  codec: ImageCodec;
  nullTiles: NullTileDetector;
  urlOverrides?: TileUrlOverrides;
}

const debugLog = createDebugLog("tile-cache");

/**
 * Resolves one quadkey to a decoded tile. Cache first, then network; bytes
 * from the network are checked against the missing-tile placeholder before
 * they are cached. A cached tile that no longer decodes is fetched again and
 * overwritten. Per-tile problems come back as results, only a failed
 * placeholder fetch throws.
 */
export class TileGateway {
  private fetcher: TileFetcher;
  private cache: TileCacheStore;
  private codec: ImageCodec;
  private nullTiles: NullTileDetector;
  private urlOverrides: TileUrlOverrides;
  private writes: BackgroundTasks;

  constructor(deps: TileGatewayDeps) {
    this.fetcher = deps.fetcher;
    this.cache = deps.cache;
    this.codec = deps.codec;
    this.nullTiles = deps.nullTiles;
    this.urlOverrides = deps.urlOverrides ?? {};
    this.writes = new BackgroundTasks("tile-cache");
  }

  async fetchTile(
    quadKey: string,
    config: RetrievalConfig,
    signal?: AbortSignal
  ): Promise<TileFetchResult> {
    const cacheKey = buildTileCacheKey(config.labeled, quadKey);

    if (config.cacheEnabled) {
      const cached = await this.readCached(cacheKey);
      if (cached) {
        const result = await this.decode(cached, "cache");
        if (result.kind !== "error") {
          return result;
        }
        console.warn(`[tile-cache] Cached ${cacheKey} is unreadable; fetching again.`, result.cause);
      }
    }

    const url = buildTileUrl(config.labeled, quadKey, config.cultureCode, this.urlOverrides);
    let bytes: Uint8Array;
    try {
      bytes = await this.fetcher.fetchBytes(url, signal);
    } catch (error) {
      debugLog("Tile request failed", quadKey, error);
      return { kind: "error", cause: error };
    }

    if (await this.nullTiles.isNullTile(bytes, config)) {
      return { kind: "not-found" };
    }

    if (config.cacheEnabled) {
      this.writes.run(`Caching tile ${cacheKey}`, () => this.cache.write(cacheKey, bytes));
    }

    return this.decode(bytes, "network");
  }

  /** Resolves once every cache write started so far has finished or failed. */
  flushWrites(): Promise<void> {
    return this.writes.drain();
  }

  private async readCached(cacheKey: string): Promise<Uint8Array | null> {
    try {
      return await this.cache.read(cacheKey);
    } catch (error) {
      console.warn(`[tile-cache] Reading ${cacheKey} failed; fetching instead.`, error);
      return null;
    }
  }

  private async decode(
    bytes: Uint8Array,
    source: "cache" | "network"
  ): Promise<TileFetchResult> {
    try {
      const image = await this.codec.decode(bytes);
      if (image.width !== TILE_SIZE || image.height !== TILE_SIZE) {
        return {
          kind: "error",
          cause: new Error(`Tile is ${image.width}x${image.height}, expected ${TILE_SIZE}x${TILE_SIZE}.`)
        };
      }
      return { kind: "ok", image, source };
    } catch (error) {
      return { kind: "error", cause: error };
    }
  }
}
