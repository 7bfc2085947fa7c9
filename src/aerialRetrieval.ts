import { promises as fs } from "fs";
import { dirname, join } from "path";
import { composeTileGrid } from "./compositor";
import { createDebugLog } from "./debug";
import { RetrievalValidationError, isAbortError } from "./errors";
import { SharpImageCodec, type ImageCodec } from "./imageCodec";
import { getTileSource, tileSourceIdFor, type TileUrlOverrides } from "./mapTiles";
import { HttpTileFetcher, type TileFetcher } from "./net/httpFetcher";
import type { RateLimiter } from "./net/rateLimiter";
import { tileServiceRateLimiter } from "./net/tileLimiter";
import { NullTileDetector } from "./nullTile";
import {
  resolveAppDataDir,
  resolveRetrievalConfig,
  type RetrievalConfig
} from "./settings";
import { DiskTileCache, type TileCacheStore } from "./tileCache";
import { TileGateway, type TileFetchResult } from "./tileGateway";
import {
  MAX_LEVEL,
  computePixelBounds,
  pixelBoundsToTileRange,
  tileToQuadKey
} from "./tileSystem";
import type { GeoPoint, RasterImage, RetrievalResult, TileGrid, TileRange } from "./types";

export interface AerialImageRetrieverOptions {
  config?: Partial<RetrievalConfig>;
  /** Defaults to a DiskTileCache under `cacheDir`. */
  cacheStore?: TileCacheStore;
  /** Defaults to the per-user application data directory. */
  cacheDir?: string;
  fetcher?: TileFetcher;
  codec?: ImageCodec;
  limiter?: RateLimiter;
  tileSources?: TileUrlOverrides;
  userAgent?: string;
}

const debugLog = createDebugLog("retrieval");

/**
 * A retrieval session. Holds the tile cache, the missing-tile placeholders
 * seen so far and the request limiter; each retrieve() call reads the
 * configuration as it was when the call started.
 */
export class AerialImageRetriever {
  private config: Readonly<RetrievalConfig>;
  private codec: ImageCodec;
  private limiter: RateLimiter;
  private nullTiles: NullTileDetector;
  private gateway: TileGateway;

  constructor(options: AerialImageRetrieverOptions = {}) {
    this.config = resolveRetrievalConfig(options.config);
    const fetcher = options.fetcher ?? new HttpTileFetcher({ userAgent: options.userAgent });
    const cache =
      options.cacheStore ??
      new DiskTileCache(join(options.cacheDir ?? resolveAppDataDir(), "cache"));
    this.codec = options.codec ?? new SharpImageCodec();
    this.limiter = options.limiter ?? tileServiceRateLimiter;
    this.nullTiles = new NullTileDetector(fetcher, options.tileSources);
    this.gateway = new TileGateway({
      fetcher,
      cache,
      codec: this.codec,
      nullTiles: this.nullTiles,
      urlOverrides: options.tileSources
    });
  }

  getConfig(): Readonly<RetrievalConfig> {
    return this.config;
  }

  /** Applies to retrievals started after this call. */
  setConfig(overrides: Partial<RetrievalConfig>): void {
    this.config = resolveRetrievalConfig({ ...this.config, ...overrides });
  }

  /**
   * Retrieves the box at the highest level, up to `maxLevel`, for which every
   * covering tile exists. Corners may be given in any order. Resolves null
   * when no level has full coverage.
   */
  async retrieve(
    lat1: number,
    lon1: number,
    lat2: number,
    lon2: number,
    maxLevel = MAX_LEVEL
  ): Promise<RetrievalResult | null> {
    const config = this.config;
    validateRequest([lat1, lon1, lat2, lon2], maxLevel);
    const first: GeoPoint = { lat: lat1, lon: lon1 };
    const second: GeoPoint = { lat: lat2, lon: lon2 };

    const deepest = Math.min(maxLevel, getTileSource(tileSourceIdFor(config.labeled)).maxZoom);
    for (let level = deepest; level >= 0; level -= 1) {
      const pixelBounds = computePixelBounds(first, second, level);
      if (pixelBounds.maxX - pixelBounds.minX <= 1 || pixelBounds.maxY - pixelBounds.minY <= 1) {
        throw new RetrievalValidationError(
          `Bounding box collapses to a single pixel at level ${level}.`,
          "bounds"
        );
      }

      const tileRange = pixelBoundsToTileRange(pixelBounds, level);
      const grid = await this.downloadGrid(tileRange, config);
      if (!grid) {
        continue;
      }

      const image = await composeTileGrid(grid, pixelBounds, this.codec);
      debugLog(`Composed ${grid.columns}x${grid.rows} tiles at level ${level}`);
      return { image, level, pixelBounds, tileRange };
    }

    debugLog("No level has full tile coverage for the bounding box");
    return null;
  }

  /** Resolves false when no level has full coverage; nothing is written then. */
  async retrieveToFile(
    lat1: number,
    lon1: number,
    lat2: number,
    lon2: number,
    outputPath: string,
    maxLevel = MAX_LEVEL
  ): Promise<boolean> {
    const format = this.config.outputFormat;
    const result = await this.retrieve(lat1, lon1, lat2, lon2, maxLevel);
    if (!result) {
      return false;
    }
    const encoded = await this.codec.encode(result.image, format);
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, encoded);
    return true;
  }

  encode(result: RetrievalResult): Promise<Buffer> {
    return this.codec.encode(result.image, this.config.outputFormat);
  }

  /** Waits for background cache writes. Retrieval never waits on these. */
  flushCacheWrites(): Promise<void> {
    return this.gateway.flushWrites();
  }

  /**
   * Fetches every tile of the range, or returns null as soon as one is
   * missing or fails. Queued requests of an abandoned level are dropped.
   */
  private async downloadGrid(
    range: TileRange,
    config: Readonly<RetrievalConfig>
  ): Promise<TileGrid | null> {
    const columns = range.maxTileX - range.minTileX + 1;
    const rows = range.maxTileY - range.minTileY + 1;
    const controller = new AbortController();
    const requests: Promise<TileFetchResult>[] = [];

    for (let tileY = range.minTileY; tileY <= range.maxTileY; tileY += 1) {
      for (let tileX = range.minTileX; tileX <= range.maxTileX; tileX += 1) {
        const quadKey = tileToQuadKey(tileX, tileY, range.level);
        const request = this.requestTile(quadKey, config, controller.signal).then((result) => {
          if (result.kind !== "ok" && !controller.signal.aborted) {
            debugLog(
              `Cannot find tile image at level ${range.level} for tile coordinate (${tileX}, ${tileY})`,
              result.kind === "error" ? result.cause : "placeholder tile"
            );
            controller.abort();
          }
          return result;
        });
        requests.push(request);
      }
    }

    let results: TileFetchResult[];
    try {
      results = await Promise.all(requests);
    } catch (error) {
      controller.abort();
      throw error;
    }

    const tiles: RasterImage[] = [];
    for (const result of results) {
      if (result.kind !== "ok") {
        return null;
      }
      tiles.push(result.image);
    }
    return { range, columns, rows, tiles };
  }

  private async requestTile(
    quadKey: string,
    config: Readonly<RetrievalConfig>,
    signal: AbortSignal
  ): Promise<TileFetchResult> {
    try {
      return await this.limiter.schedule(
        () => this.gateway.fetchTile(quadKey, config, signal),
        signal
      );
    } catch (error) {
      if (isAbortError(error)) {
        return { kind: "error", cause: error };
      }
      throw error;
    }
  }
}

function validateRequest(coordinates: number[], maxLevel: number): void {
  if (!coordinates.every((value) => Number.isFinite(value))) {
    throw new RetrievalValidationError("Bounding box coordinates must be finite numbers.", "coordinates");
  }
  if (!Number.isInteger(maxLevel) || maxLevel < 0) {
    throw new RetrievalValidationError(
      `maxLevel must be a non-negative integer, got ${maxLevel}.`,
      "maxLevel"
    );
  }
}
