import { SentinelFetchError } from "./errors";
import { NULL_TILE_QUADKEY, buildTileUrl, type TileUrlOverrides } from "./mapTiles";
import type { TileFetcher } from "./net/httpFetcher";
import type { RetrievalConfig } from "./settings";

type SentinelKey = Pick<RetrievalConfig, "labeled" | "cultureCode">;

function sentinelCacheKey({ labeled, cultureCode }: SentinelKey): string {
  return `${labeled ? "labeled" : "unlabeled"}:${cultureCode}`;
}

/**
 * Recognizes the placeholder image the tile service returns for addresses
 * with no imagery. The placeholder is fetched once per style and culture and
 * kept for the lifetime of the detector.
 */
export class NullTileDetector {
  private fetcher: TileFetcher;
  private urlOverrides: TileUrlOverrides;
  private sentinels: Map<string, Promise<Uint8Array>>;

  constructor(fetcher: TileFetcher, urlOverrides: TileUrlOverrides = {}) {
    this.fetcher = fetcher;
    this.urlOverrides = urlOverrides;
    this.sentinels = new Map();
  }

  async isNullTile(bytes: Uint8Array, config: SentinelKey): Promise<boolean> {
    const sentinel = await this.getSentinel(config);
    return Buffer.compare(bytes, sentinel) === 0;
  }

  /**
   * Concurrent callers share one request. A failed request is forgotten so a
   * later retrieval can try again.
   */
  getSentinel(config: SentinelKey): Promise<Uint8Array> {
    const { labeled, cultureCode } = config;
    const key = sentinelCacheKey(config);
    const cached = this.sentinels.get(key);
    if (cached) {
      return cached;
    }
    const url = buildTileUrl(labeled, NULL_TILE_QUADKEY, cultureCode, this.urlOverrides);
    const pending = this.fetcher.fetchBytes(url).catch((error: unknown) => {
      this.sentinels.delete(key);
      throw new SentinelFetchError(labeled, cultureCode, error);
    });
    this.sentinels.set(key, pending);
    return pending;
  }
}
