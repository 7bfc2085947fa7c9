export { AerialImageRetriever, type AerialImageRetrieverOptions } from "./aerialRetrieval";
export { composeTileGrid, gridCropRect, tilePlacements } from "./compositor";
export {
  RetrievalValidationError,
  SentinelFetchError,
  TileRequestError,
  type ValidationField
} from "./errors";
export {
  SharpImageCodec,
  type CropRect,
  type ImageCodec,
  type Placement,
  type SharpImageCodecOptions
} from "./imageCodec";
export {
  NULL_TILE_QUADKEY,
  TILE_SOURCES,
  buildTileUrl,
  getTileSource,
  tileSourceIdFor,
  type TileSource,
  type TileSourceId,
  type TileUrlOverrides
} from "./mapTiles";
export { HttpTileFetcher, type HttpTileFetcherOptions, type TileFetcher } from "./net/httpFetcher";
export { RateLimiter, type RateLimiterOptions } from "./net/rateLimiter";
export { DEFAULT_TILE_CONCURRENCY, tileServiceRateLimiter } from "./net/tileLimiter";
export { NullTileDetector } from "./nullTile";
export {
  DEFAULT_RETRIEVAL_CONFIG,
  OUTPUT_FORMATS,
  isValidCultureCode,
  resolveAppDataDir,
  resolveRetrievalConfig,
  type OutputFormat,
  type RetrievalConfig
} from "./settings";
export { DiskTileCache, MemoryTileCache, buildTileCacheKey, type TileCacheStore } from "./tileCache";
export { TileGateway, type TileFetchResult } from "./tileGateway";
export {
  MAX_LEVEL,
  TILE_SIZE,
  clampLatitude,
  clampLongitude,
  computePixelBounds,
  geoToPixel,
  groundResolution,
  mapScale,
  mapSize,
  pixelBoundsToTileRange,
  pixelToGeo,
  pixelToTile,
  quadKeyToTile,
  tileToPixel,
  tileToQuadKey
} from "./tileSystem";
export type {
  GeoPoint,
  PixelBounds,
  PixelCoordinate,
  RasterImage,
  RetrievalResult,
  TileAddress,
  TileGrid,
  TileIndex,
  TileRange
} from "./types";
