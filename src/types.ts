export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface PixelCoordinate {
  x: number;
  y: number;
}

export interface TileIndex {
  tileX: number;
  tileY: number;
}

export interface TileAddress extends TileIndex {
  level: number;
}

/** Axis-aligned pixel rectangle at one zoom level; min corner is top-left. */
export interface PixelBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Inclusive tile index range at one zoom level. */
export interface TileRange {
  level: number;
  minTileX: number;
  minTileY: number;
  maxTileX: number;
  maxTileY: number;
}

export type RasterChannels = 1 | 2 | 3 | 4;

/** Uncompressed pixels, interleaved, row-major, origin at (0,0). */
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: RasterChannels;
}

export interface TileGrid {
  range: TileRange;
  columns: number;
  rows: number;
  /** Row-major: index = (tileY - minTileY) * columns + (tileX - minTileX). */
  tiles: RasterImage[];
}

export interface RetrievalResult {
  image: RasterImage;
  level: number;
  pixelBounds: PixelBounds;
  tileRange: TileRange;
}
