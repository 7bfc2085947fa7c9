import type {
  GeoPoint,
  PixelBounds,
  PixelCoordinate,
  TileAddress,
  TileIndex,
  TileRange
} from "./types";

export const TILE_SIZE = 256;
export const MAX_LEVEL = 23;

const MIN_LATITUDE = -85.05112878;
const MAX_LATITUDE = 85.05112878;
const MIN_LONGITUDE = -180;
const MAX_LONGITUDE = 180;
const EARTH_RADIUS_METERS = 6378137;
const METERS_PER_INCH = 0.0254;

function clip(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function clampLatitude(lat: number): number {
  return clip(lat, MIN_LATITUDE, MAX_LATITUDE);
}

export function clampLongitude(lon: number): number {
  return clip(lon, MIN_LONGITUDE, MAX_LONGITUDE);
}

/**
 * Width and height of the whole map in pixels at a level.
 * Level 23 gives 2^31, which is past the int32 range, so no bit shifts here.
 */
export function mapSize(level: number): number {
  return TILE_SIZE * Math.pow(2, level);
}

/**
 * Project a WGS84 point to global pixel coordinates at a level.
 * Rounds to the nearest pixel and clips to the map.
 */
export function geoToPixel(lat: number, lon: number, level: number): PixelCoordinate {
  const latitude = clampLatitude(lat);
  const longitude = clampLongitude(lon);
  const sinLat = Math.sin((latitude * Math.PI) / 180);
  const x = (longitude + 180) / 360;
  const y = 0.5 - Math.log((1 + sinLat) / (1 - sinLat)) / (4 * Math.PI);
  const size = mapSize(level);
  return {
    x: Math.floor(clip(x * size + 0.5, 0, size - 1)),
    y: Math.floor(clip(y * size + 0.5, 0, size - 1))
  };
}

export function pixelToGeo(pixelX: number, pixelY: number, level: number): GeoPoint {
  const size = mapSize(level);
  const x = clip(pixelX, 0, size - 1) / size - 0.5;
  const y = 0.5 - clip(pixelY, 0, size - 1) / size;
  return {
    lat: 90 - (360 * Math.atan(Math.exp(-y * 2 * Math.PI))) / Math.PI,
    lon: 360 * x
  };
}

export function pixelToTile(pixelX: number, pixelY: number): TileIndex {
  return {
    tileX: Math.floor(pixelX / TILE_SIZE),
    tileY: Math.floor(pixelY / TILE_SIZE)
  };
}

/** Top-left pixel of a tile. */
export function tileToPixel(tileX: number, tileY: number): PixelCoordinate {
  return { x: tileX * TILE_SIZE, y: tileY * TILE_SIZE };
}

/** One base-4 digit per level, most significant first: X bit adds 1, Y bit adds 2. */
export function tileToQuadKey(tileX: number, tileY: number, level: number): string {
  let quadKey = "";
  for (let i = level; i > 0; i -= 1) {
    const mask = 1 << (i - 1);
    let digit = 0;
    if ((tileX & mask) !== 0) {
      digit += 1;
    }
    if ((tileY & mask) !== 0) {
      digit += 2;
    }
    quadKey += digit.toString();
  }
  return quadKey;
}

export function quadKeyToTile(quadKey: string): TileAddress {
  const level = quadKey.length;
  if (level > MAX_LEVEL) {
    throw new Error(`QuadKey "${quadKey}" is deeper than level ${MAX_LEVEL}.`);
  }
  let tileX = 0;
  let tileY = 0;
  for (let i = level; i > 0; i -= 1) {
    const mask = 1 << (i - 1);
    switch (quadKey[level - i]) {
      case "0":
        break;
      case "1":
        tileX |= mask;
        break;
      case "2":
        tileY |= mask;
        break;
      case "3":
        tileX |= mask;
        tileY |= mask;
        break;
      default:
        throw new Error(`Invalid QuadKey digit sequence in "${quadKey}".`);
    }
  }
  return { tileX, tileY, level };
}

/** Metres on the ground covered by one pixel at a latitude and level. */
export function groundResolution(lat: number, level: number): number {
  const latitude = clampLatitude(lat);
  return (
    (Math.cos((latitude * Math.PI) / 180) * 2 * Math.PI * EARTH_RADIUS_METERS) /
    mapSize(level)
  );
}

/** Map scale denominator (1 : N) at a screen resolution in dots per inch. */
export function mapScale(lat: number, level: number, screenDpi: number): number {
  return (groundResolution(lat, level) * screenDpi) / METERS_PER_INCH;
}

/**
 * Pixel rectangle spanned by two corners. Corner order is not trusted; the
 * result always has min at the top-left.
 */
export function computePixelBounds(a: GeoPoint, b: GeoPoint, level: number): PixelBounds {
  const first = geoToPixel(a.lat, a.lon, level);
  const second = geoToPixel(b.lat, b.lon, level);
  return {
    minX: Math.min(first.x, second.x),
    minY: Math.min(first.y, second.y),
    maxX: Math.max(first.x, second.x),
    maxY: Math.max(first.y, second.y)
  };
}

export function pixelBoundsToTileRange(bounds: PixelBounds, level: number): TileRange {
  const min = pixelToTile(bounds.minX, bounds.minY);
  const max = pixelToTile(bounds.maxX, bounds.maxY);
  return {
    level,
    minTileX: min.tileX,
    minTileY: min.tileY,
    maxTileX: max.tileX,
    maxTileY: max.tileY
  };
}
