import { MAX_LEVEL } from "./tileSystem";

export type TileSourceId = "aerial-labeled" | "aerial";

export interface TileSource {
  id: TileSourceId;
  /** Template with {quadkey} and {culture} placeholders. */
  url: string;
  /** Deepest level the source serves. */
  maxZoom: number;
}

export const TILE_SOURCES: TileSource[] = [
  {
    id: "aerial-labeled",
    url: "https://t.ssl.ak.tiles.virtualearth.net/tiles/h{quadkey}.jpeg?g=517&mkt={culture}",
    maxZoom: MAX_LEVEL
  },
  {
    id: "aerial",
    url: "https://t.ssl.ak.tiles.virtualearth.net/tiles/a{quadkey}.jpeg?g=517&mkt={culture}",
    maxZoom: MAX_LEVEL
  }
];

/** An address with no imagery; the service answers it with its placeholder image. */
export const NULL_TILE_QUADKEY = "11111111111111111111";

export type TileUrlOverrides = Partial<Record<TileSourceId, string>>;

export function tileSourceIdFor(labeled: boolean): TileSourceId {
  return labeled ? "aerial-labeled" : "aerial";
}

export function getTileSource(id: TileSourceId): TileSource {
  return TILE_SOURCES.find((source) => source.id === id) ?? TILE_SOURCES[0];
}

export function buildTileUrl(
  labeled: boolean,
  quadKey: string,
  cultureCode: string,
  overrides: TileUrlOverrides = {}
): string {
  const id = tileSourceIdFor(labeled);
  const template = overrides[id] ?? getTileSource(id).url;
  return template
    .replace("{quadkey}", quadKey)
    .replace("{culture}", encodeURIComponent(cultureCode));
}
