import type { CropRect, ImageCodec, Placement } from "./imageCodec";
import { TILE_SIZE, tileToPixel } from "./tileSystem";
import type { PixelBounds, RasterImage, TileGrid } from "./types";

export function tilePlacements(grid: TileGrid): Placement[] {
  if (grid.tiles.length !== grid.columns * grid.rows) {
    throw new Error(
      `Tile grid has ${grid.tiles.length} tiles, expected ${grid.columns * grid.rows}.`
    );
  }
  return grid.tiles.map((image, index) => ({
    image,
    left: (index % grid.columns) * TILE_SIZE,
    top: Math.floor(index / grid.columns) * TILE_SIZE
  }));
}

/** Crop rectangle of `bounds` relative to the grid's top-left tile. */
export function gridCropRect(grid: TileGrid, bounds: PixelBounds): CropRect {
  const origin = tileToPixel(grid.range.minTileX, grid.range.minTileY);
  return {
    left: bounds.minX - origin.x,
    top: bounds.minY - origin.y,
    width: bounds.maxX - bounds.minX,
    height: bounds.maxY - bounds.minY
  };
}

export async function composeTileGrid(
  grid: TileGrid,
  bounds: PixelBounds,
  codec: ImageCodec
): Promise<RasterImage> {
  const canvas = await codec.compose(
    grid.columns * TILE_SIZE,
    grid.rows * TILE_SIZE,
    tilePlacements(grid)
  );
  return codec.crop(canvas, gridCropRect(grid, bounds));
}
