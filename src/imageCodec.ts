import sharp from "sharp";
import type { OutputFormat } from "./settings";
import type { RasterImage } from "./types";

export interface Placement {
  image: RasterImage;
  left: number;
  top: number;
}

export interface CropRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ImageCodec {
  decode(bytes: Uint8Array): Promise<RasterImage>;
  compose(width: number, height: number, placements: Placement[]): Promise<RasterImage>;
  crop(image: RasterImage, rect: CropRect): Promise<RasterImage>;
  encode(image: RasterImage, format: OutputFormat): Promise<Buffer>;
}

export interface SharpImageCodecOptions {
  /**
   * Pixel limit for canvases and rasters built from decoded tiles. sharp's
   * default caps a stitched grid at roughly 64x64 tiles.
   */
  limitInputPixels?: number | false;
}

async function toRaster(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

/** Decoded images are always RGBA so tiles of any source format composite together. */
export class SharpImageCodec implements ImageCodec {
  private limitInputPixels: number | false;

  constructor(options: SharpImageCodecOptions = {}) {
    this.limitInputPixels = options.limitInputPixels ?? false;
  }

  async decode(bytes: Uint8Array): Promise<RasterImage> {
    return toRaster(sharp(bytes).ensureAlpha());
  }

  async compose(width: number, height: number, placements: Placement[]): Promise<RasterImage> {
    const canvas = sharp({
      limitInputPixels: this.limitInputPixels,
      create: {
        width,
        height,
        channels: 4,
        background: { r: 0, g: 0, b: 0, alpha: 1 }
      }
    }).composite(
      placements.map(({ image, left, top }) => ({
        input: image.data,
        raw: { width: image.width, height: image.height, channels: image.channels },
        left,
        top
      }))
    );
    return toRaster(canvas);
  }

  async crop(image: RasterImage, rect: CropRect): Promise<RasterImage> {
    return toRaster(this.rawInput(image).extract(rect));
  }

  async encode(image: RasterImage, format: OutputFormat): Promise<Buffer> {
    return this.rawInput(image).toFormat(format).toBuffer();
  }

  private rawInput(image: RasterImage): sharp.Sharp {
    return sharp(image.data, {
      limitInputPixels: this.limitInputPixels,
      raw: { width: image.width, height: image.height, channels: image.channels }
    });
  }
}
