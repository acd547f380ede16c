/**
 * Decoded raster images and the conversions between them and encoded bytes.
 *
 * Decoding and encoding go through sharp. A raster is always 8-bit
 * interleaved RGB or RGBA; grayscale and palette inputs are expanded on decode.
 */

import sharp from "sharp";
import { DecodeError, UnsupportedImageTypeError } from "../errors/vault-errors.js";

export type ChannelCount = 3 | 4;

/**
 * In-memory decoded image. Never mutated; transforms return new instances.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly channels: ChannelCount;
  /** Row-major interleaved samples, `width * height * channels` bytes */
  readonly data: Uint8Array;
}

/**
 * Image value accepted at the API boundary: either encoded bytes in any
 * format the codec reads, or an already decoded raster.
 */
export type ImageInput =
  | { readonly kind: "encoded"; readonly bytes: Uint8Array }
  | { readonly kind: "raster"; readonly image: RasterImage };

export function encodedImage(bytes: Uint8Array): ImageInput {
  return { kind: "encoded", bytes };
}

export function rasterImage(image: RasterImage): ImageInput {
  return { kind: "raster", image };
}

/**
 * Create a sharp pipeline reading the raster's raw samples.
 */
export function rasterPipeline(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

/**
 * Collect raw pipeline output into a RasterImage.
 */
export async function readRaster(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  const channels = info.channels;
  if (channels !== 3 && channels !== 4) {
    throw new DecodeError(`Unexpected channel count ${channels}`);
  }
  return { width: info.width, height: info.height, channels, data };
}

/**
 * Decode image bytes into an RGB or RGBA raster.
 *
 * @throws DecodeError when the bytes are not a readable image
 */
export async function decodeImage(bytes: Uint8Array): Promise<RasterImage> {
  if (bytes.length === 0) {
    throw new DecodeError("Uploaded data is empty");
  }
  try {
    const metadata = await sharp(bytes).metadata();
    const pipeline = sharp(bytes).toColourspace("srgb");
    return await readRaster(metadata.hasAlpha ? pipeline.ensureAlpha() : pipeline.removeAlpha());
  } catch (error) {
    if (error instanceof DecodeError) throw error;
    throw new DecodeError(undefined, { cause: error });
  }
}

/**
 * Encode a raster losslessly as PNG.
 */
export async function encodePng(image: RasterImage): Promise<Uint8Array> {
  return rasterPipeline(image).png().toBuffer();
}

/**
 * Resolve any boundary image value to a decoded raster.
 */
export async function toRasterImage(input: ImageInput): Promise<RasterImage> {
  switch (input.kind) {
    case "encoded":
      return decodeImage(input.bytes);
    case "raster":
      return checkRaster(input.image);
    default:
      return unsupported(input);
  }
}

/**
 * Resolve any boundary image value to lossless PNG bytes.
 *
 * Encoded inputs are re-encoded, so whatever the upload format the stored
 * original is always PNG.
 */
export async function toLosslessBytes(input: ImageInput): Promise<Uint8Array> {
  switch (input.kind) {
    case "encoded":
      return encodePng(await decodeImage(input.bytes));
    case "raster":
      return encodePng(checkRaster(input.image));
    default:
      return unsupported(input);
  }
}

/**
 * Reject a caller-built raster whose geometry does not match its samples.
 */
function checkRaster(image: RasterImage): RasterImage {
  const { width, height, channels, data } = image;
  const valid =
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width > 0 &&
    height > 0 &&
    (channels === 3 || channels === 4) &&
    data instanceof Uint8Array &&
    data.length === width * height * channels;
  if (!valid) {
    const samples = data instanceof Uint8Array ? data.length : 0;
    throw new UnsupportedImageTypeError(
      `Raster of ${width}x${height}x${channels} does not match its ${samples} samples`,
    );
  }
  return image;
}

function unsupported(input: never): never {
  throw new UnsupportedImageTypeError(`Unsupported image value: ${JSON.stringify(input)}`);
}
