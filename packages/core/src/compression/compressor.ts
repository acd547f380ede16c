/**
 * Size-tiered encoder for compressed renditions.
 *
 * The target edge alone picks the format and quality; there is no
 * negotiation and no fallback to another format.
 */

import { InvalidTargetSizeError } from "../errors/vault-errors.js";
import { type RasterImage, rasterPipeline } from "../image/raster-image.js";

export type ImageFormat = "webp" | "png" | "jpeg";

/** Smallest accepted target edge */
export const MIN_TARGET_EDGE = 4;

/** Largest accepted target edge */
export const MAX_TARGET_EDGE = 128;

export const FORMAT_EXTENSIONS: Record<ImageFormat, string> = {
  webp: "webp",
  png: "png",
  jpeg: "jpg",
};

export const FORMAT_MIME_TYPES: Record<ImageFormat, string> = {
  webp: "image/webp",
  png: "image/png",
  jpeg: "image/jpeg",
};

export type CompressionTier =
  | { maxEdge: number; format: "webp"; quality: number }
  | { maxEdge: number; format: "jpeg"; quality: number }
  | { maxEdge: number; format: "png"; compressionLevel: number };

/**
 * Tiers in ascending order; the first tier whose `maxEdge` is not below the
 * target edge applies.
 */
export const COMPRESSION_TIERS: readonly CompressionTier[] = [
  { maxEdge: 16, format: "webp", quality: 90 },
  { maxEdge: 32, format: "png", compressionLevel: 9 },
  { maxEdge: 64, format: "webp", quality: 85 },
  { maxEdge: 96, format: "jpeg", quality: 85 },
  { maxEdge: MAX_TARGET_EDGE, format: "jpeg", quality: 75 },
];

export interface CompressedImage {
  data: Uint8Array;
  format: ImageFormat;
  tier: CompressionTier;
}

/**
 * Throw unless `targetEdge` is an integer in [MIN_TARGET_EDGE, MAX_TARGET_EDGE].
 */
export function assertTargetEdge(targetEdge: number): void {
  if (
    !Number.isInteger(targetEdge) ||
    targetEdge < MIN_TARGET_EDGE ||
    targetEdge > MAX_TARGET_EDGE
  ) {
    throw new InvalidTargetSizeError(targetEdge, MIN_TARGET_EDGE, MAX_TARGET_EDGE);
  }
}

export function selectCompressionTier(targetEdge: number): CompressionTier {
  assertTargetEdge(targetEdge);
  const tier = COMPRESSION_TIERS.find((t) => targetEdge <= t.maxEdge);
  if (!tier) {
    throw new InvalidTargetSizeError(targetEdge, MIN_TARGET_EDGE, MAX_TARGET_EDGE);
  }
  return tier;
}

/**
 * Encode an image (already resized to `targetEdge`) with its tier's format.
 *
 * WebP and PNG keep an alpha channel. JPEG output of an RGBA image is always
 * flattened onto white first; the alpha is lost.
 */
export async function compressImage(
  image: RasterImage,
  targetEdge: number,
): Promise<CompressedImage> {
  const tier = selectCompressionTier(targetEdge);
  const data = await encodeWithTier(image, tier);
  return { data, format: tier.format, tier };
}

async function encodeWithTier(image: RasterImage, tier: CompressionTier): Promise<Uint8Array> {
  const pipeline = rasterPipeline(image);
  switch (tier.format) {
    case "webp":
      return pipeline.webp({ quality: tier.quality }).toBuffer();
    case "png":
      return pipeline
        .png({ compressionLevel: tier.compressionLevel, adaptiveFiltering: true })
        .toBuffer();
    case "jpeg": {
      const opaque =
        image.channels === 4 ? pipeline.flatten({ background: "#ffffff" }) : pipeline;
      return opaque.jpeg({ quality: tier.quality }).toBuffer();
    }
  }
}
