/**
 * Content hash and lookup token derivation.
 *
 * The hash is taken over a normalized form of the pixels rather than the
 * uploaded bytes: the image is stretched to a fixed square, reduced to RGB
 * and mapped to float32 samples in [0, 1]. Two uploads that normalize to the
 * same samples (the same picture re-saved as another format, say) share a
 * hash and therefore a vault record.
 */

import { type RasterImage, rasterPipeline, readRaster } from "../image/raster-image.js";
import { sha256Hex } from "./digest.js";

/** Edge length of the normalized square that gets hashed */
export const NORMALIZED_EDGE = 128;

/** Salt appended to the content hash when no other salt is configured */
export const DEFAULT_TOKEN_SALT = "pixvault:lookup-token:v1";

/** Lowercase hex SHA-256 of the normalized pixel bytes */
export type ContentHash = string;

/** Lowercase hex SHA-256 of `contentHash + salt`; the retrieval credential */
export type LookupToken = string;

export interface DerivedKeys {
  contentHash: ContentHash;
  lookupToken: LookupToken;
}

const textEncoder = new TextEncoder();

/**
 * Serialize an image to its canonical hashing form.
 *
 * Layout: NORMALIZED_EDGE x NORMALIZED_EDGE pixels, row-major, R G B order,
 * each sample a little-endian float32 equal to `value / 255`.
 */
export async function normalizeForHashing(image: RasterImage): Promise<Uint8Array> {
  const normalized = await readRaster(
    rasterPipeline(image)
      .resize(NORMALIZED_EDGE, NORMALIZED_EDGE, { fit: "fill" })
      .removeAlpha(),
  );
  return samplesToFloat32(normalized.data);
}

/**
 * Map 8-bit samples to little-endian float32 values in [0, 1].
 */
export function samplesToFloat32(samples: Uint8Array): Uint8Array {
  const out = new Uint8Array(samples.length * 4);
  const view = new DataView(out.buffer);
  for (let i = 0; i < samples.length; i++) {
    view.setFloat32(i * 4, samples[i] / 255, true);
  }
  return out;
}

export async function deriveLookupToken(contentHash: ContentHash, salt: string): Promise<LookupToken> {
  return sha256Hex(textEncoder.encode(contentHash + salt));
}

/**
 * Derive keys from an already canonical byte sequence.
 */
export async function deriveKeysFromBytes(
  canonical: Uint8Array,
  salt: string = DEFAULT_TOKEN_SALT,
): Promise<DerivedKeys> {
  const contentHash = await sha256Hex(canonical);
  const lookupToken = await deriveLookupToken(contentHash, salt);
  return { contentHash, lookupToken };
}

/**
 * Derive the content hash and lookup token of an image.
 */
export async function deriveKeys(
  image: RasterImage,
  salt: string = DEFAULT_TOKEN_SALT,
): Promise<DerivedKeys> {
  return deriveKeysFromBytes(await normalizeForHashing(image), salt);
}
