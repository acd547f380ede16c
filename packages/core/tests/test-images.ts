/**
 * Synthetic images for tests
 */

import type { ChannelCount, RasterImage } from "../src/image/raster-image.js";

/**
 * Deterministic gradient; `seed` shifts every sample so different seeds give
 * different pixels. The alpha channel, when present, is fully opaque.
 */
export function gradientImage(
  width: number,
  height: number,
  channels: ChannelCount = 3,
  seed = 0,
): RasterImage {
  const data = new Uint8Array(width * height * channels);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      for (let c = 0; c < channels; c++) {
        const i = (y * width + x) * channels + c;
        data[i] = c === 3 ? 255 : (x * 17 + y * 31 + c * 53 + seed) % 256;
      }
    }
  }
  return { width, height, channels, data };
}

/**
 * Single-colour image
 */
export function solidImage(
  width: number,
  height: number,
  pixel: readonly number[],
): RasterImage {
  const channels: ChannelCount = pixel.length === 4 ? 4 : 3;
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < data.length; i++) {
    data[i] = pixel[i % channels];
  }
  return { width, height, channels, data };
}
