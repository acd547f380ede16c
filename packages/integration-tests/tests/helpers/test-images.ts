/**
 * Test pictures and their encodings
 */

import type { RasterImage } from "@pixvault/core";
import sharp from "sharp";

/**
 * Diagonal colour bands with an opaque or translucent alpha channel
 */
export function bandedImage(width: number, height: number, alpha?: number): RasterImage {
  const channels = alpha === undefined ? 3 : 4;
  const data = new Uint8Array(width * height * channels);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * channels;
      const band = Math.floor((x + y) / 4) % 3;
      data[i] = band === 0 ? 220 : 20 + x;
      data[i + 1] = band === 1 ? 200 : 40 + y;
      data[i + 2] = band === 2 ? 180 : (x * y) % 256;
      if (alpha !== undefined) {
        data[i + 3] = alpha;
      }
    }
  }
  return { width, height, channels, data };
}

function pipeline(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function toPng(image: RasterImage): Promise<Uint8Array> {
  return pipeline(image).png().toBuffer();
}

export async function toLosslessWebp(image: RasterImage): Promise<Uint8Array> {
  return pipeline(image).webp({ lossless: true }).toBuffer();
}
