import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { DecodeError, UnsupportedImageTypeError } from "../src/errors/vault-errors.js";
import {
  decodeImage,
  encodedImage,
  encodePng,
  type RasterImage,
  rasterImage,
  resizeImage,
  resizeTransform,
  toLosslessBytes,
  toRasterImage,
} from "../src/image/index.js";
import { gradientImage } from "./test-images.js";

describe("decodeImage", () => {
  it("round-trips an RGB raster through PNG", async () => {
    const image = gradientImage(13, 9);
    const decoded = await decodeImage(await encodePng(image));
    expect(decoded.width).toBe(13);
    expect(decoded.height).toBe(9);
    expect(decoded.channels).toBe(3);
    expect(Array.from(decoded.data)).toEqual(Array.from(image.data));
  });

  it("keeps the alpha channel of RGBA images", async () => {
    const image = gradientImage(6, 6, 4);
    const decoded = await decodeImage(await encodePng(image));
    expect(decoded.channels).toBe(4);
    expect(Array.from(decoded.data)).toEqual(Array.from(image.data));
  });

  it("expands grayscale images to RGB", async () => {
    const gray = await sharp(new Uint8Array([0, 64, 128, 255]), {
      raw: { width: 2, height: 2, channels: 1 },
    })
      .png()
      .toBuffer();
    const decoded = await decodeImage(gray);
    expect(decoded.channels).toBe(3);
    expect(Array.from(decoded.data.subarray(0, 6))).toEqual([0, 0, 0, 64, 64, 64]);
  });

  it("rejects bytes that are not an image", async () => {
    const bytes = new TextEncoder().encode("definitely not an image");
    await expect(decodeImage(bytes)).rejects.toThrow(DecodeError);
  });

  it("rejects empty input", async () => {
    await expect(decodeImage(new Uint8Array(0))).rejects.toThrow("Uploaded data is empty");
  });
});

describe("ImageInput conversions", () => {
  it("resolves both kinds to the same raster", async () => {
    const image = gradientImage(8, 8);
    const fromRaster = await toRasterImage(rasterImage(image));
    const fromBytes = await toRasterImage(encodedImage(await encodePng(image)));
    expect(fromRaster).toBe(image);
    expect(Array.from(fromBytes.data)).toEqual(Array.from(image.data));
  });

  it("produces PNG bytes for both kinds", async () => {
    const image = gradientImage(8, 8);
    const jpeg = await sharp(image.data, { raw: { width: 8, height: 8, channels: 3 } })
      .jpeg()
      .toBuffer();
    for (const input of [rasterImage(image), encodedImage(jpeg)]) {
      const metadata = await sharp(await toLosslessBytes(input)).metadata();
      expect(metadata.format).toBe("png");
    }
  });

  it("rejects values of any other shape", async () => {
    const bogus = JSON.parse('{"kind":"url","href":"https://example.invalid/a.png"}');
    await expect(toRasterImage(bogus)).rejects.toThrow(UnsupportedImageTypeError);
    await expect(toLosslessBytes(bogus)).rejects.toThrow(UnsupportedImageTypeError);
  });
});

describe("raster validation", () => {
  it.each<[string, RasterImage]>([
    ["too few samples", { width: 4, height: 4, channels: 3, data: new Uint8Array(10) }],
    ["too many samples", { width: 2, height: 2, channels: 4, data: new Uint8Array(17) }],
    ["zero width", { width: 0, height: 4, channels: 3, data: new Uint8Array(0) }],
    ["fractional height", { width: 2, height: 1.5, channels: 3, data: new Uint8Array(9) }],
  ])("rejects a raster with %s", async (_label, image) => {
    await expect(toRasterImage(rasterImage(image))).rejects.toThrow(UnsupportedImageTypeError);
    await expect(toLosslessBytes(rasterImage(image))).rejects.toThrow(UnsupportedImageTypeError);
  });

  it("names the mismatched geometry", async () => {
    const image: RasterImage = { width: 4, height: 4, channels: 3, data: new Uint8Array(10) };
    await expect(toRasterImage(rasterImage(image))).rejects.toThrow(
      "Raster of 4x4x3 does not match its 10 samples",
    );
  });
});

describe("resizeImage", () => {
  it("stretches to the requested square", async () => {
    const resized = await resizeImage(gradientImage(40, 10, 4), 16);
    expect(resized.width).toBe(16);
    expect(resized.height).toBe(16);
    expect(resized.channels).toBe(4);
    expect(resized.data.length).toBe(16 * 16 * 4);
  });

  it("is the default transform", async () => {
    const resized = await resizeTransform.infer(gradientImage(30, 30), 12);
    expect([resized.width, resized.height]).toEqual([12, 12]);
  });
});
