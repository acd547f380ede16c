/**
 * Vault Integration Tests
 *
 * Ingest and retrieval through VaultService on every storage backend:
 * 1. Deterministic keys and compression
 * 2. Re-ingest replaces rather than duplicates
 * 3. Lossless round trip of the original
 * 4. Unknown and malformed tokens are denied alike
 * 5. Failed decodes and unconfirmed previews leave the store untouched
 */

import {
  AuthenticationDeniedError,
  DecodeError,
  encodedImage,
  InvalidTargetSizeError,
  rasterImage,
} from "@pixvault/core";
import { afterEach, describe, expect, it } from "vitest";

import { backends, type VaultFactory, type VaultTestContext } from "./backend-factories.js";
import { bandedImage, toLosslessWebp, toPng } from "./helpers/test-images.js";

describe.each(backends)("Vault ($name backend)", ({ factory }) => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    if (cleanup) {
      await cleanup();
      cleanup = undefined;
    }
  });

  const open = async (options?: Parameters<VaultFactory>[0]): Promise<VaultTestContext> => {
    const ctx = await factory(options);
    cleanup = ctx.cleanup;
    return ctx;
  };

  it("derives the same keys and compressed bytes for the same image", async () => {
    const { vault } = await open();
    const image = encodedImage(await toPng(bandedImage(50, 40)));

    const first = await vault.prepare({ image, name: "a.png", targetEdge: 48 });
    const second = await vault.prepare({ image, name: "b.png", targetEdge: 48 });

    expect(second.contentHash).toBe(first.contentHash);
    expect(second.lookupToken).toBe(first.lookupToken);
    expect(Array.from(second.compressed.data)).toEqual(Array.from(first.compressed.data));
    expect(second.stats).toEqual(first.stats);
  });

  it("issues distinct tokens for distinct images", async () => {
    const { vault, store } = await open();

    const a = await vault.ingest({ image: rasterImage(bandedImage(20, 20)), name: "a", targetEdge: 16 });
    const b = await vault.ingest({ image: rasterImage(bandedImage(21, 20)), name: "b", targetEdge: 16 });

    expect(a.lookupToken).not.toBe(b.lookupToken);
    expect(await store.count()).toBe(2);
  });

  it("gives a re-ingested image the same token and a single record", async () => {
    const { vault, store } = await open();
    const request = { image: rasterImage(bandedImage(30, 30)), name: "tile", targetEdge: 32 };

    const first = await vault.ingest(request);
    const second = await vault.ingest(request);

    expect(first.ok && second.ok).toBe(true);
    expect(second.lookupToken).toBe(first.lookupToken);
    if (first.ok && second.ok) {
      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
    }
    expect(await store.count()).toBe(1);
  });

  it("keeps only the latest target size for a re-ingested image", async () => {
    const { vault, store } = await open();
    const image = rasterImage(bandedImage(60, 45));

    await vault.ingest({ image, name: "small", targetEdge: 16 });
    const latest = await vault.prepare({ image, name: "large", targetEdge: 100 });
    await vault.confirm(latest);

    expect(await store.count()).toBe(1);
    const result = await vault.retrieve(latest.lookupToken);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.name).toBe("large");
      expect(result.value.targetEdge).toBe(100);
      expect(result.value.format).toBe("jpeg");
      expect([result.value.compressed.width, result.value.compressed.height]).toEqual([100, 100]);
      expect(Array.from(result.value.compressedImage)).toEqual(Array.from(latest.compressed.data));
    }
  });

  it("returns the original pixels unchanged", async () => {
    const { vault } = await open();
    const original = bandedImage(37, 23);

    const ingested = await vault.ingest({
      image: encodedImage(await toPng(original)),
      name: "photo.png",
      targetEdge: 64,
    });
    const result = await vault.retrieve(ingested.lookupToken);

    expect(result.ok).toBe(true);
    if (result.ok) {
      const { original: restored } = result.value;
      expect([restored.width, restored.height, restored.channels]).toEqual([37, 23, 3]);
      expect(Array.from(restored.data)).toEqual(Array.from(original.data));
      expect(result.value.name).toBe("photo.png");
    }
  });

  it("keeps a translucent alpha channel in the original", async () => {
    const { vault } = await open();
    const original = bandedImage(12, 12, 128);

    const ingested = await vault.ingest({ image: rasterImage(original), name: "glass", targetEdge: 8 });
    const result = await vault.retrieve(ingested.lookupToken);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.original.channels).toBe(4);
      expect(Array.from(result.value.original.data)).toEqual(Array.from(original.data));
    }
  });

  it("reports the same statistics on retrieval as at ingest", async () => {
    const { vault } = await open();
    const prepared = await vault.prepare({
      image: rasterImage(bandedImage(80, 64)),
      name: "stats",
      targetEdge: 90,
    });
    await vault.confirm(prepared);

    const result = await vault.retrieve(prepared.lookupToken);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.stats).toEqual(prepared.stats);
    }
  });

  it("records the timestamp from the configured clock", async () => {
    const { vault } = await open({ now: () => new Date("2025-06-30T23:59:58Z") });
    const ingested = await vault.ingest({ image: rasterImage(bandedImage(8, 8)), name: "t", targetEdge: 8 });

    const result = await vault.retrieve(ingested.lookupToken);

    expect(result.ok && result.value.timestamp).toBe("2025-06-30 23:59:58");
  });

  it.each(["not-a-real-token", "0".repeat(64)])("denies the token %j", async (token) => {
    const { vault } = await open();
    await vault.ingest({ image: rasterImage(bandedImage(10, 10)), name: "x", targetEdge: 16 });

    const result = await vault.retrieve(token);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AuthenticationDeniedError);
    }
  });

  it("stores nothing when the upload is not an image", async () => {
    const { vault, store } = await open();

    await expect(
      vault.ingest({
        image: encodedImage(new TextEncoder().encode("hello, vault")),
        name: "notes.txt",
        targetEdge: 32,
      }),
    ).rejects.toThrow(DecodeError);
    expect(await store.count()).toBe(0);
  });

  it("stores nothing when the target size is out of range", async () => {
    const { vault, store } = await open();

    await expect(
      vault.ingest({ image: rasterImage(bandedImage(10, 10)), name: "x", targetEdge: 200 }),
    ).rejects.toThrow(InvalidTargetSizeError);
    expect(await store.count()).toBe(0);
  });

  it("stores nothing for a preview that is never confirmed", async () => {
    const { vault, store } = await open();

    const prepared = await vault.prepare({
      image: rasterImage(bandedImage(16, 16)),
      name: "draft",
      targetEdge: 16,
    });

    expect(await store.count()).toBe(0);
    expect(await store.countByContentHash(prepared.contentHash)).toBe(0);
    expect((await vault.retrieve(prepared.lookupToken)).ok).toBe(false);
  });

  it("treats the same picture in different lossless encodings as one record", async () => {
    const { vault, store } = await open();
    const picture = bandedImage(24, 18);

    const fromPng = await vault.ingest({ image: encodedImage(await toPng(picture)), name: "a.png", targetEdge: 24 });
    const fromWebp = await vault.ingest({
      image: encodedImage(await toLosslessWebp(picture)),
      name: "a.webp",
      targetEdge: 24,
    });
    const fromRaster = await vault.prepare({ image: rasterImage(picture), name: "a", targetEdge: 24 });

    expect(fromWebp.lookupToken).toBe(fromPng.lookupToken);
    expect(fromRaster.lookupToken).toBe(fromPng.lookupToken);
    expect(await store.count()).toBe(1);
  });

  it("issues different tokens for the same image under different salts", async () => {
    const image = rasterImage(bandedImage(10, 10));
    const plain = await (await open()).vault.prepare({ image, name: "x", targetEdge: 8 });
    const ctx = await factory({ salt: "test-salt" });
    try {
      const salted = await ctx.vault.prepare({ image, name: "x", targetEdge: 8 });
      expect(salted.contentHash).toBe(plain.contentHash);
      expect(salted.lookupToken).not.toBe(plain.lookupToken);
    } finally {
      await ctx.cleanup?.();
    }
  });
});
