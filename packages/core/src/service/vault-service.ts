/**
 * Vault service: ingest and retrieval orchestration.
 *
 * Ingest is split in two. `prepare` decodes, derives keys and builds the
 * compressed preview without touching the store; `confirm` persists a
 * prepared ingest. An ingest that is prepared but never confirmed leaves no
 * trace.
 *
 *   uploaded -> key-derived -> preview-compressed -> persisted
 *                                                 \-> abandoned
 */

import {
  type CompressedImage,
  type ImageFormat,
  assertTargetEdge,
  compressImage,
  selectCompressionTier,
} from "../compression/compressor.js";
import {
  AuthenticationDeniedError,
  StoreReadError,
  StoreWriteError,
  VaultError,
} from "../errors/vault-errors.js";
import {
  decodeImage,
  type ImageInput,
  type RasterImage,
  rasterImage,
  toLosslessBytes,
  toRasterImage,
} from "../image/raster-image.js";
import { type ImageTransform, resizeTransform } from "../image/transform.js";
import {
  type ContentHash,
  DEFAULT_TOKEN_SALT,
  deriveKeys,
  type LookupToken,
} from "../keys/key-deriver.js";
import type { VaultLogger } from "../logger.js";
import {
  formatTimestamp,
  type LookupResult,
  type PutResult,
  type VaultStore,
} from "../store/vault-store.js";

export type IngestState =
  | "uploaded"
  | "key-derived"
  | "preview-compressed"
  | "persisted"
  | "abandoned";

export interface VaultServiceOptions {
  /** Salt mixed into every lookup token (default: DEFAULT_TOKEN_SALT) */
  salt?: string;
  /** Produces the rendition to compress (default: plain resize) */
  transform?: ImageTransform;
  /** Clock used for record timestamps */
  now?: () => Date;
  logger?: VaultLogger;
}

export interface IngestRequest {
  image: ImageInput;
  name: string;
  targetEdge: number;
}

export interface CompressionStats {
  originalBytes: number;
  compressedBytes: number;
  /** originalBytes / compressedBytes */
  ratio: number;
  originalKb: number;
  compressedKb: number;
  format: ImageFormat;
}

export interface PreparedIngest {
  readonly state: "preview-compressed";
  readonly contentHash: ContentHash;
  readonly lookupToken: LookupToken;
  readonly name: string;
  readonly targetEdge: number;
  readonly original: RasterImage;
  /** Lossless encoding of the original, as it will be stored */
  readonly originalPng: Uint8Array;
  readonly preview: RasterImage;
  readonly compressed: CompressedImage;
  readonly stats: CompressionStats;
}

export type IngestResult =
  | {
      ok: true;
      state: "persisted";
      id: number;
      lookupToken: LookupToken;
      stats: CompressionStats;
    }
  | {
      ok: false;
      state: "preview-compressed";
      error: StoreWriteError;
      lookupToken: LookupToken;
      stats: CompressionStats;
    };

export interface RetrievedImage {
  name: string;
  timestamp: string;
  lookupToken: LookupToken;
  targetEdge: number;
  original: RasterImage;
  originalPng: Uint8Array;
  compressed: RasterImage;
  compressedImage: Uint8Array;
  format: ImageFormat;
  stats: CompressionStats;
}

export type RetrieveResult =
  | { ok: true; value: RetrievedImage }
  | { ok: false; error: AuthenticationDeniedError | StoreReadError };

const DEFAULT_NAME = "image";
const TOKEN_PATTERN = /^[0-9a-f]{64}$/;

export function computeStats(
  originalBytes: number,
  compressedBytes: number,
  format: ImageFormat,
): CompressionStats {
  return {
    originalBytes,
    compressedBytes,
    ratio: compressedBytes > 0 ? originalBytes / compressedBytes : 0,
    originalKb: toKb(originalBytes),
    compressedKb: toKb(compressedBytes),
    format,
  };
}

function toKb(bytes: number): number {
  return Math.round((bytes / 1024) * 100) / 100;
}

export class VaultService {
  private readonly salt: string;
  private readonly transform: ImageTransform;
  private readonly now: () => Date;
  private readonly logger?: VaultLogger;

  constructor(
    private readonly store: VaultStore,
    options: VaultServiceOptions = {},
  ) {
    const {
      salt = DEFAULT_TOKEN_SALT,
      transform = resizeTransform,
      now = () => new Date(),
      logger,
    } = options;
    this.salt = salt;
    this.transform = transform;
    this.now = now;
    this.logger = logger;
  }

  /**
   * Build the token and compressed preview for an upload. Touches no store.
   *
   * @throws InvalidTargetSizeError before any decoding work
   * @throws DecodeError when the upload is not an image
   */
  async prepare(request: IngestRequest): Promise<PreparedIngest> {
    const { targetEdge } = request;
    assertTargetEdge(targetEdge);

    const original = await toRasterImage(request.image);
    const { contentHash, lookupToken } = await deriveKeys(original, this.salt);
    this.logger?.debug?.(`Derived content hash ${contentHash}`);

    const originalPng = await toLosslessBytes(rasterImage(original));
    const preview = await this.transform.infer(original, targetEdge);
    const compressed = await compressImage(preview, targetEdge);

    return {
      state: "preview-compressed",
      contentHash,
      lookupToken,
      name: request.name.trim() || DEFAULT_NAME,
      targetEdge,
      original,
      originalPng,
      preview,
      compressed,
      stats: computeStats(originalPng.length, compressed.data.length, compressed.format),
    };
  }

  /**
   * Persist a prepared ingest. A failed write is returned, not thrown, and
   * leaves the store as it was.
   */
  async confirm(prepared: PreparedIngest): Promise<IngestResult> {
    const { lookupToken, stats } = prepared;

    let result: PutResult;
    try {
      result = await this.store.put({
        contentHash: prepared.contentHash,
        originalImage: prepared.originalPng,
        compressedImage: prepared.compressed.data,
        lookupToken,
        name: prepared.name,
        timestamp: formatTimestamp(this.now()),
        compressedSize: prepared.targetEdge,
      });
    } catch (error) {
      result = { ok: false, error: new StoreWriteError("Failed to store image", { cause: error }) };
    }

    if (!result.ok) {
      this.logger?.warn?.(`Failed to store ${prepared.name}: ${result.error.message}`);
      return { ok: false, state: "preview-compressed", error: result.error, lookupToken, stats };
    }

    this.logger?.info?.(`Stored ${prepared.name} as record ${result.id}`);
    return { ok: true, state: "persisted", id: result.id, lookupToken, stats };
  }

  /**
   * Prepare and immediately confirm.
   */
  async ingest(request: IngestRequest): Promise<IngestResult> {
    return this.confirm(await this.prepare(request));
  }

  /**
   * Look up a record by token and rebuild its images and statistics.
   *
   * Malformed and unknown tokens produce the same AuthenticationDeniedError.
   */
  async retrieve(token: string): Promise<RetrieveResult> {
    const candidate = token.trim();
    if (!TOKEN_PATTERN.test(candidate)) {
      return { ok: false, error: new AuthenticationDeniedError() };
    }

    let lookup: LookupResult;
    try {
      lookup = await this.store.getByToken(candidate);
    } catch (error) {
      lookup = {
        status: "error",
        error: new StoreReadError("Failed to read vault", { cause: error }),
      };
    }

    switch (lookup.status) {
      case "not-found":
        return { ok: false, error: new AuthenticationDeniedError() };
      case "error":
        this.logger?.error?.(`Vault lookup failed: ${lookup.error.message}`);
        return { ok: false, error: lookup.error };
      case "found":
        break;
    }

    const { record } = lookup;
    try {
      const original = await decodeImage(record.originalImage);
      const compressed = await decodeImage(record.compressedImage);
      const format = selectCompressionTier(record.compressedSize).format;

      // Size is recomputed from the original rather than trusted from storage
      const preview = await this.transform.infer(original, record.compressedSize);
      const recompressed = await compressImage(preview, record.compressedSize);

      return {
        ok: true,
        value: {
          name: record.name,
          timestamp: record.timestamp,
          lookupToken: record.lookupToken,
          targetEdge: record.compressedSize,
          original,
          originalPng: record.originalImage,
          compressed,
          compressedImage: record.compressedImage,
          format,
          stats: computeStats(record.originalImage.length, recompressed.data.length, format),
        },
      };
    } catch (error) {
      if (!(error instanceof VaultError)) throw error;
      this.logger?.error?.(`Record ${record.id} is unreadable: ${error.message}`);
      return {
        ok: false,
        error: new StoreReadError(`Stored record ${record.id} is unreadable`, { cause: error }),
      };
    }
  }
}
