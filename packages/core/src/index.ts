/**
 * Content-addressed image vault core
 *
 * Key derivation, size-tiered compression, the vault store contract and the
 * ingest/retrieval service.
 *
 * @example
 * ```typescript
 * import { encodedImage, VaultService } from "@pixvault/core";
 * import { MemoryVaultStore } from "@pixvault/store-mem";
 *
 * const vault = new VaultService(new MemoryVaultStore());
 * const prepared = await vault.prepare({ image: encodedImage(bytes), name: "cat.png", targetEdge: 64 });
 * const stored = await vault.confirm(prepared);
 * const found = await vault.retrieve(prepared.lookupToken);
 * ```
 */

export * from "./compression/index.js";
export * from "./errors/vault-errors.js";
export * from "./image/index.js";
export * from "./keys/index.js";
export * from "./logger.js";
export * from "./service/index.js";
export * from "./store/index.js";
