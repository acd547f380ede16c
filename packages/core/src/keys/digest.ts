/**
 * SHA-256 digests through the Web Crypto API.
 */

/**
 * Compute the SHA-256 digest of data
 *
 * @returns 32-byte digest
 */
export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  // Copy so the digest sees exactly this view, not the whole backing buffer
  const hashBuffer = await globalThis.crypto.subtle.digest("SHA-256", new Uint8Array(data));
  return new Uint8Array(hashBuffer);
}

/**
 * Compute the SHA-256 digest of data as a lowercase hex string
 */
export async function sha256Hex(data: Uint8Array): Promise<string> {
  return bytesToHex(await sha256(data));
}

/**
 * Convert Uint8Array to hex string
 *
 * @returns Hexadecimal string (lowercase)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}
