/**
 * Error taxonomy for the image vault.
 *
 * Boundary violations (bad bytes, bad target size) are thrown. Storage
 * faults and denied lookups travel as values inside result objects.
 */

/**
 * Base class for all vault errors.
 */
export class VaultError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VaultError";
  }
}

/**
 * Uploaded bytes could not be decoded as an image.
 */
export class DecodeError extends VaultError {
  constructor(message = "Uploaded data is not a readable image", options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Target edge is outside the supported size tiers.
 */
export class InvalidTargetSizeError extends VaultError {
  constructor(
    public readonly targetEdge: number,
    public readonly min: number,
    public readonly max: number,
  ) {
    super(`Target size ${targetEdge} is outside the supported range [${min}, ${max}]`);
    this.name = "InvalidTargetSizeError";
  }
}

/**
 * A value handed to persistence is neither encoded bytes nor a raster image.
 */
export class UnsupportedImageTypeError extends VaultError {
  constructor(message = "Unsupported image value", options?: ErrorOptions) {
    super(message, options);
    this.name = "UnsupportedImageTypeError";
  }
}

/**
 * Persisting a record failed (I/O, constraint, closed database).
 */
export class StoreWriteError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreWriteError";
  }
}

/**
 * Lookup failed because of a storage fault, not because the token is unknown.
 */
export class StoreReadError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreReadError";
  }
}

/**
 * Token was not accepted. The message never says whether the token was
 * malformed or simply never issued.
 */
export class AuthenticationDeniedError extends VaultError {
  constructor() {
    super("Access denied: unknown lookup token");
    this.name = "AuthenticationDeniedError";
  }
}
