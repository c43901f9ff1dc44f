/**
 * Primitive Types
 *
 * Identities and digests shared by every component.
 *
 * Rules:
 * - A principal owns exactly one intent, trigger, execution state and treasury
 * - Digests are lowercase hex SHA-256 strings (64 chars)
 * - Amounts are bigint, never floating point
 */

import { createHash } from "node:crypto";

/**
 * The identity whose legacy is being administered.
 */
export type Principal = string;

/**
 * Any caller identity (operator, signer, oracle, coordinator).
 */
export type Identity = string;

/**
 * Lowercase hex SHA-256 digest.
 */
export type Digest = string;

/**
 * Opaque storage locator (e.g. "ipfs://..."), never dereferenced here.
 */
export type StorageUri = string;

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export function isDigest(value: unknown): value is Digest {
  return typeof value === "string" && DIGEST_PATTERN.test(value);
}

/**
 * SHA-256 of a UTF-8 string, hex-encoded.
 */
export function sha256Hex(input: string): Digest {
  return createHash("sha256").update(input).digest("hex");
}
