/**
 * @fileoverview SHA-256 helpers shared by the evidence store and the chain.
 *
 * Content hashes, evidence addresses and `log_hash` values are all lowercase
 * hex SHA-256 (64 characters). Audit payloads are hashed over their canonical
 * JSON: object keys sorted, no insignificant whitespace, so the same logical
 * content always yields the same digest whatever order its fields were built in.
 */

import { createHash } from "node:crypto";
import stringify from "json-stable-stringify";
import { ValidationError } from "../errors";

/** `previous_hash` of the first entry of every chain. */
export const GENESIS_HASH = "0".repeat(64);

const HEX64 = /^[0-9a-f]{64}$/;

export function isHex64(value: unknown): value is string {
  return typeof value === "string" && HEX64.test(value);
}

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Deterministic, key-sorted JSON.
 *
 * @example
 * ```typescript
 * canonicalJSON({ b: 2, a: { d: 1, c: [3, 1] } }) // '{"a":{"c":[3,1],"d":1},"b":2}'
 * ```
 */
export function canonicalJSON(value: unknown): string {
  const canon = stringify(value);
  if (canon === undefined) {
    throw new ValidationError("Cannot canonicalise payload", [
      "value is not JSON-serialisable",
    ]);
  }
  return canon;
}

/** SHA-256 over the canonical JSON of `value`. */
export function computeLogHash(value: unknown): string {
  return sha256Hex(canonicalJSON(value));
}
