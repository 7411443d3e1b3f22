/**
 * Offline verification of audit entries. Needs only the public key, so an
 * auditor can check a journal without access to the signing key.
 *
 * Two strengths:
 *  - {@link verifyEntry} checks the signature over `log_hash:previous_hash`.
 *    It does not look at the entry body, so altered content with the
 *    original `log_hash` still passes it.
 *  - {@link verifyEntryFull} also recomputes `log_hash` from the entry body.
 */

import type { KeyObject } from "node:crypto";
import { GENESIS_HASH, computeLogHash } from "../crypto/hasher";
import { SIGNATURE_ALGORITHM, verifyPair } from "../crypto/signer";
import { IntegritySchema, type Integrity } from "../schema/audit-entry";
import { log } from "../utils/logger";

export interface ChainVerification {
  valid: boolean;
  /** Entries that passed before the walk stopped */
  checked: number;
  /** Index of the first entry that failed */
  brokenAt?: number;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readIntegrity(entry: unknown): Integrity | undefined {
  if (!isRecord(entry)) return undefined;
  const parsed = IntegritySchema.safeParse(entry["integrity"]);
  return parsed.success ? parsed.data : undefined;
}

/** `log_hash` as it should be for the entry's current content. */
export function recomputeLogHash(entry: Record<string, unknown>): string {
  const content = Object.fromEntries(
    Object.entries(entry).filter(([key]) => key !== "integrity")
  );
  return computeLogHash(content);
}

/** Signature-only check. Never throws. */
export function verifyEntry(entry: unknown, publicKey: KeyObject): boolean {
  const integrity = readIntegrity(entry);
  if (!integrity || integrity.signature_algorithm !== SIGNATURE_ALGORITHM) {
    return false;
  }
  return verifyPair(
    publicKey,
    integrity.log_hash,
    integrity.previous_hash,
    integrity.signature
  );
}

/** Signature check plus recomputation of `log_hash` from content. Never throws. */
export function verifyEntryFull(entry: unknown, publicKey: KeyObject): boolean {
  if (!isRecord(entry) || !verifyEntry(entry, publicKey)) return false;
  const integrity = readIntegrity(entry);
  if (!integrity) return false;

  try {
    return recomputeLogHash(entry) === integrity.log_hash;
  } catch (error) {
    log.debug("Entry content could not be canonicalised", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Walk a sequence of entries in chain order: the first must link to
 * `anchor` (genesis by default), every later one to its predecessor's
 * `log_hash`, and each must pass {@link verifyEntryFull}.
 */
export function verifyChain(
  entries: readonly unknown[],
  publicKey: KeyObject,
  anchor: string = GENESIS_HASH
): ChainVerification {
  let expectedPrevious = anchor;

  for (let i = 0; i < entries.length; i++) {
    const integrity = readIntegrity(entries[i]);
    if (!integrity) {
      return { valid: false, checked: i, brokenAt: i, reason: "malformed integrity block" };
    }
    if (integrity.previous_hash !== expectedPrevious) {
      return {
        valid: false,
        checked: i,
        brokenAt: i,
        reason: "previous_hash does not match the preceding log_hash",
      };
    }
    if (!verifyEntryFull(entries[i], publicKey)) {
      return {
        valid: false,
        checked: i,
        brokenAt: i,
        reason: "signature or content hash mismatch",
      };
    }
    expectedPrevious = integrity.log_hash;
  }

  return { valid: true, checked: entries.length };
}
