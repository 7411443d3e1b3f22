/**
 * @module chain/logger
 * @description Append-only, hash-linked, signed audit log.
 *
 * ```
 * genesis ("0" x 64) ──► entry 1 ──► entry 2 ──► …
 *                     previous_hash = log_hash of the entry before
 * ```
 *
 * For every appended payload:
 *  - `log_hash`  = SHA-256 of the payload's canonical JSON (no `integrity`)
 *  - `signature` = RSA-PSS/SHA-256 over `log_hash + ":" + previous_hash`
 *
 * The cursor (`previous_hash` of the next entry) is the only mutable state.
 * `append` calls run one at a time through a single-slot queue, in call
 * order, so two entries can never claim the same predecessor. The cursor moves
 * only after the entry is signed and, when a journal is configured, written.
 */

import pLimit from "p-limit";
import { GENESIS_HASH, computeLogHash, isHex64 } from "../crypto/hasher";
import { SIGNATURE_ALGORITHM, signPair } from "../crypto/signer";
import { IntegrityError, ValidationError } from "../errors";
import { entriesAppended } from "../metrics";
import {
  AuditEntrySchema,
  AuditPayloadSchema,
  formatIssues,
  type AuditEntry,
  type AuditPayload,
} from "../schema/audit-entry";
import type { KeyPair } from "../types";
import { log } from "../utils/logger";
import type { AuditJournal } from "./journal";
import { verifyEntry, verifyEntryFull } from "./verifier";

export interface HashChainLoggerOptions {
  keys: KeyPair;
  /** Where signed entries are persisted; omit to keep the chain in memory */
  journal?: AuditJournal;
  /** Cursor to start from (default: genesis) */
  previousHash?: string;
}

export class HashChainLogger {
  private readonly keys: KeyPair;
  private readonly journal?: AuditJournal;
  private readonly limit = pLimit(1);
  private cursor: string;

  constructor(opts: HashChainLoggerOptions) {
    const start = opts.previousHash ?? GENESIS_HASH;
    if (!isHex64(start)) {
      throw new ValidationError("Invalid chain cursor", [
        "previousHash must be 64 lowercase hex characters",
      ]);
    }
    this.keys = opts.keys;
    this.journal = opts.journal;
    this.cursor = start;
  }

  /**
   * Build a logger that continues the chain recorded in `journal`. The last
   * journal entry must verify in full against `keys.publicKey`; an empty or
   * missing journal starts at genesis.
   */
  static async open(opts: { keys: KeyPair; journal?: AuditJournal }): Promise<HashChainLogger> {
    if (!opts.journal) return new HashChainLogger(opts);

    const tail = await opts.journal.last();
    if (tail === undefined) {
      log.info("Starting new audit chain at genesis", {
        journalPath: opts.journal.filePath,
      });
      return new HashChainLogger(opts);
    }

    const parsed = AuditEntrySchema.safeParse(tail);
    if (!parsed.success || !verifyEntryFull(tail, opts.keys.publicKey)) {
      throw new IntegrityError(
        `Last entry of audit journal ${opts.journal.filePath} failed verification; ` +
          "refusing to extend a chain whose head cannot be trusted"
      );
    }

    log.info("Resuming audit chain from journal", {
      journalPath: opts.journal.filePath,
      previousHash: parsed.data.integrity.log_hash,
    });
    return new HashChainLogger({ ...opts, previousHash: parsed.data.integrity.log_hash });
  }

  /** `previous_hash` the next appended entry will carry. */
  get previousHash(): string {
    return this.cursor;
  }

  /** Number of appends waiting for their turn. */
  get pending(): number {
    return this.limit.pendingCount + this.limit.activeCount;
  }

  append(payload: AuditPayload): Promise<AuditEntry> {
    return this.limit(() => this.appendNow(payload));
  }

  /** Signature-only check; see {@link verifyEntry}. */
  verify(entry: unknown): boolean {
    return verifyEntry(entry, this.keys.publicKey);
  }

  /** Signature check plus `log_hash` recomputation; see {@link verifyEntryFull}. */
  verifyFull(entry: unknown): boolean {
    return verifyEntryFull(entry, this.keys.publicKey);
  }

  private async appendNow(payload: AuditPayload): Promise<AuditEntry> {
    const parsed = AuditPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError("Invalid audit payload", formatIssues(parsed.error));
    }

    const previousHash = this.cursor;
    const logHash = computeLogHash(parsed.data);
    const entry: AuditEntry = {
      ...parsed.data,
      integrity: {
        log_hash: logHash,
        previous_hash: previousHash,
        signature: signPair(this.keys.privateKey, logHash, previousHash),
        signature_algorithm: SIGNATURE_ALGORITHM,
      },
    };

    if (this.journal) await this.journal.append(entry);

    this.cursor = logHash;
    entriesAppended.inc();
    log.debug("Audit entry appended", {
      id: entry.id,
      logHash,
      previousHash,
    });
    return entry;
  }
}
