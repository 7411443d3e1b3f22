/**
 * @fileoverview Encrypted, content-addressed evidence store with a 7-day TTL.
 *
 * Layout on disk:
 *
 * ```
 * <root>/
 *   ├── 3f2a9c1e/
 *   │   ├── 3f2a9c1e…(64 hex).enc     nonce(12) || tag(16) || ciphertext
 *   │   └── .sweep-<uuid>             blob claimed by a running sweep
 *   └── .tmp-<uuid>                   in-flight write, renamed when complete
 * ```
 *
 * The shard directory is the first 8 hex characters of the plaintext's
 * SHA-256, which bounds the fan-out of any single directory. Each artifact's
 * modification time is the latest `created_at` of any record pointing at it,
 * set on the temp file before it is published; the sweeper reads it back as
 * the artifact's creation time.
 *
 * Distinct contents never share a path. A second write of identical content
 * replaces the blob through an atomic rename, so readers see either the old
 * or the new blob, both of which decrypt to the same plaintext. Publishing is
 * serialized per store instance; the sweeper takes no lock and instead claims
 * a blob by renaming it before judging and deleting it.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream, type Dirent } from "node:fs";
import { createHash, randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import pLimit from "p-limit";
import type { Readable } from "node:stream";
import {
  ENCRYPTION_ALGORITHM,
  HEADER_BYTES,
  NONCE_BYTES,
  TAG_BYTES,
  createBlobCipher,
  decryptBlob,
} from "../crypto/encryptor";
import { isHex64, sha256Hex } from "../crypto/hasher";
import {
  EvidenceStorageError,
  IntegrityError,
  errnoCode,
  errorMessage,
} from "../errors";
import { encryptHist, evidenceStored, evidenceSwept, sweepFailures } from "../metrics";
import type { EvidenceRecord } from "../schema/audit-entry";
import type { SweepFailure, SweepReport } from "../types";
import { log } from "../utils/logger";

export const TTL_DAYS = 7;
export const DAY_MS = 24 * 60 * 60 * 1000;

const SHARD_CHARS = 8;
const BLOB_SUFFIX = ".enc";
const TEMP_PREFIX = ".tmp-";
const SWEEP_PREFIX = ".sweep-";

export interface EvidenceStoreOptions {
  /** Store root; created on demand */
  root: string;
  /** 256-bit key from the key material manager */
  key: Buffer;
  /** Source of `created_at` and of the sweep's default `now` */
  clock?: () => Date;
}

export type EvidenceSource = Buffer | Readable;

/** Whole days elapsed between `from` and `to`, rounded down. */
export function ageInDays(fromMs: number, toMs: number): number {
  return Math.floor((toMs - fromMs) / DAY_MS);
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new EvidenceStorageError(
    `Evidence stream produced an unsupported chunk (${typeof chunk})`
  );
}

export class EvidenceStore {
  readonly root: string;
  private readonly key: Buffer;
  private readonly clock: () => Date;
  private readonly publish = pLimit(1);

  constructor(opts: EvidenceStoreOptions) {
    this.root = path.resolve(opts.root);
    this.key = opts.key;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** `<root>/<hash[0:8]>/<hash>.enc` */
  pathFor(contentHash: string): string {
    if (!isHex64(contentHash)) {
      throw new EvidenceStorageError(`Not a SHA-256 content hash: ${contentHash}`);
    }
    return path.join(
      this.root,
      contentHash.slice(0, SHARD_CHARS),
      `${contentHash}${BLOB_SUFFIX}`
    );
  }

  /**
   * Hash, encrypt and persist `content`. Streams are consumed once, in
   * bounded memory: hashing and encryption run over the same chunks and the
   * ciphertext goes straight to disk.
   */
  async store(content: EvidenceSource): Promise<EvidenceRecord> {
    const createdAt = this.clock();
    const t0 = performance.now();

    try {
      await fs.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new EvidenceStorageError(
        `Cannot create evidence store ${this.root}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const tmp = path.join(this.root, `${TEMP_PREFIX}${randomUUID()}`);
    try {
      const { contentHash, size } = await this.writeBlob(tmp, content);
      const storagePath = this.pathFor(contentHash);

      await fs.mkdir(path.dirname(storagePath), { recursive: true });
      await this.publish(() => this.publishBlob(tmp, storagePath, createdAt));

      evidenceStored.inc();
      log.verbose("Evidence stored", {
        contentHash,
        sizeBytes: size,
        storagePath,
      });

      return {
        content_hash: contentHash,
        storage_path: storagePath,
        encryption_algorithm: ENCRYPTION_ALGORITHM,
        size_bytes: size,
        created_at: createdAt.toISOString(),
        expires_at: new Date(createdAt.getTime() + TTL_DAYS * DAY_MS).toISOString(),
      };
    } catch (error) {
      await this.discardTemp(tmp);
      if (error instanceof EvidenceStorageError) throw error;
      throw new EvidenceStorageError(`Failed to store evidence: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      encryptHist.observe(performance.now() - t0);
    }
  }

  /** Stream a file from disk into the store. */
  async storeFile(filePath: string): Promise<EvidenceRecord> {
    try {
      await fs.access(filePath);
    } catch (error) {
      throw new EvidenceStorageError(
        `Cannot read evidence file ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return this.store(createReadStream(filePath, { highWaterMark: 64 * 1024 }));
  }

  /**
   * Decrypt the artifact behind `record`. The location is re-derived from
   * `content_hash`; the decrypted bytes must hash back to it.
   */
  async retrieve(record: Pick<EvidenceRecord, "content_hash" | "storage_path">): Promise<Buffer> {
    if (!isHex64(record.content_hash)) {
      throw new IntegrityError(`Malformed content hash in evidence record`);
    }
    const blobPath = this.pathFor(record.content_hash);
    if (path.resolve(record.storage_path) !== blobPath) {
      throw new IntegrityError(
        `Evidence record storage_path ${record.storage_path} does not match its content hash`
      );
    }

    let blob: Buffer;
    try {
      blob = await fs.readFile(blobPath);
    } catch (error) {
      throw new EvidenceStorageError(
        errnoCode(error) === "ENOENT"
          ? `Evidence ${record.content_hash} not found (expired or never stored)`
          : `Cannot read evidence ${blobPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const plain = decryptBlob(this.key, blob);
    if (sha256Hex(plain) !== record.content_hash) {
      throw new IntegrityError(
        `Decrypted evidence does not match content hash ${record.content_hash}`
      );
    }
    return plain;
  }

  /**
   * Delete every artifact whose age in whole days is at least {@link TTL_DAYS}.
   * Failures are collected per file; the sweep always runs to the end.
   */
  async sweepExpired(now: Date = this.clock()): Promise<SweepReport> {
    const report: SweepReport = { count: 0, deleted: [], failures: [] };
    const nowMs = now.getTime();

    const entries = await this.listDir(this.root, report.failures);
    for (const entry of entries) {
      const entryPath = path.join(this.root, entry.name);

      if (entry.isFile() && entry.name.startsWith(TEMP_PREFIX)) {
        // abandoned in-flight write
        await this.sweepFile(entryPath, nowMs, report);
        continue;
      }
      if (!entry.isDirectory()) continue;

      const files = await this.listDir(entryPath, report.failures);
      for (const file of files) {
        if (!file.isFile()) continue;
        const filePath = path.join(entryPath, file.name);
        if (file.name.endsWith(BLOB_SUFFIX)) {
          await this.sweepBlob(filePath, nowMs, report);
        } else if (file.name.startsWith(SWEEP_PREFIX)) {
          // left behind by an interrupted sweep
          await this.sweepFile(filePath, nowMs, report);
        }
      }
    }

    if (report.count || report.failures.length) {
      log.info("Evidence sweep finished", {
        deleted: report.count,
        failures: report.failures.length,
      });
    }
    return report;
  }

  /**
   * Run {@link sweepExpired} every `intervalMs` without keeping the process
   * alive. Returns a function that stops the timer.
   */
  startSweeper(intervalMs = 60 * 60 * 1000): () => void {
    const timer = setInterval(() => {
      this.sweepExpired().catch((error: unknown) => {
        log.error("Evidence sweep failed", { error: errorMessage(error) });
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private async writeBlob(
    tmp: string,
    content: EvidenceSource
  ): Promise<{ contentHash: string; size: number }> {
    const { nonce, cipher } = createBlobCipher(this.key);
    const hash = createHash("sha256");
    const chunks: Iterable<unknown> | AsyncIterable<unknown> = Buffer.isBuffer(content)
      ? [content]
      : content;

    const handle = await fs.open(tmp, "wx", 0o600);
    try {
      // tag slot is filled in once the cipher is finalised
      await handle.write(Buffer.concat([nonce, Buffer.alloc(TAG_BYTES)]), 0, HEADER_BYTES, 0);
      let position = HEADER_BYTES;
      let size = 0;

      for await (const chunk of chunks) {
        const buf = toBuffer(chunk);
        hash.update(buf);
        size += buf.length;
        const ct = cipher.update(buf);
        if (ct.length) {
          await handle.write(ct, 0, ct.length, position);
          position += ct.length;
        }
      }

      const tail = cipher.final();
      if (tail.length) await handle.write(tail, 0, tail.length, position);
      await handle.write(cipher.getAuthTag(), 0, TAG_BYTES, NONCE_BYTES);
      await handle.sync();

      return { contentHash: hash.digest("hex"), size };
    } finally {
      await handle.close();
    }
  }

  /**
   * Move a finished temp blob to its address. The published mtime is the later
   * of `createdAt` and the mtime of the blob being replaced: it never moves
   * backwards.
   */
  private async publishBlob(tmp: string, storagePath: string, createdAt: Date): Promise<void> {
    let mtime = createdAt;
    try {
      const existing = await fs.stat(storagePath);
      if (existing.mtimeMs > createdAt.getTime()) mtime = existing.mtime;
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") throw error;
    }
    await fs.utimes(tmp, mtime, mtime);
    await fs.rename(tmp, storagePath);
  }

  private async discardTemp(tmp: string): Promise<void> {
    try {
      await fs.unlink(tmp);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        log.warn("Could not remove temporary evidence file", {
          path: tmp,
          error: errorMessage(error),
        });
      }
    }
  }

  private async listDir(
    dir: string,
    failures: SweepFailure[]
  ): Promise<Dirent[]> {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        failures.push({ path: dir, error: errorMessage(error) });
        sweepFailures.inc();
        log.warn("Cannot list evidence directory", { path: dir, error: errorMessage(error) });
      }
      return [];
    }
  }

  /**
   * A store may replace the blob between the first stat and the deletion, so
   * the blob is first renamed to a private name and judged again there. A blob
   * that turns out to be fresh is linked back unless a newer one has already
   * taken its address.
   */
  private async sweepBlob(file: string, nowMs: number, report: SweepReport): Promise<void> {
    const claimed = path.join(path.dirname(file), `${SWEEP_PREFIX}${randomUUID()}`);
    try {
      if (ageInDays((await fs.stat(file)).mtimeMs, nowMs) < TTL_DAYS) return;

      await fs.rename(file, claimed);
      if (ageInDays((await fs.stat(claimed)).mtimeMs, nowMs) < TTL_DAYS) {
        await this.putBack(claimed, file);
        log.verbose("Evidence was re-stored during the sweep; kept", { path: file });
        return;
      }

      await fs.unlink(claimed);
      this.recordDeletion(file, report);
    } catch (error) {
      this.recordSweepError(file, error, report);
    }
  }

  private async putBack(claimed: string, file: string): Promise<void> {
    try {
      await fs.link(claimed, file);
    } catch (error) {
      // EEXIST: a newer blob of the same content is already in place
      if (errnoCode(error) !== "EEXIST") throw error;
    }
    await fs.unlink(claimed);
  }

  private async sweepFile(file: string, nowMs: number, report: SweepReport): Promise<void> {
    try {
      if (ageInDays((await fs.stat(file)).mtimeMs, nowMs) < TTL_DAYS) return;
      await fs.unlink(file);
      this.recordDeletion(file, report);
    } catch (error) {
      this.recordSweepError(file, error, report);
    }
  }

  private recordDeletion(file: string, report: SweepReport): void {
    report.count++;
    report.deleted.push(file);
    evidenceSwept.inc();
    log.verbose("Deleted expired evidence", { path: file });
  }

  private recordSweepError(file: string, error: unknown, report: SweepReport): void {
    // already gone: another sweeper got there first
    if (errnoCode(error) === "ENOENT") return;
    report.failures.push({ path: file, error: errorMessage(error) });
    sweepFailures.inc();
    log.warn("Failed to delete expired evidence", {
      path: file,
      error: errorMessage(error),
    });
  }
}
