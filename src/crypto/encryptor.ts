/**
 * AES-256-GCM blob format used by the evidence store:
 *
 * ```
 * nonce (12 bytes) || authentication tag (16 bytes) || ciphertext
 * ```
 *
 * The blob carries everything needed to decrypt and authenticate it later;
 * the only other input is the store's symmetric key.
 */

import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  type CipherGCM,
} from "node:crypto";
import { IntegrityError, KeyFormatError } from "../errors";

export const ENCRYPTION_ALGORITHM = "AES-256-GCM";
export const KEY_BYTES = 32;
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;
export const HEADER_BYTES = NONCE_BYTES + TAG_BYTES;

function assertKey(key: Buffer): void {
  if (key.length !== KEY_BYTES) {
    throw new KeyFormatError(
      `AES-256-GCM key must be ${KEY_BYTES} bytes, got ${key.length}`
    );
  }
}

/**
 * A cipher bound to a fresh random nonce. Every call draws a new nonce, so
 * two blobs never share one under the same key.
 */
export function createBlobCipher(key: Buffer): { nonce: Buffer; cipher: CipherGCM } {
  assertKey(key);
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv("aes-256-gcm", key, nonce, {
    authTagLength: TAG_BYTES,
  });
  return { nonce, cipher };
}

/** Decrypt and authenticate a blob; tampering surfaces as {@link IntegrityError}. */
export function decryptBlob(key: Buffer, blob: Buffer): Buffer {
  assertKey(key);
  if (blob.length < HEADER_BYTES) {
    throw new IntegrityError(
      `Encrypted blob is ${blob.length} bytes, shorter than its ${HEADER_BYTES}-byte header`
    );
  }

  const nonce = blob.subarray(0, NONCE_BYTES);
  const tag = blob.subarray(NONCE_BYTES, HEADER_BYTES);
  const ciphertext = blob.subarray(HEADER_BYTES);

  const decipher = createDecipheriv("aes-256-gcm", key, nonce, {
    authTagLength: TAG_BYTES,
  });
  decipher.setAuthTag(tag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new IntegrityError("Evidence authentication failed (tampered or corrupted)", {
      cause: error,
    });
  }
}
