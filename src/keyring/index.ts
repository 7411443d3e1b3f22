/**
 * Key material manager.
 *
 * Loads the evidence encryption key and the audit signing key pair from
 * `keyDir`, generating and persisting whichever is absent. Persisted files are
 * always used verbatim: nothing here ever regenerates or rotates a key that
 * exists on disk. Rotation is an out-of-band operation (replace the files),
 * and evidence encrypted under the old key is not migrated.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import {
  createPrivateKey,
  createPublicKey,
  generateKeyPair,
  randomBytes,
  type KeyObject,
} from "node:crypto";
import { KEY_BYTES } from "../crypto/encryptor";
import {
  KeyFormatError,
  KeyStorageError,
  errnoCode,
  errorMessage,
} from "../errors";
import { log } from "../utils/logger";
import type { KeyMaterial, KeyPair } from "../types";

const generateKeyPairAsync = promisify(generateKeyPair);

export const SYMMETRIC_KEY_FILE = "evidence_encryption_key.bin";
export const PRIVATE_KEY_FILE = "audit_private_key.pem";
export const PUBLIC_KEY_FILE = "audit_public_key.pem";

export const RSA_MODULUS_BITS = 2048;

/** Read a file, or `undefined` when it does not exist. */
async function readIfExists(file: string): Promise<Buffer | undefined> {
  try {
    return await fs.readFile(file);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    throw new KeyStorageError(`Cannot read key file ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Create `file` with `data` unless it already exists. Returns the bytes that
 * ended up on disk: ours, or those of a concurrent process that won the race.
 */
async function writeExclusive(file: string, data: Buffer, mode: number): Promise<Buffer> {
  try {
    await fs.writeFile(file, data, { flag: "wx", mode });
    return data;
  } catch (error) {
    if (errnoCode(error) === "EEXIST") {
      const existing = await readIfExists(file);
      if (existing) return existing;
    }
    throw new KeyStorageError(`Cannot write key file ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function parsePrivateKey(pem: Buffer, file: string): KeyObject {
  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch (error) {
    throw new KeyFormatError(`Unparsable private key ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  assertRsa(key, file);
  return key;
}

function parsePublicKey(pem: Buffer, file: string): KeyObject {
  let key: KeyObject;
  try {
    key = createPublicKey(pem);
  } catch (error) {
    throw new KeyFormatError(`Unparsable public key ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  assertRsa(key, file);
  return key;
}

function assertRsa(key: KeyObject, file: string): void {
  const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
  if (key.asymmetricKeyType !== "rsa" || bits < RSA_MODULUS_BITS) {
    throw new KeyFormatError(
      `${file} must hold an RSA key of at least ${RSA_MODULUS_BITS} bits ` +
        `(found ${key.asymmetricKeyType ?? "unknown"}, ${bits} bits)`
    );
  }
}

function spki(key: KeyObject): Buffer {
  return key.export({ type: "spki", format: "der" });
}

export class KeyMaterialManager {
  readonly keyDir: string;
  private dirReady?: Promise<void>;
  private symmetric?: Promise<Buffer>;
  private pair?: Promise<KeyPair>;

  constructor(keyDir: string) {
    this.keyDir = path.resolve(keyDir);
  }

  /** 256-bit evidence encryption key, generated on first use. */
  obtainSymmetricKey(): Promise<Buffer> {
    if (!this.symmetric) {
      this.symmetric = this.loadSymmetricKey().catch((error: unknown) => {
        this.symmetric = undefined;
        throw error;
      });
    }
    return this.symmetric;
  }

  /** RSA signing key pair, generated on first use. */
  obtainKeyPair(): Promise<KeyPair> {
    if (!this.pair) {
      this.pair = this.loadKeyPair().catch((error: unknown) => {
        this.pair = undefined;
        throw error;
      });
    }
    return this.pair;
  }

  async loadKeyMaterial(): Promise<KeyMaterial> {
    const [symmetricKey, { privateKey, publicKey }] = await Promise.all([
      this.obtainSymmetricKey(),
      this.obtainKeyPair(),
    ]);
    return { symmetricKey, privateKey, publicKey };
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = fs
        .mkdir(this.keyDir, { recursive: true, mode: 0o700 })
        .then(() => undefined)
        .catch((error: unknown) => {
          this.dirReady = undefined;
          throw new KeyStorageError(
            `Cannot create key directory ${this.keyDir}: ${errorMessage(error)}`,
            { cause: error }
          );
        });
    }
    return this.dirReady;
  }

  private async loadSymmetricKey(): Promise<Buffer> {
    await this.ensureDir();
    const file = path.join(this.keyDir, SYMMETRIC_KEY_FILE);

    let key = await readIfExists(file);
    if (!key) {
      key = await writeExclusive(file, randomBytes(KEY_BYTES), 0o600);
      log.info("Generated evidence encryption key", { file });
    }

    if (key.length !== KEY_BYTES) {
      throw new KeyFormatError(
        `${file} holds ${key.length} bytes, expected a ${KEY_BYTES}-byte AES-256 key`
      );
    }
    return key;
  }

  private async loadKeyPair(): Promise<KeyPair> {
    await this.ensureDir();
    const privateFile = path.join(this.keyDir, PRIVATE_KEY_FILE);
    const publicFile = path.join(this.keyDir, PUBLIC_KEY_FILE);

    let privatePem = await readIfExists(privateFile);
    if (!privatePem) {
      const generated = await generateKeyPairAsync("rsa", {
        modulusLength: RSA_MODULUS_BITS,
        publicExponent: 0x10001,
        privateKeyEncoding: { type: "pkcs8", format: "pem" },
        publicKeyEncoding: { type: "spki", format: "pem" },
      });
      privatePem = await writeExclusive(
        privateFile,
        Buffer.from(generated.privateKey),
        0o600
      );
      log.info("Generated RSA signing key pair", { keyDir: this.keyDir });
    }
    const privateKey = parsePrivateKey(privatePem, privateFile);

    let publicPem = await readIfExists(publicFile);
    if (!publicPem) {
      // Always derived from the private key on disk, never from a fresh pair.
      const derived = createPublicKey(privateKey).export({ type: "spki", format: "pem" });
      publicPem = await writeExclusive(
        publicFile,
        typeof derived === "string" ? Buffer.from(derived) : derived,
        0o644
      );
      log.info("Wrote public key derived from the private key", {
        file: publicFile,
      });
    }
    const publicKey = parsePublicKey(publicPem, publicFile);

    if (!spki(createPublicKey(privateKey)).equals(spki(publicKey))) {
      throw new KeyFormatError(
        `${publicFile} does not match the private key in ${privateFile}`
      );
    }
    return { privateKey, publicKey };
  }
}
