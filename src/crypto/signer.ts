import { constants, sign, verify, type KeyObject } from "node:crypto";
import { performance } from "node:perf_hooks";
import { signHist } from "../metrics";
import { log } from "../utils/logger";

export const SIGNATURE_ALGORITHM = "RSA-PSS-SHA256";

const HEX = /^(?:[0-9a-f]{2})+$/;

/** The exact bytes covered by an entry signature. */
export function signaturePayload(logHash: string, previousHash: string): Buffer {
  return Buffer.from(`${logHash}:${previousHash}`, "utf8");
}

/**
 * RSA-PSS with SHA-256 (MGF1-SHA-256) and the maximum salt length the key
 * allows. Returns the signature as lowercase hex.
 */
export function signPair(
  privateKey: KeyObject,
  logHash: string,
  previousHash: string
): string {
  const t0 = performance.now();
  try {
    return sign("sha256", signaturePayload(logHash, previousHash), {
      key: privateKey,
      padding: constants.RSA_PKCS1_PSS_PADDING,
      saltLength: constants.RSA_PSS_SALTLEN_MAX_SIGN,
    }).toString("hex");
  } finally {
    signHist.observe(performance.now() - t0);
  }
}

/**
 * Check a hex signature over `logHash:previousHash`. Any malformed input or
 * crypto failure is a `false`, never an exception.
 */
export function verifyPair(
  publicKey: KeyObject,
  logHash: string,
  previousHash: string,
  signatureHex: string
): boolean {
  if (!HEX.test(signatureHex)) return false;
  try {
    return verify(
      "sha256",
      signaturePayload(logHash, previousHash),
      {
        key: publicKey,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_AUTO,
      },
      Buffer.from(signatureHex, "hex")
    );
  } catch (error) {
    log.debug("Signature verification raised", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
