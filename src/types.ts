import type { KeyObject } from "node:crypto";

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

export interface PromptLedgerInit {
  /** Root of the encrypted evidence store */
  evidenceDir: string;
  /** Directory holding the symmetric key and the signing key pair */
  keyDir: string;
  /** JSON-lines audit journal; `false` keeps the chain in memory only */
  journalPath: string | false;
  logLevel: LogLevel;
}

export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

export type JSONObject = { [key: string]: JSONValue };

/** Loaded once at startup and handed to every component that needs it. */
export interface KeyMaterial {
  /** 256-bit AES key for the evidence store */
  symmetricKey: Buffer;
  privateKey: KeyObject;
  publicKey: KeyObject;
}

export interface KeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

export interface PiiDetectionResult {
  maskedText: string;
  /** Embedded verbatim under `request.pii_detection` */
  metadata: JSONObject;
}

/**
 * Free-text PII detector supplied by the host application (regex baseline,
 * a cloud classifier, ...). prompt-ledger never ships one of its own.
 */
export interface PiiDetector {
  detect(
    text: string,
    language: string
  ): PiiDetectionResult | Promise<PiiDetectionResult>;
}

export interface SweepFailure {
  path: string;
  error: string;
}

export interface SweepReport {
  /** Number of artifacts deleted by this sweep */
  count: number;
  deleted: string[];
  failures: SweepFailure[];
}

export interface WrapOpts {
  method: string;
  modelName: string;
  /** Language hint handed to the PII detector (default: "en") */
  language?: string;
  /** Returns the trace id to record the call under */
  traceId: () => string;
}
