/**
 * Error hierarchy for prompt-ledger.
 *
 * Every error raised on purpose by this package extends
 * {@link PromptLedgerError} and carries a stable `code`, so callers can branch
 * on `err.code` without importing the concrete classes.
 */

export type PromptLedgerErrorCode =
  | "CONFIG_INVALID"
  | "KEY_STORAGE"
  | "KEY_FORMAT"
  | "EVIDENCE_STORAGE"
  | "INTEGRITY"
  | "VALIDATION"
  | "JOURNAL";

export class PromptLedgerError extends Error {
  readonly code: PromptLedgerErrorCode;

  constructor(
    code: PromptLedgerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/** Key directory or key file could not be created or written. Fatal at startup. */
export class KeyStorageError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("KEY_STORAGE", message, options);
  }
}

/** Persisted key material exists but cannot be used. Fatal at startup. */
export class KeyFormatError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("KEY_FORMAT", message, options);
  }
}

export class EvidenceStorageError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EVIDENCE_STORAGE", message, options);
  }
}

export class IntegrityError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTEGRITY", message, options);
  }
}

export class ValidationError extends PromptLedgerError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super("VALIDATION", `${message}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class JournalError extends PromptLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("JOURNAL", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Narrow an unknown thrown value to a Node system error code, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
