export { initPromptLedger, resolveConfig, ConfigManager } from "./config";
export { KeyMaterialManager } from "./keyring";
export { EvidenceStore, TTL_DAYS, ageInDays } from "./evidence/store";
export { HashChainLogger } from "./chain/logger";
export { AuditJournal } from "./chain/journal";
export {
  verifyChain,
  verifyEntry,
  verifyEntryFull,
  recomputeLogHash,
} from "./chain/verifier";
export { assembleEntry } from "./assembler";
export { AuditTrail } from "./trail";
export { wrapLLM } from "./wrapper";
export { GENESIS_HASH, canonicalJSON, sha256Hex } from "./crypto/hasher";
export { SIGNATURE_ALGORITHM } from "./crypto/signer";
export { ENCRYPTION_ALGORITHM } from "./crypto/encryptor";
export { parseTraceId, isTraceId } from "./utils/traceId";
export { registry } from "./metrics";
export * from "./errors";

export type {
  PromptLedgerInit,
  KeyMaterial,
  KeyPair,
  PiiDetector,
  PiiDetectionResult,
  SweepReport,
  SweepFailure,
  WrapOpts,
  JSONValue,
  JSONObject,
  LogLevel,
} from "./types";
export type {
  AuditEntry,
  AuditPayload,
  EvidenceRecord,
  Integrity,
} from "./schema/audit-entry";
export type { AssembleInput } from "./assembler";
export type { Interaction, CreateAuditTrailOptions, AuditTrailDeps } from "./trail";
export type { ChainVerification } from "./chain/verifier";
export type { HashChainLoggerOptions } from "./chain/logger";
export type { EvidenceStoreOptions, EvidenceSource } from "./evidence/store";
