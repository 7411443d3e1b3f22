/**
 * @module audit-entry
 * @description Runtime schemas for the documents prompt-ledger writes:
 * evidence records, audit payloads and signed audit entries.
 *
 * A signed entry on the wire:
 * ```json
 * {
 *   "id": "550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14Z",
 *   "timestamp": "2025-11-20T03:47:15.120Z",
 *   "request": { "method": "POST", "body_hash": "…", "pii_detection": { … } },
 *   "response": { "status": 200, "content_hash": "…", "tokens": 1500 },
 *   "evidence": { "content_hash": "…", "storage_path": "…", … },
 *   "integrity": {
 *     "log_hash": "…", "previous_hash": "…",
 *     "signature": "…", "signature_algorithm": "RSA-PSS-SHA256"
 *   }
 * }
 * ```
 * Field names are part of the persisted format and are kept snake_case.
 */

import { z } from "zod";
import type { JSONValue } from "../types";
import { isTraceId } from "../utils/traceId";

export const JSONValueSchema: z.ZodLazy<z.ZodType<JSONValue>> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JSONValueSchema),
    z.record(z.string(), JSONValueSchema),
  ])
);

export const JSONObjectSchema = z.record(z.string(), JSONValueSchema);

export const Hex64Schema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "must be 64 lowercase hex characters");

const IsoUtcSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,9})?Z$/, "must be ISO-8601 UTC ending in Z");

export const TraceIdSchema = z
  .string()
  .refine(isTraceId, "must be <uuid-v4>:<ISO-8601 UTC timestamp ending in Z>");

export const EvidenceRecordSchema = z.object({
  content_hash: Hex64Schema,
  storage_path: z.string().min(1),
  encryption_algorithm: z.literal("AES-256-GCM"),
  size_bytes: z.number().int().nonnegative(),
  created_at: IsoUtcSchema,
  expires_at: IsoUtcSchema,
});

export const AuditRequestSchema = z
  .object({
    method: z.string().min(1),
    body_hash: Hex64Schema,
    pii_detection: JSONObjectSchema,
  })
  .catchall(JSONValueSchema);

export const AuditResponseSchema = z
  .object({
    status: z.union([z.number().int(), z.string().min(1)]),
    content_hash: Hex64Schema,
  })
  .catchall(JSONValueSchema);

export const AuditPayloadSchema = z.object({
  id: TraceIdSchema,
  timestamp: IsoUtcSchema,
  request: AuditRequestSchema,
  response: AuditResponseSchema,
  evidence: EvidenceRecordSchema.optional(),
});

export const IntegritySchema = z.object({
  log_hash: Hex64Schema,
  previous_hash: Hex64Schema,
  signature: z.string().regex(/^(?:[0-9a-f]{2})+$/, "must be lowercase hex"),
  signature_algorithm: z.string().min(1),
});

export const AuditEntrySchema = AuditPayloadSchema.extend({
  integrity: IntegritySchema,
});

export type EvidenceRecord = z.infer<typeof EvidenceRecordSchema>;
export type AuditRequest = z.infer<typeof AuditRequestSchema>;
export type AuditResponse = z.infer<typeof AuditResponseSchema>;
export type AuditPayload = z.infer<typeof AuditPayloadSchema>;
export type Integrity = z.infer<typeof IntegritySchema>;
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

/** Flatten zod issues into `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
