import { z } from "zod";
import { ValidationError } from "./errors";
import {
  EvidenceRecordSchema,
  Hex64Schema,
  JSONObjectSchema,
  TraceIdSchema,
  formatIssues,
  type AuditPayload,
  type EvidenceRecord,
} from "./schema/audit-entry";
import type { JSONObject, JSONValue } from "./types";

export interface AssembleInput {
  /** `<uuid-v4>:<ISO-8601 UTC>` from the caller's tracing layer */
  traceId: string;
  /** Defaults to now */
  timestamp?: Date;
  request: {
    method: string;
    /** SHA-256 (hex) of the request body; the body itself is never logged */
    bodyHash: string;
    model?: string;
    /** Extra request attributes, merged into `request` */
    metadata?: JSONObject;
  };
  response: {
    status: number | string;
    /** SHA-256 (hex) of the response content */
    contentHash: string;
    /** Size and usage figures (tokens, latency_ms, size_bytes, …) */
    metrics?: Record<string, number>;
  };
  /** Detector output, embedded verbatim under `request.pii_detection` */
  piiDetection: JSONObject;
  evidence?: EvidenceRecord;
}

const RESERVED_REQUEST_KEYS = ["method", "body_hash", "model", "pii_detection"];
const RESERVED_RESPONSE_KEYS = ["status", "content_hash"];

const AssembleInputSchema = z.object({
  traceId: TraceIdSchema,
  timestamp: z.date().optional(),
  request: z.object({
    method: z.string().min(1),
    bodyHash: Hex64Schema,
    model: z.string().min(1).optional(),
    metadata: JSONObjectSchema.optional().refine(
      (m) => !m || RESERVED_REQUEST_KEYS.every((k) => !(k in m)),
      `must not redefine ${RESERVED_REQUEST_KEYS.join(", ")}`
    ),
  }),
  response: z.object({
    status: z.union([z.number().int(), z.string().min(1)]),
    contentHash: Hex64Schema,
    metrics: z
      .record(z.string(), z.number().finite())
      .optional()
      .refine(
        (m) => !m || RESERVED_RESPONSE_KEYS.every((k) => !(k in m)),
        `must not redefine ${RESERVED_RESPONSE_KEYS.join(", ")}`
      ),
  }),
  piiDetection: JSONObjectSchema,
  evidence: EvidenceRecordSchema.optional(),
});

/**
 * Merge request/response metadata, PII-detection metadata and an optional
 * evidence reference into the payload shape the chain logger signs.
 * Pure: no I/O, no clock unless `timestamp` is omitted.
 *
 * @throws {ValidationError} listing every missing or malformed field
 */
export function assembleEntry(input: AssembleInput): AuditPayload {
  const parsed = AssembleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Invalid audit entry input", formatIssues(parsed.error));
  }
  const { traceId, timestamp, request, response, piiDetection, evidence } = parsed.data;

  const requestMeta: Record<string, JSONValue> = request.metadata ?? {};
  const metrics: Record<string, JSONValue> = response.metrics ?? {};

  return {
    id: traceId,
    timestamp: (timestamp ?? new Date()).toISOString(),
    request: {
      ...requestMeta,
      method: request.method,
      body_hash: request.bodyHash,
      ...(request.model !== undefined ? { model: request.model } : {}),
      pii_detection: piiDetection,
    },
    response: {
      ...metrics,
      status: response.status,
      content_hash: response.contentHash,
    },
    ...(evidence ? { evidence } : {}),
  };
}
