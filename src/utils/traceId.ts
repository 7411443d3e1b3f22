/**
 * Trace identifiers are minted by the caller as
 * `<uuid-v4>:<ISO-8601 UTC timestamp ending in Z>`, e.g.
 * `550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14Z`.
 * The UUID part is always 36 characters; the timestamp itself contains colons,
 * so only the first colon separates the two parts.
 */

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
const ISO_UTC = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,9})?Z$/;

export interface TraceIdParts {
  uuid: string;
  timestamp: string;
}

export function parseTraceId(traceId: string): TraceIdParts | undefined {
  const sep = traceId.indexOf(":");
  if (sep !== 36) return undefined;

  const uuid = traceId.slice(0, sep);
  const timestamp = traceId.slice(sep + 1);
  if (!UUID_V4.test(uuid) || !ISO_UTC.test(timestamp)) return undefined;
  if (Number.isNaN(Date.parse(timestamp))) return undefined;

  return { uuid, timestamp };
}

export function isTraceId(value: string): boolean {
  return parseTraceId(value) !== undefined;
}
