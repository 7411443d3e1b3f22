import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { generateKeyPairSync } from "node:crypto";
import { createHash } from "node:crypto";
import type { AuditPayload } from "../../src/schema/audit-entry";
import type { KeyPair } from "../../src/types";

export const TRACE_A = "550e8400-e29b-41d4-a716-446655440000:2025-11-20T03:47:14Z";
export const TRACE_B = "9b2f6c1d-3a4e-4f5a-8b6c-7d8e9f0a1b2c:2025-11-20T03:48:02Z";

export async function makeTempDir(prefix = "prompt-ledger-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function sha256(text: string | Buffer): string {
  return createHash("sha256").update(text).digest("hex");
}

export function makeKeyPair(): KeyPair {
  return generateKeyPairSync("rsa", { modulusLength: 2048 });
}

export function makePayload(
  traceId: string,
  requestBody: string,
  responseBody: string,
  timestamp = "2025-11-20T03:47:15.000Z"
): AuditPayload {
  return {
    id: traceId,
    timestamp,
    request: {
      method: "POST",
      body_hash: sha256(requestBody),
      pii_detection: { method: "regex", total_masked: 0, detections: {} },
    },
    response: {
      status: 200,
      content_hash: sha256(responseBody),
      tokens: 1500,
    },
  };
}
