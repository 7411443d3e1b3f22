import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AuditJournal,
  AuditTrail,
  GENESIS_HASH,
  ValidationError,
  verifyChain,
  wrapLLM,
  type PiiDetectionResult,
  type PiiDetector,
  type PromptLedgerInit,
} from "../../src";
import { resetLogger } from "../../src/utils/logger";
import { TRACE_A, TRACE_B, makeTempDir, removeDir, sha256 } from "../helpers/fixtures";

const FIXED_NOW = new Date("2025-11-20T03:47:15.000Z");

function regexDetector(): PiiDetector {
  return {
    detect: vi.fn((text: string): PiiDetectionResult => {
      const emails = text.match(/[\w.]+@[\w.]+/g) ?? [];
      return {
        maskedText: text.replace(/[\w.]+@[\w.]+/g, "<EMAIL>"),
        metadata: {
          method: "regex",
          total_masked: emails.length,
          detections: emails.length ? { EMAIL: emails.length } : {},
        },
      };
    }),
  };
}

describe("AuditTrail", () => {
  let dir: string;
  let config: Partial<PromptLedgerInit>;

  beforeEach(async () => {
    dir = await makeTempDir("trail-");
    config = {
      keyDir: path.join(dir, "keys"),
      evidenceDir: path.join(dir, "evidence"),
      journalPath: path.join(dir, "audit.jsonl"),
    };
  });

  afterEach(async () => {
    // create() pins the log level
    resetLogger();
    await removeDir(dir);
  });

  it("should record an interaction without its plaintext", async () => {
    const detector = regexDetector();
    const trail = await AuditTrail.create({ config, detector, clock: () => FIXED_NOW });
    const prompt = "Contact jane.roe@example.com about invoice 99";

    const entry = await trail.record({
      traceId: TRACE_A,
      method: "chat.completions",
      model: "gpt-4o",
      prompt,
      response: "Sure, drafting it now.",
      metrics: { tokens: 42 },
    });

    expect(detector.detect).toHaveBeenCalledWith(prompt, "en");
    expect(entry.id).toBe(TRACE_A);
    expect(entry.timestamp).toBe("2025-11-20T03:47:15.000Z");
    expect(entry.request).toEqual({
      method: "chat.completions",
      body_hash: sha256(prompt),
      model: "gpt-4o",
      pii_detection: { method: "regex", total_masked: 1, detections: { EMAIL: 1 } },
    });
    expect(entry.response).toEqual({
      status: 200,
      content_hash: sha256("Sure, drafting it now."),
      tokens: 42,
      size_bytes: 22,
    });
    expect(entry.integrity.previous_hash).toBe(GENESIS_HASH);
    expect(trail.logger.verifyFull(entry)).toBe(true);

    const journalText = await fs.readFile(path.join(dir, "audit.jsonl"), "utf8");
    expect(journalText.includes("jane.roe@example.com")).toBe(false);
  });

  it("should keep an attachment as retrievable encrypted evidence", async () => {
    const trail = await AuditTrail.create({ config, detector: regexDetector() });
    const image = Buffer.from("89504e470d0a1a0a0000000d49484452", "hex");

    const entry = await trail.record({
      traceId: TRACE_A,
      method: "vision",
      prompt: "describe this",
      response: "a small image",
      attachment: image,
    });

    expect(entry.evidence?.content_hash).toBe(sha256(image));
    expect(entry.evidence?.size_bytes).toBe(16);
    expect(entry.evidence?.storage_path.startsWith(path.join(dir, "evidence"))).toBe(true);
    if (!entry.evidence) throw new Error("expected an evidence record");
    expect((await trail.store.retrieve(entry.evidence)).equals(image)).toBe(true);
  });

  it("should accept attachments as streams and file paths", async () => {
    const trail = await AuditTrail.create({ config, detector: regexDetector() });
    const file = path.join(dir, "scan.pdf");
    await fs.writeFile(file, "%PDF-1.4 placeholder");

    const fromStream = await trail.record({
      traceId: TRACE_A,
      method: "upload",
      prompt: "p",
      response: "r",
      attachment: Readable.from([Buffer.from("%PDF-1.4 "), Buffer.from("placeholder")]),
    });
    const fromPath = await trail.record({
      traceId: TRACE_B,
      method: "upload",
      prompt: "p",
      response: "r",
      attachment: { path: file },
    });

    expect(fromStream.evidence?.content_hash).toBe(sha256("%PDF-1.4 placeholder"));
    expect(fromPath.evidence?.storage_path).toBe(fromStream.evidence?.storage_path);
  });

  it("should continue the same chain after a restart", async () => {
    const first = await AuditTrail.create({ config, detector: regexDetector() });
    const a = await first.record({ traceId: TRACE_A, method: "m", prompt: "p1", response: "r1" });

    const second = await AuditTrail.create({ config, detector: regexDetector() });
    const b = await second.record({ traceId: TRACE_B, method: "m", prompt: "p2", response: "r2" });

    expect(b.integrity.previous_hash).toBe(a.integrity.log_hash);

    const journal = new AuditJournal(path.join(dir, "audit.jsonl"));
    expect(verifyChain(await journal.readAll(), second.keys.publicKey)).toEqual({
      valid: true,
      checked: 2,
    });
  });

  it("should start every process at genesis without a journal", async () => {
    const memoryOnly = { ...config, journalPath: false as const };
    const first = await AuditTrail.create({ config: memoryOnly, detector: regexDetector() });
    await first.record({ traceId: TRACE_A, method: "m", prompt: "p", response: "r" });

    const second = await AuditTrail.create({ config: memoryOnly, detector: regexDetector() });
    expect(second.logger.previousHash).toBe(GENESIS_HASH);
  });

  it("should reject an interaction with a malformed trace id", async () => {
    const trail = await AuditTrail.create({ config, detector: regexDetector() });

    await expect(
      trail.record({ traceId: "req-1", method: "m", prompt: "p", response: "r" })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(trail.logger.previousHash).toBe(GENESIS_HASH);
  });
});

describe("wrapLLM", () => {
  let dir: string;
  let trail: AuditTrail;

  beforeEach(async () => {
    dir = await makeTempDir("wrap-");
    trail = await AuditTrail.create({
      config: {
        keyDir: path.join(dir, "keys"),
        evidenceDir: path.join(dir, "evidence"),
        journalPath: path.join(dir, "audit.jsonl"),
      },
      detector: regexDetector(),
    });
  });

  afterEach(async () => {
    // create() pins the log level
    resetLogger();
    await removeDir(dir);
  });

  it("should return the model output and append one entry per call", async () => {
    const complete = vi.fn(async (prompt: string) => `echo: ${prompt}`);
    const ask = wrapLLM(trail, complete, {
      method: "chat.completions",
      modelName: "test-model",
      traceId: () => TRACE_A,
    });

    await expect(ask("hello")).resolves.toBe("echo: hello");

    const [entry] = await new AuditJournal(path.join(dir, "audit.jsonl")).readAll();
    expect(entry).toMatchObject({
      id: TRACE_A,
      request: { method: "chat.completions", model: "test-model", body_hash: sha256("hello") },
      response: { status: 200, content_hash: sha256("echo: hello") },
    });
    expect(trail.logger.previousHash).not.toBe(GENESIS_HASH);
  });

  it("should hash structured responses as JSON", async () => {
    const ask = wrapLLM(trail, async () => ({ text: "ok", finish: "stop" }), {
      method: "responses.create",
      modelName: "test-model",
      traceId: () => TRACE_B,
    });

    await ask("hi");

    const [entry] = await new AuditJournal(path.join(dir, "audit.jsonl")).readAll();
    expect(entry).toMatchObject({
      response: { content_hash: sha256('{"text":"ok","finish":"stop"}') },
    });
  });

  it("should fail the call when the audit cannot be written", async () => {
    const ask = wrapLLM(trail, async () => "answer", {
      method: "m",
      modelName: "test-model",
      traceId: () => "not-a-trace-id",
    });

    await expect(ask("hi")).rejects.toBeInstanceOf(ValidationError);
  });

  it("should not audit a call that failed", async () => {
    const ask = wrapLLM(
      trail,
      async () => {
        throw new Error("upstream timeout");
      },
      { method: "m", modelName: "test-model", traceId: () => TRACE_A }
    );

    await expect(ask("hi")).rejects.toThrow("upstream timeout");
    expect(trail.logger.previousHash).toBe(GENESIS_HASH);
  });
});
