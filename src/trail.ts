import { Readable } from "node:stream";
import { assembleEntry } from "./assembler";
import { AuditJournal } from "./chain/journal";
import { HashChainLogger } from "./chain/logger";
import { ConfigManager, resolveConfig } from "./config";
import { sha256Hex } from "./crypto/hasher";
import { EvidenceStore } from "./evidence/store";
import { KeyMaterialManager } from "./keyring";
import type { AuditEntry, EvidenceRecord } from "./schema/audit-entry";
import type { KeyMaterial, PiiDetector, PromptLedgerInit } from "./types";
import { log, setLogLevel } from "./utils/logger";

/** One prompt/response exchange to be audited. */
export interface Interaction {
  traceId: string;
  method: string;
  model?: string;
  prompt: string;
  response: string;
  /** Default: 200 */
  status?: number | string;
  /** Language hint for the PII detector. Default: "en" */
  language?: string;
  /** Usage figures recorded under `response` (tokens, latency_ms, …) */
  metrics?: Record<string, number>;
  /** Binary attachment (an image, a file path) to keep as encrypted evidence */
  attachment?: Buffer | Readable | { path: string };
}

export interface AuditTrailDeps {
  keys: KeyMaterial;
  store: EvidenceStore;
  logger: HashChainLogger;
  detector: PiiDetector;
  clock?: () => Date;
}

export interface CreateAuditTrailOptions {
  /** Explicit configuration; falls back to the loaded ConfigManager, then to defaults + env */
  config?: Partial<PromptLedgerInit>;
  detector: PiiDetector;
  clock?: () => Date;
}

/**
 * The full audit path for an interaction: hash the texts, run PII detection,
 * encrypt the attachment, assemble the entry and append it to the chain.
 * Neither the prompt, the response nor the attachment is ever stored in clear.
 */
export class AuditTrail {
  readonly keys: KeyMaterial;
  readonly store: EvidenceStore;
  readonly logger: HashChainLogger;
  private readonly detector: PiiDetector;
  private readonly clock: () => Date;

  constructor(deps: AuditTrailDeps) {
    this.keys = deps.keys;
    this.store = deps.store;
    this.logger = deps.logger;
    this.detector = deps.detector;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Load keys, open the evidence store and resume the journalled chain. */
  static async create(opts: CreateAuditTrailOptions): Promise<AuditTrail> {
    const cfg =
      opts.config === undefined && ConfigManager.loaded
        ? ConfigManager.cfg
        : resolveConfig(opts.config);
    setLogLevel(cfg.logLevel);

    const keys = await new KeyMaterialManager(cfg.keyDir).loadKeyMaterial();
    const store = new EvidenceStore({
      root: cfg.evidenceDir,
      key: keys.symmetricKey,
      clock: opts.clock,
    });
    const logger = await HashChainLogger.open({
      keys,
      journal: cfg.journalPath ? new AuditJournal(cfg.journalPath) : undefined,
    });

    log.info("Audit trail ready", {
      keyDir: cfg.keyDir,
      evidenceDir: cfg.evidenceDir,
      journalPath: cfg.journalPath,
    });
    return new AuditTrail({ keys, store, logger, detector: opts.detector, clock: opts.clock });
  }

  async record(interaction: Interaction): Promise<AuditEntry> {
    const detection = await this.detector.detect(
      interaction.prompt,
      interaction.language ?? "en"
    );

    const evidence =
      interaction.attachment === undefined
        ? undefined
        : await this.storeAttachment(interaction.attachment);

    const payload = assembleEntry({
      traceId: interaction.traceId,
      timestamp: this.clock(),
      request: {
        method: interaction.method,
        bodyHash: sha256Hex(interaction.prompt),
        model: interaction.model,
      },
      response: {
        status: interaction.status ?? 200,
        contentHash: sha256Hex(interaction.response),
        metrics: {
          ...interaction.metrics,
          size_bytes: Buffer.byteLength(interaction.response, "utf8"),
        },
      },
      piiDetection: detection.metadata,
      evidence,
    });

    return this.logger.append(payload);
  }

  private storeAttachment(
    attachment: NonNullable<Interaction["attachment"]>
  ): Promise<EvidenceRecord> {
    if (Buffer.isBuffer(attachment) || attachment instanceof Readable) {
      return this.store.store(attachment);
    }
    return this.store.storeFile(attachment.path);
  }
}
