import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import type { PromptLedgerInit } from "./types";

const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;

const ConfigSchema = z.object({
  evidenceDir: z.string().min(1),
  keyDir: z.string().min(1),
  journalPath: z.union([z.string().min(1), z.literal(false)]),
  logLevel: z.enum(LOG_LEVELS),
});

const DEFAULTS: PromptLedgerInit = {
  evidenceDir: "./logs/evidence",
  keyDir: "./keys",
  journalPath: "./logs/audit.jsonl",
  logLevel: "info",
};

function readYaml(filePath: string): Partial<PromptLedgerInit> {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(abs, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `PromptLedger: cannot read config file ${abs}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  if (parsed === null || parsed === undefined) return {};

  const result = ConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      `PromptLedger: invalid config file ${abs}: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  return result.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const journal = env["PROMPT_LEDGER_JOURNAL_PATH"];
  return {
    ...(env["PROMPT_LEDGER_EVIDENCE_DIR"]
      ? { evidenceDir: env["PROMPT_LEDGER_EVIDENCE_DIR"] }
      : {}),
    ...(env["PROMPT_LEDGER_KEY_DIR"] ? { keyDir: env["PROMPT_LEDGER_KEY_DIR"] } : {}),
    ...(journal ? { journalPath: journal === "off" ? false : journal } : {}),
    ...(env["PROMPT_LEDGER_LOG_LEVEL"]
      ? { logLevel: env["PROMPT_LEDGER_LOG_LEVEL"] }
      : {}),
  };
}

function withoutUndefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

/**
 * Merge defaults, the YAML file named by `PROMPT_LEDGER_RC`, environment
 * variables and `userCfg` (highest precedence) into a validated config.
 * Does not touch the {@link ConfigManager} singleton.
 */
export function resolveConfig(
  userCfg: Partial<PromptLedgerInit> = {},
  env: NodeJS.ProcessEnv = process.env
): PromptLedgerInit {
  const fileCfg = env["PROMPT_LEDGER_RC"] ? readYaml(env["PROMPT_LEDGER_RC"]) : {};

  const merged = {
    ...DEFAULTS,
    ...fileCfg,
    ...readEnv(env),
    ...withoutUndefined(userCfg),
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `PromptLedger: invalid configuration: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`
    );
  }
  return result.data;
}

class ConfigManagerClass {
  private _cfg?: Readonly<PromptLedgerInit>;
  private _loadPromise?: Promise<void>;

  async load(userCfg: Partial<PromptLedgerInit> = {}): Promise<void> {
    if (this._cfg) return;

    // Prevent multiple concurrent loads
    if (this._loadPromise) {
      await this._loadPromise;
      return;
    }

    this._loadPromise = this._doLoad(userCfg);
    try {
      await this._loadPromise;
    } finally {
      this._loadPromise = undefined;
    }
  }

  private async _doLoad(userCfg: Partial<PromptLedgerInit>): Promise<void> {
    this._cfg = Object.freeze(resolveConfig(userCfg));
  }

  get loaded(): boolean {
    return this._cfg !== undefined;
  }

  get cfg(): Readonly<PromptLedgerInit> {
    if (!this._cfg) {
      throw new ConfigError("PromptLedger: initPromptLedger() must be called first");
    }
    return this._cfg;
  }

  /** Forget the loaded configuration (tests, re-initialisation). */
  reset(): void {
    this._cfg = undefined;
    this._loadPromise = undefined;
  }
}

export const ConfigManager = new ConfigManagerClass();

export async function initPromptLedger(
  cfg?: Partial<PromptLedgerInit>
): Promise<Readonly<PromptLedgerInit>> {
  await ConfigManager.load(cfg);
  return ConfigManager.cfg;
}
