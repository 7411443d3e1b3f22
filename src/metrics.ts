import { Registry, Histogram, Counter } from "prom-client";

export const registry = new Registry();

export const encryptHist = new Histogram({
  name: "prompt_ledger_evidence_encrypt_ms",
  help: "Latency of hashing + AES-256-GCM encryption of one evidence artifact (ms)",
  buckets: [0.5, 1, 2, 5, 10, 25, 50, 100, 250, 1000],
  registers: [registry],
});

export const signHist = new Histogram({
  name: "prompt_ledger_sign_ms",
  help: "Latency of RSA-PSS signing of one audit entry (ms)",
  buckets: [0.25, 0.5, 1, 2, 5, 10, 25],
  registers: [registry],
});

export const entriesAppended = new Counter({
  name: "prompt_ledger_entries_appended_total",
  help: "Number of audit entries appended to the hash chain",
  registers: [registry],
});

export const evidenceStored = new Counter({
  name: "prompt_ledger_evidence_stored_total",
  help: "Number of evidence artifacts encrypted and stored",
  registers: [registry],
});

export const evidenceSwept = new Counter({
  name: "prompt_ledger_evidence_swept_total",
  help: "Number of expired evidence artifacts deleted by the sweeper",
  registers: [registry],
});

export const sweepFailures = new Counter({
  name: "prompt_ledger_sweep_failures_total",
  help: "Number of expired evidence artifacts the sweeper failed to delete",
  registers: [registry],
});
