import { performance } from "node:perf_hooks";
import type { AuditTrail } from "./trail";
import type { WrapOpts } from "./types";

/**
 * Wrap an LLM call so every invocation lands in the audit trail. The wrapped
 * function resolves only after the entry has been appended; an audit failure
 * rejects the call instead of letting it go unrecorded.
 *
 * @example
 * ```typescript
 * const ask = wrapLLM(trail, (prompt) => client.complete(prompt), {
 *   method: "chat.completions",
 *   modelName: "gpt-4o",
 *   traceId: () => currentTraceId(),
 * });
 * const answer = await ask("Summarise the attached report");
 * ```
 */
export function wrapLLM<P, R>(
  trail: AuditTrail,
  originalFn: (prompt: string, params?: P) => Promise<R>,
  opts: WrapOpts
): (prompt: string, params?: P) => Promise<R> {
  return async function wrapped(prompt: string, params?: P): Promise<R> {
    const t0 = performance.now();
    const result = await originalFn(prompt, params);
    const t1 = performance.now();

    const responseText =
      typeof result === "string" ? result : JSON.stringify(result) ?? "";

    await trail.record({
      traceId: opts.traceId(),
      method: opts.method,
      model: opts.modelName,
      prompt,
      response: responseText,
      language: opts.language,
      metrics: { latency_ms: +(t1 - t0).toFixed(2) },
    });

    return result;
  };
}
