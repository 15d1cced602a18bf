import type { EvidenceCitation } from "../proposal/schemas.js";
import type { AgentRunResult } from "./types.js";

const SUMMARY_CHARS = 500;

/**
 * Citations for a proposal built from a run: one per successful search or
 * fetch, referencing the tool call id.
 */
export function citationsFromRun(run: AgentRunResult): EvidenceCitation[] {
  return run.passes
    .flatMap((p) => p.toolResults)
    .filter((r) => r.success && r.call.tool !== "synthesize")
    .map((r) => ({
      sourceType: "tool_result" as const,
      reference: r.callId,
      redactedSummary: r.output.slice(0, SUMMARY_CHARS),
    }));
}
