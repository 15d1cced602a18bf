/**
 * Execution trace: the hash-only proof that one execution went through
 * intent → policy → approval → token → connector → certificate.
 *
 * INVARIANTS:
 *   - Immutable once built (frozen).
 *   - Carries hashes and identifiers only; never raw content.
 *   - traceHash = sha256 of every field, in TRACE_HASH_FIELDS order,
 *     joined with "|". An absent connectorId contributes "none".
 */

import { v4 as uuidv4 } from "uuid";
import { prettyCanonicalJson } from "../audit/canonical.js";
import { sha256 } from "../audit/hashing.js";
import { TRACE_SCHEMA_VERSION } from "../kernel/constants.js";
import type { RiskTier } from "../proposal/risk.js";

export interface ExecutionTrace {
  readonly traceId: string;
  readonly timestamp: string;
  readonly intentHash: string;
  readonly policyHash: string;
  readonly approvalId: string;
  readonly tokenHash: string;
  readonly connectorId?: string;
  readonly certificateHash: string;
  readonly riskTier: RiskTier;
  readonly enclaveBacked: boolean;
  readonly executionDurationMs: number;
  readonly allGatesPassed: boolean;
  readonly traceHash: string;
}

export type ExecutionTraceFields = Omit<ExecutionTrace, "traceHash" | "traceId" | "timestamp"> & {
  traceId?: string;
  /** ISO 8601; defaults to now. */
  timestamp?: string;
};

export interface ExecutionTraceExport extends ExecutionTrace {
  readonly exportedAt: string;
  readonly schemaVersion: string;
}

export const TRACE_HASH_FIELDS = [
  "traceId",
  "timestamp",
  "intentHash",
  "policyHash",
  "approvalId",
  "tokenHash",
  "connectorId",
  "certificateHash",
  "riskTier",
  "enclaveBacked",
  "executionDurationMs",
  "allGatesPassed",
] as const satisfies readonly (keyof ExecutionTrace)[];

// ---------------------------------------------------------------------------
// Component hashes
// ---------------------------------------------------------------------------

export function computeIntentHash(action: string, target?: string): string {
  return sha256(`${action}|${target ?? "none"}`);
}

/** Binds the token id, the proposal it authorizes and its signature. */
export function computeTokenHash(token: {
  tokenId: string;
  proposalId: string;
  signature: string;
}): string {
  return sha256(`${token.tokenId}|${token.proposalId}|${token.signature}`);
}

export function computeTraceHash(trace: Omit<ExecutionTrace, "traceHash">): string {
  const material = TRACE_HASH_FIELDS.map((field) => {
    const value = trace[field];
    return value === undefined ? "none" : String(value);
  });
  return sha256(material.join("|"));
}

// ---------------------------------------------------------------------------
// Build / verify / export
// ---------------------------------------------------------------------------

export function buildExecutionTrace(fields: ExecutionTraceFields): ExecutionTrace {
  const body: Omit<ExecutionTrace, "traceHash"> = {
    traceId: fields.traceId ?? uuidv4(),
    timestamp: fields.timestamp ?? new Date().toISOString(),
    intentHash: fields.intentHash,
    policyHash: fields.policyHash,
    approvalId: fields.approvalId,
    tokenHash: fields.tokenHash,
    connectorId: fields.connectorId,
    certificateHash: fields.certificateHash,
    riskTier: fields.riskTier,
    enclaveBacked: fields.enclaveBacked,
    executionDurationMs: fields.executionDurationMs,
    allGatesPassed: fields.allGatesPassed,
  };
  return Object.freeze({ ...body, traceHash: computeTraceHash(body) });
}

export function verifyTraceHash(trace: ExecutionTrace): boolean {
  const { traceHash, ...body } = trace;
  return computeTraceHash(body) === traceHash;
}

export function toTraceExport(
  trace: ExecutionTrace,
  exportedAt: Date = new Date(),
): ExecutionTraceExport {
  return {
    ...trace,
    exportedAt: exportedAt.toISOString(),
    schemaVersion: TRACE_SCHEMA_VERSION,
  };
}

/** Pretty-printed, key-sorted JSON for external audit. */
export function exportTrace(trace: ExecutionTrace, exportedAt: Date = new Date()): string {
  return prettyCanonicalJson(toTraceExport(trace, exportedAt));
}
