/**
 * Evidence bundle export.
 *
 * Produces a zip file containing the complete evidence chain:
 *
 *   evidence/
 *     manifest.json                bundle metadata (canonical JSON)
 *     entries.jsonl                one canonical-JSON entry per line, seq-ordered
 *     schemas/
 *       evidence-v1.0.0.json       entry envelope snapshot
 *     integrity/
 *       chain.json                 chain verification report
 *     traces/
 *       <traceHash>.json           execution trace export (pretty, key-sorted)
 *
 * Guarantees:
 *   - Export aborts if the chain does not verify.
 *   - Export aborts if any included trace fails its own hash check.
 *   - All JSON uses canonical serialization (sorted keys, no undefined).
 *   - Entries are ordered by seq ascending; traces by traceHash.
 *   - Zip entry names are fixed prefixes + hex hashes; no user strings.
 *
 * Reconciling a diverged mirror starts from one of these bundles.
 */

import { createWriteStream } from "node:fs";
import archiver from "archiver";
import { canonicalJson } from "../audit/canonical.js";
import type { ChainIntegrityReport } from "../audit/hashing.js";
import type { EvidenceChain, EvidenceEntry } from "../audit/store.js";
import { exportTrace, verifyTraceHash, type ExecutionTrace } from "../trace/trace.js";

const BUNDLE_SCHEMA_VERSION = "1.0.0";

const EVIDENCE_SCHEMA_SNAPSHOT = {
  schemaVersion: BUNDLE_SCHEMA_VERSION,
  description: "Evidence chain entry envelope",
  envelope: [
    "seq",
    "id",
    "createdAt",
    "type",
    "subjectId",
    "payload",
    "payloadHash",
    "prevHash",
    "entryHash",
  ],
  entryHash: "sha256(prevHash + canonicalJson({createdAt, payloadHash, subjectId, type}))",
  payloadHash: "sha256(canonicalJson(payload))",
};

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export type EvidenceExportErrorCode =
  | "CHAIN_VERIFICATION_FAILED"
  | "TRACE_VERIFICATION_FAILED"
  | "WRITE_FAILED";

export class EvidenceExportError extends Error {
  public readonly code: EvidenceExportErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: EvidenceExportErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EvidenceExportError";
    this.code = code;
    this.details = details ?? {};
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ExportOptions {
  /** Execution traces to include (default none). */
  traces?: readonly ExecutionTrace[];
  clock?: () => Date;
}

export interface ExportSummary {
  path: string;
  entryCount: number;
  traceCount: number;
  headHash: string | null;
  exportedAt: string;
}

// ---------------------------------------------------------------------------
// Export function
// ---------------------------------------------------------------------------

export async function exportEvidenceBundle(
  outZipPath: string,
  evidence: EvidenceChain,
  options: ExportOptions = {},
): Promise<ExportSummary> {
  const exportedAt = (options.clock ?? (() => new Date()))().toISOString();

  // 1. Verify chain; abort if invalid -----------------------------------
  const report = evidence.verifyChainIntegrity();
  if (!report.overallValid) {
    throw new EvidenceExportError(
      `Evidence chain verification failed: ${report.violations.length} violation(s) from index ${report.firstViolation}`,
      "CHAIN_VERIFICATION_FAILED",
      { firstViolation: report.firstViolation, failures: report.failures },
    );
  }

  // 2. Verify traces ----------------------------------------------------
  const traces = [...(options.traces ?? [])].sort((a, b) =>
    a.traceHash.localeCompare(b.traceHash),
  );
  for (const trace of traces) {
    if (!verifyTraceHash(trace)) {
      throw new EvidenceExportError(
        `Execution trace ${trace.traceId} failed hash verification`,
        "TRACE_VERIFICATION_FAILED",
        { traceId: trace.traceId },
      );
    }
  }

  // 3. Entries (seq ordered) --------------------------------------------
  const entries = evidence.listEntries();
  const headHash = entries.length > 0 ? entries[entries.length - 1].entryHash : null;

  const manifest = {
    schemaVersion: BUNDLE_SCHEMA_VERSION,
    exportedAt,
    entryCount: entries.length,
    headHash,
    traceCount: traces.length,
  };

  try {
    await writeZip(outZipPath, manifest, entries, report, traces, new Date(exportedAt));
  } catch (err) {
    throw new EvidenceExportError(
      `Failed to write evidence bundle: ${err instanceof Error ? err.message : String(err)}`,
      "WRITE_FAILED",
      { path: outZipPath },
    );
  }

  return { path: outZipPath, entryCount: entries.length, traceCount: traces.length, headHash, exportedAt };
}

// ---------------------------------------------------------------------------
// Zip construction (private)
// ---------------------------------------------------------------------------

function entryToRecord(e: EvidenceEntry): Record<string, unknown> {
  return {
    seq: e.seq,
    id: e.id,
    createdAt: e.createdAt,
    type: e.type,
    subjectId: e.subjectId,
    payload: e.payload,
    payloadHash: e.payloadHash,
    prevHash: e.prevHash,
    entryHash: e.entryHash,
  };
}

async function writeZip(
  outZipPath: string,
  manifest: Record<string, unknown>,
  entries: EvidenceEntry[],
  report: ChainIntegrityReport,
  traces: ExecutionTrace[],
  exportedAt: Date,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const output = createWriteStream(outZipPath);
    const archive = archiver.create("zip", { zlib: { level: 6 } });

    output.on("close", () => resolve());
    archive.on("error", (err: Error) => reject(err));
    output.on("error", (err: Error) => reject(err));
    archive.pipe(output);

    archive.append(canonicalJson(manifest), { name: "evidence/manifest.json" });

    const lines = entries.map((e) => canonicalJson(entryToRecord(e)));
    archive.append(lines.join("\n") + (lines.length > 0 ? "\n" : ""), {
      name: "evidence/entries.jsonl",
    });

    archive.append(canonicalJson(EVIDENCE_SCHEMA_SNAPSHOT), {
      name: `evidence/schemas/evidence-v${BUNDLE_SCHEMA_VERSION}.json`,
    });

    archive.append(
      canonicalJson({
        overallValid: report.overallValid,
        totalEntries: report.totalEntries,
        violations: report.violations,
      }),
      { name: "evidence/integrity/chain.json" },
    );

    // Safe entry name: "evidence/traces/" + 64 hex chars
    for (const trace of traces) {
      archive.append(exportTrace(trace, exportedAt), {
        name: `evidence/traces/${trace.traceHash}.json`,
      });
    }

    archive.finalize().catch(reject);
  });
}
