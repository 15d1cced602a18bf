/**
 * SHA-256 hashing for evidence entries.
 *
 *   payloadHash = sha256(canonicalJson(payload))
 *   entryHash   = sha256(prevHash ‖ canonicalJson({createdAt, payloadHash, subjectId, type}))
 *
 * The first entry links to GENESIS_HASH. Pure functions, no I/O.
 */

import { createHash } from "node:crypto";
import { canonicalJson } from "./canonical.js";

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 hex digest of raw bytes. */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export const GENESIS_HASH = "0".repeat(64);

// ---------------------------------------------------------------------------
// Entry hash computation
// ---------------------------------------------------------------------------

export interface HashableEntry {
  type: string;
  subjectId: string;
  payloadHash: string;
  createdAt: string;
}

export function computePayloadHash(payload: Record<string, unknown>): string {
  return sha256(canonicalJson(payload));
}

export function computeEntryHash(
  prevHash: string,
  entry: HashableEntry,
): string {
  return sha256(
    prevHash +
      canonicalJson({
        createdAt: entry.createdAt,
        payloadHash: entry.payloadHash,
        subjectId: entry.subjectId,
        type: entry.type,
      }),
  );
}

// ---------------------------------------------------------------------------
// Chain verification
// ---------------------------------------------------------------------------

export interface VerifiableEntry extends HashableEntry {
  seq: number;
  id: string;
  payload: Record<string, unknown>;
  prevHash: string;
  entryHash: string;
}

export interface ChainFailure {
  index: number;
  entryId: string;
  reason:
    | "payload_hash_mismatch"
    | "prev_hash_mismatch"
    | "entry_hash_mismatch"
    | "seq_gap";
  expected: string;
  actual: string;
}

export interface ChainIntegrityReport {
  overallValid: boolean;
  totalEntries: number;
  /** Zero-based indices of entries that failed at least one check. */
  violations: number[];
  firstViolation: number | null;
  failures: ChainFailure[];
}

/**
 * Incremental verifier. Each entry's expected hash is computed from the
 * *recomputed* hash of its predecessor, so once the chain diverges every
 * later entry is reported as well.
 */
export class ChainVerifier {
  private expectedPrev = GENESIS_HASH;
  private index = 0;
  private readonly failures: ChainFailure[] = [];
  private readonly violations: number[] = [];

  push(entry: VerifiableEntry): void {
    const i = this.index;
    const before = this.failures.length;

    const payloadHash = computePayloadHash(entry.payload);
    if (payloadHash !== entry.payloadHash) {
      this.fail(i, entry, "payload_hash_mismatch", payloadHash, entry.payloadHash);
    }

    if (entry.prevHash !== this.expectedPrev) {
      this.fail(i, entry, "prev_hash_mismatch", this.expectedPrev, entry.prevHash);
    }

    const expectedHash = computeEntryHash(this.expectedPrev, {
      type: entry.type,
      subjectId: entry.subjectId,
      payloadHash,
      createdAt: entry.createdAt,
    });
    if (expectedHash !== entry.entryHash) {
      this.fail(i, entry, "entry_hash_mismatch", expectedHash, entry.entryHash);
    }

    if (entry.seq !== i + 1) {
      this.fail(i, entry, "seq_gap", String(i + 1), String(entry.seq));
    }

    if (this.failures.length > before) {
      this.violations.push(i);
    }

    this.expectedPrev = expectedHash;
    this.index++;
  }

  report(): ChainIntegrityReport {
    return {
      overallValid: this.violations.length === 0,
      totalEntries: this.index,
      violations: [...this.violations],
      firstViolation: this.violations[0] ?? null,
      failures: [...this.failures],
    };
  }

  private fail(
    index: number,
    entry: VerifiableEntry,
    reason: ChainFailure["reason"],
    expected: string,
    actual: string,
  ): void {
    this.failures.push({ index, entryId: entry.id, reason, expected, actual });
  }
}

/** Verify an ordered list of entries (seq ascending). */
export function verifyEntries(
  entries: Iterable<VerifiableEntry>,
): ChainIntegrityReport {
  const verifier = new ChainVerifier();
  for (const entry of entries) {
    verifier.push(entry);
  }
  return verifier.report();
}
