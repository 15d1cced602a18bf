/**
 * SQLite-backed append-only evidence chain.
 *
 * Single table `evidence` (seq, id, created_at, type, subject_id,
 * payload_json, payload_hash, prev_hash, entry_hash).
 *
 * Invariants enforced at write time:
 *   1. seq increments by exactly 1 (no gaps, no reuse).
 *   2. prev_hash equals the entry_hash of seq - 1 (GENESIS_HASH for seq 1).
 *   3. Appends run inside a transaction: all-or-nothing.
 *   4. No UPDATE or DELETE is ever issued against the evidence table.
 *
 * A failed append surfaces as EvidenceStoreError("APPEND_FAILED") and the
 * chain stays at its last committed length, so the caller may retry.
 */

import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { canonicalJson } from "./canonical.js";
import {
  ChainVerifier,
  GENESIS_HASH,
  computeEntryHash,
  computePayloadHash,
  type ChainIntegrityReport,
} from "./hashing.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

// ---------------------------------------------------------------------------
// Minimal statement interface (keeps call sites clear of the conditional
// generics in @types/better-sqlite3).
// ---------------------------------------------------------------------------

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
  iterate(...params: unknown[]): IterableIterator<unknown>;
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

export type EvidenceStoreErrorCode =
  | "APPEND_FAILED"
  | "INVALID_ENTRY"
  | "ENTRY_NOT_FOUND";

export class EvidenceStoreError extends Error {
  public readonly code: EvidenceStoreErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: EvidenceStoreErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EvidenceStoreError";
    this.code = code;
    this.details = details ?? {};
  }
}

// ---------------------------------------------------------------------------
// Public data types
// ---------------------------------------------------------------------------

export interface EvidenceEntry {
  seq: number;
  id: string;
  createdAt: string;
  type: string;
  subjectId: string;
  payload: Record<string, unknown>;
  payloadHash: string;
  prevHash: string;
  entryHash: string;
}

export interface EntryFilter {
  type?: string;
  subjectId?: string;
  /** ISO 8601 lower bound (inclusive) on createdAt. */
  since?: string;
  limit?: number;
}

/**
 * The append/verify surface collaborators depend on. EvidenceStore is the
 * only implementation; tests use it over `:memory:`.
 */
export interface EvidenceChain {
  append(
    type: string,
    subjectId: string,
    payload: Record<string, unknown>,
  ): EvidenceEntry;
  listEntries(filter?: EntryFilter): EvidenceEntry[];
  count(): number;
  head(): EvidenceEntry | undefined;
  verifyChainIntegrity(): ChainIntegrityReport;
}

export interface EvidenceStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

// ---------------------------------------------------------------------------
// Internal row shapes
// ---------------------------------------------------------------------------

interface EntryRow {
  seq: number;
  id: string;
  created_at: string;
  type: string;
  subject_id: string;
  payload_json: string;
  payload_hash: string;
  prev_hash: string;
  entry_hash: string;
}

interface TailRow {
  seq: number;
  entry_hash: string;
}

function parsePayload(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return { value: parsed };
}

function rowToEntry(row: EntryRow): EvidenceEntry {
  return {
    seq: row.seq,
    id: row.id,
    createdAt: row.created_at,
    type: row.type,
    subjectId: row.subject_id,
    payload: parsePayload(row.payload_json),
    payloadHash: row.payload_hash,
    prevHash: row.prev_hash,
    entryHash: row.entry_hash,
  };
}

// ---------------------------------------------------------------------------
// DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS evidence (
  seq          INTEGER PRIMARY KEY,
  id           TEXT    NOT NULL UNIQUE,
  created_at   TEXT    NOT NULL,
  type         TEXT    NOT NULL,
  subject_id   TEXT    NOT NULL,
  payload_json TEXT    NOT NULL,
  payload_hash TEXT    NOT NULL,
  prev_hash    TEXT    NOT NULL,
  entry_hash   TEXT    NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_evidence_type ON evidence(type);
CREATE INDEX IF NOT EXISTS idx_evidence_subject ON evidence(subject_id);
CREATE INDEX IF NOT EXISTS idx_evidence_created ON evidence(created_at);
`;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class EvidenceStore implements EvidenceChain {
  private readonly db: InstanceType<typeof Database>;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private readonly stmtTail: Stmt;
  private readonly stmtInsert: Stmt;
  private readonly stmtAll: Stmt;
  private readonly stmtById: Stmt;
  private readonly stmtCount: Stmt;

  private readonly txnAppend: (
    type: string,
    subjectId: string,
    payloadJson: string,
    payloadHash: string,
  ) => EvidenceEntry;

  constructor(dbPath: string, options: EvidenceStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? (() => new Date());

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    this.stmtTail = this.db.prepare(
      "SELECT seq, entry_hash FROM evidence ORDER BY seq DESC LIMIT 1",
    ) as Stmt;

    this.stmtInsert = this.db.prepare(
      `INSERT INTO evidence
         (seq, id, created_at, type, subject_id,
          payload_json, payload_hash, prev_hash, entry_hash)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ) as Stmt;

    this.stmtAll = this.db.prepare(
      "SELECT * FROM evidence ORDER BY seq ASC",
    ) as Stmt;

    this.stmtById = this.db.prepare(
      "SELECT * FROM evidence WHERE id = ?",
    ) as Stmt;

    this.stmtCount = this.db.prepare(
      "SELECT COUNT(*) AS n FROM evidence",
    ) as Stmt;

    this.txnAppend = this.db.transaction(
      (
        type: string,
        subjectId: string,
        payloadJson: string,
        payloadHash: string,
      ): EvidenceEntry => {
        const tail = this.stmtTail.get() as TailRow | undefined;
        const seq = tail ? tail.seq + 1 : 1;
        const prevHash = tail ? tail.entry_hash : GENESIS_HASH;
        const createdAt = this.clock().toISOString();
        const id = uuidv4();

        const entryHash = computeEntryHash(prevHash, {
          type,
          subjectId,
          payloadHash,
          createdAt,
        });

        this.stmtInsert.run(
          seq,
          id,
          createdAt,
          type,
          subjectId,
          payloadJson,
          payloadHash,
          prevHash,
          entryHash,
        );

        return {
          seq,
          id,
          createdAt,
          type,
          subjectId,
          payload: parsePayload(payloadJson),
          payloadHash,
          prevHash,
          entryHash,
        };
      },
    );
  }

  // -----------------------------------------------------------------------
  // Append
  // -----------------------------------------------------------------------

  append(
    type: string,
    subjectId: string,
    payload: Record<string, unknown>,
  ): EvidenceEntry {
    if (type.length === 0) {
      throw new EvidenceStoreError(
        "Evidence type must be non-empty",
        "INVALID_ENTRY",
        { subjectId },
      );
    }

    let payloadJson: string;
    let payloadHash: string;
    try {
      payloadJson = canonicalJson(payload);
      payloadHash = computePayloadHash(payload);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new EvidenceStoreError(
        `Evidence payload is not serializable: ${message}`,
        "APPEND_FAILED",
        { type, subjectId, transient: false },
      );
    }

    try {
      return this.txnAppend(type, subjectId, payloadJson, payloadHash);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(
        { err: message, type, subjectId },
        "evidence append failed; chain unchanged",
      );
      throw new EvidenceStoreError(
        `Evidence append failed: ${message}`,
        "APPEND_FAILED",
        { type, subjectId, transient: true },
      );
    }
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  listEntries(filter: EntryFilter = {}): EvidenceEntry[] {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.type !== undefined) {
      clauses.push("type = ?");
      params.push(filter.type);
    }
    if (filter.subjectId !== undefined) {
      clauses.push("subject_id = ?");
      params.push(filter.subjectId);
    }
    if (filter.since !== undefined) {
      clauses.push("created_at >= ?");
      params.push(filter.since);
    }
    let sql = "SELECT * FROM evidence";
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(" AND ")}`;
    sql += " ORDER BY seq ASC";
    if (filter.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }
    const rows = (this.db.prepare(sql) as Stmt).all(...params) as EntryRow[];
    return rows.map(rowToEntry);
  }

  getEntry(id: string): EvidenceEntry {
    const row = this.stmtById.get(id) as EntryRow | undefined;
    if (!row) {
      throw new EvidenceStoreError(
        `Evidence entry not found: ${id}`,
        "ENTRY_NOT_FOUND",
        { id },
      );
    }
    return rowToEntry(row);
  }

  count(): number {
    const row = this.stmtCount.get() as { n: number };
    return row.n;
  }

  head(): EvidenceEntry | undefined {
    const row = this.db
      .prepare("SELECT * FROM evidence ORDER BY seq DESC LIMIT 1")
      .get() as EntryRow | undefined;
    return row ? rowToEntry(row) : undefined;
  }

  // -----------------------------------------------------------------------
  // Verification (streaming, one row at a time via the SQLite cursor)
  // -----------------------------------------------------------------------

  verifyChainIntegrity(): ChainIntegrityReport {
    const verifier = new ChainVerifier();
    for (const raw of this.stmtAll.iterate()) {
      verifier.push(rowToEntry(raw as EntryRow));
    }
    return verifier.report();
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  close(): void {
    this.db.close();
  }
}
