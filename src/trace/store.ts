/**
 * SQLite persistence for execution traces.
 *
 * Table `execution_traces` holds at most one trace per approval session
 * (UNIQUE approval_id). A second trace for the same session is rejected
 * with ALREADY_EXECUTED, never overwritten. Each stored trace is announced
 * on the evidence chain as an `execution_trace` entry.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { canonicalJson } from "../audit/canonical.js";
import type { EvidenceChain } from "../audit/store.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { verifyTraceHash, type ExecutionTrace } from "./trace.js";

interface Stmt {
  run(...params: unknown[]): { changes: number };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

const HEX64 = /^[0-9a-f]{64}$/;

const ExecutionTraceSchema = z.object({
  traceId: z.string().min(1),
  timestamp: z.string().datetime(),
  intentHash: z.string().regex(HEX64),
  policyHash: z.string().regex(HEX64),
  approvalId: z.string().min(1),
  tokenHash: z.string().regex(HEX64),
  connectorId: z.string().optional(),
  certificateHash: z.string().regex(HEX64),
  riskTier: z.enum(["low", "medium", "high", "critical"]),
  enclaveBacked: z.boolean(),
  executionDurationMs: z.number().int().min(0),
  allGatesPassed: z.boolean(),
  traceHash: z.string().regex(HEX64),
});

const TraceRowSchema = z.object({ trace_json: z.string() });

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export class ExecutionTraceStore {
  private readonly db: Database.Database;
  private readonly evidence: EvidenceChain;
  private readonly logger: Logger;

  private readonly stmtInsert: Stmt;
  private readonly stmtById: Stmt;
  private readonly stmtByApproval: Stmt;
  private readonly stmtList: Stmt;

  constructor(dbPath: string, evidence: EvidenceChain, logger: Logger = silentLogger()) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.evidence = evidence;
    this.logger = logger;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS execution_traces (
        trace_id     TEXT PRIMARY KEY,
        approval_id  TEXT NOT NULL UNIQUE,
        timestamp    TEXT NOT NULL,
        risk_tier    TEXT NOT NULL,
        trace_hash   TEXT NOT NULL,
        trace_json   TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_traces_timestamp ON execution_traces(timestamp);
    `);

    this.stmtInsert = this.db.prepare(
      `INSERT INTO execution_traces (trace_id, approval_id, timestamp, risk_tier, trace_hash, trace_json)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ) as Stmt;
    this.stmtById = this.db.prepare(
      "SELECT trace_json FROM execution_traces WHERE trace_id = ?",
    ) as Stmt;
    this.stmtByApproval = this.db.prepare(
      "SELECT trace_json FROM execution_traces WHERE approval_id = ?",
    ) as Stmt;
    this.stmtList = this.db.prepare(
      "SELECT trace_json FROM execution_traces ORDER BY timestamp DESC, trace_id ASC LIMIT ?",
    ) as Stmt;
  }

  /** Persist a trace. Rejects a tampered trace and a second trace per session. */
  record(trace: ExecutionTrace): ExecutionTrace {
    if (!verifyTraceHash(trace)) {
      throw new GovernanceError("Trace hash does not match its fields", "CHAIN_INTEGRITY_VIOLATION", {
        traceId: trace.traceId,
      });
    }
    try {
      this.stmtInsert.run(
        trace.traceId,
        trace.approvalId,
        trace.timestamp,
        trace.riskTier,
        trace.traceHash,
        canonicalJson(trace),
      );
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new GovernanceError(
          `Approval session ${trace.approvalId} already has an execution trace`,
          "ALREADY_EXECUTED",
          { approvalId: trace.approvalId },
        );
      }
      throw err;
    }

    this.evidence.append("execution_trace", trace.approvalId, {
      traceId: trace.traceId,
      traceHash: trace.traceHash,
      riskTier: trace.riskTier,
      allGatesPassed: trace.allGatesPassed,
    });
    this.logger.info({ traceId: trace.traceId, approvalId: trace.approvalId }, "execution trace recorded");
    return trace;
  }

  get(traceId: string): ExecutionTrace | undefined {
    return this.parseRow(this.stmtById.get(traceId));
  }

  getByApproval(approvalId: string): ExecutionTrace | undefined {
    return this.parseRow(this.stmtByApproval.get(approvalId));
  }

  hasTrace(approvalId: string): boolean {
    return this.stmtByApproval.get(approvalId) !== undefined;
  }

  /** Most recent first. */
  list(limit = 50): ExecutionTrace[] {
    return this.stmtList
      .all(limit)
      .map((row) => this.parseRow(row))
      .filter((t): t is ExecutionTrace => t !== undefined);
  }

  close(): void {
    this.db.close();
  }

  private parseRow(row: unknown): ExecutionTrace | undefined {
    if (row === undefined) return undefined;
    const { trace_json } = TraceRowSchema.parse(row);
    const parsed = ExecutionTraceSchema.safeParse(JSON.parse(trace_json));
    if (!parsed.success) {
      throw new GovernanceError("Stored execution trace is malformed", "CHAIN_INTEGRITY_VIOLATION", {
        issues: parsed.error.issues,
      });
    }
    return Object.freeze(parsed.data);
  }
}
