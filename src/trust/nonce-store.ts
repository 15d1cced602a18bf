/**
 * Durable consumed-nonce store (replay protection).
 *
 * INVARIANT: a consumed nonce never becomes valid again, including across
 * restarts. Only SHA-256(nonceId) is stored. Expired rows are pruned; an
 * expired nonce is rejected before it is ever looked up.
 */

import Database from "better-sqlite3";
import { sha256 } from "../audit/hashing.js";

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS consumed_nonces (
  nonce_hash  TEXT PRIMARY KEY,
  expires_at  TEXT NOT NULL,
  consumed_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_nonces_expiry ON consumed_nonces(expires_at);
`;

export class NonceStore {
  private readonly db: InstanceType<typeof Database>;
  private readonly clock: () => Date;
  private readonly stmtInsert: Stmt;
  private readonly stmtPrune: Stmt;
  private readonly stmtHas: Stmt;

  constructor(dbPath: string, clock: () => Date = () => new Date()) {
    this.clock = clock;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    this.stmtInsert = this.db.prepare(
      `INSERT OR IGNORE INTO consumed_nonces (nonce_hash, expires_at, consumed_at)
       VALUES (?, ?, ?)`,
    ) as Stmt;
    this.stmtPrune = this.db.prepare(
      "DELETE FROM consumed_nonces WHERE expires_at < ?",
    ) as Stmt;
    this.stmtHas = this.db.prepare(
      "SELECT 1 FROM consumed_nonces WHERE nonce_hash = ?",
    ) as Stmt;
  }

  /**
   * Consume a nonce. Returns false (caller must not proceed) when the nonce
   * is empty, already consumed, or expired at the moment of the call. An
   * invalid expiry date counts as expired.
   */
  consume(nonceId: string, expiresAt: Date): boolean {
    if (nonceId.length === 0) return false;
    if (!Number.isFinite(expiresAt.getTime())) return false;
    const now = this.clock();
    if (expiresAt.getTime() <= now.getTime()) return false;

    const info = this.stmtInsert.run(
      sha256(nonceId),
      expiresAt.toISOString(),
      now.toISOString(),
    );
    return info.changes === 1;
  }

  isConsumed(nonceId: string): boolean {
    return this.stmtHas.get(sha256(nonceId)) !== undefined;
  }

  /**
   * Drop rows whose expiry has passed. Safe because consume() rejects
   * expired nonces before the table is consulted.
   */
  prune(): number {
    return this.stmtPrune.run(this.clock().toISOString()).changes;
  }

  close(): void {
    this.db.close();
  }
}
