/**
 * Approval session manager.
 *
 * State machine:  pending → approved | denied | expired
 *
 * PERMANENT INVARIANTS:
 *   - One session per proposal; sessions are never reused.
 *   - recordDecision is idempotent-once: a terminal session returns its
 *     original decision and is not modified.
 *   - Expiry and two-key freshness are wall-clock checks made at the moment
 *     of use.
 *   - A session admits at most one execution attempt (beginExecution).
 *   - Every violation is a typed GovernanceError; nothing fails open.
 */

import { v4 as uuidv4 } from "uuid";
import type { EvidenceChain } from "../audit/store.js";
import {
  MIN_SESSION_TTL_MS,
  SESSION_TTL_MS,
  TWO_KEY_FRESHNESS_MS,
} from "../kernel/constants.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { ProposalPack } from "../proposal/builder.js";
import { confirmationFreshness } from "./two-key.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ApprovalDecision = "pending" | "approved" | "denied" | "expired";
export type HumanDecision = "approved" | "denied";

export interface ApprovalSession {
  readonly id: string;
  readonly proposal: ProposalPack;
  readonly decision: ApprovalDecision;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly decidedAt?: string;
  readonly secondConfirmationGrantedAt?: string;
  readonly executionStartedAt?: string;
}

interface SessionRecord {
  id: string;
  proposal: ProposalPack;
  decision: ApprovalDecision;
  createdAt: Date;
  expiresAt: Date;
  decidedAt?: Date;
  secondConfirmationGrantedAt?: Date;
  executionStartedAt?: Date;
}

export interface ApprovalSessionManagerDeps {
  evidence: EvidenceChain;
  logger?: Logger;
  clock?: () => Date;
  /** Raised to MIN_SESSION_TTL_MS when lower. */
  sessionTtlMs?: number;
}

export type SessionChangeListener = (session: ApprovalSession) => void;

export function effectiveSessionTtl(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) return SESSION_TTL_MS;
  return Math.max(MIN_SESSION_TTL_MS, Math.floor(requested));
}

function toSnapshot(r: SessionRecord): ApprovalSession {
  return Object.freeze({
    id: r.id,
    proposal: r.proposal,
    decision: r.decision,
    createdAt: r.createdAt.toISOString(),
    expiresAt: r.expiresAt.toISOString(),
    decidedAt: r.decidedAt?.toISOString(),
    secondConfirmationGrantedAt: r.secondConfirmationGrantedAt?.toISOString(),
    executionStartedAt: r.executionStartedAt?.toISOString(),
  });
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class ApprovalSessionManager {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly byProposal = new Map<string, string>();
  private readonly evidence: EvidenceChain;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly ttlMs: number;
  private readonly listeners = new Set<SessionChangeListener>();

  constructor(deps: ApprovalSessionManagerDeps) {
    this.evidence = deps.evidence;
    this.logger = deps.logger ?? silentLogger();
    this.clock = deps.clock ?? (() => new Date());
    this.ttlMs = effectiveSessionTtl(deps.sessionTtlMs);
    if (deps.sessionTtlMs !== undefined && this.ttlMs !== deps.sessionTtlMs) {
      this.logger.warn(
        { requested: deps.sessionTtlMs, effective: this.ttlMs },
        "session TTL raised to minimum floor",
      );
    }
  }

  get sessionTtlMs(): number {
    return this.ttlMs;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  create(proposal: ProposalPack): ApprovalSession {
    if (this.byProposal.has(proposal.proposalId)) {
      throw new GovernanceError(
        `Proposal ${proposal.proposalId} already has an approval session`,
        "SESSION_EXISTS",
        { proposalId: proposal.proposalId },
      );
    }

    const now = this.clock();
    const record: SessionRecord = {
      id: uuidv4(),
      proposal,
      decision: "pending",
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.ttlMs),
    };

    this.evidence.append("approval_session_created", record.id, {
      proposalId: proposal.proposalId,
      proposalHash: proposal.proposalHash,
      riskTier: proposal.riskTier,
      twoKeyRequired: proposal.requiredApprovals.twoKeyConfirmation,
      expiresAt: record.expiresAt.toISOString(),
    });

    this.sessions.set(record.id, record);
    this.byProposal.set(proposal.proposalId, record.id);
    this.logger.info(
      { sessionId: record.id, riskTier: proposal.riskTier },
      "approval session created",
    );
    return this.emit(record);
  }

  get(sessionId: string): ApprovalSession {
    return toSnapshot(this.load(sessionId));
  }

  list(): ApprovalSession[] {
    return [...this.sessions.keys()].map((id) => this.get(id));
  }

  /**
   * Record the human decision. On a terminal session this is a no-op that
   * returns the decision already recorded.
   */
  recordDecision(sessionId: string, decision: HumanDecision): ApprovalDecision {
    const record = this.load(sessionId);
    if (record.decision !== "pending") {
      this.logger.debug(
        { sessionId, existing: record.decision, attempted: decision },
        "decision ignored: session already terminal",
      );
      return record.decision;
    }

    const now = this.clock();
    this.evidence.append("approval_decision_recorded", sessionId, {
      proposalId: record.proposal.proposalId,
      decision,
    });
    record.decision = decision;
    record.decidedAt = now;
    this.logger.info({ sessionId, decision }, "approval decision recorded");
    this.emit(record);
    return decision;
  }

  // -----------------------------------------------------------------------
  // Two-key confirmation
  // -----------------------------------------------------------------------

  grantSecondConfirmation(
    sessionId: string,
    options: { actionEnabled: boolean },
  ): Date {
    const record = this.load(sessionId);

    if (record.decision !== "approved") {
      throw new GovernanceError(
        `Second confirmation requires an approved session (is ${record.decision})`,
        "CONFIRMATION_OUT_OF_ORDER",
        { sessionId, decision: record.decision },
      );
    }
    if (record.executionStartedAt) {
      throw new GovernanceError(
        `Session ${sessionId} has already been executed`,
        "ALREADY_EXECUTED",
        { sessionId },
      );
    }
    const grantedAt = this.clock();
    if (grantedAt.getTime() >= record.expiresAt.getTime()) {
      throw new GovernanceError(
        `Approval for session ${sessionId} lapsed before the second confirmation`,
        "SESSION_NOT_APPROVED",
        { sessionId, expiresAt: record.expiresAt.toISOString() },
      );
    }
    if (!options.actionEnabled) {
      throw new GovernanceError(
        "Second confirmation refused: the action is no longer enabled",
        "POLICY_DENIED",
        { sessionId, capability: record.proposal.intent.capability },
      );
    }

    this.evidence.append("second_confirmation_granted", sessionId, {
      proposalId: record.proposal.proposalId,
      grantedAt: grantedAt.toISOString(),
      freshnessWindowMs: TWO_KEY_FRESHNESS_MS,
    });
    record.secondConfirmationGrantedAt = grantedAt;
    this.emit(record);
    return grantedAt;
  }

  // -----------------------------------------------------------------------
  // Execution gating
  // -----------------------------------------------------------------------

  /**
   * Throws unless the session may execute right now. A stale second
   * confirmation is cleared so that a fresh one must be granted.
   */
  assertExecutable(sessionId: string): ApprovalSession {
    const record = this.load(sessionId);
    const now = this.clock();

    if (record.executionStartedAt) {
      throw new GovernanceError(
        `Session ${sessionId} has already been executed`,
        "ALREADY_EXECUTED",
        { sessionId },
      );
    }
    if (record.decision !== "approved") {
      throw new GovernanceError(
        `Session ${sessionId} is ${record.decision}, not approved`,
        "SESSION_NOT_APPROVED",
        { sessionId, decision: record.decision },
      );
    }
    if (now.getTime() >= record.expiresAt.getTime()) {
      throw new GovernanceError(
        `Approval for session ${sessionId} lapsed before execution`,
        "SESSION_NOT_APPROVED",
        { sessionId, expiresAt: record.expiresAt.toISOString() },
      );
    }

    if (record.proposal.requiredApprovals.twoKeyConfirmation) {
      const grantedAt = record.secondConfirmationGrantedAt;
      if (!grantedAt) {
        throw new GovernanceError(
          "Two-key confirmation has not been granted for this session",
          "CONFIRMATION_OUT_OF_ORDER",
          { sessionId, riskTier: record.proposal.riskTier },
        );
      }
      const verdict = confirmationFreshness(grantedAt, now);
      if (verdict === "future") {
        throw new GovernanceError(
          "Two-key confirmation timestamp is in the future",
          "CONFIRMATION_OUT_OF_ORDER",
          { sessionId, grantedAt: grantedAt.toISOString() },
        );
      }
      if (verdict === "expired") {
        record.secondConfirmationGrantedAt = undefined;
        this.evidence.append("second_confirmation_expired", sessionId, {
          grantedAt: grantedAt.toISOString(),
          checkedAt: now.toISOString(),
        });
        this.emit(record);
        throw new GovernanceError(
          `Two-key confirmation expired (${now.getTime() - grantedAt.getTime()}ms ≥ ${TWO_KEY_FRESHNESS_MS}ms); confirm again`,
          "CONFIRMATION_EXPIRED",
          { sessionId, grantedAt: grantedAt.toISOString() },
        );
      }
    }

    return toSnapshot(record);
  }

  /**
   * Claim the session's single execution slot. Every later call, including
   * a concurrent one, fails with ALREADY_EXECUTED.
   */
  beginExecution(sessionId: string): ApprovalSession {
    this.assertExecutable(sessionId);
    const record = this.load(sessionId);
    record.executionStartedAt = this.clock();
    this.evidence.append("execution_started", sessionId, {
      proposalId: record.proposal.proposalId,
    });
    return this.emit(record);
  }

  onChange(listener: SessionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Fetch a record, applying wall-clock expiry first. */
  private load(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new GovernanceError(
        `Approval session not found: ${sessionId}`,
        "SESSION_NOT_FOUND",
        { sessionId },
      );
    }
    const now = this.clock();
    if (record.decision === "pending" && now.getTime() >= record.expiresAt.getTime()) {
      this.evidence.append("approval_session_expired", sessionId, {
        proposalId: record.proposal.proposalId,
        expiresAt: record.expiresAt.toISOString(),
      });
      record.decision = "expired";
      record.decidedAt = now;
      this.logger.info({ sessionId }, "approval session expired");
      this.emit(record);
    }
    return record;
  }

  private emit(record: SessionRecord): ApprovalSession {
    const snapshot = toSnapshot(record);
    for (const listener of this.listeners) {
      listener(snapshot);
    }
    return snapshot;
  }
}
