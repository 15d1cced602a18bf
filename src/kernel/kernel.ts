/**
 * Kernel composition root.
 *
 * createKernel wires every governance service around one evidence chain and
 * exposes the only path by which an action can take effect:
 *
 *   submitProposal → recordDecision → [grantSecondConfirmation] → execute
 *
 * execute runs these gates in order. Calls are serialized per session, and
 * across sessions from the policy check through the completion entry so the
 * daily cap cannot be raced:
 *   1. device trust         (DEVICE_NOT_TRUSTED, forces lockdown)
 *   2. integrity checks     (EXECUTION_LOCKDOWN)
 *   3. operator policy      (POLICY_DENIED, logged as policy_denied)
 *   4. session state        (SESSION_NOT_APPROVED / CONFIRMATION_* / ALREADY_EXECUTED)
 *   5. token issue + verify (KEY_REVOKED / TOKEN_INVALID)
 *   6. beginExecution       (re-checks freshness at the moment of use)
 *   7. executor             (certificate parsed, never trusted)
 *   8. trace + execution_completed entry
 *
 * A failure in step 8 happens after the effect: it is recorded as
 * execution_failed with effectApplied and locks execution down.
 */

import type { EvidenceMirror } from "../audit/mirror.js";
import type { EvidenceStore } from "../audit/store.js";
import { BoundedAgentLoop } from "../agent/loop.js";
import { citationsFromRun } from "../agent/citations.js";
import type { AgentRunResult, Reasoner, ReadOnlyTools } from "../agent/types.js";
import {
  ApprovalSessionManager,
  type ApprovalDecision,
  type ApprovalSession,
  type HumanDecision,
} from "../approval/session-manager.js";
import { buildFindingPack, POLICY_DENIED_ENTRY, type FindingPack } from "../diagnostics/findings.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { decide, type PolicyDecision } from "../policy/evaluator.js";
import type { PolicyStore } from "../policy/policy-store.js";
import { countActionsToday, EXECUTION_COMPLETED, EXECUTION_FAILED } from "../policy/usage-ledger.js";
import { buildProposal, verifyProposalHash, type ProposalPack } from "../proposal/builder.js";
import type { ExecutionTraceStore } from "../trace/store.js";
import { buildExecutionTrace, computeIntentHash, type ExecutionTrace } from "../trace/trace.js";
import type { CredentialStore } from "../trust/credential-store.js";
import type { DeviceTrustRecord, DeviceTrustState } from "../trust/devices.js";
import type { TrustEpoch } from "../trust/epoch.js";
import type { NonceStore } from "../trust/nonce-store.js";
import { TrustRegistry, type TrustState } from "../trust/registry.js";
import { PayloadSigner } from "../trust/signer.js";
import { writeTrustState } from "../trust/state-file.js";
import type { AgentLoopLimits } from "./constants.js";
import { TokenAuthority, tokenHashOf } from "./authorization.js";
import { GovernanceError } from "./errors.js";
import { parseCertificate, type ExecutionCertificate, type ExternalExecutor } from "./executor.js";
import { IntegrityGuard } from "./integrity-guard.js";
import { KeyedMutex } from "./mutex.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface KernelOptions {
  evidence: EvidenceStore;
  nonces: NonceStore;
  credentials: CredentialStore;
  policy: PolicyStore;
  traces: ExecutionTraceStore;
  mirror?: EvidenceMirror;
  /** Persisted registry state; omit for a fresh registry. */
  trustState?: TrustState;
  /** When set, every trust change is written here. */
  trustStatePath?: string;
  currentDevice?: string;
  sessionTtlMs?: number;
  logger?: Logger;
  clock?: () => Date;
}

export interface ExecutionOutcome {
  trace: ExecutionTrace;
  certificate: ExecutionCertificate;
}

export interface SubmittedProposal {
  proposal: ProposalPack;
  session: ApprovalSession;
}

const TRUST_LOCK = "trust";
const EXECUTION_LOCK = "execution";

// ---------------------------------------------------------------------------
// Kernel
// ---------------------------------------------------------------------------

export class GovernanceKernel {
  readonly evidence: EvidenceStore;
  readonly trust: TrustRegistry;
  readonly signer: PayloadSigner;
  readonly policy: PolicyStore;
  readonly sessions: ApprovalSessionManager;
  readonly tokens: TokenAuthority;
  readonly guard: IntegrityGuard;
  readonly traces: ExecutionTraceStore;
  readonly mirror: EvidenceMirror | undefined;

  private readonly nonces: NonceStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(options: KernelOptions) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? (() => new Date());
    this.evidence = options.evidence;
    this.nonces = options.nonces;
    this.policy = options.policy;
    this.traces = options.traces;
    this.mirror = options.mirror;

    this.trust = new TrustRegistry({
      nonces: options.nonces,
      currentDevice: options.currentDevice,
      state: options.trustState,
      evidence: this.evidence,
      logger: this.logger,
      clock: this.clock,
    });
    const trustStatePath = options.trustStatePath;
    if (trustStatePath) {
      this.trust.onChange((state) => writeTrustState(trustStatePath, state));
    }

    this.signer = new PayloadSigner(this.trust, options.credentials, this.logger);
    this.sessions = new ApprovalSessionManager({
      evidence: this.evidence,
      logger: this.logger,
      clock: this.clock,
      sessionTtlMs: options.sessionTtlMs,
    });
    this.tokens = new TokenAuthority({
      signer: this.signer,
      trust: this.trust,
      evidence: this.evidence,
      logger: this.logger,
      clock: this.clock,
    });
    this.guard = new IntegrityGuard({
      evidence: this.evidence,
      trust: this.trust,
      signer: this.signer,
      mirror: this.mirror,
      logger: this.logger,
      clock: this.clock,
    });
  }

  // -----------------------------------------------------------------------
  // Policy
  // -----------------------------------------------------------------------

  /** Pure check against the live policy and today's usage. Logs nothing. */
  evaluate(capability: string): PolicyDecision {
    return decide(capability, this.policy.get(), countActionsToday(this.evidence, this.clock()));
  }

  private enforcePolicy(capability: string, subjectId: string): PolicyDecision {
    const decision = this.evaluate(capability);
    if (!decision.allowed) {
      this.evidence.append(POLICY_DENIED_ENTRY, subjectId, {
        capability,
        reason: decision.reason,
        policyHash: this.policy.hash(),
      });
      this.logger.warn({ capability, reason: decision.reason }, "policy denied");
      throw new GovernanceError(decision.reason, "POLICY_DENIED", { capability });
    }
    return decision;
  }

  // -----------------------------------------------------------------------
  // Proposals and approvals
  // -----------------------------------------------------------------------

  submitProposal(candidate: unknown, citations: readonly unknown[] = []): SubmittedProposal {
    this.guard.assertOperational();
    const proposal = buildProposal(candidate, citations, { clock: this.clock });
    this.enforcePolicy(proposal.intent.capability, proposal.proposalId);
    this.evidence.append("proposal_built", proposal.proposalId, {
      proposalHash: proposal.proposalHash,
      capability: proposal.intent.capability,
      riskScore: proposal.riskScore,
      riskTier: proposal.riskTier,
      citationCount: proposal.evidenceCitations.length,
    });
    const session = this.sessions.create(proposal);
    return { proposal, session };
  }

  /** Submit a candidate grounded in a finished agent run. */
  proposeFromRun(run: AgentRunResult, candidate: unknown): SubmittedProposal {
    return this.submitProposal(candidate, citationsFromRun(run));
  }

  recordDecision(sessionId: string, decision: HumanDecision): ApprovalDecision {
    return this.sessions.recordDecision(sessionId, decision);
  }

  /** The policy must still enable the action at the moment of the grant. */
  grantSecondConfirmation(sessionId: string): Date {
    const session = this.sessions.get(sessionId);
    const decision = this.evaluate(session.proposal.intent.capability);
    return this.sessions.grantSecondConfirmation(sessionId, { actionEnabled: decision.allowed });
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  execute(sessionId: string, executor: ExternalExecutor): Promise<ExecutionOutcome> {
    return this.mutex.run(sessionId, () =>
      this.mutex.run(EXECUTION_LOCK, () => this.executeGated(sessionId, executor)),
    );
  }

  private async executeGated(
    sessionId: string,
    executor: ExternalExecutor,
  ): Promise<ExecutionOutcome> {
    // 1. Device trust
    if (!this.trust.isCurrentDeviceTrusted()) {
      this.guard.forceLockdown("current device is not trusted");
      throw new GovernanceError("Current device is not trusted", "DEVICE_NOT_TRUSTED", {
        device: this.trust.currentDevice,
      });
    }

    // 2. Integrity
    await this.guard.runChecks();
    this.guard.assertOperational();

    // 3. Policy
    const { proposal } = this.sessions.get(sessionId);
    this.enforcePolicy(proposal.intent.capability, sessionId);

    // 4. Session
    this.sessions.assertExecutable(sessionId);
    if (this.traces.hasTrace(sessionId)) {
      throw new GovernanceError(`Session ${sessionId} has already executed`, "ALREADY_EXECUTED", {
        sessionId,
      });
    }
    if (!verifyProposalHash(proposal)) {
      throw new GovernanceError("Proposal content does not match its hash", "PROPOSAL_INVALID", {
        sessionId,
      });
    }

    // 5. Token
    const policyHash = this.policy.hash();
    const token = await this.tokens.issue({ sessionId, proposal, policyHash });
    await this.tokens.verifyAndConsume(token, { sessionId, proposalHash: proposal.proposalHash });

    // 6. Claim the single execution slot
    this.sessions.beginExecution(sessionId);

    // 7. Effect
    const started = this.clock().getTime();
    let certificate: ExecutionCertificate;
    try {
      certificate = parseCertificate(await executor.execute({ sessionId, proposal, token }), sessionId);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      this.evidence.append(EXECUTION_FAILED, sessionId, {
        proposalId: proposal.proposalId,
        reason,
      });
      this.logger.error({ sessionId, reason }, "execution failed");
      throw err;
    }
    const executionDurationMs = Math.max(0, this.clock().getTime() - started);

    // 8. Proof
    let trace: ExecutionTrace;
    try {
      trace = this.traces.record(
        buildExecutionTrace({
          timestamp: this.clock().toISOString(),
          intentHash: computeIntentHash(proposal.intent.action, proposal.intent.target),
          policyHash,
          approvalId: sessionId,
          tokenHash: tokenHashOf(token),
          connectorId: proposal.connectorId,
          certificateHash: certificate.certificateHash,
          riskTier: proposal.riskTier,
          enclaveBacked: certificate.enclaveBacked,
          executionDurationMs,
          allGatesPassed: true,
        }),
      );
      this.evidence.append(EXECUTION_COMPLETED, sessionId, {
        proposalId: proposal.proposalId,
        capability: proposal.intent.capability,
        traceHash: trace.traceHash,
      });
    } catch (err: unknown) {
      throw this.recordUnprovenEffect(sessionId, proposal, err);
    }
    if (certificate.riskTier !== proposal.riskTier) {
      this.logger.warn(
        { sessionId, proposed: proposal.riskTier, certified: certificate.riskTier },
        "executor certified a different risk tier",
      );
    }
    this.logger.info({ sessionId, traceId: trace.traceId }, "execution completed");
    return { trace, certificate };
  }

  /** Log and record an effect that ran without its proof, then lock down. */
  private recordUnprovenEffect(
    sessionId: string,
    proposal: ProposalPack,
    err: unknown,
  ): GovernanceError {
    const reason = err instanceof Error ? err.message : String(err);
    this.logger.error({ sessionId, reason }, "execution took effect but its proof was not recorded");
    try {
      this.evidence.append(EXECUTION_FAILED, sessionId, {
        proposalId: proposal.proposalId,
        reason,
        effectApplied: true,
      });
    } catch (appendErr: unknown) {
      this.logger.error(
        { sessionId, err: appendErr instanceof Error ? appendErr.message : String(appendErr) },
        "could not record the unproven effect",
      );
    }
    this.guard.forceLockdown(`session ${sessionId} took effect without a recorded proof`);
    return new GovernanceError(
      "Execution took effect but its proof could not be recorded",
      "CHAIN_INTEGRITY_VIOLATION",
      { sessionId, effectApplied: true, reason },
    );
  }

  // -----------------------------------------------------------------------
  // Agent
  // -----------------------------------------------------------------------

  createAgentLoop(
    reasoner: Reasoner,
    tools: ReadOnlyTools,
    limits?: Partial<AgentLoopLimits>,
  ): BoundedAgentLoop {
    return new BoundedAgentLoop({
      reasoner,
      tools,
      evidence: this.evidence,
      limits,
      logger: this.logger,
      now: () => this.clock().getTime(),
    });
  }

  // -----------------------------------------------------------------------
  // Trust mutations (serialized)
  // -----------------------------------------------------------------------

  rotateKey(reason: string): Promise<TrustEpoch> {
    return this.mutex.run(TRUST_LOCK, async () => {
      const epoch = this.trust.rotateKey(reason);
      await this.signer.ensureActiveKey();
      return epoch;
    });
  }

  revokeKey(keyVersion: number, reason?: string): Promise<TrustEpoch> {
    return this.mutex.run(TRUST_LOCK, async () => {
      const epoch = this.trust.revoke(keyVersion, reason);
      await this.signer.ensureActiveKey();
      return epoch;
    });
  }

  registerDevice(fingerprint: string, displayName?: string): Promise<DeviceTrustRecord> {
    return this.mutex.run(TRUST_LOCK, () => this.trust.registerDevice(fingerprint, displayName));
  }

  setDeviceTrust(fingerprint: string, state: DeviceTrustState): Promise<DeviceTrustRecord> {
    return this.mutex.run(TRUST_LOCK, () => this.trust.setTrustState(fingerprint, state));
  }

  // -----------------------------------------------------------------------
  // Diagnostics
  // -----------------------------------------------------------------------

  async diagnostics(): Promise<FindingPack> {
    const mirror = this.mirror ? await this.mirror.compare() : undefined;
    return buildFindingPack({
      evidence: this.evidence,
      trust: this.trust,
      posture: this.guard.posture,
      mirror,
      clock: this.clock,
    });
  }

  close(): void {
    this.traces.close();
    this.nonces.close();
    this.evidence.close();
  }
}

export function createKernel(options: KernelOptions): GovernanceKernel {
  return new GovernanceKernel(options);
}
