/**
 * Integrity guard: the system posture.
 *
 *   NOMINAL ──(advisory check fails)──▶ DEGRADED
 *      │                                    │
 *      └──(chain / device / epoch fails)────┴──▶ EXECUTION_LOCKDOWN
 *
 * Lockdown is sticky. runChecks never lowers it; only attemptRecovery
 * does, and only after an external RecoveryAuthenticator succeeds AND
 * every check passes. While locked down, token issuance and execution
 * are refused with EXECUTION_LOCKDOWN.
 */

import type { EvidenceMirror } from "../audit/mirror.js";
import type { EvidenceChain } from "../audit/store.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { TrustRegistry } from "../trust/registry.js";
import type { PayloadSigner } from "../trust/signer.js";
import { GovernanceError } from "./errors.js";

export type Posture = "NOMINAL" | "DEGRADED" | "EXECUTION_LOCKDOWN";

export type CheckName =
  | "evidence_chain"
  | "trust_epoch"
  | "device_trust"
  | "signing_key"
  | "evidence_mirror";

export interface IntegrityCheck {
  name: CheckName;
  passed: boolean;
  /** What a failure does to posture. */
  severity: "lockdown" | "degraded";
  detail: string;
}

export interface IntegrityReport {
  posture: Posture;
  checks: IntegrityCheck[];
  checkedAt: string;
}

/** External human-presence check (biometric, hardware key, ...). */
export interface RecoveryAuthenticator {
  authenticate(reason: string): Promise<boolean>;
}

export interface RecoveryOutcome {
  recovered: boolean;
  reason: string;
  report?: IntegrityReport;
}

export interface IntegrityGuardDeps {
  evidence: EvidenceChain;
  trust: TrustRegistry;
  signer?: PayloadSigner;
  mirror?: EvidenceMirror;
  logger?: Logger;
  clock?: () => Date;
}

export type PostureListener = (posture: Posture, reason: string) => void;

const GUARD_SUBJECT = "integrity-guard";

export class IntegrityGuard {
  private readonly deps: IntegrityGuardDeps;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly listeners = new Set<PostureListener>();
  private _posture: Posture = "NOMINAL";
  private lockdownReason: string | undefined;
  private lastReport: IntegrityReport | undefined;

  constructor(deps: IntegrityGuardDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger();
    this.clock = deps.clock ?? (() => new Date());
  }

  get posture(): Posture {
    return this._posture;
  }

  get lockdownCause(): string | undefined {
    return this.lockdownReason;
  }

  get lastCheck(): IntegrityReport | undefined {
    return this.lastReport;
  }

  /** Throws EXECUTION_LOCKDOWN while locked down. */
  assertOperational(): void {
    if (this._posture === "EXECUTION_LOCKDOWN") {
      throw new GovernanceError(
        `System is in execution lockdown: ${this.lockdownReason ?? "unknown cause"}`,
        "EXECUTION_LOCKDOWN",
        { reason: this.lockdownReason },
      );
    }
  }

  async runChecks(): Promise<IntegrityReport> {
    const checks = await this.evaluate();
    const failedLockdown = checks.filter((c) => !c.passed && c.severity === "lockdown");
    const failedAdvisory = checks.filter((c) => !c.passed && c.severity === "degraded");

    if (failedLockdown.length > 0) {
      this.enterLockdown(failedLockdown.map((c) => `${c.name}: ${c.detail}`).join("; "));
    } else if (this._posture !== "EXECUTION_LOCKDOWN") {
      const next: Posture = failedAdvisory.length > 0 ? "DEGRADED" : "NOMINAL";
      this.transition(next, failedAdvisory.map((c) => c.name).join(", ") || "all checks passed");
    }

    this.lastReport = { posture: this._posture, checks, checkedAt: this.clock().toISOString() };
    return this.lastReport;
  }

  forceLockdown(reason: string): void {
    this.enterLockdown(`forced: ${reason}`);
  }

  async attemptRecovery(
    authenticator: RecoveryAuthenticator,
    reason: string,
  ): Promise<RecoveryOutcome> {
    if (this._posture !== "EXECUTION_LOCKDOWN") {
      return { recovered: true, reason: "not in lockdown" };
    }

    const authenticated = await authenticator.authenticate(reason);
    this.deps.evidence.append("lockdown_recovery_attempted", GUARD_SUBJECT, {
      reason,
      authenticated,
    });
    if (!authenticated) {
      this.logger.warn({ reason }, "lockdown recovery refused: authentication failed");
      return { recovered: false, reason: "authentication failed" };
    }

    const checks = await this.evaluate();
    const failing = checks.filter((c) => !c.passed && c.severity === "lockdown");
    const report: IntegrityReport = {
      posture: this._posture,
      checks,
      checkedAt: this.clock().toISOString(),
    };
    if (failing.length > 0) {
      this.lastReport = report;
      return {
        recovered: false,
        reason: `checks still failing: ${failing.map((c) => c.name).join(", ")}`,
        report,
      };
    }

    this.lockdownReason = undefined;
    const degraded = checks.some((c) => !c.passed);
    this.transition(degraded ? "DEGRADED" : "NOMINAL", `recovered: ${reason}`);
    this.lastReport = { ...report, posture: this._posture };
    return { recovered: true, reason: "recovered", report: this.lastReport };
  }

  onChange(listener: PostureListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async evaluate(): Promise<IntegrityCheck[]> {
    const { evidence, trust, signer, mirror } = this.deps;
    const chain = evidence.verifyChainIntegrity();
    const trustState = trust.verifyIntegrity();

    const checks: IntegrityCheck[] = [
      {
        name: "evidence_chain",
        passed: chain.overallValid,
        severity: "lockdown",
        detail: chain.overallValid
          ? `${chain.totalEntries} entries verified`
          : `first violation at index ${chain.firstViolation}`,
      },
      {
        name: "trust_epoch",
        passed: trustState.epochValid,
        severity: "lockdown",
        detail: trustState.epochValid ? "epoch consistent" : "epoch state inconsistent",
      },
      {
        name: "device_trust",
        passed: trustState.currentDeviceTrusted,
        severity: "lockdown",
        detail: trustState.currentDeviceTrusted
          ? "current device trusted"
          : "current device is not registered as trusted",
      },
    ];

    if (signer) {
      const hasKey = await signer.hasActiveKey();
      checks.push({
        name: "signing_key",
        passed: hasKey,
        severity: "degraded",
        detail: hasKey ? "active signing key present" : "active signing key not provisioned",
      });
    }

    if (mirror) {
      const report = await mirror.compare();
      checks.push({
        name: "evidence_mirror",
        passed: report.status !== "diverged",
        severity: "degraded",
        detail: `mirror ${report.status}`,
      });
    }

    return checks;
  }

  private enterLockdown(reason: string): void {
    if (this._posture === "EXECUTION_LOCKDOWN") return;
    this.lockdownReason = reason;
    this.logger.error({ reason }, "entering execution lockdown");
    this.transition("EXECUTION_LOCKDOWN", reason);
  }

  private transition(next: Posture, reason: string): void {
    if (next === this._posture) return;
    const previous = this._posture;
    this._posture = next;
    // Posture is changed first; a failed append must not leave it weaker.
    this.deps.evidence.append("posture_changed", GUARD_SUBJECT, { from: previous, to: next, reason });
    for (const listener of this.listeners) listener(next, reason);
  }
}
