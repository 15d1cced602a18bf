/**
 * Read-only diagnostic snapshot for an operations dashboard.
 *
 * Building a FindingPack never mutates anything: it reads the evidence
 * chain, the trust registry and the guard's current posture.
 */

import type { DivergenceReport } from "../audit/mirror.js";
import type { EvidenceChain } from "../audit/store.js";
import {
  POLICY_DENIAL_SPIKE_THRESHOLD,
  POLICY_DENIAL_WINDOW_MS,
} from "../kernel/constants.js";
import type { Posture } from "../kernel/integrity-guard.js";
import type { TrustRegistry } from "../trust/registry.js";

export const POLICY_DENIED_ENTRY = "policy_denied";

export type FindingSeverity = "info" | "warning" | "critical";
export type FindingCategory = "posture" | "policy" | "keys" | "devices" | "evidence" | "mirror";

export interface Finding {
  category: FindingCategory;
  severity: FindingSeverity;
  title: string;
  detail: string;
}

export interface FindingPack {
  generatedAt: string;
  posture: Posture;
  findings: Finding[];
  summary: Record<FindingSeverity, number>;
  policyDenials: { windowMs: number; count: number; spike: boolean };
  keyLifecycle: { epochId: number; activeKeyVersion: number; revokedKeyVersions: number[] };
  devices: { total: number; trusted: number; suspended: number; revoked: number; currentTrusted: boolean };
  chain: { overallValid: boolean; totalEntries: number; firstViolation: number | null };
  mirror?: DivergenceReport;
}

export interface FindingSources {
  evidence: EvidenceChain;
  trust: TrustRegistry;
  posture: Posture;
  mirror?: DivergenceReport;
  clock?: () => Date;
}

export function buildFindingPack(src: FindingSources): FindingPack {
  const now = (src.clock ?? (() => new Date()))();
  const findings: Finding[] = [];

  // Posture
  if (src.posture === "EXECUTION_LOCKDOWN") {
    findings.push({
      category: "posture",
      severity: "critical",
      title: "Execution lockdown",
      detail: "All gated actions are blocked until recovery succeeds.",
    });
  } else if (src.posture === "DEGRADED") {
    findings.push({
      category: "posture",
      severity: "warning",
      title: "Degraded posture",
      detail: "An advisory integrity check is failing.",
    });
  }

  // Policy denials
  const since = new Date(now.getTime() - POLICY_DENIAL_WINDOW_MS).toISOString();
  const denials = src.evidence.listEntries({ type: POLICY_DENIED_ENTRY, since }).length;
  const spike = denials >= POLICY_DENIAL_SPIKE_THRESHOLD;
  if (spike) {
    findings.push({
      category: "policy",
      severity: "warning",
      title: "Policy denial spike",
      detail: `${denials} denials in the last hour (threshold ${POLICY_DENIAL_SPIKE_THRESHOLD}).`,
    });
  }

  // Keys
  const epoch = src.trust.currentEpoch();
  if (epoch.revokedKeyVersions.length > 0) {
    findings.push({
      category: "keys",
      severity: "info",
      title: "Revoked key versions",
      detail: `Revoked: ${epoch.revokedKeyVersions.join(", ")}. Active: v${epoch.activeKeyVersion}.`,
    });
  }

  // Devices
  const devices = src.trust.listDevices();
  const byState = { trusted: 0, suspended: 0, revoked: 0 };
  for (const d of devices) byState[d.trustState]++;
  const currentTrusted = src.trust.isCurrentDeviceTrusted();
  if (!currentTrusted) {
    findings.push({
      category: "devices",
      severity: "critical",
      title: "Current device not trusted",
      detail: src.trust.currentDevice
        ? `Device ${src.trust.currentDevice} is not in the trusted state.`
        : "No device fingerprint is configured.",
    });
  }
  if (byState.suspended > 0) {
    findings.push({
      category: "devices",
      severity: "warning",
      title: "Suspended devices",
      detail: `${byState.suspended} device(s) suspended.`,
    });
  }

  // Evidence chain
  const chain = src.evidence.verifyChainIntegrity();
  if (!chain.overallValid) {
    findings.push({
      category: "evidence",
      severity: "critical",
      title: "Evidence chain integrity violation",
      detail: `First violation at index ${chain.firstViolation}; ${chain.violations.length} entries affected.`,
    });
  }

  // Mirror
  if (src.mirror?.status === "diverged") {
    findings.push({
      category: "mirror",
      severity: "warning",
      title: "Evidence mirror diverged",
      detail: `Mirror ${src.mirror.target} diverged at seq ${src.mirror.firstDivergentSeq}. Reconcile by export.`,
    });
  }

  const summary: Record<FindingSeverity, number> = { info: 0, warning: 0, critical: 0 };
  for (const f of findings) summary[f.severity]++;

  return {
    generatedAt: now.toISOString(),
    posture: src.posture,
    findings,
    summary,
    policyDenials: { windowMs: POLICY_DENIAL_WINDOW_MS, count: denials, spike },
    keyLifecycle: {
      epochId: epoch.epochId,
      activeKeyVersion: epoch.activeKeyVersion,
      revokedKeyVersions: [...epoch.revokedKeyVersions],
    },
    devices: { total: devices.length, ...byState, currentTrusted },
    chain: {
      overallValid: chain.overallValid,
      totalEntries: chain.totalEntries,
      firstViolation: chain.firstViolation,
    },
    mirror: src.mirror,
  };
}
