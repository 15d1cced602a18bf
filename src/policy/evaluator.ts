/**
 * Capability policy evaluator.
 *
 * Pure and stateless: no I/O, no caching, no mutation. Safe to call
 * concurrently from any read path. Usage counts are supplied by the caller
 * (see usage-ledger.ts).
 *
 * Rule order:
 *   0. Unknown capability or missing policy → deny (fail closed).
 *   1. Policy disabled → allow (operator chose to disengage constraints).
 *   2. Daily cap met or exceeded → deny, reason carries used/max.
 *   3. The capability's own flag.
 */

import { GovernanceError } from "../kernel/errors.js";
import {
  CAPABILITY_LABELS,
  isCapability,
  type OperatorPolicy,
} from "./policy.js";

export interface PolicyDecision {
  allowed: boolean;
  reason: string;
  capability: string;
}

export function decide(
  capability: string,
  policy: OperatorPolicy | null | undefined,
  usageToday: number,
): PolicyDecision {
  if (!isCapability(capability)) {
    return {
      allowed: false,
      reason: `Unknown capability "${capability}" is blocked`,
      capability,
    };
  }

  if (!policy) {
    return {
      allowed: false,
      reason: "No operator policy is configured; all capabilities are blocked",
      capability,
    };
  }

  if (!policy.enabled) {
    return {
      allowed: true,
      reason: "Policy is disabled; all capabilities allowed",
      capability,
    };
  }

  if (policy.maxActionsPerDay !== undefined) {
    const used = Number.isFinite(usageToday) ? Math.max(0, usageToday) : Infinity;
    if (used >= policy.maxActionsPerDay) {
      return {
        allowed: false,
        reason: `Daily limit reached (${used}/${policy.maxActionsPerDay}). Resets at midnight.`,
        capability,
      };
    }
  }

  const label = CAPABILITY_LABELS[capability];
  return policy.capabilities[capability]
    ? { allowed: true, reason: `${label} is allowed by your policy`, capability }
    : { allowed: false, reason: `${label} is blocked by your policy`, capability };
}

/** Disabled or missing policy still demands confirmation. */
export function requiresExplicitConfirmation(
  policy: OperatorPolicy | null | undefined,
): boolean {
  if (!policy || !policy.enabled) return true;
  return policy.requireExplicitConfirmation;
}

export function assertAllowed(
  capability: string,
  policy: OperatorPolicy | null | undefined,
  usageToday: number,
): PolicyDecision {
  const decision = decide(capability, policy, usageToday);
  if (!decision.allowed) {
    throw new GovernanceError(decision.reason, "POLICY_DENIED", {
      capability,
      usageToday,
    });
  }
  return decision;
}
