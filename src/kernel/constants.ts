/**
 * Policy constants. Every threshold the kernel enforces is defined here and
 * nowhere else; call sites import the named value.
 */

import type { RiskTier } from "../proposal/risk.js";

/** Lower bound (inclusive) of each tier's score range. */
export const RISK_TIER_BREAKPOINTS: Readonly<Record<RiskTier, number>> = {
  low: 0,
  medium: 25,
  high: 50,
  critical: 75,
};

/** Tiers whose proposals require two-key confirmation. Not policy-overridable. */
export const TWO_KEY_TIERS: ReadonlySet<RiskTier> = new Set<RiskTier>([
  "high",
  "critical",
]);

export const SESSION_TTL_MS = 300_000;
/** Configured session TTLs below this are raised to it. */
export const MIN_SESSION_TTL_MS = 60_000;

/** A second confirmation is fresh while `now - grantedAt < TWO_KEY_FRESHNESS_MS`. */
export const TWO_KEY_FRESHNESS_MS = 60_000;

export const TOKEN_TTL_MS = 60_000;

export interface AgentLoopLimits {
  maxPasses: number;
  maxToolCalls: number;
  maxSearchQueries: number;
  maxFetchUrls: number;
  perPassTimeoutMs: number;
  totalTimeoutMs: number;
  historyOutputChars: number;
  fetchContentChars: number;
}

export const AGENT_LOOP_LIMITS: Readonly<AgentLoopLimits> = {
  maxPasses: 3,
  maxToolCalls: 8,
  maxSearchQueries: 3,
  maxFetchUrls: 3,
  perPassTimeoutMs: 30_000,
  totalTimeoutMs: 90_000,
  historyOutputChars: 2000,
  fetchContentChars: 3000,
};

export const TRACE_SCHEMA_VERSION = "1.0.0";

/** Policy denials within the diagnostics window that count as a spike. */
export const POLICY_DENIAL_SPIKE_THRESHOLD = 5;
export const POLICY_DENIAL_WINDOW_MS = 3_600_000;
