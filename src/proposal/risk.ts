/**
 * Deterministic risk scoring. Rules only; every point of score carries a
 * reason.
 *
 * Six dimensions, each scored 0..100 and capped, then combined with fixed
 * weights (sum 100). Escalation floors then lift the score to the lower
 * breakpoint of a minimum tier for action classes that must never be
 * scored below it. Tier mapping uses RISK_TIER_BREAKPOINTS only.
 */

import { RISK_TIER_BREAKPOINTS } from "../kernel/constants.js";

export type RiskTier = "low" | "medium" | "high" | "critical";
export const RISK_TIERS: readonly RiskTier[] = ["low", "medium", "high", "critical"];

export type Reversibility = "reversible" | "partially_reversible" | "irreversible";

export type RiskDimension =
  | "financial_impact"
  | "external_exposure"
  | "data_sensitivity"
  | "system_mutation"
  | "reversibility"
  | "scope";

export interface RiskContext {
  involvesPayment: boolean;
  involvesSubscription: boolean;
  consumesResources: boolean;

  sendsExternalCommunication: boolean;
  externalRecipientCount: number;
  hasPublicVisibility: boolean;
  involvesThirdPartyApi: boolean;
  touchesNetworkEgress: boolean;

  involvesPii: boolean;
  involvesCredentials: boolean;
  involvesHealthData: boolean;
  involvesFinancialData: boolean;

  writesToDatabase: boolean;
  writesToFileSystem: boolean;
  writesCalendar: boolean;
  isDeleteOperation: boolean;
  changesConfiguration: boolean;

  reversibility: Reversibility;
  hasRollbackMechanism: boolean;

  affectedEntityCount: number;
  isBatchOperation: boolean;
  crossesSystemBoundary: boolean;
  untrustedInputCount: number;
}

export interface RiskReason {
  dimension: RiskDimension | "escalation_floor";
  description: string;
  scoreContribution: number;
}

export const RISK_DIMENSIONS: readonly RiskDimension[] = [
  "financial_impact",
  "external_exposure",
  "data_sensitivity",
  "system_mutation",
  "reversibility",
  "scope",
];

export type RiskDimensions = Record<RiskDimension, number>;

export interface RiskAssessment {
  score: number;
  tier: RiskTier;
  reasons: RiskReason[];
  dimensions: RiskDimensions;
}

export const RISK_WEIGHTS: Readonly<RiskDimensions> = {
  financial_impact: 20,
  external_exposure: 25,
  data_sensitivity: 20,
  system_mutation: 15,
  reversibility: 15,
  scope: 5,
};

export const NEUTRAL_RISK_CONTEXT: Readonly<RiskContext> = Object.freeze({
  involvesPayment: false,
  involvesSubscription: false,
  consumesResources: false,
  sendsExternalCommunication: false,
  externalRecipientCount: 0,
  hasPublicVisibility: false,
  involvesThirdPartyApi: false,
  touchesNetworkEgress: false,
  involvesPii: false,
  involvesCredentials: false,
  involvesHealthData: false,
  involvesFinancialData: false,
  writesToDatabase: false,
  writesToFileSystem: false,
  writesCalendar: false,
  isDeleteOperation: false,
  changesConfiguration: false,
  reversibility: "reversible",
  hasRollbackMechanism: true,
  affectedEntityCount: 1,
  isBatchOperation: false,
  crossesSystemBoundary: false,
  untrustedInputCount: 0,
});

// ---------------------------------------------------------------------------
// Tier mapping
// ---------------------------------------------------------------------------

export function tierForScore(score: number): RiskTier {
  if (score >= RISK_TIER_BREAKPOINTS.critical) return "critical";
  if (score >= RISK_TIER_BREAKPOINTS.high) return "high";
  if (score >= RISK_TIER_BREAKPOINTS.medium) return "medium";
  return "low";
}

// ---------------------------------------------------------------------------
// Dimension rules
// ---------------------------------------------------------------------------

type Rule = readonly [applies: boolean, points: number, description: string];

function scoreDimension(
  dimension: RiskDimension,
  rules: readonly Rule[],
  reasons: RiskReason[],
): number {
  let score = 0;
  for (const [applies, points, description] of rules) {
    if (applies && points > 0) {
      score += points;
      reasons.push({ dimension, description, scoreContribution: points });
    }
  }
  return Math.min(100, score);
}

function assessDimensions(ctx: RiskContext, reasons: RiskReason[]): RiskDimensions {
  const recipients = ctx.externalRecipientCount;
  const entities = ctx.affectedEntityCount;
  const untrusted = ctx.untrustedInputCount;
  const notReversible = ctx.reversibility !== "reversible";

  return {
    financial_impact: scoreDimension("financial_impact", [
      [ctx.involvesPayment, 80, "Action involves a financial transaction"],
      [ctx.involvesSubscription, 60, "Action involves a subscription or recurring charge"],
      [ctx.consumesResources, 20, "Action consumes billable resources"],
    ], reasons),

    external_exposure: scoreDimension("external_exposure", [
      [ctx.sendsExternalCommunication, 40, "Action sends external communication"],
      [recipients > 1, Math.min(30, recipients * 10), `Action has ${recipients} external recipients`],
      [ctx.hasPublicVisibility, 50, "Action has public visibility"],
      [ctx.involvesThirdPartyApi, 25, "Action calls a third-party API"],
      [ctx.touchesNetworkEgress, 30, "Action issues network egress"],
    ], reasons),

    data_sensitivity: scoreDimension("data_sensitivity", [
      [ctx.involvesPii, 50, "Action involves personal data"],
      [ctx.involvesCredentials, 80, "Action touches the credential store"],
      [ctx.involvesHealthData, 70, "Action involves health data"],
      [ctx.involvesFinancialData, 60, "Action involves financial data"],
    ], reasons),

    system_mutation: scoreDimension("system_mutation", [
      [ctx.writesToDatabase, 40, "Action writes to a database"],
      [ctx.writesToFileSystem, 30, "Action writes to the file system"],
      [ctx.writesCalendar, 35, "Action writes to the calendar"],
      [ctx.isDeleteOperation, 50, "Action performs a delete"],
      [ctx.changesConfiguration, 45, "Action changes system configuration"],
    ], reasons),

    reversibility: scoreDimension("reversibility", [
      [ctx.reversibility === "partially_reversible", 30, "Action is only partially reversible"],
      [ctx.reversibility === "irreversible", 60, "Action is irreversible"],
      [notReversible && !ctx.hasRollbackMechanism, 20, "No automated rollback is available"],
    ], reasons),

    scope: scoreDimension("scope", [
      [entities > 1, Math.min(50, entities * 5), `Action affects ${entities} entities`],
      [ctx.isBatchOperation, 30, "Action is a batch operation"],
      [ctx.crossesSystemBoundary, 25, "Action crosses a system boundary"],
      [untrusted > 0, Math.min(40, untrusted * 10), `${untrusted} untrusted input(s) feed this action`],
    ], reasons),
  };
}

function weightedScore(dimensions: RiskDimensions): number {
  let total = 0;
  for (const key of RISK_DIMENSIONS) {
    total += dimensions[key] * RISK_WEIGHTS[key];
  }
  return Math.max(0, Math.min(100, Math.floor(total / 100)));
}

// ---------------------------------------------------------------------------
// Escalation floors
// ---------------------------------------------------------------------------

function minimumTier(ctx: RiskContext): { tier: RiskTier; description: string } | undefined {
  const irreversible = ctx.reversibility === "irreversible";
  if (irreversible && (ctx.sendsExternalCommunication || ctx.involvesPayment)) {
    return { tier: "critical", description: "Irreversible external send or payment is critical" };
  }
  if (irreversible) {
    return { tier: "high", description: "Irreversible actions are at least high risk" };
  }
  if (ctx.involvesCredentials) {
    return { tier: "high", description: "Credential access is at least high risk" };
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Explicit `undefined` falls back to the neutral value, like an absent key. */
function withDefaults(p: Partial<RiskContext>): RiskContext {
  const d = NEUTRAL_RISK_CONTEXT;
  return {
    involvesPayment: p.involvesPayment ?? d.involvesPayment,
    involvesSubscription: p.involvesSubscription ?? d.involvesSubscription,
    consumesResources: p.consumesResources ?? d.consumesResources,
    sendsExternalCommunication: p.sendsExternalCommunication ?? d.sendsExternalCommunication,
    externalRecipientCount: p.externalRecipientCount ?? d.externalRecipientCount,
    hasPublicVisibility: p.hasPublicVisibility ?? d.hasPublicVisibility,
    involvesThirdPartyApi: p.involvesThirdPartyApi ?? d.involvesThirdPartyApi,
    touchesNetworkEgress: p.touchesNetworkEgress ?? d.touchesNetworkEgress,
    involvesPii: p.involvesPii ?? d.involvesPii,
    involvesCredentials: p.involvesCredentials ?? d.involvesCredentials,
    involvesHealthData: p.involvesHealthData ?? d.involvesHealthData,
    involvesFinancialData: p.involvesFinancialData ?? d.involvesFinancialData,
    writesToDatabase: p.writesToDatabase ?? d.writesToDatabase,
    writesToFileSystem: p.writesToFileSystem ?? d.writesToFileSystem,
    writesCalendar: p.writesCalendar ?? d.writesCalendar,
    isDeleteOperation: p.isDeleteOperation ?? d.isDeleteOperation,
    changesConfiguration: p.changesConfiguration ?? d.changesConfiguration,
    reversibility: p.reversibility ?? d.reversibility,
    hasRollbackMechanism: p.hasRollbackMechanism ?? d.hasRollbackMechanism,
    affectedEntityCount: p.affectedEntityCount ?? d.affectedEntityCount,
    isBatchOperation: p.isBatchOperation ?? d.isBatchOperation,
    crossesSystemBoundary: p.crossesSystemBoundary ?? d.crossesSystemBoundary,
    untrustedInputCount: p.untrustedInputCount ?? d.untrustedInputCount,
  };
}

export function assessRisk(partial: Partial<RiskContext>): RiskAssessment {
  const ctx = withDefaults(partial);
  const reasons: RiskReason[] = [];
  const dimensions = assessDimensions(ctx, reasons);
  let score = weightedScore(dimensions);

  const floor = minimumTier(ctx);
  if (floor) {
    const floorScore = RISK_TIER_BREAKPOINTS[floor.tier];
    if (score < floorScore) {
      reasons.push({
        dimension: "escalation_floor",
        description: floor.description,
        scoreContribution: floorScore - score,
      });
      score = floorScore;
    }
  }

  return { score, tier: tierForScore(score), reasons, dimensions };
}
