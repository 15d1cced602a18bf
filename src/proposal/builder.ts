/**
 * Proposal builder: candidate action + citations → immutable ProposalPack.
 *
 * INVARIANTS:
 *   - The pack is deep-frozen once built and carries its own content hash.
 *   - high/critical tiers always require two-key confirmation. Operator
 *     policy cannot lower this floor.
 *   - An action that claims external grounding must cite at least one
 *     tool-call result or connector.
 *   - Risk flags implied by the declared scopes, the capability and the
 *     cited tool results are OR'd into the proposer's own flags. A proposer
 *     can raise its risk, never lower it.
 */

import { v4 as uuidv4 } from "uuid";
import { canonicalJson } from "../audit/canonical.js";
import { sha256 } from "../audit/hashing.js";
import { TWO_KEY_TIERS } from "../kernel/constants.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Capability } from "../policy/policy.js";
import {
  assessRisk,
  type Reversibility,
  type RiskContext,
  type RiskReason,
  type RiskTier,
} from "./risk.js";
import {
  CandidateActionSchema,
  EvidenceCitationSchema,
  type CandidateAction,
  type EvidenceCitation,
  type PermissionScope,
} from "./schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProposalIntent {
  readonly action: string;
  readonly capability: Capability;
  readonly summary: string;
  readonly target?: string;
}

export interface RequiredApprovals {
  readonly humanApprovals: number;
  readonly twoKeyConfirmation: boolean;
}

export interface BlastRadius {
  readonly affectedEntities: number;
  readonly externalRecipients: number;
  readonly crossesSystemBoundary: boolean;
}

export interface ProposalPack {
  readonly proposalId: string;
  readonly createdAt: string;
  readonly intent: ProposalIntent;
  readonly connectorId?: string;
  readonly riskScore: number;
  readonly riskTier: RiskTier;
  readonly riskReasons: readonly RiskReason[];
  readonly reversibility: Reversibility;
  readonly requiredApprovals: RequiredApprovals;
  readonly permissionManifest: { readonly scopes: readonly PermissionScope[] };
  readonly blastRadius: BlastRadius;
  readonly costEstimate?: CandidateAction["costEstimate"];
  readonly evidenceCitations: readonly EvidenceCitation[];
  readonly humanSummary: string;
  readonly proposalHash: string;
}

export interface BuildOptions {
  clock?: () => Date;
  proposalId?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function describeReversibility(r: Reversibility): string {
  switch (r) {
    case "reversible":
      return "Reversible";
    case "partially_reversible":
      return "Partially reversible";
    case "irreversible":
      return "Irreversible";
  }
}

export function requiredApprovalsFor(tier: RiskTier): RequiredApprovals {
  return { humanApprovals: 1, twoKeyConfirmation: TWO_KEY_TIERS.has(tier) };
}

export function computeProposalHash(pack: Omit<ProposalPack, "proposalHash">): string {
  return sha256(canonicalJson(pack));
}

const MUTATING_ACCESS: readonly PermissionScope["access"][] = ["write", "delete"];

/** Risk context as the kernel sees it, not as the proposer reports it. */
export function deriveRiskContext(
  action: CandidateAction,
  citations: readonly EvidenceCitation[],
): Partial<RiskContext> {
  const reported = action.risk;
  const touches = (domain: PermissionScope["domain"], mutating = false): boolean =>
    action.scopes.some(
      (s) => s.domain === domain && (!mutating || MUTATING_ACCESS.includes(s.access)),
    );
  const toolResults = citations.filter((c) => c.sourceType === "tool_result").length;

  return {
    ...reported,
    involvesCredentials: reported.involvesCredentials === true || touches("credentials"),
    touchesNetworkEgress:
      reported.touchesNetworkEgress === true ||
      touches("network") ||
      action.capability === "network_requests",
    writesCalendar:
      reported.writesCalendar === true ||
      touches("calendar", true) ||
      action.capability === "calendar_writes",
    writesToDatabase:
      reported.writesToDatabase === true ||
      touches("memory", true) ||
      action.capability === "memory_writes",
    writesToFileSystem: reported.writesToFileSystem === true || touches("files", true),
    isDeleteOperation:
      reported.isDeleteOperation === true || action.scopes.some((s) => s.access === "delete"),
    untrustedInputCount: Math.max(reported.untrustedInputCount ?? 0, toolResults),
  };
}

function parseCitations(citations: readonly unknown[]): EvidenceCitation[] {
  return citations.map((c, index) => {
    const result = EvidenceCitationSchema.safeParse(c);
    if (!result.success) {
      throw new GovernanceError(
        `Citation ${index} must reference a tool-call result or connector`,
        "PROPOSAL_INVALID",
        { index, issues: result.error.issues },
      );
    }
    return result.data;
  });
}

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

export function buildProposal(
  candidate: unknown,
  citations: readonly unknown[],
  options: BuildOptions = {},
): ProposalPack {
  const parsed = CandidateActionSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new GovernanceError(
      "Candidate action failed validation",
      "PROPOSAL_INVALID",
      { issues: parsed.error.issues },
    );
  }
  const action = parsed.data;
  const evidenceCitations = parseCitations(citations);

  if (action.claimsExternalGrounding && evidenceCitations.length === 0) {
    throw new GovernanceError(
      "Action claims external grounding but cites no tool result or connector",
      "PROPOSAL_INVALID",
      { action: action.action },
    );
  }

  const risk = assessRisk(deriveRiskContext(action, evidenceCitations));
  const reversibility = action.risk.reversibility ?? "reversible";
  const requiredApprovals = requiredApprovalsFor(risk.tier);

  const summaryParts = [
    action.summary,
    `Risk: ${risk.tier.toUpperCase()} (${risk.score}/100).`,
    `${describeReversibility(reversibility)}.`,
  ];
  if (requiredApprovals.twoKeyConfirmation) {
    summaryParts.push("Requires two-key confirmation.");
  }

  const body: Omit<ProposalPack, "proposalHash"> = {
    proposalId: options.proposalId ?? uuidv4(),
    createdAt: (options.clock ?? (() => new Date()))().toISOString(),
    intent: {
      action: action.action,
      capability: action.capability,
      summary: action.summary,
      target: action.target,
    },
    connectorId: action.connectorId,
    riskScore: risk.score,
    riskTier: risk.tier,
    riskReasons: risk.reasons,
    reversibility,
    requiredApprovals,
    permissionManifest: { scopes: action.scopes },
    blastRadius: {
      affectedEntities: action.risk.affectedEntityCount ?? 1,
      externalRecipients: action.risk.externalRecipientCount ?? 0,
      crossesSystemBoundary: action.risk.crossesSystemBoundary ?? false,
    },
    costEstimate: action.costEstimate,
    evidenceCitations,
    humanSummary: summaryParts.join(" "),
  };

  return deepFreeze({ ...body, proposalHash: computeProposalHash(body) });
}

/** Recompute the content hash; false means the pack was altered. */
export function verifyProposalHash(pack: ProposalPack): boolean {
  const { proposalHash, ...body } = pack;
  return computeProposalHash(body) === proposalHash;
}
