import { describe, it, expect } from "vitest";
import { isGovernanceError } from "../src/kernel/errors.js";
import {
  buildProposal,
  requiredApprovalsFor,
  verifyProposalHash,
} from "../src/proposal/builder.js";
import type { CandidateActionInput } from "../src/proposal/schemas.js";

const FIXED = { clock: () => new Date("2026-04-02T10:00:00.000Z"), proposalId: "prop-1" };

const calendarCandidate: CandidateActionInput = {
  action: "create_event",
  capability: "calendar_writes",
  summary: "Add standup to calendar.",
  target: "calendar:work",
  scopes: [{ domain: "calendar", access: "write", detail: "Create one event" }],
  risk: { writesCalendar: true },
};

const emailCandidate: CandidateActionInput = {
  action: "send_email",
  capability: "email_drafts",
  summary: "Send the quarterly summary to the partner.",
  target: "partner@example.com",
  scopes: [{ domain: "mail", access: "compose", detail: "One outbound message" }],
  risk: {
    sendsExternalCommunication: true,
    externalRecipientCount: 1,
    reversibility: "irreversible",
    hasRollbackMechanism: false,
  },
};

function expectCode(fn: () => unknown, code: "PROPOSAL_INVALID"): void {
  try {
    fn();
    expect.unreachable();
  } catch (err) {
    expect(isGovernanceError(err, code)).toBe(true);
  }
}

describe("buildProposal", () => {
  it("builds a low-risk pack without two-key confirmation", () => {
    const pack = buildProposal(calendarCandidate, [], FIXED);

    expect(pack.proposalId).toBe("prop-1");
    expect(pack.createdAt).toBe("2026-04-02T10:00:00.000Z");
    expect(pack.intent).toEqual({
      action: "create_event",
      capability: "calendar_writes",
      summary: "Add standup to calendar.",
      target: "calendar:work",
    });
    expect(pack.riskScore).toBe(5);
    expect(pack.riskTier).toBe("low");
    expect(pack.reversibility).toBe("reversible");
    expect(pack.requiredApprovals).toEqual({ humanApprovals: 1, twoKeyConfirmation: false });
    expect(pack.blastRadius).toEqual({
      affectedEntities: 1,
      externalRecipients: 0,
      crossesSystemBoundary: false,
    });
    expect(pack.humanSummary).toBe("Add standup to calendar. Risk: LOW (5/100). Reversible.");
    expect(pack.proposalHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("requires two-key confirmation for a critical pack", () => {
    const pack = buildProposal(emailCandidate, [], FIXED);
    expect(pack.riskTier).toBe("critical");
    expect(pack.riskScore).toBe(75);
    expect(pack.requiredApprovals.twoKeyConfirmation).toBe(true);
    expect(pack.humanSummary).toBe(
      "Send the quarterly summary to the partner. Risk: CRITICAL (75/100). Irreversible. Requires two-key confirmation.",
    );
  });

  it("two-key is required exactly for high and critical", () => {
    expect(requiredApprovalsFor("low").twoKeyConfirmation).toBe(false);
    expect(requiredApprovalsFor("medium").twoKeyConfirmation).toBe(false);
    expect(requiredApprovalsFor("high").twoKeyConfirmation).toBe(true);
    expect(requiredApprovalsFor("critical").twoKeyConfirmation).toBe(true);
  });

  it("deep-freezes the pack", () => {
    const pack = buildProposal(calendarCandidate, [], FIXED);
    expect(Object.isFrozen(pack)).toBe(true);
    expect(Object.isFrozen(pack.intent)).toBe(true);
    expect(Object.isFrozen(pack.permissionManifest.scopes[0])).toBe(true);
  });

  it("hashes identical inputs identically", () => {
    const a = buildProposal(calendarCandidate, [], FIXED);
    const b = buildProposal(calendarCandidate, [], FIXED);
    expect(a.proposalHash).toBe(b.proposalHash);
    const c = buildProposal(calendarCandidate, [], { ...FIXED, proposalId: "prop-2" });
    expect(c.proposalHash).not.toBe(a.proposalHash);
  });

  it("verifyProposalHash detects an altered pack", () => {
    const pack = buildProposal(emailCandidate, [], FIXED);
    expect(verifyProposalHash(pack)).toBe(true);
    expect(verifyProposalHash({ ...pack, riskTier: "low" })).toBe(false);
    expect(
      verifyProposalHash({ ...pack, requiredApprovals: { humanApprovals: 1, twoKeyConfirmation: false } }),
    ).toBe(false);
  });

  it("keeps valid citations", () => {
    const citation = { sourceType: "tool_result", reference: "call-1", redactedSummary: "3 results" };
    const pack = buildProposal({ ...calendarCandidate, claimsExternalGrounding: true }, [citation], FIXED);
    expect(pack.evidenceCitations).toEqual([citation]);
  });

  it("rejects external grounding without citations", () => {
    expectCode(
      () => buildProposal({ ...calendarCandidate, claimsExternalGrounding: true }, [], FIXED),
      "PROPOSAL_INVALID",
    );
  });

  it("rejects a citation that is not a tool result or connector", () => {
    try {
      buildProposal(calendarCandidate, [{ sourceType: "model", reference: "x", redactedSummary: "" }], FIXED);
      expect.unreachable();
    } catch (err) {
      expect(isGovernanceError(err, "PROPOSAL_INVALID")).toBe(true);
      expect((err as Error).message).toBe("Citation 0 must reference a tool-call result or connector");
    }
  });

  it("rejects malformed candidates", () => {
    expectCode(() => buildProposal({ ...calendarCandidate, scopes: [] }, [], FIXED), "PROPOSAL_INVALID");
    expectCode(() => buildProposal({ ...calendarCandidate, capability: "shell" }, [], FIXED), "PROPOSAL_INVALID");
    expectCode(() => buildProposal({ ...calendarCandidate, extra: true }, [], FIXED), "PROPOSAL_INVALID");
    expectCode(() => buildProposal("not an object", [], FIXED), "PROPOSAL_INVALID");
  });
});

describe("kernel-derived risk", () => {
  const credentialCandidate: CandidateActionInput = {
    action: "store_token",
    capability: "memory_writes",
    summary: "Remember the service token.",
    scopes: [{ domain: "credentials", access: "write", detail: "Store one API token" }],
  };

  const citation = (sourceType: "tool_result" | "connector", reference: string) => ({
    sourceType,
    reference,
    redactedSummary: "ok",
  });

  it("a declared credential scope lifts an unflagged candidate to high", () => {
    const pack = buildProposal(credentialCandidate, [], FIXED);
    expect(pack.riskScore).toBe(50);
    expect(pack.riskTier).toBe("high");
    expect(pack.requiredApprovals.twoKeyConfirmation).toBe(true);
    expect(pack.riskReasons).toEqual([
      { dimension: "data_sensitivity", description: "Action touches the credential store", scoreContribution: 80 },
      { dimension: "system_mutation", description: "Action writes to a database", scoreContribution: 40 },
      {
        dimension: "escalation_floor",
        description: "Credential access is at least high risk",
        scoreContribution: 28,
      },
    ]);
  });

  it("a proposer cannot clear a flag its scopes imply", () => {
    const pack = buildProposal({ ...credentialCandidate, risk: { involvesCredentials: false } }, [], FIXED);
    expect(pack.riskTier).toBe("high");
  });

  it("network requests count as egress", () => {
    const pack = buildProposal(
      {
        action: "post_webhook",
        capability: "network_requests",
        summary: "Notify the build hook.",
        scopes: [{ domain: "network", access: "write", detail: "One POST" }],
      },
      [],
      FIXED,
    );
    expect(pack.riskScore).toBe(7);
    expect(pack.riskReasons).toEqual([
      { dimension: "external_exposure", description: "Action issues network egress", scoreContribution: 30 },
    ]);
  });

  it("a delete scope is a delete operation", () => {
    const pack = buildProposal(
      {
        action: "remove_file",
        capability: "task_creation",
        summary: "Remove the stale export.",
        scopes: [{ domain: "files", access: "delete", detail: "One file" }],
      },
      [],
      FIXED,
    );
    expect(pack.riskScore).toBe(12);
    expect(pack.riskReasons.map((r) => r.description)).toEqual([
      "Action writes to the file system",
      "Action performs a delete",
    ]);
  });

  it("counts tool-result citations as untrusted input", () => {
    const citations = [
      citation("tool_result", "run:1"),
      citation("tool_result", "run:2"),
      citation("tool_result", "run:3"),
      citation("connector", "calendar"),
    ];
    const grounded = { ...calendarCandidate, claimsExternalGrounding: true };

    const pack = buildProposal(grounded, citations, FIXED);
    expect(pack.riskScore).toBe(6);
    expect(pack.riskReasons).toContainEqual({
      dimension: "scope",
      description: "3 untrusted input(s) feed this action",
      scoreContribution: 30,
    });

    const reportedHigher = buildProposal({ ...grounded, risk: { writesCalendar: true, untrustedInputCount: 5 } }, citations, FIXED);
    expect(reportedHigher.riskScore).toBe(7);
  });
});
