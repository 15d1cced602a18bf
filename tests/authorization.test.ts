import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EvidenceStore } from "../src/audit/store.js";
import { TokenAuthority, tokenHashOf, type AuthorizationToken } from "../src/kernel/authorization.js";
import { GovernanceError, type GovernanceErrorCode } from "../src/kernel/errors.js";
import { buildProposal, type ProposalPack } from "../src/proposal/builder.js";
import { MemoryCredentialStore } from "../src/trust/credential-store.js";
import { NonceStore } from "../src/trust/nonce-store.js";
import { TrustRegistry } from "../src/trust/registry.js";
import { PayloadSigner } from "../src/trust/signer.js";

const T0 = Date.parse("2026-05-10T08:00:00.000Z");
const POLICY_HASH = "a".repeat(64);

async function expectRejection(
  p: Promise<unknown>,
  code: GovernanceErrorCode,
  reason?: string,
): Promise<void> {
  try {
    await p;
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(GovernanceError);
    if (err instanceof GovernanceError) {
      expect(err.code).toBe(code);
      if (reason !== undefined) expect(err.details["reason"]).toBe(reason);
    }
  }
}

describe("TokenAuthority", () => {
  let now: number;
  let evidence: EvidenceStore;
  let nonces: NonceStore;
  let trust: TrustRegistry;
  let authority: TokenAuthority;
  let proposal: ProposalPack;

  const clock = (): Date => new Date(now);

  beforeEach(() => {
    now = T0;
    evidence = new EvidenceStore(":memory:", { clock });
    nonces = new NonceStore(":memory:", clock);
    trust = new TrustRegistry({ nonces, evidence, clock });
    const signer = new PayloadSigner(trust, new MemoryCredentialStore());
    authority = new TokenAuthority({ signer, trust, evidence, clock });
    proposal = buildProposal(
      {
        action: "create_event",
        capability: "calendar_writes",
        summary: "Book the review.",
        scopes: [{ domain: "calendar", access: "write", detail: "One event" }],
      },
      [],
      { proposalId: "p-1", clock },
    );
  });
  afterEach(() => {
    nonces.close();
    evidence.close();
  });

  const issue = (): Promise<AuthorizationToken> =>
    authority.issue({ sessionId: "s-1", proposal, policyHash: POLICY_HASH });
  const expected = (): { sessionId: string; proposalHash: string } => ({
    sessionId: "s-1",
    proposalHash: proposal.proposalHash,
  });

  it("issues a bound, signed token and logs its hash", async () => {
    const token = await issue();
    expect(token.keyVersion).toBe(1);
    expect(token.epoch).toBe(1);
    expect(token.payload).toMatchObject({
      sessionId: "s-1",
      proposalId: "p-1",
      proposalHash: proposal.proposalHash,
      policyHash: POLICY_HASH,
      issuedAt: "2026-05-10T08:00:00.000Z",
      expiresAt: "2026-05-10T08:01:00.000Z",
    });

    const [entry] = evidence.listEntries({ type: "authorization_token_issued" });
    expect(entry.subjectId).toBe("s-1");
    expect(entry.payload).toEqual({
      tokenHash: tokenHashOf(token),
      keyVersion: 1,
      epoch: 1,
      expiresAt: "2026-05-10T08:01:00.000Z",
    });
  });

  it("accepts a token once", async () => {
    const token = await issue();
    const claims = await authority.verifyAndConsume(token, expected());
    expect(claims.tokenId).toBe(token.payload.tokenId);
    await expectRejection(authority.verifyAndConsume(token, expected()), "TOKEN_INVALID", "already consumed");
  });

  it("rejects a token for another session or proposal", async () => {
    const token = await issue();
    await expectRejection(
      authority.verifyAndConsume(token, { ...expected(), sessionId: "s-2" }),
      "TOKEN_INVALID",
      "session mismatch",
    );
    await expectRejection(
      authority.verifyAndConsume(token, { ...expected(), proposalHash: "b".repeat(64) }),
      "TOKEN_INVALID",
      "proposal hash mismatch",
    );
    // Binding failures do not burn the token.
    await authority.verifyAndConsume(token, expected());
  });

  it("enforces the validity window", async () => {
    const token = await issue();
    now = T0 - 1;
    await expectRejection(authority.verifyAndConsume(token, expected()), "TOKEN_INVALID", "issued in the future");
    now = T0 + 60_000;
    await expectRejection(authority.verifyAndConsume(token, expected()), "TOKEN_INVALID", "expired");
  });

  it("rejects an altered payload", async () => {
    const token = await issue();
    const forged: AuthorizationToken = { ...token, payload: { ...token.payload, policyHash: "c".repeat(64) } };
    await expectRejection(authority.verifyAndConsume(forged, expected()), "TOKEN_INVALID", "signature_mismatch");
  });

  it("a rotated key makes outstanding tokens KEY_REVOKED", async () => {
    const token = await issue();
    trust.rotateKey("scheduled");
    await expectRejection(authority.verifyAndConsume(token, expected()), "KEY_REVOKED");
    const [entry] = evidence.listEntries({ type: "authorization_token_rejected" });
    expect(entry.payload).toEqual({ tokenHash: tokenHashOf(token), reason: "key_revoked" });
  });

  it("an advanced epoch invalidates outstanding tokens", async () => {
    const token = await issue();
    trust.advanceEpoch("device revoked");
    await expectRejection(authority.verifyAndConsume(token, expected()), "TOKEN_INVALID", "stale trust epoch");
  });
});
