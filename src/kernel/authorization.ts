/**
 * Single-use authorization tokens.
 *
 * A token is a SignedEnvelope over AuthorizationClaims. It is accepted only
 * when all of these hold at the moment of use:
 *   - the signature verifies and its key version is not revoked
 *   - key version and epoch still match the active trust epoch
 *   - it names the session and proposal hash being executed
 *   - issuedAt <= now < expiresAt
 *   - its token id has never been consumed (nonce store)
 */

import { v4 as uuidv4 } from "uuid";
import type { EvidenceChain } from "../audit/store.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { ProposalPack } from "../proposal/builder.js";
import { computeTokenHash } from "../trace/trace.js";
import type { TrustRegistry } from "../trust/registry.js";
import type { PayloadSigner, SignedEnvelope } from "../trust/signer.js";
import { TOKEN_TTL_MS } from "./constants.js";
import { GovernanceError } from "./errors.js";

export type AuthorizationClaims = {
  tokenId: string;
  sessionId: string;
  proposalId: string;
  proposalHash: string;
  policyHash: string;
  issuedAt: string;
  expiresAt: string;
};

export type AuthorizationToken = SignedEnvelope<AuthorizationClaims>;

export interface TokenAuthorityDeps {
  signer: PayloadSigner;
  trust: TrustRegistry;
  evidence: EvidenceChain;
  logger?: Logger;
  clock?: () => Date;
  ttlMs?: number;
}

export function tokenHashOf(token: AuthorizationToken): string {
  return computeTokenHash({
    tokenId: token.payload.tokenId,
    proposalId: token.payload.proposalId,
    signature: token.signature,
  });
}

export class TokenAuthority {
  private readonly signer: PayloadSigner;
  private readonly trust: TrustRegistry;
  private readonly evidence: EvidenceChain;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly ttlMs: number;

  constructor(deps: TokenAuthorityDeps) {
    this.signer = deps.signer;
    this.trust = deps.trust;
    this.evidence = deps.evidence;
    this.logger = deps.logger ?? silentLogger();
    this.clock = deps.clock ?? (() => new Date());
    this.ttlMs = deps.ttlMs ?? TOKEN_TTL_MS;
  }

  async issue(input: {
    sessionId: string;
    proposal: ProposalPack;
    policyHash: string;
  }): Promise<AuthorizationToken> {
    const now = this.clock();
    const token = await this.signer.sign<AuthorizationClaims>({
      tokenId: uuidv4(),
      sessionId: input.sessionId,
      proposalId: input.proposal.proposalId,
      proposalHash: input.proposal.proposalHash,
      policyHash: input.policyHash,
      issuedAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
    });
    this.evidence.append("authorization_token_issued", input.sessionId, {
      tokenHash: tokenHashOf(token),
      keyVersion: token.keyVersion,
      epoch: token.epoch,
      expiresAt: token.payload.expiresAt,
    });
    return token;
  }

  /**
   * Verify every binding, then burn the token id. Throws KEY_REVOKED for a
   * revoked signing key and TOKEN_INVALID for anything else.
   */
  async verifyAndConsume(
    token: AuthorizationToken,
    expected: { sessionId: string; proposalHash: string },
  ): Promise<AuthorizationClaims> {
    const claims = token.payload;
    const reject = (reason: string): never => {
      this.logger.warn({ tokenId: claims.tokenId, reason }, "authorization token rejected");
      this.evidence.append("authorization_token_rejected", expected.sessionId, {
        tokenHash: tokenHashOf(token),
        reason,
      });
      throw new GovernanceError(`Authorization token rejected: ${reason}`, "TOKEN_INVALID", {
        tokenId: claims.tokenId,
        reason,
      });
    };

    const outcome = await this.signer.verify(token);
    if (!outcome.valid) {
      if (outcome.reason === "key_revoked") {
        this.evidence.append("authorization_token_rejected", expected.sessionId, {
          tokenHash: tokenHashOf(token),
          reason: "key_revoked",
        });
        throw new GovernanceError(
          `Token signed with revoked key version ${token.keyVersion}`,
          "KEY_REVOKED",
          { keyVersion: token.keyVersion },
        );
      }
      return reject(outcome.reason);
    }

    if (!this.trust.validateTokenBinding(token.keyVersion, token.epoch)) {
      return reject("stale trust epoch");
    }
    if (claims.sessionId !== expected.sessionId) {
      return reject("session mismatch");
    }
    if (claims.proposalHash !== expected.proposalHash) {
      return reject("proposal hash mismatch");
    }

    const now = this.clock().getTime();
    const issuedAt = Date.parse(claims.issuedAt);
    const expiresAt = Date.parse(claims.expiresAt);
    if (!Number.isFinite(issuedAt) || !Number.isFinite(expiresAt)) {
      return reject("unparseable timestamps");
    }
    if (now < issuedAt) return reject("issued in the future");
    if (now >= expiresAt) return reject("expired");

    if (!this.trust.consume(claims.tokenId, new Date(expiresAt))) {
      return reject("already consumed");
    }
    return claims;
  }
}
