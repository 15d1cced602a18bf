/**
 * External executor contract.
 *
 * The kernel never performs an effect itself. After every gate passes it
 * hands the proposal and a verified authorization token to an executor,
 * which performs the effect and returns a certificate. The certificate is
 * untrusted input and is parsed before it reaches the trace.
 */

import { z } from "zod";
import type { ProposalPack } from "../proposal/builder.js";
import { RISK_TIERS, type RiskTier } from "../proposal/risk.js";
import type { AuthorizationToken } from "./authorization.js";
import { GovernanceError } from "./errors.js";

export interface ExecutionRequest {
  sessionId: string;
  proposal: ProposalPack;
  token: AuthorizationToken;
}

export interface ExecutionCertificate {
  /** sha256 of the executor's own signed attestation. */
  certificateHash: string;
  riskTier: RiskTier;
  enclaveBacked: boolean;
}

export interface ExternalExecutor {
  execute(request: ExecutionRequest): Promise<ExecutionCertificate>;
}

const RiskTierSchema = z.custom<RiskTier>(
  (v) => typeof v === "string" && (RISK_TIERS as readonly string[]).includes(v),
  { message: "unknown risk tier" },
);

export const ExecutionCertificateSchema = z
  .object({
    certificateHash: z.string().regex(/^[0-9a-f]{64}$/, "must be 64 lowercase hex chars"),
    riskTier: RiskTierSchema,
    enclaveBacked: z.boolean(),
  })
  .strict();

export function parseCertificate(input: unknown, sessionId: string): ExecutionCertificate {
  const result = ExecutionCertificateSchema.safeParse(input);
  if (!result.success) {
    throw new GovernanceError("Executor returned an invalid certificate", "PROPOSAL_INVALID", {
      sessionId,
      issues: result.error.issues,
    });
  }
  return result.data;
}
