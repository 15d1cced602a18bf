/**
 * Candidate action and citation schemas.
 *
 * A candidate action is what the agent loop (or any other proposer) hands
 * to the proposal builder. It is untrusted input and is parsed, never cast.
 */

import { z } from "zod";
import { CAPABILITIES } from "../policy/policy.js";

export const PERMISSION_DOMAINS = [
  "calendar",
  "mail",
  "reminders",
  "files",
  "network",
  "memory",
  "credentials",
] as const;

export const PERMISSION_ACCESS = ["read", "write", "compose", "delete"] as const;

export const PermissionScopeSchema = z
  .object({
    domain: z.enum(PERMISSION_DOMAINS),
    access: z.enum(PERMISSION_ACCESS),
    detail: z.string().min(1).max(200),
  })
  .strict();

export type PermissionScope = z.infer<typeof PermissionScopeSchema>;

export const EvidenceCitationSchema = z
  .object({
    sourceType: z.enum(["tool_result", "connector"]),
    /** Tool-call id (`tool_result`) or connector id (`connector`). */
    reference: z.string().min(1).max(200),
    redactedSummary: z.string().max(500),
  })
  .strict();

export type EvidenceCitation = z.infer<typeof EvidenceCitationSchema>;

const RiskContextSchema = z
  .object({
    involvesPayment: z.boolean(),
    involvesSubscription: z.boolean(),
    consumesResources: z.boolean(),
    sendsExternalCommunication: z.boolean(),
    externalRecipientCount: z.number().int().min(0),
    hasPublicVisibility: z.boolean(),
    involvesThirdPartyApi: z.boolean(),
    touchesNetworkEgress: z.boolean(),
    involvesPii: z.boolean(),
    involvesCredentials: z.boolean(),
    involvesHealthData: z.boolean(),
    involvesFinancialData: z.boolean(),
    writesToDatabase: z.boolean(),
    writesToFileSystem: z.boolean(),
    writesCalendar: z.boolean(),
    isDeleteOperation: z.boolean(),
    changesConfiguration: z.boolean(),
    reversibility: z.enum(["reversible", "partially_reversible", "irreversible"]),
    hasRollbackMechanism: z.boolean(),
    affectedEntityCount: z.number().int().min(0),
    isBatchOperation: z.boolean(),
    crossesSystemBoundary: z.boolean(),
    untrustedInputCount: z.number().int().min(0),
  })
  .partial()
  .strict();

export const CandidateActionSchema = z
  .object({
    action: z.string().min(1).max(100),
    capability: z.enum(CAPABILITIES),
    summary: z.string().min(1).max(500),
    target: z.string().min(1).max(500).optional(),
    connectorId: z.string().min(1).max(100).optional(),
    scopes: z.array(PermissionScopeSchema).min(1),
    risk: RiskContextSchema.default({}),
    claimsExternalGrounding: z.boolean().default(false),
    costEstimate: z
      .object({
        modelTokens: z.number().int().min(0).optional(),
        apiCalls: z.number().int().min(0).optional(),
        amountUsd: z.number().min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type CandidateAction = z.infer<typeof CandidateActionSchema>;
export type CandidateActionInput = z.input<typeof CandidateActionSchema>;
