/**
 * Operator policy model.
 *
 * One active instance, owned by the UI boundary through PolicyStore. The
 * evaluator only reads it.
 */

import { z } from "zod";
import { canonicalJson } from "../audit/canonical.js";
import { sha256 } from "../audit/hashing.js";

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

export const CAPABILITIES = [
  "email_drafts",
  "calendar_writes",
  "task_creation",
  "memory_writes",
  "network_requests",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export const CAPABILITY_LABELS: Readonly<Record<Capability, string>> = {
  email_drafts: "Email drafts",
  calendar_writes: "Calendar writes",
  task_creation: "Task creation",
  memory_writes: "Memory writes",
  network_requests: "Network requests",
};

export function isCapability(value: string): value is Capability {
  return (CAPABILITIES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const capabilityFlags = z.object({
  email_drafts: z.boolean(),
  calendar_writes: z.boolean(),
  task_creation: z.boolean(),
  memory_writes: z.boolean(),
  network_requests: z.boolean(),
});

export const OperatorPolicySchema = z
  .object({
    enabled: z.boolean(),
    capabilities: capabilityFlags,
    maxActionsPerDay: z.number().int().min(0).optional(),
    requireExplicitConfirmation: z.boolean().default(true),
  })
  .strict();

export type OperatorPolicy = z.infer<typeof OperatorPolicySchema>;

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export const DEFAULT_POLICY: Readonly<OperatorPolicy> = Object.freeze({
  enabled: true,
  capabilities: Object.freeze({
    email_drafts: true,
    calendar_writes: true,
    task_creation: true,
    memory_writes: true,
    network_requests: false,
  }),
  requireExplicitConfirmation: true,
});

export const RESTRICTIVE_POLICY: Readonly<OperatorPolicy> = Object.freeze({
  enabled: true,
  capabilities: Object.freeze({
    email_drafts: false,
    calendar_writes: false,
    task_creation: false,
    memory_writes: false,
    network_requests: false,
  }),
  maxActionsPerDay: 0,
  requireExplicitConfirmation: true,
});

/** Hash bound into every execution trace. */
export function computePolicyHash(policy: OperatorPolicy): string {
  return sha256(canonicalJson(policy));
}
