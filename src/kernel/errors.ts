/**
 * Governance error taxonomy.
 *
 * Every code is terminal for the action in progress: surfaced to the
 * caller with a reason, never retried, never downgraded to a warning.
 * Transient evidence I/O is the only retryable failure and uses
 * EvidenceStoreError instead.
 */

export type GovernanceErrorCode =
  | "POLICY_DENIED"
  | "CHAIN_INTEGRITY_VIOLATION"
  | "MIRROR_DIVERGENCE"
  | "CONFIRMATION_EXPIRED"
  | "CONFIRMATION_OUT_OF_ORDER"
  | "TOOL_BUDGET_EXCEEDED"
  | "NETWORK_BLOCKED"
  | "DEVICE_NOT_TRUSTED"
  | "KEY_REVOKED"
  | "EXECUTION_LOCKDOWN"
  | "SESSION_NOT_FOUND"
  | "SESSION_EXISTS"
  | "SESSION_NOT_APPROVED"
  | "ALREADY_EXECUTED"
  | "PROPOSAL_INVALID"
  | "TOKEN_INVALID";

export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: GovernanceErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
    this.details = details ?? {};
  }
}

export function isGovernanceError(
  err: unknown,
  code?: GovernanceErrorCode,
): err is GovernanceError {
  return (
    err instanceof GovernanceError && (code === undefined || err.code === code)
  );
}
