/**
 * Library entry point. The CLI lives under ./cli and is not re-exported.
 */

export * from "./audit/index.js";

export { GovernanceError, isGovernanceError, type GovernanceErrorCode } from "./kernel/errors.js";
export * from "./kernel/constants.js";
export {
  createKernel,
  GovernanceKernel,
  type KernelOptions,
  type ExecutionOutcome,
  type SubmittedProposal,
} from "./kernel/kernel.js";
export type {
  ExecutionCertificate,
  ExecutionRequest,
  ExternalExecutor,
} from "./kernel/executor.js";
export {
  IntegrityGuard,
  type IntegrityCheck,
  type IntegrityReport,
  type Posture,
  type RecoveryAuthenticator,
  type RecoveryOutcome,
} from "./kernel/integrity-guard.js";
export {
  TokenAuthority,
  tokenHashOf,
  type AuthorizationClaims,
  type AuthorizationToken,
} from "./kernel/authorization.js";
export { KeyedMutex } from "./kernel/mutex.js";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/logger.js";

export { TrustRegistry, type TrustState } from "./trust/registry.js";
export { PayloadSigner, type SignedEnvelope, type VerifyOutcome } from "./trust/signer.js";
export { NonceStore } from "./trust/nonce-store.js";
export {
  FileCredentialStore,
  MemoryCredentialStore,
  type CredentialStore,
} from "./trust/credential-store.js";
export type { DeviceTrustRecord, DeviceTrustState } from "./trust/devices.js";
export type { TrustEpoch } from "./trust/epoch.js";

export { decide, requiresExplicitConfirmation, type PolicyDecision } from "./policy/evaluator.js";
export { PolicyStore, loadPolicyFile, parsePolicy, PolicyFileError } from "./policy/policy-store.js";
export {
  CAPABILITIES,
  DEFAULT_POLICY,
  RESTRICTIVE_POLICY,
  type Capability,
  type OperatorPolicy,
} from "./policy/policy.js";

export { assessRisk, tierForScore, type RiskContext, type RiskTier } from "./proposal/risk.js";
export { buildProposal, verifyProposalHash, type ProposalPack } from "./proposal/builder.js";

export {
  ApprovalSessionManager,
  type ApprovalDecision,
  type ApprovalSession,
  type HumanDecision,
} from "./approval/session-manager.js";
export { confirmationFreshness } from "./approval/two-key.js";

export { BoundedAgentLoop } from "./agent/loop.js";
export { GatedResearchTools } from "./agent/research-tools.js";
export { citationsFromRun } from "./agent/citations.js";
export {
  AgentLoopError,
  type AgentRunResult,
  type Reasoner,
  type ReadOnlyTools,
} from "./agent/types.js";

export {
  buildExecutionTrace,
  exportTrace,
  verifyTraceHash,
  type ExecutionTrace,
} from "./trace/trace.js";
export { ExecutionTraceStore } from "./trace/store.js";

export { NetworkEgressGate, loadEgressAllowlist, type EgressMode } from "./network/egress.js";
export { GatedCalendarWriter, type CalendarWriteService } from "./connectors/calendar.js";
export { exportEvidenceBundle, EvidenceExportError } from "./evidence/export.js";
export { buildFindingPack, type FindingPack } from "./diagnostics/findings.js";
