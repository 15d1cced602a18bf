/**
 * Build a kernel over the on-disk state named by a GovkernelConfig.
 *
 * The evidence chain, nonce store and trace store share one SQLite file;
 * each opens its own connection.
 */

import { EvidenceStore } from "../audit/store.js";
import { createKernel, type GovernanceKernel } from "../kernel/kernel.js";
import type { Logger } from "../logging/logger.js";
import { PolicyStore } from "../policy/policy-store.js";
import { ExecutionTraceStore } from "../trace/store.js";
import { FileCredentialStore } from "../trust/credential-store.js";
import { NonceStore } from "../trust/nonce-store.js";
import { readTrustState } from "../trust/state-file.js";
import { type GovkernelConfig, ensureDataDirs } from "./config.js";

export function openKernel(config: GovkernelConfig, logger: Logger): GovernanceKernel {
  ensureDataDirs(config);
  const trustState = readTrustState(config.trustPath);
  const evidence = new EvidenceStore(config.dbPath, { logger });
  let policy: PolicyStore;
  try {
    policy = new PolicyStore({ path: config.policyPath, evidence, logger });
  } catch (err) {
    evidence.close();
    throw err;
  }
  return createKernel({
    evidence,
    nonces: new NonceStore(config.dbPath),
    credentials: new FileCredentialStore(config.keyDir),
    policy,
    traces: new ExecutionTraceStore(config.dbPath, evidence, logger),
    trustState,
    trustStatePath: config.trustPath,
    currentDevice: config.deviceFingerprint,
    sessionTtlMs: config.sessionTtlMs,
    logger,
  });
}
