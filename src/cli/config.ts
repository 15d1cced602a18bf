/**
 * CLI configuration: resolve paths and runtime settings.
 *
 * Defaults (under GOVKERNEL_HOME, default ~/.govkernel):
 *   DB:          evidence.sqlite  (evidence chain, nonces, traces)
 *   Policy:      policy.yaml
 *   Trust state: trust.json
 *   Allowlist:   egress.yaml
 *   Secrets:     keys/
 *   Exports:     exports/
 *
 * Environment overrides:
 *   GOVKERNEL_HOME                 base directory
 *   GOVKERNEL_DB_PATH              SQLite file
 *   GOVKERNEL_POLICY_PATH          operator policy YAML
 *   GOVKERNEL_TRUST_PATH           trust registry state JSON
 *   GOVKERNEL_ALLOWLIST_PATH       egress allowlist YAML
 *   GOVKERNEL_EXPORT_DIR           default directory for evidence bundles
 *   GOVKERNEL_LOG_LEVEL            pino level (default "warn")
 *   GOVKERNEL_DEVICE_FINGERPRINT   this device's fingerprint
 *   GOVKERNEL_EGRESS_MODE          offline | allowlist | dev (default offline)
 *   GOVKERNEL_SESSION_TTL_SECONDS  approval session TTL, raised to the floor
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { mkdirSync } from "node:fs";
import { SESSION_TTL_MS } from "../kernel/constants.js";
import { effectiveSessionTtl } from "../approval/session-manager.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";
import { isEgressMode, type EgressMode } from "../network/egress.js";

export interface GovkernelConfig {
  baseDir: string;
  dbPath: string;
  policyPath: string;
  trustPath: string;
  allowlistPath: string;
  keyDir: string;
  exportDir: string;
  logLevel: LogLevel;
  deviceFingerprint: string | undefined;
  egressMode: EgressMode;
  sessionTtlMs: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function sessionTtlFrom(raw: string | undefined): number {
  if (raw === undefined || raw === "") return SESSION_TTL_MS;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(
      `GOVKERNEL_SESSION_TTL_SECONDS must be a positive number, got "${raw}"`,
      "GOVKERNEL_SESSION_TTL_SECONDS",
    );
  }
  return effectiveSessionTtl(seconds * 1000);
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): GovkernelConfig {
  const baseDir = resolve(env["GOVKERNEL_HOME"] ?? join(homedir(), ".govkernel"));

  const logLevel = env["GOVKERNEL_LOG_LEVEL"] ?? "warn";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Unknown log level "${logLevel}"`, "GOVKERNEL_LOG_LEVEL");
  }
  const egressMode = env["GOVKERNEL_EGRESS_MODE"] ?? "offline";
  if (!isEgressMode(egressMode)) {
    throw new ConfigError(`Unknown egress mode "${egressMode}"`, "GOVKERNEL_EGRESS_MODE");
  }

  return {
    baseDir,
    dbPath: resolve(env["GOVKERNEL_DB_PATH"] ?? join(baseDir, "evidence.sqlite")),
    policyPath: resolve(env["GOVKERNEL_POLICY_PATH"] ?? join(baseDir, "policy.yaml")),
    trustPath: resolve(env["GOVKERNEL_TRUST_PATH"] ?? join(baseDir, "trust.json")),
    allowlistPath: resolve(env["GOVKERNEL_ALLOWLIST_PATH"] ?? join(baseDir, "egress.yaml")),
    keyDir: join(baseDir, "keys"),
    exportDir: resolve(env["GOVKERNEL_EXPORT_DIR"] ?? join(baseDir, "exports")),
    logLevel,
    deviceFingerprint: env["GOVKERNEL_DEVICE_FINGERPRINT"] || undefined,
    egressMode,
    sessionTtlMs: sessionTtlFrom(env["GOVKERNEL_SESSION_TTL_SECONDS"]),
  };
}

/**
 * Ensure the base, key and export directories exist.
 */
export function ensureDataDirs(config: GovkernelConfig): void {
  mkdirSync(config.baseDir, { recursive: true });
  mkdirSync(config.keyDir, { recursive: true, mode: 0o700 });
  mkdirSync(config.exportDir, { recursive: true });
}
