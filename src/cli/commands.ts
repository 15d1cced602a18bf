/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no business logic here)
 *   - writes through a CliIo sink (stdout / stderr by default)
 *   - returns an exit code (0 = success, 1 = error)
 */

import { existsSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { canonicalJson } from "../audit/canonical.js";
import { EvidenceMirror, FileMirrorTarget } from "../audit/mirror.js";
import { exportEvidenceBundle } from "../evidence/export.js";
import { isGovernanceError } from "../kernel/errors.js";
import type { GovernanceKernel } from "../kernel/kernel.js";
import { createLogger, type Logger } from "../logging/logger.js";
import {
  HTTP_METHODS,
  NetworkEgressGate,
  loadEgressAllowlist,
  type HttpMethod,
} from "../network/egress.js";
import { CAPABILITIES } from "../policy/policy.js";
import { loadPolicyFile } from "../policy/policy-store.js";
import { exportTrace } from "../trace/trace.js";
import type { DeviceTrustState } from "../trust/devices.js";
import { writeTrustState } from "../trust/state-file.js";
import type { GovkernelConfig } from "./config.js";
import { openKernel } from "./open-kernel.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export type Flags = ReadonlyMap<string, string>;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const stdio: CliIo = {
  out: (line) => {
    process.stdout.write(line + "\n");
  },
  err: (line) => {
    process.stderr.write(`error: ${line}\n`);
  },
};

function describeError(e: unknown): string {
  if (isGovernanceError(e)) return `${e.code}: ${e.message}`;
  return e instanceof Error ? e.message : String(e);
}

function requireFlag(flags: Flags, name: string, io: CliIo): string | undefined {
  const v = flags.get(name);
  if (!v || v === "true") {
    io.err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

function positiveIntFlag(flags: Flags, name: string, io: CliIo): number | null | undefined {
  const raw = flags.get(name);
  if (raw === undefined) return null;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    io.err(`--${name} must be a positive integer, got "${raw}"`);
    return undefined;
  }
  return n;
}

function loggerFor(config: GovkernelConfig): Logger {
  return createLogger("govctl", config.logLevel);
}

/** Open the kernel, run `fn`, always close. Errors become exit code 1. */
async function withKernel(
  config: GovkernelConfig,
  io: CliIo,
  fn: (kernel: GovernanceKernel, logger: Logger) => Promise<number> | number,
): Promise<number> {
  const logger = loggerFor(config);
  let kernel: GovernanceKernel;
  try {
    kernel = openKernel(config, logger);
  } catch (e: unknown) {
    io.err(describeError(e));
    return 1;
  }
  try {
    return await fn(kernel, logger);
  } catch (e: unknown) {
    io.err(describeError(e));
    return 1;
  } finally {
    kernel.close();
  }
}

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

export function cmdInit(config: GovkernelConfig, io: CliIo = stdio): Promise<number> {
  return withKernel(config, io, async (kernel) => {
    if (!existsSync(config.policyPath)) kernel.policy.save();
    const keyVersion = await kernel.signer.ensureActiveKey();
    const fingerprint = config.deviceFingerprint;
    if (fingerprint && !kernel.trust.getDevice(fingerprint)) {
      await kernel.registerDevice(fingerprint, "this device");
    }
    if (!existsSync(config.trustPath)) writeTrustState(config.trustPath, kernel.trust.snapshot());

    io.out(`Initialized govkernel at ${config.baseDir}`);
    io.out(`  DB:          ${config.dbPath}`);
    io.out(`  Policy:      ${config.policyPath}`);
    io.out(`  Trust state: ${config.trustPath}`);
    io.out(`  Signing key: v${keyVersion}`);
    if (!fingerprint) {
      io.out("  No device fingerprint configured; set GOVKERNEL_DEVICE_FINGERPRINT to execute actions.");
    }
    return 0;
  });
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: GovkernelConfig, json: boolean, io: CliIo = stdio): number {
  if (json) {
    io.out(canonicalJson(config));
  } else {
    io.out(`baseDir:       ${config.baseDir}`);
    io.out(`dbPath:        ${config.dbPath}`);
    io.out(`policyPath:    ${config.policyPath}`);
    io.out(`trustPath:     ${config.trustPath}`);
    io.out(`allowlistPath: ${config.allowlistPath}`);
    io.out(`exportDir:     ${config.exportDir}`);
    io.out(`logLevel:      ${config.logLevel}`);
    io.out(`egressMode:    ${config.egressMode}`);
    io.out(`sessionTtlMs:  ${config.sessionTtlMs}`);
    io.out(`device:        ${config.deviceFingerprint ?? "(none)"}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// evidence
// ---------------------------------------------------------------------------

export function cmdEvidenceList(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const limit = positiveIntFlag(flags, "limit", io);
  if (limit === undefined) return Promise.resolve(1);

  return withKernel(config, io, (kernel) => {
    const entries = kernel.evidence.listEntries({
      type: flags.get("type"),
      subjectId: flags.get("subject"),
      limit: limit ?? undefined,
    });
    if (json) {
      io.out(canonicalJson(entries));
    } else if (entries.length === 0) {
      io.out("No evidence entries.");
    } else {
      for (const e of entries) {
        io.out(`${e.seq}\t${e.createdAt}\t${e.type}\t${e.subjectId}`);
      }
    }
    return 0;
  });
}

export function cmdEvidenceVerify(
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, (kernel) => {
    const report = kernel.evidence.verifyChainIntegrity();
    if (json) {
      io.out(
        canonicalJson({
          overallValid: report.overallValid,
          totalEntries: report.totalEntries,
          violations: report.violations,
        }),
      );
    } else if (report.overallValid) {
      io.out(`Chain valid: ${report.totalEntries} entries`);
    } else {
      io.out(`Chain INVALID: ${report.violations.length} of ${report.totalEntries} entries fail`);
      for (const f of report.failures) {
        io.out(`  [${f.index}] ${f.reason} (entry ${f.entryId})`);
      }
    }
    return report.overallValid ? 0 : 1;
  });
}

export function cmdEvidenceExport(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, async (kernel) => {
    const out = resolve(
      flags.get("out") ?? join(config.exportDir, `evidence-${Date.now()}.zip`),
    );
    const summary = await exportEvidenceBundle(out, kernel.evidence, {
      traces: kernel.traces.list(Number.MAX_SAFE_INTEGER),
    });
    if (json) {
      io.out(canonicalJson(summary));
    } else {
      io.out(`Exported ${summary.entryCount} entries and ${summary.traceCount} traces to ${summary.path}`);
    }
    return 0;
  });
}

export function cmdEvidenceMirror(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const target = requireFlag(flags, "target", io);
  if (!target) return Promise.resolve(1);

  return withKernel(config, io, async (kernel, logger) => {
    const mirror = new EvidenceMirror(kernel.evidence, new FileMirrorTarget(resolve(target)), logger);
    const report = await mirror.sync();
    if (json) {
      io.out(canonicalJson(report));
    } else if (report.status === "diverged") {
      io.out(
        `Mirror ${report.target} DIVERGED at seq ${report.firstDivergentSeq}; nothing pushed. Reconcile from an export.`,
      );
    } else {
      io.out(`Mirror ${report.target} in sync (${report.remoteCount} entries)`);
    }
    return report.status === "diverged" ? 1 : 0;
  });
}

// ---------------------------------------------------------------------------
// trust
// ---------------------------------------------------------------------------

export function cmdTrustShow(
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, (kernel) => {
    const epoch = kernel.trust.currentEpoch();
    const integrity = kernel.trust.verifyIntegrity();
    if (json) {
      io.out(canonicalJson({ epoch, integrity, currentDevice: kernel.trust.currentDevice }));
    } else {
      io.out(`epoch:          ${epoch.epochId}`);
      io.out(`active key:     v${epoch.activeKeyVersion}`);
      io.out(
        `revoked keys:   ${epoch.revokedKeyVersions.length > 0 ? epoch.revokedKeyVersions.map((v) => `v${v}`).join(", ") : "(none)"}`,
      );
      io.out(`current device: ${kernel.trust.currentDevice ?? "(none)"} (${integrity.currentDeviceTrusted ? "trusted" : "not trusted"})`);
    }
    return 0;
  });
}

export function cmdTrustRotateKey(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const reason = requireFlag(flags, "reason", io);
  if (!reason) return Promise.resolve(1);

  return withKernel(config, io, async (kernel) => {
    const epoch = await kernel.rotateKey(reason);
    if (json) {
      io.out(canonicalJson(epoch));
    } else {
      io.out(`Rotated to key v${epoch.activeKeyVersion} (epoch ${epoch.epochId})`);
    }
    return 0;
  });
}

export function cmdTrustRevokeKey(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  if (!requireFlag(flags, "version", io)) return Promise.resolve(1);
  const version = positiveIntFlag(flags, "version", io);
  if (version === undefined || version === null) return Promise.resolve(1);

  return withKernel(config, io, async (kernel) => {
    const epoch = await kernel.revokeKey(version, flags.get("reason"));
    if (json) {
      io.out(canonicalJson(epoch));
    } else {
      io.out(
        `Revoked key v${version}; active key v${epoch.activeKeyVersion} (epoch ${epoch.epochId})`,
      );
    }
    return 0;
  });
}

// ---------------------------------------------------------------------------
// device
// ---------------------------------------------------------------------------

export function cmdDeviceList(
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, (kernel) => {
    const devices = kernel.trust.listDevices();
    if (json) {
      io.out(canonicalJson(devices));
    } else if (devices.length === 0) {
      io.out("No registered devices.");
    } else {
      for (const d of devices) {
        const marker = d.fingerprint === kernel.trust.currentDevice ? " *" : "";
        io.out(`${d.fingerprint}\t${d.trustState}\t${d.displayName}${marker}`);
      }
    }
    return 0;
  });
}

export function cmdDeviceRegister(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const fingerprint = requireFlag(flags, "fingerprint", io);
  if (!fingerprint) return Promise.resolve(1);

  return withKernel(config, io, async (kernel) => {
    const record = await kernel.registerDevice(fingerprint, flags.get("name"));
    if (json) {
      io.out(canonicalJson(record));
    } else {
      io.out(`Device ${record.fingerprint}: ${record.trustState}`);
    }
    return 0;
  });
}

const DEVICE_ACTIONS: Readonly<Record<string, DeviceTrustState>> = {
  suspend: "suspended",
  reinstate: "trusted",
  revoke: "revoked",
};

export function cmdDeviceTransition(
  action: string,
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const state = DEVICE_ACTIONS[action];
  if (!state) {
    io.err(`Unknown device action: ${action}. Use: suspend | reinstate | revoke`);
    return Promise.resolve(1);
  }
  const fingerprint = requireFlag(flags, "fingerprint", io);
  if (!fingerprint) return Promise.resolve(1);

  return withKernel(config, io, async (kernel) => {
    const record = await kernel.setDeviceTrust(fingerprint, state);
    if (json) {
      io.out(canonicalJson(record));
    } else {
      io.out(`Device ${record.fingerprint}: ${record.trustState}`);
    }
    return 0;
  });
}

// ---------------------------------------------------------------------------
// policy
// ---------------------------------------------------------------------------

export function cmdPolicyShow(
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, (kernel) => {
    const policy = kernel.policy.get();
    const policyHash = kernel.policy.hash();
    if (json) {
      io.out(canonicalJson({ policy, policyHash }));
    } else {
      io.out(`enabled:           ${policy.enabled}`);
      io.out(`maxActionsPerDay:  ${policy.maxActionsPerDay ?? "(unlimited)"}`);
      io.out(`explicit confirm:  ${policy.requireExplicitConfirmation}`);
      for (const c of CAPABILITIES) {
        io.out(`  ${c.padEnd(18)} ${policy.capabilities[c] ? "allowed" : "blocked"}`);
      }
      io.out(`policyHash:        ${policyHash}`);
    }
    return 0;
  });
}

export function cmdPolicySet(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const file = requireFlag(flags, "file", io);
  if (!file) return Promise.resolve(1);

  return withKernel(config, io, (kernel) => {
    kernel.policy.update(loadPolicyFile(resolve(file)));
    const policyHash = kernel.policy.hash();
    if (json) {
      io.out(canonicalJson({ policyHash }));
    } else {
      io.out(`Policy updated: ${policyHash}`);
    }
    return 0;
  });
}

export function cmdPolicyCheck(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const capability = requireFlag(flags, "capability", io);
  if (!capability) return Promise.resolve(1);

  return withKernel(config, io, (kernel) => {
    const decision = kernel.evaluate(capability);
    if (json) {
      io.out(canonicalJson(decision));
    } else {
      io.out(`${decision.allowed ? "ALLOWED" : "DENIED"}: ${decision.reason}`);
    }
    return decision.allowed ? 0 : 1;
  });
}

// ---------------------------------------------------------------------------
// egress
// ---------------------------------------------------------------------------

function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

export function cmdEgressCheck(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): number {
  const connectorId = requireFlag(flags, "connector", io);
  const url = requireFlag(flags, "url", io);
  if (!connectorId || !url) return 1;
  const method = (flags.get("method") ?? "GET").toUpperCase();
  if (!isHttpMethod(method)) {
    io.err(`--method must be one of ${HTTP_METHODS.join(", ")}`);
    return 1;
  }

  let gate: NetworkEgressGate;
  try {
    gate = new NetworkEgressGate({
      mode: config.egressMode,
      allowlist: loadEgressAllowlist(config.allowlistPath),
    });
  } catch (e: unknown) {
    io.err(describeError(e));
    return 1;
  }
  const verdict = gate.check({ connectorId, url, method });
  if (json) {
    io.out(
      canonicalJson(
        verdict.allowed
          ? { allowed: true, mode: config.egressMode, url: verdict.url.toString() }
          : { allowed: false, mode: config.egressMode, reason: verdict.reason },
      ),
    );
  } else {
    io.out(verdict.allowed ? `ALLOWED (${config.egressMode})` : `BLOCKED (${config.egressMode}): ${verdict.reason}`);
  }
  return verdict.allowed ? 0 : 1;
}

// ---------------------------------------------------------------------------
// diagnostics
// ---------------------------------------------------------------------------

export function cmdDiagnostics(
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  return withKernel(config, io, async (kernel) => {
    await kernel.guard.runChecks();
    const pack = await kernel.diagnostics();
    if (json) {
      io.out(canonicalJson(pack));
    } else {
      io.out(`posture: ${pack.posture}`);
      io.out(
        `findings: ${pack.summary.critical} critical, ${pack.summary.warning} warning, ${pack.summary.info} info`,
      );
      for (const f of pack.findings) {
        io.out(`  [${f.severity}] ${f.title}: ${f.detail}`);
      }
    }
    return pack.summary.critical > 0 ? 1 : 0;
  });
}

// ---------------------------------------------------------------------------
// trace
// ---------------------------------------------------------------------------

export function cmdTraceList(
  flags: Flags,
  config: GovkernelConfig,
  json: boolean,
  io: CliIo = stdio,
): Promise<number> {
  const limit = positiveIntFlag(flags, "limit", io);
  if (limit === undefined) return Promise.resolve(1);

  return withKernel(config, io, (kernel) => {
    const traces = kernel.traces.list(limit ?? 50);
    if (json) {
      io.out(canonicalJson(traces));
    } else if (traces.length === 0) {
      io.out("No execution traces.");
    } else {
      for (const t of traces) {
        io.out(`${t.traceId}\t${t.timestamp}\t${t.riskTier}\t${t.approvalId}`);
      }
    }
    return 0;
  });
}

export function cmdTraceExport(
  flags: Flags,
  config: GovkernelConfig,
  io: CliIo = stdio,
): Promise<number> {
  const id = requireFlag(flags, "id", io);
  if (!id) return Promise.resolve(1);

  return withKernel(config, io, (kernel) => {
    const trace = kernel.traces.get(id) ?? kernel.traces.getByApproval(id);
    if (!trace) {
      io.err(`No execution trace for ${id}`);
      return 1;
    }
    const body = exportTrace(trace);
    const out = flags.get("out");
    if (out) {
      writeFileSync(resolve(out), body + "\n", "utf8");
      io.out(`Trace ${trace.traceId} written to ${resolve(out)}`);
    } else {
      io.out(body);
    }
    return 0;
  });
}

