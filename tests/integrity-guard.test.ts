import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { EvidenceMirror, MemoryMirrorTarget } from "../src/audit/mirror.js";
import { EvidenceStore } from "../src/audit/store.js";
import { isGovernanceError } from "../src/kernel/errors.js";
import { IntegrityGuard, type Posture, type RecoveryAuthenticator } from "../src/kernel/integrity-guard.js";
import { MemoryCredentialStore } from "../src/trust/credential-store.js";
import { NonceStore } from "../src/trust/nonce-store.js";
import { TrustRegistry } from "../src/trust/registry.js";
import { PayloadSigner } from "../src/trust/signer.js";

const DEVICE = "device-main";

const approve: RecoveryAuthenticator = { authenticate: async () => true };
const refuse: RecoveryAuthenticator = { authenticate: async () => false };

describe("IntegrityGuard", () => {
  let dir: string;
  let dbPath: string;
  let evidence: EvidenceStore;
  let nonces: NonceStore;
  let trust: TrustRegistry;
  let signer: PayloadSigner;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "govkernel-guard-"));
    dbPath = join(dir, "evidence.sqlite");
    evidence = new EvidenceStore(dbPath);
    nonces = new NonceStore(":memory:");
    trust = new TrustRegistry({ nonces, evidence, currentDevice: DEVICE });
    signer = new PayloadSigner(trust, new MemoryCredentialStore());
  });
  afterEach(() => {
    nonces.close();
    evidence.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("is NOMINAL when every check passes", async () => {
    trust.registerDevice(DEVICE);
    await signer.ensureActiveKey();
    const guard = new IntegrityGuard({ evidence, trust, signer });

    const report = await guard.runChecks();
    expect(report.posture).toBe("NOMINAL");
    expect(report.checks.map((c) => [c.name, c.passed])).toEqual([
      ["evidence_chain", true],
      ["trust_epoch", true],
      ["device_trust", true],
      ["signing_key", true],
    ]);
    expect(() => guard.assertOperational()).not.toThrow();
    expect(guard.lastCheck).toBe(report);
  });

  it("a missing signing key only degrades", async () => {
    trust.registerDevice(DEVICE);
    const guard = new IntegrityGuard({ evidence, trust, signer });
    expect((await guard.runChecks()).posture).toBe("DEGRADED");
    expect(() => guard.assertOperational()).not.toThrow();

    await signer.ensureActiveKey();
    expect((await guard.runChecks()).posture).toBe("NOMINAL");
  });

  it("a diverged mirror only degrades", async () => {
    trust.registerDevice(DEVICE);
    const target = new MemoryMirrorTarget();
    await target.write([{ ...evidence.listEntries()[0], entryHash: "e".repeat(64) }]);
    const guard = new IntegrityGuard({ evidence, trust, mirror: new EvidenceMirror(evidence, target) });

    const report = await guard.runChecks();
    expect(report.posture).toBe("DEGRADED");
    expect(report.checks.find((c) => c.name === "evidence_mirror")?.detail).toBe("mirror diverged");
  });

  it("an untrusted device locks execution down", async () => {
    const guard = new IntegrityGuard({ evidence, trust });
    await guard.runChecks();

    expect(guard.posture).toBe("EXECUTION_LOCKDOWN");
    expect(guard.lockdownCause).toBe("device_trust: current device is not registered as trusted");
    try {
      guard.assertOperational();
      expect.unreachable();
    } catch (err) {
      expect(isGovernanceError(err, "EXECUTION_LOCKDOWN")).toBe(true);
    }
  });

  it("a tampered chain locks execution down", async () => {
    trust.registerDevice(DEVICE);
    evidence.append("note", "s", { v: 1 });

    const raw = new Database(dbPath);
    raw.prepare("UPDATE evidence SET payload_json = ? WHERE seq = 1").run('{"displayName":"evil"}');
    raw.close();

    const guard = new IntegrityGuard({ evidence, trust });
    await guard.runChecks();
    expect(guard.posture).toBe("EXECUTION_LOCKDOWN");
    expect(guard.lockdownCause).toBe("evidence_chain: first violation at index 0");
  });

  it("lockdown is sticky across passing checks", async () => {
    const guard = new IntegrityGuard({ evidence, trust });
    await guard.runChecks();
    trust.registerDevice(DEVICE);
    expect((await guard.runChecks()).posture).toBe("EXECUTION_LOCKDOWN");
  });

  it("recovery needs authentication and passing checks", async () => {
    const guard = new IntegrityGuard({ evidence, trust });
    guard.forceLockdown("operator request");
    expect(guard.lockdownCause).toBe("forced: operator request");

    expect(await guard.attemptRecovery(refuse, "back to work")).toEqual({
      recovered: false,
      reason: "authentication failed",
    });

    const stillFailing = await guard.attemptRecovery(approve, "back to work");
    expect(stillFailing.recovered).toBe(false);
    expect(stillFailing.reason).toBe("checks still failing: device_trust");
    expect(guard.posture).toBe("EXECUTION_LOCKDOWN");

    trust.registerDevice(DEVICE);
    const outcome = await guard.attemptRecovery(approve, "back to work");
    expect(outcome.recovered).toBe(true);
    expect(guard.posture).toBe("NOMINAL");
    expect(guard.lockdownCause).toBeUndefined();

    expect(evidence.listEntries({ type: "lockdown_recovery_attempted" }).map((e) => e.payload)).toEqual([
      { reason: "back to work", authenticated: false },
      { reason: "back to work", authenticated: true },
      { reason: "back to work", authenticated: true },
    ]);
  });

  it("recovery outside lockdown is a no-op", async () => {
    const guard = new IntegrityGuard({ evidence, trust });
    expect(await guard.attemptRecovery(refuse, "x")).toEqual({ recovered: true, reason: "not in lockdown" });
  });

  it("logs and announces posture changes", async () => {
    const seen: Array<[Posture, string]> = [];
    const guard = new IntegrityGuard({ evidence, trust });
    guard.onChange((posture, reason) => seen.push([posture, reason]));

    guard.forceLockdown("drill");
    guard.forceLockdown("again");

    expect(seen).toEqual([["EXECUTION_LOCKDOWN", "forced: drill"]]);
    expect(evidence.listEntries({ type: "posture_changed" }).map((e) => e.payload)).toEqual([
      { from: "NOMINAL", to: "EXECUTION_LOCKDOWN", reason: "forced: drill" },
    ]);
  });
});
