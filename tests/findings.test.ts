import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { DivergenceReport } from "../src/audit/mirror.js";
import { EvidenceStore } from "../src/audit/store.js";
import { buildFindingPack, POLICY_DENIED_ENTRY } from "../src/diagnostics/findings.js";
import { NonceStore } from "../src/trust/nonce-store.js";
import { TrustRegistry } from "../src/trust/registry.js";

const NOW = Date.parse("2026-03-15T12:00:00.000Z");

describe("buildFindingPack", () => {
  let now: number;
  let evidence: EvidenceStore;
  let nonces: NonceStore;
  const clock = (): Date => new Date(now);

  beforeEach(() => {
    now = NOW;
    evidence = new EvidenceStore(":memory:", { clock });
    nonces = new NonceStore(":memory:", clock);
  });
  afterEach(() => {
    nonces.close();
    evidence.close();
  });

  it("a healthy kernel has no findings", () => {
    const trust = new TrustRegistry({ nonces, currentDevice: "dev-a", clock });
    trust.registerDevice("dev-a");

    const pack = buildFindingPack({ evidence, trust, posture: "NOMINAL", clock });
    expect(pack).toEqual({
      generatedAt: "2026-03-15T12:00:00.000Z",
      posture: "NOMINAL",
      findings: [],
      summary: { info: 0, warning: 0, critical: 0 },
      policyDenials: { windowMs: 3_600_000, count: 0, spike: false },
      keyLifecycle: { epochId: 1, activeKeyVersion: 1, revokedKeyVersions: [] },
      devices: { total: 1, trusted: 1, suspended: 0, revoked: 0, currentTrusted: true },
      chain: { overallValid: true, totalEntries: 0, firstViolation: null },
      mirror: undefined,
    });
  });

  it("counts policy denials inside the last hour", () => {
    const trust = new TrustRegistry({ nonces, currentDevice: "dev-a", clock });
    trust.registerDevice("dev-a");

    now = NOW - 2 * 3_600_000;
    evidence.append(POLICY_DENIED_ENTRY, "network_requests", {});
    now = NOW - 60_000;
    for (let i = 0; i < 4; i++) evidence.append(POLICY_DENIED_ENTRY, "network_requests", {});
    now = NOW;

    let pack = buildFindingPack({ evidence, trust, posture: "NOMINAL", clock });
    expect(pack.policyDenials).toEqual({ windowMs: 3_600_000, count: 4, spike: false });
    expect(pack.findings).toEqual([]);

    evidence.append(POLICY_DENIED_ENTRY, "network_requests", {});
    pack = buildFindingPack({ evidence, trust, posture: "NOMINAL", clock });
    expect(pack.policyDenials.spike).toBe(true);
    expect(pack.findings).toEqual([
      {
        category: "policy",
        severity: "warning",
        title: "Policy denial spike",
        detail: "5 denials in the last hour (threshold 5).",
      },
    ]);
  });

  it("reports lockdown, keys, devices and mirror problems", () => {
    const trust = new TrustRegistry({ nonces, currentDevice: "dev-a", clock });
    trust.registerDevice("dev-b");
    trust.suspendDevice("dev-b");
    trust.rotateKey("scheduled");
    const mirror: DivergenceReport = {
      target: "offsite",
      status: "diverged",
      localCount: 5,
      remoteCount: 4,
      firstDivergentSeq: 4,
      checkedAt: "2026-03-15T11:59:00.000Z",
    };

    const pack = buildFindingPack({ evidence, trust, posture: "EXECUTION_LOCKDOWN", mirror, clock });
    expect(pack.findings.map((f) => [f.category, f.severity, f.title])).toEqual([
      ["posture", "critical", "Execution lockdown"],
      ["keys", "info", "Revoked key versions"],
      ["devices", "critical", "Current device not trusted"],
      ["devices", "warning", "Suspended devices"],
      ["mirror", "warning", "Evidence mirror diverged"],
    ]);
    expect(pack.findings[1].detail).toBe("Revoked: 1. Active: v2.");
    expect(pack.findings[2].detail).toBe("Device dev-a is not in the trusted state.");
    expect(pack.findings[4].detail).toBe("Mirror offsite diverged at seq 4. Reconcile by export.");
    expect(pack.summary).toEqual({ info: 1, warning: 2, critical: 2 });
    expect(pack.keyLifecycle).toEqual({ epochId: 2, activeKeyVersion: 2, revokedKeyVersions: [1] });
    expect(pack.devices).toEqual({ total: 1, trusted: 0, suspended: 1, revoked: 0, currentTrusted: false });
    expect(pack.mirror).toBe(mirror);
  });

  it("flags a missing device fingerprint and a degraded posture", () => {
    const trust = new TrustRegistry({ nonces, clock });
    const pack = buildFindingPack({ evidence, trust, posture: "DEGRADED", clock });
    expect(pack.findings.map((f) => f.detail)).toEqual([
      "An advisory integrity check is failing.",
      "No device fingerprint is configured.",
    ]);
  });

  it("does not write to the evidence chain", () => {
    const trust = new TrustRegistry({ nonces, evidence, currentDevice: "dev-a", clock });
    trust.registerDevice("dev-a");
    const before = evidence.count();
    buildFindingPack({ evidence, trust, posture: "NOMINAL", clock });
    expect(evidence.count()).toBe(before);
  });
});
