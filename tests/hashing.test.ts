import { describe, it, expect } from "vitest";
import {
  GENESIS_HASH,
  ChainVerifier,
  computeEntryHash,
  computePayloadHash,
  sha256,
  sha256Bytes,
  verifyEntries,
  type VerifiableEntry,
} from "../src/audit/hashing.js";

function chain(n: number): VerifiableEntry[] {
  const out: VerifiableEntry[] = [];
  let prev = GENESIS_HASH;
  for (let i = 0; i < n; i++) {
    const payload = { step: i };
    const payloadHash = computePayloadHash(payload);
    const createdAt = `2026-01-01T00:00:0${i}.000Z`;
    const entryHash = computeEntryHash(prev, { type: "step", subjectId: "run", payloadHash, createdAt });
    out.push({
      seq: i + 1,
      id: `e${i + 1}`,
      type: "step",
      subjectId: "run",
      payload,
      payloadHash,
      createdAt,
      prevHash: prev,
      entryHash,
    });
    prev = entryHash;
  }
  return out;
}

describe("sha256", () => {
  it("matches known digests", () => {
    expect(sha256("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    expect(sha256("hello")).toBe("2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824");
  });

  it("agrees with sha256Bytes on UTF-8 input", () => {
    expect(sha256Bytes(Buffer.from("hello", "utf8"))).toBe(sha256("hello"));
  });
});

describe("entry hashing", () => {
  it("payload hash ignores key order", () => {
    expect(computePayloadHash({ a: 1, b: 2 })).toBe(computePayloadHash({ b: 2, a: 1 }));
  });

  it("entry hash depends on the previous hash", () => {
    const entry = { type: "t", subjectId: "s", payloadHash: sha256("p"), createdAt: "2026-01-01T00:00:00.000Z" };
    expect(computeEntryHash(GENESIS_HASH, entry)).not.toBe(computeEntryHash(sha256("other"), entry));
  });

  it("genesis is 64 zeros", () => {
    expect(GENESIS_HASH).toBe("0".repeat(64));
  });
});

describe("verifyEntries", () => {
  it("accepts a well-formed chain", () => {
    expect(verifyEntries(chain(4))).toEqual({
      overallValid: true,
      totalEntries: 4,
      violations: [],
      firstViolation: null,
      failures: [],
    });
  });

  it("reports a broken prev link at the entry that carries it", () => {
    const entries = chain(3);
    entries[1] = { ...entries[1], prevHash: sha256("forged") };
    const report = verifyEntries(entries);
    // entry 1's stored entryHash was computed from the true prev, so only the link fails.
    expect(report.violations).toEqual([1]);
    expect(report.failures.map((f) => f.reason)).toEqual(["prev_hash_mismatch"]);
  });

  it("the incremental verifier matches the batch one", () => {
    const entries = chain(3);
    entries[2] = { ...entries[2], payload: { step: 42 } };
    const v = new ChainVerifier();
    for (const e of entries) v.push(e);
    expect(v.report()).toEqual(verifyEntries(entries));
    expect(v.report().firstViolation).toBe(2);
  });
});
