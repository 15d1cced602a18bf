import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EvidenceStore } from "../src/audit/store.js";
import { isGovernanceError } from "../src/kernel/errors.js";
import {
  EMPTY_ALLOWLIST,
  EgressAllowlistError,
  NetworkEgressGate,
  loadEgressAllowlist,
  type EgressAllowlistInput,
  type TransportRequest,
} from "../src/network/egress.js";

const allowlist: EgressAllowlistInput = {
  connectors: {
    calendar: { hosts: ["api.calendar.test"], pathPrefixes: ["/v1/events"], methods: ["GET", "POST"] },
    search: { hosts: ["search.test"] },
  },
};

function recordingTransport(): {
  calls: TransportRequest[];
  transport: (req: TransportRequest) => Promise<{ status: number; headers: Record<string, string>; body: string }>;
} {
  const calls: TransportRequest[] = [];
  return {
    calls,
    transport: async (req) => {
      calls.push(req);
      return { status: 200, headers: { "content-type": "text/plain" }, body: "ok" };
    },
  };
}

describe("NetworkEgressGate.check", () => {
  it("offline mode denies everything", () => {
    const gate = new NetworkEgressGate({ mode: "offline", allowlist });
    expect(gate.check({ connectorId: "search", url: "https://search.test/q" })).toEqual({
      allowed: false,
      reason: "offline mode: all egress denied",
    });
  });

  it("requires HTTPS in every non-offline mode", () => {
    for (const mode of ["dev", "allowlist"] as const) {
      const gate = new NetworkEgressGate({ mode, allowlist });
      expect(gate.check({ connectorId: "search", url: "http://search.test/q" })).toEqual({
        allowed: false,
        reason: "scheme http forbidden; HTTPS required",
      });
    }
  });

  it("rejects unparseable URLs and embedded credentials", () => {
    const gate = new NetworkEgressGate({ mode: "dev" });
    expect(gate.check({ connectorId: "x", url: "not a url" })).toEqual({
      allowed: false,
      reason: "URL does not parse",
    });
    expect(gate.check({ connectorId: "x", url: "https://user:pw@search.test/" })).toEqual({
      allowed: false,
      reason: "credentials in URL are forbidden",
    });
  });

  it("dev mode allows any HTTPS host", () => {
    const gate = new NetworkEgressGate({ mode: "dev" });
    expect(gate.check({ connectorId: "anything", url: "https://example.test/" }).allowed).toBe(true);
  });

  it("allowlist mode checks connector, host, path and method", () => {
    const gate = new NetworkEgressGate({ mode: "allowlist", allowlist });

    expect(gate.check({ connectorId: "calendar", url: "https://api.calendar.test/v1/events/42", method: "POST" }).allowed).toBe(true);
    expect(gate.check({ connectorId: "mail", url: "https://api.calendar.test/v1/events" })).toEqual({
      allowed: false,
      reason: "connector mail is not registered",
    });
    expect(gate.check({ connectorId: "calendar", url: "https://evil.test/v1/events" })).toEqual({
      allowed: false,
      reason: "host evil.test not allowed for connector calendar",
    });
    expect(gate.check({ connectorId: "calendar", url: "https://api.calendar.test/v2/admin" })).toEqual({
      allowed: false,
      reason: "path /v2/admin not allowed for host api.calendar.test",
    });
    expect(gate.check({ connectorId: "search", url: "https://search.test/q", method: "POST" })).toEqual({
      allowed: false,
      reason: "method POST not allowed for connector search",
    });
  });

  it("matches hosts case-insensitively", () => {
    const gate = new NetworkEgressGate({
      mode: "allowlist",
      allowlist: { connectors: { search: { hosts: ["Search.TEST"] } } },
    });
    expect(gate.check({ connectorId: "search", url: "https://SEARCH.test/q" }).allowed).toBe(true);
  });
});

describe("NetworkEgressGate.execute", () => {
  let evidence: EvidenceStore;

  beforeEach(() => {
    evidence = new EvidenceStore(":memory:");
  });
  afterEach(() => {
    evidence.close();
  });

  it("passes allowed requests to the transport", async () => {
    const { calls, transport } = recordingTransport();
    const gate = new NetworkEgressGate({ mode: "allowlist", allowlist, transport, evidence });

    const res = await gate.execute({ connectorId: "search", url: "https://search.test/q?x=1" });
    expect(res.body).toBe("ok");
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://search.test/q?x=1");
    expect(calls[0].method).toBe("GET");
    expect(calls[0].headers).toEqual({});
    expect(evidence.count()).toBe(0);
  });

  it("logs a violation with the host only and throws NETWORK_BLOCKED", async () => {
    const { calls, transport } = recordingTransport();
    const gate = new NetworkEgressGate({ mode: "allowlist", allowlist, transport, evidence });

    await expect(
      gate.execute({ connectorId: "search", url: "https://other.test/q?secret=1" }),
    ).rejects.toSatisfy((err: unknown) => isGovernanceError(err, "NETWORK_BLOCKED"));
    expect(calls).toHaveLength(0);

    const [entry] = evidence.listEntries({ type: "network_violation" });
    expect(entry.subjectId).toBe("search");
    expect(entry.payload).toEqual({
      mode: "allowlist",
      host: "other.test",
      method: "GET",
      reason: "host other.test not allowed for connector search",
    });
  });
});

describe("loadEgressAllowlist", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "govkernel-egress-"));
  });
  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("a missing file is an empty allowlist", () => {
    expect(loadEgressAllowlist(join(dir, "absent.yaml"))).toEqual(EMPTY_ALLOWLIST);
  });

  it("an empty file is an empty allowlist", () => {
    const path = join(dir, "egress.yaml");
    writeFileSync(path, "");
    expect(loadEgressAllowlist(path)).toEqual(EMPTY_ALLOWLIST);
  });

  it("applies defaults from YAML", () => {
    const path = join(dir, "egress.yaml");
    writeFileSync(path, "connectors:\n  search:\n    hosts: [search.test]\n");
    expect(loadEgressAllowlist(path)).toEqual({
      connectors: { search: { hosts: ["search.test"], pathPrefixes: ["/"], methods: ["GET"] } },
    });
  });

  it("rejects invalid rules", () => {
    const path = join(dir, "egress.yaml");
    writeFileSync(path, "connectors:\n  search:\n    hosts: []\n");
    expect(() => loadEgressAllowlist(path)).toThrow(EgressAllowlistError);
  });

  it("rejects malformed YAML", () => {
    const path = join(dir, "egress.yaml");
    writeFileSync(path, "connectors: [unclosed\n");
    try {
      loadEgressAllowlist(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EgressAllowlistError);
      expect((err as EgressAllowlistError).code).toBe("ALLOWLIST_UNREADABLE");
    }
  });
});
