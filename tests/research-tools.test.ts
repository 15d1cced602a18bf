import { describe, it, expect } from "vitest";
import { GatedResearchTools, htmlToText, redact } from "../src/agent/research-tools.js";
import { isGovernanceError } from "../src/kernel/errors.js";
import { NetworkEgressGate, type EgressResponse, type TransportRequest } from "../src/network/egress.js";

function gateReturning(response: EgressResponse, calls: TransportRequest[] = []): NetworkEgressGate {
  return new NetworkEgressGate({
    mode: "allowlist",
    allowlist: {
      connectors: {
        search: { hosts: ["search.test"] },
        web: { hosts: ["docs.test"] },
      },
    },
    transport: async (req) => {
      calls.push(req);
      return response;
    },
  });
}

describe("redact", () => {
  it("masks emails and phone numbers", () => {
    expect(redact("Call +1 (555) 123-4567 or mail a.b@example.com")).toBe("Call [number] or mail [email]");
  });
});

describe("htmlToText", () => {
  it("drops scripts and styles and decodes entities", () => {
    const html =
      "<html><head><title>A &amp; B</title><style>p{}</style></head>" +
      "<body><p>Hello</p><script>track()</script><p>World</p></body></html>";
    expect(htmlToText(html)).toEqual({ title: "A & B", text: "A & B Hello World" });
  });
});

describe("GatedResearchTools", () => {
  it("searches through the search connector", async () => {
    const calls: TransportRequest[] = [];
    const gate = gateReturning(
      {
        status: 200,
        headers: {},
        body: JSON.stringify({
          results: [{ title: "Doc", url: "https://docs.test/a", description: "mail me at a@b.co" }],
        }),
      },
      calls,
    );
    const tools = new GatedResearchTools({ gate, searchUrl: "https://search.test/api" });

    const hits = await tools.search("hello world");
    expect(hits).toEqual([{ title: "Doc", url: "https://docs.test/a", description: "mail me at [email]" }]);
    expect(calls[0].url).toBe("https://search.test/api?q=hello+world&count=5");
    expect(calls[0].headers).toEqual({ accept: "application/json" });
  });

  it("rejects a non-JSON search body", async () => {
    const tools = new GatedResearchTools({
      gate: gateReturning({ status: 200, headers: {}, body: "<html>" }),
      searchUrl: "https://search.test/api",
    });
    await expect(tools.search("x")).rejects.toThrow("search response is not JSON");
  });

  it("reports HTTP failures", async () => {
    const tools = new GatedResearchTools({
      gate: gateReturning({ status: 503, headers: {}, body: "" }),
      searchUrl: "https://search.test/api",
    });
    await expect(tools.search("x")).rejects.toThrow("search returned HTTP 503");
  });

  it("fetches and extracts HTML pages", async () => {
    const tools = new GatedResearchTools({
      gate: gateReturning({
        status: 200,
        headers: { "content-type": "text/html; charset=utf-8" },
        body: "<title>Guide</title><p>Contact ops@docs.test today</p>",
      }),
      searchUrl: "https://search.test/api",
    });
    const page = await tools.fetchPage(new URL("https://docs.test/guide"));
    expect(page).toEqual({ title: "Guide", host: "docs.test", text: "Guide Contact [email] today" });
  });

  it("falls back to the host for untitled plain text", async () => {
    const tools = new GatedResearchTools({
      gate: gateReturning({ status: 200, headers: { "content-type": "text/plain" }, body: "  notes  " }),
      searchUrl: "https://search.test/api",
    });
    expect(await tools.fetchPage(new URL("https://docs.test/n.txt"))).toEqual({
      title: "docs.test",
      host: "docs.test",
      text: "notes",
    });
  });

  it("cannot reach hosts outside the allowlist", async () => {
    const tools = new GatedResearchTools({
      gate: gateReturning({ status: 200, headers: {}, body: "" }),
      searchUrl: "https://search.test/api",
    });
    await expect(tools.fetchPage(new URL("https://elsewhere.test/"))).rejects.toSatisfy((err: unknown) =>
      isGovernanceError(err, "NETWORK_BLOCKED"),
    );
  });
});
