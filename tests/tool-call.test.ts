import { describe, it, expect } from "vitest";
import { DEFAULT_SYNTHESIS_INSTRUCTIONS, parseToolCall } from "../src/agent/tool-call.js";

describe("parseToolCall", () => {
  it("returns none for plain reasoning", () => {
    expect(parseToolCall("I have enough to answer.")).toEqual({ kind: "none" });
  });

  it("takes only the first tool object", () => {
    const text =
      'First I search. {"tool": "search", "args": {"query": "wind permits"}} then ' +
      '{"tool": "fetch_page", "args": {"url": "https://a.test"}}';
    expect(parseToolCall(text)).toEqual({ kind: "call", call: { tool: "search", query: "wind permits" } });
  });

  it("handles braces and escaped quotes inside strings", () => {
    const text = '{"tool": "search", "args": {"query": "a } \\"b\\" {"}}';
    expect(parseToolCall(text)).toEqual({ kind: "call", call: { tool: "search", query: 'a } "b" {' } });
  });

  it("defaults synthesis instructions", () => {
    expect(parseToolCall('{"tool": "synthesize"}')).toEqual({
      kind: "call",
      call: { tool: "synthesize", instructions: DEFAULT_SYNTHESIS_INSTRUCTIONS },
    });
    expect(parseToolCall('{"tool": "synthesize", "args": {"instructions": "   "}}')).toEqual({
      kind: "call",
      call: { tool: "synthesize", instructions: DEFAULT_SYNTHESIS_INSTRUCTIONS },
    });
  });

  it("rejects unknown tools by name", () => {
    const parsed = parseToolCall('{"tool": "shell", "args": {"cmd": "rm -rf /"}}');
    expect(parsed.kind).toBe("rejected");
    if (parsed.kind === "rejected") expect(parsed.tool).toBe("shell");
  });

  it("rejects blank queries", () => {
    const parsed = parseToolCall('{"tool": "search", "args": {"query": "   "}}');
    expect(parsed.kind).toBe("rejected");
    if (parsed.kind === "rejected") {
      expect(parsed.tool).toBe("search");
      expect(parsed.reason.startsWith("args.query:")).toBe(true);
    }
  });

  it("rejects invalid JSON", () => {
    const parsed = parseToolCall('{"tool": "search", args: {}}');
    expect(parsed.kind).toBe("rejected");
    if (parsed.kind === "rejected") expect(parsed.reason.startsWith("tool call is not valid JSON:")).toBe(true);
  });

  it("rejects an unterminated object", () => {
    expect(parseToolCall('{"tool": "search", "args": {"query": "x"}')).toEqual({
      kind: "rejected",
      tool: "unknown",
      reason: "unterminated tool call object",
    });
  });

  it("can be called repeatedly", () => {
    const text = '{"tool": "search", "args": {"query": "again"}}';
    expect(parseToolCall(text)).toEqual(parseToolCall(text));
  });
});
