/**
 * Tool-call extraction from reasoner output.
 *
 * Only the FIRST `{"tool": ...}` object in a response is considered. It is
 * parsed as JSON and validated; anything else in the text is reasoning.
 * Unknown tools and malformed arguments are rejected, never coerced.
 */

import { z } from "zod";
import type { AgentToolCall } from "./types.js";

export const DEFAULT_SYNTHESIS_INSTRUCTIONS =
  "Synthesize a concise brief from all gathered research.";

const ToolCallSchema = z.discriminatedUnion("tool", [
  z.object({
    tool: z.literal("search"),
    args: z.object({ query: z.string().trim().min(1).max(400) }),
  }),
  z.object({
    tool: z.literal("fetch_page"),
    args: z.object({ url: z.string().min(1).max(2048) }),
  }),
  z.object({
    tool: z.literal("synthesize"),
    args: z
      .object({ instructions: z.string().max(2000).optional() })
      .default({}),
  }),
]);

export type ParsedToolCall =
  | { kind: "call"; call: AgentToolCall }
  | { kind: "none" }
  | { kind: "rejected"; tool: string; reason: string };

const TOOL_OBJECT_START = /\{\s*"tool"\s*:/g;

/** Index one past the brace that closes the object opened at `start`. */
function balancedEnd(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return undefined;
}

function toolNameOf(value: unknown): string {
  if (typeof value === "object" && value !== null && "tool" in value) {
    return String(value.tool);
  }
  return "unknown";
}

export function parseToolCall(text: string): ParsedToolCall {
  TOOL_OBJECT_START.lastIndex = 0;
  const match = TOOL_OBJECT_START.exec(text);
  if (!match) return { kind: "none" };

  const end = balancedEnd(text, match.index);
  if (end === undefined) {
    return { kind: "rejected", tool: "unknown", reason: "unterminated tool call object" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(match.index, end));
  } catch (err) {
    return {
      kind: "rejected",
      tool: "unknown",
      reason: `tool call is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const parsed = ToolCallSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      kind: "rejected",
      tool: toolNameOf(raw),
      reason: issue ? `${issue.path.join(".") || "tool"}: ${issue.message}` : "invalid tool call",
    };
  }

  const data = parsed.data;
  switch (data.tool) {
    case "search":
      return { kind: "call", call: { tool: "search", query: data.args.query } };
    case "fetch_page":
      return { kind: "call", call: { tool: "fetch_page", url: data.args.url } };
    case "synthesize":
      return {
        kind: "call",
        call: {
          tool: "synthesize",
          instructions: data.args.instructions?.trim() || DEFAULT_SYNTHESIS_INSTRUCTIONS,
        },
      };
  }
}
