/**
 * Bounded agent loop.
 *
 * The reasoner thinks; only the loop calls tools, and only the read-only
 * tools it was given. One run:
 *
 *   for pass in 1..maxPasses:
 *     check abort, check total deadline
 *     ask the reasoner (per-pass deadline)
 *     take the FIRST tool call in the response, if any
 *     check abort, check budget, dispatch it
 *     stop if an artifact exists
 *   no artifact → forced synthesis
 *
 * INVARIANTS:
 *   - At most maxPasses reasoning passes and maxToolCalls tool calls per
 *     run, aborted runs included.
 *   - abort() is observed before each pass and before each tool dispatch.
 *     A call already dispatched is never interrupted.
 *   - Every stage appends an evidence entry under the run id.
 */

import { v4 as uuidv4 } from "uuid";
import type { EvidenceChain } from "../audit/store.js";
import { AGENT_LOOP_LIMITS, type AgentLoopLimits } from "../kernel/constants.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { ToolBudget } from "./budget.js";
import { parseToolCall } from "./tool-call.js";
import {
  AgentLoopError,
  type AgentPass,
  type AgentPhase,
  type AgentRunResult,
  type AgentToolCall,
  type AgentToolResult,
  type PhaseListener,
  type ReadOnlyTools,
  type Reasoner,
  type ReasoningResponse,
  type SynthesisMode,
} from "./types.js";

export interface BoundedAgentLoopDeps {
  reasoner: Reasoner;
  tools: ReadOnlyTools;
  evidence: EvidenceChain;
  limits?: Partial<AgentLoopLimits>;
  logger?: Logger;
  /** Milliseconds since epoch. */
  now?: () => number;
}

interface HistoryItem {
  role: "assistant" | "tool_result";
  content: string;
}

/** Everything that belongs to one run; discarded when it ends. */
interface RunState {
  runId: string;
  request: string;
  startedAt: number;
  budget: ToolBudget;
  history: HistoryItem[];
  passes: AgentPass[];
  results: AgentToolResult[];
  provider?: string;
  modelId?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Run `work` with an AbortSignal that fires after `ms`; rejects on expiry. */
async function withDeadline<T>(
  ms: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`deadline of ${ms}ms exceeded`));
    }, ms);
  });
  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

function systemPrompt(
  pass: number,
  limits: AgentLoopLimits,
  budget: ToolBudget,
): string {
  const finalPass = pass === limits.maxPasses;
  return [
    "You are a research analyst working under a governed kernel.",
    "You cannot act. You may request exactly ONE read-only tool call per response.",
    "",
    "TOOLS:",
    `  {"tool": "search", "args": {"query": "..."}}        remaining: ${budget.remaining("search")}`,
    `  {"tool": "fetch_page", "args": {"url": "https://..."}}  remaining: ${budget.remaining("fetch")}`,
    `  {"tool": "synthesize", "args": {"instructions": "..."}}  terminal`,
    "",
    `Pass ${pass} of ${limits.maxPasses}.`,
    finalPass
      ? "This is the final pass. Call synthesize now."
      : "Give a short reasoning paragraph, then one JSON tool call.",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

export class BoundedAgentLoop {
  private readonly reasoner: Reasoner;
  private readonly tools: ReadOnlyTools;
  private readonly evidence: EvidenceChain;
  private readonly limits: AgentLoopLimits;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly listeners = new Set<PhaseListener>();

  private _phase: AgentPhase = "idle";
  private currentPass = 0;
  private running = false;
  private abortRequested = false;
  private lastRun: { toolCalls: number; passes: number } = { toolCalls: 0, passes: 0 };

  constructor(deps: BoundedAgentLoopDeps) {
    this.reasoner = deps.reasoner;
    this.tools = deps.tools;
    this.evidence = deps.evidence;
    this.limits = { ...AGENT_LOOP_LIMITS, ...deps.limits };
    this.logger = deps.logger ?? silentLogger();
    this.now = deps.now ?? Date.now;
  }

  get phase(): AgentPhase {
    return this._phase;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Counters of the most recent run, including failed and aborted ones. */
  get lastRunStats(): { toolCalls: number; passes: number } {
    return { ...this.lastRun };
  }

  onPhase(listener: PhaseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Cooperative: observed at the next checkpoint, never mid-call. */
  abort(): void {
    if (this.running) this.abortRequested = true;
  }

  async run(request: string): Promise<AgentRunResult> {
    if (this.running) {
      throw new AgentLoopError("An agent run is already in progress", "ALREADY_RUNNING");
    }
    this.running = true;
    this.abortRequested = false;
    this.currentPass = 0;

    const state: RunState = {
      runId: uuidv4(),
      request,
      startedAt: this.now(),
      budget: new ToolBudget(this.limits),
      history: [],
      passes: [],
      results: [],
    };

    try {
      return await this.execute(state);
    } finally {
      this.lastRun = { toolCalls: state.budget.totalUsed, passes: state.passes.length };
      this.running = false;
    }
  }

  // -----------------------------------------------------------------------
  // Run body
  // -----------------------------------------------------------------------

  private async execute(state: RunState): Promise<AgentRunResult> {
    this.setPhase("planning");
    this.log(state, "agent_loop_started", { requestLength: state.request.length });

    let artifact: string | undefined;
    let synthesis: SynthesisMode = "explicit";

    for (let pass = 1; pass <= this.limits.maxPasses; pass++) {
      this.currentPass = pass;
      this.checkAbort(state);
      this.checkTotalDeadline(state);

      const passStart = this.now();
      const finalPass = pass === this.limits.maxPasses;
      this.setPhase(pass === 1 ? "planning" : "evaluating");

      const response = await this.callModel(state, pass, {
        system: systemPrompt(pass, this.limits, state.budget),
        prompt: this.passPrompt(state, pass),
      });

      const parsed = parseToolCall(response.text);
      const passCalls: AgentToolCall[] = [];
      const passResults: AgentToolResult[] = [];

      if (parsed.kind === "rejected") {
        this.log(state, "agent_unknown_tool_rejected", { pass, tool: parsed.tool, reason: parsed.reason });
      }

      if (parsed.kind !== "call" && finalPass) {
        artifact = response.text;
        synthesis = "implicit";
        this.setPhase("synthesizing");
        this.log(state, "agent_loop_implicit_synthesize", { pass });
      }

      if (parsed.kind === "call") {
        this.checkAbort(state);
        if (state.budget.exhausted) {
          this.log(state, "agent_loop_tool_limit_reached", { pass, total: state.budget.totalUsed });
        } else {
          state.budget.chargeCall();
          const result = await this.executeToolCall(state, parsed.call);
          passCalls.push(parsed.call);
          passResults.push(result);
          state.results.push(result);
          state.history.push({
            role: "tool_result",
            content: `[${parsed.call.tool}] ${result.success ? "SUCCESS" : "FAILED"}: ${truncate(result.output, this.limits.historyOutputChars)}`,
          });
          if (parsed.call.tool === "synthesize" && result.success) {
            artifact = result.output;
            synthesis = "explicit";
          }
        }
      }

      const durationMs = this.now() - passStart;
      state.passes.push({
        pass,
        toolCalls: passCalls,
        toolResults: passResults,
        reasoning: truncate(response.text, 500),
        durationMs,
        startedAt: new Date(passStart).toISOString(),
      });
      state.history.push({ role: "assistant", content: response.text });
      this.log(state, "agent_loop_pass_complete", { pass, tools: passCalls.length, durationMs });

      if (artifact !== undefined) break;
      if (state.budget.exhausted) break;
    }

    if (artifact === undefined) {
      this.checkAbort(state);
      this.checkTotalDeadline(state);
      artifact = await this.forceSynthesis(state);
      synthesis = "forced";
    }

    if (artifact.trim().length === 0) {
      this.fail(state, "NO_ARTIFACT_PRODUCED", "Run ended without a synthesized artifact", { synthesis });
    }

    const totalDurationMs = this.now() - state.startedAt;
    this.setPhase("complete");
    this.log(state, "agent_loop_complete", {
      passes: state.passes.length,
      tools: state.budget.totalUsed,
      synthesis,
      durationMs: totalDurationMs,
    });

    return {
      runId: state.runId,
      request: state.request,
      passes: state.passes,
      artifact,
      synthesis,
      totalDurationMs,
      totalToolCalls: state.budget.totalUsed,
      searchQueries: state.results.flatMap((r) => (r.success && r.call.tool === "search" ? [r.call.query] : [])),
      fetchedUrls: state.results.flatMap((r) => (r.success && r.call.tool === "fetch_page" ? [r.call.url] : [])),
      provider: state.provider,
      modelId: state.modelId,
    };
  }

  private passPrompt(state: RunState, pass: number): string {
    if (pass === 1) {
      return `USER REQUEST:\n${state.request}\n\nPlan your research and make your first tool call.`;
    }
    const history = state.history.map((h) => `[${h.role}] ${h.content}`).join("\n\n");
    const tail =
      pass === this.limits.maxPasses
        ? "Final pass: synthesize now."
        : "Evaluate gaps: search, fetch a page, or synthesize.";
    return `CONVERSATION SO FAR:\n${history}\n\nPass ${pass} of ${this.limits.maxPasses}. ${tail}`;
  }

  // -----------------------------------------------------------------------
  // Model calls
  // -----------------------------------------------------------------------

  private async callModel(
    state: RunState,
    pass: number,
    input: { system: string; prompt: string },
  ): Promise<ReasoningResponse> {
    let response: ReasoningResponse;
    try {
      response = await withDeadline(this.callDeadline(state), (signal) =>
        this.reasoner.reason({ ...input, pass, signal }),
      );
    } catch (err) {
      return this.fail(state, "MODEL_CALL_FAILED", `Model call failed: ${describeError(err)}`, { pass });
    }
    state.provider = response.provider ?? state.provider;
    state.modelId = response.modelId ?? state.modelId;
    this.log(state, "agent_loop_model_response", {
      pass,
      provider: response.provider ?? "unknown",
      outputTokens: response.outputTokens ?? 0,
      chars: response.text.length,
    });
    return response;
  }

  private gatheredResearch(state: RunState): string {
    return state.results
      .filter((r) => r.success && r.call.tool !== "synthesize")
      .map((r) => `[${r.call.tool}] ${r.output}`)
      .join("\n\n---\n\n");
  }

  private async forceSynthesis(state: RunState): Promise<string> {
    this.setPhase("synthesizing");
    this.log(state, "agent_loop_forced_synthesis", { passes: state.passes.length });
    const response = await this.callModel(state, this.currentPass, {
      system: "Produce your final deliverable now. No tool calls. Plain text only.",
      prompt: `Research gathered:\n\n${this.gatheredResearch(state)}\n\nORIGINAL REQUEST: ${state.request}\n\nWrite the complete artifact.`,
    });
    return response.text;
  }

  // -----------------------------------------------------------------------
  // Tool dispatch
  // -----------------------------------------------------------------------

  private async executeToolCall(state: RunState, call: AgentToolCall): Promise<AgentToolResult> {
    const callId = `${state.runId}:${state.results.length + 1}`;
    const start = this.now();
    const result = (success: boolean, output: string, evidenceTag: string): AgentToolResult => {
      const r = { callId, call, success, output, evidenceTag, durationMs: this.now() - start };
      this.log(state, evidenceTag, { callId, tool: call.tool, success, durationMs: r.durationMs });
      return r;
    };

    switch (call.tool) {
      case "search": {
        if (state.budget.remaining("search") <= 0) {
          return result(false, `Search limit reached (${this.limits.maxSearchQueries} max)`, "agent_search_limit_reached");
        }
        this.setPhase("searching");
        state.budget.chargeTool("search");
        try {
          const hits = await this.tools.search(call.query);
          const lines = hits.map((h, i) => `[${i + 1}] ${h.title}\n    URL: ${h.url}\n    ${h.description}`);
          return result(true, `Found ${hits.length} results:\n\n${lines.join("\n\n")}`, "agent_search_executed");
        } catch (err) {
          return result(false, `Search failed: ${describeError(err)}`, "agent_search_failed");
        }
      }

      case "fetch_page": {
        if (state.budget.remaining("fetch") <= 0) {
          return result(false, `Fetch limit reached (${this.limits.maxFetchUrls} max)`, "agent_fetch_limit_reached");
        }
        if (!URL.canParse(call.url) || new URL(call.url).protocol !== "https:") {
          return result(false, "Invalid or non-HTTPS URL rejected", "agent_fetch_rejected_non_https");
        }
        this.setPhase("fetching");
        state.budget.chargeTool("fetch");
        try {
          const page = await this.tools.fetchPage(new URL(call.url));
          const body = truncate(page.text, this.limits.fetchContentChars);
          return result(
            true,
            `Title: ${page.title}\nSource: ${page.host}\nCharacters: ${page.text.length}\n\nContent (redacted, truncated):\n${body}`,
            "agent_fetch_executed",
          );
        } catch (err) {
          return result(false, `Fetch failed: ${describeError(err)}`, "agent_fetch_failed");
        }
      }

      case "synthesize": {
        this.setPhase("synthesizing");
        const research = this.gatheredResearch(state);
        try {
          const response = await withDeadline(this.callDeadline(state), (signal) =>
            this.reasoner.reason({
              system: "Produce the final artifact. Be specific and cite sources. No tool calls.",
              prompt: `SYNTHESIS INSTRUCTIONS: ${call.instructions}\n\nGATHERED RESEARCH:\n${research}`,
              pass: this.currentPass,
              signal,
            }),
          );
          return result(true, response.text, "agent_synthesize_complete");
        } catch (err) {
          return result(false, `Synthesis failed: ${describeError(err)}`, "agent_synthesize_failed");
        }
      }
    }
  }

  // -----------------------------------------------------------------------
  // Checkpoints
  // -----------------------------------------------------------------------

  private checkAbort(state: RunState): void {
    if (!this.abortRequested) return;
    this.setPhase("aborted");
    this.log(state, "agent_loop_aborted", { pass: this.currentPass, tools: state.budget.totalUsed });
    throw new AgentLoopError("Agent run aborted by operator", "ABORTED", {
      runId: state.runId,
      pass: this.currentPass,
      toolCalls: state.budget.totalUsed,
    });
  }

  /** Per-pass timeout, clipped to what is left of the total budget. */
  private callDeadline(state: RunState): number {
    const remaining = this.limits.totalTimeoutMs - (this.now() - state.startedAt);
    return Math.max(1, Math.min(this.limits.perPassTimeoutMs, remaining));
  }

  private checkTotalDeadline(state: RunState): void {
    const elapsed = this.now() - state.startedAt;
    if (elapsed >= this.limits.totalTimeoutMs) {
      this.fail(state, "TOTAL_TIMEOUT", `Agent run exceeded ${this.limits.totalTimeoutMs}ms`, { elapsedMs: elapsed });
    }
  }

  private fail(
    state: RunState,
    code: "TOTAL_TIMEOUT" | "MODEL_CALL_FAILED" | "NO_ARTIFACT_PRODUCED",
    message: string,
    details: Record<string, unknown>,
  ): never {
    this.setPhase("failed");
    this.log(state, "agent_loop_failed", { code, message, ...details });
    throw new AgentLoopError(message, code, { runId: state.runId, ...details });
  }

  private setPhase(phase: AgentPhase): void {
    this._phase = phase;
    for (const listener of this.listeners) listener(phase, this.currentPass);
  }

  private log(state: RunState, type: string, payload: Record<string, unknown>): void {
    this.evidence.append(type, state.runId, payload);
    this.logger.debug({ runId: state.runId, ...payload }, type);
  }
}
