import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EvidenceStore } from "../src/audit/store.js";
import { ToolBudget } from "../src/agent/budget.js";
import { citationsFromRun } from "../src/agent/citations.js";
import { BoundedAgentLoop } from "../src/agent/loop.js";
import {
  AgentLoopError,
  type FetchedPage,
  type ReadOnlyTools,
  type Reasoner,
  type ReasoningRequest,
  type ReasoningResponse,
  type SearchHit,
} from "../src/agent/types.js";
import { AGENT_LOOP_LIMITS, type AgentLoopLimits } from "../src/kernel/constants.js";
import { isGovernanceError } from "../src/kernel/errors.js";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

type Step = string | ((req: ReasoningRequest) => string | Promise<string>);

class ScriptedReasoner implements Reasoner {
  readonly requests: ReasoningRequest[] = [];

  constructor(private readonly script: Step[]) {}

  async reason(req: ReasoningRequest): Promise<ReasoningResponse> {
    this.requests.push(req);
    const step = this.script.shift();
    if (step === undefined) throw new Error("script exhausted");
    const text = typeof step === "string" ? step : await step(req);
    return { text, provider: "fake", modelId: "fake-1" };
  }
}

class FakeTools implements ReadOnlyTools {
  readonly searches: string[] = [];
  readonly fetches: string[] = [];

  async search(query: string): Promise<SearchHit[]> {
    this.searches.push(query);
    return [{ title: `T ${query}`, url: "https://a.test/1", description: "d" }];
  }

  async fetchPage(url: URL): Promise<FetchedPage> {
    this.fetches.push(url.toString());
    return { title: "Page", host: url.hostname, text: "body text" };
  }
}

const search = (query: string): string => JSON.stringify({ tool: "search", args: { query } });
const fetchPage = (url: string): string => JSON.stringify({ tool: "fetch_page", args: { url } });
const SYNTHESIZE = '{"tool": "synthesize", "args": {}}';

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (err) {
    return err;
  }
  throw new Error("expected rejection");
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

describe("BoundedAgentLoop", () => {
  let evidence: EvidenceStore;
  let tools: FakeTools;

  beforeEach(() => {
    evidence = new EvidenceStore(":memory:");
    tools = new FakeTools();
  });
  afterEach(() => {
    evidence.close();
  });

  function loopWith(
    reasoner: Reasoner,
    limits: Partial<AgentLoopLimits> = {},
    now?: () => number,
  ): BoundedAgentLoop {
    return new BoundedAgentLoop({ reasoner, tools, evidence, limits, now });
  }

  it("runs search then explicit synthesis", async () => {
    const reasoner = new ScriptedReasoner([`Looking it up. ${search("q1")}`, SYNTHESIZE, "BRIEF"]);
    const loop = loopWith(reasoner);

    const run = await loop.run("Summarize q1");

    expect(run.artifact).toBe("BRIEF");
    expect(run.synthesis).toBe("explicit");
    expect(run.passes).toHaveLength(2);
    expect(run.totalToolCalls).toBe(2);
    expect(run.searchQueries).toEqual(["q1"]);
    expect(run.provider).toBe("fake");
    expect(run.passes[0].toolResults[0].callId).toBe(`${run.runId}:1`);
    expect(run.passes[0].toolResults[0].output).toBe(
      "Found 1 results:\n\n[1] T q1\n    URL: https://a.test/1\n    d",
    );
    expect(reasoner.requests[2].prompt.startsWith(
      "SYNTHESIS INSTRUCTIONS: Synthesize a concise brief from all gathered research.",
    )).toBe(true);
    expect(loop.phase).toBe("complete");
    expect(loop.isRunning).toBe(false);
  });

  it("logs every stage under the run id", async () => {
    const loop = loopWith(new ScriptedReasoner([search("q1"), SYNTHESIZE, "BRIEF"]));
    const run = await loop.run("r");

    const entries = evidence.listEntries();
    expect(entries.every((e) => e.subjectId === run.runId)).toBe(true);
    expect(entries.map((e) => e.type)).toEqual([
      "agent_loop_started",
      "agent_loop_model_response",
      "agent_search_executed",
      "agent_loop_pass_complete",
      "agent_loop_model_response",
      "agent_synthesize_complete",
      "agent_loop_pass_complete",
      "agent_loop_complete",
    ]);
  });

  it("takes plain text on the final pass as an implicit artifact", async () => {
    const loop = loopWith(new ScriptedReasoner([search("a"), search("b"), "Final answer text"]));
    const run = await loop.run("r");
    expect(run.synthesis).toBe("implicit");
    expect(run.artifact).toBe("Final answer text");
    expect(run.passes).toHaveLength(3);
    expect(tools.searches).toEqual(["a", "b"]);
  });

  it("forces synthesis once the tool budget is spent", async () => {
    const reasoner = new ScriptedReasoner([search("a"), fetchPage("https://a.test/page"), "FORCED"]);
    const loop = loopWith(reasoner, { maxToolCalls: 2 });

    const run = await loop.run("r");

    expect(run.synthesis).toBe("forced");
    expect(run.artifact).toBe("FORCED");
    expect(run.passes).toHaveLength(2);
    expect(run.totalToolCalls).toBe(2);
    expect(run.fetchedUrls).toEqual(["https://a.test/page"]);
    expect(reasoner.requests[2].system).toBe("Produce your final deliverable now. No tool calls. Plain text only.");
    expect(evidence.listEntries({ type: "agent_loop_forced_synthesis" })).toHaveLength(1);
  });

  it("never exceeds the tool-call ceiling", async () => {
    const loop = loopWith(new ScriptedReasoner([search("a"), "FORCED"]), { maxToolCalls: 1, maxPasses: 3 });
    const run = await loop.run("r");
    expect(run.totalToolCalls).toBe(1);
    expect(run.passes).toHaveLength(1);
    expect(run.synthesis).toBe("forced");
  });

  it("refuses searches past the search limit without dispatching them", async () => {
    const loop = loopWith(new ScriptedReasoner([search("q1"), search("q2"), "Brief."]), { maxSearchQueries: 1 });
    const run = await loop.run("r");

    expect(tools.searches).toEqual(["q1"]);
    expect(run.searchQueries).toEqual(["q1"]);
    expect(run.passes[1].toolResults[0]).toMatchObject({
      success: false,
      output: "Search limit reached (1 max)",
      evidenceTag: "agent_search_limit_reached",
    });
    expect(run.totalToolCalls).toBe(2);
  });

  it("rejects non-HTTPS fetches", async () => {
    const loop = loopWith(new ScriptedReasoner([fetchPage("http://a.test/"), search("x"), "Brief."]));
    const run = await loop.run("r");
    expect(tools.fetches).toEqual([]);
    expect(run.passes[0].toolResults[0]).toMatchObject({
      success: false,
      output: "Invalid or non-HTTPS URL rejected",
    });
  });

  it("logs and skips unknown tools", async () => {
    const loop = loopWith(
      new ScriptedReasoner(['{"tool": "shell", "args": {"cmd": "ls"}}', "Here is the brief."]),
      { maxPasses: 2 },
    );
    const run = await loop.run("r");

    expect(run.totalToolCalls).toBe(0);
    expect(run.artifact).toBe("Here is the brief.");
    const [rejected] = evidence.listEntries({ type: "agent_unknown_tool_rejected" });
    expect(rejected.payload).toMatchObject({ pass: 1, tool: "shell" });
  });

  it("observes abort before dispatching a tool", async () => {
    let loop: BoundedAgentLoop | undefined;
    const reasoner = new ScriptedReasoner([
      () => {
        loop?.abort();
        return search("x");
      },
    ]);
    loop = loopWith(reasoner);

    const err = await rejection(loop.run("r"));
    expect(err).toBeInstanceOf(AgentLoopError);
    expect((err as AgentLoopError).code).toBe("ABORTED");
    expect(tools.searches).toEqual([]);
    expect(loop.phase).toBe("aborted");
    expect(loop.lastRunStats).toEqual({ toolCalls: 0, passes: 0 });
    expect(evidence.listEntries({ type: "agent_loop_aborted" })).toHaveLength(1);
  });

  it("ignores abort when idle", async () => {
    const loop = loopWith(new ScriptedReasoner([SYNTHESIZE, "BRIEF"]));
    loop.abort();
    const run = await loop.run("r");
    expect(run.artifact).toBe("BRIEF");
  });

  it("fails the run when the model call fails", async () => {
    const loop = loopWith(
      new ScriptedReasoner([
        () => {
          throw new Error("provider down");
        },
      ]),
    );
    const err = await rejection(loop.run("r"));
    expect((err as AgentLoopError).code).toBe("MODEL_CALL_FAILED");
    expect((err as AgentLoopError).message).toBe("Model call failed: provider down");
    expect(loop.phase).toBe("failed");
  });

  it("enforces the per-pass deadline", async () => {
    const loop = loopWith(
      new ScriptedReasoner([
        (req) =>
          new Promise<string>((_, reject) => {
            req.signal.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      ]),
      { perPassTimeoutMs: 20 },
    );
    const err = await rejection(loop.run("r"));
    expect((err as AgentLoopError).code).toBe("MODEL_CALL_FAILED");
  });

  it("enforces the total deadline between passes", async () => {
    let t = 0;
    const loop = loopWith(
      new ScriptedReasoner([
        () => {
          t += 1500;
          return search("slow");
        },
      ]),
      { totalTimeoutMs: 1000 },
      () => t,
    );
    const err = await rejection(loop.run("r"));
    expect((err as AgentLoopError).code).toBe("TOTAL_TIMEOUT");
    expect(loop.lastRunStats).toEqual({ toolCalls: 1, passes: 1 });
  });

  it("clips an in-pass synthesis to the remaining total budget", async () => {
    let t = 0;
    const loop = loopWith(
      new ScriptedReasoner([
        () => {
          t = 950;
          return SYNTHESIZE;
        },
        (req) =>
          new Promise<string>((_, reject) => {
            req.signal.addEventListener("abort", () => {
              t += 100;
              reject(new Error("aborted"));
            });
          }),
      ]),
      { totalTimeoutMs: 1000, perPassTimeoutMs: 10_000 },
      () => t,
    );
    const err = await rejection(loop.run("r"));
    expect((err as AgentLoopError).code).toBe("TOTAL_TIMEOUT");
    expect(loop.lastRunStats).toEqual({ toolCalls: 1, passes: 1 });
  });

  it("fails when the forced synthesis is empty", async () => {
    const loop = loopWith(new ScriptedReasoner([search("a"), "   "]), { maxPasses: 1 });
    const err = await rejection(loop.run("r"));
    expect((err as AgentLoopError).code).toBe("NO_ARTIFACT_PRODUCED");
  });

  it("allows one run at a time", async () => {
    let release: (text: string) => void = () => undefined;
    const pending = new Promise<string>((resolve) => {
      release = resolve;
    });
    const loop = loopWith(new ScriptedReasoner([() => pending]), { maxPasses: 1 });

    const first = loop.run("a");
    expect(loop.isRunning).toBe(true);
    const err = await rejection(loop.run("b"));
    expect((err as AgentLoopError).code).toBe("ALREADY_RUNNING");

    release("Done.");
    const run = await first;
    expect(run.synthesis).toBe("implicit");
  });

  it("turns successful research into citations", async () => {
    const loop = loopWith(new ScriptedReasoner([search("q1"), SYNTHESIZE, "BRIEF"]));
    const run = await loop.run("r");
    expect(citationsFromRun(run)).toEqual([
      {
        sourceType: "tool_result",
        reference: `${run.runId}:1`,
        redactedSummary: run.passes[0].toolResults[0].output,
      },
    ]);
  });
});

describe("ToolBudget", () => {
  it("throws TOOL_BUDGET_EXCEEDED past the ceiling", () => {
    const budget = new ToolBudget({ ...AGENT_LOOP_LIMITS, maxToolCalls: 1, maxSearchQueries: 1 });
    budget.chargeCall();
    budget.chargeTool("search");
    expect(budget.exhausted).toBe(true);
    expect(budget.remaining("search")).toBe(0);
    expect(budget.remaining("fetch")).toBe(3);

    for (const charge of [() => budget.chargeCall(), () => budget.chargeTool("search")]) {
      try {
        charge();
        expect.unreachable();
      } catch (err) {
        expect(isGovernanceError(err, "TOOL_BUDGET_EXCEEDED")).toBe(true);
      }
    }
  });
});
