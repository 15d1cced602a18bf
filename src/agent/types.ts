/**
 * Bounded agent loop types.
 */

export type AgentPhase =
  | "idle"
  | "planning"
  | "searching"
  | "fetching"
  | "evaluating"
  | "synthesizing"
  | "complete"
  | "failed"
  | "aborted";

export type AgentToolName = "search" | "fetch_page" | "synthesize";

/** A tool call requested by the reasoner. Not yet executed. */
export type AgentToolCall =
  | { tool: "search"; query: string }
  | { tool: "fetch_page"; url: string }
  | { tool: "synthesize"; instructions: string };

export interface AgentToolResult {
  /** `${runId}:${n}`; proposals cite tool results by this id. */
  callId: string;
  call: AgentToolCall;
  success: boolean;
  output: string;
  evidenceTag: string;
  durationMs: number;
}

export interface AgentPass {
  /** 1-indexed. */
  pass: number;
  toolCalls: AgentToolCall[];
  toolResults: AgentToolResult[];
  reasoning: string;
  durationMs: number;
  startedAt: string;
}

export type SynthesisMode = "explicit" | "implicit" | "forced";

export interface AgentRunResult {
  runId: string;
  request: string;
  passes: AgentPass[];
  artifact: string;
  synthesis: SynthesisMode;
  totalDurationMs: number;
  totalToolCalls: number;
  searchQueries: string[];
  fetchedUrls: string[];
  provider?: string;
  modelId?: string;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface ReasoningRequest {
  system: string;
  prompt: string;
  pass: number;
  /** Aborted when the per-pass deadline passes. */
  signal: AbortSignal;
}

export interface ReasoningResponse {
  text: string;
  provider?: string;
  modelId?: string;
  outputTokens?: number;
}

/** The model. It can only return text; it never touches tools. */
export interface Reasoner {
  reason(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export interface SearchHit {
  title: string;
  url: string;
  description: string;
}

export interface FetchedPage {
  title: string;
  host: string;
  /** Already redacted. */
  text: string;
}

/** The only tools the loop can call. Both are read-only. */
export interface ReadOnlyTools {
  search(query: string): Promise<SearchHit[]>;
  fetchPage(url: URL): Promise<FetchedPage>;
}

export type PhaseListener = (phase: AgentPhase, pass: number) => void;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type AgentLoopErrorCode =
  | "TOTAL_TIMEOUT"
  | "MODEL_CALL_FAILED"
  | "NO_ARTIFACT_PRODUCED"
  | "ABORTED"
  | "ALREADY_RUNNING";

export class AgentLoopError extends Error {
  public readonly code: AgentLoopErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: AgentLoopErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "AgentLoopError";
    this.code = code;
    this.details = details;
  }
}
