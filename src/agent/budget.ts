import type { AgentLoopLimits } from "../kernel/constants.js";
import { GovernanceError } from "../kernel/errors.js";

export type MeteredTool = "search" | "fetch";

/**
 * Hard tool-call counters for one run. The loop checks before dispatching;
 * charging past a ceiling throws TOOL_BUDGET_EXCEEDED.
 */
export class ToolBudget {
  private total = 0;
  private searches = 0;
  private fetches = 0;

  constructor(private readonly limits: AgentLoopLimits) {}

  get totalUsed(): number {
    return this.total;
  }

  get exhausted(): boolean {
    return this.total >= this.limits.maxToolCalls;
  }

  remaining(tool: MeteredTool): number {
    return tool === "search"
      ? this.limits.maxSearchQueries - this.searches
      : this.limits.maxFetchUrls - this.fetches;
  }

  /** One tool invocation against the run-wide ceiling. */
  chargeCall(): void {
    if (this.exhausted) {
      throw new GovernanceError(
        `Tool-call budget exhausted (${this.limits.maxToolCalls} max)`,
        "TOOL_BUDGET_EXCEEDED",
        { used: this.total, max: this.limits.maxToolCalls },
      );
    }
    this.total++;
  }

  /** One dispatched search or fetch against its own ceiling. */
  chargeTool(tool: MeteredTool): void {
    if (this.remaining(tool) <= 0) {
      throw new GovernanceError(`${tool} budget exhausted`, "TOOL_BUDGET_EXCEEDED", { tool });
    }
    if (tool === "search") this.searches++;
    else this.fetches++;
  }
}
