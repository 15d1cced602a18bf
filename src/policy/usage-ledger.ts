/**
 * Daily usage derived from the evidence chain.
 *
 * The evaluator never counts anything itself; callers read the ledger and
 * pass the number in. "Today" is the local calendar day of `now`, so the
 * cap resets at local midnight. An `execution_failed` entry marked
 * `effectApplied` counts too: the action happened even though its proof
 * was not recorded.
 */

import type { EvidenceChain } from "../audit/store.js";

export const EXECUTION_COMPLETED = "execution_completed";
export const EXECUTION_FAILED = "execution_failed";

export function startOfLocalDay(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

export function countActionsToday(chain: EvidenceChain, now: Date = new Date()): number {
  const since = startOfLocalDay(now).toISOString();
  const completed = chain.listEntries({ type: EXECUTION_COMPLETED, since }).length;
  const applied = chain
    .listEntries({ type: EXECUTION_FAILED, since })
    .filter((e) => e.payload["effectApplied"] === true).length;
  return completed + applied;
}
