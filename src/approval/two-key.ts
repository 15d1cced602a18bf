/**
 * Two-key confirmation freshness.
 *
 * A confirmation granted at G is usable at U only when G <= U and
 * U - G < TWO_KEY_FRESHNESS_MS. Callers must evaluate this at the moment
 * of use, never from a value computed earlier in the call chain.
 */

import { TWO_KEY_FRESHNESS_MS } from "../kernel/constants.js";

export type FreshnessVerdict = "fresh" | "expired" | "future";

export function confirmationFreshness(
  grantedAt: Date,
  usedAt: Date,
  windowMs: number = TWO_KEY_FRESHNESS_MS,
): FreshnessVerdict {
  const elapsed = usedAt.getTime() - grantedAt.getTime();
  if (elapsed < 0) return "future";
  return elapsed < windowMs ? "fresh" : "expired";
}
