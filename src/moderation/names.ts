/**
 * Matching OCR'd names against names the operator already decided on.
 *
 * The rule is loose on purpose: equal ignoring case, or either one contained
 * in the other, so a truncated or partly misread name still matches. Short
 * names pay for it ("Ana" matches "Anastasia"). resolvePendingMatch narrows
 * this: an exact match always wins, and two or more substring matches with
 * no exact one count as no match.
 */

import { identityKey } from "../cache/DecisionCache.js";

export function namesMatch(a: string, b: string): boolean {
  const x = identityKey(a);
  const y = identityKey(b);
  if (!x || !y) return false;
  return x === y || x.includes(y) || y.includes(x);
}

export type PendingMatch<T> =
  | { kind: "exact"; item: T }
  | { kind: "substring"; item: T }
  | { kind: "ambiguous"; candidates: T[] }
  | { kind: "none" };

export function resolvePendingMatch<T extends { name: string }>(identity: string, pending: readonly T[]): PendingMatch<T> {
  const key = identityKey(identity);
  const exact = pending.find((p) => identityKey(p.name) === key);
  if (exact) return { kind: "exact", item: exact };

  const loose = pending.filter((p) => namesMatch(identity, p.name));
  if (loose.length === 1) return { kind: "substring", item: loose[0] };
  if (loose.length > 1) return { kind: "ambiguous", candidates: loose };
  return { kind: "none" };
}
