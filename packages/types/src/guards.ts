/**
 * Runtime Type Guards
 *
 * Narrowing functions for vote domain types.
 * These enable safe runtime validation at system boundaries
 * (command payloads, deserialized snapshots, external registries).
 */

import type { OrgRep, Threshold, ThresholdRule, VoteOutcome, VoterView } from "./vote.js";
import type { Permill } from "./signal.js";

// =============================================================================
// Scalar guards
// =============================================================================

const VOTER_VIEWS = new Set<string>(["uninitialized", "in_favor", "against", "abstain"]);
const VOTE_OUTCOMES = new Set<string>(["pending", "approved", "rejected"]);
const MINT_MODES = new Set<string>(["equal", "weighted"]);

export const PERMILL_MAX = 1_000_000;

export function isVoterView(value: unknown): value is VoterView {
  return typeof value === "string" && VOTER_VIEWS.has(value);
}

export function isVoteOutcome(value: unknown): value is VoteOutcome {
  return typeof value === "string" && VOTE_OUTCOMES.has(value);
}

export function isPermill(value: unknown): value is Permill {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= PERMILL_MAX
  );
}

export function isBlockHeight(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Structural guards
// =============================================================================

export function isOrgRep(value: unknown): value is OrgRep {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.kind === "string" &&
    MINT_MODES.has(v.kind) &&
    typeof v.orgId === "string" &&
    v.orgId.length > 0
  );
}

function isThresholdOf<T>(
  value: unknown,
  isBound: (bound: unknown) => bound is T,
): value is Threshold<T> {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isBound(v.inFavor) && (v.against === undefined || isBound(v.against));
}

function isNonNegativeBigint(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

export function isSignalThreshold(value: unknown): value is Threshold<bigint> {
  return isThresholdOf(value, isNonNegativeBigint);
}

export function isPercentThreshold(value: unknown): value is Threshold<Permill> {
  return isThresholdOf(value, isPermill);
}

export function isThresholdRule(value: unknown): value is ThresholdRule {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.kind === "signal") return isSignalThreshold(v.threshold);
  if (v.kind === "percent") return isPercentThreshold(v.threshold);
  return false;
}
