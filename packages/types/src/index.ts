/**
 * @quorate/types — Shared domain types for the Quorate stack.
 *
 * These types are used across all Quorate packages:
 * - Signal, block height and identifier primitives
 * - Thresholds and organization representations
 * - Vote aggregate and per-member records
 * - The external stake source contract
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Primitives
export type {
  Signal,
  BlockHeight,
  Permill,
  VoteId,
  ThresholdId,
  OrgId,
  MemberId,
  Cid,
} from "./signal.js";

// Vote types
export type {
  OrgRep,
  MintMode,
  Threshold,
  ThresholdRule,
  ThresholdConfig,
  VoterView,
  VoteOutcome,
  VoteState,
  VoteRecord,
} from "./vote.js";

// External collaborators
export type {
  StakeHolding,
  WeightedGroup,
  StakeSource,
} from "./stake.js";

// Runtime type guards
export {
  PERMILL_MAX,
  isVoterView,
  isVoteOutcome,
  isPermill,
  isBlockHeight,
  isOrgRep,
  isSignalThreshold,
  isPercentThreshold,
  isThresholdRule,
} from "./guards.js";
