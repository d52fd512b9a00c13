/**
 * @quorate/vote — Deterministic threshold-weighted voting engine.
 *
 * A pure TypeScript engine with one runtime dependency (RFC 8785
 * canonical JSON for state hashing). Enforces the vote invariants:
 * - Signal is minted once per vote, from a stake source snapshot
 * - in_favor + against never exceeds minted turnout
 * - A member's magnitude never changes after minting
 * - Vote end blocks only move later
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - No wall clock, no randomness, canonical iteration order
 * - Fail-closed: invalid transitions throw, never partially commit
 */

// Core engine
export { VoteLedger } from "./vote-ledger.js";

// Components
export { ThresholdRegistry } from "./threshold-registry.js";
export { SignalMinter } from "./signal-minter.js";
export type { MintAllocation, MintPlan } from "./signal-minter.js";
export { ManualBlockClock } from "./clock.js";

// State machine
export {
  createVoteState,
  createVoteRecord,
  changeDirection,
  countedDirection,
  markStale,
  applyDirection,
  evaluateOutcome,
  isPastEnd,
  extendEnds,
  replaceTopic,
} from "./vote-state.js";

// Signal arithmetic
export {
  SIGNAL_MAX,
  parseSignal,
  formatSignal,
  validateSignal,
  checkedAddSignal,
  checkedSubSignal,
  sumSignals,
  checkedAddBlocks,
  permillOfCeil,
  percentToSignalThreshold,
  isWithinTurnout,
} from "./signal-math.js";

// Ids and hashing
export { DEFAULT_MAX_ID, nextUniqueId } from "./ids.js";
export { hashVoteLedgerSnapshot } from "./state-hash.js";

// Types
export type {
  VoteErrorCode,
  BlockClock,
  TopicResetPolicy,
  VoteLedgerOptions,
  OpenVoteRequest,
  OpenPercentVoteRequest,
  InvokeThresholdRequest,
  ApplyVoteResult,
  MemberVote,
  SerializedSignalThreshold,
  SerializedThresholdRule,
  SerializedThresholdConfig,
  SerializedVoteState,
  SerializedVoteRecord,
  VoteLedgerSnapshot,
} from "./types.js";

export { VoteError } from "./types.js";
