/**
 * @quorate/vote — Internal types for the vote engine.
 *
 * These extend the shared @quorate/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Tallies change only through state machine transitions
 * - Fail-closed: invalid transitions throw, never silently succeed
 */

import type {
  BlockHeight,
  Cid,
  MemberId,
  OrgRep,
  Permill,
  StakeSource,
  Threshold,
  ThresholdId,
  VoteId,
  VoteRecord,
  VoteState,
  VoterView,
} from "@quorate/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for vote engine operations. */
export type VoteErrorCode =
  | "VOTE_STATE_NOT_FOUND"
  | "THRESHOLD_NOT_FOUND"
  | "NO_SIGNAL_FOR_VOTER"
  | "VOTE_EXPIRED"
  | "THRESHOLD_EXCEEDS_BOUNDS"
  | "NO_CHANGE"
  | "UNSUPPORTED_TRANSITION"
  | "GROUP_MEMBERSHIP_UNAVAILABLE"
  | "WEIGHTED_MEMBERSHIP_UNAVAILABLE"
  | "INVALID_MEMBERSHIP"
  | "SIGNAL_ALREADY_MINTED"
  | "SIGNAL_OVERFLOW"
  | "SIGNAL_UNDERFLOW"
  | "INVALID_SIGNAL"
  | "INVALID_PERCENT"
  | "INVALID_BLOCK_HEIGHT"
  | "BLOCK_HEIGHT_OVERFLOW"
  | "ID_SPACE_EXHAUSTED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the vote engine.
 * Always thrown — never returns error codes silently.
 */
export class VoteError extends Error {
  public readonly code: VoteErrorCode;

  constructor(code: VoteErrorCode, message: string) {
    super(message);
    this.name = "VoteError";
    this.code = code;
  }
}

// ─── Clock ───────────────────────────────────────────────────────────────

/**
 * Source of logical time. The engine never reads a wall clock.
 */
export interface BlockClock {
  now(): BlockHeight;
}

// ─── Engine Options ──────────────────────────────────────────────────────

/**
 * What `updateTopic(..., clearTallies = true)` does to member records.
 *
 * - reset_ballots: every record of the vote returns to "uninitialized"
 * - keep_ballots: records are untouched; only the tallies are zeroed
 */
export type TopicResetPolicy = "reset_ballots" | "keep_ballots";

export interface VoteLedgerOptions {
  readonly stakeSource: StakeSource;
  readonly clock: BlockClock;
  readonly topicResetPolicy?: TopicResetPolicy | undefined;
  /** Largest vote/threshold id before the counters wrap. Default: 2^32 - 1 */
  readonly maxId?: number | undefined;
}

// ─── Commands ────────────────────────────────────────────────────────────

/**
 * Parameters for opening a vote with an inline threshold.
 * T is Signal for absolute thresholds, Permill for percentages.
 */
export interface OpenVoteRequest<T> {
  readonly topic?: Cid | undefined;
  readonly org: OrgRep;
  readonly threshold: Threshold<T>;
  /** Blocks from now until the vote ends. Omitted = open-ended. */
  readonly duration?: BlockHeight | undefined;
}

export type OpenPercentVoteRequest = OpenVoteRequest<Permill>;

/**
 * Parameters for opening a vote from a registered threshold.
 */
export interface InvokeThresholdRequest {
  readonly topic?: Cid | undefined;
  readonly duration?: BlockHeight | undefined;
}

/**
 * Result of an accepted vote or revote.
 */
export interface ApplyVoteResult {
  readonly voteId: VoteId;
  readonly voter: MemberId;
  readonly previous: VoterView;
  readonly record: VoteRecord;
  readonly state: VoteState;
}

/**
 * A member record together with its composite key.
 */
export interface MemberVote {
  readonly member: MemberId;
  readonly record: VoteRecord;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** Signal threshold with bigint bounds as decimal strings. */
export interface SerializedSignalThreshold {
  readonly inFavor: string;
  readonly against?: string;
}

export type SerializedThresholdRule =
  | { readonly kind: "signal"; readonly threshold: SerializedSignalThreshold }
  | { readonly kind: "percent"; readonly threshold: Threshold<Permill> };

export interface SerializedThresholdConfig {
  readonly id: ThresholdId;
  readonly org: OrgRep;
  readonly rule: SerializedThresholdRule;
}

export interface SerializedVoteState {
  readonly id: VoteId;
  readonly topic?: Cid;
  readonly totalPossibleTurnout: string;
  readonly threshold: SerializedSignalThreshold;
  readonly inFavor: string;
  readonly against: string;
  readonly initialized: BlockHeight;
  readonly ends?: BlockHeight;
}

export interface SerializedVoteRecord {
  readonly voteId: VoteId;
  readonly member: MemberId;
  readonly magnitude: string;
  readonly direction: VoterView;
  readonly justification?: Cid;
  /** Present only when true. */
  readonly stale?: boolean;
}

/**
 * Serializable snapshot of the entire vote ledger.
 * Canonically ordered; contains no wall-clock metadata.
 */
export interface VoteLedgerSnapshot {
  readonly version: 1;
  readonly counters: {
    readonly voteId: number;
    readonly thresholdId: number;
    readonly openVotes: number;
  };
  readonly thresholds: readonly SerializedThresholdConfig[];
  readonly votes: readonly SerializedVoteState[];
  readonly records: readonly SerializedVoteRecord[];
}
