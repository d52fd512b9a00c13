/**
 * Vote Types
 *
 * Aggregate and per-member state for threshold-weighted votes.
 *
 * Rules:
 * - All types are readonly
 * - Tallies change only through the vote state machine
 * - A member's magnitude is fixed once minted
 */

import type { BlockHeight, Cid, OrgId, Permill, Signal, ThresholdId } from "./signal.js";

// =============================================================================
// Organization representation
// =============================================================================

/**
 * Minting-mode selector paired with an organization.
 *
 * - equal: one unit of signal per member
 * - weighted: signal equal to the member's stake
 */
export type OrgRep =
  | { readonly kind: "equal"; readonly orgId: OrgId }
  | { readonly kind: "weighted"; readonly orgId: OrgId };

export type MintMode = OrgRep["kind"];

// =============================================================================
// Thresholds
// =============================================================================

/**
 * A pass/fail rule over signal magnitude.
 * `against` is optional; when present it can reject a vote.
 */
export interface Threshold<T> {
  readonly inFavor: T;
  readonly against?: T | undefined;
}

/**
 * A stored threshold rule: either absolute signal, or a fraction of
 * turnout resolved when the vote is opened.
 */
export type ThresholdRule =
  | { readonly kind: "signal"; readonly threshold: Threshold<Signal> }
  | { readonly kind: "percent"; readonly threshold: Threshold<Permill> };

/**
 * A registered, immutable threshold configuration.
 */
export interface ThresholdConfig {
  readonly id: ThresholdId;
  readonly org: OrgRep;
  readonly rule: ThresholdRule;
}

// =============================================================================
// Vote state
// =============================================================================

/** A member's current stance on a vote. */
export type VoterView = "uninitialized" | "in_favor" | "against" | "abstain";

/** Evaluation of an aggregate against its threshold. */
export type VoteOutcome = "pending" | "approved" | "rejected";

/**
 * Aggregate state for one vote. One per vote id.
 */
export interface VoteState {
  /** What is being voted on */
  readonly topic?: Cid | undefined;

  /** Total signal minted for this vote; fixed at creation */
  readonly totalPossibleTurnout: Signal;

  /** Resolved absolute threshold; fixed at creation */
  readonly threshold: Threshold<Signal>;

  /** Running tallies */
  readonly inFavor: Signal;
  readonly against: Signal;

  /** Block at which the vote was opened */
  readonly initialized: BlockHeight;

  /** Absolute expiry; only ever moves later */
  readonly ends?: BlockHeight | undefined;
}

/**
 * Per-member record. One per (vote id, member).
 */
export interface VoteRecord {
  /** Signal minted to this member for this vote */
  readonly magnitude: Signal;

  readonly direction: VoterView;

  /** Rationale for the current direction */
  readonly justification?: Cid | undefined;

  /**
   * Set when a topic reset zeroed the tallies after this direction was
   * cast. A stale direction counts toward neither bucket until the
   * member votes again.
   */
  readonly stale?: boolean | undefined;
}
