/**
 * @quorate/vote — Vote state machine.
 *
 * Pure transitions over VoteState and VoteRecord. Nothing here reads
 * storage or a clock; callers pass `now` explicitly.
 *
 * Direction transitions:
 *
 *   uninitialized ──► in_favor | against | abstain
 *   in_favor ◄──► against ◄──► abstain ◄──► in_favor
 *   any voted view ──► uninitialized      (rejected: UNSUPPORTED_TRANSITION)
 *   same ──► same                         (rejected: NO_CHANGE)
 *   stale X ──► X                         (re-cast; counts again)
 *
 * Outcome precedence: an `against` bound that is met rejects the vote
 * even when the in-favor bound is also met.
 */

import type {
  BlockHeight,
  Cid,
  Signal,
  Threshold,
  VoteOutcome,
  VoteRecord,
  VoteState,
  VoterView,
} from "@quorate/types";
import { checkedAddSignal, checkedSubSignal } from "./signal-math.js";
import { VoteError } from "./types.js";

// ─── Construction ────────────────────────────────────────────────────────

export function createVoteState(
  topic: Cid | undefined,
  totalPossibleTurnout: Signal,
  threshold: Threshold<Signal>,
  initialized: BlockHeight,
  ends: BlockHeight | undefined,
): VoteState {
  return {
    topic,
    totalPossibleTurnout,
    threshold: { ...threshold },
    inFavor: 0n,
    against: 0n,
    initialized,
    ends,
  };
}

export function createVoteRecord(magnitude: Signal): VoteRecord {
  return { magnitude, direction: "uninitialized", justification: undefined };
}

// ─── Member Records ──────────────────────────────────────────────────────

/**
 * The direction whose bucket currently holds the record's magnitude.
 * A stale record sits in no bucket.
 */
export function countedDirection(record: VoteRecord): VoterView {
  return record.stale === true ? "uninitialized" : record.direction;
}

/**
 * Keep the direction but stop counting it. Used when a topic reset
 * clears the tallies and ballots are kept.
 */
export function markStale(record: VoteRecord): VoteRecord {
  if (record.stale === true || (record.direction !== "in_favor" && record.direction !== "against")) {
    return record;
  }
  return { ...record, stale: true };
}

/**
 * Set a new direction on a member record.
 * Throws NO_CHANGE when the direction is unchanged and still counted.
 */
export function changeDirection(
  record: VoteRecord,
  direction: VoterView,
  justification: Cid | undefined,
): VoteRecord {
  if (record.direction === direction && record.stale !== true) {
    throw new VoteError(
      "NO_CHANGE",
      `Vote direction is already "${direction}"`,
    );
  }
  return { magnitude: record.magnitude, direction, justification };
}

// ─── Tally Transition ────────────────────────────────────────────────────

/**
 * Move a member's magnitude from the bucket of `from` to the bucket of `to`.
 *
 * in_favor and against each have a bucket; abstain and uninitialized
 * contribute to neither. Pass `countedDirection(record)` as `from`.
 * Throws UNSUPPORTED_TRANSITION when moving back to uninitialized, or
 * when the result would be structurally invalid.
 */
export function applyDirection(
  state: VoteState,
  magnitude: Signal,
  from: VoterView,
  to: VoterView,
): VoteState {
  if (to === "uninitialized") {
    throw new VoteError(
      "UNSUPPORTED_TRANSITION",
      `Cannot change a vote from "${from}" back to "uninitialized"`,
    );
  }

  let inFavor = state.inFavor;
  let against = state.against;

  if (from === "in_favor") {
    if (inFavor < magnitude) throw unsupportedTally(from, to);
    inFavor = checkedSubSignal(inFavor, magnitude);
  } else if (from === "against") {
    if (against < magnitude) throw unsupportedTally(from, to);
    against = checkedSubSignal(against, magnitude);
  }

  if (to === "in_favor") {
    inFavor = checkedAddSignal(inFavor, magnitude);
  } else if (to === "against") {
    against = checkedAddSignal(against, magnitude);
  }

  if (inFavor + against > state.totalPossibleTurnout) {
    throw unsupportedTally(from, to);
  }

  return { ...state, inFavor, against };
}

function unsupportedTally(from: VoterView, to: VoterView): VoteError {
  return new VoteError(
    "UNSUPPORTED_TRANSITION",
    `Changing a vote from "${from}" to "${to}" would leave the tally structurally invalid`,
  );
}

// ─── Queries ─────────────────────────────────────────────────────────────

/**
 * Evaluate the running tally against the resolved threshold.
 */
export function evaluateOutcome(state: VoteState): VoteOutcome {
  const { threshold } = state;
  if (threshold.against !== undefined && state.against >= threshold.against) {
    return "rejected";
  }
  if (state.inFavor >= threshold.inFavor) {
    return "approved";
  }
  return "pending";
}

/**
 * Strictly past the end. A vote is still open at its end block.
 */
export function isPastEnd(state: VoteState, now: BlockHeight): boolean {
  return state.ends !== undefined && now > state.ends;
}

// ─── Temporal & Topic Updates ────────────────────────────────────────────

/**
 * Move `ends` to `candidate` if that is later. Open-ended votes stay
 * open-ended.
 */
export function extendEnds(state: VoteState, candidate: BlockHeight): VoteState {
  if (state.ends === undefined || candidate <= state.ends) {
    return state;
  }
  return { ...state, ends: candidate };
}

export function replaceTopic(
  state: VoteState,
  topic: Cid,
  clearTallies: boolean,
): VoteState {
  if (!clearTallies) {
    return { ...state, topic };
  }
  return { ...state, topic, inFavor: 0n, against: 0n };
}
