/**
 * Governance Events
 *
 * Every accepted command is recorded as one event, in call order.
 * Events carry the block height at which they happened, never a
 * wall-clock timestamp.
 */

import type {
  BlockHeight,
  Cid,
  MemberId,
  OrgRep,
  ThresholdId,
  VoteId,
  VoterView,
} from "@quorate/types";

/**
 * Discriminated union of all governance events.
 */
export type GovernanceEvent =
  | ThresholdSetEvent
  | VoteOpenedEvent
  | VoteCastEvent
  | VoteExtendedEvent
  | TopicUpdatedEvent;

export interface ThresholdSetEvent {
  readonly type: "threshold_set";
  readonly thresholdId: ThresholdId;
  readonly org: OrgRep;
  readonly setter: MemberId;
  readonly height: BlockHeight;
}

export interface VoteOpenedEvent {
  readonly type: "vote_opened";
  readonly voteId: VoteId;
  readonly org: OrgRep;
  readonly creator: MemberId;
  /** Set when the vote was opened from a registered threshold */
  readonly thresholdId?: ThresholdId | undefined;
  readonly height: BlockHeight;
}

export interface VoteCastEvent {
  readonly type: "vote_cast";
  readonly voteId: VoteId;
  readonly voter: MemberId;
  readonly previous: VoterView;
  readonly direction: VoterView;
  readonly justification?: Cid | undefined;
  readonly height: BlockHeight;
}

export interface VoteExtendedEvent {
  readonly type: "vote_extended";
  readonly voteId: VoteId;
  readonly ends?: BlockHeight | undefined;
  readonly height: BlockHeight;
}

export interface TopicUpdatedEvent {
  readonly type: "topic_updated";
  readonly voteId: VoteId;
  readonly topic: Cid;
  readonly clearedTallies: boolean;
  readonly height: BlockHeight;
}

export function isVoteCastEvent(e: GovernanceEvent): e is VoteCastEvent {
  return e.type === "vote_cast";
}

export function isVoteOpenedEvent(e: GovernanceEvent): e is VoteOpenedEvent {
  return e.type === "vote_opened";
}
