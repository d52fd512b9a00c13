/**
 * @quorate/vote — Core VoteLedger class.
 *
 * The source of truth for threshold-weighted votes. Holds one aggregate
 * per vote and one record per (vote, member), plus the registered
 * thresholds and the id/open-vote counters. The member list of each
 * vote is fixed at mint and indexed, so per-vote reads never scan the
 * whole record map.
 *
 * API surface:
 * - registerThreshold() — Store a reusable threshold rule
 * - openVote() / openPercentVote() — Mint signal and open a vote
 * - invokeThreshold() — Open a vote from a registered rule
 * - applyVote() — Submit or change a member's direction
 * - extendVote() — Push the end block later
 * - updateTopic() — Replace the topic, optionally clearing tallies
 * - getOutcome() / isExpired() — Read-only evaluation of the aggregate
 * - snapshot() / fromSnapshot() — Persistence and restore
 *
 * Every command validates completely before it writes. A rejected
 * command leaves the ledger exactly as it was.
 */

import type {
  BlockHeight,
  Cid,
  MemberId,
  OrgRep,
  Permill,
  Signal,
  Threshold,
  ThresholdConfig,
  ThresholdId,
  ThresholdRule,
  VoteId,
  VoteOutcome,
  VoteRecord,
  VoteState,
  VoterView,
} from "@quorate/types";
import { DEFAULT_MAX_ID, nextUniqueId, validateMaxId } from "./ids.js";
import {
  checkedAddBlocks,
  isWithinTurnout,
  percentToSignalThreshold,
  validateBlockHeight,
  validatePercentThreshold,
  validateSignalThreshold,
} from "./signal-math.js";
import { SignalMinter } from "./signal-minter.js";
import type { MintPlan } from "./signal-minter.js";
import {
  deserializeThresholdConfig,
  deserializeVoteRecord,
  deserializeVoteState,
  serializeThresholdConfig,
  serializeVoteRecord,
  serializeVoteState,
} from "./snapshot.js";
import { hashVoteLedgerSnapshot } from "./state-hash.js";
import { ThresholdRegistry } from "./threshold-registry.js";
import type {
  ApplyVoteResult,
  BlockClock,
  InvokeThresholdRequest,
  MemberVote,
  OpenPercentVoteRequest,
  OpenVoteRequest,
  TopicResetPolicy,
  VoteLedgerOptions,
  VoteLedgerSnapshot,
} from "./types.js";
import { VoteError } from "./types.js";
import {
  applyDirection,
  changeDirection,
  countedDirection,
  createVoteRecord,
  createVoteState,
  evaluateOutcome,
  extendEnds,
  isPastEnd,
  markStale,
  replaceTopic,
} from "./vote-state.js";

/** Composite key of the record map. Vote ids contain no ":". */
function recordKey(voteId: VoteId, member: MemberId): string {
  return `${String(voteId)}:${member}`;
}

function compareMembers(a: MemberId, b: MemberId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class VoteLedger {
  private readonly _states: Map<VoteId, VoteState> = new Map();
  private readonly _records: Map<string, VoteRecord> = new Map();
  private readonly _issuance: Map<VoteId, Signal> = new Map();
  private readonly _members: Map<VoteId, readonly MemberId[]> = new Map();
  private readonly _thresholds: ThresholdRegistry;
  private readonly _minter: SignalMinter;
  private readonly _clock: BlockClock;
  private readonly _maxId: number;
  private readonly _topicResetPolicy: TopicResetPolicy;
  private _voteIdCounter = 0;
  private _openVoteCounter = 0;

  constructor(options: VoteLedgerOptions) {
    this._maxId = options.maxId ?? DEFAULT_MAX_ID;
    validateMaxId(this._maxId);
    this._clock = options.clock;
    this._minter = new SignalMinter(options.stakeSource);
    this._thresholds = new ThresholdRegistry(this._maxId);
    this._topicResetPolicy = options.topicResetPolicy ?? "reset_ballots";
  }

  // ─── Threshold Registry ──────────────────────────────────────────────

  /**
   * Register a reusable threshold for an organization.
   * Configs are immutable; register again to "update".
   */
  registerThreshold(org: OrgRep, rule: ThresholdRule): ThresholdConfig {
    return this._thresholds.register(org, rule);
  }

  getThreshold(id: ThresholdId): ThresholdConfig | undefined {
    return this._thresholds.get(id);
  }

  getThresholds(): readonly ThresholdConfig[] {
    return this._thresholds.getAll();
  }

  // ─── Opening Votes ───────────────────────────────────────────────────

  /**
   * Open a vote with an absolute signal threshold.
   *
   * Throws THRESHOLD_EXCEEDS_BOUNDS if a bound exceeds minted turnout.
   */
  openVote(request: OpenVoteRequest<Signal>): VoteId {
    validateSignalThreshold(request.threshold);
    return this._open(request.topic, request.org, request.duration, () => request.threshold);
  }

  /**
   * Open a vote whose threshold is a fraction of turnout.
   * Each bound is resolved as ceil(permill × turnout / 1_000_000).
   */
  openPercentVote(request: OpenPercentVoteRequest): VoteId {
    validatePercentThreshold(request.threshold);
    return this._open(request.topic, request.org, request.duration, (turnout) =>
      percentToSignalThreshold(request.threshold, turnout),
    );
  }

  /**
   * Open a vote from a registered threshold config.
   *
   * Throws THRESHOLD_NOT_FOUND if the id is unregistered.
   */
  invokeThreshold(id: ThresholdId, request: InvokeThresholdRequest = {}): VoteId {
    const config = this._thresholds.resolve(id);
    const { rule } = config;
    switch (rule.kind) {
      case "signal":
        return this.openVote({ ...request, org: config.org, threshold: rule.threshold });
      case "percent":
        return this.openPercentVote({ ...request, org: config.org, threshold: rule.threshold });
    }
  }

  private _open(
    topic: Cid | undefined,
    org: OrgRep,
    duration: BlockHeight | undefined,
    resolveThreshold: (turnout: Signal) => Threshold<Signal>,
  ): VoteId {
    const now = this._now();
    const ends = duration === undefined ? undefined : checkedAddBlocks(now, duration);

    const plan = this._minter.plan(org);
    const threshold = resolveThreshold(plan.total);
    if (!isWithinTurnout(threshold, plan.total)) {
      throw new VoteError(
        "THRESHOLD_EXCEEDS_BOUNDS",
        `Threshold (in favor ${threshold.inFavor.toString()}` +
          `${threshold.against !== undefined ? `, against ${threshold.against.toString()}` : ""})` +
          ` exceeds minted turnout ${plan.total.toString()}`,
      );
    }

    const voteId = nextUniqueId(this._voteIdCounter, this._maxId, (candidate) =>
      this._states.has(candidate) || this._issuance.has(candidate),
    );

    // All validations passed — commit
    this._mint(voteId, plan);
    this._states.set(voteId, createVoteState(topic, plan.total, threshold, now, ends));
    this._voteIdCounter = voteId;
    this._openVoteCounter += 1;

    return voteId;
  }

  /**
   * Write one record per member and the total issuance.
   * A vote id is minted for at most once.
   */
  private _mint(voteId: VoteId, plan: MintPlan): void {
    if (this._issuance.has(voteId)) {
      throw new VoteError("SIGNAL_ALREADY_MINTED", `Signal already minted for vote ${String(voteId)}`);
    }
    for (const allocation of plan.allocations) {
      this._records.set(recordKey(voteId, allocation.member), createVoteRecord(allocation.magnitude));
    }
    this._members.set(voteId, plan.allocations.map((a) => a.member));
    this._issuance.set(voteId, plan.total);
  }

  // ─── Voting ──────────────────────────────────────────────────────────

  /**
   * Submit or change a member's vote.
   *
   * Checks, in order: vote exists, not expired, voter has signal,
   * direction changed, transition supported. Record and aggregate are
   * written together.
   */
  applyVote(
    voteId: VoteId,
    voter: MemberId,
    direction: VoterView,
    justification?: Cid,
  ): ApplyVoteResult {
    const state = this._requireState(voteId);
    if (isPastEnd(state, this._now())) {
      throw new VoteError(
        "VOTE_EXPIRED",
        `Vote ${String(voteId)} ended at block ${String(state.ends)}; votes are no longer accepted`,
      );
    }

    const key = recordKey(voteId, voter);
    const previous = this._records.get(key);
    if (previous === undefined) {
      throw new VoteError(
        "NO_SIGNAL_FOR_VOTER",
        `No signal minted for "${voter}" in vote ${String(voteId)}`,
      );
    }

    const record = changeDirection(previous, direction, justification);
    const next = applyDirection(state, previous.magnitude, countedDirection(previous), direction);

    this._records.set(key, record);
    this._states.set(voteId, next);

    return { voteId, voter, previous: previous.direction, record, state: next };
  }

  // ─── Updates ─────────────────────────────────────────────────────────

  /**
   * Set ends = max(ends, now + additional). Never moves ends earlier.
   * Votes without an end stay open-ended.
   */
  extendVote(voteId: VoteId, additional: BlockHeight): VoteState {
    const state = this._requireState(voteId);
    const candidate = checkedAddBlocks(this._now(), additional);
    const next = extendEnds(state, candidate);
    if (next !== state) {
      this._states.set(voteId, next);
    }
    return next;
  }

  /**
   * Replace the topic. With `clearTallies`, zero the tallies without
   * re-minting. Member records follow the ledger's topic reset policy:
   * reset_ballots returns them to "uninitialized", keep_ballots keeps
   * their direction but marks it stale so it no longer counts.
   */
  updateTopic(voteId: VoteId, topic: Cid, clearTallies: boolean): VoteState {
    const state = this._requireState(voteId);
    const next = replaceTopic(state, topic, clearTallies);

    const resets: [string, VoteRecord][] = [];
    if (clearTallies) {
      for (const { member, record } of this.getVotesFor(voteId)) {
        const reset = this._topicResetPolicy === "keep_ballots"
          ? markStale(record)
          : record.direction === "uninitialized" ? record : createVoteRecord(record.magnitude);
        if (reset !== record) {
          resets.push([recordKey(voteId, member), reset]);
        }
      }
    }

    for (const [key, record] of resets) {
      this._records.set(key, record);
    }
    this._states.set(voteId, next);
    return next;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getVoteState(voteId: VoteId): VoteState | undefined {
    return this._states.get(voteId);
  }

  hasVote(voteId: VoteId): boolean {
    return this._states.has(voteId);
  }

  getVoteRecord(voteId: VoteId, member: MemberId): VoteRecord | undefined {
    return this._records.get(recordKey(voteId, member));
  }

  /**
   * All member records of a vote, ordered by member id.
   */
  getVotesFor(voteId: VoteId): readonly MemberVote[] {
    const votes: MemberVote[] = [];
    for (const member of this._members.get(voteId) ?? []) {
      const record = this._records.get(recordKey(voteId, member));
      if (record !== undefined) {
        votes.push({ member, record });
      }
    }
    return votes;
  }

  getTotalIssuance(voteId: VoteId): Signal | undefined {
    return this._issuance.get(voteId);
  }

  /**
   * Outcome from the aggregate alone; no record is read.
   */
  getOutcome(voteId: VoteId): VoteOutcome {
    return evaluateOutcome(this._requireState(voteId));
  }

  isExpired(voteId: VoteId): boolean {
    return isPastEnd(this._requireState(voteId), this._now());
  }

  /** Votes opened since genesis. Diagnostic only. */
  get openVoteCount(): number {
    return this._openVoteCounter;
  }

  get voteCount(): number {
    return this._states.size;
  }

  get topicResetPolicy(): TopicResetPolicy {
    return this._topicResetPolicy;
  }

  private _requireState(voteId: VoteId): VoteState {
    const state = this._states.get(voteId);
    if (state === undefined) {
      throw new VoteError("VOTE_STATE_NOT_FOUND", `No vote state for vote ${String(voteId)}`);
    }
    return state;
  }

  private _now(): BlockHeight {
    const now = this._clock.now();
    validateBlockHeight(now);
    return now;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a canonical, serializable snapshot of the ledger.
   * Can be restored with VoteLedger.fromSnapshot().
   */
  snapshot(): VoteLedgerSnapshot {
    const votes = [...this._states.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, state]) => serializeVoteState(id, state));

    const records = votes.flatMap((vote) =>
      this.getVotesFor(vote.id).map(({ member, record }) =>
        serializeVoteRecord(vote.id, member, record),
      ),
    );

    return {
      version: 1,
      counters: {
        voteId: this._voteIdCounter,
        thresholdId: this._thresholds.counter,
        openVotes: this._openVoteCounter,
      },
      thresholds: this._thresholds.getAll().map(serializeThresholdConfig),
      votes,
      records,
    };
  }

  /**
   * SHA-256 of the canonical snapshot.
   */
  stateHash(): string {
    return hashVoteLedgerSnapshot(this.snapshot());
  }

  /**
   * Restore a ledger from a snapshot.
   *
   * Validates structure and the invariants every aggregate must hold:
   * tallies and thresholds within turnout, records only for known votes,
   * minted magnitudes summing to turnout and tallies equal to the
   * counted ballots.
   * Throws INVALID_SNAPSHOT otherwise.
   */
  static fromSnapshot(snapshot: VoteLedgerSnapshot, options: VoteLedgerOptions): VoteLedger {
    if (snapshot.version !== 1) {
      throw new VoteError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }

    const ledger = new VoteLedger(options);
    const { counters } = snapshot;
    for (const [name, value] of Object.entries(counters)) {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new VoteError("INVALID_SNAPSHOT", `Counter "${name}" must be a non-negative integer`);
      }
    }

    for (const serialized of snapshot.thresholds) {
      ledger._thresholds.restore(deserializeThresholdConfig(serialized));
    }
    ledger._thresholds.restoreCounter(counters.thresholdId);

    const members = new Map<VoteId, MemberId[]>();

    for (const serialized of snapshot.votes) {
      if (ledger._states.has(serialized.id)) {
        throw new VoteError("INVALID_SNAPSHOT", `Duplicate vote id: ${String(serialized.id)}`);
      }
      const state = deserializeVoteState(serialized);
      if (state.inFavor + state.against > state.totalPossibleTurnout) {
        throw new VoteError("INVALID_SNAPSHOT", `Vote ${String(serialized.id)}: tallies exceed turnout`);
      }
      if (!isWithinTurnout(state.threshold, state.totalPossibleTurnout)) {
        throw new VoteError("INVALID_SNAPSHOT", `Vote ${String(serialized.id)}: threshold exceeds turnout`);
      }
      ledger._states.set(serialized.id, state);
      ledger._issuance.set(serialized.id, state.totalPossibleTurnout);
      members.set(serialized.id, []);
    }

    for (const serialized of snapshot.records) {
      const voteMembers = members.get(serialized.voteId);
      if (voteMembers === undefined) {
        throw new VoteError(
          "INVALID_SNAPSHOT",
          `Record for "${serialized.member}" references unknown vote ${String(serialized.voteId)}`,
        );
      }
      const key = recordKey(serialized.voteId, serialized.member);
      if (ledger._records.has(key)) {
        throw new VoteError("INVALID_SNAPSHOT", `Duplicate record: ${key}`);
      }
      ledger._records.set(key, deserializeVoteRecord(serialized));
      voteMembers.push(serialized.member);
    }

    for (const [voteId, voteMembers] of members) {
      voteMembers.sort(compareMembers);
      ledger._members.set(voteId, voteMembers);
      ledger._assertTalliesMatchRecords(voteId);
    }

    ledger._voteIdCounter = counters.voteId;
    ledger._openVoteCounter = counters.openVotes;
    return ledger;
  }

  /**
   * Minted magnitudes must add up to turnout, and each tally must equal
   * the magnitudes currently counted in its bucket.
   */
  private _assertTalliesMatchRecords(voteId: VoteId): void {
    const state = this._requireState(voteId);
    let minted = 0n;
    let inFavor = 0n;
    let against = 0n;
    for (const { record } of this.getVotesFor(voteId)) {
      minted += record.magnitude;
      const counted = countedDirection(record);
      if (counted === "in_favor") inFavor += record.magnitude;
      if (counted === "against") against += record.magnitude;
    }

    if (minted !== state.totalPossibleTurnout) {
      throw new VoteError(
        "INVALID_SNAPSHOT",
        `Vote ${String(voteId)}: records hold ${minted.toString()} signal, turnout is ${state.totalPossibleTurnout.toString()}`,
      );
    }
    if (inFavor !== state.inFavor || against !== state.against) {
      throw new VoteError(
        "INVALID_SNAPSHOT",
        `Vote ${String(voteId)}: tallies ${state.inFavor.toString()}/${state.against.toString()}` +
          ` do not match counted ballots ${inFavor.toString()}/${against.toString()}`,
      );
    }
  }
}
