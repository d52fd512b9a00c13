/**
 * GovernanceService — Composition root over the vote engine.
 *
 * Callers arrive already authenticated. For privileged commands
 * (registering thresholds, opening, extending and re-topicing votes)
 * the service checks the organization authority before the engine is
 * invoked. Payloads are validated with Zod, accepted commands are
 * recorded as events, and every outcome is logged.
 */

import type { Logger } from "pino";
import type {
  MemberId,
  OrgId,
  OrgRep,
  ThresholdConfig,
  ThresholdId,
  VoteId,
  VoteOutcome,
  VoteRecord,
  VoteState,
} from "@quorate/types";
import { VoteError } from "@quorate/vote";
import type { ApplyVoteResult, BlockClock, MemberVote, VoteLedger } from "@quorate/vote";
import {
  ExtendVoteSchema,
  InvokeThresholdSchema,
  OpenPercentVoteSchema,
  OpenVoteSchema,
  parseCommand,
  RegisterThresholdSchema,
  SubmitVoteSchema,
  UpdateTopicSchema,
} from "./commands.js";
import type {
  ExtendVoteCommand,
  InvokeThresholdCommand,
  OpenPercentVoteCommand,
  OpenVoteCommand,
  RegisterThresholdCommand,
  SubmitVoteCommand,
  UpdateTopicCommand,
} from "./commands.js";
import { classifyError, GovernanceError } from "./errors.js";
import type { GovernanceEvent } from "./events.js";
import { silentLogger } from "./logger.js";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Answers "is this caller authorized for this organization".
 * Supplied by the caller-authentication layer.
 */
export interface OrganizationAuthority {
  isSupervisor(orgId: OrgId, caller: MemberId): boolean;
}

export interface GovernanceServiceOptions {
  readonly ledger: VoteLedger;
  readonly authority: OrganizationAuthority;
  readonly clock: BlockClock;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class GovernanceService {
  readonly ledger: VoteLedger;

  private readonly _authority: OrganizationAuthority;
  private readonly _clock: BlockClock;
  private readonly _log: Logger;
  private readonly _events: GovernanceEvent[] = [];
  private readonly _voteOrgs: Map<VoteId, OrgRep> = new Map();

  constructor(options: GovernanceServiceOptions) {
    this.ledger = options.ledger;
    this._authority = options.authority;
    this._clock = options.clock;
    this._log = (options.logger ?? silentLogger()).child({ component: "governance" });
  }

  // ─── Thresholds ────────────────────────────────────────────────────

  registerThreshold(caller: MemberId, payload: RegisterThresholdCommand): ThresholdConfig {
    return this._run("registerThreshold", { caller }, (context) => {
      const command = parseCommand(RegisterThresholdSchema, payload);
      context.orgId = command.org.orgId;
      this._authorize(command.org.orgId, caller, "register thresholds");

      const config = this.ledger.registerThreshold(command.org, command.rule);
      this._record({
        type: "threshold_set",
        thresholdId: config.id,
        org: config.org,
        setter: caller,
        height: this._clock.now(),
      });
      this._log.info(
        { thresholdId: config.id, orgId: config.org.orgId, rule: config.rule.kind },
        "Threshold registered",
      );
      return config;
    });
  }

  // ─── Opening Votes ─────────────────────────────────────────────────

  openVote(caller: MemberId, payload: OpenVoteCommand): VoteId {
    return this._run("openVote", { caller }, (context) => {
      const command = parseCommand(OpenVoteSchema, payload);
      context.orgId = command.org.orgId;
      this._authorize(command.org.orgId, caller, "open votes");
      const voteId = this.ledger.openVote(command);
      this._opened(voteId, command.org, caller, undefined);
      return voteId;
    });
  }

  openPercentVote(caller: MemberId, payload: OpenPercentVoteCommand): VoteId {
    return this._run("openPercentVote", { caller }, (context) => {
      const command = parseCommand(OpenPercentVoteSchema, payload);
      context.orgId = command.org.orgId;
      this._authorize(command.org.orgId, caller, "open votes");
      const voteId = this.ledger.openPercentVote(command);
      this._opened(voteId, command.org, caller, undefined);
      return voteId;
    });
  }

  invokeThreshold(caller: MemberId, payload: InvokeThresholdCommand): VoteId {
    return this._run("invokeThreshold", { caller }, (context) => {
      const command = parseCommand(InvokeThresholdSchema, payload);
      context.thresholdId = command.thresholdId;
      const config = this.ledger.getThreshold(command.thresholdId);
      if (config === undefined) {
        throw new VoteError("THRESHOLD_NOT_FOUND", `Unknown threshold: ${String(command.thresholdId)}`);
      }
      context.orgId = config.org.orgId;
      this._authorize(config.org.orgId, caller, "open votes");

      const voteId = this.ledger.invokeThreshold(config.id, {
        topic: command.topic,
        duration: command.duration,
      });
      this._opened(voteId, config.org, caller, config.id);
      return voteId;
    });
  }

  private _opened(
    voteId: VoteId,
    org: OrgRep,
    creator: MemberId,
    thresholdId: ThresholdId | undefined,
  ): void {
    this._voteOrgs.set(voteId, org);
    this._record({
      type: "vote_opened",
      voteId,
      org,
      creator,
      thresholdId,
      height: this._clock.now(),
    });
    this._log.info(
      {
        voteId,
        orgId: org.orgId,
        mode: org.kind,
        turnout: this.ledger.getTotalIssuance(voteId)?.toString(),
        thresholdId,
      },
      "Vote opened",
    );
  }

  // ─── Voting ────────────────────────────────────────────────────────

  /**
   * Submit or change a vote. Any member with minted signal may vote.
   */
  submitVote(voter: MemberId, payload: SubmitVoteCommand): ApplyVoteResult {
    return this._run("submitVote", { voter }, (context) => {
      const command = parseCommand(SubmitVoteSchema, payload);
      this._describeVote(context, command.voteId);
      const result = this.ledger.applyVote(
        command.voteId,
        voter,
        command.direction,
        command.justification,
      );
      this._record({
        type: "vote_cast",
        voteId: result.voteId,
        voter,
        previous: result.previous,
        direction: result.record.direction,
        justification: result.record.justification,
        height: this._clock.now(),
      });
      this._log.info(
        {
          voteId: result.voteId,
          orgId: this._voteOrgs.get(result.voteId)?.orgId,
          voter,
          direction: result.record.direction,
          inFavor: result.state.inFavor.toString(),
          against: result.state.against.toString(),
        },
        "Vote cast",
      );
      return result;
    });
  }

  // ─── Updates ───────────────────────────────────────────────────────

  extendVote(caller: MemberId, payload: ExtendVoteCommand): VoteState {
    return this._run("extendVote", { caller }, (context) => {
      const command = parseCommand(ExtendVoteSchema, payload);
      this._describeVote(context, command.voteId);
      this._authorizeForVote(command.voteId, caller);
      const state = this.ledger.extendVote(command.voteId, command.blocks);
      this._record({
        type: "vote_extended",
        voteId: command.voteId,
        ends: state.ends,
        height: this._clock.now(),
      });
      this._log.info({ voteId: command.voteId, ends: state.ends }, "Vote extended");
      return state;
    });
  }

  updateTopic(caller: MemberId, payload: UpdateTopicCommand): VoteState {
    return this._run("updateTopic", { caller }, (context) => {
      const command = parseCommand(UpdateTopicSchema, payload);
      this._describeVote(context, command.voteId);
      this._authorizeForVote(command.voteId, caller);
      const state = this.ledger.updateTopic(command.voteId, command.topic, command.clearTallies);
      this._record({
        type: "topic_updated",
        voteId: command.voteId,
        topic: command.topic,
        clearedTallies: command.clearTallies,
        height: this._clock.now(),
      });
      this._log.info(
        { voteId: command.voteId, clearedTallies: command.clearTallies },
        "Vote topic updated",
      );
      return state;
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getVoteState(voteId: VoteId): VoteState | undefined {
    return this.ledger.getVoteState(voteId);
  }

  getVoteRecord(voteId: VoteId, member: MemberId): VoteRecord | undefined {
    return this.ledger.getVoteRecord(voteId, member);
  }

  getVotesFor(voteId: VoteId): readonly MemberVote[] {
    return this.ledger.getVotesFor(voteId);
  }

  getOutcome(voteId: VoteId): VoteOutcome {
    return this.ledger.getOutcome(voteId);
  }

  isExpired(voteId: VoteId): boolean {
    return this.ledger.isExpired(voteId);
  }

  getThreshold(id: ThresholdId): ThresholdConfig | undefined {
    return this.ledger.getThreshold(id);
  }

  getVoteOrganization(voteId: VoteId): OrgRep | undefined {
    return this._voteOrgs.get(voteId);
  }

  getEventHistory(): readonly GovernanceEvent[] {
    return [...this._events];
  }

  stateHash(): string {
    return this.ledger.stateHash();
  }

  /**
   * Rebuild the event history and vote→organization index from
   * previously recorded events. Pair with VoteLedger.fromSnapshot().
   */
  replayHistory(events: readonly GovernanceEvent[]): void {
    this._events.length = 0;
    this._voteOrgs.clear();
    for (const event of events) {
      this._record(event);
      if (event.type === "vote_opened") {
        this._voteOrgs.set(event.voteId, event.org);
      }
    }
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private _authorize(orgId: OrgId, caller: MemberId, action: string): void {
    if (!this._authority.isSupervisor(orgId, caller)) {
      throw new GovernanceError(
        "UNAUTHORIZED",
        `"${caller}" is not authorized to ${action} for organization "${orgId}"`,
        { orgId, caller },
      );
    }
  }

  private _authorizeForVote(voteId: VoteId, caller: MemberId): void {
    if (!this.ledger.hasVote(voteId)) {
      throw new VoteError("VOTE_STATE_NOT_FOUND", `No vote state for vote ${String(voteId)}`);
    }
    const org = this._voteOrgs.get(voteId);
    if (org === undefined) {
      // Restored ledger without its event history.
      throw new GovernanceError(
        "VOTE_ORGANIZATION_UNKNOWN",
        `No organization on record for vote ${String(voteId)}; replay its event history first`,
        { voteId, caller },
      );
    }
    this._authorize(org.orgId, caller, "update votes");
  }

  private _record(event: GovernanceEvent): void {
    this._events.push(event);
  }

  private _describeVote(context: Record<string, unknown>, voteId: VoteId): void {
    context.voteId = voteId;
    const org = this._voteOrgs.get(voteId);
    if (org !== undefined) context.orgId = org.orgId;
  }

  /**
   * Run a command, logging rejections. Errors always propagate.
   * The command adds what it learns about its target to `context`.
   */
  private _run<T>(
    command: string,
    initial: Record<string, unknown>,
    fn: (context: Record<string, unknown>) => T,
  ): T {
    const context: Record<string, unknown> = { ...initial };
    try {
      return fn(context);
    } catch (err: unknown) {
      const code = err instanceof VoteError || err instanceof GovernanceError ? err.code : undefined;
      this._log.warn(
        {
          command,
          ...context,
          code,
          kind: classifyError(err),
          err: err instanceof Error ? err.message : String(err),
        },
        `${command} rejected`,
      );
      throw err;
    }
  }
}
