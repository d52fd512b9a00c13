/**
 * @quorate/vote — Signal minter.
 *
 * Converts a stake source snapshot into the fixed pool of signal for
 * one vote instance.
 *
 * - equal: every member receives exactly 1; total = member count
 * - weighted: every member receives their stake, 1:1; total = stake total
 *
 * Planning reads the stake source and never writes. The vote ledger
 * commits a plan exactly once, after the threshold has been validated.
 */

import type { MemberId, OrgId, OrgRep, Signal, StakeSource } from "@quorate/types";
import { checkedAddSignal, SIGNAL_MAX } from "./signal-math.js";
import { VoteError } from "./types.js";

export interface MintAllocation {
  readonly member: MemberId;
  readonly magnitude: Signal;
}

/**
 * Signal to be issued for one vote, ordered by member id.
 */
export interface MintPlan {
  readonly org: OrgRep;
  readonly total: Signal;
  readonly allocations: readonly MintAllocation[];
}

export class SignalMinter {
  constructor(private readonly _source: StakeSource) {}

  /**
   * Compute the allocation for an organization in its minting mode.
   *
   * Throws GROUP_MEMBERSHIP_UNAVAILABLE / WEIGHTED_MEMBERSHIP_UNAVAILABLE
   * when the stake source cannot resolve the organization.
   */
  plan(org: OrgRep): MintPlan {
    switch (org.kind) {
      case "equal":
        return this._planEqual(org);
      case "weighted":
        return this._planWeighted(org);
    }
  }

  private _planEqual(org: OrgRep): MintPlan {
    const group = this._source.getEqualGroup(org.orgId);
    if (group === undefined) {
      throw new VoteError(
        "GROUP_MEMBERSHIP_UNAVAILABLE",
        `Cannot mint equal signal: no group membership for organization "${org.orgId}"`,
      );
    }

    const allocations = [...group]
      .sort(compareMembers)
      .map((member) => ({ member, magnitude: 1n }));

    return {
      org,
      total: BigInt(allocations.length),
      allocations,
    };
  }

  private _planWeighted(org: OrgRep): MintPlan {
    const group = this._source.getWeightedGroup(org.orgId);
    if (group === undefined) {
      throw new VoteError(
        "WEIGHTED_MEMBERSHIP_UNAVAILABLE",
        `Cannot mint weighted signal: no weighted membership for organization "${org.orgId}"`,
      );
    }

    const seen = new Set<MemberId>();
    let sum = 0n;
    for (const holding of group.holdings) {
      if (seen.has(holding.member)) {
        throw invalidMembership(org.orgId, `member "${holding.member}" listed twice`);
      }
      seen.add(holding.member);
      if (typeof holding.stake !== "bigint" || holding.stake < 0n || holding.stake > SIGNAL_MAX) {
        throw invalidMembership(org.orgId, `member "${holding.member}" has invalid stake ${String(holding.stake)}`);
      }
      sum = checkedAddSignal(sum, holding.stake);
    }

    if (sum !== group.totalStake) {
      throw invalidMembership(
        org.orgId,
        `reported total ${String(group.totalStake)} does not equal sum of stakes ${sum.toString()}`,
      );
    }

    const allocations = group.holdings
      .map((h) => ({ member: h.member, magnitude: h.stake }))
      .sort((a, b) => compareMembers(a.member, b.member));

    return { org, total: sum, allocations };
  }
}

/** Code-unit ordering; independent of locale. */
function compareMembers(a: MemberId, b: MemberId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function invalidMembership(orgId: OrgId, detail: string): VoteError {
  return new VoteError("INVALID_MEMBERSHIP", `Invalid weighted membership for organization "${orgId}": ${detail}`);
}
