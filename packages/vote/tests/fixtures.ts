/**
 * Shared fixtures for vote engine tests.
 */

import type { MemberId, OrgId, OrgRep, Signal, StakeSource, WeightedGroup } from "@quorate/types";

export const EQUAL: OrgRep = { kind: "equal", orgId: "guild" };
export const WEIGHTED: OrgRep = { kind: "weighted", orgId: "coop" };

/**
 * Stake source backed by plain maps. Organizations missing from a map
 * are reported as unavailable.
 */
export class FakeStakeSource implements StakeSource {
  readonly groups = new Map<OrgId, MemberId[]>();
  readonly weighted = new Map<OrgId, WeightedGroup>();

  withGroup(orgId: OrgId, members: MemberId[]): this {
    this.groups.set(orgId, members);
    return this;
  }

  withStakes(orgId: OrgId, stakes: Record<MemberId, Signal>, totalStake?: Signal): this {
    const holdings = Object.entries(stakes).map(([member, stake]) => ({ member, stake }));
    const sum = holdings.reduce((acc, h) => acc + h.stake, 0n);
    this.weighted.set(orgId, { totalStake: totalStake ?? sum, holdings });
    return this;
  }

  getEqualGroup(orgId: OrgId): ReadonlySet<MemberId> | undefined {
    const members = this.groups.get(orgId);
    return members === undefined ? undefined : new Set(members);
  }

  getWeightedGroup(orgId: OrgId): WeightedGroup | undefined {
    return this.weighted.get(orgId);
  }
}

/** guild = {alice, bob, carol}; coop = {A: 10, B: 30} */
export function defaultStakes(): FakeStakeSource {
  return new FakeStakeSource()
    .withGroup("guild", ["carol", "alice", "bob"])
    .withStakes("coop", { A: 10n, B: 30n });
}
