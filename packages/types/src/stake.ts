/**
 * Stake Source Types
 *
 * The membership/shares registry is an external collaborator.
 * These interfaces describe the only shapes the vote engine reads.
 */

import type { MemberId, OrgId, Signal } from "./signal.js";

/**
 * A member and the stake they hold in a weighted organization.
 */
export interface StakeHolding {
  readonly member: MemberId;
  readonly stake: Signal;
}

/**
 * Weighted membership snapshot.
 * `totalStake` is the total issued and must equal the sum of holdings.
 */
export interface WeightedGroup {
  readonly totalStake: Signal;
  readonly holdings: readonly StakeHolding[];
}

/**
 * Reports "who owns how much" for an organization.
 *
 * Both queries return undefined when the organization cannot be
 * resolved. That is distinct from an empty group.
 */
export interface StakeSource {
  getEqualGroup(orgId: OrgId): ReadonlySet<MemberId> | undefined;
  getWeightedGroup(orgId: OrgId): WeightedGroup | undefined;
}
