/**
 * In-memory organization registry.
 *
 * Stands in for the external membership/shares registry. Implements
 * both contracts the governance service consumes:
 * - StakeSource: equal and weighted membership snapshots
 * - OrganizationAuthority: supervisor checks
 *
 * Suitable for tests and single-process hosts. Members are returned
 * in insertion order; the vote engine imposes its own canonical order.
 */

import type {
  MemberId,
  OrgId,
  Signal,
  StakeSource,
  WeightedGroup,
} from "@quorate/types";
import type { OrganizationAuthority } from "./governance-service.js";

interface OrganizationEntry {
  readonly supervisors: Set<MemberId>;
  readonly stakes: Map<MemberId, Signal>;
}

export class InMemoryOrganizationRegistry implements StakeSource, OrganizationAuthority {
  private readonly _orgs = new Map<OrgId, OrganizationEntry>();

  /**
   * Create an organization with its first supervisor.
   * @throws If the organization already exists
   */
  createOrganization(orgId: OrgId, supervisor: MemberId): void {
    if (this._orgs.has(orgId)) {
      throw new Error(`Organization already exists: ${orgId}`);
    }
    this._orgs.set(orgId, {
      supervisors: new Set([supervisor]),
      stakes: new Map(),
    });
  }

  addSupervisor(orgId: OrgId, supervisor: MemberId): void {
    this._require(orgId).supervisors.add(supervisor);
  }

  /**
   * Add a member, or replace an existing member's stake.
   */
  setStake(orgId: OrgId, member: MemberId, stake: Signal): void {
    if (stake < 0n) {
      throw new Error(`Stake must be >= 0, got ${stake.toString()}`);
    }
    this._require(orgId).stakes.set(member, stake);
  }

  removeMember(orgId: OrgId, member: MemberId): void {
    const org = this._require(orgId);
    if (!org.stakes.delete(member)) {
      throw new Error(`Member not found: ${member}`);
    }
  }

  hasOrganization(orgId: OrgId): boolean {
    return this._orgs.has(orgId);
  }

  // ─── StakeSource ─────────────────────────────────────────────────────

  getEqualGroup(orgId: OrgId): ReadonlySet<MemberId> | undefined {
    const org = this._orgs.get(orgId);
    if (org === undefined) return undefined;
    return new Set(org.stakes.keys());
  }

  getWeightedGroup(orgId: OrgId): WeightedGroup | undefined {
    const org = this._orgs.get(orgId);
    if (org === undefined) return undefined;

    const holdings = [...org.stakes.entries()].map(([member, stake]) => ({ member, stake }));
    const totalStake = holdings.reduce((sum, h) => sum + h.stake, 0n);
    return { totalStake, holdings };
  }

  // ─── OrganizationAuthority ───────────────────────────────────────────

  isSupervisor(orgId: OrgId, caller: MemberId): boolean {
    return this._orgs.get(orgId)?.supervisors.has(caller) ?? false;
  }

  private _require(orgId: OrgId): OrganizationEntry {
    const org = this._orgs.get(orgId);
    if (org === undefined) {
      throw new Error(`Organization not found: ${orgId}`);
    }
    return org;
  }
}
