/**
 * Signal Types
 *
 * Numeric primitives for deterministic vote accounting.
 *
 * Rules:
 * - Signal is a bigint; never a float
 * - Block heights are non-negative safe integers supplied by the host
 * - Percentages are expressed in parts per million (permill)
 */

/**
 * Minted, non-transferable voting power for one vote instance.
 * Bounded to an unsigned 128-bit range by the vote engine.
 */
export type Signal = bigint;

/**
 * Logical time. Supplied by the surrounding execution environment,
 * never read from a wall clock.
 */
export type BlockHeight = number;

/**
 * Parts per million, 0 through 1_000_000 inclusive.
 * 500_000 = 50%.
 */
export type Permill = number;

/** Identifier of an open vote. Issued by the vote ledger. */
export type VoteId = number;

/** Identifier of a registered threshold configuration. */
export type ThresholdId = number;

/** Identifier of an organization in the external membership registry. */
export type OrgId = string;

/** Authenticated member/account identity. */
export type MemberId = string;

/**
 * Opaque content-addressed reference (topic, justification).
 * Comparable and serializable; never dereferenced by the engine.
 */
export type Cid = string;
