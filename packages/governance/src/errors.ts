/**
 * @quorate/governance — Error types and taxonomy.
 *
 * Every rejection belongs to exactly one kind. Engine errors keep
 * their VoteError code; service-level rejections use GovernanceError.
 */

import { VoteError } from "@quorate/vote";
import type { VoteErrorCode } from "@quorate/vote";

export type GovernanceErrorCode = "UNAUTHORIZED" | "INVALID_COMMAND" | "VOTE_ORGANIZATION_UNKNOWN";

/**
 * Structured error from the governance service.
 */
export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;
  public readonly details?: Record<string, unknown> | undefined;

  constructor(
    code: GovernanceErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
    this.details = details;
  }
}

// =============================================================================
// Taxonomy
// =============================================================================

export type ErrorKind =
  | "authorization"
  | "validation"
  | "not_found"
  | "temporal"
  | "bounds"
  | "no_op"
  | "unsupported_transition"
  | "membership_unavailable"
  | "internal";

const KIND_MAP: Readonly<Record<GovernanceErrorCode | VoteErrorCode, ErrorKind>> = {
  UNAUTHORIZED: "authorization",
  INVALID_COMMAND: "validation",

  VOTE_STATE_NOT_FOUND: "not_found",
  THRESHOLD_NOT_FOUND: "not_found",
  NO_SIGNAL_FOR_VOTER: "not_found",
  VOTE_ORGANIZATION_UNKNOWN: "not_found",

  VOTE_EXPIRED: "temporal",

  THRESHOLD_EXCEEDS_BOUNDS: "bounds",
  SIGNAL_OVERFLOW: "bounds",
  SIGNAL_UNDERFLOW: "bounds",
  BLOCK_HEIGHT_OVERFLOW: "bounds",
  ID_SPACE_EXHAUSTED: "bounds",

  NO_CHANGE: "no_op",
  UNSUPPORTED_TRANSITION: "unsupported_transition",

  GROUP_MEMBERSHIP_UNAVAILABLE: "membership_unavailable",
  WEIGHTED_MEMBERSHIP_UNAVAILABLE: "membership_unavailable",
  INVALID_MEMBERSHIP: "membership_unavailable",

  INVALID_SIGNAL: "validation",
  INVALID_PERCENT: "validation",
  INVALID_BLOCK_HEIGHT: "validation",
  INVALID_SNAPSHOT: "validation",

  SIGNAL_ALREADY_MINTED: "internal",
};

/**
 * Classify any thrown value into an error kind.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof GovernanceError || err instanceof VoteError) {
    return KIND_MAP[err.code];
  }
  return "internal";
}
