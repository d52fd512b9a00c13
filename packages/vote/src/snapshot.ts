/**
 * @quorate/vote — Snapshot serialization.
 *
 * Converts between in-memory vote state (bigint signal) and the
 * JSON-safe snapshot shape (decimal strings). Optional fields are
 * omitted rather than written as undefined, so the canonical form of
 * a snapshot depends only on state.
 */

import type {
  MemberId,
  Signal,
  Threshold,
  ThresholdConfig,
  VoteId,
  VoteRecord,
  VoteState,
} from "@quorate/types";
import { isBlockHeight, isOrgRep, isPercentThreshold, isVoterView } from "@quorate/types";
import { formatSignal, parseSignal } from "./signal-math.js";
import type {
  SerializedSignalThreshold,
  SerializedThresholdConfig,
  SerializedVoteRecord,
  SerializedVoteState,
} from "./types.js";
import { VoteError } from "./types.js";

// ─── Serialize ───────────────────────────────────────────────────────────

export function serializeSignalThreshold(threshold: Threshold<Signal>): SerializedSignalThreshold {
  const inFavor = formatSignal(threshold.inFavor);
  if (threshold.against === undefined) {
    return { inFavor };
  }
  return { inFavor, against: formatSignal(threshold.against) };
}

export function serializeThresholdConfig(config: ThresholdConfig): SerializedThresholdConfig {
  if (config.rule.kind === "signal") {
    return {
      id: config.id,
      org: { ...config.org },
      rule: { kind: "signal", threshold: serializeSignalThreshold(config.rule.threshold) },
    };
  }
  const { inFavor, against } = config.rule.threshold;
  return {
    id: config.id,
    org: { ...config.org },
    rule: {
      kind: "percent",
      threshold: against === undefined ? { inFavor } : { inFavor, against },
    },
  };
}

export function serializeVoteState(id: VoteId, state: VoteState): SerializedVoteState {
  return {
    id,
    ...(state.topic !== undefined ? { topic: state.topic } : {}),
    totalPossibleTurnout: formatSignal(state.totalPossibleTurnout),
    threshold: serializeSignalThreshold(state.threshold),
    inFavor: formatSignal(state.inFavor),
    against: formatSignal(state.against),
    initialized: state.initialized,
    ...(state.ends !== undefined ? { ends: state.ends } : {}),
  };
}

export function serializeVoteRecord(
  voteId: VoteId,
  member: MemberId,
  record: VoteRecord,
): SerializedVoteRecord {
  return {
    voteId,
    member,
    magnitude: formatSignal(record.magnitude),
    direction: record.direction,
    ...(record.justification !== undefined ? { justification: record.justification } : {}),
    ...(record.stale === true ? { stale: true } : {}),
  };
}

// ─── Deserialize ─────────────────────────────────────────────────────────

function invalid(message: string): VoteError {
  return new VoteError("INVALID_SNAPSHOT", message);
}

function parseSnapshotSignal(value: string, field: string): Signal {
  try {
    return parseSignal(value);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw invalid(`${field}: ${detail}`);
  }
}

function assertId(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw invalid(`${field} must be a positive integer, got: ${String(value)}`);
  }
}

export function deserializeSignalThreshold(
  threshold: SerializedSignalThreshold,
  field: string,
): Threshold<Signal> {
  const inFavor = parseSnapshotSignal(threshold.inFavor, `${field}.inFavor`);
  if (threshold.against === undefined) {
    return { inFavor };
  }
  return { inFavor, against: parseSnapshotSignal(threshold.against, `${field}.against`) };
}

export function deserializeThresholdConfig(config: SerializedThresholdConfig): ThresholdConfig {
  assertId(config.id, "threshold id");
  if (!isOrgRep(config.org)) {
    throw invalid(`threshold ${String(config.id)}: invalid organization`);
  }
  const field = `threshold ${String(config.id)}`;
  if (config.rule.kind === "signal") {
    return {
      id: config.id,
      org: { ...config.org },
      rule: { kind: "signal", threshold: deserializeSignalThreshold(config.rule.threshold, field) },
    };
  }
  if (!isPercentThreshold(config.rule.threshold)) {
    throw invalid(`${field}: invalid percent threshold`);
  }
  return {
    id: config.id,
    org: { ...config.org },
    rule: { kind: "percent", threshold: { ...config.rule.threshold } },
  };
}

export function deserializeVoteState(vote: SerializedVoteState): VoteState {
  assertId(vote.id, "vote id");
  const field = `vote ${String(vote.id)}`;
  if (!isBlockHeight(vote.initialized)) {
    throw invalid(`${field}: invalid initialized height`);
  }
  if (vote.ends !== undefined && !isBlockHeight(vote.ends)) {
    throw invalid(`${field}: invalid end height`);
  }
  return {
    topic: vote.topic,
    totalPossibleTurnout: parseSnapshotSignal(vote.totalPossibleTurnout, `${field}.totalPossibleTurnout`),
    threshold: deserializeSignalThreshold(vote.threshold, `${field}.threshold`),
    inFavor: parseSnapshotSignal(vote.inFavor, `${field}.inFavor`),
    against: parseSnapshotSignal(vote.against, `${field}.against`),
    initialized: vote.initialized,
    ends: vote.ends,
  };
}

export function deserializeVoteRecord(record: SerializedVoteRecord): VoteRecord {
  assertId(record.voteId, "record vote id");
  const field = `record ${String(record.voteId)}/${record.member}`;
  if (!isVoterView(record.direction)) {
    throw invalid(`${field}: invalid direction "${String(record.direction)}"`);
  }
  if (record.stale !== undefined && typeof record.stale !== "boolean") {
    throw invalid(`${field}: invalid stale flag`);
  }
  if (record.stale === true && record.direction !== "in_favor" && record.direction !== "against") {
    throw invalid(`${field}: only in_favor and against ballots can be stale`);
  }
  return {
    magnitude: parseSnapshotSignal(record.magnitude, `${field}.magnitude`),
    direction: record.direction,
    justification: record.justification,
    ...(record.stale === true ? { stale: true } : {}),
  };
}
