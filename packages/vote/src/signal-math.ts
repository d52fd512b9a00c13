/**
 * @quorate/vote — Deterministic signal arithmetic.
 *
 * All arithmetic uses bigint and is checked against the
 * unsigned 128-bit signal range. Percentages are permill integers.
 *
 * Rules:
 * - No floating-point operations
 * - Overflow and underflow throw, never wrap
 * - Percent-to-absolute conversion rounds up
 * - Zero runtime dependencies
 */

import type { BlockHeight, Permill, Signal, Threshold } from "@quorate/types";
import { isBlockHeight, isPermill, PERMILL_MAX } from "@quorate/types";
import { VoteError } from "./types.js";

/** Largest representable signal (2^128 - 1). */
export const SIGNAL_MAX: Signal = (1n << 128n) - 1n;

const PERMILL_DENOMINATOR = BigInt(PERMILL_MAX);

// ─── Parsing ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string into a signal.
 *
 * "40" → 40n
 * "-1", "1.5", "" → throws INVALID_SIGNAL
 */
export function parseSignal(value: string): Signal {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new VoteError("INVALID_SIGNAL", `Invalid signal: "${String(value)}"`);
  }
  const signal = BigInt(value);
  validateSignal(signal);
  return signal;
}

/** Format a signal as a decimal string. */
export function formatSignal(signal: Signal): string {
  return signal.toString();
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Validate that a value is a signal within [0, SIGNAL_MAX].
 */
export function validateSignal(signal: Signal): void {
  if (typeof signal !== "bigint" || signal < 0n || signal > SIGNAL_MAX) {
    throw new VoteError(
      "INVALID_SIGNAL",
      `Signal must be an integer in [0, 2^128 - 1], got: ${String(signal)}`,
    );
  }
}

export function validateSignalThreshold(threshold: Threshold<Signal>): void {
  validateSignal(threshold.inFavor);
  if (threshold.against !== undefined) {
    validateSignal(threshold.against);
  }
}

export function validatePercentThreshold(threshold: Threshold<Permill>): void {
  const bounds = threshold.against === undefined
    ? [threshold.inFavor]
    : [threshold.inFavor, threshold.against];
  for (const bound of bounds) {
    if (!isPermill(bound)) {
      throw new VoteError(
        "INVALID_PERCENT",
        `Percent threshold must be an integer permill in [0, ${String(PERMILL_MAX)}], got: ${String(bound)}`,
      );
    }
  }
}

/**
 * Validate a block height supplied by the clock or a caller.
 */
export function validateBlockHeight(height: BlockHeight, label = "Block height"): void {
  if (!isBlockHeight(height)) {
    throw new VoteError(
      "INVALID_BLOCK_HEIGHT",
      `${label} must be a non-negative safe integer, got: ${String(height)}`,
    );
  }
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

export function checkedAddSignal(a: Signal, b: Signal): Signal {
  const sum = a + b;
  if (sum > SIGNAL_MAX) {
    throw new VoteError(
      "SIGNAL_OVERFLOW",
      `Signal overflow: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

export function checkedSubSignal(a: Signal, b: Signal): Signal {
  if (b > a) {
    throw new VoteError(
      "SIGNAL_UNDERFLOW",
      `Signal underflow: ${a.toString()} - ${b.toString()}`,
    );
  }
  return a - b;
}

export function sumSignals(values: Iterable<Signal>): Signal {
  let total = 0n;
  for (const value of values) {
    total = checkedAddSignal(total, value);
  }
  return total;
}

/**
 * now + duration, as a checked block height.
 */
export function checkedAddBlocks(now: BlockHeight, duration: BlockHeight): BlockHeight {
  validateBlockHeight(now);
  validateBlockHeight(duration, "Duration");
  const ends = now + duration;
  if (!Number.isSafeInteger(ends)) {
    throw new VoteError(
      "BLOCK_HEIGHT_OVERFLOW",
      `Block height overflow: ${String(now)} + ${String(duration)}`,
    );
  }
  return ends;
}

// ─── Threshold Conversion ────────────────────────────────────────────────

/**
 * permill × turnout, rounded up.
 *
 * 500_000 of 3n → 2n
 * 750_000 of 40n → 30n
 */
export function permillOfCeil(permill: Permill, turnout: Signal): Signal {
  const numerator = BigInt(permill) * turnout;
  return (numerator + PERMILL_DENOMINATOR - 1n) / PERMILL_DENOMINATOR;
}

/**
 * Resolve a percentage threshold into absolute signal once turnout is known.
 */
export function percentToSignalThreshold(
  threshold: Threshold<Permill>,
  turnout: Signal,
): Threshold<Signal> {
  const inFavor = permillOfCeil(threshold.inFavor, turnout);
  if (threshold.against === undefined) {
    return { inFavor };
  }
  return { inFavor, against: permillOfCeil(threshold.against, turnout) };
}

/**
 * Every configured bound must be reachable with the minted turnout.
 */
export function isWithinTurnout(threshold: Threshold<Signal>, turnout: Signal): boolean {
  return (
    threshold.inFavor <= turnout &&
    (threshold.against === undefined || threshold.against <= turnout)
  );
}
