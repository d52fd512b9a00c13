/**
 * Runtime type guard tests for @quorate/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  PERMILL_MAX,
  isVoterView,
  isVoteOutcome,
  isPermill,
  isBlockHeight,
  isOrgRep,
  isSignalThreshold,
  isPercentThreshold,
  isThresholdRule,
} from "../src/guards.js";

// =============================================================================
// Scalar guards
// =============================================================================

describe("isVoterView", () => {
  it("accepts every direction", () => {
    for (const view of ["uninitialized", "in_favor", "against", "abstain"]) {
      expect(isVoterView(view)).toBe(true);
    }
  });

  it("rejects unknown strings and non-strings", () => {
    expect(isVoterView("yes")).toBe(false);
    expect(isVoterView("IN_FAVOR")).toBe(false);
    expect(isVoterView(1)).toBe(false);
    expect(isVoterView(null)).toBe(false);
  });
});

describe("isVoteOutcome", () => {
  it("accepts pending, approved and rejected", () => {
    expect(isVoteOutcome("pending")).toBe(true);
    expect(isVoteOutcome("approved")).toBe(true);
    expect(isVoteOutcome("rejected")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isVoteOutcome("passed")).toBe(false);
    expect(isVoteOutcome(undefined)).toBe(false);
  });
});

describe("isPermill", () => {
  it("accepts the closed range [0, 1_000_000]", () => {
    expect(isPermill(0)).toBe(true);
    expect(isPermill(500_000)).toBe(true);
    expect(isPermill(PERMILL_MAX)).toBe(true);
  });

  it("rejects out-of-range and fractional values", () => {
    expect(isPermill(-1)).toBe(false);
    expect(isPermill(PERMILL_MAX + 1)).toBe(false);
    expect(isPermill(0.5)).toBe(false);
    expect(isPermill("500000")).toBe(false);
  });
});

describe("isBlockHeight", () => {
  it("accepts non-negative safe integers", () => {
    expect(isBlockHeight(0)).toBe(true);
    expect(isBlockHeight(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it("rejects negatives, fractions and unsafe integers", () => {
    expect(isBlockHeight(-1)).toBe(false);
    expect(isBlockHeight(1.5)).toBe(false);
    expect(isBlockHeight(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    expect(isBlockHeight(10n)).toBe(false);
  });
});

// =============================================================================
// Structural guards
// =============================================================================

describe("isOrgRep", () => {
  it("accepts equal and weighted organizations", () => {
    expect(isOrgRep({ kind: "equal", orgId: "org-1" })).toBe(true);
    expect(isOrgRep({ kind: "weighted", orgId: "org-1" })).toBe(true);
  });

  it("rejects unknown modes", () => {
    expect(isOrgRep({ kind: "quadratic", orgId: "org-1" })).toBe(false);
  });

  it("rejects an empty organization id", () => {
    expect(isOrgRep({ kind: "equal", orgId: "" })).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isOrgRep(null)).toBe(false);
    expect(isOrgRep("equal")).toBe(false);
  });
});

describe("isSignalThreshold", () => {
  it("accepts bigint bounds with optional against", () => {
    expect(isSignalThreshold({ inFavor: 2n })).toBe(true);
    expect(isSignalThreshold({ inFavor: 2n, against: 1n })).toBe(true);
  });

  it("rejects number bounds and negative bigints", () => {
    expect(isSignalThreshold({ inFavor: 2 })).toBe(false);
    expect(isSignalThreshold({ inFavor: -1n })).toBe(false);
    expect(isSignalThreshold({ inFavor: 1n, against: "1" })).toBe(false);
  });
});

describe("isPercentThreshold", () => {
  it("accepts permill bounds", () => {
    expect(isPercentThreshold({ inFavor: 750_000 })).toBe(true);
    expect(isPercentThreshold({ inFavor: 500_000, against: 250_000 })).toBe(true);
  });

  it("rejects bounds above 100%", () => {
    expect(isPercentThreshold({ inFavor: 1_000_001 })).toBe(false);
    expect(isPercentThreshold({ inFavor: 1, against: 2_000_000 })).toBe(false);
  });
});

describe("isThresholdRule", () => {
  it("matches the threshold shape to the rule kind", () => {
    expect(isThresholdRule({ kind: "signal", threshold: { inFavor: 3n } })).toBe(true);
    expect(isThresholdRule({ kind: "percent", threshold: { inFavor: 500_000 } })).toBe(true);
  });

  it("rejects mismatched shapes", () => {
    expect(isThresholdRule({ kind: "signal", threshold: { inFavor: 500_000 } })).toBe(false);
    expect(isThresholdRule({ kind: "percent", threshold: { inFavor: 3n } })).toBe(false);
    expect(isThresholdRule({ kind: "other", threshold: { inFavor: 1n } })).toBe(false);
    expect(isThresholdRule(undefined)).toBe(false);
  });
});
