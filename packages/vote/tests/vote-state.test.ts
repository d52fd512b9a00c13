/**
 * Tests for the pure vote state machine.
 *
 * Covers:
 * - Direction changes on member records
 * - Tally transitions between buckets
 * - Outcome evaluation and precedence
 * - Expiry and extension
 * - Topic replacement
 */

import { describe, it, expect } from "vitest";
import type { VoteState } from "@quorate/types";
import {
  applyDirection,
  changeDirection,
  countedDirection,
  createVoteRecord,
  createVoteState,
  evaluateOutcome,
  extendEnds,
  isPastEnd,
  markStale,
  replaceTopic,
} from "../src/vote-state.js";
import { VoteError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function state(overrides: Partial<VoteState> = {}): VoteState {
  return {
    ...createVoteState("topic-1", 10n, { inFavor: 6n, against: 5n }, 0, 10),
    ...overrides,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("createVoteState", () => {
  it("starts with empty tallies", () => {
    const s = createVoteState(undefined, 3n, { inFavor: 2n }, 4, undefined);
    expect(s.inFavor).toBe(0n);
    expect(s.against).toBe(0n);
    expect(s.initialized).toBe(4);
    expect(s.ends).toBeUndefined();
    expect(s.topic).toBeUndefined();
  });
});

describe("changeDirection", () => {
  it("sets the direction and justification, keeping the magnitude", () => {
    const record = changeDirection(createVoteRecord(7n), "in_favor", "cid-why");
    expect(record).toEqual({ magnitude: 7n, direction: "in_favor", justification: "cid-why" });
  });

  it("throws NO_CHANGE for the same direction", () => {
    const record = changeDirection(createVoteRecord(1n), "abstain", undefined);
    expect(() => changeDirection(record, "abstain", "other")).toThrow(/already "abstain"/);
  });

  it("allows re-casting a stale direction and clears the flag", () => {
    const stale = { magnitude: 2n, direction: "against", justification: undefined, stale: true } as const;
    expect(changeDirection(stale, "against", "cid-again")).toEqual({
      magnitude: 2n,
      direction: "against",
      justification: "cid-again",
    });
  });
});

describe("markStale", () => {
  it("flags counted directions only", () => {
    const cast = changeDirection(createVoteRecord(3n), "in_favor", undefined);
    const stale = markStale(cast);
    expect(stale.stale).toBe(true);
    expect(stale.direction).toBe("in_favor");
    expect(markStale(stale)).toBe(stale);

    const abstained = changeDirection(createVoteRecord(3n), "abstain", undefined);
    expect(markStale(abstained)).toBe(abstained);
    expect(markStale(createVoteRecord(3n)).stale).toBeUndefined();
  });
});

describe("countedDirection", () => {
  it("treats a stale direction as uncounted", () => {
    const cast = changeDirection(createVoteRecord(1n), "against", undefined);
    expect(countedDirection(cast)).toBe("against");
    expect(countedDirection(markStale(cast))).toBe("uninitialized");
  });
});

describe("applyDirection", () => {
  it("adds to the in-favor bucket from uninitialized", () => {
    const next = applyDirection(state(), 4n, "uninitialized", "in_favor");
    expect(next.inFavor).toBe(4n);
    expect(next.against).toBe(0n);
  });

  it("moves magnitude between buckets", () => {
    const next = applyDirection(state({ inFavor: 4n }), 4n, "in_favor", "against");
    expect(next.inFavor).toBe(0n);
    expect(next.against).toBe(4n);
  });

  it("abstain leaves both buckets", () => {
    const next = applyDirection(state({ against: 3n }), 3n, "against", "abstain");
    expect(next.against).toBe(0n);
    expect(next.inFavor).toBe(0n);
  });

  it("rejects a move back to uninitialized", () => {
    const s = state({ inFavor: 1n });
    try {
      applyDirection(s, 1n, "in_favor", "uninitialized");
      expect.unreachable();
    } catch (err: unknown) {
      expect(err instanceof VoteError && err.code).toBe("UNSUPPORTED_TRANSITION");
    }
  });

  it("rejects a removal the bucket cannot cover", () => {
    expect(() => applyDirection(state({ inFavor: 0n }), 2n, "in_favor", "against")).toThrow(
      /structurally invalid/,
    );
  });

  it("rejects tallies above turnout", () => {
    expect(() => applyDirection(state({ inFavor: 9n }), 2n, "uninitialized", "in_favor")).toThrow(
      /structurally invalid/,
    );
  });

  it("does not mutate its input", () => {
    const s = state();
    applyDirection(s, 4n, "uninitialized", "in_favor");
    expect(s.inFavor).toBe(0n);
  });
});

describe("evaluateOutcome", () => {
  it("is pending below both bounds", () => {
    expect(evaluateOutcome(state({ inFavor: 5n, against: 4n }))).toBe("pending");
  });

  it("approves at the in-favor bound", () => {
    expect(evaluateOutcome(state({ inFavor: 6n }))).toBe("approved");
  });

  it("rejects at the against bound", () => {
    expect(evaluateOutcome(state({ against: 5n }))).toBe("rejected");
  });

  it("gives the against bound precedence when both are met", () => {
    const s = createVoteState(undefined, 10n, { inFavor: 5n, against: 5n }, 0, undefined);
    expect(evaluateOutcome({ ...s, inFavor: 5n, against: 5n })).toBe("rejected");
  });

  it("never rejects without an against bound", () => {
    const s = createVoteState(undefined, 10n, { inFavor: 8n }, 0, undefined);
    expect(evaluateOutcome({ ...s, against: 10n })).toBe("pending");
  });

  it("approves immediately with a zero in-favor bound", () => {
    const s = createVoteState(undefined, 0n, { inFavor: 0n }, 0, undefined);
    expect(evaluateOutcome(s)).toBe("approved");
  });
});

describe("isPastEnd", () => {
  it("is still open at the end block", () => {
    expect(isPastEnd(state({ ends: 10 }), 10)).toBe(false);
    expect(isPastEnd(state({ ends: 10 }), 11)).toBe(true);
  });

  it("never expires an open-ended vote", () => {
    expect(isPastEnd(state({ ends: undefined }), Number.MAX_SAFE_INTEGER)).toBe(false);
  });
});

describe("extendEnds", () => {
  it("moves the end later", () => {
    expect(extendEnds(state({ ends: 10 }), 15).ends).toBe(15);
  });

  it("returns the same state when the candidate is not later", () => {
    const s = state({ ends: 10 });
    expect(extendEnds(s, 10)).toBe(s);
    expect(extendEnds(s, 3)).toBe(s);
  });

  it("keeps open-ended votes open-ended", () => {
    const s = state({ ends: undefined });
    expect(extendEnds(s, 100)).toBe(s);
  });
});

describe("replaceTopic", () => {
  it("keeps tallies by default", () => {
    const next = replaceTopic(state({ inFavor: 3n, against: 2n }), "topic-2", false);
    expect(next.topic).toBe("topic-2");
    expect(next.inFavor).toBe(3n);
    expect(next.against).toBe(2n);
  });

  it("zeroes tallies on request without touching turnout", () => {
    const next = replaceTopic(state({ inFavor: 3n, against: 2n }), "topic-2", true);
    expect(next.inFavor).toBe(0n);
    expect(next.against).toBe(0n);
    expect(next.totalPossibleTurnout).toBe(10n);
  });
});
