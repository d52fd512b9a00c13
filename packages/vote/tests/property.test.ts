/**
 * Property-Based Tests for @quorate/vote
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of votes:
 *
 * 1. Conservation after every call, ballots and topic resets alike, under
 *    both reset policies (tallies equal the counted magnitudes)
 * 2. Tallies never exceed minted turnout
 * 3. Replaying the same calls yields the same state hash
 * 4. Snapshot → restore → snapshot is identical
 * 5. Percent thresholds round up and stay within turnout
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { VoterView } from "@quorate/types";
import { ManualBlockClock } from "../src/clock.js";
import { permillOfCeil } from "../src/signal-math.js";
import { countedDirection } from "../src/vote-state.js";
import { VoteLedger } from "../src/vote-ledger.js";
import { VoteError } from "../src/types.js";
import type { TopicResetPolicy } from "../src/types.js";
import { FakeStakeSource, WEIGHTED } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const MEMBERS = ["m0", "m1", "m2", "m3", "m4"] as const;

const arbStakes = fc.tuple(
  ...MEMBERS.map(() => fc.bigInt({ min: 0n, max: 1_000_000n })),
);

const arbDirection: fc.Arbitrary<VoterView> = fc.constantFrom(
  "uninitialized",
  "in_favor",
  "against",
  "abstain",
);

const arbBallot = fc.record({
  member: fc.constantFrom(...MEMBERS),
  direction: arbDirection,
});

const arbBallots = fc.array(arbBallot, { maxLength: 40 });

type Step =
  | { readonly kind: "ballot"; readonly member: string; readonly direction: VoterView }
  | { readonly kind: "reset" };

const arbStep: fc.Arbitrary<Step> = fc.oneof(
  { weight: 4, arbitrary: arbBallot.map((b): Step => ({ kind: "ballot", ...b })) },
  { weight: 1, arbitrary: fc.constant<Step>({ kind: "reset" }) },
);

const arbSteps = fc.array(arbStep, { maxLength: 40 });

// =============================================================================
// Helpers
// =============================================================================

function setup(
  stakes: readonly bigint[],
  topicResetPolicy: TopicResetPolicy = "reset_ballots",
): { ledger: VoteLedger; voteId: number } {
  const source = new FakeStakeSource().withStakes(
    "coop",
    Object.fromEntries(MEMBERS.map((m, i) => [m, stakes[i] ?? 0n])),
  );
  const ledger = new VoteLedger({
    stakeSource: source,
    clock: new ManualBlockClock(0),
    topicResetPolicy,
  });
  const voteId = ledger.openVote({ org: WEIGHTED, threshold: { inFavor: 0n } });
  return { ledger, voteId };
}

/** Apply a ballot, ignoring the rejections the engine is allowed to make. */
function cast(ledger: VoteLedger, voteId: number, member: string, direction: VoterView): void {
  try {
    ledger.applyVote(voteId, member, direction);
  } catch (err: unknown) {
    if (!(err instanceof VoteError)) throw err;
    expect(["NO_CHANGE", "UNSUPPORTED_TRANSITION"]).toContain(err.code);
  }
}

function expectConservation(ledger: VoteLedger, voteId: number): void {
  let inFavor = 0n;
  let against = 0n;
  for (const { record } of ledger.getVotesFor(voteId)) {
    const counted = countedDirection(record);
    if (counted === "in_favor") inFavor += record.magnitude;
    if (counted === "against") against += record.magnitude;
  }

  const state = ledger.getVoteState(voteId);
  expect(state?.inFavor).toBe(inFavor);
  expect(state?.against).toBe(against);
  expect(inFavor + against <= (state?.totalPossibleTurnout ?? 0n)).toBe(true);
}

// =============================================================================
// Properties
// =============================================================================

describe("vote ledger properties", () => {
  it.each(["reset_ballots", "keep_ballots"] as const)(
    "tallies equal the counted magnitudes after every call (%s)",
    (policy) => {
      fc.assert(
        fc.property(arbStakes, arbSteps, (stakes, steps) => {
          const { ledger, voteId } = setup(stakes, policy);
          steps.forEach((step, i) => {
            if (step.kind === "ballot") {
              cast(ledger, voteId, step.member, step.direction);
            } else {
              const state = ledger.updateTopic(voteId, `cid-${String(i)}`, true);
              expect(state.inFavor).toBe(0n);
              expect(state.against).toBe(0n);
              for (const { record } of ledger.getVotesFor(voteId)) {
                if (policy === "reset_ballots") {
                  expect(record.direction).toBe("uninitialized");
                } else {
                  expect(countedDirection(record)).not.toBe("in_favor");
                  expect(countedDirection(record)).not.toBe("against");
                }
              }
            }
            expectConservation(ledger, voteId);
          });
        }),
      );
    },
  );

  it("replaying the same calls yields the same hash", () => {
    fc.assert(
      fc.property(arbStakes, arbBallots, (stakes, ballots) => {
        const a = setup(stakes);
        const b = setup(stakes);
        for (const ballot of ballots) {
          cast(a.ledger, a.voteId, ballot.member, ballot.direction);
          cast(b.ledger, b.voteId, ballot.member, ballot.direction);
        }
        expect(a.ledger.stateHash()).toBe(b.ledger.stateHash());
      }),
    );
  });

  it("snapshot → restore → snapshot is identical", () => {
    fc.assert(
      fc.property(arbStakes, arbBallots, (stakes, ballots) => {
        const { ledger, voteId } = setup(stakes);
        for (const ballot of ballots) {
          cast(ledger, voteId, ballot.member, ballot.direction);
        }
        const snapshot = ledger.snapshot();
        const restored = VoteLedger.fromSnapshot(snapshot, {
          stakeSource: new FakeStakeSource(),
          clock: new ManualBlockClock(0),
        });
        expect(restored.snapshot()).toEqual(snapshot);
      }),
    );
  });

  it("percent thresholds round up and never exceed turnout", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 1_000_000 }),
        fc.bigInt({ min: 0n, max: 10n ** 30n }),
        (permill, turnout) => {
          const bound = permillOfCeil(permill, turnout);
          expect(bound <= turnout).toBe(true);
          expect(bound * 1_000_000n >= BigInt(permill) * turnout).toBe(true);
          if (bound > 0n) {
            expect((bound - 1n) * 1_000_000n < BigInt(permill) * turnout).toBe(true);
          }
        },
      ),
    );
  });
});
