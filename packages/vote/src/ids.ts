/**
 * @quorate/vote — Unique id generation.
 *
 * Counters advance by one and skip ids that are still in use.
 * After `maxId` the counter wraps to 1. Ids are unique for as long as
 * the record they identify exists.
 */

import { VoteError } from "./types.js";

/** Default id ceiling (2^32 - 1). */
export const DEFAULT_MAX_ID = 0xffff_ffff;

export function validateMaxId(maxId: number): void {
  if (!Number.isSafeInteger(maxId) || maxId < 1) {
    throw new VoteError("ID_SPACE_EXHAUSTED", `maxId must be a positive safe integer, got: ${String(maxId)}`);
  }
}

/**
 * Next unused id after `counter`.
 *
 * Throws ID_SPACE_EXHAUSTED when every id in [1, maxId] is taken.
 */
export function nextUniqueId(
  counter: number,
  maxId: number,
  isTaken: (id: number) => boolean,
): number {
  let candidate = counter >= maxId ? 1 : counter + 1;
  for (let attempts = 0; attempts < maxId; attempts++) {
    if (!isTaken(candidate)) {
      return candidate;
    }
    candidate = candidate >= maxId ? 1 : candidate + 1;
  }
  throw new VoteError("ID_SPACE_EXHAUSTED", `No free id in [1, ${String(maxId)}]`);
}
