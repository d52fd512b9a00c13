/**
 * @quorate/vote — Ledger state hash.
 *
 * Algorithm:
 * 1. Canonicalize the snapshot (RFC 8785 / JCS)
 * 2. SHA-256 the canonical form
 *
 * Two ledgers that processed the same calls at the same block heights
 * produce the same hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { VoteLedgerSnapshot } from "./types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function hashVoteLedgerSnapshot(snapshot: VoteLedgerSnapshot): string {
  return sha256(canonicalize(snapshot));
}
