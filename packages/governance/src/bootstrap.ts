/**
 * Wires configuration, logging, the vote ledger and the governance
 * service together for a host process.
 */

import type { Logger } from "pino";
import type { StakeSource } from "@quorate/types";
import { VoteLedger } from "@quorate/vote";
import type { BlockClock, VoteLedgerSnapshot } from "@quorate/vote";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { GovernanceService } from "./governance-service.js";
import type { OrganizationAuthority } from "./governance-service.js";
import type { GovernanceEvent } from "./events.js";
import { createLogger } from "./logger.js";

export interface CreateGovernanceOptions {
  readonly stakeSource: StakeSource;
  readonly authority: OrganizationAuthority;
  readonly clock: BlockClock;
  readonly env?: Record<string, string | undefined> | undefined;
  readonly logger?: Logger | undefined;
  /** Resume from a ledger snapshot and the event history recorded alongside it. */
  readonly restore?: GovernanceRestore | undefined;
}

export interface GovernanceRestore {
  readonly snapshot: VoteLedgerSnapshot;
  readonly events: readonly GovernanceEvent[];
}

export interface GovernanceInstance {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly ledger: VoteLedger;
  readonly service: GovernanceService;
}

export function createGovernance(options: CreateGovernanceOptions): GovernanceInstance {
  const config = loadConfig(options.env ?? process.env);
  const logger = options.logger ?? createLogger(config);

  const ledgerOptions = {
    stakeSource: options.stakeSource,
    clock: options.clock,
    topicResetPolicy: config.TOPIC_RESET_POLICY,
    maxId: config.MAX_ID,
  };
  const ledger = options.restore === undefined
    ? new VoteLedger(ledgerOptions)
    : VoteLedger.fromSnapshot(options.restore.snapshot, ledgerOptions);

  const service = new GovernanceService({
    ledger,
    authority: options.authority,
    clock: options.clock,
    logger,
  });
  if (options.restore !== undefined) {
    service.replayHistory(options.restore.events);
  }

  logger.info(
    {
      topicResetPolicy: config.TOPIC_RESET_POLICY,
      maxId: config.MAX_ID,
      restoredVotes: ledger.voteCount,
      replayedEvents: options.restore?.events.length ?? 0,
    },
    "Governance service ready",
  );

  return { config, logger, ledger, service };
}
