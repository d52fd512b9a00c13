import { describe, it, expect } from "vitest";
import { ManualBlockClock } from "@quorate/vote";
import { createGovernance } from "../src/bootstrap.js";
import { InMemoryOrganizationRegistry } from "../src/in-memory-organizations.js";
import { createLogger, silentLogger } from "../src/logger.js";

function registry(): InMemoryOrganizationRegistry {
  const orgs = new InMemoryOrganizationRegistry();
  orgs.createOrganization("guild", "root");
  orgs.setStake("guild", "alice", 1n);
  return orgs;
}

describe("createGovernance", () => {
  it("configures the ledger from the environment", () => {
    const orgs = registry();
    const { config, ledger, service } = createGovernance({
      env: { NODE_ENV: "test", LOG_LEVEL: "silent", TOPIC_RESET_POLICY: "keep_ballots", MAX_ID: "1" },
      stakeSource: orgs,
      authority: orgs,
      clock: new ManualBlockClock(),
    });

    expect(config.MAX_ID).toBe(1);
    expect(ledger.topicResetPolicy).toBe("keep_ballots");
    expect(service.ledger).toBe(ledger);

    service.openVote("root", { org: { kind: "equal", orgId: "guild" }, threshold: { inFavor: "1" } });
    expect(() =>
      service.openVote("root", { org: { kind: "equal", orgId: "guild" }, threshold: { inFavor: "1" } }),
    ).toThrow(/No free id/);
  });

  it("uses the logger it is given", () => {
    const orgs = registry();
    const logger = silentLogger();
    const instance = createGovernance({
      env: {},
      stakeSource: orgs,
      authority: orgs,
      clock: new ManualBlockClock(),
      logger,
    });
    expect(instance.logger).toBe(logger);
  });

  it("resumes from a snapshot and its event history", () => {
    const orgs = registry();
    const first = createGovernance({
      env: {},
      stakeSource: orgs,
      authority: orgs,
      clock: new ManualBlockClock(),
      logger: silentLogger(),
    });
    const id = first.service.openVote("root", {
      org: { kind: "equal", orgId: "guild" },
      threshold: { inFavor: "1" },
      duration: 5,
    });

    const resumed = createGovernance({
      env: {},
      stakeSource: orgs,
      authority: orgs,
      clock: new ManualBlockClock(),
      logger: silentLogger(),
      restore: { snapshot: first.ledger.snapshot(), events: first.service.getEventHistory() },
    });

    expect(resumed.service.stateHash()).toBe(first.service.stateHash());
    expect(resumed.service.getEventHistory()).toEqual(first.service.getEventHistory());
    expect(resumed.service.extendVote("root", { voteId: id, blocks: 10 }).ends).toBe(10);
  });
});

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger({ LOG_LEVEL: "warn", NODE_ENV: "production" }).level).toBe("warn");
    expect(silentLogger().level).toBe("silent");
  });
});
