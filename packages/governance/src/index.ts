/**
 * @quorate/governance — Authorized, logged access to the vote engine.
 */

export { GovernanceService } from "./governance-service.js";
export type {
  OrganizationAuthority,
  GovernanceServiceOptions,
} from "./governance-service.js";

export { createGovernance } from "./bootstrap.js";
export type { CreateGovernanceOptions, GovernanceInstance, GovernanceRestore } from "./bootstrap.js";

export { InMemoryOrganizationRegistry } from "./in-memory-organizations.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";

export { GovernanceError, classifyError } from "./errors.js";
export type { GovernanceErrorCode, ErrorKind } from "./errors.js";

export {
  parseCommand,
  SignalSchema,
  PermillSchema,
  OrgRepSchema,
  ThresholdRuleSchema,
  RegisterThresholdSchema,
  OpenVoteSchema,
  OpenPercentVoteSchema,
  InvokeThresholdSchema,
  SubmitVoteSchema,
  ExtendVoteSchema,
  UpdateTopicSchema,
} from "./commands.js";
export type {
  RegisterThresholdCommand,
  OpenVoteCommand,
  OpenPercentVoteCommand,
  InvokeThresholdCommand,
  SubmitVoteCommand,
  ExtendVoteCommand,
  UpdateTopicCommand,
} from "./commands.js";

export { isVoteCastEvent, isVoteOpenedEvent } from "./events.js";
export type {
  GovernanceEvent,
  ThresholdSetEvent,
  VoteOpenedEvent,
  VoteCastEvent,
  VoteExtendedEvent,
  TopicUpdatedEvent,
} from "./events.js";
