/**
 * Command payloads with Zod validation schemas.
 *
 * Each command has a Zod schema and a derived TypeScript type.
 * Signal amounts travel as decimal strings and are parsed to bigint.
 */

import { z } from "zod";
import { PERMILL_MAX } from "@quorate/types";
import { GovernanceError } from "./errors.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const SignalSchema = z
  .string()
  .regex(/^\d+$/, "Signal must be a non-negative decimal integer")
  .transform((value) => BigInt(value));

export const PermillSchema = z.number().int().min(0).max(PERMILL_MAX);

export const BlocksSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const CidSchema = z.string().min(1).max(512);

export const OrgRepSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("equal"), orgId: z.string().min(1) }),
  z.object({ kind: z.literal("weighted"), orgId: z.string().min(1) }),
]);

export const SignalThresholdSchema = z.object({
  inFavor: SignalSchema,
  against: SignalSchema.optional(),
});

export const PercentThresholdSchema = z.object({
  inFavor: PermillSchema,
  against: PermillSchema.optional(),
});

export const ThresholdRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("signal"), threshold: SignalThresholdSchema }),
  z.object({ kind: z.literal("percent"), threshold: PercentThresholdSchema }),
]);

// =============================================================================
// Commands
// =============================================================================

export const RegisterThresholdSchema = z.object({
  org: OrgRepSchema,
  rule: ThresholdRuleSchema,
});

export type RegisterThresholdCommand = z.input<typeof RegisterThresholdSchema>;

export const OpenVoteSchema = z.object({
  topic: CidSchema.optional(),
  org: OrgRepSchema,
  threshold: SignalThresholdSchema,
  duration: BlocksSchema.optional(),
});

export type OpenVoteCommand = z.input<typeof OpenVoteSchema>;

export const OpenPercentVoteSchema = z.object({
  topic: CidSchema.optional(),
  org: OrgRepSchema,
  threshold: PercentThresholdSchema,
  duration: BlocksSchema.optional(),
});

export type OpenPercentVoteCommand = z.input<typeof OpenPercentVoteSchema>;

export const InvokeThresholdSchema = z.object({
  thresholdId: z.number().int().min(1),
  topic: CidSchema.optional(),
  duration: BlocksSchema.optional(),
});

export type InvokeThresholdCommand = z.input<typeof InvokeThresholdSchema>;

export const SubmitVoteSchema = z.object({
  voteId: z.number().int().min(1),
  direction: z.enum(["uninitialized", "in_favor", "against", "abstain"]),
  justification: CidSchema.optional(),
});

export type SubmitVoteCommand = z.input<typeof SubmitVoteSchema>;

export const ExtendVoteSchema = z.object({
  voteId: z.number().int().min(1),
  blocks: BlocksSchema,
});

export type ExtendVoteCommand = z.input<typeof ExtendVoteSchema>;

export const UpdateTopicSchema = z.object({
  voteId: z.number().int().min(1),
  topic: CidSchema,
  clearTallies: z.boolean().default(false),
});

export type UpdateTopicCommand = z.input<typeof UpdateTopicSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a command payload.
 * Throws GovernanceError("INVALID_COMMAND") listing every issue.
 */
export function parseCommand<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  payload: unknown,
): Output {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new GovernanceError("INVALID_COMMAND", "Command validation failed", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
