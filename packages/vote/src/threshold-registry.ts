/**
 * @quorate/vote — Threshold registry.
 *
 * Stores named, reusable threshold configurations so a vote can be
 * opened by reference. Configurations are immutable once registered.
 *
 * Rules:
 * - Ids are unique; the counter skips ids already in use
 * - "Updating" a threshold means registering a new id
 * - Once stored, configs cannot be modified or removed
 * - Authorization is the caller's concern, not the registry's
 */

import type { OrgRep, ThresholdConfig, ThresholdId, ThresholdRule } from "@quorate/types";
import { nextUniqueId } from "./ids.js";
import { validatePercentThreshold, validateSignalThreshold } from "./signal-math.js";
import { VoteError } from "./types.js";

/**
 * Append-only registry of threshold configurations.
 */
export class ThresholdRegistry {
  private readonly _configs: Map<ThresholdId, ThresholdConfig> = new Map();
  private _counter = 0;

  constructor(private readonly _maxId: number) {}

  /**
   * Register a new threshold rule for an organization.
   * Returns the stored config with its freshly generated id.
   */
  register(org: OrgRep, rule: ThresholdRule): ThresholdConfig {
    validateRule(rule);

    const id = nextUniqueId(this._counter, this._maxId, (candidate) =>
      this._configs.has(candidate),
    );

    const config: ThresholdConfig = {
      id,
      org: { ...org },
      rule: copyRule(rule),
    };

    this._configs.set(id, config);
    this._counter = id;
    return config;
  }

  /**
   * Get a config by id.
   * Returns undefined if not found.
   */
  get(id: ThresholdId): ThresholdConfig | undefined {
    return this._configs.get(id);
  }

  has(id: ThresholdId): boolean {
    return this._configs.has(id);
  }

  /**
   * Resolve a config. Throws THRESHOLD_NOT_FOUND if not registered.
   */
  resolve(id: ThresholdId): ThresholdConfig {
    const config = this._configs.get(id);
    if (config === undefined) {
      throw new VoteError("THRESHOLD_NOT_FOUND", `Unknown threshold: ${String(id)}`);
    }
    return config;
  }

  /**
   * Get all registered configs, ordered by id.
   */
  getAll(): readonly ThresholdConfig[] {
    return [...this._configs.values()].sort((a, b) => a.id - b.id);
  }

  get count(): number {
    return this._configs.size;
  }

  /** Last id handed out. */
  get counter(): number {
    return this._counter;
  }

  // ─── Restore ───────────────────────────────────────────────────────

  /**
   * Re-insert a config under its original id. Used by snapshot restore.
   */
  restore(config: ThresholdConfig): void {
    if (this._configs.has(config.id)) {
      throw new VoteError("INVALID_SNAPSHOT", `Duplicate threshold id: ${String(config.id)}`);
    }
    validateRule(config.rule);
    this._configs.set(config.id, { id: config.id, org: { ...config.org }, rule: copyRule(config.rule) });
  }

  restoreCounter(counter: number): void {
    this._counter = counter;
  }
}

function validateRule(rule: ThresholdRule): void {
  if (rule.kind === "signal") {
    validateSignalThreshold(rule.threshold);
  } else {
    validatePercentThreshold(rule.threshold);
  }
}

function copyRule(rule: ThresholdRule): ThresholdRule {
  if (rule.kind === "signal") {
    return { kind: "signal", threshold: { ...rule.threshold } };
  }
  return { kind: "percent", threshold: { ...rule.threshold } };
}
