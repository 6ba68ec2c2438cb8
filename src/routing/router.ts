import { log } from "../logger.js";
import { ConfigInvalidError, describeError } from "../errors.js";
import { classificationSchema } from "../memory/types.js";
import {
  CONTEXT_BLOCKS,
  DEFAULT_BLOCK_COSTS,
  compileRoutingConfig,
  normalizeIntent,
  sumCosts,
  type ContextBlockName,
  type RoutingConfig,
  type RuleName,
} from "./config.js";

// ── Context Router: intent → minimal context set ────────

export type FallbackReason =
  | "configured-fallback"
  | "unmapped-intent"
  | "invalid-classification"
  | "invalid-config";

export interface RoutingDecision {
  blocks: readonly ContextBlockName[];
  /** Estimated cost of each selected block. */
  blockTokens: Readonly<Partial<Record<ContextBlockName, number>>>;
  totalTokens: number;
  fullSetTokens: number;
  tokensSaved: number;
  /** Fraction of the full set avoided, in [0, 1]. Always 0 for the fallback. */
  savings: number;
  rule: RuleName;
  fallbackReason?: FallbackReason;
}

/**
 * Pure, deterministic selection. `config` undefined means the routing config
 * is unusable, which always yields the full set. Never throws.
 */
export function selectContexts(
  classification: unknown,
  config: RoutingConfig | undefined,
): RoutingDecision {
  if (!config) {
    return fullContext(DEFAULT_BLOCK_COSTS, "invalid-config");
  }

  const parsed = classificationSchema.safeParse(classification);
  if (!parsed.success) {
    return fullContext(config.costs, "invalid-classification");
  }

  const intent = normalizeIntent(parsed.data.intent);
  for (const rule of config.rules) {
    let hit = false;
    try {
      hit = rule.matches(intent);
    } catch {
      return fullContext(config.costs, "invalid-config");
    }
    if (!hit) continue;

    const totalTokens = sumCosts(rule.blocks, config.costs);
    const tokensSaved = config.fullSetTokens - totalTokens;
    return {
      blocks: rule.blocks,
      blockTokens: pickCosts(rule.blocks, config.costs),
      totalTokens,
      fullSetTokens: config.fullSetTokens,
      tokensSaved,
      savings:
        config.fullSetTokens > 0 ? tokensSaved / config.fullSetTokens : 0,
      rule: rule.name,
    };
  }

  return fullContext(
    config.costs,
    config.fallbackIntents.has(intent)
      ? "configured-fallback"
      : "unmapped-intent",
  );
}

function fullContext(
  costs: Readonly<Record<ContextBlockName, number>>,
  reason: FallbackReason,
): RoutingDecision {
  const total = sumCosts(CONTEXT_BLOCKS, costs);
  return {
    blocks: CONTEXT_BLOCKS,
    blockTokens: pickCosts(CONTEXT_BLOCKS, costs),
    totalTokens: total,
    fullSetTokens: total,
    tokensSaved: 0,
    savings: 0,
    rule: "fallback",
    fallbackReason: reason,
  };
}

function pickCosts(
  blocks: readonly ContextBlockName[],
  costs: Readonly<Record<ContextBlockName, number>>,
): Partial<Record<ContextBlockName, number>> {
  const picked: Partial<Record<ContextBlockName, number>> = {};
  for (const name of blocks) picked[name] = costs[name];
  return picked;
}

/**
 * Holds the compiled config. A config that fails to compile is kept as the
 * error and every request falls back to the full set.
 */
export class ContextRouter {
  private readonly config: RoutingConfig | undefined;
  readonly configError: ConfigInvalidError | undefined;

  constructor(config: RoutingConfig | undefined, configError?: ConfigInvalidError) {
    this.config = config;
    this.configError = config ? undefined : configError;
  }

  /** Compile raw JSON; on failure the router stays usable in fallback mode. */
  static fromRaw(raw: unknown): ContextRouter {
    try {
      return new ContextRouter(compileRoutingConfig(raw));
    } catch (err) {
      const error =
        err instanceof ConfigInvalidError
          ? err
          : new ConfigInvalidError(describeError(err), "routing", err);
      log.error(
        { error: error.message },
        "❌ Routing config invalid, all turns use full context",
      );
      return new ContextRouter(undefined, error);
    }
  }

  select(classification: unknown): RoutingDecision {
    const decision = selectContexts(classification, this.config);
    log.info(
      {
        rule: decision.rule,
        reason: decision.fallbackReason,
        blocks: decision.blocks,
        tokens: decision.totalTokens,
        saved: decision.tokensSaved,
        savings: `${(decision.savings * 100).toFixed(1)}%`,
      },
      "🧭 Context routed",
    );
    return decision;
  }
}
