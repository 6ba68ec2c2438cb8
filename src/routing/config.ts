import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigInvalidError, describeError } from "../errors.js";

// ── Routing Config: compiled once at load time ──────────

export const CONTEXT_BLOCKS = [
  "core_behavior",
  "interaction_guidelines",
  "product_details",
  "business_policies",
  "user_history",
] as const;

export type ContextBlockName = (typeof CONTEXT_BLOCKS)[number];

/** Estimated token cost per block; used whenever config cannot be read. */
export const DEFAULT_BLOCK_COSTS: Readonly<Record<ContextBlockName, number>> = {
  core_behavior: 100,
  interaction_guidelines: 150,
  product_details: 800,
  business_policies: 200,
  user_history: 300,
};

export type RuleName = "minimal" | "transactional" | "support" | "fallback";

/** Evaluation order. Earlier rules win when an intent is listed twice. */
export const RULE_ORDER = ["minimal", "transactional", "support"] as const;

export const RULE_BLOCKS: Readonly<
  Record<RuleName, readonly ContextBlockName[]>
> = {
  minimal: ["core_behavior", "interaction_guidelines", "user_history"],
  transactional: [
    "core_behavior",
    "interaction_guidelines",
    "product_details",
    "business_policies",
  ],
  support: [
    "core_behavior",
    "interaction_guidelines",
    "business_policies",
    "user_history",
  ],
  fallback: CONTEXT_BLOCKS,
};

const intentList = z.array(z.string().trim().min(1)).default([]);

const routingFileSchema = z
  .object({
    blocks: z
      .record(z.string(), z.number().finite().nonnegative())
      .default({}),
    rules: z
      .object({
        minimal: z.object({ intents: intentList }).strict().default({}),
        transactional: z.object({ intents: intentList }).strict().default({}),
        support: z.object({ intents: intentList }).strict().default({}),
      })
      .strict()
      .default({}),
    fallbackIntents: intentList,
    disabledIntents: intentList,
  })
  .strict();

export type RoutingFile = z.input<typeof routingFileSchema>;

export interface CompiledRule {
  name: Exclude<RuleName, "fallback">;
  /** Normalized, enabled intents */
  intents: readonly string[];
  matches: (intent: string) => boolean;
  blocks: readonly ContextBlockName[];
}

export interface RoutingConfig {
  /** Ordered; the fallback is implicit and always last. */
  rules: readonly CompiledRule[];
  costs: Readonly<Record<ContextBlockName, number>>;
  fullSetTokens: number;
  fallbackIntents: ReadonlySet<string>;
}

export function normalizeIntent(intent: string): string {
  return intent.trim().toLowerCase();
}

function isBlockName(name: string): name is ContextBlockName {
  return CONTEXT_BLOCKS.some((block) => block === name);
}

/** Validate and compile raw JSON. Throws ConfigInvalidError. */
export function compileRoutingConfig(raw: unknown): RoutingConfig {
  const parsed = routingFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigInvalidError(
      issue?.message ?? "routing config failed validation",
      issue ? issue.path.join(".") || "routing" : "routing",
      parsed.error,
    );
  }
  const file = parsed.data;

  const costs: Record<ContextBlockName, number> = { ...DEFAULT_BLOCK_COSTS };
  for (const [name, cost] of Object.entries(file.blocks)) {
    if (!isBlockName(name)) {
      throw new ConfigInvalidError(`unknown context block "${name}"`, "blocks");
    }
    costs[name] = cost;
  }

  const disabled = new Set(file.disabledIntents.map(normalizeIntent));
  const rules: CompiledRule[] = RULE_ORDER.map((name) => {
    const intents = new Set(
      file.rules[name].intents
        .map(normalizeIntent)
        .filter((intent) => !disabled.has(intent)),
    );
    return {
      name,
      intents: [...intents],
      matches: (intent: string) => intents.has(normalizeIntent(intent)),
      blocks: RULE_BLOCKS[name],
    };
  });

  return {
    rules,
    costs,
    fullSetTokens: sumCosts(CONTEXT_BLOCKS, costs),
    fallbackIntents: new Set(file.fallbackIntents.map(normalizeIntent)),
  };
}

/** Read and compile a routing JSON file. Throws ConfigInvalidError. */
export function loadRoutingConfig(filePath: string): RoutingConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigInvalidError(
      `cannot read ${filePath}: ${describeError(err)}`,
      "ROUTING_CONFIG_PATH",
      err,
    );
  }
  return compileRoutingConfig(raw);
}

export function sumCosts(
  blocks: readonly ContextBlockName[],
  costs: Readonly<Record<ContextBlockName, number>>,
): number {
  return blocks.reduce((total, name) => total + costs[name], 0);
}
