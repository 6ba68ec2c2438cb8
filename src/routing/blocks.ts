import { readFileSync } from "fs";
import { join } from "path";
import { log } from "../logger.js";
import type { RenderedContextBlock } from "../agent/types.js";
import type { ContextBlockName } from "./config.js";
import type { RoutingDecision } from "./router.js";

// ── Context Blocks: static texts + per-turn rendering ───

/** Blocks whose text is fixed and read from `<dir>/<name>.md`. */
export type StaticBlockName = Exclude<ContextBlockName, "user_history">;

export const STATIC_BLOCKS: readonly StaticBlockName[] = [
  "core_behavior",
  "interaction_guidelines",
  "product_details",
  "business_policies",
];

export type BlockLibrary = Readonly<Record<StaticBlockName, string>>;

const PLACEHOLDER: BlockLibrary = {
  core_behavior: "You are a helpful store assistant.",
  interaction_guidelines: "Keep answers short and friendly.",
  product_details: "Product details are not available right now.",
  business_policies: "Store policies are not available right now.",
};

/** Read block texts once at startup; a missing file falls back to a stub. */
export function loadBlockLibrary(dir: string): BlockLibrary {
  const library: Record<StaticBlockName, string> = { ...PLACEHOLDER };
  for (const name of STATIC_BLOCKS) {
    try {
      library[name] = readFileSync(join(dir, `${name}.md`), "utf-8").trim();
    } catch {
      log.warn({ block: name, dir }, "⚠️ Context block file missing, using stub");
    }
  }
  log.info({ dir, blocks: STATIC_BLOCKS.length }, "📚 Context blocks loaded");
  return library;
}

/**
 * Materialise the routed blocks in routing order. `userHistory` supplies
 * the text of the dynamic `user_history` block.
 */
export function renderBlocks(
  decision: RoutingDecision,
  library: BlockLibrary,
  userHistory: string,
): RenderedContextBlock[] {
  return decision.blocks.map((name) => ({
    name,
    text: name === "user_history" ? userHistory : library[name],
    estimatedTokens: decision.blockTokens[name] ?? 0,
  }));
}
