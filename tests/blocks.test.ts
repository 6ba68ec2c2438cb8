import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { loadBlockLibrary, renderBlocks } from "../src/routing/blocks.js";
import { compileRoutingConfig } from "../src/routing/config.js";
import { selectContexts } from "../src/routing/router.js";
import { classification } from "./helpers/fakes.js";

const promptsDir = fileURLToPath(new URL("../prompts", import.meta.url));

describe("loadBlockLibrary", () => {
  it("reads every shipped block", () => {
    const library = loadBlockLibrary(promptsDir);
    expect(library.core_behavior.startsWith("You are a friendly")).toBe(true);
    expect(library.business_policies.startsWith("Store policies:")).toBe(true);
  });

  it("keeps a stub for missing files", () => {
    const dir = mkdtempSync(join(tmpdir(), "prompts-"));
    try {
      writeFileSync(join(dir, "core_behavior.md"), "  Custom core.\n");
      const library = loadBlockLibrary(dir);
      expect(library.core_behavior).toBe("Custom core.");
      expect(library.product_details).toBe(
        "Product details are not available right now.",
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("renderBlocks", () => {
  const library = {
    core_behavior: "CORE",
    interaction_guidelines: "GUIDE",
    product_details: "PRODUCTS",
    business_policies: "POLICIES",
  };

  it("renders routed blocks in order with their costs", () => {
    const decision = selectContexts(
      classification({ intent: "complain_intent" }),
      compileRoutingConfig({
        rules: { support: { intents: ["complain_intent"] } },
      }),
    );

    expect(renderBlocks(decision, library, "HISTORY")).toEqual([
      { name: "core_behavior", text: "CORE", estimatedTokens: 100 },
      { name: "interaction_guidelines", text: "GUIDE", estimatedTokens: 150 },
      { name: "business_policies", text: "POLICIES", estimatedTokens: 200 },
      { name: "user_history", text: "HISTORY", estimatedTokens: 300 },
    ]);
  });
});
