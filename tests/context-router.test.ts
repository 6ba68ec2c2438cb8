import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { compileRoutingConfig, type RoutingFile } from "../src/routing/config.js";
import { ContextRouter, selectContexts } from "../src/routing/router.js";
import { classification } from "./helpers/fakes.js";

const shipped: unknown = JSON.parse(
  readFileSync(new URL("../config/routing.json", import.meta.url), "utf-8"),
);
const config = compileRoutingConfig(shipped);

describe("selectContexts", () => {
  // ── Rule table ─────────────────────────────────────────

  it("routes a greeting to the minimal set", () => {
    const decision = selectContexts(
      classification({ eventType: "GENERIC_EVENT", importance: 0.2, intent: "greet" }),
      config,
    );
    expect(decision.rule).toBe("minimal");
    expect(decision.blocks).toEqual([
      "core_behavior",
      "interaction_guidelines",
      "user_history",
    ]);
    expect(decision.totalTokens).toBe(550);
    expect(decision.tokensSaved).toBe(1000);
    expect(decision.savings).toBeGreaterThan(0);
  });

  it("routes a purchase to the transactional set", () => {
    const decision = selectContexts(
      classification({
        eventType: "TRANSACTION",
        importance: 0.9,
        intent: "purchase_intent",
      }),
      config,
    );
    expect(decision.rule).toBe("transactional");
    expect(decision.blocks).toEqual([
      "core_behavior",
      "interaction_guidelines",
      "product_details",
      "business_policies",
    ]);
    expect(decision.totalTokens).toBe(1250);
    expect(decision.tokensSaved).toBe(300);
  });

  it("routes support and complaints to the support set", () => {
    for (const intent of ["support_intent", "complain_intent"]) {
      const decision = selectContexts(classification({ intent }), config);
      expect(decision.rule).toBe("support");
      expect(decision.blocks).toEqual([
        "core_behavior",
        "interaction_guidelines",
        "business_policies",
        "user_history",
      ]);
      expect(decision.totalTokens).toBe(750);
    }
  });

  it("matches intents case-insensitively", () => {
    expect(selectContexts(classification({ intent: "  GREET " }), config).rule).toBe(
      "minimal",
    );
  });

  // ── Fallback ───────────────────────────────────────────

  it("sends an unmapped intent to the full set with zero savings", () => {
    const decision = selectContexts(
      classification({ intent: "unexpected_new_intent" }),
      config,
    );
    expect(decision.rule).toBe("fallback");
    expect(decision.fallbackReason).toBe("unmapped-intent");
    expect(decision.blocks).toHaveLength(5);
    expect(decision.totalTokens).toBe(1550);
    expect(decision.tokensSaved).toBe(0);
    expect(decision.savings).toBe(0);
  });

  it("marks a configured general intent as a configured fallback", () => {
    const decision = selectContexts(
      classification({ intent: "inquiry_intent" }),
      config,
    );
    expect(decision.rule).toBe("fallback");
    expect(decision.fallbackReason).toBe("configured-fallback");
  });

  it("falls back on malformed classifications", () => {
    for (const bad of [
      null,
      undefined,
      "greet",
      { intent: "greet" },
      classification({ importance: 1.5 }),
      classification({ intent: "" }),
      { ...classification(), eventType: "SMALL_TALK" },
    ]) {
      const decision = selectContexts(bad, config);
      expect(decision.rule).toBe("fallback");
      expect(decision.fallbackReason).toBe("invalid-classification");
      expect(decision.savings).toBe(0);
    }
  });

  it("falls back with default costs when there is no usable config", () => {
    const decision = selectContexts(classification(), undefined);
    expect(decision.rule).toBe("fallback");
    expect(decision.fallbackReason).toBe("invalid-config");
    expect(decision.totalTokens).toBe(1550);
  });

  // ── Ordering and configuration ─────────────────────────

  it("lets the earlier rule win when an intent is listed twice", () => {
    const overlapping: RoutingFile = {
      rules: {
        transactional: { intents: ["refund"] },
        support: { intents: ["refund"] },
      },
    };
    const decision = selectContexts(
      classification({ intent: "refund" }),
      compileRoutingConfig(overlapping),
    );
    expect(decision.rule).toBe("transactional");
  });

  it("ignores disabled intents", () => {
    const cfg = compileRoutingConfig({
      rules: { minimal: { intents: ["greet"] } },
      disabledIntents: ["greet"],
    });
    const decision = selectContexts(classification({ intent: "greet" }), cfg);
    expect(decision.rule).toBe("fallback");
    expect(decision.fallbackReason).toBe("unmapped-intent");
  });

  it("uses configured block costs for the accounting", () => {
    const cfg = compileRoutingConfig({
      blocks: { product_details: 400 },
      rules: { minimal: { intents: ["greet"] } },
    });
    const decision = selectContexts(classification({ intent: "greet" }), cfg);
    // full = 100 + 150 + 400 + 200 + 300
    expect(decision.fullSetTokens).toBe(1150);
    expect(decision.totalTokens).toBe(550);
    expect(decision.savings).toBeCloseTo(1 - 550 / 1150, 10);
    expect(decision.blockTokens).toEqual({
      core_behavior: 100,
      interaction_guidelines: 150,
      user_history: 300,
    });
  });

  it("reports savings as 1 - selected/full for every rule", () => {
    for (const intent of ["greet", "purchase_intent", "support_intent", "x"]) {
      const d = selectContexts(classification({ intent }), config);
      expect(d.savings).toBeCloseTo(1 - d.totalTokens / d.fullSetTokens, 10);
    }
  });

  it("is deterministic for identical input", () => {
    const input = classification({ intent: "purchase_intent" });
    expect(selectContexts(input, config)).toEqual(selectContexts(input, config));
  });
});

describe("ContextRouter", () => {
  it("routes with the compiled config", () => {
    const router = ContextRouter.fromRaw(shipped);
    expect(router.configError).toBeUndefined();
    expect(router.select(classification({ intent: "greet" })).rule).toBe(
      "minimal",
    );
  });

  it("keeps serving the full set when the config does not compile", () => {
    const router = ContextRouter.fromRaw({ blocks: { gpu_specs: 10 } });
    expect(router.configError?.code).toBe("CONFIG_INVALID");

    const decision = router.select(classification({ intent: "greet" }));
    expect(decision.rule).toBe("fallback");
    expect(decision.fallbackReason).toBe("invalid-config");
    expect(decision.savings).toBe(0);
  });
});
