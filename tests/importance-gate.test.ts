import { describe, it, expect } from "vitest";
import {
  ImportanceGate,
  shouldPersist,
  toLongTermRecord,
} from "../src/memory/importance-gate.js";
import { FakeDurableStore, classification } from "./helpers/fakes.js";

describe("shouldPersist", () => {
  it("is true above the default threshold", () => {
    expect(shouldPersist(classification({ importance: 0.9 }))).toBe(true);
  });

  it("is false below the default threshold", () => {
    expect(shouldPersist(classification({ importance: 0.69 }))).toBe(false);
  });

  it("treats importance equal to the threshold as important", () => {
    expect(shouldPersist(classification({ importance: 0.7 }), 0.7)).toBe(true);
    expect(shouldPersist({ importance: 0.4 }, 0.4)).toBe(true);
  });

  it("honours a custom threshold", () => {
    expect(shouldPersist({ importance: 0.5 }, 0.3)).toBe(true);
    expect(shouldPersist({ importance: 0.5 }, 0.6)).toBe(false);
  });
});

describe("toLongTermRecord", () => {
  it("joins intent and reasoning into the summary", () => {
    const rec = toLongTermRecord(
      "u1",
      classification({
        eventType: "TRANSACTION",
        importance: 0.9,
        intent: "purchase_intent",
        reasoning: "wants a gaming laptop",
      }),
      42,
    );
    expect(rec).toEqual({
      userId: "u1",
      eventType: "TRANSACTION",
      intentSummary: "purchase_intent: wants a gaming laptop",
      importance: 0.9,
      createdAt: 42,
    });
  });

  it("uses the bare intent when there is no reasoning", () => {
    const rec = toLongTermRecord("u1", classification({ reasoning: "  " }), 1);
    expect(rec.intentSummary).toBe("greet");
  });
});

describe("ImportanceGate", () => {
  it("writes a record for an important event", async () => {
    const store = new FakeDurableStore();
    const gate = new ImportanceGate(store, 0.7, () => 500);

    const written = await gate.record(
      "u1",
      classification({
        eventType: "TRANSACTION",
        importance: 0.9,
        intent: "purchase_intent",
      }),
    );

    expect(written).toBe(true);
    expect(store.records.get("u1")).toEqual([
      {
        userId: "u1",
        eventType: "TRANSACTION",
        intentSummary: "purchase_intent",
        importance: 0.9,
        createdAt: 500,
      },
    ]);
  });

  it("skips events below the threshold", async () => {
    const store = new FakeDurableStore();
    const gate = new ImportanceGate(store);

    expect(await gate.record("u1", classification({ importance: 0.2 }))).toBe(
      false,
    );
    expect(store.records.size).toBe(0);
  });

  it("reports a failed write as false instead of throwing", async () => {
    const store = new FakeDurableStore();
    store.failWrites = true;
    const gate = new ImportanceGate(store);

    await expect(
      gate.record("u1", classification({ importance: 0.95 })),
    ).resolves.toBe(false);
  });
});
