import { describe, it, expect } from "vitest";
import {
  buildHistorySummary,
  buildUserHistoryBlock,
  formatAgo,
} from "../src/memory/context-builder.js";
import { record } from "./helpers/fakes.js";

const NOW = 1_700_000_000_000;
const MIN = 60_000;
const HOUR = 60 * MIN;
const DAY = 24 * HOUR;

describe("formatAgo", () => {
  it("buckets elapsed time", () => {
    expect(formatAgo(NOW - 30_000, NOW)).toBe("just now");
    expect(formatAgo(NOW - 5 * MIN, NOW)).toBe("5m ago");
    expect(formatAgo(NOW - 3 * HOUR, NOW)).toBe("3h ago");
    expect(formatAgo(NOW - 2 * DAY, NOW)).toBe("2d ago");
    expect(formatAgo(NOW - 65 * DAY, NOW)).toBe("2mo ago");
  });
});

describe("buildHistorySummary", () => {
  // ── Empty ──────────────────────────────────────────────

  it("returns empty string when there are no records", () => {
    expect(buildHistorySummary([], undefined, NOW)).toBe("");
  });

  // ── Ordering and limits ────────────────────────────────

  it("lists records newest first", () => {
    const summary = buildHistorySummary(
      [
        record({ intentSummary: "old", createdAt: NOW - DAY }),
        record({
          eventType: "FEEDBACK",
          importance: 0.75,
          intentSummary: "new",
          createdAt: NOW - HOUR,
        }),
      ],
      undefined,
      NOW,
    );
    expect(summary).toBe(
      "🧠 EARLIER IMPORTANT EVENTS (most recent first):\n" +
        "• [1h ago] FEEDBACK (0.75): new\n" +
        "• [1d ago] TRANSACTION (0.90): old",
    );
  });

  it("keeps only the most recent records when limited", () => {
    const records = [1, 2, 3].map((n) =>
      record({ intentSummary: `event ${n}`, createdAt: NOW - n * HOUR }),
    );
    const lines = buildHistorySummary(records, 2, NOW).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[1]).toContain("event 1");
    expect(lines[2]).toContain("event 2");
  });

  it("returns empty string for a zero limit", () => {
    expect(buildHistorySummary([record()], 0, NOW)).toBe("");
  });

  it("truncates long summaries to 200 characters", () => {
    const summary = buildHistorySummary(
      [record({ intentSummary: "x".repeat(250), createdAt: NOW })],
      undefined,
      NOW,
    );
    expect(summary.split("\n")[1]).toBe(
      `• [just now] TRANSACTION (0.90): ${"x".repeat(200)}`,
    );
  });
});

describe("buildUserHistoryBlock", () => {
  it("describes a first-time customer", () => {
    expect(buildUserHistoryBlock([], undefined, NOW)).toBe(
      "📋 CUSTOMER HISTORY:\nNo earlier important events on record. Treat this as a new customer.",
    );
  });

  it("prefixes the summary with an event breakdown", () => {
    const block = buildUserHistoryBlock(
      [
        record({ createdAt: NOW - 3 * DAY }),
        record({ eventType: "COMPLAINT", intentSummary: "late", createdAt: NOW - DAY }),
        record({ createdAt: NOW - 2 * DAY }),
      ],
      1,
      NOW,
    );
    expect(block).toBe(
      "📋 CUSTOMER HISTORY (3 events: TRANSACTION ×2, COMPLAINT ×1):\n" +
        "🧠 EARLIER IMPORTANT EVENTS (most recent first):\n" +
        "• [1d ago] COMPLAINT (0.90): late",
    );
  });
});
