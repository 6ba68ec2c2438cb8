import type { LongTermRecord } from "./types.js";

// ── Context Builder: render long-term memory as text ────

/**
 * Summary used to seed a rebuilt session. Lists the most recent `limit`
 * records newest first; `limit` undefined means all of them.
 * Returns "" when there is nothing to summarise.
 */
export function buildHistorySummary(
  records: readonly LongTermRecord[],
  limit?: number,
  now: number = Date.now(),
): string {
  const recent = pickRecent(records, limit);
  if (recent.length === 0) return "";

  const lines = recent.map(
    (r) =>
      `• [${formatAgo(r.createdAt, now)}] ${r.eventType} (${r.importance.toFixed(2)}): ${r.intentSummary.slice(0, 200)}`,
  );
  return `🧠 EARLIER IMPORTANT EVENTS (most recent first):\n${lines.join("\n")}`;
}

/**
 * Body of the `user_history` context block handed to the responder.
 * Unlike the session seed it also covers first-time users.
 */
export function buildUserHistoryBlock(
  records: readonly LongTermRecord[],
  limit?: number,
  now: number = Date.now(),
): string {
  const summary = buildHistorySummary(records, limit, now);
  if (!summary) {
    return "📋 CUSTOMER HISTORY:\nNo earlier important events on record. Treat this as a new customer.";
  }

  const counts = new Map<string, number>();
  for (const r of records) {
    counts.set(r.eventType, (counts.get(r.eventType) ?? 0) + 1);
  }
  const breakdown = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([type, n]) => `${type} ×${n}`)
    .join(", ");

  return `📋 CUSTOMER HISTORY (${records.length} events: ${breakdown}):\n${summary}`;
}

function pickRecent(
  records: readonly LongTermRecord[],
  limit?: number,
): LongTermRecord[] {
  const sorted = [...records].sort((a, b) => b.createdAt - a.createdAt);
  return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
}

/** Format a Unix ms timestamp as a human-readable "X ago" string. */
export function formatAgo(ts: number, now: number = Date.now()): string {
  const diffSec = Math.floor((now - ts) / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
