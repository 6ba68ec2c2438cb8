import { log } from "../logger.js";
import { describeError } from "../errors.js";
import type { DurableStore } from "./durable-store.js";
import type { ClassificationResult, LongTermRecord } from "./types.js";

// ── Importance Gate ──────────────────────────────────────

export const DEFAULT_IMPORTANCE_THRESHOLD = 0.7;

/** Inclusive: an importance exactly at the threshold is persisted. */
export function shouldPersist(
  classification: Pick<ClassificationResult, "importance">,
  threshold: number = DEFAULT_IMPORTANCE_THRESHOLD,
): boolean {
  return classification.importance >= threshold;
}

export function toLongTermRecord(
  userId: string,
  classification: ClassificationResult,
  createdAt: number,
): LongTermRecord {
  const reasoning = classification.reasoning.trim();
  return {
    userId,
    eventType: classification.eventType,
    intentSummary: reasoning
      ? `${classification.intent}: ${reasoning}`
      : classification.intent,
    importance: classification.importance,
    createdAt,
  };
}

export class ImportanceGate {
  private readonly store: DurableStore;
  private readonly threshold: number;
  private readonly now: () => number;

  constructor(
    store: DurableStore,
    threshold: number = DEFAULT_IMPORTANCE_THRESHOLD,
    now: () => number = Date.now,
  ) {
    this.store = store;
    this.threshold = threshold;
    this.now = now;
  }

  /**
   * Single best-effort write. Resolves true only when a record was
   * appended; write failures are logged and resolve false.
   */
  async record(
    userId: string,
    classification: ClassificationResult,
  ): Promise<boolean> {
    if (!shouldPersist(classification, this.threshold)) {
      log.debug(
        { userId, importance: classification.importance },
        "⏭️ Event below threshold, skipping LM",
      );
      return false;
    }

    try {
      await this.store.appendRecord(
        userId,
        toLongTermRecord(userId, classification, this.now()),
      );
      log.info(
        {
          userId,
          eventType: classification.eventType,
          importance: classification.importance,
        },
        "📌 Important event saved to LM",
      );
      return true;
    } catch (err) {
      log.warn(
        { userId, error: describeError(err) },
        "⚠️ LM write failed, event dropped",
      );
      return false;
    }
  }
}
