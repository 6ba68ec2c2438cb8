import { log } from "../logger.js";
import { describeError } from "../errors.js";
import type { DurableStore } from "./durable-store.js";
import type { EphemeralStore } from "./ephemeral-store.js";
import { buildHistorySummary } from "./context-builder.js";
import type { Conversation, Message } from "./types.js";

// ── Session State Machine ────────────────────────────────
//
//   COLD → RECONSTRUCTING → SESSION_READY → APPENDED
//   WARM → SESSION_READY → APPENDED

export type SessionPath = "warm" | "cold";

export interface SessionHandle {
  conversation: Conversation;
  path: SessionPath;
  /** True when a store failure forced an empty session. */
  degraded: boolean;
}

export interface SessionOptions {
  ttlSeconds: number;
  /** How many durable records seed a rebuilt session (default: all). */
  historyLimit?: number;
  now?: () => number;
}

export class SessionStateMachine {
  private readonly durable: DurableStore;
  private readonly ephemeral: EphemeralStore;
  private readonly ttlSeconds: number;
  private readonly historyLimit?: number;
  private readonly now: () => number;

  constructor(
    durable: DurableStore,
    ephemeral: EphemeralStore,
    options: SessionOptions,
  ) {
    this.durable = durable;
    this.ephemeral = ephemeral;
    this.ttlSeconds = options.ttlSeconds;
    this.historyLimit = options.historyLimit;
    this.now = options.now ?? Date.now;
  }

  async obtainSession(userId: string): Promise<SessionHandle> {
    const cached = await this.readCached(userId);
    if (cached) {
      log.debug(
        { userId, messages: cached.messages.length },
        "♻️ SM hit",
      );
      return { conversation: cached, path: "warm", degraded: false };
    }

    // RECONSTRUCTING
    let degraded = false;
    let conversation: Conversation;
    try {
      const records = await this.durable.readRecords(userId);
      const summary = buildHistorySummary(records, this.historyLimit, this.now());
      conversation = this.synthesize(userId, summary);
      log.info(
        { userId, records: records.length },
        records.length > 0 ? "🔁 SM rebuilt from LM" : "🆕 New session",
      );
    } catch (err) {
      degraded = true;
      conversation = this.synthesize(userId, "");
      log.warn(
        { userId, error: describeError(err) },
        "⚠️ LM read failed, starting empty session",
      );
    }

    await this.writeCached(conversation);
    return { conversation, path: "cold", degraded };
  }

  /** Live session without triggering a rebuild. */
  async peek(userId: string): Promise<Conversation | undefined> {
    return this.readCached(userId);
  }

  /**
   * Returns a new Conversation with `message` appended and writes it back
   * with a fresh TTL. Timestamps are kept strictly increasing.
   */
  async appendAndPersist(
    conversation: Conversation,
    message: Message,
  ): Promise<Conversation> {
    const last = conversation.messages[conversation.messages.length - 1];
    const timestamp =
      last && message.timestamp <= last.timestamp
        ? last.timestamp + 1
        : message.timestamp;

    const next: Conversation = {
      ...conversation,
      messages: [...conversation.messages, { ...message, timestamp }],
      lastUpdatedAt: Math.max(timestamp, conversation.lastUpdatedAt),
    };

    await this.writeCached(next);
    return next;
  }

  // ── Store access (failures never escape) ───────────────

  private async readCached(userId: string): Promise<Conversation | undefined> {
    try {
      return await this.ephemeral.get(userId);
    } catch (err) {
      log.warn(
        { userId, error: describeError(err) },
        "⚠️ SM read failed, treating as miss",
      );
      return undefined;
    }
  }

  private async writeCached(conversation: Conversation): Promise<void> {
    try {
      await this.ephemeral.set(
        conversation.userId,
        conversation,
        this.ttlSeconds,
      );
    } catch (err) {
      log.warn(
        { userId: conversation.userId, error: describeError(err) },
        "⚠️ SM write failed, next turn will cold-start",
      );
    }
  }

  private synthesize(userId: string, summary: string): Conversation {
    const now = this.now();
    const messages: Message[] = summary
      ? [{ role: "system", text: summary, timestamp: now }]
      : [];
    return { userId, messages, createdAt: now, lastUpdatedAt: now };
  }
}
