import { Redis } from "ioredis";
import { log } from "../logger.js";
import { StoreUnavailableError, describeError } from "../errors.js";
import {
  conversationWireSchema,
  fromWire,
  toWire,
  type Conversation,
} from "./types.js";

// ── Ephemeral Store: Short-term Memory (SM) ─────────────

export interface EphemeralStore {
  /** Live session for the user, or undefined once the TTL has lapsed. */
  get(userId: string): Promise<Conversation | undefined>;
  /** Write the full session and (re)start its TTL. */
  set(userId: string, conversation: Conversation, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

const KEY = (userId: string) => `sm:${userId}`;

// ── Redis-backed store ───────────────────────────────────

export interface RedisEphemeralStoreOptions {
  url: string;
  /** Prefix prepended to every key (default: none) */
  keyPrefix?: string;
}

export class RedisEphemeralStore implements EphemeralStore {
  private readonly redis: Redis;

  constructor(options: RedisEphemeralStoreOptions) {
    this.redis = new Redis(options.url, {
      keyPrefix: options.keyPrefix,
      maxRetriesPerRequest: 2,
      connectTimeout: 5000,
      lazyConnect: true,
      ...(options.url.startsWith("rediss://") ? { tls: {} } : {}),
    });
    this.redis.on("error", (err: Error) => {
      log.warn({ error: err.message }, "⚠️ Redis connection error");
    });
  }

  async get(userId: string): Promise<Conversation | undefined> {
    let raw: string | null;
    try {
      raw = await this.redis.get(KEY(userId));
    } catch (err) {
      throw new StoreUnavailableError(
        "ephemeral",
        `GET failed: ${describeError(err)}`,
        err,
      );
    }
    if (raw === null) return undefined;

    const parsed = safeParseConversation(raw);
    if (!parsed) {
      log.warn({ userId }, "⚠️ Discarding unreadable SM entry");
      return undefined;
    }
    return parsed;
  }

  async set(
    userId: string,
    conversation: Conversation,
    ttlSeconds: number,
  ): Promise<void> {
    try {
      await this.redis.set(
        KEY(userId),
        JSON.stringify(toWire(conversation)),
        "EX",
        ttlSeconds,
      );
    } catch (err) {
      throw new StoreUnavailableError(
        "ephemeral",
        `SET failed: ${describeError(err)}`,
        err,
      );
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function safeParseConversation(raw: string): Conversation | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = conversationWireSchema.safeParse(json);
  return result.success ? fromWire(result.data) : undefined;
}

// ── In-process store ─────────────────────────────────────
// Used when REDIS_URL is unset (single-process deployments) and in tests.

interface Entry {
  conversation: Conversation;
  expiresAt: number;
}

export class InMemoryEphemeralStore implements EphemeralStore {
  private readonly entries = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  async get(userId: string): Promise<Conversation | undefined> {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.conversation;
  }

  async set(
    userId: string,
    conversation: Conversation,
    ttlSeconds: number,
  ): Promise<void> {
    this.entries.set(userId, {
      conversation,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /** Number of live (non-expired) sessions. */
  size(): number {
    const now = this.now();
    let live = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt > now) live++;
    }
    return live;
  }
}
