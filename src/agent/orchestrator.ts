import { log } from "../logger.js";
import {
  ClassifierError,
  MemoryCoreError,
  ResponderError,
  describeError,
} from "../errors.js";
import type { DurableStore } from "../memory/durable-store.js";
import type { ImportanceGate } from "../memory/importance-gate.js";
import type { SessionStateMachine } from "../memory/session.js";
import { buildUserHistoryBlock } from "../memory/context-builder.js";
import type {
  ClassificationResult,
  Conversation,
  LongTermRecord,
} from "../memory/types.js";
import type { ContextRouter } from "../routing/router.js";
import { renderBlocks, type BlockLibrary } from "../routing/blocks.js";
import type { UsageTracker } from "../usage/tracker.js";
import type {
  Classifier,
  MemorySnapshot,
  Responder,
  TokenUsage,
  TurnError,
  TurnResult,
} from "./types.js";

export interface OrchestratorDeps {
  session: SessionStateMachine;
  gate: ImportanceGate;
  router: ContextRouter;
  durable: DurableStore;
  classifier: Classifier;
  responder: Responder;
  blocks: BlockLibrary;
  usage?: UsageTracker;
}

export interface OrchestratorOptions {
  /** Reply committed when the responder fails */
  fallbackMessage: string;
  /** Records rendered into the user_history block (default: all) */
  historyLimit?: number;
  now?: () => number;
}

/**
 * One conversational turn:
 *   session → append user msg → classify → importance gate → route
 *   → respond → append assistant msg
 *
 * Never throws for collaborator failures; every turn ends with an
 * assistant message in the session. Callers must serialize turns per user.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly options: OrchestratorOptions;
  private readonly now: () => number;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.deps = deps;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async handleTurn(userId: string, text: string): Promise<TurnResult> {
    const startTime = this.now();
    const { session, gate, router, classifier, responder } = this.deps;
    const errors: TurnError[] = [];

    // ── Session (WARM or COLD → RECONSTRUCTING) ─────────
    const handle = await session.obtainSession(userId);
    let conversation = await session.appendAndPersist(handle.conversation, {
      role: "user",
      text,
      timestamp: this.now(),
    });

    // ── Classify ────────────────────────────────────────
    let classification: ClassificationResult | null = null;
    try {
      classification = await classifier.classify(conversation);
    } catch (err) {
      const error =
        err instanceof ClassifierError
          ? err
          : new ClassifierError(describeError(err), err);
      errors.push(toTurnError(error));
      log.warn(
        { userId, error: error.message },
        "⚠️ Classification failed, routing with full context",
      );
    }

    // ── Importance gate (side effect only) ──────────────
    const persisted = classification
      ? await gate.record(userId, classification)
      : false;

    // ── Route ───────────────────────────────────────────
    const routing = router.select(classification);
    this.deps.usage?.logRouting(routing);

    const history = routing.blocks.includes("user_history")
      ? buildUserHistoryBlock(
          await this.readHistory(userId),
          this.options.historyLimit,
          this.now(),
        )
      : "";
    const blocks = renderBlocks(routing, this.deps.blocks, history);

    // ── Respond ─────────────────────────────────────────
    let reply: string;
    let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    try {
      const output = await responder.generate(conversation, blocks);
      reply = output.text;
      usage = output.usage ?? usage;
    } catch (err) {
      const error =
        err instanceof ResponderError
          ? err
          : new ResponderError(describeError(err), err);
      errors.push(toTurnError(error));
      reply = this.options.fallbackMessage;
      log.error(
        { userId, error: error.message },
        "❌ Response generation failed, sending fallback",
      );
    }

    conversation = await session.appendAndPersist(conversation, {
      role: "assistant",
      text: reply,
      timestamp: this.now(),
    });

    const latencyMs = this.now() - startTime;
    log.info(
      {
        userId,
        path: handle.path,
        rule: routing.rule,
        persisted,
        errors: errors.length,
        latencyMs,
      },
      "✅ Turn complete",
    );

    return {
      reply,
      conversation,
      classification,
      routing,
      persisted,
      path: handle.path,
      degraded: handle.degraded,
      errors,
      usage,
      latencyMs,
    };
  }

  /** Current short- and long-term memory sizes for a user (/memory). */
  async describeMemory(userId: string): Promise<MemorySnapshot> {
    const current: Conversation | undefined =
      await this.deps.session.peek(userId);
    const records = await this.readHistory(userId);
    return {
      sessionMessages: current?.messages.length ?? 0,
      longTermRecords: records.length,
      lastUpdatedAt: current?.lastUpdatedAt,
    };
  }

  private async readHistory(userId: string): Promise<LongTermRecord[]> {
    try {
      return await this.deps.durable.readRecords(userId);
    } catch (err) {
      log.warn(
        { userId, error: describeError(err) },
        "⚠️ LM read failed, user history left empty",
      );
      return [];
    }
  }
}

function toTurnError(error: MemoryCoreError): TurnError {
  return { code: error.code, message: error.message };
}
