import { config } from "./config.js";
import { log } from "./logger.js";
import { createBot } from "./bot.js";
import { llm } from "./llm/client.js";
import { LlmClassifier } from "./llm/classifier.js";
import { LlmResponder } from "./llm/responder.js";
import { JsonFileDurableStore } from "./memory/durable-store.js";
import {
  InMemoryEphemeralStore,
  RedisEphemeralStore,
  type EphemeralStore,
} from "./memory/ephemeral-store.js";
import { SessionStateMachine } from "./memory/session.js";
import { ImportanceGate } from "./memory/importance-gate.js";
import { loadRoutingConfig } from "./routing/config.js";
import { ContextRouter } from "./routing/router.js";
import { loadBlockLibrary } from "./routing/blocks.js";
import { Orchestrator } from "./agent/orchestrator.js";
import { KeyedMutex } from "./agent/keyed-mutex.js";
import { UsageTracker } from "./usage/tracker.js";

// ── Main ─────────────────────────────────────────────────

async function main() {
  // Invalid routing config is fatal at startup (ConfigInvalidError)
  const routingConfig = loadRoutingConfig(config.routingConfigPath);
  const router = new ContextRouter(routingConfig);
  const knownIntents = [
    ...routingConfig.rules.flatMap((r) => r.intents),
    ...routingConfig.fallbackIntents,
  ];

  log.info(
    {
      classifier: config.classificationModel,
      responder: config.responseModel,
      ttl: config.sessionTtlSeconds,
      threshold: config.importanceThreshold,
      users: config.allowedUserIds,
    },
    "🧭 Recall Router starting",
  );

  const usage = new UsageTracker();
  const durable = new JsonFileDurableStore(config.longTermDir);
  const ephemeral: EphemeralStore = config.redisUrl
    ? new RedisEphemeralStore({
        url: config.redisUrl,
        keyPrefix: config.redisKeyPrefix || undefined,
      })
    : new InMemoryEphemeralStore();
  const storeLabel = config.redisUrl ? "redis" : "in-process";
  if (!config.redisUrl) {
    log.warn("⚠️ REDIS_URL not set, sessions live in process memory");
  }

  const orchestrator = new Orchestrator(
    {
      session: new SessionStateMachine(durable, ephemeral, {
        ttlSeconds: config.sessionTtlSeconds,
        historyLimit: config.historyRecordLimit,
      }),
      gate: new ImportanceGate(durable, config.importanceThreshold),
      router,
      durable,
      classifier: new LlmClassifier(llm, {
        model: config.classificationModel,
        temperature: config.classificationTemperature,
        contextMessages: config.classifierContextMessages,
        knownIntents,
        timeoutMs: config.llmTimeoutMs,
        usage,
      }),
      responder: new LlmResponder(llm, {
        model: config.responseModel,
        temperature: config.responseTemperature,
        maxTokens: config.responseMaxTokens,
        historyMessages: config.responseHistoryMessages,
        timeoutMs: config.llmTimeoutMs,
        usage,
      }),
      blocks: loadBlockLibrary(config.promptsDir),
      usage,
    },
    {
      fallbackMessage: config.fallbackMessage,
      historyLimit: config.historyRecordLimit,
    },
  );

  const bot = createBot({
    token: config.telegramBotToken,
    allowedUserIds: config.allowedUserIds,
    orchestrator,
    turns: new KeyedMutex(),
    usage,
    router,
    info: {
      classificationModel: config.classificationModel,
      responseModel: config.responseModel,
      store: storeLabel,
    },
    fallbackMessage: config.fallbackMessage,
  });

  // Graceful shutdown
  const shutdown = async () => {
    log.info("👋 Shutting down...");
    await bot.stop();
    await ephemeral.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  log.info("🚀 Starting Telegram long-polling...");
  await bot.start({
    onStart: () => {
      log.info("✅ Online. Waiting for messages...");
    },
  });
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
