import dotenv from "dotenv";
import { ConfigInvalidError } from "./errors.js";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    console.error(`❌ Missing required environment variable: ${key}`);
    console.error(`   Copy .env.example to .env and fill in your values.`);
    process.exit(1);
  }
  return value;
}

function numberEnv(
  key: string,
  fallback: number,
  { min, max, integer = false }: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (
    !Number.isFinite(value) ||
    (integer && !Number.isInteger(value)) ||
    (min !== undefined && value < min) ||
    (max !== undefined && value > max)
  ) {
    throw new ConfigInvalidError(
      `expected ${integer ? "an integer" : "a number"}` +
        `${min !== undefined ? ` >= ${min}` : ""}${max !== undefined ? ` <= ${max}` : ""}, got "${raw}"`,
      key,
    );
  }
  return value;
}

function optionalIntEnv(key: string, min: number): number | undefined {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return numberEnv(key, 0, { min, integer: true });
}

// ── Config ───────────────────────────────────────────────

function loadConfig() {
  return {
    telegramBotToken: requireEnv("TELEGRAM_BOT_TOKEN"),
    allowedUserIds: requireEnv("ALLOWED_USER_IDS")
      .split(",")
      .map((id) => parseInt(id.trim(), 10))
      .filter((id) => !isNaN(id)),

    // ── LLM (OpenRouter) ──────────────────────────────────
    openRouterApiKey: requireEnv("OPENROUTER_API_KEY"),
    openRouterBaseUrl:
      process.env.OPENROUTER_BASE_URL || "https://openrouter.ai/api/v1",
    classificationModel:
      process.env.CLASSIFICATION_MODEL || "google/gemini-2.5-flash-lite",
    classificationTemperature: numberEnv("CLASSIFICATION_TEMPERATURE", 0.1, {
      min: 0,
      max: 2,
    }),
    classifierContextMessages: numberEnv("CLASSIFIER_CONTEXT_MESSAGES", 5, {
      min: 0,
      integer: true,
    }),
    responseModel: process.env.RESPONSE_MODEL || "google/gemini-2.5-flash-lite",
    responseTemperature: numberEnv("RESPONSE_TEMPERATURE", 0.7, {
      min: 0,
      max: 2,
    }),
    responseMaxTokens: numberEnv("RESPONSE_MAX_TOKENS", 2000, {
      min: 1,
      integer: true,
    }),
    responseHistoryMessages: numberEnv("RESPONSE_HISTORY_MESSAGES", 20, {
      min: 1,
      integer: true,
    }),
    llmTimeoutMs: numberEnv("LLM_TIMEOUT_MS", 30_000, { min: 1, integer: true }),

    // ── Memory ────────────────────────────────────────────
    redisUrl: process.env.REDIS_URL || "",
    redisKeyPrefix: process.env.REDIS_KEY_PREFIX || "",
    sessionTtlSeconds: numberEnv("SESSION_TTL_SECONDS", 240, {
      min: 1,
      integer: true,
    }),
    importanceThreshold: numberEnv("IMPORTANCE_THRESHOLD", 0.7, {
      min: 0,
      max: 1,
    }),
    historyRecordLimit: optionalIntEnv("HISTORY_RECORD_LIMIT", 1),
    longTermDir: process.env.LONG_TERM_DIR || "data/longterm",

    // ── Routing ───────────────────────────────────────────
    routingConfigPath: process.env.ROUTING_CONFIG_PATH || "config/routing.json",
    promptsDir: process.env.PROMPTS_DIR || "prompts",

    fallbackMessage:
      process.env.FALLBACK_MESSAGE ||
      "Sorry, something went wrong on my side. Please try again in a moment.",
  } as const;
}

// Invalid values are reported like missing ones, before anything else runs
function loadConfigOrExit(): ReturnType<typeof loadConfig> {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigInvalidError)) throw err;
    console.error(`❌ ${err.message}`);
    console.error(`   Fix the value in .env (see .env.example).`);
    process.exit(1);
  }
}

export const config = loadConfigOrExit();

// ── Validation ───────────────────────────────────────────

if (config.allowedUserIds.length === 0) {
  console.error(
    "❌ ALLOWED_USER_IDS must contain at least one valid Telegram user ID.",
  );
  process.exit(1);
}
