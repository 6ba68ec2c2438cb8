import pino from "pino";

// ── Structured Logger: pino ─────────────────────────────
// JSON in production, pretty in dev (or LOG_PRETTY=true), silent under
// Vitest unless LOG_LEVEL is set explicitly.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.VITEST === "true";
const isPretty =
  process.env.LOG_PRETTY === "true" || (!isProduction && !isTest);

export const log = pino({
  name: "recall-router",
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  redact: {
    paths: ["apiKey", "*.apiKey", "token", "*.token", "redisUrl"],
    censor: "[redacted]",
  },
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname,name",
          },
        },
      }
    : {}),
});
