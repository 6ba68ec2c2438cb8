import { Bot, type Context } from "grammy";
import { log } from "./logger.js";
import { sendReply } from "./bot/reply.js";
import type { Orchestrator } from "./agent/orchestrator.js";
import type { KeyedMutex } from "./agent/keyed-mutex.js";
import type { UsageTracker } from "./usage/tracker.js";
import type { ContextRouter } from "./routing/router.js";

// ── Bot Factory ──────────────────────────────────────────

export interface BotDeps {
  token: string;
  allowedUserIds: readonly number[];
  orchestrator: Orchestrator;
  turns: KeyedMutex;
  usage: UsageTracker;
  router: ContextRouter;
  /** Shown by /status */
  info: { classificationModel: string; responseModel: string; store: string };
  fallbackMessage: string;
}

export function createBot(deps: BotDeps): Bot {
  const bot = new Bot(deps.token);

  // ── Security: user ID whitelist ──────────────────────
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id;
    if (!userId || !deps.allowedUserIds.includes(userId)) {
      return; // silent ignore
    }
    await next();
  });

  // ── /start ──────────────────────────────────────────
  bot.command("start", async (ctx) => {
    await ctx.reply(
      "👋 *Hi!* I remember what matters from our chats and keep answers focused.\n\n" +
        "Type /help for available commands.",
      { parse_mode: "Markdown" },
    );
  });

  // ── /help ───────────────────────────────────────────
  bot.command("help", async (ctx) => {
    await ctx.reply(
      "🧭 *Commands*\n" +
        "────────────────────\n" +
        "/start — Welcome message\n" +
        "/status — Models, store and routing state\n" +
        "/memory — What I currently remember about you\n" +
        "/usage — Token usage and context savings\n" +
        "/help — This message",
      { parse_mode: "Markdown" },
    );
  });

  // ── /status ─────────────────────────────────────────
  bot.command("status", async (ctx) => {
    const routing = deps.router.configError
      ? `⚠️ fallback only (${deps.router.configError.message})`
      : "✅ rules loaded";
    await ctx.reply(
      "🧭 *Bot Status*\n" +
        "────────────────────\n" +
        `🏷️ Classifier: \`${deps.info.classificationModel}\`\n` +
        `💬 Responder: \`${deps.info.responseModel}\`\n` +
        `🗄️ Session store: ${deps.info.store}\n` +
        `🧭 Routing: ${routing}\n` +
        `👤 Allowed users: ${deps.allowedUserIds.length}`,
      { parse_mode: "Markdown" },
    );
  });

  // ── /memory ─────────────────────────────────────────
  bot.command("memory", async (ctx) => {
    const snapshot = await deps.orchestrator.describeMemory(userKey(ctx));
    await ctx.reply(
      "🧠 *Memory*\n" +
        "────────────────────\n" +
        `💬 Session messages: ${snapshot.sessionMessages}\n` +
        `📌 Remembered events: ${snapshot.longTermRecords}`,
      { parse_mode: "Markdown" },
    );
  });

  // ── /usage ──────────────────────────────────────────
  bot.command("usage", async (ctx) => {
    await ctx.reply(deps.usage.getSummary(), { parse_mode: "Markdown" });
  });

  // ── Text messages → orchestrator ──────────────────────
  bot.on("message:text", async (ctx) => {
    const userId = userKey(ctx);
    const text = ctx.message.text;

    await ctx.replyWithChatAction("typing").catch((err: unknown) => {
      log.debug({ err }, "typing action failed");
    });

    try {
      const result = await deps.turns.run(userId, () =>
        deps.orchestrator.handleTurn(userId, text),
      );
      await sendReply(ctx, result.reply);
    } catch (error) {
      // Orchestrator only throws on programming errors
      log.error(error, "❌ Turn failed");
      await ctx.reply(deps.fallbackMessage);
    }
  });

  bot.catch((err) => {
    log.error({ error: err.message }, "❌ Unhandled bot error");
  });

  return bot;
}

function userKey(ctx: Context): string {
  return String(ctx.from?.id ?? "unknown");
}
