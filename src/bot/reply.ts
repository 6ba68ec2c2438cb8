import type { Context } from "grammy";
import { log } from "../logger.js";

// ── Reply delivery ───────────────────────────────────────

/** Telegram rejects messages longer than this. */
export const TELEGRAM_MAX_LENGTH = 4096;

/**
 * Send a model reply, split into Telegram-sized chunks. Each chunk is tried
 * as Markdown first and resent as plain text if Telegram refuses to parse it.
 */
export async function sendReply(ctx: Context, text: string): Promise<void> {
  for (const chunk of splitMessage(text, TELEGRAM_MAX_LENGTH)) {
    try {
      await ctx.reply(chunk, { parse_mode: "Markdown" });
    } catch (err) {
      log.debug({ error: String(err) }, "Markdown rejected, resending as plain text");
      await ctx.reply(chunk);
    }
  }
}

/**
 * Split on the last newline before `maxLength`, else the last space, else
 * hard at `maxLength`. Leading whitespace of each following chunk is dropped.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    let splitAt = remaining.lastIndexOf("\n", maxLength);
    if (splitAt < maxLength / 2) {
      splitAt = remaining.lastIndexOf(" ", maxLength);
    }
    if (splitAt < maxLength / 2) {
      splitAt = maxLength;
    }

    chunks.push(remaining.substring(0, splitAt));
    remaining = remaining.substring(splitAt).trimStart();
  }
  if (remaining.length > 0) chunks.push(remaining);

  return chunks;
}
