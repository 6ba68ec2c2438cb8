import type OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import { ResponderError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type {
  RenderedContextBlock,
  Responder,
  ResponderOutput,
} from "../agent/types.js";
import type { Conversation } from "../memory/types.js";
import type { UsageTracker } from "../usage/tracker.js";
import { withRetry, type RetryOptions } from "./retry.js";

// ── Responder: reply generation with routed context ─────

export interface LlmResponderOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  /** Most recent session messages replayed to the model */
  historyMessages: number;
  timeoutMs: number;
  usage?: UsageTracker;
  retry?: RetryOptions;
}

/** Join routed blocks into one system prompt, in routing order. */
export function buildSystemPrompt(
  blocks: readonly RenderedContextBlock[],
): string {
  return blocks
    .filter((b) => b.text.trim())
    .map((b) => `<${b.name}>\n${b.text.trim()}\n</${b.name}>`)
    .join("\n\n");
}

/**
 * Session messages as chat turns. Seeded `system` summaries are not
 * replayed: long-term history reaches the model only through the routed
 * `user_history` block.
 */
export function toChatMessages(
  conversation: Conversation,
  systemPrompt: string,
  historyMessages: number,
): ChatCompletionMessageParam[] {
  const turns: ChatCompletionMessageParam[] = conversation.messages
    .filter((m) => m.role !== "system")
    .slice(-historyMessages)
    .map((m): ChatCompletionMessageParam =>
      m.role === "user"
        ? { role: "user", content: m.text }
        : { role: "assistant", content: m.text },
    );

  return systemPrompt
    ? [{ role: "system", content: systemPrompt }, ...turns]
    : turns;
}

export class LlmResponder implements Responder {
  private readonly client: OpenAI;
  private readonly options: LlmResponderOptions;

  constructor(client: OpenAI, options: LlmResponderOptions) {
    this.client = client;
    this.options = options;
  }

  async generate(
    conversation: Conversation,
    blocks: readonly RenderedContextBlock[],
  ): Promise<ResponderOutput> {
    const messages = toChatMessages(
      conversation,
      buildSystemPrompt(blocks),
      this.options.historyMessages,
    );

    const started = Date.now();
    try {
      const response = await withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: this.options.model,
              temperature: this.options.temperature,
              max_tokens: this.options.maxTokens,
              messages,
            },
            { timeout: this.options.timeoutMs },
          ),
        { label: `responder (${this.options.model})`, ...this.options.retry },
      );

      const usage = {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      };
      this.options.usage?.logCall(
        "responder",
        this.options.model,
        usage.inputTokens,
        usage.outputTokens,
        Date.now() - started,
      );

      const text = response.choices[0]?.message?.content?.trim() ?? "";
      if (!text) {
        throw new ResponderError("Responder returned an empty message");
      }
      log.debug({ chars: text.length, ...usage }, "💬 Response generated");
      return { text, usage };
    } catch (err) {
      if (err instanceof ResponderError) throw err;
      throw new ResponderError(
        `Responder call failed: ${describeError(err)}`,
        err,
      );
    }
  }
}
