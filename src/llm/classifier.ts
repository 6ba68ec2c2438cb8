import type OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import { ClassifierError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { Classifier } from "../agent/types.js";
import {
  EVENT_TYPES,
  classificationSchema,
  type ClassificationResult,
  type Conversation,
} from "../memory/types.js";
import type { UsageTracker } from "../usage/tracker.js";
import { withRetry, type RetryOptions } from "./retry.js";

// ── Classifier: event type, importance and intent ───────

export interface LlmClassifierOptions {
  model: string;
  temperature: number;
  /** Prior messages sent along with the latest user message */
  contextMessages: number;
  /** Intent names the router knows about; offered to the model */
  knownIntents: readonly string[];
  timeoutMs: number;
  usage?: UsageTracker;
  retry?: RetryOptions;
}

function buildSystemPrompt(knownIntents: readonly string[]): string {
  const intents = knownIntents.length > 0 ? knownIntents.join(", ") : "greet";
  return [
    "You classify the latest USER message of a shop chat.",
    "Return ONLY a JSON object with these keys:",
    `- "event_type": one of ${EVENT_TYPES.join(", ")}`,
    '- "importance": number 0..1; how worth remembering this is long-term (purchases, complaints and stated preferences are high, greetings and small talk are low)',
    `- "intent": snake_case name; prefer one of: ${intents}. Use another short name only if none fits.`,
    '- "reasoning": one short sentence',
  ].join("\n");
}

/** Strip markdown code fences some models wrap JSON in. */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
}

/** Parse the model's JSON (snake_case keys) into a validated result. */
export function parseClassification(raw: string): ClassificationResult {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (err) {
    throw new ClassifierError("Classifier returned non-JSON output", err);
  }
  if (typeof json !== "object" || json === null) {
    throw new ClassifierError("Classifier output is not an object");
  }

  const source: Record<string, unknown> = { ...json };
  const result = classificationSchema.safeParse({
    eventType: source["event_type"] ?? source["eventType"],
    importance: source["importance"],
    intent: source["intent"],
    reasoning: source["reasoning"] ?? "",
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ClassifierError(
      `Invalid classification: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`,
      result.error,
    );
  }
  return result.data;
}

export class LlmClassifier implements Classifier {
  private readonly client: OpenAI;
  private readonly options: LlmClassifierOptions;
  private readonly systemPrompt: string;

  constructor(client: OpenAI, options: LlmClassifierOptions) {
    this.client = client;
    this.options = options;
    this.systemPrompt = buildSystemPrompt(options.knownIntents);
  }

  async classify(conversation: Conversation): Promise<ClassificationResult> {
    const dialogue = conversation.messages.filter((m) => m.role !== "system");
    const latest = dialogue[dialogue.length - 1];
    if (!latest || latest.role !== "user") {
      throw new ClassifierError("No user message to classify");
    }

    const prior = dialogue
      .slice(0, -1)
      .slice(-this.options.contextMessages)
      .map((m) => `${m.role.toUpperCase()}: ${m.text}`)
      .join("\n");

    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: this.systemPrompt },
      {
        role: "user",
        content: prior
          ? `Recent conversation:\n${prior}\n\nLatest USER message:\n${latest.text}`
          : `Latest USER message:\n${latest.text}`,
      },
    ];

    const started = Date.now();
    let raw: string;
    try {
      const response = await withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: this.options.model,
              temperature: this.options.temperature,
              max_tokens: 300,
              response_format: { type: "json_object" },
              messages,
            },
            { timeout: this.options.timeoutMs },
          ),
        { label: `classifier (${this.options.model})`, ...this.options.retry },
      );
      this.options.usage?.logCall(
        "classifier",
        this.options.model,
        response.usage?.prompt_tokens ?? 0,
        response.usage?.completion_tokens ?? 0,
        Date.now() - started,
      );
      raw = response.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw new ClassifierError(
        `Classifier call failed: ${describeError(err)}`,
        err,
      );
    }

    const classification = parseClassification(raw);
    log.info(
      {
        eventType: classification.eventType,
        importance: classification.importance,
        intent: classification.intent,
      },
      "🏷️ Message classified",
    );
    return classification;
  }
}
