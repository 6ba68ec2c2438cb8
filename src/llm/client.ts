import OpenAI from "openai";
import { config } from "../config.js";

// OpenRouter speaks the OpenAI-compatible API. Retries are handled by
// withRetry, so the SDK's own retry loop is off.
export const llm = new OpenAI({
  baseURL: config.openRouterBaseUrl,
  apiKey: config.openRouterApiKey,
  maxRetries: 0,
  timeout: config.llmTimeoutMs,
  defaultHeaders: {
    "X-Title": "Recall Router",
  },
});
