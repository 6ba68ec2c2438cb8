import type { ContextBlockName } from "../routing/config.js";
import type { RoutingDecision } from "../routing/router.js";
import type { SessionPath } from "../memory/session.js";
import type { ClassificationResult, Conversation } from "../memory/types.js";
import type { MemoryErrorCode } from "../errors.js";

// ── External collaborators ───────────────────────────────

export interface Classifier {
  /** Throws ClassifierError. */
  classify(conversation: Conversation): Promise<ClassificationResult>;
}

export interface RenderedContextBlock {
  name: ContextBlockName;
  text: string;
  estimatedTokens: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ResponderOutput {
  text: string;
  usage?: TokenUsage;
}

export interface Responder {
  /** Throws ResponderError. */
  generate(
    conversation: Conversation,
    blocks: readonly RenderedContextBlock[],
  ): Promise<ResponderOutput>;
}

// ── Turn result ──────────────────────────────────────────

export interface TurnError {
  code: MemoryErrorCode;
  message: string;
}

export interface TurnResult {
  reply: string;
  conversation: Conversation;
  classification: ClassificationResult | null;
  routing: RoutingDecision;
  /** A long-term record was written this turn. */
  persisted: boolean;
  path: SessionPath;
  degraded: boolean;
  errors: TurnError[];
  usage: TokenUsage;
  latencyMs: number;
}

export interface MemorySnapshot {
  sessionMessages: number;
  longTermRecords: number;
  lastUpdatedAt?: number;
}
