import { z } from "zod";

// ── Memory Module: Shared Types ─────────────────────────

export type MessageRole = "user" | "assistant" | "system";

export interface Message {
  readonly role: MessageRole;
  readonly text: string;
  readonly timestamp: number; // Unix ms, UTC
}

/** Session state held by the ephemeral store (short-term memory). */
export interface Conversation {
  readonly userId: string;
  readonly messages: readonly Message[];
  readonly createdAt: number;
  readonly lastUpdatedAt: number;
}

export const EVENT_TYPES = [
  "INQUIRY",
  "FEEDBACK",
  "REQUEST",
  "COMPLAINT",
  "TRANSACTION",
  "SUPPORT",
  "INFORMATION",
  "GENERIC_EVENT",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export const classificationSchema = z.object({
  eventType: z.enum(EVENT_TYPES),
  importance: z.number().min(0).max(1),
  intent: z.string().trim().min(1),
  reasoning: z.string().default(""),
});

export type ClassificationResult = z.infer<typeof classificationSchema>;

/** Append-only entry in a user's long-term memory collection. */
export interface LongTermRecord {
  userId: string;
  eventType: EventType;
  intentSummary: string;
  importance: number;
  createdAt: number; // Unix ms
}

export const longTermRecordSchema = z.object({
  userId: z.string(),
  eventType: z.enum(EVENT_TYPES),
  intentSummary: z.string(),
  importance: z.number().min(0).max(1),
  createdAt: z.number(),
});

// ── Wire format for the ephemeral store ──────────────────
// Timestamps travel as ISO-8601 strings so the cached JSON is readable
// with redis-cli.

const messageWireSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  text: z.string(),
  timestamp: z.string().datetime(),
});

export const conversationWireSchema = z.object({
  userId: z.string(),
  messages: z.array(messageWireSchema),
  createdAt: z.string().datetime(),
  lastUpdatedAt: z.string().datetime(),
});

export type ConversationWire = z.infer<typeof conversationWireSchema>;

export function toWire(conversation: Conversation): ConversationWire {
  return {
    userId: conversation.userId,
    messages: conversation.messages.map((m) => ({
      role: m.role,
      text: m.text,
      timestamp: new Date(m.timestamp).toISOString(),
    })),
    createdAt: new Date(conversation.createdAt).toISOString(),
    lastUpdatedAt: new Date(conversation.lastUpdatedAt).toISOString(),
  };
}

export function fromWire(wire: ConversationWire): Conversation {
  return {
    userId: wire.userId,
    messages: wire.messages.map((m) => ({
      role: m.role,
      text: m.text,
      timestamp: Date.parse(m.timestamp),
    })),
    createdAt: Date.parse(wire.createdAt),
    lastUpdatedAt: Date.parse(wire.lastUpdatedAt),
  };
}
