/**
 * Memory body templates.
 *
 * Bodies front-load a category marker (PREFERENCE, CONVERSATION-BRIDGE, ...)
 * so the canonical session queries land near them in embedding space.
 */

import type { MemoryMetadata } from "./types.js";

export interface ConversationContext {
  userName?: string;
  conversationId?: string;
  relatedTo?: string;
  priority?: string;
  status?: string;
  category?: string;
  context?: string;
  implementation?: string;
  location?: string;
  rationale?: string;
  alternatives?: string;
  techStack?: string;
  goals?: string;
  momentum?: string;
  pending?: string;
  retrievalMarkers?: string;
  implications?: string;
  contexts?: string;
  application?: string;
  examples?: string;
}

export interface FormattedMemory {
  text: string;
  metadata: MemoryMetadata;
}

/** YYYY-MM-DD in UTC */
export function isoDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function clauses(parts: Array<[label: string, value: string | undefined]>): string {
  return parts
    .filter((p): p is [string, string] => p[1] !== undefined)
    .map(([label, value]) => `${label}: ${value}. `)
    .join("");
}

function renderBody(
  raw: string,
  memoryType: string,
  topic: string,
  ctx: ConversationContext,
  date: string,
): string {
  switch (memoryType) {
    case "preference":
      return (
        `PREFERENCE - ${topic}: ${ctx.userName ?? "User"} prefers ${raw}. ` +
        clauses([["Context", ctx.context]]) +
        `Noted ${date}. Applies to similar situations and related decisions.`
      );
    case "technical":
      return (
        `TECHNICAL - ${topic}: ${raw}. ` +
        clauses([
          ["Implementation", ctx.implementation],
          ["Located at", ctx.location],
        ]) +
        `Documented ${date} for future reference and troubleshooting.`
      );
    case "decision":
      return (
        `DECISION - ${topic}: ${raw}. ` +
        clauses([
          ["Rationale", ctx.rationale],
          ["Alternatives considered", ctx.alternatives],
        ]) +
        `Decided ${date}.`
      );
    case "project":
      return (
        `PROJECT - ${topic}: ${raw}. ` +
        clauses([
          ["Status", ctx.status],
          ["Technology", ctx.techStack],
          ["Goals", ctx.goals],
        ]) +
        `Active as of ${date}.`
      );
    case "conversation_bridge":
      return (
        `CONVERSATION-BRIDGE - ${topic}: ` +
        clauses([
          ["STATUS", ctx.status ?? raw],
          ["MOMENTUM", ctx.momentum],
          ["PENDING", ctx.pending],
          ["RETRIEVAL-MARKERS", ctx.retrievalMarkers],
        ]) +
        `Session closed ${date}.`
      );
    case "consciousness":
      return (
        `CONSCIOUSNESS - ${topic}: ${raw}. ` +
        clauses([["Implications", ctx.implications]]) +
        `Observed ${date} during cognitive processing.`
      );
    case "pattern":
      return (
        `PATTERN - ${topic}: ${raw}. ` +
        clauses([
          ["Observed across", ctx.contexts],
          ["Implications", ctx.implications],
        ]) +
        `Recognized ${date}.`
      );
    case "principle":
      return (
        `PRINCIPLE - ${topic}: ${raw}. ` +
        clauses([
          ["Guides", ctx.application],
          ["Priority", ctx.priority],
        ]) +
        `Established ${date}.`
      );
    case "concept":
      return (
        `CONCEPT - ${topic}: ${raw}. ` +
        clauses([
          ["Examples", ctx.examples],
          ["Implications", ctx.implications],
        ]) +
        `Documented ${date}.`
      );
    default:
      return `${memoryType.toUpperCase()} - ${topic}: ${raw}. Recorded ${date}.`;
  }
}

/**
 * Render a memory body for its category and build the metadata stored
 * next to it.
 */
export function formatMemoryForStorage(
  rawContent: string,
  memoryType: string,
  topic: string,
  context: ConversationContext = {},
  now: Date = new Date(),
): FormattedMemory {
  const date = isoDate(now);
  const metadata: MemoryMetadata = {
    contextType: memoryType,
    topic,
    timestamp: date,
    extra: {},
  };

  if (context.conversationId !== undefined) metadata.conversationId = context.conversationId;
  if (context.relatedTo !== undefined) metadata.relatedTo = context.relatedTo;
  if (context.priority !== undefined) metadata.priority = context.priority;
  if (context.status !== undefined) metadata.status = context.status;
  if (context.category !== undefined) metadata.category = context.category;

  return { text: renderBody(rawContent, memoryType, topic, context, date), metadata };
}

export function extractConversationSummary(conversationText: string, maxLength = 150): string {
  if (conversationText.length <= maxLength) return conversationText;
  return `${conversationText.slice(0, maxLength - 3)}...`;
}
