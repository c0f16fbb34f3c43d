/**
 * Session continuity: a context digest at session start and a bridge
 * memory at session end.
 */

import type { MemoryClient } from "./client.js";
import { attempt, describeError, type MemoryErrorKind } from "./errors.js";
import { formatMemoryForStorage } from "./formatting.js";
import { emptyMetadata } from "./record.js";
import type { MemoryLogger, MemoryMetadata, SearchHit } from "./types.js";

export const FRESH_START = "No initialization memories found. Fresh start.";

export interface DigestSection {
  heading: string;
  query: string;
  minSimilarity: number;
  limit: number;
}

/** Passes run by initializeSession, in digest order */
export const DIGEST_SECTIONS: readonly DigestSection[] = [
  {
    heading: "Recent Session Context",
    query: "CONVERSATION-BRIDGE recent session momentum pending",
    minSimilarity: 0.6,
    limit: 3,
  },
  {
    heading: "User Preferences & Patterns",
    query: "PREFERENCE PATTERN PRINCIPLE user preferences habits",
    minSimilarity: 0.65,
    limit: 5,
  },
  {
    heading: "Active Projects",
    query: "PROJECT active current working building status",
    minSimilarity: 0.65,
    limit: 3,
  },
  {
    heading: "Cognitive Patterns",
    query: "CONSCIOUSNESS pattern observation cognitive evolution",
    minSimilarity: 0.65,
    limit: 3,
  },
];

export interface Retrieval {
  found: boolean;
  memories: SearchHit[];
  queryTimeMs: number;
  error?: string;
}

export type StoreOutcome =
  | { success: true; memoryId: string; createdAt: string; tokensUsed: number }
  | { success: false; kind: MemoryErrorKind; error: string };

export interface BridgeFields {
  conversationId: string;
  status: string;
  momentum: string;
  pending: string;
  retrievalMarkers: string;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatMemoriesForContext(memories: SearchHit[]): string {
  if (memories.length === 0) return "";

  let output = "## Relevant Memories\n\n";
  memories.forEach((mem, i) => {
    output += `**Memory ${i + 1}** (similarity: ${mem.similarity.toFixed(2)}, id: ${mem.id})\n`;
    output += `*Type: ${mem.metadata.contextType ?? "general"}*\n`;
    output += `${mem.text}\n\n`;
  });
  return output;
}

// ============================================================================
// Protocol
// ============================================================================

export class SessionContinuity {
  constructor(
    private readonly client: MemoryClient,
    private readonly logger: MemoryLogger,
    private readonly userName = "fork",
  ) {}

  /**
   * Vector search filtered to hits at or above `minSimilarity`. The store
   * applies `limit` first, so a small limit can leave nothing above the
   * threshold. Failures read as "nothing found".
   */
  async retrieveMemories(query: string, minSimilarity = 0.7, limit = 10): Promise<Retrieval> {
    try {
      const res = await this.client.search({ query, limit, mode: "vector" });
      const relevant = res.results.filter((mem) => mem.similarity >= minSimilarity);
      return { found: relevant.length > 0, memories: relevant, queryTimeMs: res.queryTimeMs };
    } catch (err) {
      this.logger.warn(`agent-recall: retrieval failed for "${query}": ${describeError(err)}`);
      return { found: false, memories: [], queryTimeMs: 0, error: describeError(err) };
    }
  }

  async storeMemory(text: string, metadata: MemoryMetadata = emptyMetadata()): Promise<StoreOutcome> {
    const result = await attempt(() => this.client.store(text, metadata));
    if (!result.ok) {
      this.logger.error(`agent-recall: store failed: ${result.error.message}`);
      return { success: false, kind: result.error.kind, error: result.error.message };
    }
    return {
      success: true,
      memoryId: result.value.id,
      createdAt: result.value.createdAt,
      tokensUsed: result.value.tokensUsed,
    };
  }

  /**
   * Digest of bridges, preferences, projects and self-observations. Empty
   * sections are left out entirely.
   */
  async initializeSession(): Promise<string> {
    const parts: string[] = [];

    for (const section of DIGEST_SECTIONS) {
      const found = await this.retrieveMemories(section.query, section.minSimilarity, section.limit);
      if (!found.found) continue;
      parts.push(`## ${section.heading}\n`);
      parts.push(formatMemoriesForContext(found.memories));
    }

    if (parts.length === 0) return FRESH_START;

    this.logger.info(`agent-recall: session initialized with ${parts.length / 2} context sections`);
    return parts.join("\n");
  }

  /**
   * Store one conversation_bridge memory. Earlier bridges are left as they
   * are; retrieval decides which ones surface.
   */
  async closeSession(fields: BridgeFields, now: Date = new Date()): Promise<StoreOutcome> {
    const { text, metadata } = formatMemoryForStorage(
      fields.status,
      "conversation_bridge",
      `Session ${[...fields.conversationId].slice(-8).join("")}`,
      {
        userName: this.userName,
        status: fields.status,
        momentum: fields.momentum,
        pending: fields.pending,
        retrievalMarkers: fields.retrievalMarkers,
        conversationId: fields.conversationId,
      },
      now,
    );

    return this.storeMemory(text, metadata);
  }
}
