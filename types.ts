/**
 * agent-recall type definitions
 */

// ============================================================================
// Config
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface MemoryConfig {
  /** Partition key every record and query is scoped to */
  agentId: string;
  embedding: {
    /** OpenAI-compatible base URL (Ollama serves one under /v1) */
    baseUrl: string;
    model: string;
    apiKey: string;
    /** Fixed output size of the model; the store column is sized to match */
    dimensions: number;
  };
  store: {
    /** libSQL server HTTP endpoint */
    url: string;
    authToken?: string;
  };
  requestTimeoutMs: number;
  healthTimeoutMs: number;
  logLevel: LogLevel;
}

// ============================================================================
// Logging
// ============================================================================

export interface MemoryLogger {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

// ============================================================================
// JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Memory records
// ============================================================================

/**
 * Typed view over the stored metadata JSON. Well-known keys get fields;
 * everything else rides along in `extra` under its stored key.
 */
export interface MemoryMetadata {
  /** Category of the memory (`context_type`) */
  contextType?: string;
  topic?: string;
  /** Calendar date the memory was formatted (YYYY-MM-DD) */
  timestamp?: string;
  /** Conversation the memory came from (`conversation_id`) */
  conversationId?: string;
  /** `related_to` */
  relatedTo?: string;
  priority?: string;
  status?: string;
  category?: string;
  extra: JsonObject;
}

export interface MemoryRecord {
  /** `mem_` + 12 hex chars */
  id: string;
  agentId: string;
  text: string;
  embedding: number[];
  metadata: MemoryMetadata;
  /** Unix epoch seconds */
  createdAt: number;
  /** Mirrors createdAt; records are never updated */
  updatedAt: number;
}

/** A record as it comes back from a read, before timestamps are formatted */
export interface StoredMemoryRow {
  id: string;
  text: string;
  metadata: MemoryMetadata;
  createdAt: number;
}

export interface NearestMemoryRow extends StoredMemoryRow {
  /** Cosine distance to the query vector */
  distance: number;
}

export interface MemoryStats {
  count: number;
  firstCreatedAt: number | null;
  lastCreatedAt: number | null;
}

// ============================================================================
// Search
// ============================================================================

export type SearchMode = "vector" | "chronological" | "hybrid";

export const SEARCH_MODES: readonly SearchMode[] = ["vector", "chronological", "hybrid"];

export interface MemoryView {
  id: string;
  text: string;
  metadata: MemoryMetadata;
  /** ISO-8601 UTC */
  createdAt: string;
}

export interface SearchHit extends MemoryView {
  /** 1 - cosine distance; 1.0 in chronological mode */
  similarity: number;
}

export interface SearchResult {
  results: SearchHit[];
  queryTimeMs: number;
  /** `agent_<agentId>` */
  namespace: string;
  mode: SearchMode;
}

// ============================================================================
// Client results
// ============================================================================

export interface StoreReceipt {
  id: string;
  text: string;
  createdAt: string;
  /** Always 0: embeddings are computed locally */
  tokensUsed: number;
}

export interface AgentStats {
  agentId: string;
  namespace: string;
  memoryCount: number;
  firstMemoryAt: string | null;
  lastMemoryAt: string | null;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  embeddings: "up" | "down";
  store: "up" | "down";
}
