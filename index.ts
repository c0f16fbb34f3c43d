/**
 * agent-recall — agent-scoped semantic memory
 *
 * - Text memories with embeddings, partitioned per agent
 * - Vector, chronological and hybrid retrieval over libSQL
 * - Related-memory lookup from stored embeddings
 * - Session digest at start, bridge memory at close
 */

export { MemoryClient, createMemoryClient, type MemoryClientDeps } from "./client.js";
export { resolveConfig, DEFAULT_AGENT_ID, type Env } from "./config.js";
export { Embeddings, type Embedder } from "./embeddings.js";
export { MemoryError, attempt, isMemoryError, type MemoryErrorKind, type Result } from "./errors.js";
export {
  formatMemoryForStorage,
  extractConversationSummary,
  type ConversationContext,
  type FormattedMemory,
} from "./formatting.js";
export {
  LibsqlHttpClient,
  queryRows,
  type Statement,
  type StatementExecutor,
  type StatementResult,
} from "./libsql.js";
export { createConsoleLogger } from "./logger.js";
export {
  MAX_TEXT_LENGTH,
  emptyMetadata,
  formatTimestamp,
  metadataFromJson,
  metadataToJson,
} from "./record.js";
export { LibsqlMemoryRepository, type MemoryRepository, type NearestQuery } from "./repository.js";
export { RetrievalEngine, type SearchOptions } from "./retrieval.js";
export {
  SessionContinuity,
  formatMemoriesForContext,
  DIGEST_SECTIONS,
  FRESH_START,
  type BridgeFields,
  type Retrieval,
  type StoreOutcome,
} from "./session.js";
export type * from "./types.js";
export { SEARCH_MODES } from "./types.js";
