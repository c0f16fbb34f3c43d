/**
 * MemoryClient binds one agent to an embedding gateway and a memory
 * repository. Every read, write and delete is scoped to that agent.
 */

import { Embeddings, type Embedder } from "./embeddings.js";
import { MemoryError } from "./errors.js";
import { LibsqlHttpClient } from "./libsql.js";
import {
  assertStorableText,
  emptyMetadata,
  formatTimestamp,
  generateMemoryId,
  nowSeconds,
  toView,
} from "./record.js";
import { LibsqlMemoryRepository, type MemoryRepository } from "./repository.js";
import { DEFAULT_LIMIT, RetrievalEngine, type SearchOptions } from "./retrieval.js";
import type {
  AgentStats,
  HealthReport,
  MemoryConfig,
  MemoryLogger,
  MemoryMetadata,
  MemoryView,
  SearchResult,
  StoreReceipt,
} from "./types.js";

export interface MemoryClientDeps {
  agentId: string;
  embedder: Embedder;
  repository: MemoryRepository;
  logger: MemoryLogger;
  /** Dimension the store's embedding column is created with */
  dimensions?: number;
  /** Clock in epoch seconds */
  now?: () => number;
}

export class MemoryClient {
  readonly agentId: string;
  private readonly embedder: Embedder;
  private readonly repository: MemoryRepository;
  private readonly logger: MemoryLogger;
  private readonly retrieval: RetrievalEngine;
  private readonly dimensions?: number;
  private readonly now: () => number;

  constructor(deps: MemoryClientDeps) {
    this.agentId = deps.agentId;
    this.embedder = deps.embedder;
    this.repository = deps.repository;
    this.logger = deps.logger;
    this.dimensions = deps.dimensions;
    this.now = deps.now ?? nowSeconds;
    this.retrieval = new RetrievalEngine(deps.agentId, deps.embedder, deps.repository, deps.logger);
  }

  get namespace(): string {
    return this.retrieval.namespace;
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * Embed and insert a new memory. Not idempotent: a retried call may
   * leave two records with different ids.
   */
  async store(text: string, metadata: MemoryMetadata = emptyMetadata()): Promise<StoreReceipt> {
    assertStorableText(text);

    const embedding = await this.embedder.embed(text);
    const id = generateMemoryId();
    const timestamp = this.now();

    await this.repository.insert({
      id,
      agentId: this.agentId,
      text,
      embedding,
      metadata,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    this.logger.debug?.(`agent-recall: stored ${id} (${text.length} chars)`);

    return { id, text, createdAt: formatTimestamp(timestamp), tokensUsed: 0 };
  }

  /** Hard delete. Deleting an id that does not exist succeeds. */
  async delete(memoryId: string): Promise<void> {
    await this.repository.delete(this.agentId, memoryId);
    this.logger.debug?.(`agent-recall: deleted ${memoryId}`);
  }

  async ensureSchema(): Promise<void> {
    if (this.dimensions === undefined) {
      throw new MemoryError("InvalidArgument", "embedding dimensions are not configured");
    }
    await this.repository.ensureSchema(this.dimensions);
    this.logger.info(`agent-recall: schema ready (embedding dimensions: ${this.dimensions})`);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async get(memoryId: string): Promise<{ memory: MemoryView }> {
    const row = await this.repository.findById(this.agentId, memoryId);
    if (!row) {
      throw new MemoryError("NotFound", `Memory not found: ${memoryId}`);
    }
    return { memory: toView(row) };
  }

  search(options: SearchOptions = {}): Promise<SearchResult> {
    return this.retrieval.search(options);
  }

  getRelated(memoryId: string, minSimilarity = 0, limit = DEFAULT_LIMIT): Promise<SearchResult> {
    return this.retrieval.getRelated(memoryId, minSimilarity, limit);
  }

  async getStats(): Promise<AgentStats> {
    const stats = await this.repository.stats(this.agentId);
    return {
      agentId: this.agentId,
      namespace: this.namespace,
      memoryCount: stats.count,
      firstMemoryAt: stats.firstCreatedAt === null ? null : formatTimestamp(stats.firstCreatedAt),
      lastMemoryAt: stats.lastCreatedAt === null ? null : formatTimestamp(stats.lastCreatedAt),
    };
  }

  async healthCheck(): Promise<HealthReport> {
    const [embeddingsUp, storeUp] = await Promise.all([this.embedder.ping(), this.repository.ping()]);
    if (!embeddingsUp || !storeUp) {
      this.logger.warn(
        `agent-recall: degraded (embeddings: ${embeddingsUp ? "up" : "down"}, store: ${storeUp ? "up" : "down"})`,
      );
    }
    return {
      status: embeddingsUp && storeUp ? "healthy" : "degraded",
      embeddings: embeddingsUp ? "up" : "down",
      store: storeUp ? "up" : "down",
    };
  }
}

/**
 * Wire the production gateway and store from a resolved config.
 */
export function createMemoryClient(config: Readonly<MemoryConfig>, logger: MemoryLogger): MemoryClient {
  const executor = new LibsqlHttpClient(config.store.url, config.requestTimeoutMs, config.store.authToken);
  return new MemoryClient({
    agentId: config.agentId,
    embedder: new Embeddings(config),
    repository: new LibsqlMemoryRepository(executor, config.healthTimeoutMs),
    logger,
    dimensions: config.embedding.dimensions,
  });
}
