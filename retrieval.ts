/**
 * Retrieval engine: maps a query and a mode onto the store and ranks,
 * labels and times the results.
 *
 * Hybrid mode runs exactly the vector path. No blend of recency and
 * similarity is defined for it.
 */

import type { Embedder } from "./embeddings.js";
import { MemoryError } from "./errors.js";
import { toHit } from "./record.js";
import type { MemoryRepository } from "./repository.js";
import { SEARCH_MODES, type MemoryLogger, type SearchHit, type SearchMode, type SearchResult } from "./types.js";

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;
export const DEFAULT_LIMIT = 10;

/** Similarity assigned to results that were not ranked by relevance */
export const UNRANKED_SIMILARITY = 1.0;

export interface SearchOptions {
  query?: string | null;
  limit?: number;
  mode?: string;
}

function isSearchMode(mode: string): mode is SearchMode {
  return SEARCH_MODES.some((m) => m === mode);
}

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < MIN_LIMIT || limit > MAX_LIMIT) {
    throw new MemoryError("InvalidArgument", `limit must be an integer between ${MIN_LIMIT} and ${MAX_LIMIT}`);
  }
}

export class RetrievalEngine {
  constructor(
    private readonly agentId: string,
    private readonly embedder: Embedder,
    private readonly repository: MemoryRepository,
    private readonly logger: MemoryLogger,
  ) {}

  get namespace(): string {
    return `agent_${this.agentId}`;
  }

  async search(options: SearchOptions = {}): Promise<SearchResult> {
    const started = Date.now();
    const { query, limit = DEFAULT_LIMIT, mode = "vector" } = options;

    if (!isSearchMode(mode)) {
      throw new MemoryError("InvalidArgument", "mode must be 'vector', 'chronological', or 'hybrid'");
    }
    assertLimit(limit);

    let results: SearchHit[];
    if (mode === "chronological") {
      const rows = await this.repository.findRecent(this.agentId, limit);
      results = rows.map((row) => toHit(row, UNRANKED_SIMILARITY));
    } else {
      if (!query) {
        throw new MemoryError("InvalidArgument", `query required for ${mode} search`);
      }
      const vector = await this.embedder.embed(query);
      results = await this.rankByVector(vector, limit);
    }

    const queryTimeMs = Date.now() - started;
    this.logger.debug?.(
      `agent-recall: ${mode} search returned ${results.length} results in ${queryTimeMs}ms`,
    );

    return { results, queryTimeMs, namespace: this.namespace, mode };
  }

  /**
   * Memories closest to an existing one, ranked by its stored embedding
   * rather than a fresh embedding of its text. The target itself is left out.
   */
  async getRelated(memoryId: string, minSimilarity = 0, limit = DEFAULT_LIMIT): Promise<SearchResult> {
    const started = Date.now();

    if (!memoryId) {
      throw new MemoryError("InvalidArgument", "memory id required for related lookup");
    }
    if (!Number.isFinite(minSimilarity)) {
      throw new MemoryError("InvalidArgument", "min_similarity must be a number");
    }
    assertLimit(limit);

    const vector = await this.repository.readEmbedding(this.agentId, memoryId);
    if (!vector) {
      throw new MemoryError("NotFound", `Memory not found: ${memoryId}`);
    }

    const ranked = await this.rankByVector(vector, limit, memoryId);
    const results = ranked.filter((hit) => hit.similarity >= minSimilarity);

    return {
      results,
      queryTimeMs: Date.now() - started,
      namespace: this.namespace,
      mode: "vector",
    };
  }

  private async rankByVector(vector: number[], limit: number, excludeId?: string): Promise<SearchHit[]> {
    const rows = await this.repository.findNearest(this.agentId, { vector, limit, excludeId });
    // similarity is left unclamped; thresholds apply to the raw value
    return rows.map((row) => toHit(row, 1 - row.distance));
  }
}
