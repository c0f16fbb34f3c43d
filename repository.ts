/**
 * Memory SQL over a libSQL statement executor.
 * Every read and delete is scoped to the agent passed in.
 */

import { MemoryError } from "./errors.js";
import { queryRows, type StatementExecutor } from "./libsql.js";
import { parseVectorText, rowToNearest, rowToStats, rowToStored, serializeMetadata } from "./record.js";
import type { MemoryRecord, MemoryStats, NearestMemoryRow, StoredMemoryRow } from "./types.js";

export interface NearestQuery {
  vector: number[];
  limit: number;
  /** Leave this record out of the ranking */
  excludeId?: string;
}

export interface MemoryRepository {
  insert(record: MemoryRecord): Promise<void>;
  findRecent(agentId: string, limit: number): Promise<StoredMemoryRow[]>;
  findNearest(agentId: string, query: NearestQuery): Promise<NearestMemoryRow[]>;
  findById(agentId: string, id: string): Promise<StoredMemoryRow | null>;
  /**
   * Stored embedding of a record. `null` when the record does not exist;
   * throws FeatureUnavailable when the column cannot be read back as a vector.
   */
  readEmbedding(agentId: string, id: string): Promise<number[] | null>;
  delete(agentId: string, id: string): Promise<void>;
  stats(agentId: string): Promise<MemoryStats>;
  ping(): Promise<boolean>;
  ensureSchema(dimensions: number): Promise<void>;
}

export class LibsqlMemoryRepository implements MemoryRepository {
  constructor(
    private readonly db: StatementExecutor,
    private readonly healthTimeoutMs?: number,
  ) {}

  // --------------------------------------------------------------------------
  // Schema
  // --------------------------------------------------------------------------

  async ensureSchema(dimensions: number): Promise<void> {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new MemoryError("InvalidArgument", `Invalid embedding dimensions: ${dimensions}`);
    }

    const results = await this.db.execute([
      {
        q: `CREATE TABLE IF NOT EXISTS memories (
          id TEXT PRIMARY KEY,
          agent_id TEXT NOT NULL,
          content TEXT NOT NULL,
          embedding F32_BLOB(${dimensions}),
          metadata JSON,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        )`,
      },
      { q: "CREATE INDEX IF NOT EXISTS idx_agent ON memories(agent_id)" },
      { q: "CREATE INDEX IF NOT EXISTS idx_created ON memories(created_at)" },
      { q: "CREATE INDEX IF NOT EXISTS idx_vector ON memories(libsql_vector_idx(embedding))" },
    ]);

    for (const result of results) {
      if (result.kind === "error") {
        throw new MemoryError("StoreQueryError", `Store schema error: ${result.message}`);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  async insert(record: MemoryRecord): Promise<void> {
    await queryRows(
      this.db,
      {
        q: "INSERT INTO memories (id, agent_id, content, embedding, metadata, created_at, updated_at) VALUES (?, ?, ?, vector32(?), ?, ?, ?)",
        params: [
          record.id,
          record.agentId,
          record.text,
          JSON.stringify(record.embedding),
          serializeMetadata(record.metadata),
          record.createdAt,
          record.updatedAt,
        ],
      },
      "storage",
    );
  }

  async delete(agentId: string, id: string): Promise<void> {
    await queryRows(
      this.db,
      { q: "DELETE FROM memories WHERE id = ? AND agent_id = ?", params: [id, agentId] },
      "delete",
    );
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async findRecent(agentId: string, limit: number): Promise<StoredMemoryRow[]> {
    const rows = await queryRows(
      this.db,
      {
        q: "SELECT id, content, metadata, created_at FROM memories WHERE agent_id = ? ORDER BY created_at DESC LIMIT ?",
        params: [agentId, limit],
      },
      "search",
    );
    return rows.map(rowToStored);
  }

  async findNearest(agentId: string, query: NearestQuery): Promise<NearestMemoryRow[]> {
    const rows = await queryRows(
      this.db,
      {
        q:
          "SELECT id, content, metadata, created_at, vector_distance_cos(embedding, vector32(?)) AS distance " +
          `FROM memories WHERE agent_id = ?${query.excludeId !== undefined ? " AND id != ?" : ""} ORDER BY distance ASC LIMIT ?`,
        params: [
          JSON.stringify(query.vector),
          agentId,
          ...(query.excludeId !== undefined ? [query.excludeId] : []),
          query.limit,
        ],
      },
      "search",
    );
    return rows.map(rowToNearest);
  }

  async findById(agentId: string, id: string): Promise<StoredMemoryRow | null> {
    const rows = await queryRows(
      this.db,
      {
        q: "SELECT id, content, metadata, created_at FROM memories WHERE id = ? AND agent_id = ?",
        params: [id, agentId],
      },
      "get",
    );
    return rows.length > 0 ? rowToStored(rows[0]) : null;
  }

  async readEmbedding(agentId: string, id: string): Promise<number[] | null> {
    const [result] = await this.db.execute([
      {
        q: "SELECT vector_extract(embedding) FROM memories WHERE id = ? AND agent_id = ?",
        params: [id, agentId],
      },
    ]);

    if (result.kind === "error") {
      if (/no such function/i.test(result.message)) {
        throw new MemoryError(
          "FeatureUnavailable",
          `Store cannot read embeddings back as vectors: ${result.message}`,
        );
      }
      throw new MemoryError("StoreQueryError", `Store get_related error: ${result.message}`);
    }

    if (result.rows.length === 0) return null;

    const vector = parseVectorText(result.rows[0][0]);
    if (!vector) {
      throw new MemoryError("FeatureUnavailable", `Stored embedding of ${id} is not readable as a vector`);
    }
    return vector;
  }

  async stats(agentId: string): Promise<MemoryStats> {
    const rows = await queryRows(
      this.db,
      {
        q: "SELECT COUNT(*), MIN(created_at), MAX(created_at) FROM memories WHERE agent_id = ?",
        params: [agentId],
      },
      "stats",
    );
    return rowToStats(rows[0]);
  }

  async ping(): Promise<boolean> {
    try {
      const [result] = await this.db.execute([{ q: "SELECT 1" }], { timeoutMs: this.healthTimeoutMs });
      return result.kind === "rows";
    } catch {
      return false;
    }
  }
}
