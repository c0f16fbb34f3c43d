/**
 * Command surface for agent-recall.
 * Prints JSON (snake_case keys) or plain text to stdout; failures go to
 * stderr with a non-zero exit code.
 */

import type { MemoryClient } from "./client.js";
import { MemoryError, describeError, isMemoryError, type MemoryErrorKind } from "./errors.js";
import { isJsonValue, metadataFromJson, metadataToJson } from "./record.js";
import { formatMemoriesForContext, type Retrieval, type SessionContinuity, type StoreOutcome } from "./session.js";
import type { JsonObject, JsonValue, MemoryMetadata, SearchHit, SearchResult } from "./types.js";

export const USAGE = `Usage: agent-recall <command> [args...]

Commands:
  store <text> [metadata_json]
  search [query] [limit] [mode]
  get <memory_id>
  delete <memory_id>
  related <memory_id> [min_similarity] [limit]
  stats
  health
  init
  initialize
  close <conv_id> <status> <momentum> <pending> <markers>
  retrieve <query>
  format <query>`;

const COMMANDS = new Set([
  "store",
  "search",
  "get",
  "delete",
  "related",
  "stats",
  "health",
  "init",
  "initialize",
  "close",
  "retrieve",
  "format",
]);

export const EXIT_CODES: Record<MemoryErrorKind, number> = {
  InvalidArgument: 2,
  NotFound: 3,
  FeatureUnavailable: 4,
  EmbeddingUnavailable: 1,
  StoreUnavailable: 1,
  StoreQueryError: 1,
  StoreProtocolError: 1,
};

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliContext {
  client: MemoryClient;
  session: SessionContinuity;
}

// ============================================================================
// Wire shapes
// ============================================================================

function hitToWire(hit: SearchHit): JsonObject {
  return {
    id: hit.id,
    text: hit.text,
    metadata: metadataToJson(hit.metadata),
    created_at: hit.createdAt,
    similarity: hit.similarity,
  };
}

export function searchResultToWire(result: SearchResult): JsonObject {
  return {
    results: result.results.map(hitToWire),
    query_time_ms: result.queryTimeMs,
    namespace: result.namespace,
    mode: result.mode,
  };
}

function retrievalToWire(retrieval: Retrieval): JsonObject {
  return {
    found: retrieval.found,
    memories: retrieval.memories.map(hitToWire),
    query_time_ms: retrieval.queryTimeMs,
    ...(retrieval.error !== undefined ? { error: retrieval.error } : {}),
  };
}

function outcomeToWire(outcome: StoreOutcome): JsonObject {
  if (!outcome.success) return { success: false, kind: outcome.kind, error: outcome.error };
  return {
    success: true,
    memory_id: outcome.memoryId,
    created_at: outcome.createdAt,
    tokens_used: outcome.tokensUsed,
  };
}

function json(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}

// ============================================================================
// Argument parsing
// ============================================================================

function required(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new MemoryError("InvalidArgument", `missing argument: ${name}`);
  }
  return value;
}

function numberArg(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new MemoryError("InvalidArgument", `${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function parseMetadataArg(raw: string | undefined): MemoryMetadata | undefined {
  if (raw === undefined) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MemoryError("InvalidArgument", "metadata must be valid JSON", { cause: err });
  }
  if (!isJsonValue(parsed) || typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new MemoryError("InvalidArgument", "metadata must be a JSON object");
  }
  return metadataFromJson(parsed);
}

// ============================================================================
// Commands
// ============================================================================

async function dispatch(command: string, args: string[], ctx: CliContext, io: CliIo): Promise<number> {
  const { client, session } = ctx;

  switch (command) {
    case "store": {
      const text = required(args, 0, "text");
      const receipt = await client.store(text, parseMetadataArg(args[1]));
      io.stdout(
        json({
          id: receipt.id,
          text: receipt.text,
          created_at: receipt.createdAt,
          tokens_used: receipt.tokensUsed,
        }),
      );
      return 0;
    }
    case "search": {
      const result = await client.search({
        query: args[0],
        limit: numberArg(args[1], "limit", 10),
        mode: args[2] ?? "vector",
      });
      io.stdout(json(searchResultToWire(result)));
      return 0;
    }
    case "get": {
      const { memory } = await client.get(required(args, 0, "memory_id"));
      io.stdout(
        json({
          memory: {
            id: memory.id,
            text: memory.text,
            metadata: metadataToJson(memory.metadata),
            created_at: memory.createdAt,
          },
        }),
      );
      return 0;
    }
    case "delete": {
      const id = required(args, 0, "memory_id");
      await client.delete(id);
      io.stdout(`Deleted ${id}`);
      return 0;
    }
    case "related": {
      const result = await client.getRelated(
        required(args, 0, "memory_id"),
        numberArg(args[1], "min_similarity", 0),
        numberArg(args[2], "limit", 10),
      );
      io.stdout(json(searchResultToWire(result)));
      return 0;
    }
    case "stats": {
      const stats = await client.getStats();
      io.stdout(
        json({
          agent_id: stats.agentId,
          namespace: stats.namespace,
          memory_count: stats.memoryCount,
          first_memory_at: stats.firstMemoryAt,
          last_memory_at: stats.lastMemoryAt,
        }),
      );
      return 0;
    }
    case "health": {
      const report = await client.healthCheck();
      io.stdout(json({ status: report.status, embeddings: report.embeddings, store: report.store }));
      // a degraded report is still a successful probe
      return 0;
    }
    case "init": {
      await client.ensureSchema();
      io.stdout("Schema ready");
      return 0;
    }
    case "initialize": {
      io.stdout(await session.initializeSession());
      return 0;
    }
    case "close": {
      const outcome = await session.closeSession({
        conversationId: required(args, 0, "conv_id"),
        status: required(args, 1, "status"),
        momentum: required(args, 2, "momentum"),
        pending: required(args, 3, "pending"),
        retrievalMarkers: required(args, 4, "markers"),
      });
      io.stdout(json(outcomeToWire(outcome)));
      return outcome.success ? 0 : EXIT_CODES[outcome.kind];
    }
    case "retrieve": {
      const retrieval = await session.retrieveMemories(required(args, 0, "query"));
      io.stdout(json(retrievalToWire(retrieval)));
      return 0;
    }
    case "format": {
      const retrieval = await session.retrieveMemories(required(args, 0, "query"));
      io.stdout(retrieval.found ? formatMemoriesForContext(retrieval.memories) : "No relevant memories found.");
      return 0;
    }
    default:
      throw new MemoryError("InvalidArgument", `Unknown command: ${command}`);
  }
}

/**
 * Run one command. The context is built only once a command is known, so
 * usage errors never touch configuration or the network.
 */
export async function runCli(argv: string[], io: CliIo, createContext: () => CliContext): Promise<number> {
  const [command, ...args] = argv;
  if (!command || !COMMANDS.has(command)) {
    if (command) io.stderr(`Unknown command: ${command}`);
    io.stderr(USAGE);
    return EXIT_CODES.InvalidArgument;
  }

  try {
    return await dispatch(command, args, createContext(), io);
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}`);
    return isMemoryError(err) ? EXIT_CODES[err.kind] : 1;
  }
}
