/**
 * Configuration for agent-recall.
 *
 * Resolved once at process start and passed into every component; nothing
 * below this module reads the environment.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { MemoryError } from "./errors.js";
import type { MemoryConfig } from "./types.js";

export const DEFAULT_AGENT_ID = "fork-main";

const ConfigSchema = Type.Object({
  agentId: Type.String({ minLength: 1 }),
  embedding: Type.Object({
    baseUrl: Type.String({ minLength: 1 }),
    model: Type.String({ minLength: 1 }),
    apiKey: Type.String(),
    dimensions: Type.Integer({ minimum: 1 }),
  }),
  store: Type.Object({
    url: Type.String({ minLength: 1 }),
    authToken: Type.Optional(Type.String({ minLength: 1 })),
  }),
  requestTimeoutMs: Type.Integer({ minimum: 1 }),
  healthTimeoutMs: Type.Integer({ minimum: 1 }),
  logLevel: Type.Union([
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("silent"),
  ]),
});

export type Env = Record<string, string | undefined>;

function numberFrom(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw);
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Build a validated, frozen config from environment variables.
 */
export function resolveConfig(env: Env = process.env): Readonly<MemoryConfig> {
  const candidate = {
    agentId: env.MEMORY_AGENT_ID ?? env.MEMORY_BOX_AGENT_ID ?? DEFAULT_AGENT_ID,
    embedding: {
      baseUrl: stripTrailingSlash(env.MEMORY_EMBEDDING_URL ?? "http://localhost:11434/v1"),
      model: env.MEMORY_EMBEDDING_MODEL ?? "nomic-embed-text",
      apiKey: env.MEMORY_EMBEDDING_API_KEY ?? "ollama",
      dimensions: numberFrom(env.MEMORY_EMBEDDING_DIMENSIONS, 768),
    },
    store: {
      url: stripTrailingSlash(env.MEMORY_STORE_URL ?? "http://localhost:8787"),
      ...(env.MEMORY_STORE_AUTH_TOKEN ? { authToken: env.MEMORY_STORE_AUTH_TOKEN } : {}),
    },
    requestTimeoutMs: numberFrom(env.MEMORY_REQUEST_TIMEOUT_MS, 30_000),
    healthTimeoutMs: numberFrom(env.MEMORY_HEALTH_TIMEOUT_MS, 5_000),
    logLevel: env.MEMORY_LOG_LEVEL ?? "info",
  };

  if (!Value.Check(ConfigSchema, candidate)) {
    const first = Value.Errors(ConfigSchema, candidate).First();
    const where = first?.path || "/";
    throw new MemoryError(
      "InvalidArgument",
      `Invalid configuration at ${where}: ${first?.message ?? "unknown error"}`,
    );
  }

  return Object.freeze({
    ...candidate,
    embedding: Object.freeze({ ...candidate.embedding }),
    store: Object.freeze({ ...candidate.store }),
  });
}
