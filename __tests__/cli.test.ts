/**
 * Tests for the command surface
 */

import { describe, test, expect, vi, beforeEach } from "vitest";
import { EXIT_CODES, USAGE, parseMetadataArg, runCli, type CliContext } from "../cli.js";
import { MemoryClient } from "../client.js";
import { MemoryError } from "../errors.js";
import { SessionContinuity } from "../session.js";
import {
  FAKE_DIMENSIONS,
  FakeEmbedder,
  InMemoryMemoryRepository,
  captureError,
  createTestLogger,
  tickingClock,
} from "./fakes.js";

function createIo() {
  const out: string[] = [];
  const err: string[] = [];
  return { io: { stdout: (t: string) => out.push(t), stderr: (t: string) => err.push(t) }, out, err };
}

describe("runCli", () => {
  let repository: InMemoryMemoryRepository;
  let embedder: FakeEmbedder;
  let context: CliContext;
  const createContext = vi.fn(() => context);

  beforeEach(() => {
    repository = new InMemoryMemoryRepository();
    embedder = new FakeEmbedder();
    const logger = createTestLogger();
    const client = new MemoryClient({
      agentId: "fork-main",
      embedder,
      repository,
      logger,
      dimensions: FAKE_DIMENSIONS,
      now: tickingClock(),
    });
    context = { client, session: new SessionContinuity(client, logger) };
    createContext.mockClear();
  });

  test("no command prints usage and exits 2", async () => {
    const { io, out, err } = createIo();

    await expect(runCli([], io, createContext)).resolves.toBe(2);
    expect(err).toEqual([USAGE]);
    expect(out).toEqual([]);
    expect(createContext).not.toHaveBeenCalled();
  });

  test("unknown commands never build the context", async () => {
    const { io, err } = createIo();

    await expect(runCli(["frobnicate"], io, createContext)).resolves.toBe(2);
    expect(err).toEqual(["Unknown command: frobnicate", USAGE]);
    expect(createContext).not.toHaveBeenCalled();
  });

  test("store prints a snake_case receipt", async () => {
    const { io, out } = createIo();

    await expect(runCli(["store", "PREFERENCE - Colors: blue.", '{"context_type":"preference"}'], io, createContext))
      .resolves.toBe(0);

    const receipt: unknown = JSON.parse(out[0]);
    expect(receipt).toEqual({
      id: repository.rows[0].id,
      text: "PREFERENCE - Colors: blue.",
      created_at: "2025-12-09T13:45:00Z",
      tokens_used: 0,
    });
    expect(repository.rows[0].metadataJson).toBe('{"context_type":"preference"}');
  });

  test("store with bad metadata exits 2 without storing", async () => {
    const { io, err } = createIo();

    await expect(runCli(["store", "text", "[1,2]"], io, createContext)).resolves.toBe(2);
    expect(err).toEqual(["Error: metadata must be a JSON object"]);
    expect(repository.rows).toHaveLength(0);
  });

  test("get prints the memory", async () => {
    const { io, out } = createIo();
    const { id } = await context.client.store("note");

    await expect(runCli(["get", id], io, createContext)).resolves.toBe(0);
    expect(JSON.parse(out[0])).toEqual({
      memory: { id, text: "note", metadata: {}, created_at: "2025-12-09T13:45:00Z" },
    });
  });

  test("get of an unknown id exits 3", async () => {
    const { io, err } = createIo();

    await expect(runCli(["get", "mem_ffffffffffff"], io, createContext)).resolves.toBe(3);
    expect(err).toEqual(["Error: Memory not found: mem_ffffffffffff"]);
  });

  test("delete confirms in plain text", async () => {
    const { io, out } = createIo();

    await expect(runCli(["delete", "mem_ffffffffffff"], io, createContext)).resolves.toBe(0);
    expect(out).toEqual(["Deleted mem_ffffffffffff"]);
  });

  test("search defaults to vector mode", async () => {
    const { io, out } = createIo();
    await context.client.store("PREFERENCE - Colors: blue.");

    await expect(runCli(["search", "PREFERENCE colors"], io, createContext)).resolves.toBe(0);

    expect(JSON.parse(out[0])).toMatchObject({
      namespace: "agent_fork-main",
      mode: "vector",
      results: [{ text: "PREFERENCE - Colors: blue.", similarity: 1, created_at: "2025-12-09T13:45:00Z" }],
    });
  });

  test("search with a non-numeric limit exits 2", async () => {
    const { io, err } = createIo();

    await expect(runCli(["search", "x", "ten"], io, createContext)).resolves.toBe(2);
    expect(err).toEqual(['Error: limit must be a number, got "ten"']);
  });

  test("stats prints snake_case keys", async () => {
    const { io, out } = createIo();

    await expect(runCli(["stats"], io, createContext)).resolves.toBe(0);
    expect(JSON.parse(out[0])).toEqual({
      agent_id: "fork-main",
      namespace: "agent_fork-main",
      memory_count: 0,
      first_memory_at: null,
      last_memory_at: null,
    });
  });

  test("health prints a degraded report and still exits 0", async () => {
    const { io, out } = createIo();
    embedder.up = false;

    await expect(runCli(["health"], io, createContext)).resolves.toBe(0);
    expect(JSON.parse(out[0])).toEqual({ status: "degraded", embeddings: "down", store: "up" });
  });

  test("init creates the schema", async () => {
    const { io, out } = createIo();

    await expect(runCli(["init"], io, createContext)).resolves.toBe(0);
    expect(out).toEqual(["Schema ready"]);
    expect(repository.schemaDimensions).toBe(FAKE_DIMENSIONS);
  });

  test("close needs all five fields", async () => {
    const { io, err } = createIo();

    await expect(runCli(["close", "con_abc123", "S"], io, createContext)).resolves.toBe(2);
    expect(err).toEqual(["Error: missing argument: momentum"]);
  });

  test("close maps a failed store to its exit code", async () => {
    const { io, out } = createIo();
    embedder.failure = new MemoryError("EmbeddingUnavailable", "Embedding request failed: timeout");

    await expect(runCli(["close", "con_abc123", "S", "M", "P", "R"], io, createContext)).resolves.toBe(1);
    expect(JSON.parse(out[0])).toEqual({
      success: false,
      kind: "EmbeddingUnavailable",
      error: "Embedding request failed: timeout",
    });
  });

  test("format reports when nothing is relevant", async () => {
    const { io, out } = createIo();

    await expect(runCli(["format", "anything"], io, createContext)).resolves.toBe(0);
    expect(out).toEqual(["No relevant memories found."]);
  });

  test("initialize prints the fresh-start sentinel", async () => {
    const { io, out } = createIo();

    await expect(runCli(["initialize"], io, createContext)).resolves.toBe(0);
    expect(out).toEqual(["No initialization memories found. Fresh start."]);
  });

  test("errors from building the context are reported", async () => {
    const { io, err } = createIo();
    const failing = () => {
      throw new MemoryError("InvalidArgument", "Invalid configuration at /embedding/dimensions: bad");
    };

    await expect(runCli(["stats"], io, failing)).resolves.toBe(2);
    expect(err).toEqual(["Error: Invalid configuration at /embedding/dimensions: bad"]);
  });
});

describe("parseMetadataArg", () => {
  test("absent metadata is undefined", () => {
    expect(parseMetadataArg(undefined)).toBeUndefined();
  });

  test("maps well-known keys", () => {
    expect(parseMetadataArg('{"context_type":"decision","tags":["a"]}')).toEqual({
      contextType: "decision",
      extra: { tags: ["a"] },
    });
  });

  test("invalid JSON is InvalidArgument", () => {
    expect(captureError(() => parseMetadataArg("{nope"))).toMatchObject({
      kind: "InvalidArgument",
      message: "metadata must be valid JSON",
    });
  });

  test("exit codes follow the error kind", () => {
    expect(EXIT_CODES.NotFound).toBe(3);
    expect(EXIT_CODES.FeatureUnavailable).toBe(4);
    expect(EXIT_CODES.StoreUnavailable).toBe(1);
  });
});
