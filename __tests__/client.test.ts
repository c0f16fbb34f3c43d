/**
 * Tests for MemoryClient
 */

import { describe, test, expect, beforeEach } from "vitest";
import { MemoryClient } from "../client.js";
import { MAX_TEXT_LENGTH, isJsonValue, metadataFromJson, metadataToJson } from "../record.js";
import {
  FAKE_DIMENSIONS,
  FakeEmbedder,
  InMemoryMemoryRepository,
  createTestLogger,
  tickingClock,
} from "./fakes.js";

describe("MemoryClient", () => {
  let repository: InMemoryMemoryRepository;
  let embedder: FakeEmbedder;
  let logger: ReturnType<typeof createTestLogger>;
  let client: MemoryClient;

  beforeEach(() => {
    repository = new InMemoryMemoryRepository();
    embedder = new FakeEmbedder();
    logger = createTestLogger();
    client = new MemoryClient({
      agentId: "fork-main",
      embedder,
      repository,
      logger,
      dimensions: FAKE_DIMENSIONS,
      now: tickingClock(),
    });
  });

  test("store returns a receipt with no token cost", async () => {
    const receipt = await client.store("PREFERENCE - Colors: fork prefers blue.");

    expect(receipt.id).toMatch(/^mem_[0-9a-f]{12}$/);
    expect(receipt).toMatchObject({
      text: "PREFERENCE - Colors: fork prefers blue.",
      createdAt: "2025-12-09T13:45:00Z",
      tokensUsed: 0,
    });
  });

  test("get returns what was stored", async () => {
    const metadata = metadataFromJson({
      context_type: "decision",
      conversation_id: "con_abc123",
      priority: 1,
      tags: ["infra"],
    });
    const { id } = await client.store("DECISION - Storage: use libSQL.", metadata);

    const { memory } = await client.get(id);

    expect(memory).toEqual({
      id,
      text: "DECISION - Storage: use libSQL.",
      metadata,
      createdAt: "2025-12-09T13:45:00Z",
    });
  });

  test("stamps records with the clock in epoch seconds", async () => {
    await client.store("note");
    expect(repository.rows).toHaveLength(1);
    expect(repository.rows[0].createdAt).toBe(1_765_287_900);
  });

  test("text over the limit fails before any network call", async () => {
    await expect(client.store("a".repeat(MAX_TEXT_LENGTH + 1))).rejects.toMatchObject({
      kind: "InvalidArgument",
    });
    expect(embedder.calls).toHaveLength(0);
    expect(repository.calls).toBe(0);
  });

  test("the text limit counts astral characters once", async () => {
    const text = "\u{1F600}".repeat(MAX_TEXT_LENGTH);

    const receipt = await client.store(text);

    expect(receipt.text).toBe(text);
    expect(repository.rows).toHaveLength(1);
    await expect(client.store(`${text}\u{1F600}`)).rejects.toMatchObject({
      kind: "InvalidArgument",
      message: `Text exceeds ${MAX_TEXT_LENGTH} character limit (${MAX_TEXT_LENGTH + 1})`,
    });
  });

  test("a __proto__ metadata key survives store and get", async () => {
    const parsed: unknown = JSON.parse('{"__proto__":{"a":1},"k":"v"}');
    if (!isJsonValue(parsed) || typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error("fixture is not a JSON object");
    }
    const { id } = await client.store("note", metadataFromJson(parsed));

    const { memory } = await client.get(id);

    expect(Object.keys(memory.metadata.extra)).toEqual(["__proto__", "k"]);
    expect(Object.getOwnPropertyDescriptor(memory.metadata.extra, "__proto__")?.value).toEqual({ a: 1 });
    expect(JSON.stringify(metadataToJson(memory.metadata))).toBe('{"__proto__":{"a":1},"k":"v"}');
    expect(repository.rows[0].metadataJson).toBe('{"__proto__":{"a":1},"k":"v"}');
  });

  test("get of an unknown id is NotFound", async () => {
    await expect(client.get("mem_ffffffffffff")).rejects.toMatchObject({
      kind: "NotFound",
      message: "Memory not found: mem_ffffffffffff",
    });
  });

  test("delete then get is NotFound", async () => {
    const { id } = await client.store("short lived");

    await client.delete(id);

    await expect(client.get(id)).rejects.toMatchObject({ kind: "NotFound" });
  });

  test("deleting an absent id succeeds", async () => {
    await expect(client.delete("mem_ffffffffffff")).resolves.toBeUndefined();
  });

  test("another agent cannot read or delete the record", async () => {
    const { id } = await client.store("private");
    const other = new MemoryClient({ agentId: "fork-side", embedder, repository, logger });

    await expect(other.get(id)).rejects.toMatchObject({ kind: "NotFound" });
    await other.delete(id);
    await expect(client.get(id)).resolves.toMatchObject({ memory: { id } });
  });

  test("stats of an empty agent", async () => {
    await expect(client.getStats()).resolves.toEqual({
      agentId: "fork-main",
      namespace: "agent_fork-main",
      memoryCount: 0,
      firstMemoryAt: null,
      lastMemoryAt: null,
    });
  });

  test("stats span first and last memory", async () => {
    await client.store("one");
    await client.store("two");

    await expect(client.getStats()).resolves.toEqual({
      agentId: "fork-main",
      namespace: "agent_fork-main",
      memoryCount: 2,
      firstMemoryAt: "2025-12-09T13:45:00Z",
      lastMemoryAt: "2025-12-09T13:45:01Z",
    });
  });

  test("health is healthy only when both services answer", async () => {
    await expect(client.healthCheck()).resolves.toEqual({
      status: "healthy",
      embeddings: "up",
      store: "up",
    });

    repository.up = false;
    await expect(client.healthCheck()).resolves.toEqual({
      status: "degraded",
      embeddings: "up",
      store: "down",
    });
    expect(logger.warn).toHaveBeenCalledWith("agent-recall: degraded (embeddings: up, store: down)");
  });

  test("ensureSchema sizes the store to the embedding dimension", async () => {
    await client.ensureSchema();
    expect(repository.schemaDimensions).toBe(FAKE_DIMENSIONS);
  });

  test("ensureSchema needs a configured dimension", async () => {
    const bare = new MemoryClient({ agentId: "fork-main", embedder, repository, logger });
    await expect(bare.ensureSchema()).rejects.toMatchObject({ kind: "InvalidArgument" });
  });
});
