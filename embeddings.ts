/**
 * Embedding gateway over an OpenAI-compatible endpoint.
 * Ollama exposes one at /v1, so the OpenAI SDK talks to a local model.
 */

import OpenAI from "openai";

import { MemoryError, describeError } from "./errors.js";
import type { MemoryConfig } from "./types.js";

export interface Embedder {
  embed(text: string): Promise<number[]>;
  /** Liveness probe; never throws */
  ping(): Promise<boolean>;
}

export class Embeddings implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly healthTimeoutMs: number;

  constructor(config: Pick<MemoryConfig, "embedding" | "requestTimeoutMs" | "healthTimeoutMs">) {
    this.client = new OpenAI({
      apiKey: config.embedding.apiKey,
      baseURL: config.embedding.baseUrl,
      timeout: config.requestTimeoutMs,
      // retry policy belongs to the caller
      maxRetries: 0,
    });
    this.model = config.embedding.model;
    this.dimensions = config.embedding.dimensions;
    this.healthTimeoutMs = config.healthTimeoutMs;
  }

  async embed(text: string): Promise<number[]> {
    let res: OpenAI.CreateEmbeddingResponse;
    try {
      res = await this.client.embeddings.create({
        model: this.model,
        input: text,
        encoding_format: "float",
      });
    } catch (err) {
      throw new MemoryError("EmbeddingUnavailable", `Embedding request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const vector: unknown = res?.data?.[0]?.embedding;
    if (!Array.isArray(vector) || !vector.every((v): v is number => typeof v === "number" && Number.isFinite(v))) {
      throw new MemoryError("EmbeddingUnavailable", "Embedding response did not contain a numeric vector");
    }
    if (vector.length !== this.dimensions) {
      throw new MemoryError(
        "EmbeddingUnavailable",
        `Embedding has ${vector.length} dimensions, expected ${this.dimensions}`,
      );
    }
    return vector;
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.models.list({ timeout: this.healthTimeoutMs });
      return true;
    } catch {
      return false;
    }
  }
}
