/**
 * Embedding Generation
 *
 * OpenAI-compatible `/embeddings` client with batching, a per-call timeout
 * and an in-process cache keyed by model and text.
 */

import crypto from "node:crypto";

import { z } from "zod";

import { describeError, isTimeoutError, UnavailableError } from "../errors.js";
import { deadlineSignal } from "../utils/signals.js";
import type { EmbeddingProvider } from "./types.js";

export type { EmbeddingProvider } from "./types.js";

/**
 * Default batch size for embedding requests
 */
const DEFAULT_BATCH_SIZE = 32;

/**
 * Maximum cache entries before cleanup
 */
const MAX_CACHE_ENTRIES = 10000;

/**
 * Cache TTL in milliseconds (1 hour)
 */
const CACHE_TTL_MS = 60 * 60 * 1000;

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().optional(),
    }),
  ),
});

const embeddingCache = new Map<string, { embedding: number[]; timestamp: number }>();

export type OpenAIEmbeddingConfig = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  batchSize?: number;
};

/**
 * OpenAI-compatible embedding provider
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;

  constructor(config: OpenAIEmbeddingConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? 5_000;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const results: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      results.push(...(await this.embedBatch(batch, signal)));
    }
    return results;
  }

  getModel(): string {
    return this.model;
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: Array<number[] | null> = texts.map((text) => getCachedEmbedding(text, this.model));

    const uncachedIndices: number[] = [];
    const uncachedTexts: string[] = [];
    results.forEach((cached, index) => {
      if (cached === null) {
        uncachedIndices.push(index);
        uncachedTexts.push(texts[index] ?? "");
      }
    });

    if (uncachedTexts.length > 0) {
      const fresh = await this.fetchEmbeddings(uncachedTexts, signal);
      uncachedIndices.forEach((resultIndex, i) => {
        const embedding = fresh[i] ?? [];
        results[resultIndex] = embedding;
        setCachedEmbedding(uncachedTexts[i] ?? "", this.model, embedding);
      });
    }

    return results.map((embedding) => embedding ?? []);
  }

  private async fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: deadlineSignal(this.timeoutMs, signal),
      });
    } catch (err) {
      const reason = isTimeoutError(err) ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      throw new UnavailableError("embedding", `embedding request failed: ${reason}`, err);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new UnavailableError("embedding", `embedding request failed: ${response.status} ${body}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UnavailableError("embedding", `embedding response malformed: ${parsed.error.message}`);
    }
    const items = parsed.data.data;
    if (items.length !== texts.length) {
      throw new UnavailableError(
        "embedding",
        `embedding response had ${items.length} vectors for ${texts.length} inputs`,
      );
    }

    // Sort by index to ensure correct order
    const sorted = [...items].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return sorted.map((item) => sanitizeEmbedding(item.embedding));
  }
}

function sanitizeEmbedding(vec: number[]): number[] {
  return vec.map((v) => (Number.isFinite(v) ? v : 0));
}

/**
 * Generate cache key for text + model
 */
function cacheKey(text: string, model: string): string {
  return crypto.createHash("sha256").update(`${model}:${text}`).digest("hex").slice(0, 32);
}

function getCachedEmbedding(text: string, model: string): number[] | null {
  const key = cacheKey(text, model);
  const entry = embeddingCache.get(key);
  if (!entry) return null;
  if (Date.now() - entry.timestamp > CACHE_TTL_MS) {
    embeddingCache.delete(key);
    return null;
  }
  return entry.embedding;
}

function setCachedEmbedding(text: string, model: string, embedding: number[]): void {
  if (embedding.length === 0) return;
  if (embeddingCache.size >= MAX_CACHE_ENTRIES) {
    cleanupCache();
  }
  embeddingCache.set(cacheKey(text, model), { embedding, timestamp: Date.now() });
}

/**
 * Remove expired entries, then the oldest fifth if still near capacity
 */
function cleanupCache(): void {
  const now = Date.now();
  const entries: Array<{ key: string; timestamp: number }> = [];

  for (const [key, entry] of embeddingCache.entries()) {
    if (now - entry.timestamp > CACHE_TTL_MS) {
      embeddingCache.delete(key);
    } else {
      entries.push({ key, timestamp: entry.timestamp });
    }
  }

  if (embeddingCache.size >= MAX_CACHE_ENTRIES * 0.9) {
    entries.sort((a, b) => a.timestamp - b.timestamp);
    const toRemove = Math.floor(entries.length * 0.2);
    for (const entry of entries.slice(0, toRemove)) {
      embeddingCache.delete(entry.key);
    }
  }
}

export function clearEmbeddingCache(): void {
  embeddingCache.clear();
}

export function getEmbeddingCacheStats(): { size: number; maxSize: number } {
  return { size: embeddingCache.size, maxSize: MAX_CACHE_ENTRIES };
}

/**
 * Compute cosine similarity between two embeddings
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const va = a[i] ?? 0;
    const vb = b[i] ?? 0;
    dot += va * vb;
    normA += va * va;
    normB += vb * vb;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
