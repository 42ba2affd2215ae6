/**
 * Reranking
 *
 * Candidates from the vector index are reordered by the first strategy that
 * succeeds: the external reranker, then cosine similarity over embeddings,
 * then the original search order. The chain itself never rejects.
 */

import { z } from "zod";

import { describeError, isTimeoutError, UnavailableError } from "../errors.js";
import type { Logger } from "../log.js";
import { deadlineSignal, withTimeout } from "../utils/signals.js";
import { cosineSimilarity } from "./embeddings.js";
import type {
  CandidateSource,
  EmbeddingProvider,
  RerankProvider,
  RerankScore,
  RetrievedCandidate,
} from "./types.js";

// ============================================================================
// HTTP reranker
// ============================================================================

const RerankArraySchema = z.array(z.object({ index: z.number().int(), score: z.number() }));

const RerankResultsSchema = z.object({
  results: z.array(z.object({ index: z.number().int(), relevance_score: z.number() })),
});

export type HttpRerankConfig = {
  url: string;
  timeoutMs?: number;
};

/**
 * Client for a reranking service taking `{query, texts}`.
 */
export class HttpRerankProvider implements RerankProvider {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(config: HttpRerankConfig) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? 1_500;
  }

  async rerank(query: string, texts: string[], signal?: AbortSignal): Promise<RerankScore[]> {
    // Some rerankers reject empty strings, so only non-blank texts are sent.
    const positions: number[] = [];
    const sent: string[] = [];
    texts.forEach((text, index) => {
      if (text.trim()) {
        positions.push(index);
        sent.push(text);
      }
    });
    if (sent.length === 0) {
      throw new UnavailableError("reranker", "no non-empty candidate texts to rerank");
    }

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ query, texts: sent }),
        signal: deadlineSignal(this.timeoutMs, signal),
      });
    } catch (err) {
      const reason = isTimeoutError(err) ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      throw new UnavailableError("reranker", `rerank request failed: ${reason}`, err);
    }
    if (!response.ok) {
      const body = await response.text();
      throw new UnavailableError("reranker", `rerank request failed: ${response.status} ${body}`);
    }

    const scores = parseRerankResponse(await response.json());
    const mapped: RerankScore[] = [];
    for (const item of scores) {
      const original = positions[item.index];
      if (original !== undefined) mapped.push({ index: original, score: item.score });
    }
    return mapped;
  }
}

export function parseRerankResponse(body: unknown): RerankScore[] {
  const bare = RerankArraySchema.safeParse(body);
  if (bare.success) return bare.data;
  const wrapped = RerankResultsSchema.safeParse(body);
  if (wrapped.success) {
    return wrapped.data.results.map((item) => ({ index: item.index, score: item.relevance_score }));
  }
  throw new UnavailableError("reranker", "rerank response malformed");
}

// ============================================================================
// Strategy chain
// ============================================================================

export type RerankStrategy = {
  source: CandidateSource;
  timeoutMs: number;
  /** Candidates reordered and rescored; may be longer than topN */
  run(query: string, candidates: RetrievedCandidate[], signal: AbortSignal): Promise<RetrievedCandidate[]>;
};

export type RerankChainOptions = {
  reranker?: RerankProvider;
  embeddings?: EmbeddingProvider;
  rerankTimeoutMs?: number;
  cosineTimeoutMs?: number;
  logger: Logger;
};

export type RerankStats = Record<CandidateSource, number>;

export class RerankChain {
  private readonly strategies: RerankStrategy[];
  private readonly logger: Logger;
  private readonly stats: RerankStats = { vector_index: 0, reranker: 0, embedding_cosine: 0, raw_order: 0 };

  constructor(options: RerankChainOptions) {
    this.logger = options.logger.child({ component: "rerank" });
    const strategies: RerankStrategy[] = [];
    if (options.reranker) {
      strategies.push(rerankerStrategy(options.reranker, options.rerankTimeoutMs ?? 1_500));
    }
    if (options.embeddings) {
      strategies.push(cosineStrategy(options.embeddings, options.cosineTimeoutMs ?? 2_000));
    }
    this.strategies = strategies;
  }

  async rerank(query: string, candidates: RetrievedCandidate[], topN: number): Promise<RetrievedCandidate[]> {
    if (candidates.length === 0 || topN <= 0) return [];

    for (const strategy of this.strategies) {
      const ranked = await this.attempt(strategy, query, candidates);
      if (ranked) {
        this.stats[strategy.source] += 1;
        return ranked.slice(0, topN);
      }
    }

    this.stats.raw_order += 1;
    this.logger.warn({ candidates: candidates.length }, "all rerank strategies failed, keeping search order");
    return candidates.slice(0, topN).map((candidate) => ({ ...candidate, source: "raw_order" }));
  }

  getStats(): RerankStats {
    return { ...this.stats };
  }

  private async attempt(
    strategy: RerankStrategy,
    query: string,
    candidates: RetrievedCandidate[],
  ): Promise<RetrievedCandidate[] | null> {
    const start = Date.now();
    const signal = deadlineSignal(strategy.timeoutMs);
    try {
      const ranked = await withTimeout(
        strategy.run(query, candidates, signal),
        strategy.timeoutMs,
        `${strategy.source} timed out after ${strategy.timeoutMs}ms`,
      );
      this.logger.debug(
        { source: strategy.source, candidates: candidates.length, durationMs: Date.now() - start },
        "rerank succeeded",
      );
      return ranked;
    } catch (err) {
      this.logger.warn(
        { source: strategy.source, durationMs: Date.now() - start, error: describeError(err) },
        "rerank strategy failed, falling through",
      );
      return null;
    }
  }
}

function rerankerStrategy(provider: RerankProvider, timeoutMs: number): RerankStrategy {
  return {
    source: "reranker",
    timeoutMs,
    async run(query, candidates, signal) {
      const scores = await provider.rerank(
        query,
        candidates.map((candidate) => candidate.content),
        signal,
      );
      if (scores.length === 0) {
        throw new UnavailableError("reranker", "reranker returned no scores");
      }
      const seen = new Set<number>();
      const ranked: RetrievedCandidate[] = [];
      for (const { index, score } of [...scores].sort((a, b) => b.score - a.score)) {
        const candidate = candidates[index];
        if (!candidate || seen.has(index)) continue;
        seen.add(index);
        ranked.push({ ...candidate, score, source: "reranker" });
      }
      return ranked;
    },
  };
}

function cosineStrategy(provider: EmbeddingProvider, timeoutMs: number): RerankStrategy {
  return {
    source: "embedding_cosine",
    timeoutMs,
    async run(query, candidates, signal) {
      // Reuse stored embeddings; only the query and candidates without one are embedded.
      const missing = candidates.flatMap((candidate, index) => (candidate.embedding?.length ? [] : [index]));
      const vectors = await provider.embed(
        [query, ...missing.map((index) => candidates[index]?.content ?? "")],
        signal,
      );
      const queryVector = vectors[0];
      if (!queryVector || queryVector.length === 0) {
        throw new UnavailableError("embedding", "query embedding missing");
      }
      const fresh = new Map<number, number[]>();
      missing.forEach((candidateIndex, i) => fresh.set(candidateIndex, vectors[i + 1] ?? []));

      return candidates
        .map((candidate, index) => ({
          ...candidate,
          score: cosineSimilarity(queryVector, candidate.embedding?.length ? candidate.embedding : fresh.get(index) ?? []),
          source: "embedding_cosine" as const,
        }))
        .sort((a, b) => b.score - a.score);
    },
  };
}
