import { afterEach, describe, expect, it, vi } from "vitest";

import { UnavailableError } from "../../../src/errors.js";
import { createSilentLogger } from "../../../src/log.js";
import { HttpRerankProvider, parseRerankResponse, RerankChain } from "../../../src/memory/rerank.js";
import type { RerankScore, RetrievedCandidate } from "../../../src/memory/types.js";
import {
  FailingRerankProvider,
  FixedRerankProvider,
  KeywordEmbeddingProvider,
  TableEmbeddingProvider,
} from "../../helpers/fakes.js";

function candidate(id: string, content: string, rawScore: number, embedding?: number[]): RetrievedCandidate {
  return {
    content,
    rawScore,
    score: rawScore,
    source: "vector_index",
    metadata: { id, tenant: "u1", timestamp: "2024-01-01T00:00:00.000Z", sequenceIndex: Number(id) },
    embedding,
  };
}

describe("parseRerankResponse", () => {
  it("accepts a bare score array", () => {
    expect(parseRerankResponse([{ index: 1, score: 0.5 }])).toEqual([{ index: 1, score: 0.5 }]);
  });

  it("accepts a results envelope", () => {
    expect(parseRerankResponse({ results: [{ index: 0, relevance_score: 0.25 }] })).toEqual([
      { index: 0, score: 0.25 },
    ]);
  });

  it("rejects anything else", () => {
    expect(() => parseRerankResponse({ scores: [1, 2] })).toThrow(UnavailableError);
  });
});

describe("HttpRerankProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("skips blank texts and maps indexes back", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(
        JSON.stringify([
          { index: 1, score: 0.9 },
          { index: 0, score: 0.1 },
        ]),
        { status: 200 },
      ),
    );
    vi.stubGlobal("fetch", fetchMock);
    const provider = new HttpRerankProvider({ url: "http://rerank.test/rerank" });

    const scores = await provider.rerank("q", ["a", "  ", "c"]);

    expect(scores).toEqual([
      { index: 2, score: 0.9 },
      { index: 0, score: 0.1 },
    ]);
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toEqual({ query: "q", texts: ["a", "c"] });
  });

  it("refuses to call the service with only blank texts", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const provider = new HttpRerankProvider({ url: "http://rerank.test/rerank" });
    await expect(provider.rerank("q", ["", " "])).rejects.toBeInstanceOf(UnavailableError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("RerankChain", () => {
  const candidates = [
    candidate("1", "orthogonal", 0.9, [0, 1]),
    candidate("2", "aligned", 0.8, [1, 0]),
    candidate("3", "diagonal", 0.7, [1, 1]),
  ];

  it("orders by reranker score and truncates to topN", async () => {
    const reranker = new FixedRerankProvider(() => [
      { index: 0, score: 0.2 },
      { index: 2, score: 0.95 },
      { index: 1, score: 0.5 },
    ]);
    const chain = new RerankChain({ reranker, logger: createSilentLogger() });

    const ranked = await chain.rerank("q", candidates, 2);

    expect(ranked.map((c) => [c.content, c.score, c.source])).toEqual([
      ["diagonal", 0.95, "reranker"],
      ["aligned", 0.5, "reranker"],
    ]);
    expect(ranked[0]?.rawScore).toBe(0.7);
    expect(chain.getStats().reranker).toBe(1);
  });

  it("falls back to cosine similarity when the reranker fails", async () => {
    const embeddings = new TableEmbeddingProvider({ q: [1, 0] });
    const chain = new RerankChain({
      reranker: new FailingRerankProvider(),
      embeddings,
      logger: createSilentLogger(),
    });

    const ranked = await chain.rerank("q", candidates, 3);

    expect(ranked.map((c) => c.content)).toEqual(["aligned", "diagonal", "orthogonal"]);
    expect(ranked.map((c) => c.source)).toEqual(["embedding_cosine", "embedding_cosine", "embedding_cosine"]);
    expect(ranked[0]?.score).toBeCloseTo(1);
    expect(ranked[1]?.score).toBeCloseTo(Math.SQRT1_2);
    expect(ranked[2]?.score).toBe(0);
    // Stored embeddings are reused, only the query is embedded.
    expect(embeddings.calls).toEqual([["q"]]);
  });

  it("embeds candidates that carry no stored embedding", async () => {
    const embeddings = new TableEmbeddingProvider({ q: [1, 0], fresh: [1, 0] });
    const chain = new RerankChain({ embeddings, logger: createSilentLogger() });

    const ranked = await chain.rerank("q", [candidate("1", "orthogonal", 0.9, [0, 1]), candidate("2", "fresh", 0.1)], 2);

    expect(ranked.map((c) => c.content)).toEqual(["fresh", "orthogonal"]);
    expect(embeddings.calls).toEqual([["q", "fresh"]]);
  });

  it("falls back to a reranker timeout before trying cosine", async () => {
    const slow = new FixedRerankProvider(() => new Promise<RerankScore[]>(() => undefined));
    const chain = new RerankChain({
      reranker: slow,
      embeddings: new TableEmbeddingProvider({ q: [1, 0] }),
      rerankTimeoutMs: 20,
      logger: createSilentLogger(),
    });

    const ranked = await chain.rerank("q", candidates, 1);

    expect(ranked.map((c) => [c.content, c.source])).toEqual([["aligned", "embedding_cosine"]]);
  });

  it("keeps search order when every strategy fails", async () => {
    const embeddings = new KeywordEmbeddingProvider();
    embeddings.failing = true;
    const chain = new RerankChain({
      reranker: new FailingRerankProvider(),
      embeddings,
      logger: createSilentLogger(),
    });

    const ranked = await chain.rerank("q", candidates, 2);

    expect(ranked.map((c) => [c.content, c.score, c.source])).toEqual([
      ["orthogonal", 0.9, "raw_order"],
      ["aligned", 0.8, "raw_order"],
    ]);
    expect(chain.getStats()).toEqual({ vector_index: 0, reranker: 0, embedding_cosine: 0, raw_order: 1 });
  });

  it("keeps search order when no strategy is configured", async () => {
    const chain = new RerankChain({ logger: createSilentLogger() });
    const ranked = await chain.rerank("q", candidates, 5);
    expect(ranked.map((c) => c.source)).toEqual(["raw_order", "raw_order", "raw_order"]);
  });

  it("returns nothing for no candidates or a non-positive topN", async () => {
    const reranker = new FixedRerankProvider(() => [{ index: 0, score: 1 }]);
    const chain = new RerankChain({ reranker, logger: createSilentLogger() });
    await expect(chain.rerank("q", [], 3)).resolves.toEqual([]);
    await expect(chain.rerank("q", candidates, 0)).resolves.toEqual([]);
    expect(reranker.calls).toEqual([]);
  });

  it("treats an empty reranker answer as a failure", async () => {
    const chain = new RerankChain({
      reranker: new FixedRerankProvider(() => []),
      logger: createSilentLogger(),
    });
    const ranked = await chain.rerank("q", candidates, 1);
    expect(ranked.map((c) => c.source)).toEqual(["raw_order"]);
  });
});
