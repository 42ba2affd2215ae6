import { describe, expect, it } from "vitest";

import { DimensionMismatchError, InvalidInputError, UnavailableError } from "../../../src/errors.js";
import { createSilentLogger } from "../../../src/log.js";
import { InMemoryIndex } from "../../../src/memory/in-memory-index.js";
import type { Tenant, VectorRecord } from "../../../src/memory/types.js";
import { recordHit, type IndexHit } from "../../../src/memory/vector-index.js";
import { VectorStoreClient } from "../../../src/memory/vector-store.js";

const AT = "2024-05-01T10:00:00.000Z";

function record(tenant: string, text: string, sequenceIndex: number, embedding: number[]): VectorRecord {
  return {
    chunk: { text, tenant, sourceTimestamp: AT, sequenceIndex },
    embedding,
    tenant,
    timestamp: AT,
  };
}

/** Returns fixed hits regardless of what is stored */
class FixedHitsIndex extends InMemoryIndex {
  private readonly hits: IndexHit[];

  constructor(hits: IndexHit[]) {
    super();
    this.hits = hits;
  }

  async search(_tenant: Tenant, _vector: number[], _topK: number): Promise<IndexHit[]> {
    return this.hits;
  }
}

function client(index: InMemoryIndex, dim = 3): VectorStoreClient {
  return new VectorStoreClient({ index, dim, logger: createSilentLogger() });
}

describe("VectorStoreClient", () => {
  describe("connect", () => {
    it("creates and loads a missing collection once", async () => {
      const index = new InMemoryIndex();
      const store = client(index);

      await store.connect();
      await store.connect();

      expect(store.getState()).toBe("connected");
      expect(index.calls.connect).toBe(1);
      expect(index.calls.createCollection).toBe(1);
      expect(index.calls.load).toBe(1);
    });

    it("does not load an already loaded collection", async () => {
      const index = InMemoryIndex.withCollection(3, true);
      await client(index).connect();
      expect(index.calls.loadState).toBe(1);
      expect(index.calls.load).toBe(0);
      expect(index.calls.createCollection).toBe(0);
    });

    it("loads an existing collection that is not loaded", async () => {
      const index = InMemoryIndex.withCollection(3, false);
      await client(index).connect();
      expect(index.calls.load).toBe(1);
    });

    it("shares one in-flight attempt between concurrent callers", async () => {
      const index = new InMemoryIndex();
      index.setConnectDelay(20);
      const store = client(index);

      await Promise.all([
        store.connect(),
        store.connect(),
        store.insert("u1", [record("u1", "hello", 0, [1, 0, 0])]),
        store.search("u1", [1, 0, 0], 5),
      ]);

      expect(index.calls.connect).toBe(1);
      expect(index.calls.load).toBe(1);
    });

    it("rejects with UnavailableError when the backend is down", async () => {
      const index = new InMemoryIndex();
      index.setAvailable(false);
      const store = client(index);
      await expect(store.connect()).rejects.toBeInstanceOf(UnavailableError);
      expect(store.getState()).toBe("disconnected");
    });
  });

  describe("insert", () => {
    it("stores records and reports the count", async () => {
      const index = new InMemoryIndex();
      const store = client(index);
      const stored = await store.insert("u1", [
        record("u1", "first", 0, [1, 0, 0]),
        record("u1", "second", 1, [0, 1, 0]),
      ]);
      expect(stored).toBe(2);
      expect(index.count("u1")).toBe(2);
    });

    it("returns 0 for no records without connecting", async () => {
      const index = new InMemoryIndex();
      await expect(client(index).insert("u1", [])).resolves.toBe(0);
      expect(index.calls.connect).toBe(0);
    });

    it("rejects a dimension mismatch before writing anything", async () => {
      const index = new InMemoryIndex();
      const store = client(index);
      await expect(
        store.insert("u1", [record("u1", "ok", 0, [1, 0, 0]), record("u1", "bad", 1, [1, 0])]),
      ).rejects.toBeInstanceOf(DimensionMismatchError);
      expect(index.count()).toBe(0);
      expect(index.calls.insert).toBe(0);
    });

    it("rejects records that belong to another tenant", async () => {
      const store = client(new InMemoryIndex());
      await expect(store.insert("u1", [record("u2", "x", 0, [1, 0, 0])])).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });

    it("returns 0 when the backend is unavailable", async () => {
      const index = new InMemoryIndex();
      index.setAvailable(false);
      const store = client(index);
      await expect(store.insert("u1", [record("u1", "x", 0, [1, 0, 0])])).resolves.toBe(0);
    });

    it("drops to disconnected when an insert fails, and reconnects on the next call", async () => {
      const index = new InMemoryIndex();
      const store = client(index);
      await store.connect();

      index.failOn("insert");
      await expect(store.insert("u1", [record("u1", "x", 0, [1, 0, 0])])).resolves.toBe(0);
      expect(store.getState()).toBe("disconnected");

      index.failOn("insert", false);
      await expect(store.insert("u1", [record("u1", "x", 0, [1, 0, 0])])).resolves.toBe(1);
      expect(index.calls.connect).toBe(2);
      expect(index.calls.load).toBe(1);
    });
  });

  describe("search", () => {
    it("returns candidates best first with metadata and stored embeddings", async () => {
      const store = client(new InMemoryIndex());
      await store.insert("u1", [
        record("u1", "east", 0, [1, 0, 0]),
        record("u1", "north", 1, [0, 1, 0]),
      ]);

      const results = await store.search("u1", [0, 1, 0], 5);

      expect(results.map((c) => c.content)).toEqual(["north", "east"]);
      expect(results[0]).toEqual({
        content: "north",
        rawScore: 1,
        score: 1,
        source: "vector_index",
        metadata: { id: "2", tenant: "u1", timestamp: AT, sequenceIndex: 1 },
        embedding: [0, 1, 0],
      });
    });

    it("never returns another tenant's records", async () => {
      const store = client(new InMemoryIndex());
      await store.insert("u1", [record("u1", "mine", 0, [1, 0, 0])]);
      await store.insert("u2", [record("u2", "theirs", 0, [1, 0, 0])]);

      const results = await store.search("u1", [1, 0, 0], 10);

      expect(results.map((c) => c.content)).toEqual(["mine"]);
    });

    it("keeps a hit whose optional fields the backend left unset", async () => {
      const store = client(new FixedHitsIndex([recordHit(0.8, { content: "bare" })]));

      const results = await store.search("u1", [1, 0, 0], 5);

      expect(results).toEqual([
        {
          content: "bare",
          rawScore: 0.8,
          score: 0.8,
          source: "vector_index",
          metadata: { id: "", tenant: "u1", timestamp: "", sequenceIndex: 0 },
          embedding: undefined,
        },
      ]);
    });

    it("drops a hit that names a different tenant", async () => {
      const store = client(
        new FixedHitsIndex([
          recordHit(0.9, { content: "theirs", user_id: "u2" }),
          recordHit(0.5, { content: "mine", user_id: "u1" }),
        ]),
      );

      const results = await store.search("u1", [1, 0, 0], 5);

      expect(results.map((c) => c.content)).toEqual(["mine"]);
    });

    it("returns nothing for a query of the wrong dimension", async () => {
      const index = new InMemoryIndex();
      await expect(client(index).search("u1", [1, 0], 5)).resolves.toEqual([]);
      expect(index.calls.search).toBe(0);
    });

    it("returns nothing while the backend is unavailable, then recovers", async () => {
      const index = new InMemoryIndex();
      const store = client(index);
      await store.insert("u1", [record("u1", "kept", 0, [1, 0, 0])]);

      index.failOn("search");
      await expect(store.search("u1", [1, 0, 0], 5)).resolves.toEqual([]);
      expect(store.getState()).toBe("disconnected");

      index.failOn("search", false);
      const results = await store.search("u1", [1, 0, 0], 5);
      expect(results.map((c) => c.content)).toEqual(["kept"]);
      expect(store.getState()).toBe("connected");
    });
  });

  describe("ping and close", () => {
    it("reports reachability", async () => {
      const index = new InMemoryIndex();
      const store = client(index);
      await expect(store.ping()).resolves.toBe(true);
      index.setAvailable(false);
      await store.close();
      await expect(store.ping()).resolves.toBe(false);
      expect(index.calls.close).toBe(1);
    });
  });
});
