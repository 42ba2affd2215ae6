import { UnavailableError } from "../errors.js";
import { cosineSimilarity } from "./embeddings.js";
import type { Tenant } from "./types.js";
import { recordHit, type CollectionLoadState, type IndexHit, type IndexRow, type VectorIndex } from "./vector-index.js";

type Operation = "connect" | "hasCollection" | "loadState" | "createCollection" | "load" | "insert" | "search" | "close";

type StoredRow = IndexRow & { id: number };

/**
 * Exact-search index kept in process memory, partitioned by tenant.
 * Used for local runs without a vector server and as a scriptable backend
 * in tests (call counts, forced failures, initial load state).
 */
export class InMemoryIndex implements VectorIndex {
  readonly name = "memory";
  readonly calls: Record<Operation, number> = {
    connect: 0,
    hasCollection: 0,
    loadState: 0,
    createCollection: 0,
    load: 0,
    insert: 0,
    search: 0,
    close: 0,
  };

  private readonly rows = new Map<Tenant, StoredRow[]>();
  private readonly failing = new Set<Operation>();
  private collection: { dim: number; loaded: boolean } | null = null;
  private nextId = 1;
  private available = true;
  private connectDelayMs = 0;

  /**
   * Start with an existing collection, optionally already loaded
   */
  static withCollection(dim: number, loaded: boolean): InMemoryIndex {
    const index = new InMemoryIndex();
    index.collection = { dim, loaded };
    return index;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  failOn(operation: Operation, fail = true): void {
    if (fail) this.failing.add(operation);
    else this.failing.delete(operation);
  }

  setConnectDelay(ms: number): void {
    this.connectDelayMs = ms;
  }

  count(tenant?: Tenant): number {
    if (tenant !== undefined) return this.rows.get(tenant)?.length ?? 0;
    let total = 0;
    for (const rows of this.rows.values()) total += rows.length;
    return total;
  }

  async connect(): Promise<void> {
    this.check("connect");
    if (this.connectDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.connectDelayMs));
    }
  }

  async hasCollection(): Promise<boolean> {
    this.check("hasCollection");
    return this.collection !== null;
  }

  async loadState(): Promise<CollectionLoadState> {
    this.check("loadState");
    if (!this.collection) return "not_exist";
    return this.collection.loaded ? "loaded" : "not_loaded";
  }

  async createCollection(dim: number): Promise<void> {
    this.check("createCollection");
    if (!this.collection) this.collection = { dim, loaded: false };
  }

  async load(): Promise<void> {
    this.check("load");
    if (!this.collection) {
      throw new UnavailableError("index", "collection does not exist");
    }
    this.collection.loaded = true;
  }

  async insert(rows: IndexRow[]): Promise<number> {
    this.check("insert");
    const collection = this.requireLoaded();
    for (const row of rows) {
      if (row.embedding.length !== collection.dim) {
        throw new UnavailableError("index", `vector dim ${row.embedding.length} != ${collection.dim}`);
      }
    }
    for (const row of rows) {
      const tenantRows = this.rows.get(row.user_id) ?? [];
      tenantRows.push({ ...row, embedding: [...row.embedding], id: this.nextId++ });
      this.rows.set(row.user_id, tenantRows);
    }
    return rows.length;
  }

  async search(tenant: Tenant, vector: number[], topK: number): Promise<IndexHit[]> {
    this.check("search");
    this.requireLoaded();
    const tenantRows = this.rows.get(tenant) ?? [];
    return tenantRows
      .map((row) => ({ row, score: cosineSimilarity(vector, row.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(({ row, score }) => recordHit(score, { ...row }));
  }

  async close(): Promise<void> {
    this.calls.close += 1;
  }

  private check(operation: Operation): void {
    this.calls[operation] += 1;
    if (!this.available || this.failing.has(operation)) {
      throw new UnavailableError("index", `in-memory index ${operation} failed`);
    }
  }

  private requireLoaded(): { dim: number; loaded: boolean } {
    if (!this.collection?.loaded) {
      throw new UnavailableError("index", "collection not loaded");
    }
    return this.collection;
  }
}
