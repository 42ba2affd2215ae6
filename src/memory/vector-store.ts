/**
 * Vector Store Client
 *
 * Lazily connecting, tenant-filtered front for a VectorIndex backend.
 *
 * State machine: disconnected -> connecting -> connected. A failed operation
 * drops back to disconnected; the next insert or search pulls a reconnect.
 * Nothing reconnects on a timer.
 */

import { DimensionMismatchError, describeError, InvalidInputError, UnavailableError } from "../errors.js";
import type { Logger } from "../log.js";
import type { RetrievedCandidate, Tenant, VectorRecord } from "./types.js";
import type { IndexHit, VectorIndex } from "./vector-index.js";

export type ConnectionState = "disconnected" | "connecting" | "connected";

export type VectorStoreOptions = {
  index: VectorIndex;
  dim: number;
  logger: Logger;
};

export class VectorStoreClient {
  private readonly index: VectorIndex;
  private readonly dim: number;
  private readonly logger: Logger;
  private state: ConnectionState = "disconnected";
  private connecting: Promise<void> | null = null;

  constructor(options: VectorStoreOptions) {
    this.index = options.index;
    this.dim = options.dim;
    this.logger = options.logger.child({ component: "vector-store", backend: options.index.name });
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Idempotent. Concurrent callers share one in-flight attempt. An already
   * loaded collection is not loaded again.
   */
  async connect(): Promise<void> {
    if (this.state === "connected") return;
    if (this.connecting) return this.connecting;

    this.state = "connecting";
    const attempt = this.openIndex().then(
      () => {
        this.state = "connected";
        this.logger.info({ dim: this.dim }, "vector index connected");
      },
      (err: unknown) => {
        this.state = "disconnected";
        this.logger.error({ error: describeError(err) }, "vector index connect failed");
        throw err instanceof UnavailableError ? err : new UnavailableError("index", describeError(err), err);
      },
    );
    this.connecting = attempt;
    try {
      await attempt;
    } finally {
      this.connecting = null;
    }
  }

  /**
   * Store records for one tenant. Returns the stored count, 0 when the index
   * is unavailable. Rejects only on a dimension mismatch, before anything
   * is written.
   */
  async insert(tenant: Tenant, records: VectorRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    for (const record of records) {
      if (record.embedding.length !== this.dim) {
        throw new DimensionMismatchError(this.dim, record.embedding.length);
      }
      if (record.tenant !== tenant || record.chunk.tenant !== tenant) {
        throw new InvalidInputError("record tenant does not match insert tenant", { tenant });
      }
    }

    if (!(await this.ensureConnected())) {
      this.logger.warn({ tenant, count: records.length }, "vector index unavailable, insert skipped");
      return 0;
    }

    try {
      const stored = await this.index.insert(
        records.map((record) => ({
          user_id: tenant,
          content: record.chunk.text,
          timestamp: record.timestamp,
          sequence_index: record.chunk.sequenceIndex,
          embedding: record.embedding,
        })),
      );
      this.logger.info({ tenant, count: stored }, "vectors stored");
      return stored;
    } catch (err) {
      this.markDisconnected("insert", err);
      return 0;
    }
  }

  /**
   * Nearest records for one tenant. Empty when the index is unavailable.
   */
  async search(tenant: Tenant, embedding: number[], topK: number): Promise<RetrievedCandidate[]> {
    if (embedding.length !== this.dim) {
      this.logger.warn({ tenant, expected: this.dim, actual: embedding.length }, "query vector has wrong dimension");
      return [];
    }
    if (!(await this.ensureConnected())) {
      this.logger.warn({ tenant }, "vector index unavailable, search skipped");
      return [];
    }

    let hits: IndexHit[];
    try {
      hits = await this.index.search(tenant, embedding, topK);
    } catch (err) {
      this.markDisconnected("search", err);
      return [];
    }

    const candidates: RetrievedCandidate[] = [];
    for (const hit of hits) {
      // The index filters by tenant; a hit without user_id is trusted to that filter.
      const owner = hit.get("user_id");
      if (owner != null && String(owner) !== tenant) {
        this.logger.error({ tenant, owner }, "index returned a hit for another tenant, dropped");
        continue;
      }
      candidates.push(toCandidate(hit, tenant));
    }
    this.logger.debug({ tenant, hits: candidates.length }, "vector search completed");
    return candidates;
  }

  /**
   * Reachability for health checks. Pulls a connect when disconnected.
   */
  async ping(): Promise<boolean> {
    return this.ensureConnected();
  }

  async close(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch(() => undefined);
    }
    this.state = "disconnected";
    await this.index.close();
  }

  private async ensureConnected(): Promise<boolean> {
    try {
      await this.connect();
      return true;
    } catch {
      return false;
    }
  }

  private async openIndex(): Promise<void> {
    await this.index.connect();
    if (!(await this.index.hasCollection())) {
      await this.index.createCollection(this.dim);
      await this.index.load();
      return;
    }
    const loadState = await this.index.loadState();
    if (loadState === "loaded") {
      this.logger.debug("collection already loaded, skipping load");
      return;
    }
    await this.index.load();
  }

  private markDisconnected(operation: string, err: unknown): void {
    this.state = "disconnected";
    this.logger.error({ operation, error: describeError(err) }, "vector index operation failed");
  }
}

function readString(hit: IndexHit, field: "id" | "content" | "timestamp"): string {
  const value = hit.get(field) ?? "";
  return typeof value === "string" ? value : String(value);
}

function readNumber(hit: IndexHit, field: "sequence_index"): number {
  const value = Number(hit.get(field) ?? 0);
  return Number.isFinite(value) ? value : 0;
}

function readVector(hit: IndexHit): number[] | undefined {
  const value = hit.get("embedding") ?? [];
  if (!Array.isArray(value) || value.length === 0) return undefined;
  return value.map((v: unknown) => (typeof v === "number" && Number.isFinite(v) ? v : 0));
}

function toCandidate(hit: IndexHit, tenant: Tenant): RetrievedCandidate {
  return {
    content: readString(hit, "content"),
    rawScore: hit.score,
    score: hit.score,
    source: "vector_index",
    metadata: {
      id: readString(hit, "id"),
      tenant,
      timestamp: readString(hit, "timestamp"),
      sequenceIndex: readNumber(hit, "sequence_index"),
    },
    embedding: readVector(hit),
  };
}
