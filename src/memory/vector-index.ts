import type { Tenant } from "./types.js";

export type CollectionLoadState = "not_exist" | "not_loaded" | "loading" | "loaded";

/**
 * One stored row, in the index's own field names
 */
export type IndexRow = {
  user_id: Tenant;
  content: string;
  timestamp: string;
  sequence_index: number;
  embedding: number[];
};

export type IndexField = keyof IndexRow | "id";

/**
 * A search hit. Fields are read through `get`, which takes no default:
 * callers substitute their own with `??`.
 */
export interface IndexHit {
  score: number;
  get(field: IndexField): unknown;
}

/**
 * Narrow backend contract driven by VectorStoreClient. Every method may
 * reject when the backend is unreachable.
 */
export interface VectorIndex {
  readonly name: string;
  connect(): Promise<void>;
  hasCollection(): Promise<boolean>;
  loadState(): Promise<CollectionLoadState>;
  createCollection(dim: number): Promise<void>;
  load(): Promise<void>;
  insert(rows: IndexRow[]): Promise<number>;
  /** Hits for `tenant` only, best first */
  search(tenant: Tenant, vector: number[], topK: number): Promise<IndexHit[]>;
  close(): Promise<void>;
}

/**
 * Wrap a plain record as a hit
 */
export function recordHit(score: number, record: Record<string, unknown>): IndexHit {
  return {
    score,
    get: (field) => record[field],
  };
}
