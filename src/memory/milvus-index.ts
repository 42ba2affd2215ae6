import { DataType, ErrorCode, LoadState, MilvusClient } from "@zilliz/milvus2-sdk-node";

import { UnavailableError } from "../errors.js";
import type { Logger } from "../log.js";
import type { Tenant } from "./types.js";
import { recordHit, type CollectionLoadState, type IndexHit, type IndexRow, type VectorIndex } from "./vector-index.js";

const USER_ID_MAX_LENGTH = 128;
const CONTENT_MAX_LENGTH = 65535;
const TIMESTAMP_MAX_LENGTH = 64;

const OUTPUT_FIELDS = ["user_id", "content", "timestamp", "sequence_index", "embedding"];

export type MilvusIndexConfig = {
  address: string;
  token?: string;
  collection: string;
  timeoutMs?: number;
  logger: Logger;
};

type Status = { error_code: string | number; reason: string };

/**
 * Milvus-backed index. One collection holds every tenant; rows are
 * partitioned by the `user_id` scalar field and every search filters on it.
 */
export class MilvusIndex implements VectorIndex {
  readonly name = "milvus";
  private readonly address: string;
  private readonly token?: string;
  private readonly collection: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private client: MilvusClient | null = null;

  constructor(config: MilvusIndexConfig) {
    this.address = config.address;
    this.token = config.token;
    this.collection = config.collection;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.logger = config.logger.child({ component: "milvus", collection: config.collection });
  }

  async connect(): Promise<void> {
    // The SDK reuses its channel, so an existing client is kept rather than recreated.
    const client =
      this.client ?? new MilvusClient({ address: this.address, token: this.token, timeout: this.timeoutMs });
    this.client = client;
    const health = await client.checkHealth();
    if (!health.isHealthy) {
      throw new UnavailableError("index", `milvus unhealthy: ${health.reasons.join(", ") || "unknown"}`);
    }
  }

  async hasCollection(): Promise<boolean> {
    const res = await this.requireClient().hasCollection({ collection_name: this.collection });
    assertOk(res.status, "hasCollection");
    return Boolean(res.value);
  }

  async loadState(): Promise<CollectionLoadState> {
    const res = await this.requireClient().getLoadState({ collection_name: this.collection });
    assertOk(res.status, "getLoadState");
    switch (res.state) {
      case LoadState.LoadStateLoaded:
        return "loaded";
      case LoadState.LoadStateLoading:
        return "loading";
      case LoadState.LoadStateNotExist:
        return "not_exist";
      default:
        return "not_loaded";
    }
  }

  async createCollection(dim: number): Promise<void> {
    const client = this.requireClient();
    assertOk(
      await client.createCollection({
        collection_name: this.collection,
        description: "Multi-tenant conversation memory",
        fields: [
          { name: "id", data_type: DataType.Int64, is_primary_key: true, autoID: true },
          { name: "user_id", data_type: DataType.VarChar, max_length: USER_ID_MAX_LENGTH },
          { name: "content", data_type: DataType.VarChar, max_length: CONTENT_MAX_LENGTH },
          { name: "timestamp", data_type: DataType.VarChar, max_length: TIMESTAMP_MAX_LENGTH },
          { name: "sequence_index", data_type: DataType.Int64 },
          { name: "embedding", data_type: DataType.FloatVector, dim },
        ],
      }),
      "createCollection",
    );
    assertOk(
      await client.createIndex({
        collection_name: this.collection,
        field_name: "embedding",
        index_type: "IVF_FLAT",
        metric_type: "COSINE",
        params: { nlist: 128 },
      }),
      "createIndex(embedding)",
    );
    assertOk(
      await client.createIndex({ collection_name: this.collection, field_name: "user_id" }),
      "createIndex(user_id)",
    );
    this.logger.info({ dim }, "collection created");
  }

  async load(): Promise<void> {
    assertOk(await this.requireClient().loadCollectionSync({ collection_name: this.collection }), "load");
    this.logger.info("collection loaded");
  }

  async insert(rows: IndexRow[]): Promise<number> {
    const client = this.requireClient();
    const res = await client.insert({ collection_name: this.collection, data: rows });
    assertOk(res.status, "insert");
    await client.flushSync({ collection_names: [this.collection] });
    return Number(res.insert_cnt);
  }

  async search(tenant: Tenant, vector: number[], topK: number): Promise<IndexHit[]> {
    const res = await this.requireClient().search({
      collection_name: this.collection,
      data: vector,
      limit: topK,
      filter: `user_id == "${tenant}"`,
      output_fields: OUTPUT_FIELDS,
      params: { nprobe: 16 },
    });
    assertOk(res.status, "search");
    return flattenResults(res.results).map((row) => recordHit(Number(row.score ?? 0), row));
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await client.closeConnection();
  }

  private requireClient(): MilvusClient {
    if (!this.client) {
      throw new UnavailableError("index", "milvus client not connected");
    }
    return this.client;
  }
}

function assertOk(status: Status, operation: string): void {
  if (status.error_code !== ErrorCode.SUCCESS) {
    throw new UnavailableError("index", `milvus ${operation} failed: ${status.reason || String(status.error_code)}`);
  }
}

/**
 * Single-vector searches come back flat or nested one level depending on the
 * SDK release.
 */
function flattenResults(results: unknown): Array<Record<string, unknown>> {
  if (!Array.isArray(results)) return [];
  const rows: Array<Record<string, unknown>> = [];
  for (const item of results) {
    if (Array.isArray(item)) {
      rows.push(...item.filter(isRecord));
    } else if (isRecord(item)) {
      rows.push(item);
    }
  }
  return rows;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
