import { beforeEach, describe, expect, it, vi } from "vitest";

import { UnavailableError } from "../../../src/errors.js";
import { createSilentLogger } from "../../../src/log.js";

const OK = { error_code: "Success", reason: "" };

const { clientMock, MilvusClientMock } = vi.hoisted(() => {
  const clientMock = {
    checkHealth: vi.fn(),
    hasCollection: vi.fn(),
    getLoadState: vi.fn(),
    createCollection: vi.fn(),
    createIndex: vi.fn(),
    loadCollectionSync: vi.fn(),
    insert: vi.fn(),
    flushSync: vi.fn(),
    search: vi.fn(),
    closeConnection: vi.fn(),
  };
  // A function expression so the SDK can construct it with `new`.
  const MilvusClientMock = vi.fn(function () {
    return clientMock;
  });
  return { clientMock, MilvusClientMock };
});

vi.mock("@zilliz/milvus2-sdk-node", () => ({
  MilvusClient: MilvusClientMock,
  DataType: { Int64: 5, VarChar: 21, FloatVector: 101 },
  ErrorCode: { SUCCESS: "Success" },
  LoadState: {
    LoadStateNotExist: "LoadStateNotExist",
    LoadStateNotLoad: "LoadStateNotLoad",
    LoadStateLoading: "LoadStateLoading",
    LoadStateLoaded: "LoadStateLoaded",
  },
}));

import { MilvusIndex } from "../../../src/memory/milvus-index.js";

function createIndex(): MilvusIndex {
  return new MilvusIndex({
    address: "localhost:19530",
    token: "test-secret",
    collection: "memories",
    timeoutMs: 500,
    logger: createSilentLogger(),
  });
}

async function connected(): Promise<MilvusIndex> {
  const index = createIndex();
  await index.connect();
  return index;
}

describe("MilvusIndex", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clientMock.checkHealth.mockResolvedValue({ isHealthy: true, reasons: [] });
    clientMock.createCollection.mockResolvedValue(OK);
    clientMock.createIndex.mockResolvedValue(OK);
    clientMock.loadCollectionSync.mockResolvedValue(OK);
    clientMock.flushSync.mockResolvedValue({ status: OK });
    clientMock.closeConnection.mockResolvedValue(undefined);
  });

  it("connects once and checks health", async () => {
    const index = await connected();
    await index.connect();
    expect(MilvusClientMock).toHaveBeenCalledTimes(1);
    expect(MilvusClientMock).toHaveBeenCalledWith({ address: "localhost:19530", token: "test-secret", timeout: 500 });
    expect(clientMock.checkHealth).toHaveBeenCalledTimes(2);
  });

  it("rejects an unhealthy server", async () => {
    clientMock.checkHealth.mockResolvedValue({ isHealthy: false, reasons: ["querynode down"] });
    await expect(createIndex().connect()).rejects.toThrow("milvus unhealthy: querynode down");
  });

  it("refuses operations before connect", async () => {
    await expect(createIndex().hasCollection()).rejects.toBeInstanceOf(UnavailableError);
  });

  it("maps collection existence and load state", async () => {
    const index = await connected();
    clientMock.hasCollection.mockResolvedValue({ status: OK, value: true });
    clientMock.getLoadState.mockResolvedValue({ status: OK, state: "LoadStateLoaded" });
    await expect(index.hasCollection()).resolves.toBe(true);
    await expect(index.loadState()).resolves.toBe("loaded");

    clientMock.getLoadState.mockResolvedValue({ status: OK, state: "LoadStateNotLoad" });
    await expect(index.loadState()).resolves.toBe("not_loaded");
  });

  it("creates the collection schema and its indexes", async () => {
    const index = await connected();
    await index.createCollection(4);

    expect(clientMock.createCollection).toHaveBeenCalledWith(
      expect.objectContaining({
        collection_name: "memories",
        fields: [
          { name: "id", data_type: 5, is_primary_key: true, autoID: true },
          { name: "user_id", data_type: 21, max_length: 128 },
          { name: "content", data_type: 21, max_length: 65535 },
          { name: "timestamp", data_type: 21, max_length: 64 },
          { name: "sequence_index", data_type: 5 },
          { name: "embedding", data_type: 101, dim: 4 },
        ],
      }),
    );
    expect(clientMock.createIndex).toHaveBeenNthCalledWith(1, {
      collection_name: "memories",
      field_name: "embedding",
      index_type: "IVF_FLAT",
      metric_type: "COSINE",
      params: { nlist: 128 },
    });
    expect(clientMock.createIndex).toHaveBeenNthCalledWith(2, { collection_name: "memories", field_name: "user_id" });
  });

  it("inserts rows, flushes and reports the count", async () => {
    const index = await connected();
    clientMock.insert.mockResolvedValue({ status: OK, insert_cnt: "2" });
    const rows = [
      { user_id: "u1", content: "a", timestamp: "t", sequence_index: 0, embedding: [1, 0] },
      { user_id: "u1", content: "b", timestamp: "t", sequence_index: 1, embedding: [0, 1] },
    ];

    await expect(index.insert(rows)).resolves.toBe(2);
    expect(clientMock.insert).toHaveBeenCalledWith({ collection_name: "memories", data: rows });
    expect(clientMock.flushSync).toHaveBeenCalledWith({ collection_names: ["memories"] });
  });

  it("filters searches by tenant and flattens nested results", async () => {
    const index = await connected();
    clientMock.search.mockResolvedValue({
      status: OK,
      results: [[{ score: 0.9, id: "7", user_id: "u1", content: "hello", timestamp: "t", sequence_index: 3 }]],
    });

    const hits = await index.search("u1", [1, 0], 5);

    expect(clientMock.search).toHaveBeenCalledWith(
      expect.objectContaining({ filter: 'user_id == "u1"', limit: 5, data: [1, 0] }),
    );
    expect(hits).toHaveLength(1);
    expect(hits[0]?.score).toBe(0.9);
    expect(hits[0]?.get("content")).toBe("hello");
    expect(hits[0]?.get("sequence_index")).toBe(3);
  });

  it("turns an error status into UnavailableError", async () => {
    const index = await connected();
    clientMock.loadCollectionSync.mockResolvedValue({ error_code: "UnexpectedError", reason: "no segments" });
    await expect(index.load()).rejects.toThrow("milvus load failed: no segments");
  });

  it("closes the client and forgets it", async () => {
    const index = await connected();
    await index.close();
    expect(clientMock.closeConnection).toHaveBeenCalledTimes(1);
    await expect(index.hasCollection()).rejects.toBeInstanceOf(UnavailableError);
  });
});
