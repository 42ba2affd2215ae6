/**
 * Memory Orchestrator
 *
 * The two public operations. Query never fails on a collaborator outage: each
 * stage degrades to an empty result. Upload fails only on invalid input;
 * the vector path may be skipped but history is always appended.
 */

import { DimensionMismatchError, describeError, InvalidInputError } from "../errors.js";
import type { Logger } from "../log.js";
import { chunkTexts, createChunks, type ChunkOptions } from "./chunker.js";
import type { ConversationLog } from "./conversation-log.js";
import type { HistoryStore } from "./history-store.js";
import type { ProfileStore } from "./profile-store.js";
import type { RerankChain } from "./rerank.js";
import type { SequenceAllocator } from "./sequence.js";
import { assertTenant } from "./tenant.js";
import type { TenantLanes } from "./tenant-lanes.js";
import type {
  ConversationMessage,
  EmbeddingProvider,
  HistorySnapshot,
  QueryResult,
  RetrievedCandidate,
  RetrievedChunk,
  Tenant,
  UploadInput,
  UploadResult,
  VectorRecord,
  VectorStatus,
} from "./types.js";
import type { VectorStoreClient } from "./vector-store.js";

export const NO_MEMORY_MARKER = "(no memory or user profile available yet)";

const BASE64_RE = /^[A-Za-z0-9+/_=\s-]*$/;
const ROLES = new Set(["user", "assistant"]);

export type MemoryOrchestratorOptions = {
  embeddings: EmbeddingProvider;
  vectorStore: VectorStoreClient;
  rerank: RerankChain;
  history: HistoryStore;
  profile: ProfileStore;
  sequence: SequenceAllocator;
  lanes: TenantLanes;
  audit?: ConversationLog;
  chunking: ChunkOptions;
  topK: number;
  topN: number;
  logger: Logger;
};

export type OrchestratorStats = {
  queries: number;
  uploads: number;
  queryEmbeddingFailures: number;
  uploadVectorFailures: number;
};

type NormalizedUpload = {
  timestamp: string;
  messages: ConversationMessage[];
  files: string[];
};

export class MemoryOrchestrator {
  private readonly embeddings: EmbeddingProvider;
  private readonly vectorStore: VectorStoreClient;
  private readonly rerankChain: RerankChain;
  private readonly historyStore: HistoryStore;
  private readonly profileStore: ProfileStore;
  private readonly sequence: SequenceAllocator;
  private readonly lanes: TenantLanes;
  private readonly audit?: ConversationLog;
  private readonly chunking: ChunkOptions;
  private readonly topK: number;
  private readonly topN: number;
  private readonly logger: Logger;
  private readonly counters: OrchestratorStats = {
    queries: 0,
    uploads: 0,
    queryEmbeddingFailures: 0,
    uploadVectorFailures: 0,
  };

  constructor(options: MemoryOrchestratorOptions) {
    this.embeddings = options.embeddings;
    this.vectorStore = options.vectorStore;
    this.rerankChain = options.rerank;
    this.historyStore = options.history;
    this.profileStore = options.profile;
    this.sequence = options.sequence;
    this.lanes = options.lanes;
    this.audit = options.audit;
    this.chunking = options.chunking;
    this.topK = options.topK;
    this.topN = options.topN;
    this.logger = options.logger.child({ component: "orchestrator" });
  }

  /**
   * Profile and ranked memories for `queryText`. Rejects only on invalid input.
   */
  async query(tenantInput: unknown, queryText: unknown, at?: string): Promise<QueryResult> {
    const start = Date.now();
    const tenant = assertTenant(tenantInput);
    if (typeof queryText !== "string" || !queryText.trim()) {
      throw new InvalidInputError("query is required");
    }
    if (at !== undefined) parseTimestamp(at);
    this.counters.queries += 1;

    const candidates = await this.retrieve(tenant, queryText);
    const ranked = await this.rerankChain.rerank(queryText, candidates, this.topN);
    const userProfile = await this.readProfile(tenant);
    const retrievedChunks = ranked.map(toRetrievedChunk);
    const queryTimeMs = Date.now() - start;

    await this.audit?.recordQuery(tenant, queryText, retrievedChunks.length, queryTimeMs);
    this.logger.info({ tenant, retrieved: retrievedChunks.length, durationMs: queryTimeMs }, "query completed");

    return {
      success: true,
      userProfile,
      retrievedChunks,
      augmentedContext: buildAugmentedContext(userProfile, retrievedChunks),
      queryTimeMs,
    };
  }

  /**
   * Record a turn. Uploads for one tenant are applied in submission order.
   */
  upload(tenantInput: unknown, input: UploadInput, at?: string): Promise<UploadResult> {
    const start = Date.now();
    let tenant: Tenant;
    let normalized: NormalizedUpload;
    try {
      tenant = assertTenant(tenantInput);
      const timestamp = at === undefined ? new Date().toISOString() : parseTimestamp(at);
      normalized = normalizeUpload(input, timestamp);
    } catch (err) {
      return Promise.reject(err);
    }
    this.counters.uploads += 1;
    // Enqueued synchronously so submission order is lane order.
    return this.lanes.enqueue(`upload:${tenant}`, () => this.runUpload(tenant, normalized, start));
  }

  async history(tenantInput: unknown): Promise<HistorySnapshot> {
    return this.historyStore.read(assertTenant(tenantInput));
  }

  stats(): OrchestratorStats {
    return { ...this.counters };
  }

  private async runUpload(tenant: Tenant, upload: NormalizedUpload, start: number): Promise<UploadResult> {
    const { timestamp } = upload;
    const texts = [...upload.messages.map((message) => message.content), ...upload.files];
    const { chunksStored, vectorStatus } = await this.storeVectors(tenant, texts, timestamp);

    const appended = await this.historyStore.append(tenant, upload.messages);

    let profileUpdated = false;
    if (upload.messages.length > 0) {
      const merge = this.profileStore.scheduleMerge(tenant, upload.messages);
      profileUpdated = merge.isSettled();
    }

    await this.audit?.recordUpload(tenant, upload.messages, upload.files.length);

    const processTimeMs = Date.now() - start;
    this.logger.info(
      { tenant, chunksStored, messages: appended.appended, vectorStatus, durationMs: processTimeMs },
      "upload completed",
    );
    return {
      success: true,
      chunksStored,
      messagesRecorded: appended.appended,
      profileUpdated,
      vectorStatus,
      processTimeMs,
    };
  }

  private async storeVectors(
    tenant: Tenant,
    texts: string[],
    timestamp: string,
  ): Promise<{ chunksStored: number; vectorStatus: VectorStatus }> {
    const segments = chunkTexts(texts, this.chunking);
    if (segments.length === 0) return { chunksStored: 0, vectorStatus: "empty" };

    let vectors: number[][];
    try {
      vectors = await this.embeddings.embed(segments.map((segment) => segment.text));
    } catch (err) {
      this.counters.uploadVectorFailures += 1;
      this.logger.warn({ tenant, chunks: segments.length, error: describeError(err) }, "embedding failed, vectors skipped");
      return { chunksStored: 0, vectorStatus: "embedding_failed" };
    }

    try {
      const first = await this.sequence.reserve(tenant, segments.length);
      const records: VectorRecord[] = createChunks(segments, tenant, timestamp, first).map((chunk, i) => ({
        chunk,
        embedding: vectors[i] ?? [],
        tenant,
        timestamp,
      }));
      const stored = await this.vectorStore.insert(tenant, records);
      if (stored === 0) this.counters.uploadVectorFailures += 1;
      return { chunksStored: stored, vectorStatus: stored > 0 ? "stored" : "unavailable" };
    } catch (err) {
      this.counters.uploadVectorFailures += 1;
      if (err instanceof DimensionMismatchError) {
        this.logger.error({ tenant, expected: err.expected, actual: err.actual }, "embedding dimension mismatch, vectors rejected");
        return { chunksStored: 0, vectorStatus: "dimension_mismatch" };
      }
      this.logger.error({ tenant, error: describeError(err) }, "vector stage failed");
      return { chunksStored: 0, vectorStatus: "unavailable" };
    }
  }

  private async retrieve(tenant: Tenant, queryText: string): Promise<RetrievedCandidate[]> {
    let vector: number[] | undefined;
    try {
      [vector] = await this.embeddings.embed([queryText]);
    } catch (err) {
      this.counters.queryEmbeddingFailures += 1;
      this.logger.warn({ tenant, error: describeError(err) }, "query embedding failed, vector search skipped");
      return [];
    }
    if (!vector || vector.length === 0) return [];
    return this.vectorStore.search(tenant, vector, this.topK);
  }

  private async readProfile(tenant: Tenant): Promise<string> {
    try {
      return await this.profileStore.read(tenant);
    } catch (err) {
      this.logger.warn({ tenant, error: describeError(err) }, "profile read failed");
      return "";
    }
  }
}

/**
 * Profile section then memories section, each omitted when empty
 */
export function buildAugmentedContext(profile: string, chunks: RetrievedChunk[]): string {
  const sections: string[] = [];
  const profileBody = profile.trim().replace(/^#\s+[^\n]*\n*/, "").trim();
  if (profileBody) {
    sections.push(`## User Profile\n${profileBody}`);
  }
  if (chunks.length > 0) {
    const lines = chunks.map((chunk) => `- [${chunk.score.toFixed(3)}] ${chunk.content}`);
    sections.push(`## Relevant Memories\n${lines.join("\n")}`);
  }
  return sections.length > 0 ? sections.join("\n\n") : NO_MEMORY_MARKER;
}

function toRetrievedChunk(candidate: RetrievedCandidate): RetrievedChunk {
  return {
    content: candidate.content,
    score: candidate.score,
    source: candidate.source,
    metadata: candidate.metadata,
  };
}

function parseTimestamp(value: string): string {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidInputError("time must be an ISO-8601 timestamp", { time: value });
  }
  return new Date(ms).toISOString();
}

function normalizeUpload(input: UploadInput, timestamp: string): NormalizedUpload {
  const messages: ConversationMessage[] = [];
  for (const [index, message] of (input.messages ?? []).entries()) {
    if (!ROLES.has(message.role)) {
      throw new InvalidInputError(`messages[${index}].role must be "user" or "assistant"`);
    }
    if (!message.content.trim()) continue;
    messages.push({ role: message.role, content: message.content, timestamp });
  }

  const files: string[] = [];
  for (const [index, encoded] of (input.files ?? []).entries()) {
    if (!BASE64_RE.test(encoded)) {
      throw new InvalidInputError(`multifiles[${index}] is not valid base64`);
    }
    const text = Buffer.from(encoded, "base64").toString("utf-8");
    if (text.trim()) files.push(text);
  }

  if (messages.length === 0 && files.length === 0) {
    throw new InvalidInputError("messages or multifiles must contain content");
  }
  return { timestamp, messages, files };
}
