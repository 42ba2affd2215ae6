/**
 * Memory System Types
 *
 * Everything is partitioned by tenant (the caller's opaque user id).
 */

export type Tenant = string;

export type MessageRole = "user" | "assistant";

/**
 * A recorded conversation turn. Immutable once stored.
 */
export type ConversationMessage = {
  role: MessageRole;
  content: string;
  /** ISO-8601 timestamp */
  timestamp: string;
};

/**
 * A bounded segment of source text, before it is bound to a tenant
 */
export type ChunkSegment = {
  text: string;
  /** Offset of the first character in the source text */
  start: number;
  /** Offset one past the last character in the source text */
  end: number;
};

/**
 * A segment bound to a tenant and given its permanent position
 */
export type Chunk = {
  text: string;
  tenant: Tenant;
  sourceTimestamp: string;
  /** Assigned in strict append order per tenant, never reused */
  sequenceIndex: number;
};

export type VectorRecord = {
  chunk: Chunk;
  embedding: number[];
  tenant: Tenant;
  timestamp: string;
};

/**
 * Which method produced a candidate's current score
 */
export type CandidateSource = "vector_index" | "reranker" | "embedding_cosine" | "raw_order";

export type CandidateMetadata = {
  id: string;
  tenant: Tenant;
  timestamp: string;
  sequenceIndex: number;
};

export type RetrievedCandidate = {
  content: string;
  /** Similarity reported by the vector index */
  rawScore: number;
  /** Final score after reranking (equals rawScore until reranked) */
  score: number;
  source: CandidateSource;
  metadata: CandidateMetadata;
  /** Stored embedding, when the index returned it */
  embedding?: number[];
};

export type CompressedSummary = {
  tenant: Tenant;
  text: string;
  generatedAt: string;
};

export type HistorySnapshot = {
  /** Most recent messages, oldest first, at most windowSize long */
  window: ConversationMessage[];
  summary: CompressedSummary | null;
};

export type RetrievedChunk = {
  content: string;
  score: number;
  source: CandidateSource;
  metadata: CandidateMetadata;
};

export type QueryResult = {
  success: true;
  userProfile: string;
  retrievedChunks: RetrievedChunk[];
  augmentedContext: string;
  queryTimeMs: number;
};

export type UploadMessage = {
  role: MessageRole;
  content: string;
};

export type UploadInput = {
  messages?: UploadMessage[];
  /** Base64-encoded UTF-8 text files */
  files?: string[];
};

export type VectorStatus = "stored" | "empty" | "embedding_failed" | "unavailable" | "dimension_mismatch";

export type UploadResult = {
  success: true;
  chunksStored: number;
  messagesRecorded: number;
  profileUpdated: boolean;
  vectorStatus: VectorStatus;
  processTimeMs: number;
};

/**
 * Embedding provider interface
 */
export interface EmbeddingProvider {
  /** Generate embeddings for input texts, in input order */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  getModel(): string;
}

export type CompletionRequest = {
  system?: string;
  user: string;
  maxTokens?: number;
};

export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}

export type RerankScore = {
  /** Position in the texts array that was sent */
  index: number;
  score: number;
};

export interface RerankProvider {
  rerank(query: string, texts: string[], signal?: AbortSignal): Promise<RerankScore[]>;
}
