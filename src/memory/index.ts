/**
 * Memory System
 *
 * Retrieval (vector search, reranking, profile) and consolidation (chunking,
 * history compression, profile merge), partitioned by tenant.
 */

// Orchestration
export {
  buildAugmentedContext,
  MemoryOrchestrator,
  NO_MEMORY_MARKER,
  type MemoryOrchestratorOptions,
  type OrchestratorStats,
} from "./orchestrator.js";

// Vector storage
export { VectorStoreClient, type ConnectionState } from "./vector-store.js";
export type { CollectionLoadState, IndexHit, IndexRow, VectorIndex } from "./vector-index.js";
export { InMemoryIndex } from "./in-memory-index.js";
export { MilvusIndex } from "./milvus-index.js";

// Chunking
export { chunkText, chunkTexts, createChunks, DEFAULT_CHUNK_OPTIONS, type ChunkOptions } from "./chunker.js";

// Collaborators
export { clearEmbeddingCache, cosineSimilarity, getEmbeddingCacheStats, OpenAIEmbeddingProvider } from "./embeddings.js";
export { OpenAICompletionProvider, withRetry } from "./llm.js";
export { HttpRerankProvider, RerankChain, type RerankStrategy } from "./rerank.js";

// Per-tenant state
export { HistoryStore, type AppendResult, type HistoryStats } from "./history-store.js";
export { ProfileStore, type ProfileMergeHandle, type ProfileMergeOutcome } from "./profile-store.js";
export { mergeProfile, PROFILE_TITLE } from "./profile-merge.js";
export { ConversationLog } from "./conversation-log.js";
export { SequenceAllocator } from "./sequence.js";
export { TenantLanes, type LaneSnapshot } from "./tenant-lanes.js";
export { assertTenant, TenantPaths } from "./tenant.js";

// Types
export type {
  Chunk,
  CompletionProvider,
  CompressedSummary,
  ConversationMessage,
  EmbeddingProvider,
  HistorySnapshot,
  QueryResult,
  RerankProvider,
  RetrievedCandidate,
  RetrievedChunk,
  Tenant,
  UploadInput,
  UploadResult,
  VectorRecord,
  VectorStatus,
} from "./types.js";
