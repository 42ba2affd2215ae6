import type { MemoryServiceConfig } from "./config.js";
import { createLogger, type Logger } from "./log.js";
import { ConversationLog } from "./memory/conversation-log.js";
import { OpenAIEmbeddingProvider } from "./memory/embeddings.js";
import { HistoryStore, type HistoryStats } from "./memory/history-store.js";
import { InMemoryIndex } from "./memory/in-memory-index.js";
import { OpenAICompletionProvider } from "./memory/llm.js";
import { MilvusIndex } from "./memory/milvus-index.js";
import { MemoryOrchestrator, type OrchestratorStats } from "./memory/orchestrator.js";
import { ProfileStore, type ProfileStats } from "./memory/profile-store.js";
import { HttpRerankProvider, RerankChain, type RerankStats } from "./memory/rerank.js";
import { SequenceAllocator } from "./memory/sequence.js";
import { TenantLanes } from "./memory/tenant-lanes.js";
import { TenantPaths } from "./memory/tenant.js";
import type { CompletionProvider, EmbeddingProvider, RerankProvider } from "./memory/types.js";
import type { VectorIndex } from "./memory/vector-index.js";
import { VectorStoreClient } from "./memory/vector-store.js";

export const VERSION = "0.1.0";

export type HealthReport = {
  status: "ok" | "degraded";
  version: string;
  vectorConnected: boolean;
  background: {
    queuedTasks: number;
    history: HistoryStats;
    profile: ProfileStats;
    rerank: RerankStats;
    requests: OrchestratorStats;
  };
};

/**
 * Collaborators to use instead of the configured ones
 */
export type RuntimeOverrides = {
  logger?: Logger;
  index?: VectorIndex;
  embeddings?: EmbeddingProvider;
  completion?: CompletionProvider;
  /** `null` disables the external reranker */
  reranker?: RerankProvider | null;
};

export type MemoryRuntime = {
  config: MemoryServiceConfig;
  logger: Logger;
  lanes: TenantLanes;
  vectorStore: VectorStoreClient;
  history: HistoryStore;
  profile: ProfileStore;
  rerank: RerankChain;
  orchestrator: MemoryOrchestrator;
  health(): Promise<HealthReport>;
  shutdown(): Promise<void>;
};

/**
 * Build every collaborator from config. Nothing connects until first use.
 */
export function createRuntime(cfg: MemoryServiceConfig, overrides: RuntimeOverrides = {}): MemoryRuntime {
  const logger =
    overrides.logger ??
    createLogger(cfg.logging.level, cfg.resolved.logFilePath, cfg.resolved.logFileLevel, {
      retentionDays: cfg.logging.retentionDays,
    });
  const lanes = new TenantLanes(logger, cfg.queue.warnAfterMs);
  const paths = new TenantPaths(cfg.resolved.usersDir);

  const index =
    overrides.index ??
    (cfg.vector.backend === "memory"
      ? new InMemoryIndex()
      : new MilvusIndex({
          address: cfg.vector.address,
          token: cfg.vector.token,
          collection: cfg.vector.collection,
          timeoutMs: cfg.vector.connectTimeoutMs,
          logger,
        }));
  const vectorStore = new VectorStoreClient({ index, dim: cfg.vector.dim, logger });

  const embeddings =
    overrides.embeddings ??
    new OpenAIEmbeddingProvider({
      baseUrl: cfg.resolved.embeddingsBaseUrl,
      apiKey: cfg.resolved.embeddingsApiKey,
      model: cfg.embeddings.model,
      timeoutMs: cfg.embeddings.timeoutMs,
      batchSize: cfg.embeddings.batchSize,
    });

  const completion =
    overrides.completion ??
    new OpenAICompletionProvider({
      baseUrl: cfg.llm.baseUrl,
      apiKey: cfg.llm.apiKey,
      model: cfg.llm.model,
      timeoutMs: cfg.llm.timeoutMs,
      maxRetries: cfg.llm.maxRetries,
      logger,
    });

  const configuredReranker = cfg.reranker.url
    ? new HttpRerankProvider({ url: cfg.reranker.url, timeoutMs: cfg.reranker.timeoutMs })
    : undefined;
  const reranker = overrides.reranker === undefined ? configuredReranker : overrides.reranker ?? undefined;

  const rerank = new RerankChain({
    reranker,
    embeddings,
    rerankTimeoutMs: cfg.reranker.timeoutMs,
    cosineTimeoutMs: cfg.reranker.cosineTimeoutMs,
    logger,
  });

  const history = new HistoryStore({
    paths,
    lanes,
    completion,
    windowSize: cfg.history.windowSize,
    compressThreshold: cfg.history.compressThreshold,
    compressInBackground: cfg.history.compressInBackground,
    logger,
  });
  const profile = new ProfileStore({ paths, lanes, completion, enabled: cfg.profile.enabled, logger });
  const audit = new ConversationLog({
    dir: cfg.resolved.conversationLogDir,
    lanes,
    retentionDays: cfg.audit.retentionDays,
    enabled: cfg.audit.enabled,
    logger,
  });
  const sequence = new SequenceAllocator(paths, lanes, logger);

  const orchestrator = new MemoryOrchestrator({
    embeddings,
    vectorStore,
    rerank,
    history,
    profile,
    sequence,
    lanes,
    audit,
    chunking: cfg.chunking,
    topK: cfg.vector.topK,
    topN: cfg.vector.topN,
    logger,
  });

  let closed = false;

  return {
    config: cfg,
    logger,
    lanes,
    vectorStore,
    history,
    profile,
    rerank,
    orchestrator,
    async health() {
      const vectorConnected = await vectorStore.ping();
      return {
        status: vectorConnected ? "ok" : "degraded",
        version: VERSION,
        vectorConnected,
        background: {
          queuedTasks: lanes.totalSize(),
          history: history.stats(),
          profile: profile.stats(),
          rerank: rerank.getStats(),
          requests: orchestrator.stats(),
        },
      };
    },
    async shutdown() {
      if (closed) return;
      closed = true;
      logger.info({ queuedTasks: lanes.totalSize() }, "shutting down, draining background work");
      await lanes.drain();
      await vectorStore.close();
      logger.info("shutdown complete");
    },
  };
}
