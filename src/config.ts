import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { isMissingFile } from "./utils/fs.js";

const DEFAULT_CONFIG_PATH = "rag-memory.config.json";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const ServerSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65535).default(8000),
});

const LlmSchema = z.object({
  baseUrl: z.string().min(1).default("http://localhost:1234/v1"),
  apiKey: z.string().optional(),
  model: z.string().min(1).default("deepseek-v3"),
  timeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().min(0).default(2),
});

const EmbeddingsSchema = z.object({
  baseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  model: z.string().min(1).default("bge-m3"),
  timeoutMs: z.number().int().positive().default(5_000),
  batchSize: z.number().int().positive().default(32),
});

const RerankerSchema = z.object({
  url: z.string().optional(),
  timeoutMs: z.number().int().positive().default(1_500),
  cosineTimeoutMs: z.number().int().positive().default(2_000),
});

const VectorSchema = z
  .object({
    backend: z.enum(["milvus", "memory"]).default("milvus"),
    address: z.string().min(1).default("localhost:19530"),
    token: z.string().optional(),
    collection: z.string().min(1).default("rag_memory"),
    dim: z.number().int().positive().default(1024),
    topK: z.number().int().positive().default(10),
    topN: z.number().int().positive().default(5),
    connectTimeoutMs: z.number().int().positive().default(10_000),
  })
  .refine((value) => value.topN <= value.topK, {
    message: "vector.topN must not exceed vector.topK",
  });

const ChunkingSchema = z
  .object({
    minChunkSize: z.number().int().min(0).default(5),
    maxChunkSize: z.number().int().positive().default(512),
    overlap: z.number().int().min(0).default(64),
  })
  .refine((value) => value.overlap < value.maxChunkSize, {
    message: "chunking.overlap must be smaller than chunking.maxChunkSize",
  })
  .refine((value) => value.minChunkSize <= value.maxChunkSize, {
    message: "chunking.minChunkSize must not exceed chunking.maxChunkSize",
  });

const HistorySchema = z
  .object({
    windowSize: z.number().int().positive().default(10),
    compressThreshold: z.number().int().positive().default(20),
    compressInBackground: z.boolean().default(true),
  })
  .refine((value) => value.windowSize < value.compressThreshold, {
    message: "history.windowSize must be smaller than history.compressThreshold",
  });

const ProfileSchema = z.object({
  enabled: z.boolean().default(true),
});

const AuditSchema = z.object({
  enabled: z.boolean().default(true),
  retentionDays: z.number().int().positive().default(30),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
  retentionDays: z.number().int().positive().default(30),
});

const QueueSchema = z.object({
  warnAfterMs: z.number().int().positive().default(2_000),
});

const ConfigSchema = z.object({
  dataDir: z.string().min(1).default("./data"),
  server: ServerSchema.default({}),
  llm: LlmSchema.default({}),
  embeddings: EmbeddingsSchema.default({}),
  reranker: RerankerSchema.default({}),
  vector: VectorSchema.default({}),
  chunking: ChunkingSchema.default({}),
  history: HistorySchema.default({}),
  profile: ProfileSchema.default({}),
  audit: AuditSchema.default({}),
  logging: LoggingSchema.default({}),
  queue: QueueSchema.default({}),
});

export type MemoryServiceConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    dataDir: string;
    usersDir: string;
    conversationLogDir: string;
    logFilePath: string;
    logFileLevel: string;
    embeddingsBaseUrl: string;
    embeddingsApiKey?: string;
  };
};

type Env = Record<string, string | undefined>;

/**
 * Environment variables that override file values, mapped to their config path.
 */
const ENV_OVERRIDES: Array<{ name: string; path: string[]; kind: "string" | "number" | "boolean" }> = [
  { name: "RAG_MEMORY_DATA_DIR", path: ["dataDir"], kind: "string" },
  { name: "HOST", path: ["server", "host"], kind: "string" },
  { name: "PORT", path: ["server", "port"], kind: "number" },
  { name: "LLM_BASE_URL", path: ["llm", "baseUrl"], kind: "string" },
  { name: "LLM_API_KEY", path: ["llm", "apiKey"], kind: "string" },
  { name: "LLM_MODEL", path: ["llm", "model"], kind: "string" },
  { name: "EMBEDDING_BASE_URL", path: ["embeddings", "baseUrl"], kind: "string" },
  { name: "EMBEDDING_API_KEY", path: ["embeddings", "apiKey"], kind: "string" },
  { name: "EMBEDDING_MODEL", path: ["embeddings", "model"], kind: "string" },
  { name: "RERANKER_URL", path: ["reranker", "url"], kind: "string" },
  { name: "VECTOR_BACKEND", path: ["vector", "backend"], kind: "string" },
  { name: "MILVUS_ADDRESS", path: ["vector", "address"], kind: "string" },
  { name: "MILVUS_TOKEN", path: ["vector", "token"], kind: "string" },
  { name: "MILVUS_COLLECTION", path: ["vector", "collection"], kind: "string" },
  { name: "VECTOR_DIM", path: ["vector", "dim"], kind: "number" },
  { name: "RETRIEVAL_TOP_K", path: ["vector", "topK"], kind: "number" },
  { name: "RERANK_TOP_N", path: ["vector", "topN"], kind: "number" },
  { name: "MEMORY_WINDOW_SIZE", path: ["history", "windowSize"], kind: "number" },
  { name: "MEMORY_COMPRESS_THRESHOLD", path: ["history", "compressThreshold"], kind: "number" },
  { name: "MEMORY_COMPRESS_IN_BACKGROUND", path: ["history", "compressInBackground"], kind: "boolean" },
  { name: "PROFILE_ENABLED", path: ["profile", "enabled"], kind: "boolean" },
  { name: "AUDIT_ENABLED", path: ["audit", "enabled"], kind: "boolean" },
  { name: "LOG_LEVEL", path: ["logging", "level"], kind: "string" },
  { name: "LOG_FILE", path: ["logging", "filePath"], kind: "string" },
  { name: "LOG_RETENTION_DAYS", path: ["logging", "retentionDays"], kind: "number" },
];

export async function loadConfig(explicitPath?: string, env: Env = process.env): Promise<MemoryServiceConfig> {
  const configPath = resolveConfigPath(explicitPath, env);
  const fileValues = await readConfigFile(configPath, Boolean(explicitPath?.trim() || env.RAG_MEMORY_CONFIG?.trim()));
  return parseConfig(applyEnvOverrides(fileValues, env));
}

export function resolveConfigPath(explicitPath?: string, env: Env = process.env): string {
  const envPath = env.RAG_MEMORY_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

/**
 * Validate raw values and resolve paths. Throws a ZodError on invalid input.
 */
export function parseConfig(raw: unknown): MemoryServiceConfig {
  const base = ConfigSchema.parse(raw ?? {});
  return resolveConfig(base);
}

async function readConfigFile(configPath: string, required: boolean): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (!required && isMissingFile(err)) return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${configPath}`);
  }
  return parsed;
}

function applyEnvOverrides(values: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result = structuredClone(values);
  for (const override of ENV_OVERRIDES) {
    const rawValue = env[override.name]?.trim();
    if (!rawValue) continue;
    setPath(result, override.path, coerceEnvValue(rawValue, override.kind));
  }
  return result;
}

function coerceEnvValue(value: string, kind: "string" | "number" | "boolean"): string | number | boolean {
  if (kind === "number") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  if (kind === "boolean") {
    return ["1", "true", "yes"].includes(value.toLowerCase());
  }
  return value;
}

function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  const last = keys[keys.length - 1];
  if (last) cursor[last] = value;
}

function resolveConfig(base: z.infer<typeof ConfigSchema>): MemoryServiceConfig {
  const dataDir = resolveUserPath(base.dataDir);
  const logFilePath = resolveUserPath(
    base.logging.filePath?.trim() || path.join(dataDir, "logs", "system.log"),
    dataDir,
  );
  const logFileLevel = base.logging.fileLevel ?? base.logging.level;

  return {
    ...base,
    resolved: {
      dataDir,
      usersDir: path.join(dataDir, "users"),
      conversationLogDir: path.join(dataDir, "logs", "conversations"),
      logFilePath,
      logFileLevel,
      embeddingsBaseUrl: base.embeddings.baseUrl?.trim() || base.llm.baseUrl,
      embeddingsApiKey: base.embeddings.apiKey ?? base.llm.apiKey,
    },
  };
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
