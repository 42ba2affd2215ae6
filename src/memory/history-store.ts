/**
 * Conversation History
 *
 * Append-only per-tenant log (history.jsonl) plus one compressed summary
 * (summary.json). Once the stored log reaches `compressThreshold` messages,
 * everything but the last `windowSize` is summarized by the LLM and the log
 * is trimmed to the window. A failed compression changes nothing on disk.
 */

import fs from "node:fs/promises";

import { z } from "zod";

import { BackgroundTaskError, describeError } from "../errors.js";
import type { Logger } from "../log.js";
import { appendLine, readTextIfExists, writeFileAtomic } from "../utils/fs.js";
import {
  buildIncrementalSummarizationPrompt,
  buildSummarizationPrompt,
  INCREMENTAL_SUMMARIZATION_SYSTEM_PROMPT,
  SUMMARIZATION_SYSTEM_PROMPT,
} from "./prompts.js";
import type { TenantLanes } from "./tenant-lanes.js";
import type { TenantPaths } from "./tenant.js";
import type {
  CompletionProvider,
  CompressedSummary,
  ConversationMessage,
  HistorySnapshot,
  Tenant,
} from "./types.js";

const ConversationMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
});

const CompressedSummarySchema = z.object({
  tenant: z.string(),
  text: z.string(),
  generatedAt: z.string(),
});

export type CompressionOutcome = "none" | "completed" | "failed" | "scheduled";

export type AppendResult = {
  appended: number;
  compression: CompressionOutcome;
};

export type HistoryStats = {
  compressions: number;
  compressionFailures: number;
  pendingCompressions: number;
};

export type HistoryStoreOptions = {
  paths: TenantPaths;
  lanes: TenantLanes;
  completion: CompletionProvider;
  windowSize: number;
  compressThreshold: number;
  compressInBackground?: boolean;
  logger: Logger;
};

export class HistoryStore {
  private readonly paths: TenantPaths;
  private readonly lanes: TenantLanes;
  private readonly completion: CompletionProvider;
  private readonly windowSize: number;
  private readonly compressThreshold: number;
  private readonly compressInBackground: boolean;
  private readonly logger: Logger;
  private readonly pending = new Set<Tenant>();
  private compressions = 0;
  private compressionFailures = 0;

  constructor(options: HistoryStoreOptions) {
    this.paths = options.paths;
    this.lanes = options.lanes;
    this.completion = options.completion;
    this.windowSize = options.windowSize;
    this.compressThreshold = options.compressThreshold;
    this.compressInBackground = options.compressInBackground ?? false;
    this.logger = options.logger.child({ component: "history" });
  }

  /**
   * Append messages in order. Appends for one tenant never interleave.
   */
  async append(tenant: Tenant, messages: ConversationMessage[]): Promise<AppendResult> {
    if (messages.length === 0) return { appended: 0, compression: "none" };

    return this.lanes.enqueue(`history:${tenant}`, async () => {
      const filePath = this.paths.history(tenant);
      for (const message of messages) {
        await appendLine(filePath, JSON.stringify(message));
      }
      const stored = await this.readLog(tenant);
      this.logger.debug({ tenant, appended: messages.length, stored: stored.length }, "history appended");

      if (stored.length < this.compressThreshold) {
        return { appended: messages.length, compression: "none" };
      }
      if (this.compressInBackground) {
        this.scheduleCompression(tenant);
        return { appended: messages.length, compression: "scheduled" };
      }
      const compressed = await this.compressLog(tenant);
      return { appended: messages.length, compression: compressed ? "completed" : "failed" };
    });
  }

  /**
   * The last `windowSize` messages, oldest first, and the summary if any
   */
  async read(tenant: Tenant): Promise<HistorySnapshot> {
    const [log, summary] = await Promise.all([this.readLog(tenant), this.readSummary(tenant)]);
    return { window: log.slice(-this.windowSize), summary };
  }

  /**
   * Compress now, on the tenant's history lane. Resolves to false when the
   * log is below threshold or the compression failed.
   */
  async compress(tenant: Tenant): Promise<boolean> {
    return this.lanes.enqueue(`history:${tenant}`, async () => {
      const stored = await this.readLog(tenant);
      if (stored.length < this.compressThreshold) return false;
      return this.compressLog(tenant);
    });
  }

  stats(): HistoryStats {
    return {
      compressions: this.compressions,
      compressionFailures: this.compressionFailures,
      pendingCompressions: this.pending.size,
    };
  }

  private scheduleCompression(tenant: Tenant): void {
    if (this.pending.has(tenant)) return;
    this.pending.add(tenant);
    void this.compress(tenant)
      .catch((err: unknown) => {
        this.logger.error({ tenant, error: describeError(err) }, "scheduled compression crashed");
        return false;
      })
      .finally(() => this.pending.delete(tenant));
  }

  /**
   * Must run on the tenant's history lane.
   */
  private async compressLog(tenant: Tenant): Promise<boolean> {
    const start = Date.now();
    try {
      const log = await this.readLog(tenant);
      const evicted = log.slice(0, -this.windowSize);
      const kept = log.slice(-this.windowSize);
      if (evicted.length === 0) return false;

      const existing = await this.readSummary(tenant);
      const text = (
        await this.completion.complete(
          existing?.text.trim()
            ? {
                system: INCREMENTAL_SUMMARIZATION_SYSTEM_PROMPT,
                user: buildIncrementalSummarizationPrompt(existing.text, evicted),
                maxTokens: 1024,
              }
            : {
                system: SUMMARIZATION_SYSTEM_PROMPT,
                user: buildSummarizationPrompt(evicted),
                maxTokens: 1024,
              },
        )
      ).trim();
      if (!text) {
        throw new Error("summarizer returned empty text");
      }

      const summary: CompressedSummary = { tenant, text, generatedAt: new Date().toISOString() };
      const summaryPath = this.paths.summary(tenant);
      const previousSummary = await readTextIfExists(summaryPath);
      await writeFileAtomic(summaryPath, JSON.stringify(summary, null, 2));
      try {
        await writeFileAtomic(this.paths.history(tenant), kept.map((message) => JSON.stringify(message) + "\n").join(""));
      } catch (err) {
        if (previousSummary === null) await fs.rm(summaryPath, { force: true });
        else await writeFileAtomic(summaryPath, previousSummary);
        throw err;
      }

      this.compressions += 1;
      this.logger.info(
        { tenant, evicted: evicted.length, kept: kept.length, durationMs: Date.now() - start },
        "history compressed",
      );
      return true;
    } catch (err) {
      this.compressionFailures += 1;
      const failure = new BackgroundTaskError("compression", tenant, err);
      this.logger.error({ tenant, error: failure.message, durationMs: Date.now() - start }, "history compression failed");
      return false;
    }
  }

  private async readLog(tenant: Tenant): Promise<ConversationMessage[]> {
    const raw = await readTextIfExists(this.paths.history(tenant));
    if (raw === null) return [];
    const messages: ConversationMessage[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      const parsed = parseLine(line);
      if (parsed) {
        messages.push(parsed);
      } else {
        this.logger.warn({ tenant }, "skipping unparseable history line");
      }
    }
    return messages;
  }

  private async readSummary(tenant: Tenant): Promise<CompressedSummary | null> {
    const raw = await readTextIfExists(this.paths.summary(tenant));
    if (raw === null) return null;
    try {
      return CompressedSummarySchema.parse(JSON.parse(raw));
    } catch (err) {
      this.logger.warn({ tenant, error: describeError(err) }, "summary unreadable, ignoring");
      return null;
    }
  }
}

function parseLine(line: string): ConversationMessage | null {
  try {
    const result = ConversationMessageSchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
