import { z } from "zod";

import { describeError, isTimeoutError, UnavailableError } from "../errors.js";
import type { Logger } from "../log.js";
import { deadlineSignal, sleep } from "../utils/signals.js";
import type { CompletionProvider, CompletionRequest } from "./types.js";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

export type OpenAICompletionConfig = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  maxRetries?: number;
  temperature?: number;
  logger: Logger;
};

/**
 * OpenAI-compatible chat completion client used for summarization and
 * profile extraction. Deterministic (temperature 0) unless configured.
 */
export class OpenAICompletionProvider implements CompletionProvider {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(config: OpenAICompletionConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.maxRetries = config.maxRetries ?? 2;
    this.temperature = config.temperature ?? 0;
    this.logger = config.logger.child({ component: "llm" });
  }

  async complete(request: CompletionRequest): Promise<string> {
    return withRetry(() => this.completeOnce(request), {
      maxRetries: this.maxRetries,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn({ attempt, delayMs, error: error.message }, "llm call failed, retrying");
      },
    });
  }

  private async completeOnce(request: CompletionRequest): Promise<string> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (request.system) messages.push({ role: "system", content: request.system });
    messages.push({ role: "user", content: request.user });

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: this.temperature,
          max_tokens: request.maxTokens ?? 1024,
        }),
        signal: deadlineSignal(this.timeoutMs),
      });
    } catch (err) {
      const reason = isTimeoutError(err) ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      throw new UnavailableError("llm", `chat completion failed: ${reason}`, err);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new UnavailableError("llm", `chat completion failed: ${response.status} ${text}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UnavailableError("llm", "chat completion missing message");
    }
    const content = parsed.data.choices[0]?.message.content ?? "";
    this.logger.debug({ model: this.model, outputLength: content.length }, "llm call succeeded");
    return content;
  }
}

// ============================================================================
// Retry Logic
// ============================================================================

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

/**
 * Execute with exponential backoff. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= opts.maxRetries) throw error;
      opts.onRetry?.({ attempt: attempt + 1, delayMs: delay, error });
      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}
