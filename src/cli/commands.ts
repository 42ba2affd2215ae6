import fs from "node:fs/promises";

import type { MemoryServiceConfig } from "../config.js";
import { InvalidInputError } from "../errors.js";
import type { UploadMessage } from "../memory/types.js";
import { createRuntime, type MemoryRuntime } from "../runtime.js";
import { startServer } from "../server/app.js";
import type { OutputFormatter } from "./output-formatter.js";

/**
 * Parse a `role:content` message argument
 */
export function parseMessageOption(value: string): UploadMessage {
  const separator = value.indexOf(":");
  const role = separator > 0 ? value.slice(0, separator).trim() : "";
  if (role !== "user" && role !== "assistant") {
    throw new InvalidInputError(`--message must look like "user:<text>" or "assistant:<text>", got "${value}"`);
  }
  return { role, content: value.slice(separator + 1).trim() };
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export async function serve(cfg: MemoryServiceConfig, out: OutputFormatter): Promise<void> {
  const runtime = createRuntime(cfg);
  const server = await startServer(runtime, { host: cfg.server.host, port: cfg.server.port });
  out.success(`Memory service listening on ${server.url}`);

  await new Promise<void>((resolve) => {
    const stop = (signal: NodeJS.Signals) => {
      runtime.logger.info({ signal }, "stop requested");
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });

  await server.close();
  await runtime.shutdown();
}

export async function query(
  runtime: MemoryRuntime,
  userId: string,
  text: string,
  options: { json?: boolean },
  out: OutputFormatter,
): Promise<void> {
  const result = await runtime.orchestrator.query(userId, text);
  if (options.json) {
    out.json(result);
    return;
  }
  out.section("Profile");
  out.info(result.userProfile.trim() || "(empty)");
  out.section(`Memories (${result.retrievedChunks.length})`);
  result.retrievedChunks.forEach((chunk, i) => {
    out.numberedItem(i + 1, `[${chunk.score.toFixed(3)} ${chunk.source}] ${chunk.content}`);
  });
  out.keyValue("query time", `${result.queryTimeMs}ms`);
}

export async function upload(
  runtime: MemoryRuntime,
  userId: string,
  options: { message?: string[]; file?: string[]; json?: boolean },
  out: OutputFormatter,
): Promise<void> {
  const messages = (options.message ?? []).map(parseMessageOption);
  const files: string[] = [];
  for (const filePath of options.file ?? []) {
    files.push((await fs.readFile(filePath)).toString("base64"));
  }
  const result = await runtime.orchestrator.upload(userId, { messages, files });
  if (options.json) {
    out.json(result);
    return;
  }
  out.success(`Recorded ${result.messagesRecorded} message(s) for ${userId}`);
  out.keyValue("chunks stored", result.chunksStored);
  out.keyValue("vector status", result.vectorStatus);
  out.keyValue("process time", `${result.processTimeMs}ms`);
}

export async function history(
  runtime: MemoryRuntime,
  userId: string,
  options: { json?: boolean },
  out: OutputFormatter,
): Promise<void> {
  const snapshot = await runtime.orchestrator.history(userId);
  if (options.json) {
    out.json(snapshot);
    return;
  }
  out.section("Summary");
  out.info(snapshot.summary?.text ?? "(none)");
  out.section(`Recent messages (${snapshot.window.length})`);
  snapshot.window.forEach((message, i) => {
    out.numberedItem(i + 1, `${message.role}: ${message.content}`);
  });
}

/**
 * Run a one-shot command against a fresh runtime, draining background work after.
 */
export async function withRuntime(
  cfg: MemoryServiceConfig,
  fn: (runtime: MemoryRuntime) => Promise<void>,
): Promise<void> {
  const runtime = createRuntime(cfg);
  try {
    await fn(runtime);
  } finally {
    await runtime.shutdown();
  }
}
