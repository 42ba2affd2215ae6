#!/usr/bin/env node
/**
 * rag-memory CLI
 *
 * Runs the HTTP memory service, or queries and feeds a tenant's memory
 * directly from the shell.
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import { collect, history, query, serve, upload, withRuntime } from "./cli/commands.js";
import { handleError } from "./cli/error-handler.js";
import { OutputFormatter } from "./cli/output-formatter.js";
import { loadConfig } from "./config.js";
import { VERSION } from "./runtime.js";

export const program = new Command();
const out = new OutputFormatter();

program
  .name("rag-memory")
  .description("Multi-tenant conversational memory service")
  .version(VERSION)
  .option("-c, --config <path>", "Path to rag-memory.config.json")
  .option("-v, --verbose", "Show error details");

program
  .command("serve")
  .description("Start the HTTP memory service")
  .option("--host <host>", "Override server.host")
  .option("--port <port>", "Override server.port", (value) => Number.parseInt(value, 10))
  .action(async (options: { host?: string; port?: number }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
    await handleError(async () => {
      const cfg = await loadConfig(globals.config);
      if (options.host) cfg.server.host = options.host;
      if (options.port !== undefined && Number.isFinite(options.port)) cfg.server.port = options.port;
      await serve(cfg, out);
    }, globals.verbose);
  });

program
  .command("query <userId> <text>")
  .description("Retrieve profile and memories for a query")
  .option("--json", "Output JSON")
  .action(async (userId: string, text: string, options: { json?: boolean }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
    await handleError(async () => {
      const cfg = await loadConfig(globals.config);
      await withRuntime(cfg, (runtime) => query(runtime, userId, text, options, out));
    }, globals.verbose);
  });

program
  .command("upload <userId>")
  .description("Record messages and/or index text files for a user")
  .option("-m, --message <role:content>", "Message to record (repeatable)", collect, [])
  .option("-f, --file <path>", "Text file to index (repeatable)", collect, [])
  .option("--json", "Output JSON")
  .action(
    async (userId: string, options: { message: string[]; file: string[]; json?: boolean }, cmd: Command) => {
      const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
      await handleError(async () => {
        const cfg = await loadConfig(globals.config);
        await withRuntime(cfg, (runtime) => upload(runtime, userId, options, out));
      }, globals.verbose);
    },
  );

program
  .command("history <userId>")
  .description("Show the recent message window and summary")
  .option("--json", "Output JSON")
  .action(async (userId: string, options: { json?: boolean }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
    await handleError(async () => {
      const cfg = await loadConfig(globals.config);
      await withRuntime(cfg, (runtime) => history(runtime, userId, options, out));
    }, globals.verbose);
  });

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err: unknown) => {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
