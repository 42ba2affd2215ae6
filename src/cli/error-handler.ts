/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { ZodError } from "zod";

import { MemoryError, type MemoryErrorCode } from "../errors.js";

/**
 * Error codes with user-friendly messages
 */
const ERROR_MESSAGES: Record<MemoryErrorCode | "CONFIG_ERROR", { title: string; help: string }> = {
  INVALID_INPUT: {
    title: "Invalid Input",
    help: "Check the command arguments and try again.",
  },
  UNAVAILABLE: {
    title: "Service Unavailable",
    help: "Check that the embedding, LLM and vector services are reachable.",
  },
  DIMENSION_MISMATCH: {
    title: "Dimension Mismatch",
    help: "vector.dim must match the embedding model's output size.",
  },
  BACKGROUND_TASK_FAILURE: {
    title: "Background Task Failed",
    help: "See the system log for details.",
  },
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check rag-memory.config.json and the environment variables.",
  },
};

/**
 * Format an error for display
 */
export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof ZodError) {
    const meta = ERROR_MESSAGES.CONFIG_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + "invalid configuration");
    for (const issue of err.issues) {
      lines.push(chalk.dim(`  - ${issue.path.join(".") || "(root)"}: ${issue.message}`));
    }
    lines.push(chalk.dim(`Hint: ${meta.help}`));
  } else if (err instanceof MemoryError) {
    const meta = ERROR_MESSAGES[err.code];
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    lines.push(chalk.dim(`Hint: ${meta.help}`));
    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Run a command, printing any error and setting a non-zero exit code
 */
export async function handleError(fn: () => Promise<unknown>, verbose = false): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exitCode = 1;
  }
}
