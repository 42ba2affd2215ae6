/**
 * Output Formatter - Pretty CLI output with colors using chalk
 */

import chalk from "chalk";

export type LogLevel = "info" | "success" | "warning" | "error";

/**
 * Output formatter for consistent CLI output
 */
export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;
  private readonly write: (text: string, level: LogLevel) => void;

  constructor(options: { quiet?: boolean; noColor?: boolean; write?: (text: string, level: LogLevel) => void } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
    this.write =
      options.write ??
      ((text, level) => {
        const stream = level === "error" ? process.stderr : process.stdout;
        stream.write(text + "\n");
      });
  }

  /**
   * Print a message with appropriate styling
   */
  print(message: string, level: LogLevel = "info"): void {
    if (this.quiet && level !== "error") return;
    this.write(this.noColor ? message : this.styleMessage(message, level), level);
  }

  success(message: string): void {
    this.print(message, "success");
  }

  info(message: string): void {
    this.print(message, "info");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  error(message: string): void {
    this.print(message, "error");
  }

  /**
   * Print a section header
   */
  section(title: string): void {
    if (this.quiet) return;
    this.write(this.noColor ? `\n${title}:` : `\n${chalk.bold(title)}:`, "info");
  }

  /**
   * Print a key-value pair
   */
  keyValue(key: string, value: string | number | boolean): void {
    if (this.quiet) return;
    const formattedKey = this.noColor ? `  ${key}:` : chalk.dim(`  ${key}:`);
    const formattedValue = this.noColor ? ` ${value}` : ` ${chalk.white(String(value))}`;
    this.write(formattedKey + formattedValue, "info");
  }

  /**
   * Print a numbered list item
   */
  numberedItem(index: number, item: string): void {
    if (this.quiet) return;
    const prefix = `  ${index}. `;
    this.write(this.noColor ? `${prefix}${item}` : `${chalk.dim(prefix)}${item}`, "info");
  }

  /**
   * Print JSON output
   */
  json(data: unknown): void {
    this.write(JSON.stringify(data, null, 2), "info");
  }

  private styleMessage(message: string, level: LogLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      default:
        return message;
    }
  }
}
