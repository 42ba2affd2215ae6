import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

import { isMissingFile } from "./utils/fs.js";

export type Logger = pino.Logger;

const DAY_MS = 24 * 60 * 60 * 1000;

export function createLogger(
  level: string,
  filePath?: string,
  fileLevel?: string,
  opts?: { console?: boolean; retentionDays?: number },
): Logger {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    if (!consoleEnabled) {
      return pino({ level: "silent" });
    }
    return pino({ level });
  }
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    console.error(`Failed to create log directory: ${dir}`, err);
    throw new Error(`Cannot create log directory: ${dir}`);
  }
  if (opts?.retentionDays) {
    rotateLogFile(filePath, opts.retentionDays);
  }
  const streams = [
    ...(consoleEnabled ? [{ level, stream: process.stdout }] : []),
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ level: "trace" }, multistream(streams));
}

/**
 * Logger that discards everything. Handy for library callers that do not
 * want output and for tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Move a log file last written on an earlier day aside as
 * `<name>.<YYYY-MM-DD><ext>` and delete rotated files older than
 * `retentionDays`. Returns the number of files deleted.
 */
export function rotateLogFile(filePath: string, retentionDays: number, now: Date = new Date()): number {
  const { dir, name, ext } = path.parse(filePath);
  let modified: Date | null = null;
  try {
    modified = fs.statSync(filePath).mtime;
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
  if (modified && formatDay(modified) !== formatDay(now)) {
    const rotated = path.join(dir, `${name}.${formatDay(modified)}${ext}`);
    if (fs.existsSync(rotated)) {
      fs.appendFileSync(rotated, fs.readFileSync(filePath));
      fs.rmSync(filePath);
    } else {
      fs.renameSync(filePath, rotated);
    }
  }

  const cutoff = formatDay(new Date(now.getTime() - retentionDays * DAY_MS));
  const prefix = `${name}.`;
  let removed = 0;
  for (const entry of fs.readdirSync(dir)) {
    if (!entry.startsWith(prefix) || !entry.endsWith(ext)) continue;
    const day = entry.slice(prefix.length, entry.length - ext.length);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(day) || day >= cutoff) continue;
    fs.rmSync(path.join(dir, entry), { force: true });
    removed += 1;
  }
  return removed;
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
