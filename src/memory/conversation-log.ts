/**
 * Conversation audit log.
 *
 * Markdown files under <dataDir>/logs/conversations/, one per tenant per
 * UTC day (`<tenant>_<YYYY-MM-DD>.md`). When a tenant's log rolls over to a
 * new day, that tenant's files older than `retentionDays` are removed.
 * Audit writes never fail the request that produced them.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { describeError } from "../errors.js";
import type { Logger } from "../log.js";
import { appendLine, isMissingFile } from "../utils/fs.js";
import type { TenantLanes } from "./tenant-lanes.js";
import type { ConversationMessage, Tenant } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_FILE_RE = /^(\d{4}-\d{2}-\d{2})\.md$/;

export type ConversationLogOptions = {
  dir: string;
  lanes: TenantLanes;
  retentionDays: number;
  enabled?: boolean;
  logger: Logger;
  now?: () => Date;
};

export class ConversationLog {
  private readonly dir: string;
  private readonly lanes: TenantLanes;
  private readonly retentionDays: number;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lastDay = new Map<Tenant, string>();

  constructor(options: ConversationLogOptions) {
    this.dir = options.dir;
    this.lanes = options.lanes;
    this.retentionDays = options.retentionDays;
    this.enabled = options.enabled ?? true;
    this.logger = options.logger.child({ component: "audit" });
    this.now = options.now ?? (() => new Date());
  }

  filePath(tenant: Tenant, day: string): string {
    return path.join(this.dir, `${tenant}_${day}.md`);
  }

  async recordUpload(tenant: Tenant, messages: ConversationMessage[], fileCount: number): Promise<void> {
    const at = this.now();
    const lines = [`## ${at.toISOString()} upload`];
    for (const message of messages) {
      lines.push(`**${message.role}**: ${message.content}`);
    }
    if (fileCount > 0) lines.push(`_${fileCount} file(s) indexed_`);
    await this.write(tenant, at, lines);
  }

  async recordQuery(tenant: Tenant, query: string, retrieved: number, queryTimeMs: number): Promise<void> {
    const at = this.now();
    await this.write(tenant, at, [
      `## ${at.toISOString()} query`,
      `> ${query.replace(/\n/g, "\n> ")}`,
      `_${retrieved} chunk(s) retrieved in ${queryTimeMs}ms_`,
    ]);
  }

  /**
   * Delete this tenant's files dated before the retention window
   */
  async prune(tenant: Tenant): Promise<number> {
    const cutoff = formatDay(new Date(this.now().getTime() - this.retentionDays * DAY_MS));
    const prefix = `${tenant}_`;
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return 0;
      throw err;
    }

    let removed = 0;
    for (const name of names) {
      if (!name.startsWith(prefix)) continue;
      const day = DATE_FILE_RE.exec(name.slice(prefix.length))?.[1];
      if (!day || day >= cutoff) continue;
      await fs.rm(path.join(this.dir, name), { force: true });
      removed += 1;
    }
    if (removed > 0) this.logger.info({ tenant, removed }, "expired conversation logs removed");
    return removed;
  }

  private async write(tenant: Tenant, at: Date, lines: string[]): Promise<void> {
    if (!this.enabled) return;
    const day = formatDay(at);
    try {
      await this.lanes.enqueue(`audit:${tenant}`, async () => {
        if (this.lastDay.get(tenant) !== day) {
          this.lastDay.set(tenant, day);
          await this.prune(tenant);
        }
        await appendLine(this.filePath(tenant, day), `${lines.join("\n")}\n\n`);
      });
    } catch (err) {
      this.logger.warn({ tenant, error: describeError(err) }, "conversation log write failed");
    }
  }
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
