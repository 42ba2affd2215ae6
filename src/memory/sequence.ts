import { z } from "zod";

import type { Logger } from "../log.js";
import { readTextIfExists, writeFileAtomic } from "../utils/fs.js";
import type { TenantLanes } from "./tenant-lanes.js";
import type { TenantPaths } from "./tenant.js";
import type { Tenant } from "./types.js";

const SequenceFileSchema = z.object({ next: z.number().int().min(0) });

/**
 * Per-tenant chunk numbering. Indexes are handed out in append order and
 * never reused, even when the chunks they were reserved for are not stored.
 */
export class SequenceAllocator {
  private readonly paths: TenantPaths;
  private readonly lanes: TenantLanes;
  private readonly logger: Logger;

  constructor(paths: TenantPaths, lanes: TenantLanes, logger: Logger) {
    this.paths = paths;
    this.lanes = lanes;
    this.logger = logger.child({ component: "sequence" });
  }

  /**
   * Reserve `count` consecutive indexes and return the first one
   */
  async reserve(tenant: Tenant, count: number): Promise<number> {
    return this.lanes.enqueue(`sequence:${tenant}`, async () => {
      const first = await this.readNext(tenant);
      if (count > 0) {
        await writeFileAtomic(this.paths.sequence(tenant), JSON.stringify({ next: first + count }));
      }
      return first;
    });
  }

  async peek(tenant: Tenant): Promise<number> {
    return this.lanes.enqueue(`sequence:${tenant}`, () => this.readNext(tenant));
  }

  private async readNext(tenant: Tenant): Promise<number> {
    const raw = await readTextIfExists(this.paths.sequence(tenant));
    if (raw === null) return 0;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.error({ tenant, error: String(err) }, "sequence file unreadable");
      throw err;
    }
    return SequenceFileSchema.parse(parsed).next;
  }
}
