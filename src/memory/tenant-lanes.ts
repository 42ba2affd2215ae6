import type { Logger } from "../log.js";

type LaneEntry = {
  run: () => Promise<void>;
  enqueuedAt: number;
};

type LaneState = {
  lane: string;
  queue: LaneEntry[];
  active: boolean;
};

export type LaneSnapshot = {
  lane: string;
  queued: number;
  active: boolean;
  oldestEnqueuedAt?: number;
};

/**
 * Single-writer FIFO lanes keyed by name (for example `history:<tenant>`).
 * Tasks on one lane run strictly one after another in enqueue order; tasks on
 * different lanes run concurrently. Idle lanes are dropped.
 */
export class TenantLanes {
  private readonly lanes = new Map<string, LaneState>();
  private readonly inflight = new Set<Promise<unknown>>();
  private readonly logger: Logger;
  private readonly warnAfterMs: number;

  constructor(logger: Logger, warnAfterMs = 2_000) {
    this.logger = logger.child({ component: "tenant-lanes" });
    this.warnAfterMs = warnAfterMs;
  }

  enqueue<T>(lane: string, task: () => Promise<T>): Promise<T> {
    const state = this.getLane(lane);
    const promise = new Promise<T>((resolve, reject) => {
      state.queue.push({
        enqueuedAt: Date.now(),
        run: async () => {
          const start = Date.now();
          try {
            const result = await task();
            this.logger.debug({ lane, durationMs: Date.now() - start }, "lane task completed");
            resolve(result);
          } catch (err) {
            this.logger.debug({ lane, durationMs: Date.now() - start, error: String(err) }, "lane task failed");
            reject(err);
          }
        },
      });
    });
    this.track(promise);
    this.pump(state);
    return promise;
  }

  size(lane: string): number {
    const state = this.lanes.get(lane);
    if (!state) return 0;
    return state.queue.length + (state.active ? 1 : 0);
  }

  totalSize(): number {
    let total = 0;
    for (const state of this.lanes.values()) {
      total += state.queue.length + (state.active ? 1 : 0);
    }
    return total;
  }

  snapshot(): LaneSnapshot[] {
    const lanes: LaneSnapshot[] = [];
    for (const state of this.lanes.values()) {
      lanes.push({
        lane: state.lane,
        queued: state.queue.length,
        active: state.active,
        oldestEnqueuedAt: state.queue[0]?.enqueuedAt,
      });
    }
    return lanes.sort((a, b) => a.lane.localeCompare(b.lane));
  }

  /**
   * Resolve once every lane is idle, including tasks enqueued while draining.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private getLane(lane: string): LaneState {
    const existing = this.lanes.get(lane);
    if (existing) return existing;
    const created: LaneState = { lane, queue: [], active: false };
    this.lanes.set(lane, created);
    return created;
  }

  private track(promise: Promise<unknown>): void {
    const settled = promise.then(
      () => undefined,
      () => undefined,
    );
    this.inflight.add(settled);
    void settled.then(() => this.inflight.delete(settled));
  }

  private pump(state: LaneState): void {
    if (state.active) return;
    const entry = state.queue.shift();
    if (!entry) {
      if (this.lanes.get(state.lane) === state) this.lanes.delete(state.lane);
      return;
    }
    state.active = true;
    const waitedMs = Date.now() - entry.enqueuedAt;
    if (waitedMs >= this.warnAfterMs) {
      this.logger.warn({ lane: state.lane, waitedMs }, "lane wait exceeded");
    }
    void entry.run().finally(() => {
      state.active = false;
      this.pump(state);
    });
  }
}
