import { BackgroundTaskError } from "../errors.js";
import type { Logger } from "../log.js";
import { readTextIfExists, writeFileAtomic } from "../utils/fs.js";
import { isNoNewInfo, mergeProfile } from "./profile-merge.js";
import { buildExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from "./prompts.js";
import type { TenantLanes } from "./tenant-lanes.js";
import type { TenantPaths } from "./tenant.js";
import type { CompletionProvider, ConversationMessage, Tenant } from "./types.js";

export type ProfileMergeOutcome = "updated" | "unchanged" | "failed" | "skipped";

/**
 * A scheduled merge. `done` never rejects.
 */
export type ProfileMergeHandle = {
  done: Promise<ProfileMergeOutcome>;
  isSettled(): boolean;
};

export type ProfileStats = {
  updated: number;
  unchanged: number;
  failed: number;
  pending: number;
};

export type ProfileStoreOptions = {
  paths: TenantPaths;
  lanes: TenantLanes;
  completion: CompletionProvider;
  enabled?: boolean;
  logger: Logger;
};

/**
 * One markdown profile per tenant, refined from conversation by the LLM.
 * Merges for one tenant run one at a time, each on top of the last.
 */
export class ProfileStore {
  private readonly paths: TenantPaths;
  private readonly lanes: TenantLanes;
  private readonly completion: CompletionProvider;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly counters = { updated: 0, unchanged: 0, failed: 0 };
  private pending = 0;

  constructor(options: ProfileStoreOptions) {
    this.paths = options.paths;
    this.lanes = options.lanes;
    this.completion = options.completion;
    this.enabled = options.enabled ?? true;
    this.logger = options.logger.child({ component: "profile" });
  }

  /**
   * Profile text, or "" when the tenant has none
   */
  async read(tenant: Tenant): Promise<string> {
    return (await readTextIfExists(this.paths.profile(tenant))) ?? "";
  }

  /**
   * Extract facts from `messages` and merge them into the stored profile.
   * Rejects on extraction or write failure.
   */
  async extractAndMerge(tenant: Tenant, messages: ConversationMessage[]): Promise<ProfileMergeOutcome> {
    if (!this.enabled || messages.length === 0) return "skipped";

    return this.lanes.enqueue(`profile:${tenant}`, async () => {
      const existing = await this.read(tenant);
      const extracted = await this.completion.complete({
        system: EXTRACTION_SYSTEM_PROMPT,
        user: buildExtractionPrompt(messages, existing),
        maxTokens: 1024,
      });
      if (isNoNewInfo(extracted)) {
        this.logger.debug({ tenant }, "no new profile information");
        return "unchanged";
      }

      const merged = mergeProfile(existing, extracted);
      if (merged === existing) return "unchanged";
      await writeFileAtomic(this.paths.profile(tenant), merged);
      this.logger.info({ tenant, length: merged.length }, "profile updated");
      return "updated";
    });
  }

  /**
   * Run extractAndMerge in the background. Failures are counted and logged.
   */
  scheduleMerge(tenant: Tenant, messages: ConversationMessage[]): ProfileMergeHandle {
    let settled = false;
    this.pending += 1;
    const done = this.extractAndMerge(tenant, messages)
      .catch((err: unknown): ProfileMergeOutcome => {
        const failure = new BackgroundTaskError("profile_merge", tenant, err);
        this.logger.error({ tenant, error: failure.message }, "profile merge failed");
        return "failed";
      })
      .then((outcome) => {
        settled = true;
        this.pending -= 1;
        if (outcome !== "skipped") this.counters[outcome] += 1;
        return outcome;
      });
    return { done, isSettled: () => settled };
  }

  stats(): ProfileStats {
    return { ...this.counters, pending: this.pending };
  }
}
