import fs from "node:fs/promises";
import path from "node:path";

import { beforeEach, describe, expect, it } from "vitest";

import { createSilentLogger } from "../../../src/log.js";
import { ConversationLog } from "../../../src/memory/conversation-log.js";
import { TenantLanes } from "../../../src/memory/tenant-lanes.js";
import { makeTempDir } from "../../helpers/fakes.js";

const NOW = new Date("2024-03-10T12:00:00.000Z");

describe("ConversationLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = path.join(await makeTempDir("audit-test-"), "conversations");
  });

  function auditLog(enabled = true): ConversationLog {
    return new ConversationLog({
      dir,
      lanes: new TenantLanes(createSilentLogger()),
      retentionDays: 30,
      enabled,
      logger: createSilentLogger(),
      now: () => NOW,
    });
  }

  it("writes uploads and queries to the tenant's daily file", async () => {
    const log = auditLog();
    await log.recordUpload(
      "u1",
      [
        { role: "user", content: "hello", timestamp: NOW.toISOString() },
        { role: "assistant", content: "hi there", timestamp: NOW.toISOString() },
      ],
      1,
    );
    await log.recordQuery("u1", "where?", 2, 15);

    expect(await fs.readFile(log.filePath("u1", "2024-03-10"), "utf-8")).toBe(
      "## 2024-03-10T12:00:00.000Z upload\n**user**: hello\n**assistant**: hi there\n_1 file(s) indexed_\n\n" +
        "## 2024-03-10T12:00:00.000Z query\n> where?\n_2 chunk(s) retrieved in 15ms_\n\n",
    );
  });

  it("removes the tenant's expired files when a new day starts", async () => {
    await fs.mkdir(dir, { recursive: true });
    for (const name of ["u1_2024-01-01.md", "u1_2024-03-01.md", "u2_2024-01-01.md", "u1_b_2024-01-01.md"]) {
      await fs.writeFile(path.join(dir, name), "old\n", "utf-8");
    }

    await auditLog().recordQuery("u1", "q", 0, 1);

    expect((await fs.readdir(dir)).sort()).toEqual([
      "u1_2024-03-01.md",
      "u1_2024-03-10.md",
      "u1_b_2024-01-01.md",
      "u2_2024-01-01.md",
    ]);
  });

  it("prunes nothing when the directory does not exist", async () => {
    await expect(auditLog().prune("u1")).resolves.toBe(0);
  });

  it("writes nothing when disabled", async () => {
    await auditLog(false).recordQuery("u1", "q", 0, 1);
    await expect(fs.readdir(dir)).rejects.toThrow();
  });

  it("swallows write failures", async () => {
    await fs.mkdir(path.dirname(dir), { recursive: true });
    await fs.writeFile(dir, "not a directory", "utf-8");
    await expect(auditLog().recordQuery("u1", "q", 0, 1)).resolves.toBeUndefined();
  });
});
