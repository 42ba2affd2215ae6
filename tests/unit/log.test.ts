import fs from "node:fs/promises";
import path from "node:path";

import { beforeEach, describe, expect, it } from "vitest";

import { rotateLogFile } from "../../src/log.js";
import { makeTempDir } from "../helpers/fakes.js";

const NOW = new Date("2024-03-10T12:00:00.000Z");
const YESTERDAY = new Date("2024-03-09T10:00:00.000Z");

describe("rotateLogFile", () => {
  let dir: string;
  let logFile: string;

  beforeEach(async () => {
    dir = await makeTempDir("log-test-");
    logFile = path.join(dir, "system.log");
  });

  it("moves yesterday's log aside under its date", async () => {
    await fs.writeFile(logFile, "old line\n");
    await fs.utimes(logFile, YESTERDAY, YESTERDAY);

    expect(rotateLogFile(logFile, 30, NOW)).toBe(0);

    await expect(fs.readFile(path.join(dir, "system.2024-03-09.log"), "utf-8")).resolves.toBe("old line\n");
    expect((await fs.readdir(dir)).sort()).toEqual(["system.2024-03-09.log"]);
  });

  it("leaves a log written today in place", async () => {
    await fs.writeFile(logFile, "today\n");
    await fs.utimes(logFile, NOW, NOW);

    rotateLogFile(logFile, 30, NOW);

    expect(await fs.readdir(dir)).toEqual(["system.log"]);
  });

  it("appends to an existing rotated file for the same day", async () => {
    await fs.writeFile(path.join(dir, "system.2024-03-09.log"), "first\n");
    await fs.writeFile(logFile, "second\n");
    await fs.utimes(logFile, YESTERDAY, YESTERDAY);

    rotateLogFile(logFile, 30, NOW);

    await expect(fs.readFile(path.join(dir, "system.2024-03-09.log"), "utf-8")).resolves.toBe("first\nsecond\n");
    expect(await fs.readdir(dir)).toEqual(["system.2024-03-09.log"]);
  });

  it("deletes rotated files past retention and nothing else", async () => {
    for (const name of ["system.2024-01-01.log", "system.2024-02-20.log", "other.2024-01-01.log"]) {
      await fs.writeFile(path.join(dir, name), "x\n");
    }

    expect(rotateLogFile(logFile, 30, NOW)).toBe(1);

    expect((await fs.readdir(dir)).sort()).toEqual(["other.2024-01-01.log", "system.2024-02-20.log"]);
  });
});
