import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { RunStateStore } from "../../src/state";

describe("RunStateStore", () => {
  let tempDir: string;
  let store: RunStateStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dbshelf-state-test-"));
    store = new RunStateStore(tempDir);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("names the state file after the sanitized path", () => {
    expect(store.pathFor("/data/app.db")).toBe(path.join(tempDir, "_data_app.db.last"));
  });

  test("reads 0 when no state was recorded", async () => {
    expect(await store.readLastRun("/data/app.db")).toBe(0);
  });

  test("writes one decimal integer and reads it back", async () => {
    await store.writeLastRun("/data/app.db", 1_704_110_400);

    expect(await readFile(store.pathFor("/data/app.db"), "utf8")).toBe("1704110400\n");
    expect(await store.readLastRun("/data/app.db")).toBe(1_704_110_400);
    expect(await readdir(tempDir)).toEqual(["_data_app.db.last"]);
  });

  test("treats non-numeric content as never run", async () => {
    await writeFile(store.pathFor("/data/app.db"), "yesterday\n");

    expect(await store.readLastRun("/data/app.db")).toBe(0);
  });

  test("creates the state directory when it is missing", async () => {
    const nested = new RunStateStore(path.join(tempDir, "a", "b"));

    await nested.writeLastRun("/data/app.db", 5);

    expect(await nested.readLastRun("/data/app.db")).toBe(5);
  });
});
