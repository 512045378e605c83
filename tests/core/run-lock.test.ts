import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { acquireRunLock, LOCK_FILE_NAME, PreconditionError } from "../../src/core";

// Far above any pid the kernel hands out
const DEAD_PID = 999_999_999;

describe("acquireRunLock", () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dbshelf-lock-test-"));
    lockPath = path.join(tempDir, LOCK_FILE_NAME);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("writes the owner pid and removes the file on release", async () => {
    const lock = await acquireRunLock(tempDir, 4242);

    expect(lock.path).toBe(lockPath);
    expect(await readFile(lockPath, "utf8")).toBe("4242\n");

    await lock.release();
    expect(existsSync(lockPath)).toBe(false);
  });

  test("refuses a lock held by a live process", async () => {
    const held = await acquireRunLock(tempDir);

    const error = await acquireRunLock(tempDir, 4242).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toMatchObject({
      message: `Another run is in progress (pid ${process.pid}, lock ${lockPath})`,
    });
    held.releaseSync();
  });

  test("replaces a lock left by a dead process", async () => {
    await writeFile(lockPath, `${DEAD_PID}\n`);

    const lock = await acquireRunLock(tempDir, 4242);

    expect(await readFile(lockPath, "utf8")).toBe("4242\n");
    await lock.release();
  });

  test("replaces a lock with unreadable content", async () => {
    await writeFile(lockPath, "garbage");

    const lock = await acquireRunLock(tempDir, 4242);

    expect(await readFile(lockPath, "utf8")).toBe("4242\n");
    lock.releaseSync();
    expect(existsSync(lockPath)).toBe(false);
  });

  test("release is idempotent", async () => {
    const lock = await acquireRunLock(tempDir, 4242);
    await lock.release();
    await writeFile(lockPath, "9\n");

    await lock.release();
    lock.releaseSync();

    expect(await readFile(lockPath, "utf8")).toBe("9\n");
  });
});
