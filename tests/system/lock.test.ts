// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { readFile, writeFile } from "node:fs/promises";
import { Effect, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { pathExists } from "../../src/system/fs";
import {
  acquireLock,
  isProcessAlive,
  lockScoped,
  parseLockContent,
  releaseLock,
} from "../../src/system/lock";
import { failureOf, makeTempDir, removeDir, runTest, runTestExit } from "../helpers/layers";

/** Above the kernel's pid_max ceiling, so never a live process. */
const DEAD_PID = 4194305;

describe("parseLockContent", () => {
  test("reads the PID from the first line", () => {
    expect(parseLockContent("1234\n")).toEqual(Option.some({ pid: 1234 }));
    expect(parseLockContent("  42  \nleftover")).toEqual(Option.some({ pid: 42 }));
  });

  test("anything else is unreadable", () => {
    expect(parseLockContent("")).toEqual(Option.none());
    expect(parseLockContent("abc\n")).toEqual(Option.none());
    expect(parseLockContent("0\n")).toEqual(Option.none());
  });
});

describe("isProcessAlive", () => {
  test("detects the current process and a dead PID", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });
});

describe("lock file", () => {
  let dir: AbsolutePath;
  let lockPath: AbsolutePath;

  beforeEach(async () => {
    dir = await makeTempDir("lock");
    lockPath = pathJoin(dir, "run", "vps-backup.lock");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("acquire writes the PID and release removes the file", async () => {
    await runTest(acquireLock(lockPath));
    expect(await readFile(lockPath, "utf-8")).toBe(`${process.pid}\n`);

    await runTest(releaseLock(lockPath));
    expect(await runTest(pathExists(lockPath))).toBe(false);
  });

  test("a second acquisition fails while the holder is alive", async () => {
    await runTest(acquireLock(lockPath));
    const exit = await runTestExit(acquireLock(lockPath));

    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      code: ErrorCode.ALREADY_RUNNING,
      message: `Another backup is running (PID: ${process.pid}, lock ${lockPath})`,
    });
  });

  test("a stale lock is taken over", async () => {
    await runTest(acquireLock(lockPath));
    await writeFile(lockPath, `${DEAD_PID}\n`);

    await runTest(acquireLock(lockPath));
    expect(await readFile(lockPath, "utf-8")).toBe(`${process.pid}\n`);
  });

  test("an unreadable lock is treated as stale", async () => {
    await runTest(acquireLock(lockPath));
    await writeFile(lockPath, "garbage");

    await runTest(acquireLock(lockPath));
    expect(await readFile(lockPath, "utf-8")).toBe(`${process.pid}\n`);
  });

  test("a scoped lock is released after a failure", async () => {
    const exit = await runTestExit(
      Effect.scoped(Effect.zipRight(lockScoped(lockPath), Effect.fail("boom")))
    );

    expect(Option.getOrUndefined(failureOf(exit))).toBe("boom");
    expect(await runTest(pathExists(lockPath))).toBe(false);
  });

  test("a scoped lock is held while the scope is open", async () => {
    const seen = await runTest(
      Effect.scoped(
        Effect.zipRight(
          lockScoped(lockPath),
          Effect.promise(() => readFile(lockPath, "utf-8"))
        )
      )
    );
    expect(seen).toBe(`${process.pid}\n`);
    expect(await runTest(pathExists(lockPath))).toBe(false);
  });
});
