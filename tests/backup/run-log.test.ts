// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { formatRunLogLine, makeFileRunLog, tailRunLog } from "../../src/backup/run-log";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { makeTempDir, removeDir, runTest } from "../helpers/layers";

const STAMPED = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}: /;

describe("formatRunLogLine", () => {
  test("prefixes the local timestamp", () => {
    expect(formatRunLogLine(new Date(2025, 5, 30, 23, 59, 1), "pipeline completed")).toBe(
      "2025-06-30 23:59:01: pipeline completed\n"
    );
  });
});

describe("file run log", () => {
  let dir: AbsolutePath;

  beforeEach(async () => {
    dir = await makeTempDir("runlog");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("creates the directory and appends stamped lines", async () => {
    const logFile = pathJoin(dir, "log", "vps-backup.log");

    await runTest(
      Effect.gen(function* () {
        const log = yield* makeFileRunLog(logFile);
        yield* log.append("starting backup");
        yield* log.append("ERROR: disk full");
      })
    );

    const lines = (await readFile(logFile, "utf-8")).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(STAMPED);
    expect(lines[0]?.replace(STAMPED, "")).toBe("starting backup");
    expect(lines[1]?.replace(STAMPED, "")).toBe("ERROR: disk full");
    expect(lines[2]).toBe("");
  });

  test("an unwritable log does not fail the caller", async () => {
    await writeFile(join(dir, "blocker"), "");
    const logFile = pathJoin(dir, "blocker", "vps-backup.log");

    const result = await runTest(
      Effect.gen(function* () {
        const log = yield* makeFileRunLog(logFile);
        yield* log.append("one");
        yield* log.append("two");
        return "done";
      })
    );
    expect(result).toBe("done");
  });

  test("tail returns the last lines and treats a missing log as empty", async () => {
    await mkdir(join(dir, "log"));
    const logFile = pathJoin(dir, "log", "vps-backup.log");
    await writeFile(logFile, "a\nb\n\nc\nd\n");

    expect(await runTest(tailRunLog(logFile, 2))).toEqual(["c", "d"]);
    expect(await runTest(tailRunLog(logFile, 50))).toEqual(["a", "b", "c", "d"]);
    expect(await runTest(tailRunLog(pathJoin(dir, "absent.log"), 5))).toEqual([]);
  });
});
