// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { Effect, Layer, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { executeList, snapshotLines } from "../../src/cli/commands/list";
import { executeLogs } from "../../src/cli/commands/logs";
import { executeRun } from "../../src/cli/commands/run";
import type { BackupConfig } from "../../src/config/schema";
import type { AbsolutePath } from "../../src/lib/types";
import { TEST_REMOTE, makeTestConfig } from "../helpers/config";
import { makeMemoryRemote, makeMemoryRunLog, makeRecordingNotifier } from "../helpers/fakes";
import { makeTempDir, removeDir, runTest } from "../helpers/layers";

/** Everything written to stdout, split into lines. */
const captureStdout = () => {
  const chunks: string[] = [];
  vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array): boolean => {
    chunks.push(typeof chunk === "string" ? chunk : new TextDecoder().decode(chunk));
    return true;
  });
  return (): readonly string[] => chunks.join("").split("\n").filter((l) => l.length > 0);
};

describe("snapshotLines", () => {
  test("an empty remote", () => {
    expect(snapshotLines([])).toEqual(["No backups found"]);
  });

  test("aligns names and sizes", () => {
    expect(
      snapshotLines([
        {
          name: "backup-a-20250102-000000.tar.gz.enc",
          size: 2048,
          modified: new Date(2025, 0, 2, 3, 4, 5),
          hostname: Option.some("a"),
          hasChecksum: true,
        },
        {
          name: "backup-bb-20250101-000000.tar.gz.enc",
          size: 500,
          modified: new Date(2025, 0, 1, 0, 0, 0),
          hostname: Option.some("bb"),
          hasChecksum: false,
        },
      ])
    ).toEqual([
      "backup-a-20250102-000000.tar.gz.enc   2.00 KB     2025-01-02 03:04:05  sha256",
      "backup-bb-20250101-000000.tar.gz.enc  500 B       2025-01-01 00:00:00  no checksum",
    ]);
  });
});

describe("commands", () => {
  let dir: AbsolutePath;
  let config: BackupConfig;
  let output: () => readonly string[];

  beforeEach(async () => {
    dir = await makeTempDir("cli");
    await mkdir(join(dir, "data", "etc-app"), { recursive: true });
    config = makeTestConfig(dir);
    output = captureStdout();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  test("list prints JSON documents in json format", async () => {
    const remote = makeMemoryRemote();
    remote.put(
      TEST_REMOTE,
      "backup-h-20250101-120000.tar.gz.enc",
      "12345",
      new Date("2025-01-01T12:00:30.000Z")
    );

    await runTest(executeList({ config, format: "json" }).pipe(Effect.provide(remote.layer)));

    expect(output().map((l) => JSON.parse(l))).toEqual([
      [
        {
          name: "backup-h-20250101-120000.tar.gz.enc",
          size: 5,
          modified: "2025-01-01T12:00:30.000Z",
          checksum: false,
        },
      ],
    ]);
  });

  test("logs reports an empty log", async () => {
    await runTest(executeLogs({ config, format: "pretty", lines: 50 }));
    expect(output()).toEqual([`No entries in ${config.backup.logFile}`]);
  });

  test("run --dry-run prints the plan without touching the remote", async () => {
    const remote = makeMemoryRemote();

    await runTest(
      executeRun({ config, hostname: "host1", format: "pretty", dryRun: true }).pipe(
        Effect.provide(
          Layer.mergeAll(remote.layer, makeRecordingNotifier().layer, makeMemoryRunLog().layer)
        )
      )
    );

    const lines = output();
    expect(lines[0]?.startsWith("Artifact:  backup-host1-")).toBe(true);
    expect(lines.slice(1)).toEqual([
      `Remote:    ${TEST_REMOTE}`,
      "Retention: keep 2",
      `  + ${dir}/data/etc-app`,
    ]);
    expect(remote.calls).toEqual([]);
  });
});
