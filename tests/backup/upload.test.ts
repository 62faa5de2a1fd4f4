// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { writeFile } from "node:fs/promises";
import { Effect, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { uploadChecksum, uploadVerified } from "../../src/backup/upload";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { type MemoryRemote, makeMemoryRemote } from "../helpers/fakes";
import { failureOf, makeTempDir, removeDir, runTest, runTestExit } from "../helpers/layers";

const DIR = "mem:backups";
const OPTIONS = { attempts: 3, retryDelay: 0 };

describe("uploadVerified", () => {
  let dir: AbsolutePath;
  let file: AbsolutePath;
  let remote: MemoryRemote;

  beforeEach(async () => {
    dir = await makeTempDir("upload");
    file = pathJoin(dir, "backup-h-20250101-120000.tar.gz.enc");
    await writeFile(file, "payload");
    remote = makeMemoryRemote();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("succeeds on the first verified attempt", async () => {
    const outcome = await runTest(
      uploadVerified(file, DIR, OPTIONS).pipe(Effect.provide(remote.layer))
    );
    expect(outcome).toEqual({ name: "backup-h-20250101-120000.tar.gz.enc", size: 7, attempts: 1 });
    expect(remote.names(DIR)).toEqual(["backup-h-20250101-120000.tar.gz.enc"]);
  });

  test("retries transport failures", async () => {
    remote.faults.uploadFailures = 2;
    const outcome = await runTest(
      uploadVerified(file, DIR, OPTIONS).pipe(Effect.provide(remote.layer))
    );
    expect(outcome.attempts).toBe(3);
  });

  test("a size mismatch consumes an attempt and retries", async () => {
    remote.faults.sizeSkews = 1;
    const outcome = await runTest(
      uploadVerified(file, DIR, OPTIONS).pipe(Effect.provide(remote.layer))
    );
    expect(outcome.attempts).toBe(2);
    expect(remote.calls.filter((c) => c.startsWith("upload"))).toHaveLength(2);
  });

  test("fails with UPLOAD_FAILED once every attempt failed", async () => {
    remote.faults.uploadFailures = 3;
    const exit = await runTestExit(
      uploadVerified(file, DIR, OPTIONS).pipe(Effect.provide(remote.layer))
    );
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "BackupError",
      code: ErrorCode.UPLOAD_FAILED,
      message: "Upload failed after 3 attempts: connection reset",
    });
    expect(remote.calls).toEqual([
      "upload backup-h-20250101-120000.tar.gz.enc",
      "upload backup-h-20250101-120000.tar.gz.enc",
      "upload backup-h-20250101-120000.tar.gz.enc",
    ]);
  });

  test("persistent size mismatch reports the sizes", async () => {
    remote.faults.sizeSkews = 3;
    const exit = await runTestExit(
      uploadVerified(file, DIR, OPTIONS).pipe(Effect.provide(remote.layer))
    );
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      code: ErrorCode.UPLOAD_FAILED,
      message: "Upload failed after 3 attempts: size mismatch (local 7 bytes, remote 8 bytes)",
    });
  });
});

describe("uploadChecksum", () => {
  test("returns the failure text instead of failing", async () => {
    const dir = await makeTempDir("checksum");
    const file = pathJoin(dir, "x.tar.gz.enc.sha256");
    await writeFile(file, "digest\n");
    const remote = makeMemoryRemote();
    remote.faults.failChecksumUploads = true;

    const result = await runTest(uploadChecksum(file, DIR).pipe(Effect.provide(remote.layer)));
    expect(result).toEqual(Option.some("checksum upload refused"));
    await removeDir(dir);
  });
});
