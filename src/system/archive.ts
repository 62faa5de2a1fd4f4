// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Gzip-compressed tar archives via the system `tar`.
 * Each source is archived relative to its parent directory so the archive
 * holds `nginx/...` rather than `etc/nginx/...`.
 */

import { Array as Arr, Effect, pipe } from "effect";
import { BackupError, ErrorCode, RestoreError, causeOf, errorMessage } from "../lib/errors";
import { splitSourcePath } from "../lib/paths";
import type { AbsolutePath } from "../lib/types";
import { exec, execLines } from "./exec";
import { pathExists } from "./fs";

export interface ArchivePlan {
  /** Sources that exist and are archived. */
  readonly included: readonly AbsolutePath[];
  /** Sources that were absent at archive time. */
  readonly missing: readonly AbsolutePath[];
}

/** Partition sources by existence, preserving configured order. */
export const planArchive = (sources: readonly AbsolutePath[]): Effect.Effect<ArchivePlan> =>
  Effect.gen(function* () {
    const flags = yield* Effect.forEach(sources, (s) => pathExists(s));
    const zipped = Arr.zip(sources, flags);
    return {
      included: pipe(
        zipped,
        Arr.filter(([, exists]) => exists),
        Arr.map(([s]) => s)
      ),
      missing: pipe(
        zipped,
        Arr.filter(([, exists]) => !exists),
        Arr.map(([s]) => s)
      ),
    };
  });

/** `-C parent leaf` pairs; an empty source list archives nothing. */
export const tarCreateArgs = (
  output: AbsolutePath,
  sources: readonly AbsolutePath[]
): readonly string[] => [
  "tar",
  "--ignore-failed-read",
  "--warning=no-file-changed",
  "-czf",
  output,
  ...(Arr.isEmptyReadonlyArray(sources)
    ? ["--files-from", "/dev/null"]
    : Arr.flatMap(sources, (s) => {
        const { parent, leaf } = splitSourcePath(s);
        return ["-C", parent, leaf];
      })),
];

const archiveFailed = (message: string, e?: unknown): BackupError =>
  new BackupError({
    code: ErrorCode.ARCHIVE_FAILED,
    message,
    ...causeOf(e),
  });

/**
 * Write a gzip tar of `sources` to `output`.
 * GNU tar exits 1 when files changed while being read; that archive is
 * still complete enough to keep, so only exit codes above 1 fail.
 */
export const createArchive = (
  output: AbsolutePath,
  sources: readonly AbsolutePath[]
): Effect.Effect<void, BackupError> =>
  pipe(
    exec(tarCreateArgs(output, sources)),
    Effect.mapError((e) => archiveFailed(`Failed to run tar: ${e.message}`, e)),
    Effect.flatMap((result) =>
      result.exitCode <= 1
        ? Effect.void
        : Effect.fail(
            archiveFailed(
              `tar exited with code ${result.exitCode}${result.stderr.trim() ? `: ${result.stderr.trim()}` : ""}`
            )
          )
    )
  );

/** Member names of a gzip tar. Fails with VERIFY_FAILED when unreadable. */
export const listArchive = (
  archive: AbsolutePath
): Effect.Effect<readonly string[], RestoreError> =>
  pipe(
    execLines(["tar", "-tzf", archive]),
    Effect.mapError(
      (e): RestoreError =>
        new RestoreError({
          code: ErrorCode.VERIFY_FAILED,
          message: `Archive is not a readable gzip tar: ${errorMessage(e)}`,
          ...causeOf(e),
        })
    )
  );

export const extractArchive = (
  archive: AbsolutePath,
  target: AbsolutePath
): Effect.Effect<void, RestoreError> =>
  pipe(
    execLines(["tar", "-xzf", archive, "-C", target]),
    Effect.asVoid,
    Effect.mapError(
      (e): RestoreError =>
        new RestoreError({
          code: ErrorCode.RESTORE_FAILED,
          message: `Failed to extract archive into ${target}: ${errorMessage(e)}`,
          ...causeOf(e),
        })
    )
  );
