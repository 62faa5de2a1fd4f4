// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { statfs } from "node:fs/promises";
import { Effect } from "effect";
import { BackupError, ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import { formatBytes } from "../lib/format";
import { type AbsolutePath, parentPath } from "../lib/types";
import { pathExists } from "./fs";

/** Free space required in the scratch filesystem before archiving. */
export const MIN_FREE_BYTES = 1024 * 1024 * 1024;

/** The scratch directory may not exist yet; walk up to a directory that does. */
export const nearestExistingAncestor = (p: AbsolutePath): Effect.Effect<AbsolutePath> =>
  Effect.gen(function* () {
    let current = p;
    while (current !== "/" && !(yield* pathExists(current))) {
      current = parentPath(current);
    }
    return current;
  });

/** Bytes available to unprivileged users on the filesystem holding `p`. */
export const freeBytes = (p: AbsolutePath): Effect.Effect<number, SystemError> =>
  Effect.gen(function* () {
    const probe = yield* nearestExistingAncestor(p);
    return yield* Effect.tryPromise({
      try: async (): Promise<number> => {
        const stats = await statfs(probe);
        return stats.bavail * stats.bsize;
      },
      catch: (e): SystemError =>
        new SystemError({
          code: ErrorCode.FILE_READ_FAILED,
          message: `Failed to query free space for ${probe}: ${errorMessage(e)}`,
          path: probe,
          ...causeOf(e),
        }),
    });
  });

export const ensureFreeSpace = (
  p: AbsolutePath,
  required: number = MIN_FREE_BYTES
): Effect.Effect<number, BackupError | SystemError> =>
  Effect.filterOrFail(
    freeBytes(p),
    (available) => available >= required,
    (available) =>
      new BackupError({
        code: ErrorCode.INSUFFICIENT_SPACE,
        message: `Insufficient disk space in ${p}: ${formatBytes(available)} available, ${formatBytes(required)} required`,
      })
  );
