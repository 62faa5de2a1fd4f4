// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Upload controller. An attempt counts only when the transport succeeds
 * and the remote size equals the local size; a mismatch consumes the
 * attempt and is retried after the fixed delay. The checksum companion
 * goes up only after the artifact is verified, and its failure is a
 * warning.
 */

import { basename } from "node:path";
import { Data, type Duration, Effect, Option, Ref, pipe } from "effect";
import { BackupError, ErrorCode, type RemoteError, type SystemError } from "../lib/errors";
import { formatBytes } from "../lib/format";
import { fixedRetrySchedule } from "../lib/retry";
import type { AbsolutePath } from "../lib/types";
import { RemoteTransport } from "../remote/transport";
import { getFileSize } from "../system/fs";

export interface UploadOptions {
  readonly attempts: number;
  readonly retryDelay: Duration.DurationInput;
}

export interface UploadOutcome {
  readonly name: string;
  readonly size: number;
  /** 1-based attempt that verified */
  readonly attempts: number;
}

class SizeMismatch extends Data.TaggedError("SizeMismatch")<{
  readonly expected: number;
  readonly actual: Option.Option<number>;
  readonly message: string;
}> {}

const sizeMismatch = (expected: number, actual: Option.Option<number>): SizeMismatch =>
  new SizeMismatch({
    expected,
    actual,
    message: Option.match(actual, {
      onNone: (): string => "object missing after upload",
      onSome: (remote): string =>
        `size mismatch (local ${expected} bytes, remote ${remote} bytes)`,
    }),
  });

type AttemptError = RemoteError | SizeMismatch;

const attemptOnce = (
  localFile: AbsolutePath,
  name: string,
  remoteDir: string,
  expected: number
): Effect.Effect<void, AttemptError, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    yield* transport.upload(localFile, remoteDir);
    const actual = yield* transport.size(remoteDir, name);
    if (!Option.contains(actual, expected)) {
      return yield* Effect.fail(sizeMismatch(expected, actual));
    }
  });

/** Fails with UPLOAD_FAILED once `attempts` tries have all failed. */
export const uploadVerified = (
  localFile: AbsolutePath,
  remoteDir: string,
  options: UploadOptions
): Effect.Effect<UploadOutcome, BackupError | SystemError, RemoteTransport> =>
  Effect.gen(function* () {
    const name = basename(localFile);
    const size = yield* getFileSize(localFile);
    const counter = yield* Ref.make(0);

    const attempt = pipe(
      Ref.updateAndGet(counter, (n) => n + 1),
      Effect.tap((n) =>
        Effect.logInfo(`Uploading ${name} (${formatBytes(size)}), attempt ${n}/${options.attempts}`)
      ),
      Effect.flatMap((n) =>
        pipe(
          attemptOnce(localFile, name, remoteDir, size),
          Effect.tapError((e) =>
            Effect.logWarning(`Upload attempt ${n}/${options.attempts} failed: ${e.message}`)
          )
        )
      )
    );

    yield* pipe(
      attempt,
      Effect.retry(fixedRetrySchedule(options.attempts, options.retryDelay)),
      Effect.catchAll((last) =>
        Effect.flatMap(
          Ref.get(counter),
          (n): Effect.Effect<never, BackupError> =>
            Effect.fail(
              new BackupError({
                code: ErrorCode.UPLOAD_FAILED,
                message: `Upload failed after ${n} attempts: ${last.message}`,
              })
            )
        )
      )
    );

    return { name, size, attempts: yield* Ref.get(counter) };
  });

/** Best effort; returns the failure text instead of failing. */
export const uploadChecksum = (
  checksumFile: AbsolutePath,
  remoteDir: string
): Effect.Effect<Option.Option<string>, never, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    return yield* pipe(
      transport.upload(checksumFile, remoteDir),
      Effect.as(Option.none<string>()),
      Effect.catchAll((e) =>
        Effect.as(
          Effect.logWarning(`Checksum upload failed: ${e.message}`),
          Option.some(e.message)
        )
      )
    );
  });

