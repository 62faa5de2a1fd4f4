// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * PID lock file enforcing one pipeline run per host.
 * Uses O_EXCL (via writeFileExclusive) for atomic acquisition; a lock whose
 * PID is not a live process is stale and is taken over with an atomic
 * rename. Release is registered as a finalizer so it runs on success,
 * failure and interruption alike.
 */

import { Effect, Option, type Scope, pipe } from "effect";
import { BackupError, ErrorCode, type SystemError } from "../lib/errors";
import { type AbsolutePath, parentPath, pathWithSuffix } from "../lib/types";
import {
  deleteFileIfExists,
  ensureDirectory,
  readFileOption,
  renameFile,
  writeFile,
  writeFileExclusive,
} from "./fs";

export interface LockRecord {
  readonly pid: number;
}

/** First line holds the PID; anything else makes the record unreadable (stale). */
export const parseLockContent = (content: string): Option.Option<LockRecord> =>
  pipe(
    Option.fromNullable(content.trim().split("\n")[0]),
    Option.map((line) => line.trim()),
    Option.filter((line) => /^\d+$/.test(line)),
    Option.map((line) => Number.parseInt(line, 10)),
    Option.filter((pid) => pid > 0),
    Option.map((pid): LockRecord => ({ pid }))
  );

/** Signal 0 performs the permission and existence checks without delivering anything. */
export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to another user
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
};

const isStale = (content: Option.Option<string>): boolean =>
  pipe(
    content,
    Option.flatMap(parseLockContent),
    Option.match({
      onNone: (): boolean => true,
      onSome: (record): boolean => !isProcessAlive(record.pid),
    })
  );

const lockContent = (): string => `${process.pid}\n`;

const alreadyRunning = (lockPath: AbsolutePath, content: Option.Option<string>): BackupError =>
  new BackupError({
    code: ErrorCode.ALREADY_RUNNING,
    message: pipe(
      content,
      Option.flatMap(parseLockContent),
      Option.match({
        onNone: (): string => `Another backup is running (lock ${lockPath})`,
        onSome: (r): string => `Another backup is running (PID: ${r.pid}, lock ${lockPath})`,
      })
    ),
  });

/**
 * Replace a stale lock: write our PID beside it, re-check that the lock is
 * still stale, rename over it, then confirm the record is ours.
 */
const takeoverStaleLock = (
  lockPath: AbsolutePath
): Effect.Effect<boolean, SystemError> =>
  Effect.gen(function* () {
    const tempPath = pathWithSuffix(lockPath, `.${process.pid}.tmp`);
    yield* writeFile(tempPath, lockContent());

    const current = yield* readFileOption(lockPath);
    if (!isStale(current)) {
      yield* deleteFileIfExists(tempPath);
      return false;
    }

    yield* renameFile(tempPath, lockPath);
    const after = yield* readFileOption(lockPath);
    return pipe(
      after,
      Option.flatMap(parseLockContent),
      Option.exists((r) => r.pid === process.pid)
    );
  });

/**
 * Fails with `ALREADY_RUNNING` when a live process holds the lock;
 * otherwise clears any stale lock and records the current PID.
 */
export const acquireLock = (
  lockPath: AbsolutePath
): Effect.Effect<void, BackupError | SystemError> =>
  Effect.gen(function* () {
    yield* ensureDirectory(parentPath(lockPath));

    const created = yield* writeFileExclusive(lockPath, lockContent());
    if (Option.isSome(created)) {
      return;
    }

    const existing = yield* readFileOption(lockPath);
    if (!isStale(existing)) {
      return yield* Effect.fail(alreadyRunning(lockPath, existing));
    }

    yield* Effect.logWarning(
      pipe(
        existing,
        Option.flatMap(parseLockContent),
        Option.match({
          onNone: (): string => `Removing unreadable lock file ${lockPath}`,
          onSome: (r): string => `Removing stale lock file ${lockPath} (PID ${r.pid} is not running)`,
        })
      )
    );

    const taken = yield* takeoverStaleLock(lockPath);
    if (!taken) {
      const holder = yield* readFileOption(lockPath);
      return yield* Effect.fail(alreadyRunning(lockPath, holder));
    }
  });

/** Removes the lock file unconditionally. Never fails; problems are logged. */
export const releaseLock = (lockPath: AbsolutePath): Effect.Effect<void> =>
  pipe(
    deleteFileIfExists(lockPath),
    Effect.catchAll((e) => Effect.logWarning(`Failed to release lock: ${e.message}`))
  );

/** Scoped lock: held until the enclosing scope closes. */
export const lockScoped = (
  lockPath: AbsolutePath
): Effect.Effect<void, BackupError | SystemError, Scope.Scope> =>
  Effect.acquireRelease(acquireLock(lockPath), () => releaseLock(lockPath));
