// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations as Effects over node:fs.
 * Every failure is a SystemError naming the path it concerns.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import {
  appendFile as nodeAppendFile,
  mkdir,
  readFile as nodeReadFile,
  writeFile as nodeWriteFile,
  rename,
  rm,
  stat,
} from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { Effect, Option } from "effect";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

const readError = (path: string, what: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `${what} ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const writeError = (path: string, what: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `${what} ${path}: ${errorMessage(e)}`,
    path,
    ...causeOf(e),
  });

const errnoCode = (e: unknown): Option.Option<string> =>
  e instanceof Error && "code" in e && typeof e.code === "string"
    ? Option.some(e.code)
    : Option.none();

const hasErrno = (e: unknown, code: string): boolean =>
  Option.getOrElse(
    Option.map(errnoCode(e), (c) => c === code),
    () => false
  );

// ============================================================================
// Reading
// ============================================================================

export const readFile = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<string> => nodeReadFile(path, "utf8"),
    catch: (e): SystemError => readError(path, "Failed to read file", e),
  });

/** Missing file reads as `Option.none()`; any other failure is an error. */
export const readFileOption = (
  path: AbsolutePath
): Effect.Effect<Option.Option<string>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<string>> => {
      try {
        return Option.some(await nodeReadFile(path, "utf8"));
      } catch (e) {
        if (hasErrno(e, "ENOENT")) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(path, "Failed to read file", e),
  });

// ============================================================================
// Writing
// ============================================================================

export const writeFile = (path: AbsolutePath, content: string): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeWriteFile(path, content, "utf8"),
    catch: (e): SystemError => writeError(path, "Failed to write file", e),
  });

/**
 * Create a file exclusively (O_CREAT | O_EXCL via the 'wx' flag).
 * Some = created, None = the file already existed.
 */
export const writeFileExclusive = (
  path: AbsolutePath,
  content: string
): Effect.Effect<Option.Option<void>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<void>> => {
      try {
        await nodeWriteFile(path, content, { flag: "wx", encoding: "utf8" });
        return Option.some(undefined);
      } catch (e) {
        if (hasErrno(e, "EEXIST")) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => writeError(path, "Failed to create", e),
  });

export const appendFile = (path: AbsolutePath, content: string): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeAppendFile(path, content, "utf8"),
    catch: (e): SystemError => writeError(path, "Failed to append to file", e),
  });

export const renameFile = (
  from: AbsolutePath,
  to: AbsolutePath
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rename(from, to),
    catch: (e): SystemError => writeError(to, `Failed to rename ${from} to`, e),
  });

// ============================================================================
// Queries
// ============================================================================

export const fileExists = (path: AbsolutePath): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    try {
      return (await stat(path)).isFile();
    } catch {
      return false;
    }
  });

/** True for anything at `path`: file, directory, socket, ... */
export const pathExists = (path: AbsolutePath): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  });

export const getFileSize = (path: AbsolutePath): Effect.Effect<number, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<number> => (await stat(path)).size,
    catch: (e): SystemError => readError(path, "Failed to stat", e),
  });

/** Streams the file through SHA-256; the digest is lowercase hex. */
export const sha256File = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<string> => {
      const hash = createHash("sha256");
      await pipeline(createReadStream(path), hash);
      return hash.digest("hex");
    },
    catch: (e): SystemError => readError(path, "Failed to hash", e),
  });

// ============================================================================
// Directories and removal
// ============================================================================

export const ensureDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<void> => {
      await mkdir(path, { recursive: true });
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create directory ${path}: ${errorMessage(e)}`,
        path,
        ...causeOf(e),
      }),
  });

/** Succeeds when the file is already gone. */
export const deleteFileIfExists = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rm(path, { force: true }),
    catch: (e): SystemError => writeError(path, "Failed to delete", e),
  });

export const deleteDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rm(path, { recursive: true, force: true }),
    catch: (e): SystemError => writeError(path, "Failed to remove directory", e),
  });
