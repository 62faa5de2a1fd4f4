// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * RemoteTransport backed by rclone. Every call is a separate `rclone`
 * process; machine-readable output (`lsjson`, `size --json`) is decoded
 * with Effect Schema.
 */

import { Effect, Either, Layer, Option, ParseResult, Schema, pipe } from "effect";
import { ErrorCode, RemoteError, causeOf, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { type ExecResult, exec } from "../system/exec";
import {
  type RemoteObject,
  RemoteTransport,
  type RemoteTransportService,
  remoteObjectPath,
  remoteRoot,
} from "./transport";

/** rclone's exit status for "directory not found". */
const RCLONE_DIR_NOT_FOUND = 3;

// ============================================================================
// Output parsing
// ============================================================================

interface LsJsonEntry {
  readonly Name: string;
  readonly Size: number;
  readonly ModTime: string;
  readonly IsDir: boolean;
}

const lsJsonEntrySchema: Schema.Schema<LsJsonEntry> = Schema.Struct({
  Name: Schema.String,
  Size: Schema.Number,
  ModTime: Schema.String,
  IsDir: Schema.Boolean,
});

const lsJsonSchema: Schema.Schema<readonly LsJsonEntry[], string> = Schema.parseJson(
  Schema.Array(lsJsonEntrySchema)
);

interface SizeJson {
  readonly count: number;
  readonly bytes: number;
}

const sizeJsonSchema: Schema.Schema<SizeJson, string> = Schema.parseJson(
  Schema.Struct({ count: Schema.Number, bytes: Schema.Number })
);

const decodeOutput = <A>(
  schema: Schema.Schema<A, string>,
  stdout: string,
  what: string
): Effect.Effect<A, RemoteError> =>
  Either.match(Schema.decodeUnknownEither(schema)(stdout), {
    onLeft: (error): Effect.Effect<A, RemoteError> =>
      Effect.fail(
        new RemoteError({
          code: ErrorCode.REMOTE_FAILED,
          message: `Unexpected rclone ${what} output: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
        })
      ),
    onRight: (value): Effect.Effect<A, RemoteError> => Effect.succeed(value),
  });

/** Files only, in listing order. */
export const parseLsJson = (stdout: string): Effect.Effect<readonly RemoteObject[], RemoteError> =>
  pipe(
    decodeOutput(lsJsonSchema, stdout, "lsjson"),
    Effect.map((entries) =>
      entries
        .filter((e) => !e.IsDir)
        .map(
          (e): RemoteObject => ({ name: e.Name, size: e.Size, modified: new Date(e.ModTime) })
        )
    )
  );

/** `{"count":0,...}` means the object is absent. */
export const parseSizeJson = (stdout: string): Effect.Effect<Option.Option<number>, RemoteError> =>
  pipe(
    decodeOutput(sizeJsonSchema, stdout, "size"),
    Effect.map((s) => (s.count === 0 ? Option.none() : Option.some(s.bytes)))
  );

// ============================================================================
// Process invocation
// ============================================================================

const rcloneFailed = (args: readonly string[], detail: string, e?: unknown): RemoteError =>
  new RemoteError({
    code: ErrorCode.REMOTE_FAILED,
    message: `rclone ${args[0] ?? ""} failed: ${detail}`,
    ...causeOf(e),
  });

const runRclone = (args: readonly string[]): Effect.Effect<ExecResult, RemoteError> =>
  pipe(
    exec(["rclone", ...args]),
    Effect.mapError((e) => rcloneFailed(args, errorMessage(e), e))
  );

const requireSuccess =
  (args: readonly string[]) =>
  (result: ExecResult): Effect.Effect<ExecResult, RemoteError> =>
    result.exitCode === 0
      ? Effect.succeed(result)
      : Effect.fail(
          rcloneFailed(args, `exit code ${result.exitCode}: ${result.stderr.trim() || "no output"}`)
        );

const rclone = (...args: readonly string[]): Effect.Effect<ExecResult, RemoteError> =>
  Effect.flatMap(runRclone(args), requireSuccess(args));

// ============================================================================
// Service
// ============================================================================

const upload = (localFile: AbsolutePath, remoteDir: string): Effect.Effect<void, RemoteError> =>
  Effect.asVoid(rclone("copy", localFile, remoteDir));

const download = (
  remoteDir: string,
  name: string,
  localDir: AbsolutePath
): Effect.Effect<void, RemoteError> =>
  Effect.asVoid(rclone("copy", remoteObjectPath(remoteDir, name), localDir));

const list = (remoteDir: string): Effect.Effect<readonly RemoteObject[], RemoteError> => {
  const args = ["lsjson", "--files-only", remoteDir];
  return Effect.flatMap(runRclone(args), (result) =>
    result.exitCode === RCLONE_DIR_NOT_FOUND
      ? Effect.succeed([])
      : Effect.flatMap(requireSuccess(args)(result), (r) => parseLsJson(r.stdout))
  );
};

const size = (remoteDir: string, name: string): Effect.Effect<Option.Option<number>, RemoteError> => {
  const args = ["size", "--json", remoteObjectPath(remoteDir, name)];
  return Effect.flatMap(runRclone(args), (result) =>
    result.exitCode === RCLONE_DIR_NOT_FOUND
      ? Effect.succeed(Option.none())
      : Effect.flatMap(requireSuccess(args)(result), (r) => parseSizeJson(r.stdout))
  );
};

const remove = (remoteDir: string, name: string): Effect.Effect<void, RemoteError> =>
  Effect.asVoid(rclone("deletefile", remoteObjectPath(remoteDir, name)));

const check = (remoteDir: string): Effect.Effect<void, RemoteError> =>
  Effect.asVoid(rclone("lsd", "--max-depth", "1", remoteRoot(remoteDir)));

export const rcloneTransport: RemoteTransportService = {
  upload,
  download,
  list,
  size,
  remove,
  check,
};

export const RcloneTransportLive: Layer.Layer<RemoteTransport> = Layer.succeed(
  RemoteTransport,
  rcloneTransport
);
