// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution with structured argument arrays via the
 * @effect/platform Command API. Arguments are never joined into a shell
 * string, so source paths and remote names need no quoting.
 */

import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Array as Arr, Effect, Option, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, causeOf, errorMessage } from "../lib/errors";

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need an R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

/** Non-empty guarantee prevents index errors on destructuring. */
interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const inheritedEnv = (): Record<string, string> =>
  Object.fromEntries(
    Object.entries(process.env).flatMap(([k, v]) => (v === undefined ? [] : [[k, v] as const]))
  );

export const exec = (
  command: readonly string[]
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const commandStr = command.join(" ");

    return yield* withExecutor(
      Effect.gen(function* () {
        const process = yield* Command.start(
          Command.env(Command.make(cmd, ...args), inheritedEnv())
        );

        // Parallel capture: exitCode + both streams ready independently
        const [exitCode, stdout, stderr] = yield* Effect.all(
          [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
          { concurrency: 3 }
        );

        return { exitCode, stdout, stderr };
      }).pipe(Effect.scoped)
    ).pipe(Effect.mapError((e) => execError(commandStr, e)));
  });

/** Fails if exit code is non-zero. Use exec() when exit code matters but isn't fatal. */
const execSuccess = (
  command: readonly string[]
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = result.stderr.trim();
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${command.join(" ")}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );

/** Non-empty stdout lines of a command that must succeed. */
export const execLines = (
  command: readonly string[]
): Effect.Effect<readonly string[], SystemError | GeneralError> =>
  Effect.map(execSuccess(command), (result) =>
    result.stdout
      .split("\n")
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0)
  );

const isExecutable = (file: string): Promise<boolean> =>
  access(file, constants.X_OK).then(
    () => true,
    () => false
  );

/** PATH lookup, the equivalent of `command -v`. */
const commandExists = (command: string): Effect.Effect<boolean> =>
  Effect.promise(async (): Promise<boolean> => {
    const dirs = (process.env["PATH"] ?? "").split(delimiter).filter((d) => d.length > 0);
    const results = await Promise.all(dirs.map((dir) => isExecutable(join(dir, command))));
    return Option.isSome(Arr.findFirst(results, (found) => found));
  });

/** Fails with DEPENDENCY_MISSING when `command` is not on PATH. */
export const requireCommand = (command: string): Effect.Effect<void, GeneralError> =>
  Effect.filterOrFail(
    commandExists(command),
    (found) => found,
    () =>
      new GeneralError({
        code: ErrorCode.DEPENDENCY_MISSING,
        message: `Required command not found on PATH: ${command}`,
      })
  ).pipe(Effect.asVoid);
