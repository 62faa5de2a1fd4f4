#!/usr/bin/env tsx
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * vps-backup - encrypted, verified backups of one host to remote storage.
 *
 * This is the "imperative shell": the only place where the Effect runtime is
 * executed. SIGINT and SIGTERM interrupt the main fiber so that the lock and
 * scratch-directory finalizers run before the process exits.
 */

import { ValidationError } from "@effect/cli";
import { Cause, Effect, Exit, Fiber, Match, Option, pipe } from "effect";
import { program } from "./cli/index";
import { ErrorCode, isAppError, toExitCode } from "./lib/errors";

/** Conventional 128 + signal number. */
const INTERRUPTED_EXIT_CODE = 130;

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => (Cause.isInterruptedOnly(cause) ? INTERRUPTED_EXIT_CODE : 1),
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isAppError, (e) => toExitCode(e.code)),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.orElse(() => 1)
          ),
      }),
  });

/** App errors are displayed by the command runner; only the rest is reported here. */
const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void => {
      if (Cause.isInterruptedOnly(cause) || Option.isSome(Cause.failureOption(cause))) {
        return;
      }
      console.error("Unexpected error:", Cause.pretty(cause));
    },
  });

async function main(): Promise<never> {
  const fiber = Effect.runFork(program(process.argv));
  const interrupt = (): void => {
    Effect.runFork(Fiber.interrupt(fiber));
  };
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const exit = await Effect.runPromise(Fiber.await(fiber));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

main().catch((e: unknown) => {
  console.error("Unexpected error:", e);
  process.exit(1);
});
