// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Pre-flight self-test. Every check runs even when an earlier one fails,
 * so one invocation reports everything that is wrong with the host.
 */

import { Array as Arr, Effect, Either, pipe } from "effect";
import type { BackupConfig } from "../config/schema";
import { type AppError, GeneralError, ErrorCode } from "../lib/errors";
import { Notifier, testMessage } from "../notify/telegram";
import { RemoteTransport } from "../remote/transport";
import { decryptBytes, encryptBytes } from "../system/age";
import { planArchive } from "../system/archive";
import { requireCommand } from "../system/exec";

export interface CheckResult {
  readonly name: string;
  readonly ok: boolean;
  readonly detail: string;
}

export interface CheckOptions {
  /** Send a test message through the notifier */
  readonly sendTest: boolean;
}

const SAMPLE = "vps-backup self-test";

const toResult = <R>(
  name: string,
  effect: Effect.Effect<string, AppError, R>
): Effect.Effect<CheckResult, never, R> =>
  Effect.map(
    Effect.either(effect),
    Either.match({
      onLeft: (e): CheckResult => ({ name, ok: false, detail: e.message }),
      onRight: (detail): CheckResult => ({ name, ok: true, detail }),
    })
  );

const checkSources = (config: BackupConfig): Effect.Effect<string, GeneralError> =>
  Effect.flatMap(planArchive(config.backup.sources), (plan) =>
    plan.included.length === 0
      ? Effect.fail(
          new GeneralError({
            code: ErrorCode.GENERAL_ERROR,
            message: `none of the ${plan.missing.length} source(s) exist`,
          })
        )
      : Effect.succeed(
          plan.missing.length === 0
            ? `${plan.included.length} source(s) present`
            : `${plan.included.length} present, missing: ${plan.missing.join(", ")}`
        )
  );

const checkEncryption = (config: BackupConfig): Effect.Effect<string, AppError> =>
  Effect.gen(function* () {
    const plaintext = new TextEncoder().encode(SAMPLE);
    // Low work factor: this proves the passphrase path works, not its strength
    const ciphertext = yield* encryptBytes(plaintext, {
      passphrase: config.backup.passphrase,
      workFactor: 10,
    });
    const decrypted = new TextDecoder().decode(
      yield* decryptBytes(ciphertext, config.backup.passphrase)
    );
    if (decrypted !== SAMPLE) {
      return yield* Effect.fail(
        new GeneralError({ code: ErrorCode.GENERAL_ERROR, message: "round trip mismatch" })
      );
    }
    return "passphrase round trip ok";
  });

const checkNotifier = (
  hostname: string,
  options: CheckOptions
): Effect.Effect<string, AppError, Notifier> =>
  Effect.gen(function* () {
    const notifier = yield* Notifier;
    if (!notifier.enabled) {
      return "disabled (no bot token or chat id)";
    }
    if (!options.sendTest) {
      return "configured";
    }
    yield* notifier.send(testMessage(hostname));
    return "test message sent";
  });

export const runChecks = (
  config: BackupConfig,
  hostname: string,
  options: CheckOptions
): Effect.Effect<readonly CheckResult[], never, RemoteTransport | Notifier> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    return yield* Effect.all([
      toResult("sources", checkSources(config)),
      toResult("tar", Effect.as(requireCommand("tar"), "found on PATH")),
      toResult("rclone", Effect.as(requireCommand("rclone"), "found on PATH")),
      toResult(
        "remote",
        Effect.as(transport.check(config.backup.remote), `${config.backup.remote} reachable`)
      ),
      toResult("encryption", checkEncryption(config)),
      toResult("telegram", checkNotifier(hostname, options)),
    ]);
  });

/** Fails with the names of the failed checks, after all of them ran. */
export const requireAllPassed = (
  results: readonly CheckResult[]
): Effect.Effect<void, GeneralError> =>
  pipe(
    Arr.filter(results, (r) => !r.ok),
    (failed) =>
      failed.length === 0
        ? Effect.void
        : Effect.fail(
            new GeneralError({
              code: ErrorCode.GENERAL_ERROR,
              message: `Self-test failed: ${failed.map((r) => r.name).join(", ")}`,
            })
          )
  );
