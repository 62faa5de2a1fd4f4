// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore and verify. Neither takes the backup lock; both only read from
 * the remote.
 */

import { Effect, Option } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { BackupConfig } from "../../config/schema";
import type { ConfigError } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { defaultRestoreDir, toAbsolutePathEffect } from "../../lib/paths";
import type { RemoteTransport } from "../../remote/transport";
import { type RestoreFailure, restoreSnapshot, verifySnapshot } from "../../restore/restore";
import { emit } from "./output";

export interface RestoreOptions {
  readonly config: BackupConfig;
  readonly hostname: string;
  readonly format: LogFormat;
  readonly name: string;
  readonly target: Option.Option<string>;
}

export const executeRestore = (
  options: RestoreOptions
): Effect.Effect<void, RestoreFailure | ConfigError, RemoteTransport> =>
  Effect.gen(function* () {
    const target = yield* Option.match(options.target, {
      onNone: () => Effect.succeed(defaultRestoreDir(process.pid)),
      onSome: toAbsolutePathEffect,
    });
    const report = yield* restoreSnapshot(options.config, options.name, options.hostname, target);
    yield* logSuccess(`Restored ${report.name} into ${report.target}`);
    yield* emit(options.format, report, () => [
      `Checksum: ${report.checksum}`,
      "Review the files, then copy what you need into place.",
    ]);
  });

export interface VerifyOptions {
  readonly config: BackupConfig;
  readonly hostname: string;
  readonly format: LogFormat;
  readonly selection: string;
}

export const executeVerify = (
  options: VerifyOptions
): Effect.Effect<void, RestoreFailure, RemoteTransport> =>
  Effect.gen(function* () {
    const report = yield* verifySnapshot(options.config, options.selection, options.hostname);
    yield* emit(options.format, report, () => [
      `${report.name}: OK, ${report.members} entries, checksum ${report.checksum}`,
    ]);
  });
