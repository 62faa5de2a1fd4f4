// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { BackupConfig } from "../../config/schema";
import { tailRunLog } from "../../backup/run-log";
import type { SystemError } from "../../lib/errors";
import { emit } from "./output";

export interface LogsOptions {
  readonly config: BackupConfig;
  readonly format: LogFormat;
  readonly lines: number;
}

export const executeLogs = (options: LogsOptions): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    const lines = yield* tailRunLog(options.config.backup.logFile, options.lines);
    yield* emit(options.format, lines, () =>
      lines.length === 0 ? [`No entries in ${options.config.backup.logFile}`] : lines
    );
  });
