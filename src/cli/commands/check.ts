// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { BackupConfig } from "../../config/schema";
import { type CheckResult, requireAllPassed, runChecks } from "../../backup/check";
import type { GeneralError } from "../../lib/errors";
import { padEnd } from "../../lib/format";
import type { Notifier } from "../../notify/telegram";
import type { RemoteTransport } from "../../remote/transport";
import { emit } from "./output";

export interface CheckCommandOptions {
  readonly config: BackupConfig;
  readonly hostname: string;
  readonly format: LogFormat;
  readonly sendTest: boolean;
}

const checkLine = (r: CheckResult): string =>
  `${r.ok ? "✓" : "✗"} ${padEnd(r.name, 10)} ${r.detail}`;

export const executeCheck = (
  options: CheckCommandOptions
): Effect.Effect<void, GeneralError, RemoteTransport | Notifier> =>
  Effect.gen(function* () {
    const results = yield* runChecks(options.config, options.hostname, {
      sendTest: options.sendTest,
    });
    yield* emit(options.format, results, () => results.map(checkLine));
    yield* requireAllPassed(results);
  });
