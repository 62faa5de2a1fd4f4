// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, pipe } from "effect";
import type { EnvConfig } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import type { LoggingSection } from "./schema";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

/** CLI flag > environment > configuration file. */
export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

/** `--verbose` and `BACKUP_DEBUG` both force debug. */
export const resolveLogLevel = (
  cli: { readonly verbose: boolean; readonly logLevel: Option.Option<LogLevel> },
  env: EnvConfig,
  toml: LoggingSection
): LogLevel =>
  resolve({
    cli: cli.verbose ? Option.some<LogLevel>("debug") : cli.logLevel,
    env: env.debug ? Option.some<LogLevel>("debug") : env.logging.level,
    toml: toml.level,
  });

/** `--json` is shorthand for `--format json`. */
export const resolveLogFormat = (
  cli: { readonly json: boolean; readonly format: Option.Option<LogFormat> },
  env: EnvConfig,
  toml: LoggingSection
): LogFormat =>
  resolve({
    cli: cli.json ? Option.some<LogFormat>("json") : cli.format,
    env: env.logging.format,
    toml: toml.format,
  });
