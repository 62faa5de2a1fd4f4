// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import type { Option } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const snapshotArg: Args<string> = A.text({ name: "name" }).pipe(
  A.withDescription("Artifact name, e.g. backup-web1-20250101-120000.tar.gz.enc")
);

export const selectionArg: Args<string> = A.text({ name: "name" }).pipe(
  A.withDescription("Artifact name, or 'latest' for the newest backup of this host")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly config: Options<Option.Option<string>>;
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
} = {
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to the TOML configuration file"),
    O.optional
  ),
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
};

// Per-command options

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Show what would be backed up without doing it")
);

export const target: Options<Option.Option<string>> = O.directory("target").pipe(
  O.withAlias("t"),
  O.withDescription("Directory to restore into (default /tmp/vps-restore-<pid>)"),
  O.optional
);

export const lines: Options<number> = O.integer("lines").pipe(
  O.withAlias("n"),
  O.withDefault(50),
  O.withDescription("Number of run-log lines to show")
);

export const sendTest: Options<boolean> = O.boolean("send-test").pipe(
  O.withDescription("Send a test notification")
);

// Type definitions

export interface GlobalOptions {
  readonly config: Option.Option<string>;
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}
