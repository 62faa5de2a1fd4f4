// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; they are only yielded at the CLI
 * boundary, so no other module reads the process environment. Names follow
 * the variables the cron job has always exported (BACKUP_*, TG_*).
 */

import { Config, ConfigProvider, type Option, type Redacted } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

// ============================================================================
// Type Definitions
// ============================================================================

/** Every field is optional: an unset variable leaves the TOML value alone. */
export interface EnvOverrides {
  readonly sources: Option.Option<readonly string[]>;
  readonly remote: Option.Option<string>;
  readonly passphrase: Option.Option<Redacted.Redacted<string>>;
  readonly maxKeep: Option.Option<number>;
  readonly minAgeHours: Option.Option<number>;
  readonly logFile: Option.Option<string>;
  readonly tmpDir: Option.Option<string>;
  readonly lockFile: Option.Option<string>;
  readonly telegramBotToken: Option.Option<Redacted.Redacted<string>>;
  readonly telegramChatId: Option.Option<string>;
}

export interface EnvConfig {
  readonly home: string;
  readonly logging: {
    readonly level: Option.Option<LogLevel>;
    readonly format: Option.Option<LogFormat>;
  };
  readonly debug: boolean;
  readonly overrides: EnvOverrides;
}

// ============================================================================
// Primitive Configs
// ============================================================================

/**
 * HOME directory from environment.
 * Falls back to /root, the usual account for a backup cron job.
 */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

const backup = <A>(config: Config.Config<A>): Config.Config<Option.Option<A>> =>
  Config.option(Config.nested(config, "BACKUP"));

/** `BACKUP_SRCS`: `|`-separated, so paths may contain spaces. */
export const SourcesConfig: Config.Config<Option.Option<readonly string[]>> = backup(
  Config.string("SRCS").pipe(
    Config.map((raw): readonly string[] =>
      raw
        .split("|")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    )
  )
);

export const LogLevelConfig: Config.Config<Option.Option<LogLevel>> = backup(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")
);

export const LogFormatConfig: Config.Config<Option.Option<LogFormat>> = backup(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")
);

/**
 * Debug mode flag with BACKUP_ namespace.
 * When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "BACKUP"
);

export const EnvOverridesSpec: Config.Config<EnvOverrides> = Config.all({
  sources: SourcesConfig,
  remote: backup(Config.string("REMOTE_DIR")),
  passphrase: backup(Config.redacted("PASSWORD")),
  maxKeep: backup(Config.integer("MAX_KEEP")),
  minAgeHours: backup(Config.number("MIN_AGE_HOURS")),
  logFile: backup(Config.string("LOG_FILE")),
  tmpDir: backup(Config.string("TMP_DIR")),
  lockFile: backup(Config.string("LOCK_FILE")),
  telegramBotToken: Config.option(Config.redacted("TG_BOT_TOKEN")),
  telegramChatId: Config.option(Config.string("TG_CHAT_ID")),
});

// ============================================================================
// Composite Config
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  HomeConfig,
  LogLevelConfig,
  LogFormatConfig,
  DebugModeConfig,
  EnvOverridesSpec,
]).pipe(
  Config.map(([home, level, format, debug, overrides]) => ({
    home,
    logging: { level, format },
    debug,
    overrides,
  }))
);

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Create a ConfigProvider for testing from literal variable names.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ BACKUP_MAX_KEEP: "5" });
 * const env = await Effect.runPromise(
 *   Effect.withConfigProvider(EnvConfigSpec, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  vars: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map([["HOME", "/home/testuser"], ...Object.entries(vars)]), {
    pathDelim: "_",
  });
