// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. The file is parsed,
 * environment overrides are laid over the raw document, and the result is
 * validated in a single pass. Default locations are searched in order
 * (/etc, ~/.config, ./), but an explicit path fails on any error to catch
 * typos and permission issues.
 */

import { Effect, Option, Redacted, pipe } from "effect";
import { parse as parseTomlText } from "smol-toml";
import { ConfigError, ErrorCode, type SystemError, causeOf, errorMessage } from "../lib/errors";
import { CONFIG_FILE_NAME, SYSTEM_CONFIG_PATH, toAbsolutePathEffect, userConfigPath } from "../lib/paths";
import { decodeToEffect } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { fileExists, readFile } from "../system/fs";
import type { EnvOverrides } from "./env";
import { type BackupConfig, backupConfigSchema } from "./schema";

export type RawDocument = Readonly<Record<string, unknown>>;

const isRecord = (u: unknown): u is Record<string, unknown> =>
  typeof u === "object" && u !== null && !Array.isArray(u);

export const parseToml = (
  content: string,
  filePath: string
): Effect.Effect<RawDocument, ConfigError> =>
  Effect.try({
    try: (): RawDocument => parseTomlText(content),
    catch: (e): ConfigError =>
      new ConfigError({
        code: ErrorCode.CONFIG_PARSE_ERROR,
        message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
        path: filePath,
        ...causeOf(e),
      }),
  });

export const readTomlDocument = (
  filePath: AbsolutePath
): Effect.Effect<RawDocument, ConfigError | SystemError> =>
  Effect.gen(function* () {
    yield* pipe(
      fileExists(filePath),
      Effect.filterOrFail(
        (exists): exists is true => exists === true,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );
    const content = yield* readFile(filePath);
    return yield* parseToml(content, filePath);
  });

// ============================================================================
// Environment overlay
// ============================================================================

const field = <A>(key: string, value: Option.Option<A>): Record<string, A> =>
  Option.match(value, {
    onNone: (): Record<string, A> => ({}),
    onSome: (v): Record<string, A> => ({ [key]: v }),
  });

const section = (doc: RawDocument, key: string): Record<string, unknown> => {
  const value = doc[key];
  return isRecord(value) ? value : {};
};

/**
 * Lay environment values over the raw document so that the schema sees
 * one merged input and reports errors against the same field names.
 */
export const applyEnvOverrides = (doc: RawDocument, env: EnvOverrides): RawDocument => {
  const notify = section(doc, "notify");
  const telegram = isRecord(notify["telegram"]) ? notify["telegram"] : {};
  const telegramOverrides = {
    ...field("botToken", Option.map(env.telegramBotToken, Redacted.value)),
    ...field("chatId", env.telegramChatId),
  };

  return {
    ...doc,
    backup: {
      ...section(doc, "backup"),
      ...field("sources", env.sources),
      ...field("remote", env.remote),
      ...field("passphrase", Option.map(env.passphrase, Redacted.value)),
      ...field("maxKeep", env.maxKeep),
      ...field("minAgeHours", env.minAgeHours),
      ...field("logFile", env.logFile),
      ...field("tmpDir", env.tmpDir),
      ...field("lockFile", env.lockFile),
    },
    ...(Object.keys(telegramOverrides).length > 0
      ? { notify: { ...notify, telegram: { ...telegram, ...telegramOverrides } } }
      : {}),
  };
};

// ============================================================================
// Loading
// ============================================================================

export interface LoadedConfig {
  readonly config: BackupConfig;
  /** The file the configuration came from; None when built from the environment alone */
  readonly source: Option.Option<AbsolutePath>;
}

export const defaultConfigPaths = (home: string): readonly string[] => [
  SYSTEM_CONFIG_PATH,
  userConfigPath(home),
  `./${CONFIG_FILE_NAME}`,
];

const loadFirstDefault = (
  home: string
): Effect.Effect<Option.Option<readonly [AbsolutePath, RawDocument]>, ConfigError | SystemError> =>
  Effect.gen(function* () {
    for (const candidate of defaultConfigPaths(home)) {
      const absPath = yield* toAbsolutePathEffect(candidate);
      if (yield* fileExists(absPath)) {
        const doc = yield* readTomlDocument(absPath);
        return Option.some([absPath, doc] as const);
      }
    }
    return Option.none();
  });

/**
 * Explicit path: must exist. Otherwise the first default location that
 * exists is used, and with none the environment alone must configure the run.
 */
export const loadConfig = (
  configPath: Option.Option<string>,
  home: string,
  overrides: EnvOverrides
): Effect.Effect<LoadedConfig, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const found = yield* Option.match(configPath, {
      onNone: () => loadFirstDefault(home),
      onSome: (p) =>
        pipe(
          toAbsolutePathEffect(p),
          Effect.flatMap((absPath) =>
            Effect.map(readTomlDocument(absPath), (doc) => Option.some([absPath, doc] as const))
          )
        ),
    });

    const source = Option.map(found, ([p]) => p);
    const doc = Option.match(found, {
      onNone: (): RawDocument => ({}),
      onSome: ([, d]): RawDocument => d,
    });
    const context = Option.getOrElse(source, (): string => "environment");

    const config = yield* decodeToEffect(
      backupConfigSchema,
      applyEnvOverrides(doc, overrides),
      context
    );
    return { config, source };
  });
