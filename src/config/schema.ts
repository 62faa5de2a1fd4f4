// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for the vps-backup configuration file.
 * Single source of truth for configuration structure, defaults and
 * validation. Secrets decode to `Redacted` so they print as `<redacted>`.
 */

import { Option, type Redacted, Schema } from "effect";
import { type AbsolutePath, AbsolutePathSchema } from "../lib/types";
import {
  LOCK_FILE_DEFAULT,
  LOG_FILE_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  MAX_KEEP_DEFAULT,
  MIN_AGE_HOURS_DEFAULT,
  REMOTE_DEFAULT,
  SCRYPT_WORK_FACTOR_DEFAULT,
  SCRYPT_WORK_FACTOR_MAX,
  SCRYPT_WORK_FACTOR_MIN,
  TMP_DIR_DEFAULT,
  UPLOAD_ATTEMPTS_DEFAULT,
  UPLOAD_RETRY_DELAY_SECONDS_DEFAULT,
} from "./field-values";

// ============================================================================
// [backup]
// ============================================================================

export interface BackupSection {
  /** Files or directories to archive, in archive member order */
  readonly sources: readonly AbsolutePath[];
  /** Opaque `<remote>:<path>` destination handed to the transport */
  readonly remote: string;
  readonly passphrase: Redacted.Redacted<string>;
  /** Newest artifacts kept per host; 0 or less disables pruning */
  readonly maxKeep: number;
  /** Artifacts younger than this are never pruned */
  readonly minAgeHours: number;
  readonly tmpDir: AbsolutePath;
  readonly lockFile: AbsolutePath;
  readonly logFile: AbsolutePath;
}

export interface BackupSectionInput {
  readonly sources: readonly string[];
  readonly remote?: string | undefined;
  readonly passphrase: string;
  readonly maxKeep?: number | undefined;
  readonly minAgeHours?: number | undefined;
  readonly tmpDir?: string | undefined;
  readonly lockFile?: string | undefined;
  readonly logFile?: string | undefined;
}

const absoluteWithDefault = (fallback: string) =>
  Schema.optionalWith(AbsolutePathSchema, {
    default: (): AbsolutePath => Schema.decodeSync(AbsolutePathSchema)(fallback),
  });

export const backupSectionSchema: Schema.Schema<BackupSection, BackupSectionInput> = Schema.Struct(
  {
    sources: Schema.Array(AbsolutePathSchema).pipe(
      Schema.minItems(1, { message: (): string => "At least one source path is required" })
    ),
    remote: Schema.optionalWith(
      Schema.NonEmptyString.pipe(
        Schema.filter((s): boolean => s.includes(":"), {
          message: (): string => "Remote must have the form <remote>:<path>",
        })
      ),
      { default: (): string => REMOTE_DEFAULT }
    ),
    passphrase: Schema.Redacted(
      Schema.String.pipe(
        Schema.minLength(1, { message: (): string => "Encryption passphrase must not be empty" })
      )
    ),
    maxKeep: Schema.optionalWith(Schema.Int, { default: (): number => MAX_KEEP_DEFAULT }),
    minAgeHours: Schema.optionalWith(Schema.NonNegative, {
      default: (): number => MIN_AGE_HOURS_DEFAULT,
    }),
    tmpDir: absoluteWithDefault(TMP_DIR_DEFAULT),
    lockFile: absoluteWithDefault(LOCK_FILE_DEFAULT),
    logFile: absoluteWithDefault(LOG_FILE_DEFAULT),
  }
);

// ============================================================================
// [upload] / [encryption]
// ============================================================================

export interface UploadSection {
  readonly attempts: number;
  readonly retryDelaySeconds: number;
}

export interface UploadSectionInput {
  readonly attempts?: number | undefined;
  readonly retryDelaySeconds?: number | undefined;
}

export const uploadSectionSchema: Schema.Schema<UploadSection, UploadSectionInput> = Schema.Struct(
  {
    attempts: Schema.optionalWith(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)), {
      default: (): number => UPLOAD_ATTEMPTS_DEFAULT,
    }),
    retryDelaySeconds: Schema.optionalWith(Schema.NonNegative, {
      default: (): number => UPLOAD_RETRY_DELAY_SECONDS_DEFAULT,
    }),
  }
);

export interface EncryptionSection {
  readonly scryptWorkFactor: number;
}

export interface EncryptionSectionInput {
  readonly scryptWorkFactor?: number | undefined;
}

export const encryptionSectionSchema: Schema.Schema<EncryptionSection, EncryptionSectionInput> =
  Schema.Struct({
    scryptWorkFactor: Schema.optionalWith(
      Schema.Int.pipe(Schema.between(SCRYPT_WORK_FACTOR_MIN, SCRYPT_WORK_FACTOR_MAX)),
      { default: (): number => SCRYPT_WORK_FACTOR_DEFAULT }
    ),
  });

// ============================================================================
// [notify.telegram]
// ============================================================================

export interface TelegramSection {
  readonly botToken?: Redacted.Redacted<string> | undefined;
  readonly chatId?: string | undefined;
  readonly notifyStart: boolean;
}

export interface TelegramSectionInput {
  readonly botToken?: string | undefined;
  readonly chatId?: string | undefined;
  readonly notifyStart?: boolean | undefined;
}

export const telegramSectionSchema: Schema.Schema<TelegramSection, TelegramSectionInput> =
  Schema.Struct({
    botToken: Schema.optional(Schema.Redacted(Schema.String)),
    chatId: Schema.optional(Schema.String),
    notifyStart: Schema.optionalWith(Schema.Boolean, { default: (): boolean => false }),
  });

export interface NotifySection {
  readonly telegram?: TelegramSection | undefined;
}

export interface NotifySectionInput {
  readonly telegram?: TelegramSectionInput | undefined;
}

export const notifySectionSchema: Schema.Schema<NotifySection, NotifySectionInput> = Schema.Struct(
  {
    telegram: Schema.optional(telegramSectionSchema),
  }
);

// ============================================================================
// [logging]
// ============================================================================

export interface LoggingSection {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface LoggingSectionInput {
  readonly level?: LogLevel | undefined;
  readonly format?: LogFormat | undefined;
}

export const loggingSectionSchema: Schema.Schema<LoggingSection, LoggingSectionInput> =
  Schema.Struct({
    level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
      default: (): LogLevel => LOG_LEVEL_DEFAULT,
    }),
    format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
      default: (): LogFormat => LOG_FORMAT_DEFAULT,
    }),
  });

// ============================================================================
// Whole file
// ============================================================================

export interface BackupConfig {
  readonly backup: BackupSection;
  readonly upload: UploadSection;
  readonly encryption: EncryptionSection;
  readonly notify: NotifySection;
  readonly logging: LoggingSection;
}

export interface BackupConfigInput {
  readonly backup: BackupSectionInput;
  readonly upload?: UploadSectionInput | undefined;
  readonly encryption?: EncryptionSectionInput | undefined;
  readonly notify?: NotifySectionInput | undefined;
  readonly logging?: LoggingSectionInput | undefined;
}

export const backupConfigSchema: Schema.Schema<BackupConfig, BackupConfigInput> = Schema.Struct({
  backup: backupSectionSchema,
  upload: Schema.optionalWith(uploadSectionSchema, {
    default: (): UploadSection => ({
      attempts: UPLOAD_ATTEMPTS_DEFAULT,
      retryDelaySeconds: UPLOAD_RETRY_DELAY_SECONDS_DEFAULT,
    }),
  }),
  encryption: Schema.optionalWith(encryptionSectionSchema, {
    default: (): EncryptionSection => ({ scryptWorkFactor: SCRYPT_WORK_FACTOR_DEFAULT }),
  }),
  notify: Schema.optionalWith(notifySectionSchema, { default: (): NotifySection => ({}) }),
  logging: Schema.optionalWith(loggingSectionSchema, {
    default: (): LoggingSection => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
});

// ============================================================================
// Derived values
// ============================================================================

export interface TelegramTarget {
  readonly botToken: Redacted.Redacted<string>;
  readonly chatId: string;
  readonly notifyStart: boolean;
}

/** Telegram is enabled only when both the token and the chat id are set. */
export const telegramTarget = (config: BackupConfig): Option.Option<TelegramTarget> => {
  const telegram = config.notify.telegram;
  return telegram?.botToken !== undefined &&
    telegram.chatId !== undefined &&
    telegram.chatId.length > 0
    ? Option.some({
        botToken: telegram.botToken,
        chatId: telegram.chatId,
        notifyStart: telegram.notifyStart,
      })
    : Option.none();
};
