// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for vps-backup.
 * Uses typed error codes that map to exit codes.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly DEPENDENCY_MISSING: 4;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly DIRECTORY_CREATE_FAILED: 22;
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;

  // Backup pipeline (50-59)
  readonly ALREADY_RUNNING: 50;
  readonly INSUFFICIENT_SPACE: 51;
  readonly ARCHIVE_FAILED: 52;
  readonly ENCRYPTION_FAILED: 53;
  readonly CHECKSUM_FAILED: 54;
  readonly UPLOAD_FAILED: 55;

  // Restore (60-69)
  readonly RESTORE_FAILED: 60;
  readonly BACKUP_NOT_FOUND: 61;
  readonly DECRYPTION_FAILED: 62;
  readonly VERIFY_FAILED: 63;

  // Remote storage (70-79)
  readonly REMOTE_FAILED: 70;

  // Notification (80-89)
  readonly NOTIFY_FAILED: 80;
}

/**
 * Error codes for all vps-backup operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  DEPENDENCY_MISSING: 4,

  // Config (10-19)
  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  // System (20-29)
  DIRECTORY_CREATE_FAILED: 22,
  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  // Backup pipeline (50-59)
  ALREADY_RUNNING: 50,
  INSUFFICIENT_SPACE: 51,
  ARCHIVE_FAILED: 52,
  ENCRYPTION_FAILED: 53,
  CHECKSUM_FAILED: 54,
  UPLOAD_FAILED: 55,

  // Restore (60-69)
  RESTORE_FAILED: 60,
  BACKUP_NOT_FOUND: 61,
  DECRYPTION_FAILED: 62,
  VERIFY_FAILED: 63,

  // Remote storage (70-79)
  REMOTE_FAILED: 70,

  // Notification (80-89)
  NOTIFY_FAILED: 80,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// Tagged Errors
// ============================================================================

type GeneralErrorCode = ErrorCodeMap["GENERAL_ERROR" | "INVALID_ARGS" | "DEPENDENCY_MISSING"];

type ConfigErrorCode = ErrorCodeMap[
  | "CONFIG_NOT_FOUND"
  | "CONFIG_PARSE_ERROR"
  | "CONFIG_VALIDATION_ERROR"];

type SystemErrorCode = ErrorCodeMap[
  | "DIRECTORY_CREATE_FAILED"
  | "EXEC_FAILED"
  | "FILE_READ_FAILED"
  | "FILE_WRITE_FAILED"];

export type BackupErrorCode = ErrorCodeMap[
  | "ALREADY_RUNNING"
  | "INSUFFICIENT_SPACE"
  | "ARCHIVE_FAILED"
  | "ENCRYPTION_FAILED"
  | "CHECKSUM_FAILED"
  | "UPLOAD_FAILED"];

export type RestoreErrorCode = ErrorCodeMap[
  | "RESTORE_FAILED"
  | "BACKUP_NOT_FOUND"
  | "DECRYPTION_FAILED"
  | "VERIFY_FAILED"];

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** Fatal pipeline failures. The code identifies the failing stage. */
export class BackupError extends Data.TaggedError("BackupError")<{
  readonly code: BackupErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class RestoreError extends Data.TaggedError("RestoreError")<{
  readonly code: RestoreErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class RemoteError extends Data.TaggedError("RemoteError")<{
  readonly code: ErrorCodeMap["REMOTE_FAILED"];
  readonly message: string;
  readonly cause?: Error;
}> {}

export class NotifyError extends Data.TaggedError("NotifyError")<{
  readonly code: ErrorCodeMap["NOTIFY_FAILED"];
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Union of every error the application raises through the Effect error channel. */
export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | BackupError
  | RestoreError
  | RemoteError
  | NotifyError;

const APP_ERROR_TAGS: ReadonlySet<string> = new Set([
  "GeneralError",
  "ConfigError",
  "SystemError",
  "BackupError",
  "RestoreError",
  "RemoteError",
  "NotifyError",
]);

export const isAppError = (e: unknown): e is AppError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  APP_ERROR_TAGS.has(e._tag);

// ============================================================================
// Helpers
// ============================================================================

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spreadable `cause` field; absent unless the value is an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
