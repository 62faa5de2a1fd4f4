// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const REMOTE_DEFAULT = "gdrive:vps-backup";
export const MAX_KEEP_DEFAULT = 2;
export const MIN_AGE_HOURS_DEFAULT = 0;
export const TMP_DIR_DEFAULT = "/tmp/vps-backups";
export const LOCK_FILE_DEFAULT = "/var/lock/vps-backup.lock";
export const LOG_FILE_DEFAULT = "/var/log/vps-backup.log";

export const UPLOAD_ATTEMPTS_DEFAULT = 3;
export const UPLOAD_RETRY_DELAY_SECONDS_DEFAULT = 5;

/** age's own default: scrypt N = 2^18. */
export const SCRYPT_WORK_FACTOR_DEFAULT = 18;
export const SCRYPT_WORK_FACTOR_MIN = 10;
export const SCRYPT_WORK_FACTOR_MAX = 22;
