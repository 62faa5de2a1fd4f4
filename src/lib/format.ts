// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Human-readable rendering of sizes, durations and timestamps for
 * console output, notifications and the run log.
 */

import { Array as Arr, Option, pipe } from "effect";

/** Threshold entry for data-driven formatting */
interface ThresholdEntry<T> {
  readonly threshold: number;
  readonly format: (value: T) => string;
}

/** Duration formatting thresholds (descending order) */
const DURATION_THRESHOLDS: readonly ThresholdEntry<number>[] = [
  {
    threshold: 60000,
    format: (ms): string => {
      const minutes = Math.floor(ms / 60000);
      const seconds = Math.floor((ms % 60000) / 1000);
      return `${minutes}m ${seconds}s`;
    },
  },
  { threshold: 1000, format: (ms): string => `${(ms / 1000).toFixed(1)}s` },
];

export const formatDuration = (ms: number): string =>
  pipe(
    DURATION_THRESHOLDS,
    Arr.findFirst((t) => ms >= t.threshold),
    Option.match({
      onNone: (): string => `${ms}ms`,
      onSome: (t): string => t.format(ms),
    })
  );

/** Byte formatting thresholds (descending order) */
const BYTE_THRESHOLDS: readonly ThresholdEntry<number>[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

export const formatBytes = (bytes: number): string =>
  pipe(
    BYTE_THRESHOLDS,
    Arr.findFirst((t) => bytes >= t.threshold),
    Option.match({
      onNone: (): string => `${bytes} B`,
      onSome: (t): string => t.format(bytes),
    })
  );

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:MM:SS`, the run log's timestamp. */
export const formatLogTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

/** Pad to a column width; never truncates. */
export const padEnd = (text: string, width: number): string =>
  text + " ".repeat(Math.max(0, width - text.length));
