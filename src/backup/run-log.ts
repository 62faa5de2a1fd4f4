// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Append-only run log: `<YYYY-MM-DD HH:MM:SS>: <message>` per line.
 * The pipeline never truncates it; `pipeline completed` marks a good run
 * for anything that greps the file.
 */

import { Array as Arr, Clock, Context, Effect, Layer, Option, Ref, pipe } from "effect";
import type { SystemError } from "../lib/errors";
import { formatLogTimestamp } from "../lib/format";
import { type AbsolutePath, parentPath } from "../lib/types";
import { appendFile, ensureDirectory, readFileOption } from "../system/fs";

export const COMPLETION_PHRASE = "pipeline completed";

export interface RunLogService {
  /** Never fails; an unwritable log is reported once on the console. */
  readonly append: (message: string) => Effect.Effect<void>;
}

/**
 * RunLog tag identifier type.
 */
export interface RunLog {
  readonly _tag: "RunLog";
}

export const RunLog: Context.Tag<RunLog, RunLogService> = Context.GenericTag<RunLog, RunLogService>(
  "vps-backup/RunLog"
);

export const formatRunLogLine = (date: Date, message: string): string =>
  `${formatLogTimestamp(date)}: ${message}\n`;

export const makeFileRunLog = (logFile: AbsolutePath): Effect.Effect<RunLogService> =>
  Effect.gen(function* () {
    const reported = yield* Ref.make(false);

    const reportOnce = (e: SystemError): Effect.Effect<void> =>
      Effect.flatMap(Ref.getAndSet(reported, true), (already) =>
        already ? Effect.void : Effect.logWarning(`Run log ${logFile} is not writable: ${e.message}`)
      );

    const append = (message: string): Effect.Effect<void> =>
      pipe(
        Clock.currentTimeMillis,
        Effect.map((millis) => formatRunLogLine(new Date(millis), message)),
        Effect.flatMap((line) =>
          Effect.zipRight(ensureDirectory(parentPath(logFile)), appendFile(logFile, line))
        ),
        Effect.catchAll(reportOnce)
      );

    return { append };
  });

export const FileRunLogLive = (logFile: AbsolutePath): Layer.Layer<RunLog> =>
  Layer.effect(RunLog, makeFileRunLog(logFile));

/** Last `lines` lines of the run log; a missing log reads as empty. */
export const tailRunLog = (
  logFile: AbsolutePath,
  lines: number
): Effect.Effect<readonly string[], SystemError> =>
  pipe(
    readFileOption(logFile),
    Effect.map(
      Option.match({
        onNone: (): readonly string[] => [],
        onSome: (content): readonly string[] =>
          pipe(
            content.split("\n"),
            Arr.filter((line) => line.length > 0),
            Arr.takeRight(Math.max(0, lines))
          ),
      })
    )
  );
