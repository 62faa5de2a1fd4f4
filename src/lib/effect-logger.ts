// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Console logger for the CLI. Replaces Effect's default so pipeline stages
 * print as `[n/total] →` lines and outcomes as `✓`/`✗`, or as one JSON
 * object per line for log shippers. Errors and `✗` lines go to stderr.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogLevel as AppLogLevel, LogFormat } from "../config/field-values";

export type LogTarget = "stdout" | "stderr";

/** Where rendered lines end up; tests capture them instead of writing. */
export type LogSink = (target: LogTarget, line: string) => void;

type Annotations = HashMap.HashMap<string, unknown>;
type LogStyleTag = "step" | "success" | "fail";

/** Annotations set by lib/log.ts; they shape the line and never reach JSON. */
const STYLE_KEYS: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal"]);

const annotation = (annotations: Annotations, key: string): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const styleOf = (annotations: Annotations): Option.Option<LogStyleTag> =>
  pipe(
    annotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "step" || v === "success" || v === "fail")
  );

// ============================================================================
// Pretty
// ============================================================================

const SGR = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

type Sgr = keyof typeof SGR;

const paint =
  (useColor: boolean) =>
  (code: Sgr, text: string): string =>
    useColor ? `${SGR[code]}${text}${SGR.reset}` : text;

const levelColor = (level: LogLevel.LogLevel): Sgr =>
  pipe(
    Match.value(level.label),
    Match.when("DEBUG", (): Sgr => "gray"),
    Match.when("WARN", (): Sgr => "yellow"),
    Match.whenOr("ERROR", "FATAL", (): Sgr => "red"),
    Match.orElse((): Sgr => "blue")
  );

const renderPretty = (
  level: LogLevel.LogLevel,
  message: string,
  annotations: Annotations,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const color = paint(useColor);
  const counter = (key: string): string => Option.getOrElse(annotation(annotations, key), () => "?");

  return Option.match(styleOf(annotations), {
    onSome: (style): string =>
      pipe(
        Match.value(style),
        Match.when(
          "step",
          () =>
            `${color("bold", `[${counter("stepNumber")}/${counter("stepTotal")}]`)} ${color("cyan", "→")} ${message}`
        ),
        Match.when("success", () => `${color("green", "✓")} ${message}`),
        Match.when("fail", () => `${color("red", "✗")} ${message}`),
        Match.exhaustive
      ),
    onNone: (): string => {
      const stage = Option.match(annotation(annotations, "stage"), {
        onNone: (): string => "",
        onSome: (s): string => `${color("cyan", `[${s}]`)} `,
      });
      const trace = Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;
      return `${color(levelColor(level), level.label.padEnd(5))} ${stage}${message}${trace}`;
    },
  });
};

// ============================================================================
// JSON
// ============================================================================

const renderJson = (
  level: LogLevel.LogLevel,
  message: string,
  annotations: Annotations,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: level.label.toLowerCase(),
    message,
    ...Object.fromEntries(
      Array.from(HashMap.toEntries(annotations)).filter(([key]) => !STYLE_KEYS.has(key))
    ),
  });

// ============================================================================
// Logger
// ============================================================================

const targetOf = (level: LogLevel.LogLevel, style: Option.Option<LogStyleTag>): LogTarget =>
  LogLevel.greaterThanEqual(level, LogLevel.Error) || Option.contains(style, "fail")
    ? "stderr"
    : "stdout";

const processSink: LogSink = (target, line) => {
  process[target].write(`${line}\n`);
};

export const makeAppLogger = (
  format: LogFormat,
  useColor: boolean,
  sink: LogSink = processSink
): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const text = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    const line =
      format === "json"
        ? renderJson(logLevel, text, annotations, date)
        : renderPretty(logLevel, text, annotations, cause, useColor);
    sink(targetOf(logLevel, styleOf(annotations)), line);
  });

/** Colour only for an interactive terminal, and never when NO_COLOR is set. */
export const supportsColor = (env: NodeJS.ProcessEnv, isTTY: boolean): boolean =>
  isTTY && (env["NO_COLOR"] === undefined || env["NO_COLOR"] === "");

const toEffectLevel = (level: AppLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

export const AppLoggerLive = (options: {
  readonly level: AppLogLevel;
  readonly format: LogFormat;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      makeAppLogger(options.format, supportsColor(process.env, process.stdout.isTTY === true))
    ),
    Logger.minimumLogLevel(toEffectLevel(options.level))
  );
