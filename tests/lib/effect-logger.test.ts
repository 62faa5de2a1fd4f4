// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Logger } from "effect";
import { describe, expect, test } from "vitest";
import type { LogFormat } from "../../src/config/field-values";
import { type LogTarget, makeAppLogger, supportsColor } from "../../src/lib/effect-logger";
import { logFail, logStep, logSuccess, withStage } from "../../src/lib/log";

type Captured = readonly (readonly [LogTarget, string])[];

const capture = (format: LogFormat, useColor: boolean, effect: Effect.Effect<void>): Captured => {
  const lines: (readonly [LogTarget, string])[] = [];
  const logger = makeAppLogger(format, useColor, (target, line) => {
    lines.push([target, line]);
  });
  Effect.runSync(effect.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger))));
  return lines;
};

const parsed = (lines: Captured, index: number): Record<string, unknown> => {
  const entry = lines[index];
  expect(entry).toBeDefined();
  const value: unknown = JSON.parse(entry?.[1] ?? "null");
  expect(typeof value).toBe("object");
  return Object.fromEntries(Object.entries(value ?? {}));
};

describe("json format", () => {
  test("one object per line with timestamp, level, message and annotations", () => {
    const lines = capture(
      "json",
      false,
      Effect.logInfo("uploading").pipe(withStage("upload"), Effect.annotateLogs("attempt", "2"))
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe("stdout");
    const entry = parsed(lines, 0);
    expect(Object.keys(entry).slice(0, 3)).toEqual(["timestamp", "level", "message"]);
    expect(Object.keys(entry).sort()).toEqual(["attempt", "level", "message", "stage", "timestamp"]);
    expect(entry).toMatchObject({ level: "info", message: "uploading", stage: "upload", attempt: "2" });
    expect(String(entry["timestamp"])).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  test("step styling stays out of the object", () => {
    const entry = parsed(capture("json", false, logStep(2, 7, "Checking free space")), 0);
    expect(Object.keys(entry)).toEqual(["timestamp", "level", "message"]);
    expect(entry["message"]).toBe("Checking free space");
  });

  test("errors and failures go to stderr", () => {
    const lines = capture(
      "json",
      false,
      Effect.all([Effect.logError("boom"), logFail("broke"), Effect.logWarning("careful")], {
        discard: true,
      })
    );
    expect(lines.map(([target]) => target)).toEqual(["stderr", "stderr", "stdout"]);
    expect(parsed(lines, 0)["level"]).toBe("error");
    expect(parsed(lines, 2)["level"]).toBe("warn");
  });
});

describe("pretty format", () => {
  test("renders steps, outcomes and stage-tagged lines", () => {
    const lines = capture(
      "pretty",
      false,
      Effect.all(
        [
          logStep(2, 7, "Checking free space"),
          logSuccess("Backup completed"),
          logFail("Backup failed"),
          Effect.logWarning("pruning skipped").pipe(withStage("retention")),
          Effect.logInfo("plain"),
        ],
        { discard: true }
      )
    );

    expect(lines).toEqual([
      ["stdout", "[2/7] → Checking free space"],
      ["stdout", "✓ Backup completed"],
      ["stderr", "✗ Backup failed"],
      ["stdout", "WARN  [retention] pruning skipped"],
      ["stdout", "INFO  plain"],
    ]);
  });

  test("colours marks and levels when enabled", () => {
    const lines = capture(
      "pretty",
      true,
      Effect.all([logSuccess("done"), Effect.logError("boom")], { discard: true })
    );

    expect(lines).toEqual([
      ["stdout", "\x1b[32m✓\x1b[0m done"],
      ["stderr", "\x1b[31mERROR\x1b[0m boom"],
    ]);
  });
});

describe("supportsColor", () => {
  test("needs a terminal", () => {
    expect(supportsColor({}, true)).toBe(true);
    expect(supportsColor({}, false)).toBe(false);
  });

  test("honours NO_COLOR unless it is empty", () => {
    expect(supportsColor({ NO_COLOR: "1" }, true)).toBe(false);
    expect(supportsColor({ NO_COLOR: "" }, true)).toBe(true);
  });
});
