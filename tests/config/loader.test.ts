// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { writeFile } from "node:fs/promises";
import { Option, Redacted } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { EnvOverrides } from "../../src/config/env";
import { applyEnvOverrides, defaultConfigPaths, loadConfig } from "../../src/config/loader";
import { telegramTarget } from "../../src/config/schema";
import { ErrorCode } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { failureOf, makeTempDir, removeDir, runTest, runTestExit } from "../helpers/layers";

const NO_OVERRIDES: EnvOverrides = {
  sources: Option.none(),
  remote: Option.none(),
  passphrase: Option.none(),
  maxKeep: Option.none(),
  minAgeHours: Option.none(),
  logFile: Option.none(),
  tmpDir: Option.none(),
  lockFile: Option.none(),
  telegramBotToken: Option.none(),
  telegramChatId: Option.none(),
};

const TOML = `[backup]
sources = ["/etc/nginx", "/var/www"]
remote = "gdrive:vps-backup"
passphrase = "test-secret"
maxKeep = 4

[upload]
attempts = 5

[notify.telegram]
botToken = "test-token"
chatId = "12345"
notifyStart = true

[logging]
format = "json"
`;

describe("applyEnvOverrides", () => {
  test("environment values replace file values field by field", () => {
    const doc = applyEnvOverrides(
      { backup: { sources: ["/etc"], maxKeep: 2 }, logging: { level: "warn" } },
      {
        ...NO_OVERRIDES,
        maxKeep: Option.some(9),
        passphrase: Option.some(Redacted.make("test-secret")),
      }
    );
    expect(doc).toEqual({
      backup: { sources: ["/etc"], maxKeep: 9, passphrase: "test-secret" },
      logging: { level: "warn" },
    });
  });

  test("telegram overrides create the section when the file has none", () => {
    const doc = applyEnvOverrides({}, { ...NO_OVERRIDES, telegramChatId: Option.some("42") });
    expect(doc).toEqual({ backup: {}, notify: { telegram: { chatId: "42" } } });
  });
});

describe("defaultConfigPaths", () => {
  test("system, then user, then working directory", () => {
    expect(defaultConfigPaths("/home/ops")).toEqual([
      "/etc/vps-backup/vps-backup.toml",
      "/home/ops/.config/vps-backup/vps-backup.toml",
      "./vps-backup.toml",
    ]);
  });
});

describe("loadConfig", () => {
  let dir: AbsolutePath;
  let file: AbsolutePath;

  beforeEach(async () => {
    dir = await makeTempDir("config");
    file = pathJoin(dir, "vps-backup.toml");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("an explicit file is parsed, validated and defaulted", async () => {
    await writeFile(file, TOML);

    const { config, source } = await runTest(loadConfig(Option.some(file), dir, NO_OVERRIDES));

    expect(source).toEqual(Option.some(file));
    expect(config.backup.sources).toEqual(["/etc/nginx", "/var/www"]);
    expect(config.backup.remote).toBe("gdrive:vps-backup");
    expect(Redacted.value(config.backup.passphrase)).toBe("test-secret");
    expect(config.backup.maxKeep).toBe(4);
    expect(config.backup.minAgeHours).toBe(0);
    expect(config.backup.tmpDir).toBe("/tmp/vps-backups");
    expect(config.backup.lockFile).toBe("/var/lock/vps-backup.lock");
    expect(config.backup.logFile).toBe("/var/log/vps-backup.log");
    expect(config.upload).toEqual({ attempts: 5, retryDelaySeconds: 5 });
    expect(config.encryption).toEqual({ scryptWorkFactor: 18 });
    expect(config.logging).toEqual({ level: "info", format: "json" });
    expect(Option.map(telegramTarget(config), (t) => [Redacted.value(t.botToken), t.chatId, t.notifyStart])).toEqual(
      Option.some(["test-token", "12345", true])
    );
  });

  test("environment overrides win over the file", async () => {
    await writeFile(file, TOML);

    const { config } = await runTest(
      loadConfig(Option.some(file), dir, {
        ...NO_OVERRIDES,
        sources: Option.some(["/srv/app"]),
        maxKeep: Option.some(1),
      })
    );

    expect(config.backup.sources).toEqual(["/srv/app"]);
    expect(config.backup.maxKeep).toBe(1);
  });

  test("a missing explicit file is CONFIG_NOT_FOUND", async () => {
    const exit = await runTestExit(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "ConfigError",
      code: ErrorCode.CONFIG_NOT_FOUND,
      message: `Configuration file not found: ${file}`,
    });
  });

  test("invalid TOML is CONFIG_PARSE_ERROR", async () => {
    await writeFile(file, "[backup\nsources = ");
    const exit = await runTestExit(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    expect(Option.getOrUndefined(failureOf(exit))?.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
  });

  test("schema violations name the file", async () => {
    await writeFile(file, '[backup]\nsources = ["relative/path"]\npassphrase = "test-secret"\n');
    const exit = await runTestExit(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    const error = Option.getOrUndefined(failureOf(exit));
    expect(error?.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
    expect(error?.message.startsWith(`Configuration validation failed for ${file}:\n`)).toBe(true);
  });

  test("a remote without a colon is rejected", async () => {
    await writeFile(file, '[backup]\nsources = ["/etc"]\npassphrase = "test-secret"\nremote = "nowhere"\n');
    const exit = await runTestExit(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    expect(Option.getOrUndefined(failureOf(exit))?.message).toContain(
      "Remote must have the form <remote>:<path>"
    );
  });

  test("an empty passphrase is rejected", async () => {
    await writeFile(file, '[backup]\nsources = ["/etc"]\npassphrase = ""\n');
    const exit = await runTestExit(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    expect(Option.getOrUndefined(failureOf(exit))?.message).toContain(
      "Encryption passphrase must not be empty"
    );
  });

  test("telegram stays disabled without a chat id", async () => {
    await writeFile(
      file,
      '[backup]\nsources = ["/etc"]\npassphrase = "test-secret"\n[notify.telegram]\nbotToken = "test-token"\n'
    );
    const { config } = await runTest(loadConfig(Option.some(file), dir, NO_OVERRIDES));
    expect(telegramTarget(config)).toEqual(Option.none());
  });
});
