// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit, Option, Redacted } from "effect";
import { describe, expect, test } from "vitest";
import { EnvConfigSpec, createTestConfigProvider } from "../../src/config/env";

const readEnv = (vars: Record<string, string>) =>
  Effect.runPromiseExit(Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider(vars)));

const readEnvOk = (vars: Record<string, string>) =>
  Effect.runPromise(Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider(vars)));

describe("EnvConfigSpec", () => {
  test("nothing set leaves every override empty", async () => {
    const env = await readEnvOk({});

    expect(env.home).toBe("/home/testuser");
    expect(env.debug).toBe(false);
    expect(env.logging).toEqual({ level: Option.none(), format: Option.none() });
    expect(Object.values(env.overrides).every(Option.isNone)).toBe(true);
  });

  test("reads the cron job's variables", async () => {
    const env = await readEnvOk({
      BACKUP_SRCS: "/etc/nginx | /srv/my data|",
      BACKUP_REMOTE_DIR: "b2:host-backups",
      BACKUP_PASSWORD: "test-secret",
      BACKUP_MAX_KEEP: "7",
      BACKUP_MIN_AGE_HOURS: "1.5",
      BACKUP_TMP_DIR: "/var/tmp/vps",
      TG_BOT_TOKEN: "test-token",
      TG_CHAT_ID: "-100123",
    });

    expect(env.overrides.sources).toEqual(Option.some(["/etc/nginx", "/srv/my data"]));
    expect(env.overrides.remote).toEqual(Option.some("b2:host-backups"));
    expect(Option.map(env.overrides.passphrase, Redacted.value)).toEqual(Option.some("test-secret"));
    expect(env.overrides.maxKeep).toEqual(Option.some(7));
    expect(env.overrides.minAgeHours).toEqual(Option.some(1.5));
    expect(env.overrides.tmpDir).toEqual(Option.some("/var/tmp/vps"));
    expect(env.overrides.lockFile).toEqual(Option.none());
    expect(Option.map(env.overrides.telegramBotToken, Redacted.value)).toEqual(
      Option.some("test-token")
    );
    expect(env.overrides.telegramChatId).toEqual(Option.some("-100123"));
  });

  test("logging variables and debug mode", async () => {
    const env = await readEnvOk({
      BACKUP_LOG_LEVEL: "warn",
      BACKUP_LOG_FORMAT: "json",
      BACKUP_DEBUG: "true",
    });

    expect(env.logging).toEqual({ level: Option.some("warn"), format: Option.some("json") });
    expect(env.debug).toBe(true);
  });

  test("a malformed number is an error, not an absent value", async () => {
    expect(Exit.isFailure(await readEnv({ BACKUP_MAX_KEEP: "seven" }))).toBe(true);
  });

  test("an unknown log level is rejected", async () => {
    expect(Exit.isFailure(await readEnv({ BACKUP_LOG_LEVEL: "loud" }))).toBe(true);
  });
});
