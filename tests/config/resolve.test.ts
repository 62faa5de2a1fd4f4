// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import type { EnvConfig } from "../../src/config/env";
import { resolve, resolveLogFormat, resolveLogLevel } from "../../src/config/resolve";

const env = (overrides: Partial<EnvConfig> = {}): EnvConfig => ({
  home: "/root",
  logging: { level: Option.none(), format: Option.none() },
  debug: false,
  overrides: {
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
  },
  ...overrides,
});

const TOML = { level: "info", format: "pretty" } as const;

describe("resolve", () => {
  test("CLI beats environment beats file", () => {
    expect(resolve({ cli: Option.some(1), env: Option.some(2), toml: 3 })).toBe(1);
    expect(resolve({ cli: Option.none(), env: Option.some(2), toml: 3 })).toBe(2);
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: 3 })).toBe(3);
  });
});

describe("resolveLogLevel", () => {
  test("--verbose forces debug", () => {
    expect(resolveLogLevel({ verbose: true, logLevel: Option.some("error") }, env(), TOML)).toBe(
      "debug"
    );
  });

  test("BACKUP_DEBUG forces debug below an explicit flag", () => {
    const debugEnv = env({ debug: true });
    expect(resolveLogLevel({ verbose: false, logLevel: Option.none() }, debugEnv, TOML)).toBe("debug");
    expect(resolveLogLevel({ verbose: false, logLevel: Option.some("warn") }, debugEnv, TOML)).toBe(
      "warn"
    );
  });

  test("falls back to the file", () => {
    expect(resolveLogLevel({ verbose: false, logLevel: Option.none() }, env(), TOML)).toBe("info");
  });
});

describe("resolveLogFormat", () => {
  test("--json is shorthand for json", () => {
    expect(resolveLogFormat({ json: true, format: Option.some("pretty") }, env(), TOML)).toBe("json");
  });

  test("environment format applies without flags", () => {
    const jsonEnv = env({ logging: { level: Option.none(), format: Option.some("json") } });
    expect(resolveLogFormat({ json: false, format: Option.none() }, jsonEnv, TOML)).toBe("json");
  });
});
