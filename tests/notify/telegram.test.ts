// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option, Redacted } from "effect";
import { afterEach, describe, expect, test, vi } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import {
  Notifier,
  NotifierLive,
  escapeHtml,
  failureMessage,
  makeTelegramNotifier,
  notifySafely,
  startMessage,
  successMessage,
  testMessage,
} from "../../src/notify/telegram";
import { makeTestConfig } from "../helpers/config";
import { makeRecordingNotifier } from "../helpers/fakes";
import { failureOf, runTest, runTestExit } from "../helpers/layers";

const TARGET = { botToken: Redacted.make("test-token"), chatId: "12345", notifyStart: false };

describe("messages", () => {
  test("escapeHtml escapes the three HTML metacharacters", () => {
    expect(escapeHtml("<a & b>")).toBe("&lt;a &amp; b&gt;");
  });

  test("start and failure messages carry the host", () => {
    expect(startMessage("web1")).toBe("🖥️ <b>web1</b>\n▶️ Backup started");
    expect(failureMessage("web1", "tar exited with code 2: <stdin>")).toBe(
      "🖥️ <b>web1</b>\n❌ <b>Backup failed</b>\ntar exited with code 2: &lt;stdin&gt;"
    );
  });

  test("success message lists size, retention and file", () => {
    expect(
      successMessage("web1", {
        size: "1.50 MB",
        kept: 2,
        file: "backup-web1-20250101-120000.tar.gz.enc",
      })
    ).toBe(
      [
        "🖥️ <b>web1</b>",
        "✅ <b>Backup completed</b>",
        "📦 Size: 1.50 MB",
        "🔢 Backups kept: 2",
        "📅 File: backup-web1-20250101-120000.tar.gz.enc",
        "✓ SHA-256 checksum stored",
      ].join("\n")
    );
  });

  test("test message", () => {
    expect(testMessage("web1")).toBe("🖥️ <b>web1</b>\n🔔 Test notification from vps-backup");
  });
});

describe("makeTelegramNotifier", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("posts an HTML message to the bot API", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response('{"ok":true}', { status: 200 }));

    await runTest(makeTelegramNotifier(TARGET).send("hello"));

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "12345",
      text: "hello",
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  });

  test("an API error carries the status and body", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("Bad Request: chat not found", { status: 400 })
    );

    const exit = await runTestExit(makeTelegramNotifier(TARGET).send("hello"));
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "NotifyError",
      code: ErrorCode.NOTIFY_FAILED,
      message: "Telegram API returned 400: Bad Request: chat not found",
    });
  });

  test("a network failure never exposes the token", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(
      new TypeError("fetch failed for https://api.telegram.org/bottest-token/sendMessage")
    );

    const exit = await runTestExit(makeTelegramNotifier(TARGET).send("hello"));
    const error = Option.getOrUndefined(failureOf(exit));
    expect(error?.message).toBe("Telegram request failed: TypeError");
    expect(error?.cause).toBeUndefined();
  });
});

describe("NotifierLive", () => {
  test("is disabled without credentials", async () => {
    const notifier = await runTest(
      Effect.provide(Notifier, NotifierLive(makeTestConfig("/srv/test")))
    );
    expect(notifier.enabled).toBe(false);
  });

  test("is enabled when token and chat id are configured", async () => {
    const config = makeTestConfig(
      "/srv/test",
      {},
      { notify: { telegram: { botToken: "test-token", chatId: "12345", notifyStart: true } } }
    );
    const notifier = await runTest(Effect.provide(Notifier, NotifierLive(config)));
    expect(notifier.enabled).toBe(true);
    expect(notifier.notifyStart).toBe(true);
  });
});

describe("notifySafely", () => {
  test("returns none after a delivered message", async () => {
    const recording = makeRecordingNotifier();
    expect(await runTest(notifySafely(recording.service, "hi"))).toEqual(Option.none());
    expect(recording.messages).toEqual(["hi"]);
  });

  test("turns a failure into its message", async () => {
    const recording = makeRecordingNotifier({ fail: true });
    expect(await runTest(notifySafely(recording.service, "hi"))).toEqual(Option.some("bot blocked"));
  });
});
