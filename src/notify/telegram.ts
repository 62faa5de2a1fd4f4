// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Outbound notifications. The live notifier posts to the Telegram Bot API;
 * without a bot token and chat id every message is dropped.
 */

import { Context, Duration, Effect, Layer, Option, Redacted } from "effect";
import { type BackupConfig, type TelegramTarget, telegramTarget } from "../config/schema";
import { ErrorCode, NotifyError, causeOf, errorMessage } from "../lib/errors";

export const TELEGRAM_API_URL = "https://api.telegram.org";
export const NOTIFY_TIMEOUT: Duration.Duration = Duration.seconds(10);

export interface NotifierService {
  /** Whether messages go anywhere. */
  readonly enabled: boolean;
  readonly notifyStart: boolean;
  readonly send: (text: string) => Effect.Effect<void, NotifyError>;
}

/**
 * Notifier tag identifier type.
 */
export interface Notifier {
  readonly _tag: "Notifier";
}

export const Notifier: Context.Tag<Notifier, NotifierService> = Context.GenericTag<
  Notifier,
  NotifierService
>("vps-backup/Notifier");

// ============================================================================
// Messages
// ============================================================================

export const escapeHtml = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const header = (host: string): string => `🖥️ <b>${escapeHtml(host)}</b>`;

export const startMessage = (host: string): string => `${header(host)}\n▶️ Backup started`;

export const failureMessage = (host: string, reason: string): string =>
  `${header(host)}\n❌ <b>Backup failed</b>\n${escapeHtml(reason)}`;

export interface SuccessDetails {
  readonly size: string;
  readonly kept: number;
  readonly file: string;
}

export const successMessage = (host: string, details: SuccessDetails): string =>
  [
    header(host),
    "✅ <b>Backup completed</b>",
    `📦 Size: ${escapeHtml(details.size)}`,
    `🔢 Backups kept: ${details.kept}`,
    `📅 File: ${escapeHtml(details.file)}`,
    "✓ SHA-256 checksum stored",
  ].join("\n");

export const testMessage = (host: string): string =>
  `${header(host)}\n🔔 Test notification from vps-backup`;

// ============================================================================
// Telegram
// ============================================================================

const notifyFailed = (message: string, e?: unknown): NotifyError =>
  new NotifyError({ code: ErrorCode.NOTIFY_FAILED, message, ...causeOf(e) });

const postMessage = async (target: TelegramTarget, text: string): Promise<Response> =>
  fetch(`${TELEGRAM_API_URL}/bot${Redacted.value(target.botToken)}/sendMessage`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({
      chat_id: target.chatId,
      text,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    }),
    signal: AbortSignal.timeout(Duration.toMillis(NOTIFY_TIMEOUT)),
  });

export const makeTelegramNotifier = (target: TelegramTarget): NotifierService => ({
  enabled: true,
  notifyStart: target.notifyStart,
  send: (text: string): Effect.Effect<void, NotifyError> =>
    Effect.gen(function* () {
      const response = yield* Effect.tryPromise({
        try: (): Promise<Response> => postMessage(target, text),
        // The token is part of the URL; keep the underlying error out of the message
        catch: (e): NotifyError =>
          notifyFailed(
            `Telegram request failed: ${e instanceof Error ? e.name : "unknown error"}`
          ),
      });
      if (!response.ok) {
        const body = yield* Effect.promise(() => response.text().catch(() => ""));
        return yield* Effect.fail(
          notifyFailed(`Telegram API returned ${response.status}${body ? `: ${body}` : ""}`)
        );
      }
    }),
});

export const noopNotifier: NotifierService = {
  enabled: false,
  notifyStart: false,
  send: (): Effect.Effect<void, NotifyError> => Effect.void,
};

export const NoopNotifierLive: Layer.Layer<Notifier> = Layer.succeed(Notifier, noopNotifier);

export const NotifierLive = (config: BackupConfig): Layer.Layer<Notifier> =>
  Layer.succeed(
    Notifier,
    Option.match(telegramTarget(config), {
      onNone: (): NotifierService => noopNotifier,
      onSome: makeTelegramNotifier,
    })
  );

/** Fire-and-forget: failures are logged and returned as the warning text. */
export const notifySafely = (
  notifier: NotifierService,
  text: string
): Effect.Effect<Option.Option<string>> =>
  notifier.send(text).pipe(
    Effect.as(Option.none<string>()),
    Effect.catchAll((e) =>
      Effect.as(
        Effect.logWarning(`Notification failed: ${e.message}`),
        Option.some(e.message)
      )
    ),
    Effect.catchAllDefect((d) =>
      Effect.as(
        Effect.logWarning(`Notification failed: ${errorMessage(d)}`),
        Option.some(errorMessage(d))
      )
    )
  );
