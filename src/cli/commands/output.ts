// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { writeOutput } from "../../lib/log";

/** One JSON document for `--format json`, plain lines otherwise. */
export const emit = (
  format: LogFormat,
  json: unknown,
  pretty: () => readonly string[]
): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeOutput(JSON.stringify(json))),
    Match.when("pretty", () => Effect.forEach(pretty(), writeOutput, { discard: true })),
    Match.exhaustive
  );
