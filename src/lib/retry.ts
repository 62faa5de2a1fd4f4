// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retry schedules for transient failure handling.
 */

import { type Duration, Schedule, pipe } from "effect";

/**
 * Fixed-delay retry bounded by total attempts (not retries).
 * - `attempts = 3, delay = 5s` runs the effect at t=0, 5s and 10s.
 *
 * Uses Schedule.intersect to combine timing with retry limit.
 */
export const fixedRetrySchedule = (
  attempts: number,
  delay: Duration.DurationInput
): Schedule.Schedule<[number, number], unknown, never> =>
  pipe(
    Schedule.spaced(delay),
    Schedule.intersect(Schedule.recurs(Math.max(0, attempts - 1)))
  );

