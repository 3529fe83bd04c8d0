// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retry utilities using Effect Schedule for transient failure handling.
 */

import { Duration, Schedule, pipe } from "effect";

/** Fixed number of attempts separated by a constant delay. */
export interface RetryPolicy {
  readonly attempts: number;
  readonly delayMs: number;
}

/** Poll at a fixed interval until a deadline. */
export interface PollingPolicy {
  readonly maxWaitMs: number;
  readonly intervalMs: number;
}

/**
 * `attempts` total tries, so `attempts - 1` recurrences.
 * Uses Schedule.intersect to combine timing with retry limit.
 */
export const fixedRetrySchedule = (
  policy: RetryPolicy
): Schedule.Schedule<[number, number], unknown, never> =>
  pipe(
    Schedule.spaced(Duration.millis(policy.delayMs)),
    Schedule.intersect(Schedule.recurs(Math.max(0, policy.attempts - 1)))
  );

/**
 * Polling schedule for waiting on state changes.
 * A deadline shorter than one interval still gets a single attempt.
 */
export const pollingSchedule = (
  maxWaitMs: number,
  intervalMs: number
): Schedule.Schedule<[number, number], unknown, never> =>
  pipe(
    Schedule.spaced(Duration.millis(intervalMs)),
    Schedule.intersect(Schedule.recurs(Math.max(0, Math.ceil(maxWaitMs / intervalMs) - 1)))
  );

/** Number of attempts `pollingSchedule` allows, including the first. */
export const pollingAttempts = (policy: PollingPolicy): number =>
  Math.max(1, Math.ceil(policy.maxWaitMs / policy.intervalMs));
