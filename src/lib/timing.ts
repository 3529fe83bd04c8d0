// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Timestamp helpers shared by the log stream, health
 * snapshots and run reports.
 */

import { Clock, Effect } from "effect";

/**
 * UTC timestamp at second precision: `2026-01-31T02:00:00Z`.
 */
export const formatTimestamp = (date: Date): string =>
  `${date.toISOString().slice(0, 19)}Z`;

/** Current wall-clock time through the Effect Clock, so tests can drive it. */
export const now: Effect.Effect<Date> = Effect.map(
  Clock.currentTimeMillis,
  (millis) => new Date(millis)
);

