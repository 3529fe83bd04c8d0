// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Health report from outside the daemon: the snapshot the daemon mirrors
 * to disk plus the slot files, judged the way `GET /health` judges them.
 * Exits with UNHEALTHY when the report is unhealthy.
 */

import { Clock, Effect, Match, pipe } from "effect";
import { readHealthSnapshot } from "../../backup/health-state";
import { RetentionStore } from "../../backup/retention";
import { BACKUP_KIND_VALUES, type LogFormat } from "../../config/field-values";
import { AppSettings } from "../../config/settings";
import { type ConfigError, ErrorCode, GeneralError, type SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type HealthResponseBody, buildHealthBody, collectSlotStats } from "../../server/health";
import { formatBytes } from "./utils";

export const formatStatusPretty = (body: HealthResponseBody): string =>
  [
    `Status:      ${body.status}`,
    `Last backup: ${body.last_backup}`,
    ...BACKUP_KIND_VALUES.map((kind) => {
      const slot = body.backups[kind];
      return `${kind.padEnd(12)} ${slot.exists ? formatBytes(slot.size_bytes) : "missing"}`;
    }),
  ].join("\n");

export const executeStatus = (
  format: LogFormat
): Effect.Effect<void, GeneralError | ConfigError | SystemError, AppSettings | RetentionStore> =>
  Effect.gen(function* () {
    const settings = yield* AppSettings;
    const retention = yield* RetentionStore;

    const record = yield* readHealthSnapshot(settings.health.snapshotPath);
    const slots = yield* collectSlotStats(retention);
    const nowMs = yield* Clock.currentTimeMillis;
    const body = buildHealthBody(record, slots, nowMs, settings.health.stalenessThresholdMs);

    yield* pipe(
      Match.value(format),
      Match.when("json", () => writeOutput(JSON.stringify(body))),
      Match.when("pretty", () => writeOutput(formatStatusPretty(body))),
      Match.exhaustive
    );

    if (body.status !== "healthy") {
      return yield* Effect.fail(
        new GeneralError({ code: ErrorCode.UNHEALTHY, message: "Backup service is unhealthy" })
      );
    }
  });
