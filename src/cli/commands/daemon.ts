// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Long-running mode: health endpoint plus both cron loops, until the
 * process is interrupted. Interruption closes the HTTP server and runs
 * scratch cleanup of any run in flight.
 */

import type { HttpServerError } from "@effect/platform";
import { Effect, Layer } from "effect";
import type { HealthReader } from "../../backup/health-state";
import type { BackupPipeline } from "../../backup/pipeline";
import { RetentionStore } from "../../backup/retention";
import { scheduleKind } from "../../backup/scheduler";
import { AppSettings } from "../../config/settings";
import type { SystemError } from "../../lib/errors";
import { HealthServerLive } from "../../server/health";

export const executeDaemon: Effect.Effect<
  void,
  SystemError | HttpServerError.ServeError,
  AppSettings | RetentionStore | HealthReader | BackupPipeline
> = Effect.gen(function* () {
  const settings = yield* AppSettings;
  const retention = yield* RetentionStore;

  const removed = yield* retention.ensureLayout;
  yield* Effect.logInfo(
    `Backup root ${settings.storage.backupDir} ready; ${removed} leftover scratch file(s) removed`
  );

  yield* Effect.all(
    [
      Layer.launch(HealthServerLive),
      scheduleKind("nightly", settings.schedule.nightly),
      scheduleKind("weekly", settings.schedule.weekly),
    ],
    { concurrency: "unbounded", discard: true }
  );
}).pipe(Effect.annotateLogs("component", "daemon"));
