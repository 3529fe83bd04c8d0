// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Cron driver for the pipeline. Each kind gets its own fiber that waits
 * for the next cron tick, runs once and waits again.
 */

import { Effect, Schedule, pipe } from "effect";
import type { BackupKind } from "../config/field-values";
import { errorMessage } from "../lib/errors";
import { BackupPipeline } from "./pipeline";

/**
 * One scheduled run. The pipeline has already logged the failure and
 * marked health unhealthy, so only a trace is left here; a defect is
 * logged and dropped so the loop keeps going.
 */
export const scheduledRun = (kind: BackupKind): Effect.Effect<void, never, BackupPipeline> =>
  Effect.flatMap(BackupPipeline, (pipeline) =>
    pipe(
      pipeline.run(kind),
      Effect.asVoid,
      Effect.catchAll((e) =>
        Effect.logDebug(`Scheduled ${kind} run ended with ${e._tag}; waiting for the next tick`)
      ),
      Effect.catchAllDefect((defect) =>
        Effect.logError(`Scheduled ${kind} run aborted: ${errorMessage(defect)}`)
      )
    )
  );

/** Never completes; the first run happens at the first cron tick, not at start-up. */
export const scheduleKind = (
  kind: BackupKind,
  expression: string
): Effect.Effect<void, never, BackupPipeline> =>
  pipe(
    Effect.logInfo(`Scheduling ${kind} backups at "${expression}"`),
    Effect.zipRight(Effect.schedule(scheduledRun(kind), Schedule.cron(expression))),
    Effect.asVoid,
    Effect.annotateLogs("component", "scheduler")
  );
