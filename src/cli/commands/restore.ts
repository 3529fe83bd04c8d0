// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore or verify a slot. A cancelled restore is a clean exit.
 */

import { Effect, Match, pipe } from "effect";
import { type RestoreReport, type RestoreRequest, RestoreWorkflow } from "../../backup/restore";
import type { RestoreFailure } from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import { formatBytes, formatDuration } from "./utils";

const reportOutcome = (report: RestoreReport): Effect.Effect<void> =>
  pipe(
    Match.value(report.outcome),
    Match.when("verified", () =>
      logSuccess(
        `Backup verification successful: ${report.path} (${formatBytes(report.sizeBytes)} uncompressed)`
      )
    ),
    Match.when("cancelled", () => writeOutput("Restore cancelled.")),
    Match.when("restored", () =>
      logSuccess(`Restore completed from ${report.path} in ${formatDuration(report.durationMs)}`)
    ),
    Match.exhaustive
  );

export const executeRestore = (
  request: RestoreRequest
): Effect.Effect<void, RestoreFailure, RestoreWorkflow> =>
  Effect.gen(function* () {
    const workflow = yield* RestoreWorkflow;
    const report = yield* workflow.restore(request);
    yield* reportOutcome(report);
  });
