// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * One pipeline run outside the daemon, the same run a cron tick triggers.
 */

import { Effect } from "effect";
import { BackupPipeline } from "../../backup/pipeline";
import type { BackupKind } from "../../config/field-values";
import type { BackupFailure } from "../../lib/errors";
import { logSuccess } from "../../lib/log";
import { formatBytes, formatDuration } from "./utils";

export const executeBackup = (
  kind: BackupKind
): Effect.Effect<void, BackupFailure, BackupPipeline> =>
  Effect.gen(function* () {
    const pipeline = yield* BackupPipeline;
    const report = yield* pipeline.run(kind);
    yield* logSuccess(
      `Backup saved to ${report.path} (${formatBytes(report.compressedSizeBytes)}, ${formatDuration(report.durationMs)})`
    );
  });
