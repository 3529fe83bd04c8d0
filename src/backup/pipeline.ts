// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * One backup run for one kind:
 *
 *   credentials → probe → export → validate export → gzip
 *     → verify archive → commit to slot → re-verify slot
 *
 * Any failure ends the run, marks health unhealthy and leaves the slot as
 * it was (except PostCommitCorruption, which is reported after the fact).
 * Scratch files are removed on every exit path, interruption included.
 */

import { Clock, Context, Effect, Layer, pipe } from "effect";
import type { BackupKind } from "../config/field-values";
import { AppSettings } from "../config/settings";
import {
  type BackupFailure,
  CompressionFailed,
  ExportFailed,
  PostCommitCorruption,
} from "../lib/errors";
import { createStepCounter, logEvent } from "../lib/log";
import { type AbsolutePath, pathWithSuffix } from "../lib/types";
import { gzipFile } from "../system/compress";
import { deleteFileIfExists } from "../system/fs";
import { CredentialSource } from "./credentials";
import { ExportClient } from "./export-client";
import { HealthWriter } from "./health-state";
import { RetentionStore } from "./retention";
import { ArtifactValidator } from "./validator";

export interface BackupReport {
  readonly kind: BackupKind;
  readonly path: AbsolutePath;
  readonly durationMs: number;
  readonly fileSizeBytes: number;
  readonly compressedSizeBytes: number;
}

export type PipelineDeps =
  | AppSettings
  | CredentialSource
  | ExportClient
  | ArtifactValidator
  | RetentionStore
  | HealthWriter;

const PIPELINE_STEPS = 8;

/** Distinct per run, so runs of different kinds never share scratch files. */
export const makeRunId: Effect.Effect<string> = Effect.flatMap(Clock.currentTimeMillis, (millis) =>
  Effect.sync(() => `${millis}_${Math.random().toString(36).slice(2, 8)}`)
);

/** Best effort: a file that cannot be removed is logged and left for ensureLayout. */
export const removeScratch = (paths: readonly AbsolutePath[]): Effect.Effect<void> =>
  Effect.forEach(
    paths,
    (path) =>
      pipe(
        deleteFileIfExists(path),
        Effect.catchAll((e) => Effect.logWarning(`Scratch file not removed: ${e.message}`))
      ),
    { discard: true }
  );

/** gzip -9, then drop the raw export. */
const compressExport = (
  rawPath: AbsolutePath,
  archivePath: AbsolutePath
): Effect.Effect<void, CompressionFailed> =>
  pipe(
    gzipFile(rawPath, archivePath, { level: 9 }),
    Effect.zipRight(deleteFileIfExists(rawPath)),
    Effect.asVoid,
    Effect.mapError((e) => new CompressionFailed({ message: e.message, cause: e }))
  );

export const runBackup = (
  kind: BackupKind
): Effect.Effect<BackupReport, BackupFailure, PipelineDeps> =>
  Effect.gen(function* () {
    const settings = yield* AppSettings;
    const credentials = yield* CredentialSource;
    const client = yield* ExportClient;
    const validator = yield* ArtifactValidator;
    const retention = yield* RetentionStore;
    const health = yield* HealthWriter;

    const runId = yield* makeRunId;
    const rawPath = retention.scratchPath(`${kind}_${runId}.${settings.storage.extension}`);
    const archivePath = pathWithSuffix(rawPath, ".gz");
    const startedAt = yield* Clock.currentTimeMillis;
    const elapsed = Effect.map(Clock.currentTimeMillis, (t) => t - startedAt);

    yield* health.set("running");
    yield* logEvent("info", `Starting ${kind} backup`, { backup_type: kind, status: "started" });

    const steps = yield* createStepCounter(PIPELINE_STEPS);

    const stages = Effect.gen(function* () {
      yield* steps.next("Loading credentials");
      const creds = yield* credentials.load;

      yield* steps.next(`Probing database at ${settings.database.endpoint}`);
      yield* client.probe;

      yield* steps.next("Exporting database");
      yield* pipe(
        retention.ensureDirectories,
        Effect.mapError(
          (e) => new ExportFailed({ message: `Scratch directory unavailable: ${e.message}`, cause: e })
        )
      );
      yield* client.exportTo(creds, rawPath);

      yield* steps.next("Validating export");
      const fileSizeBytes = yield* validator.validateExport(rawPath);

      yield* steps.next("Compressing export");
      yield* compressExport(rawPath, archivePath);

      yield* steps.next("Verifying archive");
      const compressedSizeBytes = yield* validator.validateCompressed(archivePath);

      yield* steps.next(`Committing to ${retention.path(kind)}`);
      const slot = yield* retention.commit(kind, archivePath);

      yield* steps.next("Re-verifying committed archive");
      yield* pipe(
        validator.validateCompressed(slot),
        Effect.mapError(
          (e) =>
            new PostCommitCorruption({
              message: `Committed backup failed verification: ${e.message}`,
              path: slot,
              cause: e,
            })
        )
      );

      const durationMs = yield* elapsed;
      const report: BackupReport = {
        kind,
        path: slot,
        durationMs,
        fileSizeBytes,
        compressedSizeBytes,
      };
      return report;
    });

    return yield* pipe(
      stages,
      Effect.tap((report) =>
        Effect.zipRight(
          health.set("healthy"),
          logEvent("info", `${kind} backup completed`, {
            backup_type: kind,
            status: "success",
            duration_ms: report.durationMs,
            file_size_bytes: report.fileSizeBytes,
            compressed_size_bytes: report.compressedSizeBytes,
          })
        )
      ),
      Effect.tapError((error) =>
        Effect.flatMap(elapsed, (durationMs) =>
          Effect.zipRight(
            health.set("unhealthy"),
            logEvent("error", `${kind} backup failed: ${error.message}`, {
              backup_type: kind,
              status: "failed",
              duration_ms: durationMs,
              error_code: error._tag,
            })
          )
        )
      ),
      Effect.ensuring(removeScratch([rawPath, archivePath]))
    );
  }).pipe(Effect.annotateLogs("component", "backup"));

// ============================================================================
// Service
// ============================================================================

export interface BackupPipelineService {
  readonly run: (kind: BackupKind) => Effect.Effect<BackupReport, BackupFailure>;
}

export interface BackupPipeline {
  readonly _tag: "BackupPipeline";
}

export const BackupPipeline: Context.Tag<BackupPipeline, BackupPipelineService> =
  Context.GenericTag<BackupPipeline, BackupPipelineService>("db-backup/BackupPipeline");

export const BackupPipelineLive: Layer.Layer<BackupPipeline, never, PipelineDeps> = Layer.effect(
  BackupPipeline,
  Effect.map(Effect.context<PipelineDeps>(), (context) => ({
    run: (kind: BackupKind): Effect.Effect<BackupReport, BackupFailure> =>
      Effect.provide(runBackup(kind), context),
  }))
);
