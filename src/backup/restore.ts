// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore a slot into the live database, or only verify it.
 *
 * The archive is fully checked (gzip integrity, then the decompressed
 * export) before the operator is asked anything, and nothing reaches the
 * database unless every check passed. Restore reads slots but never writes
 * them, and never touches the health record.
 */

import { Clock, Context, Effect, Layer, pipe } from "effect";
import type { BackupKind } from "../config/field-values";
import { AppSettings } from "../config/settings";
import { CorruptArchive, type RestoreFailure, SlotEmpty } from "../lib/errors";
import { createStepCounter, logEvent } from "../lib/log";
import type { AbsolutePath } from "../lib/types";
import { gunzipFile } from "../system/compress";
import { Confirmation, isConfirmed } from "./confirmation";
import { CredentialSource } from "./credentials";
import { ExportClient } from "./export-client";
import { makeRunId, removeScratch } from "./pipeline";
import { RetentionStore } from "./retention";
import { ArtifactValidator } from "./validator";

export interface RestoreRequest {
  readonly kind: BackupKind;
  /** Skip the confirmation prompt. */
  readonly force: boolean;
  readonly verifyOnly: boolean;
}

export type RestoreOutcome = "verified" | "restored" | "cancelled";

export interface RestoreReport {
  readonly kind: BackupKind;
  readonly outcome: RestoreOutcome;
  readonly path: AbsolutePath;
  readonly durationMs: number;
  readonly sizeBytes: number;
  readonly compressedSizeBytes: number;
}

export type RestoreDeps =
  | AppSettings
  | CredentialSource
  | ExportClient
  | ArtifactValidator
  | RetentionStore
  | Confirmation;

interface VerifiedSlot {
  readonly path: AbsolutePath;
  readonly sizeBytes: number;
  readonly compressedSizeBytes: number;
}

export const confirmationMessage = (
  slot: AbsolutePath,
  endpoint: string,
  phrase: string
): string =>
  [
    "WARNING: This will replace all data in the database.",
    `Backup file: ${slot}`,
    `Database endpoint: ${endpoint}`,
    `Type '${phrase}' to continue`,
  ].join("\n");

/** Slot present, archive intact, decompressed export well-formed. */
const verifySlot = (
  kind: BackupKind,
  scratch: AbsolutePath
): Effect.Effect<VerifiedSlot, RestoreFailure, RetentionStore | ArtifactValidator> =>
  Effect.gen(function* () {
    const retention = yield* RetentionStore;
    const validator = yield* ArtifactValidator;
    const slot = retention.path(kind);

    const stat = yield* pipe(
      retention.stat(kind),
      Effect.mapError(
        (e) => new CorruptArchive({ message: `Archive is unreadable: ${e.message}`, path: slot, cause: e })
      )
    );
    if (!stat.exists) {
      return yield* Effect.fail(
        new SlotEmpty({ message: `No ${kind} backup found at ${slot}`, path: slot })
      );
    }

    const compressedSizeBytes = yield* validator.validateCompressed(slot);
    yield* retention.ensureDirectories;
    yield* pipe(
      gunzipFile(slot, scratch),
      Effect.mapError(
        (e) => new CorruptArchive({ message: `Archive could not be decompressed: ${e.message}`, path: slot, cause: e })
      )
    );
    const sizeBytes = yield* validator.validateExport(scratch);

    return { path: slot, sizeBytes, compressedSizeBytes };
  });

const RESTORE_STEPS = 5;

export const runRestore = (
  request: RestoreRequest
): Effect.Effect<RestoreReport, RestoreFailure, RestoreDeps> =>
  Effect.gen(function* () {
    const settings = yield* AppSettings;
    const retention = yield* RetentionStore;
    const confirmation = yield* Confirmation;
    const credentials = yield* CredentialSource;
    const client = yield* ExportClient;

    const { kind } = request;
    const runId = yield* makeRunId;
    const scratch = retention.scratchPath(`restore_${runId}.${settings.storage.extension}`);
    const startedAt = yield* Clock.currentTimeMillis;
    const steps = yield* createStepCounter(RESTORE_STEPS);

    const finish = (verified: VerifiedSlot, outcome: RestoreOutcome): Effect.Effect<RestoreReport> =>
      Effect.map(Clock.currentTimeMillis, (t) => ({
        kind,
        outcome,
        path: verified.path,
        durationMs: t - startedAt,
        sizeBytes: verified.sizeBytes,
        compressedSizeBytes: verified.compressedSizeBytes,
      }));

    const workflow = Effect.gen(function* () {
      yield* steps.next(`Verifying ${retention.path(kind)}`);
      const verified = yield* verifySlot(kind, scratch);

      if (request.verifyOnly) {
        return yield* finish(verified, "verified");
      }

      if (!request.force) {
        yield* steps.next("Awaiting confirmation");
        const answer = yield* confirmation.ask(
          confirmationMessage(verified.path, settings.database.endpoint, settings.restore.confirmPhrase)
        );
        if (!isConfirmed(answer, settings.restore.confirmPhrase)) {
          return yield* finish(verified, "cancelled");
        }
      }

      yield* steps.next("Loading credentials");
      const creds = yield* credentials.load;
      yield* steps.next(`Probing database at ${settings.database.endpoint}`);
      yield* client.probe;
      yield* steps.next("Importing backup");
      yield* client.importFrom(creds, scratch);

      return yield* finish(verified, "restored");
    });

    return yield* pipe(
      workflow,
      Effect.tap((report) =>
        logEvent("info", `${kind} restore ${report.outcome}`, {
          backup_type: kind,
          status: report.outcome === "restored" ? "success" : report.outcome,
          duration_ms: report.durationMs,
          file_size_bytes: report.sizeBytes,
          compressed_size_bytes: report.compressedSizeBytes,
        })
      ),
      Effect.tapError((error) =>
        Effect.flatMap(Clock.currentTimeMillis, (t) =>
          logEvent("error", `${kind} restore failed: ${error.message}`, {
            backup_type: kind,
            status: "failed",
            duration_ms: t - startedAt,
            error_code: error._tag,
          })
        )
      ),
      Effect.ensuring(removeScratch([scratch]))
    );
  }).pipe(Effect.annotateLogs("component", "restore"));

// ============================================================================
// Service
// ============================================================================

export interface RestoreWorkflowService {
  readonly restore: (request: RestoreRequest) => Effect.Effect<RestoreReport, RestoreFailure>;
}

export interface RestoreWorkflow {
  readonly _tag: "RestoreWorkflow";
}

export const RestoreWorkflow: Context.Tag<RestoreWorkflow, RestoreWorkflowService> =
  Context.GenericTag<RestoreWorkflow, RestoreWorkflowService>("db-backup/RestoreWorkflow");

export const RestoreWorkflowLive: Layer.Layer<RestoreWorkflow, never, RestoreDeps> = Layer.effect(
  RestoreWorkflow,
  Effect.map(Effect.context<RestoreDeps>(), (context) => ({
    restore: (request: RestoreRequest): Effect.Effect<RestoreReport, RestoreFailure> =>
      Effect.provide(runRestore(request), context),
  }))
);
