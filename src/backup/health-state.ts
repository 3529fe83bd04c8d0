// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The daemon's health record. One SynchronizedRef holds it; the pipeline
 * gets the writer half, the HTTP server and CLI the reader half. Each write
 * is mirrored to a JSON snapshot so `status` can report from another process.
 */

import { Context, Effect, Layer, Option, Schema, SynchronizedRef, pipe } from "effect";
import { HEALTH_STATUS_VALUES, type HealthStatus } from "../config/field-values";
import { AppSettings } from "../config/settings";
import type { ConfigError, SystemError } from "../lib/errors";
import { decodeToEffect } from "../lib/schema-utils";
import { formatTimestamp, now } from "../lib/timing";
import type { AbsolutePath } from "../lib/types";
import { atomicWrite, readFileIfExists } from "../system/fs";

export const HEALTH_SERVICE_NAME = "db-backup";

export interface HealthRecord {
  readonly status: HealthStatus;
  readonly lastUpdated: Date;
}

/** `starting` belongs to daemon start-up; a run only ever writes these. */
export type RunHealthStatus = Exclude<HealthStatus, "starting">;

// ============================================================================
// Snapshot
// ============================================================================

const HealthSnapshotSchema = Schema.Struct({
  status: Schema.Literal(...HEALTH_STATUS_VALUES),
  last_updated: Schema.Date,
  service: Schema.String,
});

export const encodeSnapshot = (record: HealthRecord): string =>
  JSON.stringify({
    status: record.status,
    last_updated: formatTimestamp(record.lastUpdated),
    service: HEALTH_SERVICE_NAME,
  });

export const decodeSnapshot = (
  content: string,
  source: string
): Effect.Effect<HealthRecord, ConfigError> =>
  Effect.map(decodeToEffect(Schema.parseJson(HealthSnapshotSchema), content, source), (snapshot) => ({
    status: snapshot.status,
    lastUpdated: snapshot.last_updated,
  }));

/** None when no daemon has written a snapshot yet. */
export const readHealthSnapshot = (
  path: AbsolutePath
): Effect.Effect<Option.Option<HealthRecord>, ConfigError | SystemError> =>
  pipe(
    readFileIfExists(path),
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<Option.Option<HealthRecord>, never> =>
          Effect.succeed(Option.none()),
        onSome: (content): Effect.Effect<Option.Option<HealthRecord>, ConfigError> =>
          Effect.map(decodeSnapshot(content, path), Option.some),
      })
    )
  );

// ============================================================================
// Services
// ============================================================================

export interface HealthReaderService {
  readonly get: Effect.Effect<HealthRecord>;
}

export interface HealthWriterService {
  /** Stamps the record with the current time. Snapshot write failures are logged, not raised. */
  readonly set: (status: RunHealthStatus) => Effect.Effect<HealthRecord>;
}

export interface HealthReader {
  readonly _tag: "HealthReader";
}

export interface HealthWriter {
  readonly _tag: "HealthWriter";
}

export const HealthReader: Context.Tag<HealthReader, HealthReaderService> = Context.GenericTag<
  HealthReader,
  HealthReaderService
>("db-backup/HealthReader");

export const HealthWriter: Context.Tag<HealthWriter, HealthWriterService> = Context.GenericTag<
  HealthWriter,
  HealthWriterService
>("db-backup/HealthWriter");

const mirror = (snapshotPath: Option.Option<AbsolutePath>, record: HealthRecord): Effect.Effect<void> =>
  Option.match(snapshotPath, {
    onNone: (): Effect.Effect<void> => Effect.void,
    onSome: (path): Effect.Effect<void> =>
      pipe(
        atomicWrite(path, `${encodeSnapshot(record)}\n`),
        Effect.catchAll((e) => Effect.logWarning(`Health snapshot not written: ${e.message}`))
      ),
  });

export interface HealthState {
  readonly reader: HealthReaderService;
  readonly writer: HealthWriterService;
}

export interface HealthStateOptions {
  readonly snapshotPath: Option.Option<AbsolutePath>;
  /**
   * Write the initial `starting` record to the snapshot. Only the daemon
   * announces itself; a one-off run leaves the snapshot alone until it has
   * a result.
   */
  readonly announceStartup: boolean;
}

/**
 * Starts as `starting`, stamped now. Writes go through updateAndGetEffect
 * so the snapshot on disk is updated in the same order as the record.
 */
export const makeHealthState = (options: HealthStateOptions): Effect.Effect<HealthState> =>
  Effect.gen(function* () {
    const { snapshotPath } = options;
    const initial: HealthRecord = { status: "starting", lastUpdated: yield* now };
    const ref = yield* SynchronizedRef.make(initial);
    if (options.announceStartup) {
      yield* mirror(snapshotPath, initial);
    }

    return {
      reader: { get: SynchronizedRef.get(ref) },
      writer: {
        set: (status: RunHealthStatus): Effect.Effect<HealthRecord> =>
          SynchronizedRef.updateAndGetEffect(ref, () =>
            Effect.gen(function* () {
              const record: HealthRecord = { status, lastUpdated: yield* now };
              yield* mirror(snapshotPath, record);
              return record;
            })
          ),
      },
    };
  });

export const makeHealthStateLayer = (
  announceStartup: boolean
): Layer.Layer<HealthReader | HealthWriter, never, AppSettings> =>
  Layer.effectContext(
    Effect.gen(function* () {
      const settings = yield* AppSettings;
      const state = yield* makeHealthState({
        snapshotPath: Option.some(settings.health.snapshotPath),
        announceStartup,
      });
      return pipe(
        Context.make(HealthReader, state.reader),
        Context.add(HealthWriter, state.writer)
      );
    })
  );

/** The daemon's health state: announces `starting` on construction. */
export const HealthStateLive: Layer.Layer<HealthReader | HealthWriter, never, AppSettings> =
  makeHealthStateLayer(true);
