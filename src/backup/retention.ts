// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Rolling retention: one slot file per backup kind, replaced wholesale by
 * rename. Readers of a slot see either the previous artifact or the new
 * one, never a partial file.
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import type { BackupKind } from "../config/field-values";
import { AppSettings, type Settings } from "../config/settings";
import { CommitFailed, type SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { deleteFileIfExists, ensureDirectory, listFiles, renameFile, statFile } from "../system/fs";

export interface SlotStat {
  readonly exists: boolean;
  readonly sizeBytes: number;
}

export const slotFileName = (kind: BackupKind, extension: string): string =>
  `${kind}_backup.${extension}.gz`;

export interface RetentionStoreService {
  readonly path: (kind: BackupKind) => AbsolutePath;
  readonly stat: (kind: BackupKind) => Effect.Effect<SlotStat, SystemError>;
  /** Atomically replace the slot with `artifact`; the artifact path no longer exists afterwards. */
  readonly commit: (kind: BackupKind, artifact: AbsolutePath) => Effect.Effect<AbsolutePath, CommitFailed>;
  /** A path in the scratch area; callers own cleanup. */
  readonly scratchPath: (name: string) => AbsolutePath;
  /** Create the backup and scratch directories if missing. */
  readonly ensureDirectories: Effect.Effect<void, SystemError>;
  /**
   * ensureDirectories, then clear scratch left by crashed runs. Daemon
   * start-up only: a one-off run would delete files of runs in flight.
   */
  readonly ensureLayout: Effect.Effect<number, SystemError>;
}

export interface RetentionStore {
  readonly _tag: "RetentionStore";
}

export const RetentionStore: Context.Tag<RetentionStore, RetentionStoreService> =
  Context.GenericTag<RetentionStore, RetentionStoreService>("db-backup/RetentionStore");

export const makeRetentionStore = (storage: Settings["storage"]): RetentionStoreService => {
  const slotPath = (kind: BackupKind): AbsolutePath =>
    pathJoin(storage.backupDir, slotFileName(kind, storage.extension));

  const ensureDirectories = Effect.zipRight(
    ensureDirectory(storage.backupDir),
    ensureDirectory(storage.tempDir)
  );

  return {
    path: slotPath,

    stat: (kind) =>
      pipe(
        statFile(slotPath(kind)),
        Effect.map(
          Option.match({
            onNone: (): SlotStat => ({ exists: false, sizeBytes: 0 }),
            onSome: (s): SlotStat => ({ exists: true, sizeBytes: s.sizeBytes }),
          })
        )
      ),

    commit: (kind, artifact) =>
      pipe(
        renameFile(artifact, slotPath(kind)),
        Effect.as(slotPath(kind)),
        Effect.mapError(
          (e) =>
            new CommitFailed({
              message: `Failed to move backup to final location: ${e.message}`,
              cause: e,
            })
        )
      ),

    scratchPath: (name) => pathJoin(storage.tempDir, name),

    ensureDirectories,

    ensureLayout: Effect.gen(function* () {
      yield* ensureDirectories;
      // storage.tempDir may be configured as the backup directory itself.
      const slots = new Set<string>([slotPath("nightly"), slotPath("weekly")]);
      const leftovers = (yield* listFiles(storage.tempDir)).filter((file) => !slots.has(file));
      yield* Effect.forEach(leftovers, (file) =>
        Effect.zipRight(
          deleteFileIfExists(file),
          Effect.logInfo(`Removed leftover scratch file ${file}`)
        )
      );
      return leftovers.length;
    }),
  };
};

export const RetentionStoreLive: Layer.Layer<RetentionStore, never, AppSettings> = Layer.effect(
  RetentionStore,
  Effect.map(AppSettings, (settings) => makeRetentionStore(settings.storage))
);
