// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Layer wiring for the backup services. Each command builds only what it
 * uses: restore never constructs health state, so it cannot disturb the
 * daemon's snapshot.
 */

import { FetchHttpClient, type Terminal } from "@effect/platform";
import { Layer } from "effect";
import { type AppSettings, AppSettingsLive, type Settings } from "../config/settings";
import { type Confirmation, ConfirmationLive } from "./confirmation";
import { type CredentialSource, CredentialSourceLive } from "./credentials";
import { type ExportClient, ExportClientLive } from "./export-client";
import { type HealthReader, type HealthWriter, makeHealthStateLayer } from "./health-state";
import { type BackupPipeline, BackupPipelineLive } from "./pipeline";
import { type RestoreWorkflow, RestoreWorkflowLive } from "./restore";
import { type RetentionStore, RetentionStoreLive } from "./retention";
import { type ArtifactValidator, ArtifactValidatorLive } from "./validator";

export type CoreServices =
  | AppSettings
  | CredentialSource
  | ExportClient
  | ArtifactValidator
  | RetentionStore;

export const CoreLive = (settings: Settings): Layer.Layer<CoreServices> =>
  Layer.mergeAll(
    CredentialSourceLive,
    ExportClientLive.pipe(Layer.provide(FetchHttpClient.layer)),
    ArtifactValidatorLive,
    RetentionStoreLive
  ).pipe(Layer.provideMerge(AppSettingsLive(settings)));

export type BackupServices = CoreServices | HealthReader | HealthWriter | BackupPipeline;

/** `announceStartup` is for the daemon only; see makeHealthState. */
export const BackupLive = (
  settings: Settings,
  announceStartup: boolean
): Layer.Layer<BackupServices> =>
  BackupPipelineLive.pipe(
    Layer.provideMerge(makeHealthStateLayer(announceStartup)),
    Layer.provideMerge(CoreLive(settings))
  );

export type RestoreServices = CoreServices | Confirmation | RestoreWorkflow;

export const RestoreLive = (
  settings: Settings
): Layer.Layer<RestoreServices, never, Terminal.Terminal> =>
  RestoreWorkflowLive.pipe(
    Layer.provideMerge(ConfirmationLive),
    Layer.provideMerge(CoreLive(settings))
  );
