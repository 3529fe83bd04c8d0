// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Talks to the database: an HTTP health probe, plus export and import
 * through the database's own CLI so dumps stay in its native format.
 */

import { HttpClient } from "@effect/platform";
import { Context, Duration, Effect, Layer, Option, pipe } from "effect";
import { AppSettings, type Settings } from "../config/settings";
import { DatabaseUnreachable, ExportFailed, ImportFailed, errorMessage } from "../lib/errors";
import { fixedRetrySchedule } from "../lib/retry";
import type { AbsolutePath } from "../lib/types";
import { execSuccess } from "../system/exec";
import { statFile } from "../system/fs";
import type { CredentialBundle } from "./credentials";

export type TransferDirection = "export" | "import";

/**
 * Argument vector for `surreal export|import`. The file comes last, as
 * both subcommands expect.
 */
export const buildTransferArgs = (
  cliPath: string,
  direction: TransferDirection,
  endpoint: string,
  credentials: CredentialBundle,
  file: AbsolutePath
): readonly string[] => [
  cliPath,
  direction,
  "--endpoint",
  endpoint,
  "--username",
  credentials.username,
  "--password",
  credentials.password,
  "--namespace",
  credentials.namespace,
  "--database",
  credentials.database,
  file,
];

export const healthUrl = (endpoint: string): string => `${endpoint.replace(/\/+$/, "")}/health`;

// ============================================================================
// Service
// ============================================================================

export interface ExportClientService {
  /** 2xx from `<endpoint>/health` within the retry budget. */
  readonly probe: Effect.Effect<void, DatabaseUnreachable>;
  readonly exportTo: (
    credentials: CredentialBundle,
    destination: AbsolutePath
  ) => Effect.Effect<void, ExportFailed>;
  readonly importFrom: (
    credentials: CredentialBundle,
    source: AbsolutePath
  ) => Effect.Effect<void, ImportFailed>;
}

export interface ExportClient {
  readonly _tag: "ExportClient";
}

export const ExportClient: Context.Tag<ExportClient, ExportClientService> = Context.GenericTag<
  ExportClient,
  ExportClientService
>("db-backup/ExportClient");

const makeProbe = (
  client: HttpClient.HttpClient,
  database: Settings["database"]
): Effect.Effect<void, DatabaseUnreachable> => {
  const url = healthUrl(database.endpoint);
  const okClient = HttpClient.filterStatusOk(client);

  return pipe(
    okClient.get(url),
    Effect.scoped,
    Effect.timeout(Duration.millis(database.probeTimeoutMs)),
    Effect.tapError((e) => Effect.logWarning(`Database probe failed: ${errorMessage(e)}`)),
    Effect.retry(fixedRetrySchedule(database.probe)),
    Effect.asVoid,
    Effect.mapError(
      (e) =>
        new DatabaseUnreachable({
          message: `Database not reachable at ${url} after ${database.probe.attempts} attempts: ${errorMessage(e)}`,
          endpoint: database.endpoint,
          attempts: database.probe.attempts,
        })
    )
  );
};

const makeExport =
  (database: Settings["database"]) =>
  (credentials: CredentialBundle, destination: AbsolutePath): Effect.Effect<void, ExportFailed> =>
    pipe(
      execSuccess(
        buildTransferArgs(database.cliPath, "export", database.endpoint, credentials, destination),
        { timeout: database.exportTimeoutMs, redact: [credentials.password] }
      ),
      Effect.zipRight(statFile(destination)),
      Effect.mapError((e) => new ExportFailed({ message: e.message, cause: e })),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<void, ExportFailed> =>
            Effect.fail(
              new ExportFailed({
                message: `Export exited cleanly but produced no file at ${destination}`,
              })
            ),
          onSome: (): Effect.Effect<void, never> => Effect.void,
        })
      )
    );

const makeImport =
  (database: Settings["database"]) =>
  (credentials: CredentialBundle, source: AbsolutePath): Effect.Effect<void, ImportFailed> =>
    pipe(
      execSuccess(
        buildTransferArgs(database.cliPath, "import", database.endpoint, credentials, source),
        { timeout: database.importTimeoutMs, redact: [credentials.password] }
      ),
      Effect.mapError((e) => new ImportFailed({ message: e.message, cause: e })),
      Effect.asVoid
    );

export const makeExportClient = (
  client: HttpClient.HttpClient,
  database: Settings["database"]
): ExportClientService => ({
  probe: makeProbe(client, database),
  exportTo: makeExport(database),
  importFrom: makeImport(database),
});

export const ExportClientLive: Layer.Layer<ExportClient, never, AppSettings | HttpClient.HttpClient> =
  Layer.effect(
    ExportClient,
    Effect.gen(function* () {
      const settings = yield* AppSettings;
      const client = yield* HttpClient.HttpClient;
      return makeExportClient(client, settings.database);
    })
  );
