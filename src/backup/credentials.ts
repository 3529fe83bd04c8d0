// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Database credentials read from a mounted secret directory, one file per
 * value. The vault sidecar may still be populating the directory when a run
 * starts, so loading polls until every file is present or the wait expires.
 */

import { Context, Data, Effect, Layer, Option, pipe } from "effect";
import { AppSettings } from "../config/settings";
import { CredentialsUnavailable, type SystemError } from "../lib/errors";
import { type PollingPolicy, pollingSchedule } from "../lib/retry";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { readFileIfExists } from "../system/fs";

export const SECRET_NAMES = ["username", "password", "namespace", "database"] as const;
export type SecretName = (typeof SECRET_NAMES)[number];

export type CredentialBundle = { readonly [K in SecretName]: string };

class SecretsPending extends Data.TaggedError("SecretsPending")<{
  readonly missing: readonly SecretName[];
}> {}

/** Strips the trailing newline most secret writers append. Empty means not yet written. */
const readSecret = (
  dir: AbsolutePath,
  name: SecretName
): Effect.Effect<Option.Option<string>, SystemError> =>
  pipe(
    readFileIfExists(pathJoin(dir, name)),
    Effect.map(Option.map((raw) => raw.replace(/[\r\n]+$/, ""))),
    Effect.map(Option.filter((value) => value.length > 0))
  );

/** A single pass over the directory: the full bundle or the names still missing. */
export const readSecretDirectory = (
  dir: AbsolutePath
): Effect.Effect<CredentialBundle, SecretsPending | SystemError> =>
  Effect.gen(function* () {
    const values = yield* Effect.all({
      username: readSecret(dir, "username"),
      password: readSecret(dir, "password"),
      namespace: readSecret(dir, "namespace"),
      database: readSecret(dir, "database"),
    });

    return yield* Option.match(Option.all(values), {
      onNone: (): Effect.Effect<CredentialBundle, SecretsPending> =>
        Effect.fail(
          new SecretsPending({
            missing: SECRET_NAMES.filter((name) => Option.isNone(values[name])),
          })
        ),
      onSome: (bundle): Effect.Effect<CredentialBundle, never> => Effect.succeed(bundle),
    });
  });

/**
 * Poll until all four secrets exist. Never yields a partial bundle.
 */
export const loadCredentials = (
  dir: AbsolutePath,
  policy: PollingPolicy
): Effect.Effect<CredentialBundle, CredentialsUnavailable> =>
  pipe(
    readSecretDirectory(dir),
    Effect.tapError((e) =>
      e._tag === "SecretsPending"
        ? Effect.logDebug(`Waiting for credentials in ${dir} (missing: ${e.missing.join(", ")})`)
        : Effect.void
    ),
    Effect.retry({
      schedule: pollingSchedule(policy.maxWaitMs, policy.intervalMs),
      while: (e) => e._tag === "SecretsPending",
    }),
    Effect.mapError((e) =>
      e._tag === "SecretsPending"
        ? new CredentialsUnavailable({
            message: `Timeout waiting for credentials in ${dir} (missing: ${e.missing.join(", ")})`,
            missing: e.missing,
          })
        : new CredentialsUnavailable({
            message: `Cannot read credentials in ${dir}: ${e.message}`,
            missing: [],
          })
    )
  );

// ============================================================================
// Service
// ============================================================================

export interface CredentialSourceService {
  /** Re-read on every call so rotated secrets apply without a restart. */
  readonly load: Effect.Effect<CredentialBundle, CredentialsUnavailable>;
}

export interface CredentialSource {
  readonly _tag: "CredentialSource";
}

export const CredentialSource: Context.Tag<CredentialSource, CredentialSourceService> =
  Context.GenericTag<CredentialSource, CredentialSourceService>("db-backup/CredentialSource");

export const CredentialSourceLive: Layer.Layer<CredentialSource, never, AppSettings> = Layer.effect(
  CredentialSource,
  Effect.map(AppSettings, (settings) => ({
    load: loadCredentials(settings.secrets.dir, settings.secrets.polling),
  }))
);
