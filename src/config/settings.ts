// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Runtime settings: the TOML config with environment and CLI overrides
 * applied, every path resolved, and policies grouped the way the services
 * consume them. Services read settings through the AppSettings tag.
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import { HEALTH_SNAPSHOT_FILE, LOG_FILE, TEMP_DIR_NAME, toAbsolutePathEffect } from "../lib/paths";
import type { PollingPolicy, RetryPolicy } from "../lib/retry";
import { type AbsolutePath, pathJoin } from "../lib/types";
import type { EnvOverrides } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import type { GlobalConfig } from "./schema";

export interface Settings {
  readonly database: {
    readonly endpoint: string;
    readonly cliPath: string;
    readonly probe: RetryPolicy;
    readonly probeTimeoutMs: number;
    readonly exportTimeoutMs: number;
    readonly importTimeoutMs: number;
  };
  readonly secrets: {
    readonly dir: AbsolutePath;
    readonly polling: PollingPolicy;
  };
  readonly storage: {
    readonly backupDir: AbsolutePath;
    readonly tempDir: AbsolutePath;
    readonly extension: string;
    readonly exportMarker: string;
  };
  readonly schedule: {
    readonly nightly: string;
    readonly weekly: string;
  };
  readonly health: {
    readonly port: number;
    readonly stalenessThresholdMs: number;
    readonly snapshotPath: AbsolutePath;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
    readonly dir: AbsolutePath;
    readonly file: AbsolutePath;
  };
  readonly restore: {
    readonly confirmPhrase: string;
  };
}

export interface AppSettings {
  readonly _tag: "AppSettings";
}

export const AppSettings: Context.Tag<AppSettings, Settings> = Context.GenericTag<
  AppSettings,
  Settings
>("db-backup/AppSettings");

export const AppSettingsLive = (settings: Settings): Layer.Layer<AppSettings> =>
  Layer.succeed(AppSettings, settings);

// ============================================================================
// Resolution
// ============================================================================

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

/** Priority: CLI args > env vars > TOML config. */
export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

export interface CliOverrides {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
}

export const NO_CLI_OVERRIDES: CliOverrides = {
  verbose: false,
  logLevel: Option.none(),
  format: Option.none(),
};

/** `--verbose` or DB_BACKUP_DEBUG force debug regardless of other sources. */
export const resolveLogLevel = (
  config: GlobalConfig,
  env: EnvOverrides,
  cli: CliOverrides
): LogLevel =>
  cli.verbose || env.debug
    ? "debug"
    : resolve({ cli: cli.logLevel, env: env.logLevel, toml: config.logging.level });

const envPath = (value: Option.Option<string>): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
  Option.match(value, {
    onNone: (): Effect.Effect<Option.Option<AbsolutePath>, never> => Effect.succeed(Option.none()),
    onSome: (p): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
      Effect.map(toAbsolutePathEffect(p), Option.some),
  });

export const buildSettings = (
  config: GlobalConfig,
  env: EnvOverrides,
  cli: CliOverrides
): Effect.Effect<Settings, ConfigError> =>
  Effect.gen(function* () {
    const backupDir = resolve({
      cli: Option.none(),
      env: yield* envPath(env.backupDir),
      toml: config.storage.backupDir,
    });
    const secretsDir = resolve({
      cli: Option.none(),
      env: yield* envPath(env.secretsDir),
      toml: config.secrets.dir,
    });
    const logDir = resolve({
      cli: Option.none(),
      env: yield* envPath(env.logDir),
      toml: config.logging.dir,
    });

    return {
      database: {
        endpoint: resolve({ cli: Option.none(), env: env.endpoint, toml: config.database.endpoint }),
        cliPath: config.database.cliPath,
        probe: { attempts: config.database.probeAttempts, delayMs: config.database.probeDelayMs },
        probeTimeoutMs: config.database.probeTimeoutMs,
        exportTimeoutMs: config.database.exportTimeoutMs,
        importTimeoutMs: config.database.importTimeoutMs,
      },
      secrets: {
        dir: secretsDir,
        polling: { maxWaitMs: config.secrets.maxWaitMs, intervalMs: config.secrets.intervalMs },
      },
      storage: {
        backupDir,
        tempDir: config.storage.tempDir ?? pathJoin(backupDir, TEMP_DIR_NAME),
        extension: config.storage.extension,
        exportMarker: config.storage.exportMarker,
      },
      schedule: { nightly: config.schedule.nightly, weekly: config.schedule.weekly },
      health: {
        port: resolve({ cli: Option.none(), env: env.healthPort, toml: config.health.port }),
        stalenessThresholdMs: config.health.stalenessThresholdMs,
        snapshotPath: pathJoin(logDir, HEALTH_SNAPSHOT_FILE),
      },
      logging: {
        level: resolveLogLevel(config, env, cli),
        format: resolve({ cli: cli.format, env: env.logFormat, toml: config.logging.format }),
        dir: logDir,
        file: pathJoin(logDir, LOG_FILE),
      },
      restore: { confirmPhrase: config.restore.confirmPhrase },
    };
  });
