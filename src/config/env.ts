// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; they are only yielded at the
 * application boundary (CLI). Every variable is optional: an unset variable
 * leaves the TOML value in place.
 */

import { Config, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

const ENV_PREFIX = "DB_BACKUP";

/** Log level with DB_BACKUP_ namespace. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.option(
  Config.nested(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL"), ENV_PREFIX)
);

/** Log format with DB_BACKUP_ namespace. */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.option(
  Config.nested(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT"), ENV_PREFIX)
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  ENV_PREFIX
);

/** Explicit config file path; same effect as `--config`. */
export const ConfigPathConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("CONFIG"), ENV_PREFIX)
);

export const BackupDirConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("BACKUP_DIR"), ENV_PREFIX)
);

export const SecretsDirConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("SECRETS_DIR"), ENV_PREFIX)
);

export const LogDirConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("LOG_DIR"), ENV_PREFIX)
);

/** Unprefixed; the container image has always been configured through these two names. */
export const EndpointConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.string("SURREALDB_ENDPOINT")
);

export const HealthPortConfig: Config.Config<Option.Option<number>> = Config.option(
  Config.integer("HEALTH_CHECK_PORT")
);

export interface EnvOverrides {
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly debug: boolean;
  readonly configPath: Option.Option<string>;
  readonly backupDir: Option.Option<string>;
  readonly secretsDir: Option.Option<string>;
  readonly logDir: Option.Option<string>;
  readonly endpoint: Option.Option<string>;
  readonly healthPort: Option.Option<number>;
}

export const EnvOverridesConfig: Config.Config<EnvOverrides> = Config.all({
  logLevel: LogLevelOptionConfig,
  logFormat: LogFormatOptionConfig,
  debug: DebugModeConfig,
  configPath: ConfigPathConfig,
  backupDir: BackupDirConfig,
  secretsDir: SecretsDirConfig,
  logDir: LogDirConfig,
  endpoint: EndpointConfig,
  healthPort: HealthPortConfig,
});
