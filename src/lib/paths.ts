// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized path constants prevent typos and enable global refactoring.
 * All system paths are branded AbsolutePath types for compile-time safety.
 */

import { resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { type AbsolutePath, decodeAbsolutePath, path } from "./types";

export const DEFAULT_PATHS: {
  readonly secretsDir: AbsolutePath;
  readonly backupDir: AbsolutePath;
  readonly logDir: AbsolutePath;
  readonly configFiles: readonly string[];
} = {
  secretsDir: path("/keyvault/surrealdb"),
  backupDir: path("/backups"),
  logDir: path("/logs/db-backup"),
  configFiles: ["/etc/db-backup/db-backup.toml", "./db-backup.toml"],
};

/** Scratch lives under the backup root so the commit rename never crosses filesystems. */
export const TEMP_DIR_NAME = "temp";

export const HEALTH_SNAPSHOT_FILE = "health.json";
export const LOG_FILE = "backup.log";

const hasNullByte = (p: string): boolean => p.includes("\x00");

/** Use for all user-provided or config-file paths; relative ones resolve against cwd. */
export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : decodeAbsolutePath(resolve(process.cwd(), p));
