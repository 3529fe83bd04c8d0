// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so every command spells and
 * describes them the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import type { BackupKind, LogFormat, LogLevel } from "../config/field-values";
import { BACKUP_KIND_VALUES, LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const kindArg: A.Args<BackupKind> = A.choice(
  BACKUP_KIND_VALUES.map((kind): [string, BackupKind] => [kind, kind]),
  { name: "kind" }
).pipe(A.withDescription("Backup slot: nightly or weekly"));

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
  readonly config: O.Options<Option.Option<string>>;
} = {
  // No short alias: -v belongs to restore --verify.
  verbose: O.boolean("verbose").pipe(O.withDescription("Verbose output (debug logging)")),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Log output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to the TOML configuration file"),
    O.optional
  ),
};

// Per-command options

export const forceFlag: O.Options<boolean> = O.boolean("force").pipe(
  O.withAlias("f"),
  O.withDescription("Skip the confirmation prompt")
);

export const verifyFlag: O.Options<boolean> = O.boolean("verify").pipe(
  O.withAlias("v"),
  O.withDescription("Only verify the backup; do not touch the database")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
