// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger installation and error display so each command only builds the
 * layers it needs and calls into them.
 */

import { type CliApp, Command, type ValidationError } from "@effect/cli";
import type { HttpServerError } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import { BackupLive, CoreLive, RestoreLive } from "../backup";
import { EnvOverridesConfig } from "../config/env";
import type { LogFormat } from "../config/field-values";
import { loadGlobalConfig } from "../config/loader";
import { type Settings, buildSettings } from "../config/settings";
import { BackupLoggerLive } from "../lib/effect-logger";
import { type AppError, ConfigError, ErrorCode, type SystemError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { DB_BACKUP_VERSION } from "../lib/version";
import { ensureDirectory } from "../system/fs";

import { executeBackup } from "./commands/backup";
import { executeDaemon } from "./commands/daemon";
import { executeRestore } from "./commands/restore";
import { executeStatus } from "./commands/status";

import {
  type GlobalOptions,
  effectiveFormat,
  forceFlag,
  globalOptions,
  kindArg,
  verifyFlag,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > config file (priority order). */
interface CommandContext {
  readonly settings: Settings;
  /** Format for command output and error display. */
  readonly format: LogFormat;
  /** None when the log directory cannot be created; logging then goes to stdout only. */
  readonly logFile: Option.Option<AbsolutePath>;
}

// Context resolution

const prepareLogFile = (logging: Settings["logging"]): Effect.Effect<Option.Option<AbsolutePath>> =>
  pipe(
    ensureDirectory(logging.dir),
    Effect.as(Option.some(logging.file)),
    Effect.catchAll((e) =>
      Effect.sync((): Option.Option<AbsolutePath> => {
        process.stderr.write(`Log directory unavailable, not writing ${logging.file}: ${e.message}\n`);
        return Option.none();
      })
    )
  );

/** Resolves configuration from CLI, environment, and config file with CLI taking precedence. */
const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const env = yield* pipe(
      EnvOverridesConfig,
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Invalid environment: ${String(e)}`,
            cause: e,
          })
      )
    );
    const configPath = pipe(
      globals.config,
      Option.orElse(() => env.configPath)
    );
    const globalConfig = yield* loadGlobalConfig(configPath);

    const settings = yield* buildSettings(globalConfig, env, {
      verbose: globals.verbose,
      logLevel: globals.logLevel,
      format: effectiveFormat(globals),
    });
    const logFile = yield* prepareLogFile(settings.logging);

    return { settings, format: settings.logging.format, logFile };
  });

// Error display

/** Type guard for error display routing. Application errors have exit codes; anything else is left to the runtime. */
const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

const useColor = (): boolean =>
  process.stderr.isTTY === true && process.env["NO_COLOR"] === undefined;

/** Sync because called in exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
    ),
    Match.when("pretty", () => {
      const prefix = useColor() ? "\x1b[31m✗\x1b[0m" : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** Before settings exist, only the CLI can say how errors should look. */
const fallbackFormat = (globals: GlobalOptions): LogFormat =>
  pipe(
    effectiveFormat(globals),
    Option.getOrElse((): LogFormat => "pretty")
  );

const runCommand = <E, R>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, E, R>
): Effect.Effect<void, E | ConfigError | SystemError, R> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => Effect.sync(() => displayError(err, fallbackFormat(globals))))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(
        BackupLoggerLive({
          level: ctx.settings.logging.level,
          format: ctx.settings.logging.format,
          logFile: Option.getOrUndefined(ctx.logFile),
        })
      )
    );
  });

// Commands

const daemonCmd = Command.make("daemon", { ...globalOptions }, (args) =>
  runCommand(args, "daemon", (ctx) =>
    pipe(executeDaemon, Effect.provide(BackupLive(ctx.settings, true)))
  )
).pipe(Command.withDescription("Serve /health and run scheduled backups until interrupted"));

const backupCmd = Command.make("backup", { ...globalOptions, kind: kindArg }, (args) =>
  runCommand(args, "backup", (ctx) =>
    pipe(executeBackup(args.kind), Effect.provide(BackupLive(ctx.settings, false)))
  )
).pipe(Command.withDescription("Run one backup into the nightly or weekly slot"));

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, kind: kindArg, force: forceFlag, verify: verifyFlag },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      pipe(
        executeRestore({ kind: args.kind, force: args.force, verifyOnly: args.verify }),
        Effect.provide(RestoreLive(ctx.settings))
      )
    )
).pipe(Command.withDescription("Restore the database from a slot, or verify the slot"));

const statusCmd = Command.make("status", { ...globalOptions }, (args) =>
  runCommand(args, "status", (ctx) =>
    pipe(
      executeStatus(ctx.format),
      Effect.provide(CoreLive(ctx.settings))
    )
  )
).pipe(Command.withDescription("Show the health record and slot files"));

// Root command

const root = Command.make("db-backup").pipe(
  Command.withDescription("Rolling backup and restore daemon for SurrealDB"),
  Command.withSubcommands([daemonCmd, backupCmd, restoreCmd, statusCmd])
);

export type CliError = AppError | HttpServerError.ServeError | ValidationError.ValidationError;

export const cli: (args: readonly string[]) => Effect.Effect<void, CliError, CliApp.CliApp.Environment> =
  Command.run(root, {
    name: "db-backup",
    version: DB_BACKUP_VERSION,
  });
