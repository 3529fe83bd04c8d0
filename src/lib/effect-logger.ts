// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Custom logger because Effect's default lacks step progress indicators,
 * styled messages, and the one-object-per-line JSON stream the daemon emits.
 * Every record can additionally be appended as JSON to a log file, whatever
 * the console format, through a stream held open for the command's lifetime.
 */

import { createWriteStream } from "node:fs";
import { Cause, Effect, HashMap, Layer, LogLevel, Logger, Match, Option, type Scope, pipe } from "effect";
import type { LogFormat, LogLevel as BackupLogLevel } from "../config/field-values";
import { errorMessage } from "./errors";
import { formatTimestamp } from "./timing";

type LogStyleTag = "step" | "success";
type ColorName = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "white";

/** Formatting-only annotations filtered from JSON to keep logs clean for aggregation. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set([
  "logStyle",
  "stepNumber",
  "stepTotal",
  "component",
]);

const ANSI_CODES: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

export const toEffectLogLevel = (level: BackupLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

/** Extracts typed string annotation, returning None if absent or wrong type. */
const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const getStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LogStyleTag> =>
  pipe(
    getStringAnnotation(annotations, "logStyle"),
    Option.filter((v): v is LogStyleTag => v === "step" || v === "success")
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI_CODES[color]}${text}\x1b[0m` : text;

const bold = (text: string, useColor: boolean): string =>
  useColor ? `\x1b[1m${text}\x1b[0m` : text;

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const formatStepMessage = (
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string => {
  const step = pipe(
    getStringAnnotation(annotations, "stepNumber"),
    Option.getOrElse(() => "?")
  );
  const total = pipe(
    getStringAnnotation(annotations, "stepTotal"),
    Option.getOrElse(() => "?")
  );
  return `${bold(`[${step}/${total}]`, useColor)} ${colorize("cyan", "→", useColor)} ${message}`;
};

const formatStyledMessage = (
  style: LogStyleTag,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string =>
  pipe(
    Match.value(style),
    Match.when("step", () => formatStepMessage(message, annotations, useColor)),
    Match.when("success", () => `${colorize("green", "✓", useColor)} ${message}`),
    Match.exhaustive
  );

const formatCause = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string =>
  pipe(
    getStyle(annotations),
    Option.match({
      onNone: (): string => {
        const levelColor = pipe(
          Option.fromNullable(LEVEL_COLORS[logLevel.label]),
          Option.getOrElse((): ColorName => "white")
        );
        const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
        const componentStr = pipe(
          getStringAnnotation(annotations, "component"),
          Option.match({
            onNone: (): string => "",
            onSome: (s): string => `${colorize("cyan", `[${s}]`, useColor)} `,
          })
        );
        return `${levelStr} ${componentStr}${message}${formatCause(cause)}`;
      },
      onSome: (style): string => formatStyledMessage(style, message, annotations, useColor),
    })
  );

const collectExternalAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
  );

/** Records logged outside any annotated component. */
export const DEFAULT_COMPONENT = "db-backup";

/**
 * One JSON object per record. `timestamp`, `level`, `component` and `message`
 * lead; run fields such as `backup_type` or `duration_ms` follow.
 */
export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: formatTimestamp(date),
    level: logLevel.label.toLowerCase(),
    component: pipe(
      getStringAnnotation(annotations, "component"),
      Option.getOrElse(() => DEFAULT_COMPONENT)
    ),
    message,
    ...collectExternalAnnotations(annotations),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel): boolean => logLevel.label === "ERROR";

type LineSink = (line: string) => void;

/**
 * One append stream per command; the scope's close flushes it. A failing
 * stream is reported once on stderr and then dropped, so console logging
 * carries on without it.
 */
const openLogFile = (logFile: string): Effect.Effect<LineSink, never, Scope.Scope> =>
  Effect.map(
    Effect.acquireRelease(
      Effect.sync(() => {
        const stream = createWriteStream(logFile, { flags: "a" });
        let reported = false;
        stream.on("error", (e) => {
          if (!reported) {
            reported = true;
            process.stderr.write(`log file ${logFile} not writable: ${errorMessage(e)}\n`);
          }
        });
        return stream;
      }),
      (stream) =>
        Effect.async<void>((resume) => {
          stream.end(() => resume(Effect.void));
        })
    ),
    (stream): LineSink =>
      (line) => {
        if (!stream.destroyed) {
          stream.write(`${line}\n`);
        }
      }
  );

export interface BackupLoggerOptions {
  readonly level: BackupLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
  /** Every record is also appended here as a JSON line. */
  readonly logFile?: string;
}

/** Logger factory dispatching to pretty or JSON format. Routes errors to stderr, others to stdout. */
const BackupLogger = (
  format: LogFormat,
  useColor: boolean,
  fileSink: Option.Option<LineSink>
): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    const json = formatJson(logLevel, msg, annotations, date);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => json),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );

    const stream = isStderrOutput(logLevel) ? process.stderr : process.stdout;
    stream.write(`${output}\n`);

    if (Option.isSome(fileSink)) {
      fileSink.value(json);
    }
  });

const detectColor = (): boolean =>
  process.stdout.isTTY === true && process.env["NO_COLOR"] === undefined;

export const BackupLoggerLive = (options: BackupLoggerOptions): Layer.Layer<never> =>
  Layer.unwrapScoped(
    Effect.gen(function* () {
      const useColor = options.color ?? detectColor();
      const fileSink =
        options.logFile === undefined
          ? Option.none<LineSink>()
          : Option.some(yield* openLogFile(options.logFile));
      return Layer.merge(
        Logger.replace(Logger.defaultLogger, BackupLogger(options.format, useColor, fileSink)),
        Logger.minimumLogLevel(toEffectLogLevel(options.level))
      );
    })
  );
