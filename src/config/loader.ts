// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are parsed
 * and validated in a single pass; syntax errors and schema violations are
 * reported with file path context. Without an explicit path the default
 * locations are searched and built-in defaults apply when none exists, but
 * an explicit path fails on any error to catch typos.
 */

import { Effect, Option, type Schema, pipe } from "effect";
import { parse } from "smol-toml";
import { ConfigError, ErrorCode, type SystemError, errorMessage } from "../lib/errors";
import { DEFAULT_PATHS, toAbsolutePathEffect } from "../lib/paths";
import { decodeToEffect, decodeUnsafe } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { readFileIfExists } from "../system/fs";
import { type GlobalConfig, globalConfigSchema } from "./schema";

export const parseToml = (content: string, source: string): Effect.Effect<unknown, ConfigError> =>
  Effect.try({
    try: (): unknown => parse(content),
    catch: (e): ConfigError =>
      new ConfigError({
        code: ErrorCode.CONFIG_PARSE_ERROR,
        message: `Failed to parse TOML in ${source}: ${errorMessage(e)}`,
        path: source,
        cause: e,
      }),
  });

export const loadTomlFile = <A, I = A>(
  filePath: AbsolutePath,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const content = yield* pipe(
      readFileIfExists(filePath),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<string, ConfigError> =>
            Effect.fail(
              new ConfigError({
                code: ErrorCode.CONFIG_NOT_FOUND,
                message: `Configuration file not found: ${filePath}`,
                path: filePath,
              })
            ),
          onSome: (text): Effect.Effect<string, never> => Effect.succeed(text),
        })
      )
    );

    const parsed = yield* parseToml(content, filePath);
    return yield* decodeToEffect(schema, parsed, filePath);
  });

export const defaultGlobalConfig = (): GlobalConfig => decodeUnsafe(globalConfigSchema, {});

/** Resolve and read the first search path that exists; None when none does. */
const findFirstExisting = (
  searchPaths: readonly string[]
): Effect.Effect<Option.Option<readonly [AbsolutePath, string]>, ConfigError | SystemError> =>
  Effect.gen(function* () {
    for (const candidate of searchPaths) {
      const absPath = yield* toAbsolutePathEffect(candidate);
      const content = yield* readFileIfExists(absPath);
      if (Option.isSome(content)) {
        return Option.some([absPath, content.value] as const);
      }
    }
    return Option.none();
  });

/**
 * Explicit path: must exist and be valid. Otherwise the first default path
 * that exists wins; a default file that exists but is invalid still fails.
 */
export const loadGlobalConfig = (
  configPath: Option.Option<string>,
  searchPaths: readonly string[] = DEFAULT_PATHS.configFiles
): Effect.Effect<GlobalConfig, ConfigError | SystemError> =>
  Option.match(configPath, {
    onSome: (p): Effect.Effect<GlobalConfig, ConfigError | SystemError> =>
      Effect.flatMap(toAbsolutePathEffect(p), (abs) => loadTomlFile(abs, globalConfigSchema)),
    onNone: (): Effect.Effect<GlobalConfig, ConfigError | SystemError> =>
      pipe(
        findFirstExisting(searchPaths),
        Effect.flatMap(
          Option.match({
            onNone: (): Effect.Effect<GlobalConfig, never> => Effect.succeed(defaultGlobalConfig()),
            onSome: ([absPath, content]): Effect.Effect<GlobalConfig, ConfigError> =>
              Effect.flatMap(parseToml(content, absPath), (parsed) =>
                decodeToEffect(globalConfigSchema, parsed, absPath)
              ),
          })
        )
      ),
  });
