// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, ParseResult, Schema } from "effect";
import { ConfigError, ErrorCode } from "./errors";

/**
 * Decode unknown data with a schema, throwing on failure.
 * Only for trusted inputs such as built-in defaults.
 */
export const decodeUnsafe = <A, I = A>(schema: Schema.Schema<A, I, never>, data: unknown): A =>
  Schema.decodeUnknownSync(schema)(data);

/**
 * Decode unknown data with a schema, returning Effect.
 * `context` names the source (a file path, an env var) in the error.
 */
export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> => {
  const result = Schema.decodeUnknownEither(schema)(data);
  return Either.match(result, {
    onLeft: (error): Effect.Effect<A, ConfigError> => {
      const formatted = ParseResult.TreeFormatter.formatErrorSync(error);
      return Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Configuration validation failed for ${context}:\n${formatted}`,
          path: context,
        })
      );
    },
    onRight: (value): Effect.Effect<A, ConfigError> => Effect.succeed(value),
  });
};
