// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded path type. Slot, scratch and secret locations are all absolute;
 * the brand keeps relative strings from config or CLI input out of them.
 */

import { type Brand, Effect, ParseResult, Schema } from "effect";

import { ConfigError, ErrorCode } from "./errors";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const isAbsolutePath: (u: unknown) => u is AbsolutePath = Schema.is(AbsolutePathSchema);

export const decodeAbsolutePath = (value: string): Effect.Effect<AbsolutePath, ConfigError> =>
  Schema.decode(AbsolutePathSchema)(value).pipe(
    Effect.mapError(
      (error) =>
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path "${value}": ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
        })
    )
  );

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic paths, use `decodeAbsolutePath` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

const collapseSlashes = (s: string): string => s.replace(/\/{2,}/g, "/");

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : collapseSlashes([base, ...segments].join("/"));
}

/** Append a suffix (e.g. `".gz"`), preserving `AbsolutePath` brand. */
export function pathWithSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithSuffix(base: string, suffix: string): string;
export function pathWithSuffix(base: string, suffix: string): string {
  return `${base}${suffix}`;
}
