// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Streaming gzip over node:zlib. Exports can be larger than memory, so
 * nothing here buffers a whole file.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import { Effect } from "effect";
import { ErrorCode, SystemError, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

/** 0 = no compression, 9 = maximum. Default 6 balances speed and ratio. */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface GzipOptions {
  level?: CompressionLevel;
}

const compressError = (message: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `${message}: ${errorMessage(e)}`,
    cause: e,
  });

export const gzipFile = (
  source: AbsolutePath,
  destination: AbsolutePath,
  options: GzipOptions = {}
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> =>
      pipeline(
        createReadStream(source),
        createGzip({ level: options.level ?? 6 }),
        createWriteStream(destination)
      ),
    catch: (e): SystemError => compressError(`Failed to compress ${source}`, e),
  });

export const gunzipFile = (
  source: AbsolutePath,
  destination: AbsolutePath
): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> =>
      pipeline(createReadStream(source), createGunzip(), createWriteStream(destination)),
    catch: (e): SystemError => compressError(`Failed to decompress ${source}`, e),
  });

const discard = (): Writable =>
  new Writable({
    write(_chunk, _encoding, callback): void {
      callback();
    },
  });

/**
 * Decompress to nowhere, the equivalent of `gzip -t`: header, deflate
 * stream and CRC trailer must all check out.
 */
export const testGzipFile = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => pipeline(createReadStream(path), createGunzip(), discard()),
    catch: (e): SystemError => compressError(`Integrity check failed for ${path}`, e),
  });
