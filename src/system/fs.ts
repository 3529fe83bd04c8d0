// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem operations as Effects over node:fs/promises.
 * Every failure surfaces as a SystemError carrying the offending path.
 */

import { createReadStream } from "node:fs";
import { mkdir, readFile as nodeReadFile, readdir, rename, stat, unlink, writeFile as nodeWriteFile } from "node:fs/promises";
import { Effect, Option } from "effect";
import { ErrorCode, SystemError, errorMessage, isErrnoException } from "../lib/errors";
import { type AbsolutePath, pathJoin, pathWithSuffix } from "../lib/types";

const readError = (message: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `${message}: ${errorMessage(e)}`,
    cause: e,
  });

const writeError = (message: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_WRITE_FAILED,
    message: `${message}: ${errorMessage(e)}`,
    cause: e,
  });

const isNotFound = (e: unknown): boolean => isErrnoException(e) && e.code === "ENOENT";

export interface FileStat {
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
}

/**
 * Stat a regular file. None when nothing is there; directories count as absent.
 */
export const statFile = (path: AbsolutePath): Effect.Effect<Option.Option<FileStat>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<FileStat>> => {
      try {
        const s = await stat(path);
        return s.isFile()
          ? Option.some({ sizeBytes: s.size, modifiedAt: s.mtime })
          : Option.none();
      } catch (e) {
        if (isNotFound(e)) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(`Failed to stat ${path}`, e),
  });

export const readFile = (path: AbsolutePath): Effect.Effect<string, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<string> => nodeReadFile(path, "utf8"),
    catch: (e): SystemError => readError(`Failed to read ${path}`, e),
  });

/** None when the file does not exist. */
export const readFileIfExists = (
  path: AbsolutePath
): Effect.Effect<Option.Option<string>, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<Option.Option<string>> => {
      try {
        return Option.some(await nodeReadFile(path, "utf8"));
      } catch (e) {
        if (isNotFound(e)) {
          return Option.none();
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(`Failed to read ${path}`, e),
  });

export const writeFile = (path: AbsolutePath, content: string): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => nodeWriteFile(path, content, "utf8"),
    catch: (e): SystemError => writeError(`Failed to write ${path}`, e),
  });

/**
 * Readers never observe a half-written file: content lands in a sibling
 * temp file first and is renamed over the target.
 */
export const atomicWrite = (path: AbsolutePath, content: string): Effect.Effect<void, SystemError> => {
  const tmp = pathWithSuffix(path, `.tmp.${process.pid}.${Math.random().toString(36).slice(2, 8)}`);
  return writeFile(tmp, content).pipe(
    Effect.zipRight(renameFile(tmp, path)),
    Effect.tapError(() => Effect.ignore(deleteFileIfExists(tmp)))
  );
};

export const ensureDirectory = (path: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<void> => {
      await mkdir(path, { recursive: true });
    },
    catch: (e): SystemError =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create directory ${path}: ${errorMessage(e)}`,
        cause: e,
      }),
  });

/** True if a file was removed, false if there was nothing to remove. */
export const deleteFileIfExists = (path: AbsolutePath): Effect.Effect<boolean, SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<boolean> => {
      try {
        await unlink(path);
        return true;
      } catch (e) {
        if (isNotFound(e)) {
          return false;
        }
        throw e;
      }
    },
    catch: (e): SystemError => writeError(`Failed to delete ${path}`, e),
  });

/**
 * Plain rename(2). Across filesystems this fails with EXDEV rather than
 * falling back to copy-and-delete, which would not be atomic.
 */
export const renameFile = (from: AbsolutePath, to: AbsolutePath): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<void> => rename(from, to),
    catch: (e): SystemError => writeError(`Failed to move ${from} to ${to}`, e),
  });

/** Regular files directly inside a directory; a missing directory yields none. */
export const listFiles = (dir: AbsolutePath): Effect.Effect<readonly AbsolutePath[], SystemError> =>
  Effect.tryPromise({
    try: async (): Promise<readonly AbsolutePath[]> => {
      try {
        const entries = await readdir(dir, { withFileTypes: true });
        return entries.filter((e) => e.isFile()).map((e) => pathJoin(dir, e.name));
      } catch (e) {
        if (isNotFound(e)) {
          return [];
        }
        throw e;
      }
    },
    catch: (e): SystemError => readError(`Failed to list ${dir}`, e),
  });

const CHUNK_SIZE = 64 * 1024;

const scanForToken = async (path: string, token: string): Promise<boolean> => {
  const stream = createReadStream(path, { encoding: "utf8", highWaterMark: CHUNK_SIZE });
  let carry = "";
  try {
    for await (const chunk of stream) {
      const text = carry + String(chunk);
      if (text.includes(token)) {
        return true;
      }
      // Keep enough of the tail to catch a token split across chunks.
      carry = token.length > 1 ? text.slice(-(token.length - 1)) : "";
    }
    return false;
  } finally {
    stream.destroy();
  }
};

/**
 * Stream the file looking for `token`, so multi-gigabyte exports are never
 * held in memory.
 */
export const fileContains = (path: AbsolutePath, token: string): Effect.Effect<boolean, SystemError> =>
  Effect.tryPromise({
    try: (): Promise<boolean> => scanForToken(path, token),
    catch: (e): SystemError => readError(`Failed to scan ${path}`, e),
  });
