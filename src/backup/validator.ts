// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Artifact checks shared by the backup pipeline and restore.
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import { AppSettings } from "../config/settings";
import { CorruptArchive, EmptyArtifact, MalformedArtifact } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { testGzipFile } from "../system/compress";
import { fileContains, statFile } from "../system/fs";

export interface ArtifactValidatorService {
  /** Resolves to the export's size in bytes. */
  readonly validateExport: (
    path: AbsolutePath
  ) => Effect.Effect<number, EmptyArtifact | MalformedArtifact>;
  /** Resolves to the archive's size in bytes. */
  readonly validateCompressed: (path: AbsolutePath) => Effect.Effect<number, CorruptArchive>;
}

export interface ArtifactValidator {
  readonly _tag: "ArtifactValidator";
}

export const ArtifactValidator: Context.Tag<ArtifactValidator, ArtifactValidatorService> =
  Context.GenericTag<ArtifactValidator, ArtifactValidatorService>("db-backup/ArtifactValidator");

/**
 * Missing or zero bytes is EmptyArtifact; a file without the marker token
 * is MalformedArtifact. An unreadable file counts as empty.
 */
export const validateExport = (
  path: AbsolutePath,
  marker: string
): Effect.Effect<number, EmptyArtifact | MalformedArtifact> =>
  Effect.gen(function* () {
    const empty = (detail: string): EmptyArtifact =>
      new EmptyArtifact({ message: `Export file ${detail}: ${path}`, path });

    const size = yield* pipe(
      statFile(path),
      Effect.mapError((e) => empty(`is unreadable (${e.message})`)),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<number, EmptyArtifact> => Effect.fail(empty("not found")),
          onSome: (s): Effect.Effect<number, never> => Effect.succeed(s.sizeBytes),
        })
      ),
      Effect.filterOrFail(
        (bytes) => bytes > 0,
        () => empty("is empty")
      )
    );

    const hasMarker = yield* pipe(
      fileContains(path, marker),
      Effect.mapError((e) => empty(`is unreadable (${e.message})`))
    );

    if (!hasMarker) {
      return yield* Effect.fail(
        new MalformedArtifact({
          message: `Export file does not contain "${marker}": ${path}`,
          path,
        })
      );
    }
    return size;
  });

/**
 * Missing, empty or failing the gzip integrity check (header, deflate
 * stream, CRC32 and length trailer) is CorruptArchive.
 */
export const validateCompressed = (path: AbsolutePath): Effect.Effect<number, CorruptArchive> =>
  Effect.gen(function* () {
    const corrupt = (detail: string, cause?: unknown): CorruptArchive =>
      new CorruptArchive({ message: `Archive ${detail}: ${path}`, path, cause });

    const size = yield* pipe(
      statFile(path),
      Effect.mapError((e) => corrupt("is unreadable", e)),
      Effect.flatMap(
        Option.match({
          onNone: (): Effect.Effect<number, CorruptArchive> => Effect.fail(corrupt("not found")),
          onSome: (s): Effect.Effect<number, never> => Effect.succeed(s.sizeBytes),
        })
      ),
      Effect.filterOrFail(
        (bytes) => bytes > 0,
        () => corrupt("is empty")
      )
    );

    yield* pipe(
      testGzipFile(path),
      Effect.mapError((e) => corrupt("failed integrity check", e))
    );
    return size;
  });

export const ArtifactValidatorLive: Layer.Layer<ArtifactValidator, never, AppSettings> =
  Layer.effect(
    ArtifactValidator,
    Effect.map(AppSettings, (settings) => ({
      validateExport: (path: AbsolutePath): Effect.Effect<number, EmptyArtifact | MalformedArtifact> =>
        validateExport(path, settings.storage.exportMarker),
      validateCompressed,
    }))
  );
