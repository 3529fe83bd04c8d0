// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { rm, writeFile } from "node:fs/promises";
import { gzipSync } from "node:zlib";
import { Cause, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { validateCompressed, validateExport } from "../../src/backup/validator";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { makeTempRoot, renderDump, runTest, runTestExit } from "../helpers/layers";

const MARKER = "BEGIN TRANSACTION";

let root: AbsolutePath;

const failureMessage = <A, E extends { readonly _tag: string; readonly message: string }>(
  exit: Exit.Exit<A, E>
): string =>
  Exit.isFailure(exit)
    ? Option.match(Cause.failureOption(exit.cause), {
        onNone: (): string => "defect",
        onSome: (e): string => `${e._tag}: ${e.message}`,
      })
    : "success";

beforeEach(async () => {
  root = await makeTempRoot("db-backup-validator");
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("validateExport", () => {
  test("returns the size of a well-formed export", async () => {
    const file = pathJoin(root, "export.surql");
    const dump = renderDump(["CREATE person:1;"]);
    await writeFile(file, dump);

    expect(await runTest(validateExport(file, MARKER))).toBe(Buffer.byteLength(dump));
  });

  test("a missing file is EmptyArtifact", async () => {
    const file = pathJoin(root, "absent.surql");

    const exit = await runTestExit(validateExport(file, MARKER));

    expect(failureMessage(exit)).toBe(`EmptyArtifact: Export file not found: ${file}`);
  });

  test("a zero-byte file is EmptyArtifact", async () => {
    const file = pathJoin(root, "empty.surql");
    await writeFile(file, "");

    const exit = await runTestExit(validateExport(file, MARKER));

    expect(failureMessage(exit)).toBe(`EmptyArtifact: Export file is empty: ${file}`);
  });

  test("a file without the marker is MalformedArtifact", async () => {
    const file = pathJoin(root, "error.surql");
    await writeFile(file, "ERROR: namespace not found\n");

    const exit = await runTestExit(validateExport(file, MARKER));

    expect(failureMessage(exit)).toBe(
      `MalformedArtifact: Export file does not contain "BEGIN TRANSACTION": ${file}`
    );
  });

  test("finds a marker far past the first read chunk", async () => {
    const file = pathJoin(root, "large.surql");
    await writeFile(file, `${"-".repeat(200_000)}\n${MARKER};\n`);

    expect(await runTest(validateExport(file, MARKER))).toBe(200_000 + 1 + MARKER.length + 2);
  });
});

describe("validateCompressed", () => {
  test("returns the archive size of an intact archive", async () => {
    const file = pathJoin(root, "ok.surql.gz");
    const archive = gzipSync(renderDump(["CREATE person:1;"]));
    await writeFile(file, archive);

    expect(await runTest(validateCompressed(file))).toBe(archive.length);
  });

  test("a missing archive is CorruptArchive", async () => {
    const file = pathJoin(root, "absent.surql.gz");

    const exit = await runTestExit(validateCompressed(file));

    expect(failureMessage(exit)).toBe(`CorruptArchive: Archive not found: ${file}`);
  });

  test("an empty archive is CorruptArchive", async () => {
    const file = pathJoin(root, "empty.surql.gz");
    await writeFile(file, "");

    const exit = await runTestExit(validateCompressed(file));

    expect(failureMessage(exit)).toBe(`CorruptArchive: Archive is empty: ${file}`);
  });

  test("non-gzip data fails the integrity check", async () => {
    const file = pathJoin(root, "plain.surql.gz");
    await writeFile(file, "plain text, not gzip");

    const exit = await runTestExit(validateCompressed(file));

    expect(failureMessage(exit)).toBe(`CorruptArchive: Archive failed integrity check: ${file}`);
  });

  test("a flipped trailer byte fails the integrity check", async () => {
    const file = pathJoin(root, "crc.surql.gz");
    const archive = gzipSync(renderDump(["CREATE person:1;"]));
    const last = archive.length - 8;
    archive[last] = (archive[last] ?? 0) ^ 0xff;
    await writeFile(file, archive);

    const exit = await runTestExit(validateCompressed(file));

    expect(failureMessage(exit)).toBe(`CorruptArchive: Archive failed integrity check: ${file}`);
  });
});
