// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Exit } from "effect";
import { describe, expect, test } from "vitest";
import { formatTimestamp } from "../../src/lib/timing";
import {
  decodeAbsolutePath,
  isAbsolutePath,
  path,
  pathJoin,
  pathWithSuffix,
} from "../../src/lib/types";
import { runTest, runTestExit } from "../helpers/layers";

describe("AbsolutePath", () => {
  test("accepts absolute paths", async () => {
    expect(await runTest(decodeAbsolutePath("/backups"))).toBe("/backups");
    expect(isAbsolutePath("/backups")).toBe(true);
  });

  test("rejects relative paths", async () => {
    const exit = await runTestExit(decodeAbsolutePath("backups"));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(isAbsolutePath("backups")).toBe(false);
  });
});

describe("pathJoin", () => {
  test("joins and collapses repeated slashes", () => {
    expect(pathJoin(path("/backups/"), "/temp", "x.surql")).toBe("/backups/temp/x.surql");
  });

  test("returns the base unchanged without segments", () => {
    expect(pathJoin(path("/backups"))).toBe("/backups");
  });
});

describe("pathWithSuffix", () => {
  test("appends the suffix", () => {
    expect(pathWithSuffix(path("/backups/temp/nightly.surql"), ".gz")).toBe(
      "/backups/temp/nightly.surql.gz"
    );
  });
});

describe("formatTimestamp", () => {
  test("truncates to seconds in UTC", () => {
    expect(formatTimestamp(new Date("2026-07-04T23:59:59.999Z"))).toBe("2026-07-04T23:59:59Z");
  });
});
