// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { formatStatusPretty } from "../../src/cli/commands/status";
import { formatBytes, formatDuration } from "../../src/cli/commands/utils";
import { effectiveFormat } from "../../src/cli/options";

describe("formatBytes", () => {
  test("picks the largest unit that fits", () => {
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(5 * 1024 ** 2)).toBe("5.00 MB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.00 GB");
  });
});

describe("formatDuration", () => {
  test("uses ms, seconds or minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("formatStatusPretty", () => {
  test("lists status, last backup and each slot", () => {
    expect(
      formatStatusPretty({
        status: "healthy",
        service: "db-backup",
        timestamp: "2026-02-01T12:00:00Z",
        last_backup: "2026-02-01T02:00:07Z",
        backups: {
          nightly: { exists: true, size_bytes: 2048 },
          weekly: { exists: false, size_bytes: 0 },
        },
      })
    ).toBe(
      [
        "Status:      healthy",
        "Last backup: 2026-02-01T02:00:07Z",
        "nightly      2.00 KB",
        "weekly       missing",
      ].join("\n")
    );
  });
});

describe("effectiveFormat", () => {
  const globals = {
    verbose: false,
    logLevel: Option.none(),
    config: Option.none(),
  };

  test("--json wins over --format", () => {
    expect(effectiveFormat({ ...globals, json: true, format: Option.some("pretty") })).toEqual(
      Option.some("json")
    );
  });

  test("otherwise --format applies when given", () => {
    expect(effectiveFormat({ ...globals, json: false, format: Option.some("pretty") })).toEqual(
      Option.some("pretty")
    );
    expect(effectiveFormat({ ...globals, json: false, format: Option.none() })).toEqual(
      Option.none()
    );
  });
});
