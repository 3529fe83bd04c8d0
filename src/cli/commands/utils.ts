// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Human-readable formatting shared by command output.
 */

import { Array as Arr, Option, pipe } from "effect";

/** Threshold entry for data-driven formatting */
interface ThresholdEntry {
  readonly threshold: number;
  readonly format: (value: number) => string;
}

/** Descending order; the first matching threshold wins. */
const DURATION_THRESHOLDS: readonly ThresholdEntry[] = [
  {
    threshold: 60_000,
    format: (ms): string => `${Math.floor(ms / 60_000)}m ${Math.floor((ms % 60_000) / 1000)}s`,
  },
  { threshold: 1000, format: (ms): string => `${(ms / 1000).toFixed(1)}s` },
];

const BYTE_THRESHOLDS: readonly ThresholdEntry[] = [
  { threshold: 1024 ** 3, format: (b): string => `${(b / 1024 ** 3).toFixed(2)} GB` },
  { threshold: 1024 ** 2, format: (b): string => `${(b / 1024 ** 2).toFixed(2)} MB` },
  { threshold: 1024, format: (b): string => `${(b / 1024).toFixed(2)} KB` },
];

const formatWith =
  (thresholds: readonly ThresholdEntry[], fallback: (value: number) => string) =>
  (value: number): string =>
    pipe(
      thresholds,
      Arr.findFirst((t) => value >= t.threshold),
      Option.match({
        onNone: (): string => fallback(value),
        onSome: (t): string => t.format(value),
      })
    );

export const formatDuration: (ms: number) => string = formatWith(
  DURATION_THRESHOLDS,
  (ms) => `${ms}ms`
);

export const formatBytes: (bytes: number) => string = formatWith(
  BYTE_THRESHOLDS,
  (bytes) => `${bytes} B`
);
