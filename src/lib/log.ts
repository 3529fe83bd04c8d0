// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Structured logging with ADT-based style dispatch and atomic step counting.
 * Annotations decouple visual formatting (handled in effect-logger.ts) from
 * log call sites.
 */

import { Data, Effect, LogLevel, Match, SynchronizedRef, pipe } from "effect";
import type { BackupKind } from "../config/field-values";

// ============================================================================
// LogStyle ADT
// ============================================================================

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
}>;

const { step, success } = Data.taggedEnum<LogStyle>();

/** Encode to annotation records that effect-logger.ts interprets for formatting. */
const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

// ============================================================================
// Public Logging Functions
// ============================================================================

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** Bypasses Effect logger for raw program output (command results, status info). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

// ============================================================================
// Run events
// ============================================================================

export type RunStatus = "started" | "success" | "failed" | "verified" | "cancelled";

/**
 * Every run record carries the five run fields; sizes and durations not
 * known at that point are written as null.
 */
export interface RunEventFields {
  readonly backup_type: BackupKind;
  readonly status: RunStatus;
  readonly duration_ms: number | null;
  readonly file_size_bytes: number | null;
  readonly compressed_size_bytes: number | null;
  readonly error_code?: string;
}

export type RunEventInput = Pick<RunEventFields, "backup_type" | "status"> &
  Partial<Omit<RunEventFields, "backup_type" | "status">>;

const runEventFields = (input: RunEventInput): Record<string, unknown> => {
  const fields: RunEventFields = {
    backup_type: input.backup_type,
    status: input.status,
    duration_ms: input.duration_ms ?? null,
    file_size_bytes: input.file_size_bytes ?? null,
    compressed_size_bytes: input.compressed_size_bytes ?? null,
    ...(input.error_code !== undefined ? { error_code: input.error_code } : {}),
  };
  return { ...fields };
};

export const logEvent = (
  level: "info" | "warn" | "error",
  message: string,
  fields: RunEventInput
): Effect.Effect<void> =>
  Effect.logWithLevel(
    pipe(
      Match.value(level),
      Match.when("info", () => LogLevel.Info),
      Match.when("warn", () => LogLevel.Warning),
      Match.when("error", () => LogLevel.Error),
      Match.exhaustive
    ),
    message
  ).pipe(Effect.annotateLogs(runEventFields(fields)));

// ============================================================================
// StepCounter (SynchronizedRef-based)
// ============================================================================

export interface StepCounter {
  /** Increment and log atomically; concurrent calls are serialized. */
  readonly next: (message: string) => Effect.Effect<void>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make(0);

    return {
      next: (message: string): Effect.Effect<void> =>
        SynchronizedRef.updateAndGetEffect(ref, (n) =>
          Effect.gen(function* () {
            const current = n + 1;
            yield* logStep(current, total, message);
            return current;
          })
        ).pipe(Effect.asVoid),
    };
  });
