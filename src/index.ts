#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * db-backup: rolling backup and restore for SurrealDB.
 *
 * This is the "imperative shell" - the only place where the Effect runtime is executed.
 */

import { ValidationError } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli } from "./cli/index";
import { ErrorCode, type ErrorCodeValue, toExitCode } from "./lib/errors";

/** SIGINT/SIGTERM end the daemon by interruption. */
const INTERRUPTED_EXIT_CODE = 130;

const hasErrorCode = (v: unknown): v is { code: ErrorCodeValue } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

const exitCodeFromExit = <A, E>(exit: Exit.Exit<A, E>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number =>
          Cause.isInterruptedOnly(cause) ? INTERRUPTED_EXIT_CODE : ErrorCode.GENERAL_ERROR,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.when(hasErrorCode, (v) => toExitCode(v.code)),
            Match.orElse(() => ErrorCode.GENERAL_ERROR)
          ),
      }),
  });

/** Application failures were already displayed by the command runner; only defects are printed here. */
const logUnexpected = <A, E>(exit: Exit.Exit<A, E>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void => {
      if (Cause.isDie(cause)) {
        process.stderr.write(`Unexpected error: ${Cause.pretty(cause)}\n`);
      }
    },
  });

const program = pipe(cli(process.argv), Effect.provide(NodeContext.layer));

NodeRuntime.runMain(program, {
  disableErrorReporting: true,
  disablePrettyLogger: true,
  teardown: (exit, onExit) => {
    logUnexpected(exit);
    onExit(exitCodeFromExit(exit));
  },
});
