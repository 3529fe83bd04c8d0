// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution with structured argument arrays via the
 * @effect/platform Command API. No shell is involved, so credentials and
 * paths are passed to the child verbatim.
 */

import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Duration, Effect, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, errorMessage } from "../lib/errors";

export interface ExecOptions {
  /** Milliseconds; the child is killed when its scope closes on timeout. */
  timeout?: number;
  /** Values replaced by `***` wherever the command line is echoed in errors. */
  redact?: readonly string[];
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

export const redactText = (text: string, secrets: readonly string[] = []): string =>
  secrets.filter((s) => s.length > 0).reduce((acc, s) => acc.split(s).join("***"), text);

const execError = (command: string, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${errorMessage(e)}`,
    ...(e instanceof Error ? { cause: e } : {}),
  });

/** Non-empty guarantee prevents index errors on destructuring. */
interface ValidatedCommand {
  readonly cmd: string;
  readonly args: readonly string[];
}

const validateCommand = (
  command: readonly string[]
): Effect.Effect<ValidatedCommand, GeneralError> =>
  pipe(
    Effect.succeed(command),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    ),
    Effect.map(([cmd, ...args]): ValidatedCommand => ({ cmd, args }))
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const exec = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  Effect.gen(function* () {
    const { cmd, args } = yield* validateCommand(command);
    const commandStr = redactText(command.join(" "), options.redact);

    const run = Effect.gen(function* () {
      const child = yield* Command.start(Command.make(cmd, ...args));

      // Parallel capture: exitCode + both streams ready independently
      const [exitCode, stdout, stderr] = yield* Effect.all(
        [child.exitCode, streamToString(child.stdout), streamToString(child.stderr)],
        { concurrency: 3 }
      );

      const result: ExecResult = { exitCode, stdout, stderr };
      return result;
    }).pipe(Effect.mapError((e) => execError(commandStr, e)));

    const bounded =
      options.timeout !== undefined
        ? run.pipe(
            Effect.timeoutFail({
              duration: Duration.millis(options.timeout),
              onTimeout: () => execError(commandStr, `timed out after ${options.timeout}ms`),
            })
          )
        : run;

    return yield* withExecutor(bounded.pipe(Effect.scoped));
  });

/** Fails if exit code is non-zero. */
export const execSuccess = (
  command: readonly string[],
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError | GeneralError> =>
  pipe(
    exec(command, options),
    Effect.filterOrFail(
      (result): result is ExecResult => result.exitCode === 0,
      (result) => {
        const stderr = redactText(result.stderr.trim(), options.redact);
        return new SystemError({
          code: ErrorCode.EXEC_FAILED,
          message: `Command failed with exit code ${result.exitCode}: ${redactText(command.join(" "), options.redact)}${stderr ? `\n${stderr}` : ""}`,
        });
      }
    )
  );
