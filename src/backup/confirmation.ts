// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Operator confirmation before destructive actions.
 */

import { Prompt } from "@effect/cli";
import { Terminal } from "@effect/platform";
import { Context, Effect, Layer, pipe } from "effect";

export interface ConfirmationService {
  /** The operator's answer; empty when input ends or the prompt is aborted. */
  readonly ask: (message: string) => Effect.Effect<string>;
}

export interface Confirmation {
  readonly _tag: "Confirmation";
}

export const Confirmation: Context.Tag<Confirmation, ConfirmationService> = Context.GenericTag<
  Confirmation,
  ConfirmationService
>("db-backup/Confirmation");

/** Case-insensitive, surrounding whitespace ignored. */
export const isConfirmed = (answer: string, phrase: string): boolean =>
  answer.trim().toLowerCase() === phrase.toLowerCase();

export const ConfirmationLive: Layer.Layer<Confirmation, never, Terminal.Terminal> = Layer.effect(
  Confirmation,
  Effect.map(Terminal.Terminal, (terminal) => ({
    ask: (message: string): Effect.Effect<string> =>
      pipe(
        Prompt.run(Prompt.text({ message })),
        Effect.provideService(Terminal.Terminal, terminal),
        Effect.catchAll(() =>
          Effect.as(Effect.logDebug("Confirmation prompt aborted"), "")
        )
      ),
  }))
);
