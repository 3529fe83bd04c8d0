// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { rm, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Cause, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadCredentials } from "../../src/backup/credentials";
import type { Settings } from "../../src/config/settings";
import type { CredentialsUnavailable } from "../../src/lib/errors";
import type { AbsolutePath } from "../../src/lib/types";
import {
  TEST_CREDENTIALS,
  makeTempRoot,
  prepareRoot,
  runTest,
  runTestExit,
  testSettings,
} from "../helpers/layers";

let root: AbsolutePath;
let settings: Settings;

const failure = <A>(exit: Exit.Exit<A, CredentialsUnavailable>): Option.Option<CredentialsUnavailable> =>
  Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();

beforeEach(async () => {
  root = await makeTempRoot("db-backup-credentials");
  settings = testSettings(root);
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("loadCredentials", () => {
  test("reads all four secrets with trailing newlines stripped", async () => {
    await prepareRoot(settings);

    const bundle = await runTest(loadCredentials(settings.secrets.dir, settings.secrets.polling));

    expect(bundle).toEqual(TEST_CREDENTIALS);
  });

  test("keeps inner whitespace of a secret", async () => {
    await prepareRoot(settings, { ...TEST_CREDENTIALS, password: "test secret" });

    const bundle = await runTest(loadCredentials(settings.secrets.dir, settings.secrets.polling));

    expect(bundle.password).toBe("test secret");
  });

  test("times out naming the missing secrets", async () => {
    await prepareRoot(settings, { username: "backup-user", namespace: "test-ns" });

    const exit = await runTestExit(loadCredentials(settings.secrets.dir, settings.secrets.polling));

    const error = failure(exit);
    expect(Option.isSome(error)).toBe(true);
    if (Option.isSome(error)) {
      expect(error.value.missing).toEqual(["password", "database"]);
      expect(error.value.message).toBe(
        `Timeout waiting for credentials in ${settings.secrets.dir} (missing: password, database)`
      );
    }
  });

  test("treats an empty secret file as missing", async () => {
    await prepareRoot(settings);
    await writeFile(join(settings.secrets.dir, "database"), "\n");

    const exit = await runTestExit(loadCredentials(settings.secrets.dir, settings.secrets.polling));

    const error = failure(exit);
    expect(Option.map(error, (e) => e.missing)).toEqual(Option.some(["database"]));
  });

  test("fails when the secret directory does not exist", async () => {
    const exit = await runTestExit(loadCredentials(settings.secrets.dir, settings.secrets.polling));

    const error = failure(exit);
    expect(Option.map(error, (e) => e.missing)).toEqual(
      Option.some(["username", "password", "namespace", "database"])
    );
  });

  test("picks up a secret written while polling", async () => {
    await prepareRoot(settings);
    const passwordFile = join(settings.secrets.dir, "password");
    await unlink(passwordFile);

    const pending = runTest(
      loadCredentials(settings.secrets.dir, { maxWaitMs: 5000, intervalMs: 20 })
    );
    await new Promise((resolve) => setTimeout(resolve, 60));
    await writeFile(passwordFile, "late-secret\n");

    const bundle = await pending;
    expect(bundle.password).toBe("late-secret");
  });
});
