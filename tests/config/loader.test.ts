// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { rm, writeFile } from "node:fs/promises";
import { Cause, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { defaultGlobalConfig, loadGlobalConfig } from "../../src/config/loader";
import type { ConfigError, SystemError } from "../../src/lib/errors";
import { type AbsolutePath, pathJoin } from "../../src/lib/types";
import { makeTempRoot, runTest, runTestExit } from "../helpers/layers";

let root: AbsolutePath;

const errorCode = <A>(exit: Exit.Exit<A, ConfigError | SystemError>): Option.Option<number> =>
  Exit.isFailure(exit) ? Option.map(Cause.failureOption(exit.cause), (e) => e.code) : Option.none();

beforeEach(async () => {
  root = await makeTempRoot("db-backup-config");
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("defaultGlobalConfig", () => {
  test("fills every section", () => {
    const config = defaultGlobalConfig();

    expect(config.database.endpoint).toBe("http://core-surrealdb:8000");
    expect(config.database.probeAttempts).toBe(3);
    expect(config.database.probeDelayMs).toBe(5000);
    expect(config.secrets.dir).toBe("/keyvault/surrealdb");
    expect(config.secrets.maxWaitMs).toBe(60_000);
    expect(config.secrets.intervalMs).toBe(2000);
    expect(config.storage.backupDir).toBe("/backups");
    expect(config.storage.tempDir).toBeUndefined();
    expect(config.schedule).toEqual({ nightly: "0 2 * * *", weekly: "0 3 * * 0" });
    expect(config.health).toEqual({ port: 8080, stalenessThresholdMs: 86_400_000 });
    expect(config.logging).toEqual({ level: "info", format: "json", dir: "/logs/db-backup" });
    expect(config.restore.confirmPhrase).toBe("yes");
  });
});

describe("loadGlobalConfig", () => {
  test("reads an explicit file and keeps defaults for the rest", async () => {
    const file = pathJoin(root, "db-backup.toml");
    await writeFile(
      file,
      [
        "[database]",
        'endpoint = "http://db.test:8000"',
        "",
        "[schedule]",
        'nightly = "30 1 * * *"',
        "",
        "[health]",
        "port = 9090",
      ].join("\n")
    );

    const config = await runTest(loadGlobalConfig(Option.some(file)));

    expect(config.database.endpoint).toBe("http://db.test:8000");
    expect(config.schedule).toEqual({ nightly: "30 1 * * *", weekly: "0 3 * * 0" });
    expect(config.health.port).toBe(9090);
    expect(config.storage.backupDir).toBe("/backups");
  });

  test("a missing explicit file is CONFIG_NOT_FOUND", async () => {
    const exit = await runTestExit(loadGlobalConfig(Option.some(pathJoin(root, "absent.toml"))));

    expect(errorCode(exit)).toEqual(Option.some(10));
  });

  test("invalid TOML is CONFIG_PARSE_ERROR", async () => {
    const file = pathJoin(root, "broken.toml");
    await writeFile(file, "[database\nendpoint = ");

    const exit = await runTestExit(loadGlobalConfig(Option.some(file)));

    expect(errorCode(exit)).toEqual(Option.some(11));
  });

  test("an invalid cron expression is CONFIG_VALIDATION_ERROR", async () => {
    const file = pathJoin(root, "cron.toml");
    await writeFile(file, '[schedule]\nweekly = "every sunday"\n');

    const exit = await runTestExit(loadGlobalConfig(Option.some(file)));

    expect(errorCode(exit)).toEqual(Option.some(12));
  });

  test("an out-of-range port is CONFIG_VALIDATION_ERROR", async () => {
    const file = pathJoin(root, "port.toml");
    await writeFile(file, "[health]\nport = 70000\n");

    const exit = await runTestExit(loadGlobalConfig(Option.some(file)));

    expect(errorCode(exit)).toEqual(Option.some(12));
  });

  test("a relative backup directory is rejected", async () => {
    const file = pathJoin(root, "relative.toml");
    await writeFile(file, '[storage]\nbackupDir = "backups"\n');

    const exit = await runTestExit(loadGlobalConfig(Option.some(file)));

    expect(errorCode(exit)).toEqual(Option.some(12));
  });

  test("without a path the first existing search path wins", async () => {
    const second = pathJoin(root, "second.toml");
    await writeFile(second, '[restore]\nconfirmPhrase = "restore"\n');

    const config = await runTest(
      loadGlobalConfig(Option.none(), [pathJoin(root, "first.toml"), second])
    );

    expect(config.restore.confirmPhrase).toBe("restore");
  });

  test("without a path and no file present the defaults apply", async () => {
    const config = await runTest(loadGlobalConfig(Option.none(), [pathJoin(root, "none.toml")]));

    expect(config).toEqual(defaultGlobalConfig());
  });
});
