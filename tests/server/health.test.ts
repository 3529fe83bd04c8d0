// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir, rm, writeFile } from "node:fs/promises";
import { HttpApp } from "@effect/platform";
import { Effect, Layer, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  type HealthRecord,
  HealthReader,
  HealthWriter,
  makeHealthStateLayer,
} from "../../src/backup/health-state";
import type { SlotStat } from "../../src/backup/retention";
import type { Settings } from "../../src/config/settings";
import { formatTimestamp } from "../../src/lib/timing";
import type { AbsolutePath } from "../../src/lib/types";
import {
  buildHealthBody,
  evaluateHealth,
  httpStatusFor,
  makeHealthRouter,
} from "../../src/server/health";
import {
  coreTestLayer,
  fakeExportClient,
  makeFakeDatabase,
  makeTempRoot,
  runTest,
  testSettings,
} from "../helpers/layers";

const DAY_MS = 86_400_000;
const NOW = Date.parse("2026-02-01T12:00:00Z");

const absent: SlotStat = { exists: false, sizeBytes: 0 };

describe("evaluateHealth", () => {
  test("a recent healthy record is healthy", () => {
    const record = Option.some({ status: "healthy" as const, lastUpdated: new Date(NOW - 1000) });

    expect(evaluateHealth(record, NOW, DAY_MS)).toBe("healthy");
  });

  test("a healthy record at the staleness threshold is unhealthy", () => {
    const record = Option.some({ status: "healthy" as const, lastUpdated: new Date(NOW - DAY_MS) });

    expect(evaluateHealth(record, NOW, DAY_MS)).toBe("unhealthy");
  });

  test("starting, running and unhealthy are all unhealthy", () => {
    for (const status of ["starting", "running", "unhealthy"] as const) {
      expect(evaluateHealth(Option.some({ status, lastUpdated: new Date(NOW) }), NOW, DAY_MS)).toBe(
        "unhealthy"
      );
    }
  });

  test("no record is unhealthy", () => {
    expect(evaluateHealth(Option.none(), NOW, DAY_MS)).toBe("unhealthy");
  });
});

describe("buildHealthBody", () => {
  test("reports slots and the last backup time", () => {
    const record = Option.some({
      status: "healthy" as const,
      lastUpdated: new Date("2026-02-01T02:00:07Z"),
    });

    expect(
      buildHealthBody(record, { nightly: { exists: true, sizeBytes: 2048 }, weekly: absent }, NOW, DAY_MS)
    ).toEqual({
      status: "healthy",
      service: "db-backup",
      timestamp: "2026-02-01T12:00:00Z",
      last_backup: "2026-02-01T02:00:07Z",
      backups: {
        nightly: { exists: true, size_bytes: 2048 },
        weekly: { exists: false, size_bytes: 0 },
      },
    });
  });

  test("a daemon that has not run yet reports never", () => {
    const record = Option.some({ status: "starting" as const, lastUpdated: new Date(NOW) });

    const body = buildHealthBody(record, { nightly: absent, weekly: absent }, NOW, DAY_MS);

    expect(body.last_backup).toBe("never");
    expect(body.status).toBe("unhealthy");
  });
});

describe("httpStatusFor", () => {
  test("maps healthy to 200 and unhealthy to 503", () => {
    expect(httpStatusFor("healthy")).toBe(200);
    expect(httpStatusFor("unhealthy")).toBe(503);
  });
});

describe("health router", () => {
  let root: AbsolutePath;
  let settings: Settings;

  beforeEach(async () => {
    root = await makeTempRoot("db-backup-server");
    settings = testSettings(root);
    await mkdir(settings.logging.dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const handlerAfter = (setup: Effect.Effect<void, never, HealthWriter>) =>
    runTest(
      Effect.gen(function* () {
        yield* setup;
        const router = yield* makeHealthRouter;
        return HttpApp.toWebHandler(router);
      }).pipe(
        Effect.provide(
          makeHealthStateLayer(false).pipe(
            Layer.provideMerge(coreTestLayer(settings, fakeExportClient(makeFakeDatabase())))
          )
        )
      )
    );

  test("GET /health is 503 before any run", async () => {
    const handler = await handlerAfter(Effect.void);

    const response = await handler(new Request("http://localhost/health"));

    expect(response.status).toBe(503);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      status: "unhealthy",
      service: "db-backup",
      last_backup: "never",
      backups: {
        nightly: { exists: false, size_bytes: 0 },
        weekly: { exists: false, size_bytes: 0 },
      },
    });
  });

  test("GET /health is 200 after a successful run and reports slot sizes", async () => {
    await mkdir(settings.storage.backupDir, { recursive: true });
    await writeFile(`${settings.storage.backupDir}/weekly_backup.surql.gz`, "12345");
    const handler = await handlerAfter(
      Effect.asVoid(Effect.flatMap(HealthWriter, (w) => w.set("healthy")))
    );

    const response = await handler(new Request("http://localhost/health"));

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      status: "healthy",
      backups: {
        nightly: { exists: false, size_bytes: 0 },
        weekly: { exists: true, size_bytes: 5 },
      },
    });
  });

  test("GET /health is 503 once the last healthy run is older than the threshold", async () => {
    const stale: HealthRecord = { status: "healthy", lastUpdated: new Date(Date.now() - 2 * DAY_MS) };
    const handler = await runTest(
      Effect.map(makeHealthRouter, (router) => HttpApp.toWebHandler(router)).pipe(
        Effect.provide(
          Layer.succeed(HealthReader, { get: Effect.succeed(stale) }).pipe(
            Layer.provideMerge(coreTestLayer(settings, fakeExportClient(makeFakeDatabase())))
          )
        )
      )
    );

    const response = await handler(new Request("http://localhost/health"));

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: "unhealthy",
      last_backup: formatTimestamp(stale.lastUpdated),
    });
  });

  test("any other path is a JSON 404", async () => {
    const handler = await handlerAfter(Effect.void);

    const response = await handler(new Request("http://localhost/metrics"));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Not Found" });
  });
});
