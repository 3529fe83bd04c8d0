// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `GET /health` for container orchestrators. Healthy means the last run
 * succeeded and did so recently; anything else is a 503 with the same body
 * shape, so the failure is visible without a second request.
 */

import { createServer } from "node:http";
import { HttpRouter, HttpServer, type HttpServerError, HttpServerResponse } from "@effect/platform";
import { NodeHttpServer } from "@effect/platform-node";
import { Clock, Effect, Layer, Option, pipe } from "effect";
import { BACKUP_KIND_VALUES, type BackupKind } from "../config/field-values";
import { AppSettings } from "../config/settings";
import { HEALTH_SERVICE_NAME, type HealthRecord, HealthReader } from "../backup/health-state";
import { RetentionStore, type RetentionStoreService, type SlotStat } from "../backup/retention";
import { formatTimestamp } from "../lib/timing";

export type OverallHealth = "healthy" | "unhealthy";

export interface SlotSummary {
  readonly exists: boolean;
  readonly size_bytes: number;
}

export interface HealthResponseBody {
  readonly status: OverallHealth;
  readonly service: string;
  readonly timestamp: string;
  readonly last_backup: string;
  readonly backups: { readonly [K in BackupKind]: SlotSummary };
}

/** A missing record (no snapshot yet) is unhealthy. */
export const evaluateHealth = (
  record: Option.Option<HealthRecord>,
  nowMs: number,
  stalenessThresholdMs: number
): OverallHealth =>
  pipe(
    record,
    Option.filter((r) => r.status === "healthy"),
    Option.filter((r) => nowMs - r.lastUpdated.getTime() < stalenessThresholdMs),
    Option.match({
      onNone: (): OverallHealth => "unhealthy",
      onSome: (): OverallHealth => "healthy",
    })
  );

export const buildHealthBody = (
  record: Option.Option<HealthRecord>,
  slots: { readonly [K in BackupKind]: SlotStat },
  nowMs: number,
  stalenessThresholdMs: number
): HealthResponseBody => ({
  status: evaluateHealth(record, nowMs, stalenessThresholdMs),
  service: HEALTH_SERVICE_NAME,
  timestamp: formatTimestamp(new Date(nowMs)),
  last_backup: pipe(
    record,
    Option.filter((r) => r.status !== "starting"),
    Option.match({
      onNone: (): string => "never",
      onSome: (r): string => formatTimestamp(r.lastUpdated),
    })
  ),
  backups: {
    nightly: { exists: slots.nightly.exists, size_bytes: slots.nightly.sizeBytes },
    weekly: { exists: slots.weekly.exists, size_bytes: slots.weekly.sizeBytes },
  },
});

export const httpStatusFor = (health: OverallHealth): number => (health === "healthy" ? 200 : 503);

/** Slot stat errors degrade to "absent" rather than failing the endpoint. */
export const collectSlotStats = (
  retention: RetentionStoreService
): Effect.Effect<{ readonly [K in BackupKind]: SlotStat }> =>
  Effect.map(
    Effect.forEach(BACKUP_KIND_VALUES, (kind) =>
      pipe(
        retention.stat(kind),
        Effect.catchAll((e) =>
          Effect.as(Effect.logWarning(`Cannot stat ${kind} slot: ${e.message}`), {
            exists: false,
            sizeBytes: 0,
          })
        )
      )
    ),
    ([nightly, weekly]) => ({
      nightly: nightly ?? { exists: false, sizeBytes: 0 },
      weekly: weekly ?? { exists: false, sizeBytes: 0 },
    })
  );

export const makeHealthRouter: Effect.Effect<
  HttpRouter.HttpRouter,
  never,
  AppSettings | HealthReader | RetentionStore
> = Effect.gen(function* () {
  const settings = yield* AppSettings;
  const reader = yield* HealthReader;
  const retention = yield* RetentionStore;

  const healthHandler = Effect.gen(function* () {
    const record = yield* reader.get;
    const slots = yield* collectSlotStats(retention);
    const nowMs = yield* Clock.currentTimeMillis;
    const body = buildHealthBody(
      Option.some(record),
      slots,
      nowMs,
      settings.health.stalenessThresholdMs
    );
    return HttpServerResponse.unsafeJson(body, { status: httpStatusFor(body.status) });
  });

  return HttpRouter.empty.pipe(
    HttpRouter.get("/health", healthHandler),
    HttpRouter.all(
      "*",
      Effect.succeed(HttpServerResponse.unsafeJson({ error: "Not Found" }, { status: 404 }))
    )
  );
});

export const HealthServerLive: Layer.Layer<
  never,
  HttpServerError.ServeError,
  AppSettings | HealthReader | RetentionStore
> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const settings = yield* AppSettings;
    const router = yield* makeHealthRouter;
    return router.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(() => createServer(), { port: settings.health.port }))
    );
  })
);
