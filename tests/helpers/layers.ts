// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test doubles and layers. The database is an in-memory record list behind
 * the ExportClient interface; its exports are plain dump files on disk, so
 * everything downstream (validation, gzip, commit, restore) runs for real
 * against a temporary directory.
 */

import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, type Exit, Layer, Logger } from "effect";
import { Confirmation, type ConfirmationService } from "../../src/backup/confirmation";
import {
  type CredentialBundle,
  type CredentialSource,
  CredentialSourceLive,
} from "../../src/backup/credentials";
import { ExportClient, type ExportClientService } from "../../src/backup/export-client";
import { type HealthReader, HealthStateLive, type HealthWriter } from "../../src/backup/health-state";
import { type BackupPipeline, BackupPipelineLive } from "../../src/backup/pipeline";
import { type RestoreWorkflow, RestoreWorkflowLive } from "../../src/backup/restore";
import { type RetentionStore, RetentionStoreLive } from "../../src/backup/retention";
import { type ArtifactValidator, ArtifactValidatorLive } from "../../src/backup/validator";
import { type AppSettings, AppSettingsLive, type Settings } from "../../src/config/settings";
import { DatabaseUnreachable, ExportFailed, ImportFailed } from "../../src/lib/errors";
import { type AbsolutePath, decodeAbsolutePath, pathJoin } from "../../src/lib/types";

// ============================================================================
// Running effects
// ============================================================================

/** Swallows log output so test reports stay readable. */
export const SilentLogger: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.none);

export const runTest = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(SilentLogger)));

export const runTestExit = <A, E>(effect: Effect.Effect<A, E>): Promise<Exit.Exit<A, E>> =>
  Effect.runPromiseExit(effect.pipe(Effect.provide(SilentLogger)));

// ============================================================================
// Filesystem fixtures
// ============================================================================

export const makeTempRoot = async (prefix: string): Promise<AbsolutePath> => {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  return Effect.runPromise(decodeAbsolutePath(dir));
};

export const TEST_CREDENTIALS: CredentialBundle = {
  username: "backup-user",
  password: "test-secret",
  namespace: "test-ns",
  database: "test-db",
};

/** Settings rooted in a temporary directory, with fast retry and polling policies. */
export const testSettings = (root: AbsolutePath): Settings => ({
  database: {
    endpoint: "http://db.test:8000",
    cliPath: "surreal",
    probe: { attempts: 3, delayMs: 1 },
    probeTimeoutMs: 1000,
    exportTimeoutMs: 5000,
    importTimeoutMs: 5000,
  },
  secrets: {
    dir: pathJoin(root, "secrets"),
    polling: { maxWaitMs: 40, intervalMs: 10 },
  },
  storage: {
    backupDir: pathJoin(root, "backups"),
    tempDir: pathJoin(root, "backups", "temp"),
    extension: "surql",
    exportMarker: "BEGIN TRANSACTION",
  },
  schedule: { nightly: "0 2 * * *", weekly: "0 3 * * 0" },
  health: {
    port: 0,
    stalenessThresholdMs: 86_400_000,
    snapshotPath: pathJoin(root, "logs", "health.json"),
  },
  logging: {
    level: "error",
    format: "json",
    dir: pathJoin(root, "logs"),
    file: pathJoin(root, "logs", "backup.log"),
  },
  restore: { confirmPhrase: "yes" },
});

/** Creates the log directory and, unless told otherwise, a full secret directory. */
export const prepareRoot = async (
  settings: Settings,
  credentials: Partial<CredentialBundle> = TEST_CREDENTIALS
): Promise<void> => {
  await mkdir(settings.logging.dir, { recursive: true });
  await mkdir(settings.secrets.dir, { recursive: true });
  for (const [name, value] of Object.entries(credentials)) {
    await writeFile(join(settings.secrets.dir, name), `${value}\n`);
  }
};

// ============================================================================
// Fake database
// ============================================================================

export type ExportMode = "ok" | "empty" | "malformed" | "fail";

export interface FakeDatabase {
  records: string[];
  reachable: boolean;
  exportMode: ExportMode;
  readonly calls: { probe: number; export: number; import: number };
  readonly credentialsSeen: CredentialBundle[];
}

export const makeFakeDatabase = (records: readonly string[] = []): FakeDatabase => ({
  records: [...records],
  reachable: true,
  exportMode: "ok",
  calls: { probe: 0, export: 0, import: 0 },
  credentialsSeen: [],
});

const DUMP_HEADER = "-- test dump";
const BEGIN = "BEGIN TRANSACTION;";
const COMMIT = "COMMIT TRANSACTION;";

export const renderDump = (records: readonly string[]): string =>
  [DUMP_HEADER, BEGIN, ...records, COMMIT, ""].join("\n");

export const parseDump = (content: string): string[] =>
  content
    .split("\n")
    .filter((line) => line !== "" && line !== DUMP_HEADER && line !== BEGIN && line !== COMMIT);

const dumpFor = (db: FakeDatabase): string => {
  switch (db.exportMode) {
    case "empty":
      return "";
    case "malformed":
      return "ERROR: namespace not found\n";
    default:
      return renderDump(db.records);
  }
};

export const fakeExportClient = (
  db: FakeDatabase,
  endpoint = "http://db.test:8000"
): ExportClientService => ({
  probe: Effect.suspend(() => {
    db.calls.probe += 1;
    return db.reachable
      ? Effect.void
      : Effect.fail(
          new DatabaseUnreachable({
            message: `Database not reachable at ${endpoint}/health after 3 attempts: connection refused`,
            endpoint,
            attempts: 3,
          })
        );
  }),

  exportTo: (credentials, destination) =>
    Effect.suspend(() => {
      db.calls.export += 1;
      db.credentialsSeen.push(credentials);
      if (db.exportMode === "fail") {
        return Effect.fail(
          new ExportFailed({ message: "Command failed with exit code 1: surreal export" })
        );
      }
      return Effect.tryPromise({
        try: (): Promise<void> => writeFile(destination, dumpFor(db)),
        catch: (e): ExportFailed => new ExportFailed({ message: String(e), cause: e }),
      });
    }),

  importFrom: (credentials, source) =>
    Effect.suspend(() => {
      db.calls.import += 1;
      db.credentialsSeen.push(credentials);
      return Effect.tryPromise({
        try: async (): Promise<void> => {
          db.records = parseDump(await readFile(source, "utf8"));
        },
        catch: (e): ImportFailed => new ImportFailed({ message: String(e), cause: e }),
      });
    }),
});

// ============================================================================
// Fake confirmation
// ============================================================================

export interface FakeConfirmation {
  readonly prompts: string[];
  readonly service: ConfirmationService;
}

export const fakeConfirmation = (answer: string): FakeConfirmation => {
  const prompts: string[] = [];
  return {
    prompts,
    service: {
      ask: (message) =>
        Effect.sync(() => {
          prompts.push(message);
          return answer;
        }),
    },
  };
};

// ============================================================================
// Layers
// ============================================================================

export type CoreTestServices =
  | AppSettings
  | CredentialSource
  | ExportClient
  | ArtifactValidator
  | RetentionStore;

export const coreTestLayer = (
  settings: Settings,
  client: ExportClientService
): Layer.Layer<CoreTestServices> =>
  Layer.mergeAll(
    CredentialSourceLive,
    Layer.succeed(ExportClient, client),
    ArtifactValidatorLive,
    RetentionStoreLive
  ).pipe(Layer.provideMerge(AppSettingsLive(settings)));

export const backupTestLayer = (
  settings: Settings,
  client: ExportClientService
): Layer.Layer<CoreTestServices | HealthReader | HealthWriter | BackupPipeline> =>
  BackupPipelineLive.pipe(
    Layer.provideMerge(HealthStateLive),
    Layer.provideMerge(coreTestLayer(settings, client))
  );

export const restoreTestLayer = (
  settings: Settings,
  client: ExportClientService,
  confirmation: ConfirmationService
): Layer.Layer<CoreTestServices | Confirmation | RestoreWorkflow> =>
  RestoreWorkflowLive.pipe(
    Layer.provideMerge(Layer.succeed(Confirmation, confirmation)),
    Layer.provideMerge(coreTestLayer(settings, client))
  );
