// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema definitions for db-backup.toml.
 * Single source of truth for configuration structure and validation.
 * Every field has a default, so an empty or absent file is a valid config.
 */

import { Cron, Either, Schema } from "effect";
import { DEFAULT_PATHS } from "../lib/paths";
import { decodeUnsafe } from "../lib/schema-utils";
import { AbsolutePathSchema } from "../lib/types";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
} from "./field-values";

const PositiveInt = Schema.Number.pipe(Schema.int(), Schema.positive());
const NonEmptyString = Schema.String.pipe(Schema.minLength(1));

export const PortSchema: Schema.Schema<number> = Schema.Number.pipe(
  Schema.int(),
  Schema.between(1, 65535, { message: (): string => "Port must be 1-65535" })
);

export const CronExpressionSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.filter((s): boolean => Either.isRight(Cron.parse(s)), {
    message: (): string => "Invalid cron expression",
  })
);

/** Defaults for a section come from decoding `{}` against it. */
const sectionDefault =
  <A, I>(schema: Schema.Schema<A, I, never>): (() => A) =>
  (): A =>
    decodeUnsafe(schema, {});

export const databaseSectionSchema = Schema.Struct({
  endpoint: Schema.optionalWith(NonEmptyString, { default: () => "http://core-surrealdb:8000" }),
  /** The `surreal` CLI used for export and import. */
  cliPath: Schema.optionalWith(NonEmptyString, { default: () => "surreal" }),
  probeAttempts: Schema.optionalWith(PositiveInt, { default: () => 3 }),
  probeDelayMs: Schema.optionalWith(PositiveInt, { default: () => 5000 }),
  probeTimeoutMs: Schema.optionalWith(PositiveInt, { default: () => 5000 }),
  exportTimeoutMs: Schema.optionalWith(PositiveInt, { default: () => 3_600_000 }),
  importTimeoutMs: Schema.optionalWith(PositiveInt, { default: () => 3_600_000 }),
});

export const secretsSectionSchema = Schema.Struct({
  dir: Schema.optionalWith(AbsolutePathSchema, { default: () => DEFAULT_PATHS.secretsDir }),
  maxWaitMs: Schema.optionalWith(PositiveInt, { default: () => 60_000 }),
  intervalMs: Schema.optionalWith(PositiveInt, { default: () => 2000 }),
});

export const storageSectionSchema = Schema.Struct({
  backupDir: Schema.optionalWith(AbsolutePathSchema, { default: () => DEFAULT_PATHS.backupDir }),
  /** Defaults to `<backupDir>/temp`; must share a filesystem with backupDir. */
  tempDir: Schema.optional(AbsolutePathSchema),
  extension: Schema.optionalWith(NonEmptyString, { default: () => "surql" }),
  /** Token a well-formed export always contains. */
  exportMarker: Schema.optionalWith(NonEmptyString, { default: () => "BEGIN TRANSACTION" }),
});

export const scheduleSectionSchema = Schema.Struct({
  nightly: Schema.optionalWith(CronExpressionSchema, { default: () => "0 2 * * *" }),
  weekly: Schema.optionalWith(CronExpressionSchema, { default: () => "0 3 * * 0" }),
});

export const healthSectionSchema = Schema.Struct({
  port: Schema.optionalWith(PortSchema, { default: () => 8080 }),
  stalenessThresholdMs: Schema.optionalWith(PositiveInt, { default: () => 86_400_000 }),
});

export const loggingSectionSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
  /** Holds backup.log and health.json. */
  dir: Schema.optionalWith(AbsolutePathSchema, { default: () => DEFAULT_PATHS.logDir }),
});

export const restoreSectionSchema = Schema.Struct({
  confirmPhrase: Schema.optionalWith(NonEmptyString, { default: () => "yes" }),
});

export const globalConfigSchema = Schema.Struct({
  database: Schema.optionalWith(databaseSectionSchema, {
    default: sectionDefault(databaseSectionSchema),
  }),
  secrets: Schema.optionalWith(secretsSectionSchema, {
    default: sectionDefault(secretsSectionSchema),
  }),
  storage: Schema.optionalWith(storageSectionSchema, {
    default: sectionDefault(storageSectionSchema),
  }),
  schedule: Schema.optionalWith(scheduleSectionSchema, {
    default: sectionDefault(scheduleSectionSchema),
  }),
  health: Schema.optionalWith(healthSectionSchema, {
    default: sectionDefault(healthSectionSchema),
  }),
  logging: Schema.optionalWith(loggingSectionSchema, {
    default: sectionDefault(loggingSectionSchema),
  }),
  restore: Schema.optionalWith(restoreSectionSchema, {
    default: sectionDefault(restoreSectionSchema),
  }),
});

export type GlobalConfig = Schema.Schema.Type<typeof globalConfigSchema>;
