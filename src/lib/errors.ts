// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for db-backup.
 * Every failure is a tagged error carrying a typed code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly UNHEALTHY: 3;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly DIRECTORY_CREATE_FAILED: 22;
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;

  // Backup pipeline (50-59)
  readonly CREDENTIALS_UNAVAILABLE: 50;
  readonly DATABASE_UNREACHABLE: 51;
  readonly EXPORT_FAILED: 52;
  readonly EMPTY_ARTIFACT: 53;
  readonly MALFORMED_ARTIFACT: 54;
  readonly COMPRESSION_FAILED: 55;
  readonly CORRUPT_ARCHIVE: 56;
  readonly COMMIT_FAILED: 57;
  readonly POST_COMMIT_CORRUPTION: 58;

  // Restore (60-69)
  readonly IMPORT_FAILED: 60;
  readonly SLOT_EMPTY: 61;
}

/**
 * Error codes for all db-backup operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  UNHEALTHY: 3,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  DIRECTORY_CREATE_FAILED: 22,
  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,

  CREDENTIALS_UNAVAILABLE: 50,
  DATABASE_UNREACHABLE: 51,
  EXPORT_FAILED: 52,
  EMPTY_ARTIFACT: 53,
  MALFORMED_ARTIFACT: 54,
  COMPRESSION_FAILED: 55,
  CORRUPT_ARCHIVE: 56,
  COMMIT_FAILED: 57,
  POST_COMMIT_CORRUPTION: 58,

  IMPORT_FAILED: 60,
  SLOT_EMPTY: 61,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─────────────────────────────────────────────────────────────────────────────
// Ambient errors
// ─────────────────────────────────────────────────────────────────────────────

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: 1 | 2 | 3;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: 10 | 11 | 12;
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: 22 | 26 | 27 | 28;
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ─────────────────────────────────────────────────────────────────────────────
// Backup pipeline errors
// ─────────────────────────────────────────────────────────────────────────────

export class CredentialsUnavailable extends Data.TaggedError("CredentialsUnavailable")<{
  readonly message: string;
  readonly missing: readonly string[];
}> {
  readonly code: 50 = ErrorCode.CREDENTIALS_UNAVAILABLE;
}

export class DatabaseUnreachable extends Data.TaggedError("DatabaseUnreachable")<{
  readonly message: string;
  readonly endpoint: string;
  readonly attempts: number;
}> {
  readonly code: 51 = ErrorCode.DATABASE_UNREACHABLE;
}

export class ExportFailed extends Data.TaggedError("ExportFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {
  readonly code: 52 = ErrorCode.EXPORT_FAILED;
}

export class EmptyArtifact extends Data.TaggedError("EmptyArtifact")<{
  readonly message: string;
  readonly path: string;
}> {
  readonly code: 53 = ErrorCode.EMPTY_ARTIFACT;
}

export class MalformedArtifact extends Data.TaggedError("MalformedArtifact")<{
  readonly message: string;
  readonly path: string;
}> {
  readonly code: 54 = ErrorCode.MALFORMED_ARTIFACT;
}

export class CompressionFailed extends Data.TaggedError("CompressionFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {
  readonly code: 55 = ErrorCode.COMPRESSION_FAILED;
}

export class CorruptArchive extends Data.TaggedError("CorruptArchive")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {
  readonly code: 56 = ErrorCode.CORRUPT_ARCHIVE;
}

export class CommitFailed extends Data.TaggedError("CommitFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {
  readonly code: 57 = ErrorCode.COMMIT_FAILED;
}

/** The slot already holds the bad artifact when this is raised; nothing is rolled back. */
export class PostCommitCorruption extends Data.TaggedError("PostCommitCorruption")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {
  readonly code: 58 = ErrorCode.POST_COMMIT_CORRUPTION;
}

// ─────────────────────────────────────────────────────────────────────────────
// Restore errors
// ─────────────────────────────────────────────────────────────────────────────

export class ImportFailed extends Data.TaggedError("ImportFailed")<{
  readonly message: string;
  readonly cause?: unknown;
}> {
  readonly code: 60 = ErrorCode.IMPORT_FAILED;
}

export class SlotEmpty extends Data.TaggedError("SlotEmpty")<{
  readonly message: string;
  readonly path: string;
}> {
  readonly code: 61 = ErrorCode.SLOT_EMPTY;
}

// ─────────────────────────────────────────────────────────────────────────────
// Unions
// ─────────────────────────────────────────────────────────────────────────────

export type BackupFailure =
  | CredentialsUnavailable
  | DatabaseUnreachable
  | ExportFailed
  | EmptyArtifact
  | MalformedArtifact
  | CompressionFailed
  | CorruptArchive
  | CommitFailed
  | PostCommitCorruption;

export type RestoreFailure =
  | SlotEmpty
  | CorruptArchive
  | EmptyArtifact
  | MalformedArtifact
  | CredentialsUnavailable
  | DatabaseUnreachable
  | ImportFailed
  | SystemError;

export type AppError = BackupFailure | RestoreFailure | GeneralError | ConfigError | SystemError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

export const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;
