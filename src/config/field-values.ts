// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
/** The daemon's log stream is consumed by aggregators, so JSON lines are the default. */
export const LOG_FORMAT_DEFAULT: LogFormat = "json";

export const BACKUP_KIND_VALUES = ["nightly", "weekly"] as const;
export type BackupKind = (typeof BACKUP_KIND_VALUES)[number];

export const HEALTH_STATUS_VALUES = ["starting", "running", "healthy", "unhealthy"] as const;
export type HealthStatus = (typeof HEALTH_STATUS_VALUES)[number];
