/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export { ReportBuilder, REPORT_TITLE } from './report/report-builder.js';
export { HttpResultSink, buildSyncPayload, type ResultSink, type SyncEntry, type SyncResult } from './sync/result-sink.js';
export { FolderWatcher } from './runner/index.js';
export { resolveVerifierConfig, type VerifierConfig } from './config/verifier-config.js';
export { main as runCli } from './cli/main.js';
