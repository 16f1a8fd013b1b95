/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { PipelineObserver } from '../../types/observer.js';
import { ReportBuilder } from '../../report/report-builder.js';
import { HttpResultSink, type ResultSink } from '../../sync/result-sink.js';
import { createLogParser } from '../parsing/log-parser.js';
import { MasterVerifier } from '../verification/master-verifier.js';
import { VerificationPipeline } from './pipeline.js';

/**
 * Settings one verification run needs.
 */
export interface PipelineConfig {
  masterListPath: string;
  outputFolder: string;
  syncEndpoint?: string;
  syncTarget?: string;
  syncTimeoutMs?: number;
  timeZone?: string;
}

export interface CreatePipelineOptions {
  observer?: PipelineObserver;
  sink?: ResultSink;
  now?: () => Date;
  tempRoot?: string;
}

export function createResultSink(config: PipelineConfig): ResultSink | undefined {
  if (!config.syncEndpoint) {
    return undefined;
  }
  return new HttpResultSink({
    endpoint: config.syncEndpoint,
    target: config.syncTarget,
    timeoutMs: config.syncTimeoutMs,
  });
}

/**
 * Wires a pipeline from configuration. The master list is cached by the
 * verifier, so reuse the returned pipeline across files.
 */
export function createPipeline(
  config: PipelineConfig,
  options: CreatePipelineOptions = {},
): VerificationPipeline {
  return new VerificationPipeline({
    verifier: new MasterVerifier(config.masterListPath),
    reporter: new ReportBuilder({ outputFolder: config.outputFolder, timeZone: config.timeZone }),
    parseLog: createLogParser({ tempRoot: options.tempRoot }),
    sink: options.sink ?? createResultSink(config),
    observer: options.observer,
    now: options.now,
  });
}

/**
 * Verifies one log file with a freshly loaded master list.
 */
export async function processLogFile(
  logFilePath: string,
  config: PipelineConfig,
  options: CreatePipelineOptions = {},
): Promise<{ success: boolean; message: string }> {
  const { success, message } = await createPipeline(config, options).process(logFilePath);
  return { success, message };
}
