/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Observer interfaces shared by the pipeline, the watcher and the UI.
 */

import type { Verdict } from '../core/types.js';

export type PipelineStage =
  | 'parsing'
  | 'serial-check'
  | 'verifying'
  | 'reporting'
  | 'exporting'
  | 'archiving'
  | 'syncing'
  | 'done'
  | 'failed';

export interface StageEvent {
  stage: PipelineStage;
  sourcePath: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface ProcessOutcome {
  success: boolean;
  message: string;
  sourcePath: string;
  /** Stage that ended the run; `done` on success. */
  stage: PipelineStage;
  serialNumber?: string;
  verdict?: Verdict;
  resultFolder?: string;
  reportPath?: string;
  verifiedAt?: Date;
  synced?: boolean;
}

export interface PipelineObserver {
  onStage?(event: StageEvent): void;
  onOutcome?(outcome: ProcessOutcome): void;
}

export interface WatchObserver {
  onQueued?(info: { filePath: string; depth: number }): void;
  onIgnored?(info: { filePath: string; reason: string }): void;
  onProcessed?(outcome: ProcessOutcome): void;
}
