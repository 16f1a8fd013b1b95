/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { VerificationPipeline, type VerificationPipelineDeps } from './pipeline.js';
export {
  createPipeline,
  createResultSink,
  processLogFile,
  type CreatePipelineOptions,
  type PipelineConfig,
} from './factory.js';

export type { PipelineObserver, PipelineStage, ProcessOutcome, StageEvent } from '../../types/observer.js';
