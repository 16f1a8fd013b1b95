/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './serial.js';
export { logConsole, describeError, type LogLevel, type LogField } from './logging.js';
export {
  createLogParser,
  parseLogFile,
  parseLogText,
  TEXT_FORMAT_STRATEGIES,
  type LogParser,
  type LogParserOptions,
} from './parsing/log-parser.js';
export type { TextFormatStrategy, TextLogSource } from './parsing/strategy.js';
export {
  MasterVerifier,
  loadMasterTable,
  MASTER_COLUMNS,
  type MasterTable,
  type SerialVerifier,
} from './verification/master-verifier.js';
export * from './pipeline/index.js';
