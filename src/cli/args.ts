/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ConfigOverrides } from '../config/verifier-config.js';

export interface RunnerOptions {
  inputPath?: string;
  watch: boolean;
  watchFolder?: string;
  masterListPath?: string;
  outputFolder?: string;
  syncEndpoint?: string;
  syncTarget?: string;
  timeZone?: string;
  interactive?: boolean;
}

const takeValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = { watch: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
        options.inputPath = takeValue(argv, ++i, arg);
        break;
      case '--watch':
      case '-w': {
        options.watch = true;
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          options.watchFolder = next;
          i += 1;
        }
        break;
      }
      case '--master':
      case '-m':
        options.masterListPath = takeValue(argv, ++i, arg);
        break;
      case '--output':
      case '-o':
        options.outputFolder = takeValue(argv, ++i, arg);
        break;
      case '--sync-endpoint':
        options.syncEndpoint = takeValue(argv, ++i, arg);
        break;
      case '--sync-target':
        options.syncTarget = takeValue(argv, ++i, arg);
        break;
      case '--timezone':
        options.timeZone = takeValue(argv, ++i, arg);
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};

export const toConfigOverrides = (options: RunnerOptions): ConfigOverrides => ({
  masterListPath: options.masterListPath,
  outputFolder: options.outputFolder,
  watchFolder: options.watchFolder,
  syncEndpoint: options.syncEndpoint,
  syncTarget: options.syncTarget,
  timeZone: options.timeZone,
});
