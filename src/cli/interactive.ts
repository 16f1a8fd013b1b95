/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts, { type PromptObject } from 'prompts';
import type { RunnerOptions } from './args.js';

type SetupField = 'inputPath' | 'masterListPath' | 'outputFolder' | 'watchFolder' | 'syncEndpoint' | 'timeZone';

const textAnswer = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;

export function buildSetupQuestions(options: RunnerOptions): Array<PromptObject<SetupField>> {
  return [
    {
      type: options.watch ? null : 'text',
      name: 'inputPath',
      message: 'Path to the pump log to verify (.csv, .xlsx, .xls)',
      initial: options.inputPath,
    },
    {
      type: 'text',
      name: 'masterListPath',
      message: 'Path to the master configuration list',
      initial: options.masterListPath,
    },
    {
      type: 'text',
      name: 'outputFolder',
      message: 'Folder for verification results',
      initial: options.outputFolder,
    },
    {
      type: options.watch ? 'text' : null,
      name: 'watchFolder',
      message: 'Folder to watch for new logs',
      initial: options.watchFolder,
    },
    {
      type: 'text',
      name: 'syncEndpoint',
      message: 'Result sync endpoint URL (leave empty to skip)',
      initial: options.syncEndpoint,
    },
    {
      type: 'text',
      name: 'timeZone',
      message: 'Reporting time zone',
      initial: options.timeZone,
    },
  ];
}

/**
 * Applies prompt answers to `options`; blank answers keep the current value.
 */
export function applySetupAnswers(options: RunnerOptions, answers: Record<string, unknown>): void {
  options.inputPath = textAnswer(answers['inputPath']) ?? options.inputPath;
  options.masterListPath = textAnswer(answers['masterListPath']) ?? options.masterListPath;
  options.outputFolder = textAnswer(answers['outputFolder']) ?? options.outputFolder;
  options.watchFolder = textAnswer(answers['watchFolder']) ?? options.watchFolder;
  options.syncEndpoint = textAnswer(answers['syncEndpoint']) ?? options.syncEndpoint;
  options.timeZone = textAnswer(answers['timeZone']) ?? options.timeZone;
}

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const answers = await prompts(buildSetupQuestions(options), {
    onCancel: () => {
      console.log('Interactive setup cancelled.');
      process.exit(1);
    },
  });
  applySetupAnswers(options, answers);
}
