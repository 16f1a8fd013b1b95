/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogFormat, ParsedLog } from '../types.js';

export interface TextLogSource {
  sourcePath: string;
  text: string;
  lines: string[];
}

/**
 * One candidate layout for text logs. `applies` is a cheap predicate;
 * `parse` may still return `undefined` when the content does not fit.
 */
export interface TextFormatStrategy {
  readonly format: LogFormat;
  applies(source: TextLogSource): boolean;
  parse(source: TextLogSource): ParsedLog | undefined;
}

export const nonEmptyCommaLines = (lines: string[]): string[] =>
  lines.map((line) => line.trim()).filter((line) => line.length > 0 && line.includes(','));
