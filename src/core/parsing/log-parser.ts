/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { extname } from 'node:path';
import { ParseError } from '../errors.js';
import { describeError } from '../logging.js';
import type { ParsedLog } from '../types.js';
import { readTextFile, splitLines } from '../../tools/files.js';
import { SPREADSHEET_EXTENSIONS } from '../../tools/spreadsheet.js';
import { bracketedSectionFormat } from './bracketed-format.js';
import { flatTableFormat } from './flat-table-format.js';
import { headerBlockFormat } from './header-block-format.js';
import { parseSpreadsheetLog } from './spreadsheet-format.js';
import type { TextFormatStrategy, TextLogSource } from './strategy.js';

/** Text layouts in detection order. */
export const TEXT_FORMAT_STRATEGIES: readonly TextFormatStrategy[] = [
  bracketedSectionFormat,
  flatTableFormat,
  headerBlockFormat,
];

export interface LogParserOptions {
  /** Directory for the temporary file written while converting workbooks. */
  tempRoot?: string;
  strategies?: readonly TextFormatStrategy[];
}

export type LogParser = (filePath: string) => Promise<ParsedLog>;

export function parseLogText(
  source: TextLogSource,
  strategies: readonly TextFormatStrategy[] = TEXT_FORMAT_STRATEGIES,
): ParsedLog | undefined {
  for (const strategy of strategies) {
    if (!strategy.applies(source)) {
      continue;
    }
    const parsed = strategy.parse(source);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

async function loadTextSource(filePath: string): Promise<TextLogSource> {
  let text: string;
  try {
    text = await readTextFile(filePath);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ParseError('file is not UTF-8 text', filePath, { cause: error });
    }
    throw error;
  }
  if (text.includes('\u0000')) {
    throw new ParseError('file contains binary data', filePath);
  }
  return { sourcePath: filePath, text, lines: splitLines(text) };
}

const freezeParsedLog = (log: ParsedLog): ParsedLog => {
  log.configTable.rows.forEach((row) => Object.freeze(row));
  Object.freeze(log.configTable.rows);
  Object.freeze(log.configTable.columns);
  Object.freeze(log.configTable);
  Object.freeze(log.metadata);
  return Object.freeze(log);
};

/**
 * Reads a pump log in any supported layout. Spreadsheets go through the
 * workbook reader first; text files are matched against
 * {@link TEXT_FORMAT_STRATEGIES} in order.
 *
 * A missing serial number is not an error here; callers decide.
 *
 * @throws ParseError when the file cannot be read or matches no layout.
 */
export async function parseLogFile(
  filePath: string,
  options: LogParserOptions = {},
): Promise<ParsedLog> {
  const strategies = options.strategies ?? TEXT_FORMAT_STRATEGIES;
  try {
    const parsed = SPREADSHEET_EXTENSIONS.has(extname(filePath).toLowerCase())
      ? await parseSpreadsheetLog(filePath, {
          tempRoot: options.tempRoot,
          parseText: (source) => parseLogText(source, strategies),
        })
      : parseLogText(await loadTextSource(filePath), strategies);
    if (!parsed) {
      throw new ParseError('unrecognized log layout', filePath);
    }
    return freezeParsedLog(parsed);
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    throw new ParseError(describeError(error), filePath, { cause: error });
  }
}

export const createLogParser =
  (options: LogParserOptions = {}): LogParser =>
  (filePath) =>
    parseLogFile(filePath, options);
