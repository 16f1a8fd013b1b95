/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { formatCsvRow } from '../../tools/csv.js';
import { readTextFile, splitLines, withTempFile } from '../../tools/files.js';
import { isBlankRow, readFirstSheet, type SheetGrid } from '../../tools/spreadsheet.js';
import type { MetadataKey, ParsedLog } from '../types.js';
import { assignField, createDraft } from './metadata-keys.js';
import type { TextLogSource } from './strategy.js';

const HEADER_TOKENS = ['serial', 'pump', 'model', 'version'];

export interface SpreadsheetParseOptions {
  /** Parses the sheet re-serialized as comma-separated text. */
  parseText(source: TextLogSource): ParsedLog | undefined;
  tempRoot?: string;
}

/**
 * A first row reads as a header when it has more than two filled cells and
 * mentions one of the header tokens.
 */
export function isHeaderRow(row: string[]): boolean {
  const filled = row.map((cell) => cell.trim()).filter((cell) => cell.length > 0);
  if (filled.length <= 2) {
    return false;
  }
  const joined = filled.join(' ').toLowerCase();
  return HEADER_TOKENS.some((token) => joined.includes(token));
}

const headerField = (column: string): MetadataKey | 'serialNumber' | undefined => {
  const lower = column.toLowerCase();
  if (lower.includes('serial') && (lower.includes('no') || lower.includes('number'))) {
    return 'serialNumber';
  }
  if (lower.includes('model')) {
    return 'model';
  }
  if (lower.includes('software') && lower.includes('version')) {
    return 'softwareVersion';
  }
  if (lower.includes('firmware') && lower.includes('version')) {
    return 'firmwareVersion';
  }
  if (lower.includes('date')) {
    return 'date';
  }
  return undefined;
};

function parseHeaderedSheet(sourcePath: string, grid: SheetGrid): ParsedLog {
  const [header, ...body] = grid;
  const columns = header.map((cell) => cell.trim());
  const rows = body.map((row) =>
    columns.map((_, index) => row[index] ?? ''),
  );
  const record = rows[0];
  const draft = createDraft();

  // Only the first serial column counts; metadata columns later in the row win.
  const serialIndex = columns.findIndex((column) => headerField(column) === 'serialNumber');
  if (serialIndex >= 0) {
    assignField(draft, 'serialNumber', record[serialIndex]);
  }
  columns.forEach((column, index) => {
    const field = headerField(column);
    if (field && field !== 'serialNumber') {
      assignField(draft, field, record[index]);
    }
  });

  return {
    sourcePath,
    format: 'spreadsheet-table',
    serialNumber: draft.serialNumber,
    metadata: draft.metadata,
    configTable: { columns, rows },
  };
}

const trimTrailingBlanks = (row: string[]): string[] => {
  let end = row.length;
  while (end > 0 && row[end - 1].trim().length === 0) {
    end -= 1;
  }
  return row.slice(0, end);
};

/**
 * Re-serializes one sheet row as a text log line. Padding cells are dropped
 * and a lone cell is written as-is, so `[SECTION]` and `Key: Value` lines
 * read the same as in a text log.
 */
export function sheetRowToLine(row: string[]): string {
  const cells = trimTrailingBlanks(row);
  if (cells.length === 1 && !/[\r\n]/.test(cells[0])) {
    return cells[0];
  }
  return formatCsvRow(cells);
}

/**
 * Parses the first worksheet of a workbook. Headered sheets are read
 * directly; anything else is written out as comma-separated text to a
 * temporary file and handed to the text layouts.
 */
export async function parseSpreadsheetLog(
  sourcePath: string,
  options: SpreadsheetParseOptions,
): Promise<ParsedLog | undefined> {
  const grid = (await readFirstSheet(sourcePath)).filter((row) => !isBlankRow(row));
  if (grid.length === 0) {
    return undefined;
  }
  if (isHeaderRow(grid[0]) && grid.length > 1) {
    return parseHeaderedSheet(sourcePath, grid);
  }

  const csvText = grid.map(sheetRowToLine).join('\n');
  return withTempFile(
    csvText,
    async (tempPath) => {
      const text = await readTextFile(tempPath);
      return options.parseText({ sourcePath, text, lines: splitLines(text) });
    },
    { suffix: '.csv', tempRoot: options.tempRoot },
  );
}
