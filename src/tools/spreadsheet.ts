/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import * as XLSX from 'xlsx';

export type SheetGrid = string[][];

export const SPREADSHEET_EXTENSIONS: ReadonlySet<string> = new Set(['.xlsx', '.xls']);

const cellToString = (cell: unknown): string => {
  if (cell === undefined || cell === null) {
    return '';
  }
  if (cell instanceof Date) {
    return cell.toISOString();
  }
  return String(cell);
};

/**
 * Reads the first worksheet of a workbook (or a CSV file SheetJS can open)
 * as a grid of strings. Numbers keep their raw value so long serials are not
 * rendered in exponent form; every other cell keeps its displayed text.
 */
export async function readFirstSheet(filePath: string): Promise<SheetGrid> {
  const buffer = await fs.readFile(filePath);
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return [];
  }
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    rawNumbers: true,
    defval: '',
    blankrows: false,
  });
  return rows.map((row) => row.map(cellToString));
}

export const isBlankRow = (row: string[]): boolean => row.every((cell) => cell.trim().length === 0);
