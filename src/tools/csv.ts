/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DataTable } from '../core/types.js';

const UTF8_BOM = '\uFEFF';

/**
 * Splits comma-separated text into records. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks. Blank lines are skipped.
 */
export function parseCsvRecords(text: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRecord = (): void => {
    record.push(field);
    field = '';
    const blank = record.length === 1 && record[0].trim().length === 0;
    if (!blank) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }
    if (ch === '"' && field.length === 0) {
      inQuotes = true;
    } else if (ch === delimiter) {
      record.push(field);
      field = '';
    } else if (ch === '\n') {
      endRecord();
    } else if (ch !== '\r') {
      field += ch;
    }
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }
  return records;
}

export const parseCsvLine = (line: string, delimiter = ','): string[] =>
  parseCsvRecords(line, delimiter)[0] ?? [];

/**
 * Builds a table from records, using the first record as the header.
 * Short rows are padded; a row wider than the header throws.
 */
export function recordsToTable(records: string[][]): DataTable {
  const [header, ...body] = records;
  if (!header) {
    return { columns: [], rows: [] };
  }
  const columns = header.map((name) => name.trim());
  const rows = body.map((record, index) => {
    if (record.length > columns.length) {
      throw new Error(
        `Expected ${columns.length} fields in line ${index + 2}, saw ${record.length}`,
      );
    }
    return [...record, ...new Array<string>(columns.length - record.length).fill('')];
  });
  return { columns, rows };
}

export const parseCsvTable = (text: string): DataTable => recordsToTable(parseCsvRecords(text));

export const formatCsvValue = (value: string, delimiter = ','): string => {
  const needsQuoting =
    value.includes(delimiter) ||
    value.includes('\n') ||
    value.includes('\r') ||
    value.includes('"') ||
    value.includes("'");
  if (!needsQuoting) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
};

export const formatCsvRow = (values: string[], delimiter = ','): string =>
  values.map((value) => formatCsvValue(value, delimiter)).join(delimiter);

export interface SerializeTableOptions {
  delimiter?: string;
  byteOrderMark?: boolean;
}

export function serializeTable(table: DataTable, options: SerializeTableOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const prefix = options.byteOrderMark ? UTF8_BOM : '';
  if (table.columns.length === 0) {
    return prefix;
  }
  const lines = [table.columns, ...table.rows].map((row) => formatCsvRow(row, delimiter));
  return `${prefix}${lines.join('\n')}\n`;
}
