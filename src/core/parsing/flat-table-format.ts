/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseCsvTable } from '../../tools/csv.js';
import type { DataTable, MetadataKey } from '../types.js';
import { assignField, createDraft } from './metadata-keys.js';
import type { TextFormatStrategy } from './strategy.js';

/** Recognized serial columns, in lookup order. */
export const SERIAL_COLUMN_NAMES = [
  'Pump Serial No',
  'Serial No',
  'SerialNo',
  'Serial Number',
  'Serial_No',
] as const;

const METADATA_COLUMNS: ReadonlyArray<[string, MetadataKey]> = [
  ['Model', 'model'],
  ['Software Version', 'softwareVersion'],
  ['Firmware Version', 'firmwareVersion'],
  ['Date', 'date'],
];

const tryParseTable = (text: string): DataTable | undefined => {
  try {
    return parseCsvTable(text);
  } catch {
    // ragged rows mean this is not a single flat table
    return undefined;
  }
};

export const flatTableFormat: TextFormatStrategy = {
  format: 'flat-table',

  applies: (source) => source.text.trim().length > 0,

  parse(source) {
    const table = tryParseTable(source.text);
    if (!table) {
      return undefined;
    }
    const serialColumn = SERIAL_COLUMN_NAMES.find((name) => table.columns.includes(name));
    const firstRow = table.rows[0];
    if (!serialColumn || !firstRow) {
      return undefined;
    }

    const cell = (column: string): string | undefined => {
      const index = table.columns.indexOf(column);
      return index >= 0 ? firstRow[index] : undefined;
    };

    const draft = createDraft();
    assignField(draft, 'serialNumber', cell(serialColumn) ?? '');
    for (const [column, key] of METADATA_COLUMNS) {
      const value = cell(column);
      if (value !== undefined) {
        assignField(draft, key, value);
      }
    }

    return {
      sourcePath: source.sourcePath,
      format: 'flat-table',
      serialNumber: draft.serialNumber,
      metadata: draft.metadata,
      configTable: table,
    };
  },
};
