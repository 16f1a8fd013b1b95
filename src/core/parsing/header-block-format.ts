/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseCsvLine, parseCsvTable } from '../../tools/csv.js';
import { assignField, classifyHeaderKey, createDraft, isDraftEmpty } from './metadata-keys.js';
import { nonEmptyCommaLines, type TextFormatStrategy } from './strategy.js';

const TABLE_MARKER = 'Section';

/**
 * Leading `key,value` lines followed by a table whose header row starts
 * with `Section`.
 */
export const headerBlockFormat: TextFormatStrategy = {
  format: 'header-block',

  applies: () => true,

  parse(source) {
    const draft = createDraft();
    for (const rawLine of source.lines) {
      const line = rawLine.trim();
      if (!line || line.startsWith(TABLE_MARKER)) {
        break;
      }
      if (line.includes(',')) {
        const [key = '', value = ''] = parseCsvLine(line);
        const field = classifyHeaderKey(key);
        if (field) {
          assignField(draft, field, value);
        }
      }
    }

    const tableStart = source.lines.findIndex((line) => line.trim().startsWith(TABLE_MARKER));
    const configTable = parseCsvTable(
      tableStart < 0 ? '' : nonEmptyCommaLines(source.lines.slice(tableStart)).join('\n'),
    );

    if (isDraftEmpty(draft) && configTable.columns.length === 0) {
      return undefined;
    }
    return {
      sourcePath: source.sourcePath,
      format: 'header-block',
      serialNumber: draft.serialNumber,
      metadata: draft.metadata,
      configTable,
    };
  },
};
