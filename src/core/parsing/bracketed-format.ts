/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseCsvTable } from '../../tools/csv.js';
import { emptyTable } from '../types.js';
import { assignByKey, createDraft } from './metadata-keys.js';
import { nonEmptyCommaLines, type TextFormatStrategy } from './strategy.js';

interface KeyValue {
  key: string;
  value: string;
}

const cutAt = (value: string, marker: string): string => value.split(marker)[0].trim();

/**
 * Splits `Key: Value` or `Key = Value` lines. Units and annotations after
 * `=` or `(` are dropped from the value.
 */
export function splitKeyValue(line: string): KeyValue | undefined {
  const colon = line.indexOf(':');
  if (colon >= 0) {
    const value = cutAt(cutAt(line.slice(colon + 1), '='), '(');
    return { key: line.slice(0, colon).trim(), value };
  }
  const equals = line.indexOf('=');
  if (equals >= 0) {
    return { key: line.slice(0, equals).trim(), value: cutAt(line.slice(equals + 1), '(') };
  }
  return undefined;
}

/**
 * A header row has more than two fields and no digit in the first three
 * characters of its first field.
 */
export function looksLikeTableHeader(line: string): boolean {
  const parts = line.split(',');
  return parts.length > 2 && !/[0-9]/.test(parts[0].trim().slice(0, 3));
}

const isSectionHeader = (line: string): boolean => line.startsWith('[') && line.endsWith(']');

export const bracketedSectionFormat: TextFormatStrategy = {
  format: 'bracketed-section',

  applies: (source) => (source.lines[0] ?? '').trim().startsWith('['),

  parse(source) {
    const draft = createDraft();
    let section: string | undefined;
    let tableStart: number | undefined;

    for (let index = 0; index < source.lines.length; index += 1) {
      const line = source.lines[index].trim();
      if (!line) {
        continue;
      }
      if (isSectionHeader(line)) {
        section = line.slice(1, -1);
        continue;
      }
      if (line.includes(',') && looksLikeTableHeader(line)) {
        tableStart = index;
        break;
      }
      const pair = splitKeyValue(line);
      if (pair) {
        assignByKey(draft, pair.key, pair.value, section);
      }
    }

    const configTable =
      tableStart === undefined
        ? emptyTable()
        : parseCsvTable(nonEmptyCommaLines(source.lines.slice(tableStart)).join('\n'));

    return {
      sourcePath: source.sourcePath,
      format: 'bracketed-section',
      serialNumber: draft.serialNumber,
      metadata: draft.metadata,
      configTable,
    };
  },
};
