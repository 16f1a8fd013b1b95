/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { ReferenceLoadError } from '../errors.js';
import { describeError, logConsole } from '../logging.js';
import { digits } from '../serial.js';
import type { MasterRecord, VerificationOutcome } from '../types.js';
import { fileExists } from '../../tools/files.js';
import { isBlankRow, readFirstSheet } from '../../tools/spreadsheet.js';

export const MASTER_COLUMNS = {
  serial: 'Pump_Serial_No',
  targetConfigTag: 'Target_Config_Tag',
  parameterMatch: 'Parameter_Match',
  sectionMatch: 'Section_Match',
  targetValue: 'Target_Value',
  originalValue: 'Original_Value',
  section: 'Section',
} as const;

export interface MasterTable {
  path: string;
  records: readonly MasterRecord[];
}

/**
 * Anything that can check a serial against the master list.
 */
export interface SerialVerifier {
  verify(serialNumber: string, expectedTag?: string | null): Promise<VerificationOutcome>;
}

export async function loadMasterTable(masterListPath: string): Promise<MasterTable> {
  if (!(await fileExists(masterListPath))) {
    throw new ReferenceLoadError(`Master list file not found: ${masterListPath}`);
  }
  let grid: string[][];
  try {
    grid = (await readFirstSheet(masterListPath)).filter((row) => !isBlankRow(row));
  } catch (error) {
    throw new ReferenceLoadError(`Unable to read master list: ${describeError(error)}`, {
      cause: error,
    });
  }

  const [header, ...body] = grid;
  if (!header || body.length === 0) {
    throw new ReferenceLoadError('Master list is empty');
  }
  const columns = header.map((cell) => cell.trim());
  const serialIndex = columns.indexOf(MASTER_COLUMNS.serial);
  if (serialIndex < 0) {
    throw new ReferenceLoadError(
      `Master list missing required column '${MASTER_COLUMNS.serial}'`,
    );
  }

  const read = (row: string[], column: string): string => {
    const index = columns.indexOf(column);
    return index >= 0 ? (row[index] ?? '').trim() : '';
  };

  const records = body.map(
    (row): MasterRecord =>
      Object.freeze({
        serialNumber: read(row, MASTER_COLUMNS.serial),
        serialDigits: digits(read(row, MASTER_COLUMNS.serial)),
        targetConfigTag: read(row, MASTER_COLUMNS.targetConfigTag),
        parameterMatch: read(row, MASTER_COLUMNS.parameterMatch),
        sectionMatch: read(row, MASTER_COLUMNS.sectionMatch),
        targetValue: read(row, MASTER_COLUMNS.targetValue),
        originalValue: read(row, MASTER_COLUMNS.originalValue),
        section: read(row, MASTER_COLUMNS.section),
      }),
  );
  return { path: masterListPath, records: Object.freeze(records) };
}

/**
 * Verifies serial numbers against the master configuration list.
 *
 * The list is read on first use and cached for the lifetime of the
 * instance; build a new verifier to pick up an edited file. A failed load is
 * not cached, so every verification fails until the file is fixed.
 */
export class MasterVerifier implements SerialVerifier {
  readonly masterListPath: string;
  private table?: MasterTable;
  private pending?: Promise<MasterTable>;

  constructor(masterListPath: string) {
    this.masterListPath = resolve(masterListPath);
  }

  /**
   * @throws ReferenceLoadError
   */
  async load(): Promise<MasterTable> {
    if (this.table) {
      return this.table;
    }
    if (!this.pending) {
      this.pending = loadMasterTable(this.masterListPath)
        .then((table) => {
          this.table = table;
          this.warnOnDuplicates();
          return table;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }
    return this.pending;
  }

  /**
   * Digit keys that appear on more than one row. Matching still takes the
   * first row; this only exists so callers can warn about it.
   */
  duplicateSerials(): string[] {
    const seen = new Map<string, number>();
    for (const record of this.table?.records ?? []) {
      if (record.serialDigits) {
        seen.set(record.serialDigits, (seen.get(record.serialDigits) ?? 0) + 1);
      }
    }
    return [...seen].filter(([, count]) => count > 1).map(([key]) => key);
  }

  private warnOnDuplicates(): void {
    const duplicates = this.duplicateSerials();
    if (duplicates.length > 0) {
      logConsole('warn', 'Master list has repeated serials; first row wins', [
        ['path', this.masterListPath],
        ['serial digits', duplicates.join(', ')],
      ]);
    }
  }

  async verify(serialNumber: string, expectedTag?: string | null): Promise<VerificationOutcome> {
    let table: MasterTable;
    try {
      table = await this.load();
    } catch (error) {
      return {
        isPass: false,
        configTag: null,
        error: `Failed to load master list: ${describeError(error)}`,
      };
    }

    const serialDigits = digits(serialNumber);
    if (!serialDigits) {
      return {
        isPass: false,
        configTag: null,
        error: `Invalid serial number format: ${serialNumber}`,
      };
    }

    const match = table.records.find((record) => record.serialDigits === serialDigits);
    if (!match) {
      return {
        isPass: false,
        configTag: null,
        error: `Serial number ${serialNumber} not found in master list.`,
      };
    }

    const configTag = match.targetConfigTag;
    const expected = expectedTag?.trim();
    if (expected && expected.toUpperCase() !== configTag.toUpperCase()) {
      return {
        isPass: false,
        configTag,
        error: `Config tag mismatch: Expected ${configTag}, but found ${expected}.`,
      };
    }

    return { isPass: true, configTag, detail: match };
  }
}
