/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogFormat = 'spreadsheet-table' | 'bracketed-section' | 'flat-table' | 'header-block';

export interface LogMetadata {
  model?: string;
  softwareVersion?: string;
  firmwareVersion?: string;
  date?: string;
  toolName?: string;
}

export type MetadataKey = keyof LogMetadata;

/**
 * Ordered parameter table taken from a log. Rows are padded to the column count.
 */
export interface DataTable {
  columns: string[];
  rows: string[][];
}

/**
 * Normalized view of one source log, built fresh per input file.
 */
export interface ParsedLog {
  sourcePath: string;
  format: LogFormat;
  serialNumber?: string;
  metadata: LogMetadata;
  configTable: DataTable;
}

/**
 * One row of the master reference list.
 */
export interface MasterRecord {
  serialDigits: string;
  serialNumber: string;
  targetConfigTag: string;
  parameterMatch: string;
  sectionMatch: string;
  targetValue: string;
  originalValue: string;
  section: string;
}

export type VerificationOutcome =
  | { isPass: true; configTag: string; detail: MasterRecord }
  | { isPass: false; configTag: string | null; error: string };

export type VerdictLabel = 'PASS' | 'FAIL';

/** Tag recorded for a serial that has no row in the master list. */
export const UNMATCHED_CONFIG_TAG = 'N/A';

export const verdictLabel = (isPass: boolean): VerdictLabel => (isPass ? 'PASS' : 'FAIL');

export const emptyTable = (): DataTable => ({ columns: [], rows: [] });

/**
 * Verification result as carried through reporting and sync. Unmatched
 * serials get {@link UNMATCHED_CONFIG_TAG}.
 */
export interface Verdict {
  isPass: boolean;
  configTag: string;
  detail?: MasterRecord;
  error?: string;
}

export const toVerdict = (outcome: VerificationOutcome): Verdict =>
  outcome.isPass
    ? { isPass: true, configTag: outcome.configTag, detail: outcome.detail }
    : {
        isPass: false,
        configTag: outcome.configTag ?? UNMATCHED_CONFIG_TAG,
        error: outcome.error,
      };
