/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type VerificationErrorCode =
  | 'parse-failure'
  | 'reference-load-failure'
  | 'report-write-failure'
  | 'export-failure'
  | 'invalid-config';

/**
 * Base class for failures that abort a single step of a verification run.
 */
export abstract class VerificationError extends Error {
  abstract readonly code: VerificationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input file is unreadable or matches none of the known log layouts. */
export class ParseError extends VerificationError {
  readonly code = 'parse-failure';

  constructor(
    message: string,
    readonly sourcePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The master list is absent, empty, or missing a required column. */
export class ReferenceLoadError extends VerificationError {
  readonly code = 'reference-load-failure';
}

/** The result folder or the report document could not be written. */
export class ReportError extends VerificationError {
  readonly code = 'report-write-failure';
}

export class ExportError extends VerificationError {
  readonly code = 'export-failure';
}

export class ConfigError extends VerificationError {
  readonly code = 'invalid-config';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}
