/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogField = [string, string | number | boolean | undefined | null];

const LOG_PREFIX = '[pump-verify]';

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 */
export const logConsole = (level: LogLevel, label: string, fields: LogField[] = []): void => {
  const filtered = fields.filter(
    (field): field is [string, string | number | boolean] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`${LOG_PREFIX} ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
