/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const DEFAULT_SHORT_SERIAL_LENGTH = 20;

/**
 * Returns every decimal digit run in `serial`, concatenated in order.
 * Two serials identify the same pump iff their digit strings are equal.
 *
 * @example digits('EDW12-345') === '12345'
 */
export const digits = (serial: string): string => (serial.match(/[0-9]+/g) ?? []).join('');

/**
 * Truncates a serial for use in file names. No other transformation.
 */
export const shorten = (serial: string, maxLength: number = DEFAULT_SHORT_SERIAL_LENGTH): string =>
  serial.length > maxLength ? serial.slice(0, maxLength) : serial;

const UNSAFE_PATH_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Replaces characters that cannot appear in a single path segment.
 */
export const toPathSegment = (value: string): string => value.replace(UNSAFE_PATH_CHARS, '_');
