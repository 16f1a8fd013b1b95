/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describeError, logConsole } from '../core/logging.js';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a text file as strict UTF-8. A leading byte-order mark is dropped and
 * malformed byte sequences throw a `TypeError`.
 */
export const readTextFile = async (filePath: string): Promise<string> => {
  const buffer = await fs.readFile(filePath);
  return strictUtf8.decode(buffer);
};

export const splitLines = (text: string): string[] => text.split(/\r?\n/);

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const isRegularFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

export interface TempFileOptions {
  suffix?: string;
  tempRoot?: string;
}

/**
 * Writes `contents` to a fresh temporary file, hands its path to `use`, and
 * removes the file afterwards whether `use` resolves or rejects.
 */
export async function withTempFile<T>(
  contents: string,
  use: (filePath: string) => Promise<T>,
  options: TempFileOptions = {},
): Promise<T> {
  const directory = await fs.mkdtemp(join(options.tempRoot ?? tmpdir(), 'pump-verify-'));
  const filePath = join(directory, `converted${options.suffix ?? '.csv'}`);
  try {
    await fs.writeFile(filePath, contents, 'utf8');
    return await use(filePath);
  } finally {
    try {
      await fs.rm(directory, { recursive: true, force: true });
    } catch (error) {
      logConsole('warn', 'Failed to delete temp file', [
        ['path', filePath],
        ['error', describeError(error)],
      ]);
    }
  }
}
