/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReferenceLoadError } from '../errors.js';
import { writeWorkbook, type CellValue } from '../../testing/workbooks.js';
import { loadMasterTable, MasterVerifier } from './master-verifier.js';

const HEADER = [
  'Pump_Serial_No',
  'Target_Config_Tag',
  'Parameter_Match',
  'Section_Match',
  'Target_Value',
  'Original_Value',
  'Section',
];

describe('MasterVerifier', () => {
  let workDir: string;
  let masterPath: string;

  const writeMaster = (rows: CellValue[][]): Promise<void> => writeWorkbook(masterPath, rows);

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'master-test-'));
    masterPath = join(workDir, 'master.xlsx');
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('passes a serial whose digits are on the list', async () => {
    await writeMaster([HEADER, [1020030405, 'CFG-A', 'Rate', 'Flow', '12', '10', 'Flow']]);
    const verifier = new MasterVerifier(masterPath);

    const outcome = await verifier.verify('EDW1020030405');

    expect(outcome).toEqual({
      isPass: true,
      configTag: 'CFG-A',
      detail: {
        serialNumber: '1020030405',
        serialDigits: '1020030405',
        targetConfigTag: 'CFG-A',
        parameterMatch: 'Rate',
        sectionMatch: 'Flow',
        targetValue: '12',
        originalValue: '10',
        section: 'Flow',
      },
    });
  });

  it('takes the first of several matching rows and warns', async () => {
    await writeMaster([HEADER, ['EDW-77', 'CFG-A'], ['X77', 'CFG-B']]);
    const verifier = new MasterVerifier(masterPath);

    const outcome = await verifier.verify('77');

    expect(outcome.isPass).toBe(true);
    expect(outcome.configTag).toBe('CFG-A');
    expect(verifier.duplicateSerials()).toEqual(['77']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('reports serials that are not on the list', async () => {
    await writeMaster([HEADER, ['1020030405', 'CFG-A']]);

    const outcome = await new MasterVerifier(masterPath).verify('EDW5');

    expect(outcome).toEqual({
      isPass: false,
      configTag: null,
      error: 'Serial number EDW5 not found in master list.',
    });
  });

  it('rejects serials without digits', async () => {
    await writeMaster([HEADER, ['1020030405', 'CFG-A']]);

    const outcome = await new MasterVerifier(masterPath).verify('ABC');

    expect(outcome).toEqual({ isPass: false, configTag: null, error: 'Invalid serial number format: ABC' });
  });

  it('compares an expected tag without regard to case', async () => {
    await writeMaster([HEADER, ['1020030405', 'CFG-A']]);
    const verifier = new MasterVerifier(masterPath);

    expect((await verifier.verify('EDW1020030405', 'cfg-a')).isPass).toBe(true);
    expect(await verifier.verify('EDW1020030405', 'cfg-b')).toEqual({
      isPass: false,
      configTag: 'CFG-A',
      error: 'Config tag mismatch: Expected CFG-A, but found cfg-b.',
    });
  });

  it('fails every verification while the list cannot be loaded, then recovers', async () => {
    const verifier = new MasterVerifier(masterPath);

    expect(await verifier.verify('EDW1')).toEqual({
      isPass: false,
      configTag: null,
      error: `Failed to load master list: Master list file not found: ${masterPath}`,
    });

    await writeMaster([HEADER, ['EDW1', 'CFG-A']]);
    expect((await verifier.verify('EDW1')).isPass).toBe(true);
  });

  it('keeps the list it loaded first', async () => {
    await writeMaster([HEADER, ['EDW1', 'CFG-A']]);
    const verifier = new MasterVerifier(masterPath);
    await verifier.verify('EDW1');

    await writeMaster([HEADER, ['EDW2', 'CFG-B']]);

    expect((await verifier.verify('EDW1')).configTag).toBe('CFG-A');
    expect((await verifier.verify('EDW2')).isPass).toBe(false);
  });

  it('shares one load between concurrent callers', async () => {
    await writeMaster([HEADER, ['EDW1', 'CFG-A']]);
    const verifier = new MasterVerifier(masterPath);

    const [first, second] = await Promise.all([verifier.load(), verifier.load()]);

    expect(first).toBe(second);
  });
});

describe('loadMasterTable', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'master-load-test-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('requires the serial column', async () => {
    const filePath = join(workDir, 'no-serial.xlsx');
    await writeWorkbook(filePath, [
      ['Serial', 'Target_Config_Tag'],
      ['1', 'CFG-A'],
    ]);

    await expect(loadMasterTable(filePath)).rejects.toThrow(
      "Master list missing required column 'Pump_Serial_No'",
    );
  });

  it('rejects a list with no data rows', async () => {
    const filePath = join(workDir, 'empty.xlsx');
    await writeWorkbook(filePath, [HEADER]);

    await expect(loadMasterTable(filePath)).rejects.toBeInstanceOf(ReferenceLoadError);
    await expect(loadMasterTable(filePath)).rejects.toThrow('Master list is empty');
  });

  it('fills missing detail columns with empty strings', async () => {
    const filePath = join(workDir, 'minimal.xlsx');
    await writeWorkbook(filePath, [
      ['Pump_Serial_No', 'Target_Config_Tag'],
      ['EDW-9', 'CFG-Z'],
    ]);

    const table = await loadMasterTable(filePath);

    expect(table.records).toEqual([
      {
        serialNumber: 'EDW-9',
        serialDigits: '9',
        targetConfigTag: 'CFG-Z',
        parameterMatch: '',
        sectionMatch: '',
        targetValue: '',
        originalValue: '',
        section: '',
      },
    ]);
  });
});
