/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { splitLines } from '../../tools/files.js';
import { bracketedSectionFormat, looksLikeTableHeader, splitKeyValue } from './bracketed-format.js';
import { flatTableFormat } from './flat-table-format.js';
import { headerBlockFormat } from './header-block-format.js';
import { parseLogText } from './log-parser.js';
import type { TextLogSource } from './strategy.js';

const sourceOf = (text: string): TextLogSource => ({
  sourcePath: '/logs/pump.csv',
  text,
  lines: splitLines(text),
});

const BRACKETED_LOG = [
  '[SYSTEM_INFO]',
  'Serial No: EDW12-345',
  'Model Type: X1',
  'Version = 3.2 (build 7)',
  'Firmware: FW 1.0 = latest',
  'Date: 2026-10-01',
  '[PARAMETERS]',
  'Section,Parameter,Value',
  'Flow,Rate,12',
  'Flow,Limit,40',
].join('\n');

const FLAT_LOG = [
  'Pump Serial No,Model,Software Version,Firmware Version,Date,Parameter,Value',
  'EDW1020030405,X1,2.1,FW3,2026-10-01,Rate,12',
  'EDW1020030405,X1,2.1,FW3,2026-10-01,Limit,40',
].join('\n');

const HEADER_BLOCK_LOG = [
  'Serial No,EDW99',
  'Model,X2',
  'Software Version,4.0',
  '',
  'Section,Parameter,Value',
  'Flow,Rate,12',
].join('\n');

describe('splitKeyValue', () => {
  it('cuts values at = and (', () => {
    expect(splitKeyValue('Pressure: 12 (bar)')).toEqual({ key: 'Pressure', value: '12' });
    expect(splitKeyValue('Firmware: FW 1.0 = latest')).toEqual({ key: 'Firmware', value: 'FW 1.0' });
    expect(splitKeyValue('Version = 3.2 (build 7)')).toEqual({ key: 'Version', value: '3.2' });
    expect(splitKeyValue('no separator here')).toBeUndefined();
  });
});

describe('looksLikeTableHeader', () => {
  it('needs more than two fields and no leading digits', () => {
    expect(looksLikeTableHeader('Section,Parameter,Value')).toBe(true);
    expect(looksLikeTableHeader('12,Rate,40')).toBe(false);
    expect(looksLikeTableHeader('Section,Value')).toBe(false);
  });
});

describe('bracketedSectionFormat', () => {
  it('reads key/value sections and the trailing table', () => {
    const source = sourceOf(BRACKETED_LOG);
    expect(bracketedSectionFormat.applies(source)).toBe(true);
    expect(bracketedSectionFormat.parse(source)).toEqual({
      sourcePath: '/logs/pump.csv',
      format: 'bracketed-section',
      serialNumber: 'EDW12-345',
      metadata: {
        model: 'X1',
        softwareVersion: '3.2',
        firmwareVersion: 'FW 1.0',
        date: '2026-10-01',
      },
      configTable: {
        columns: ['Section', 'Parameter', 'Value'],
        rows: [
          ['Flow', 'Rate', '12'],
          ['Flow', 'Limit', '40'],
        ],
      },
    });
  });

  it('leaves the table empty without a header row', () => {
    const parsed = bracketedSectionFormat.parse(sourceOf('[SYSTEM_INFO]\nSerial No: EDW1'));
    expect(parsed?.serialNumber).toBe('EDW1');
    expect(parsed?.configTable).toEqual({ columns: [], rows: [] });
  });

  it('does not apply to text without a leading section', () => {
    expect(bracketedSectionFormat.applies(sourceOf(FLAT_LOG))).toBe(false);
  });
});

describe('flatTableFormat', () => {
  it('reads metadata from the first data row', () => {
    const parsed = flatTableFormat.parse(sourceOf(FLAT_LOG));
    expect(parsed?.format).toBe('flat-table');
    expect(parsed?.serialNumber).toBe('EDW1020030405');
    expect(parsed?.metadata).toEqual({
      model: 'X1',
      softwareVersion: '2.1',
      firmwareVersion: 'FW3',
      date: '2026-10-01',
    });
    expect(parsed?.configTable.rows).toHaveLength(2);
  });

  it('tries the serial column names in order', () => {
    const parsed = flatTableFormat.parse(sourceOf('Serial_No,Value\nEDW7,1'));
    expect(parsed?.serialNumber).toBe('EDW7');
  });

  it('declines tables without a serial column', () => {
    expect(flatTableFormat.parse(sourceOf('Parameter,Value\nRate,12'))).toBeUndefined();
  });

  it('declines ragged text', () => {
    expect(flatTableFormat.parse(sourceOf(HEADER_BLOCK_LOG))).toBeUndefined();
  });
});

describe('headerBlockFormat', () => {
  it('reads the key block and the Section table', () => {
    expect(headerBlockFormat.parse(sourceOf(HEADER_BLOCK_LOG))).toEqual({
      sourcePath: '/logs/pump.csv',
      format: 'header-block',
      serialNumber: 'EDW99',
      metadata: { model: 'X2', softwareVersion: '4.0' },
      configTable: {
        columns: ['Section', 'Parameter', 'Value'],
        rows: [['Flow', 'Rate', '12']],
      },
    });
  });

  it('matches header keys by substring', () => {
    const log = [
      'Serial No,EDW99',
      'Pump Model,X2',
      'Test Date,2026-10-01',
      'Software,4.0',
      'Firmware Rev,FW 2',
      '',
      'Section,Parameter,Value',
      'Flow,Rate,12',
    ].join('\n');

    const parsed = headerBlockFormat.parse(sourceOf(log));

    expect(parsed?.serialNumber).toBe('EDW99');
    expect(parsed?.metadata).toEqual({
      model: 'X2',
      date: '2026-10-01',
      softwareVersion: '4.0',
      firmwareVersion: 'FW 2',
    });
  });

  it('declines text with neither metadata nor a table', () => {
    expect(headerBlockFormat.parse(sourceOf('hello world'))).toBeUndefined();
  });
});

describe('parseLogText', () => {
  it('picks the first layout that fits', () => {
    expect(parseLogText(sourceOf(BRACKETED_LOG))?.format).toBe('bracketed-section');
    expect(parseLogText(sourceOf(FLAT_LOG))?.format).toBe('flat-table');
    expect(parseLogText(sourceOf(HEADER_BLOCK_LOG))?.format).toBe('header-block');
  });

  it('returns undefined when nothing fits', () => {
    expect(parseLogText(sourceOf('hello world'))).toBeUndefined();
  });
});
