/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  assignByKey,
  classifyHeaderKey,
  classifyMetadataKey,
  createDraft,
  isDraftEmpty,
} from './metadata-keys.js';

describe('classifyMetadataKey', () => {
  it('maps serial keys', () => {
    expect(classifyMetadataKey('Pump Serial No')).toBe('serialNumber');
    expect(classifyMetadataKey('serial_no')).toBe('serialNumber');
  });

  it('maps model keys', () => {
    expect(classifyMetadataKey('Model Type')).toBe('model');
    expect(classifyMetadataKey(' model ')).toBe('model');
    expect(classifyMetadataKey('Model Year')).toBeUndefined();
  });

  it('maps firmware before version', () => {
    expect(classifyMetadataKey('Firmware Version')).toBe('firmwareVersion');
  });

  it('maps a bare version only inside SYSTEM_INFO', () => {
    expect(classifyMetadataKey('Version', 'SYSTEM_INFO')).toBe('softwareVersion');
    expect(classifyMetadataKey('Version', 'PARAMETERS')).toBeUndefined();
    expect(classifyMetadataKey('Software Version')).toBe('softwareVersion');
  });

  it('maps date and tool name exactly', () => {
    expect(classifyMetadataKey('Date')).toBe('date');
    expect(classifyMetadataKey('Export Date')).toBeUndefined();
    expect(classifyMetadataKey('Tool_Name')).toBe('toolName');
  });
});

describe('classifyHeaderKey', () => {
  it('matches keys by substring', () => {
    expect(classifyHeaderKey('Pump Serial No')).toBe('serialNumber');
    expect(classifyHeaderKey('SerialNo')).toBe('serialNumber');
    expect(classifyHeaderKey('Test Date')).toBe('date');
    expect(classifyHeaderKey('Software')).toBe('softwareVersion');
    expect(classifyHeaderKey('Firmware Version')).toBe('firmwareVersion');
    expect(classifyHeaderKey('Pump Model')).toBe('model');
    expect(classifyHeaderKey('Tool_Name')).toBe('toolName');
    expect(classifyHeaderKey('Operator')).toBeUndefined();
  });

  it('checks date before model', () => {
    expect(classifyHeaderKey('Model Date')).toBe('date');
  });
});

describe('assignByKey', () => {
  it('skips blank values and unknown keys', () => {
    const draft = createDraft();
    assignByKey(draft, 'Model', '   ');
    assignByKey(draft, 'Operator', 'Kim');
    expect(isDraftEmpty(draft)).toBe(true);

    assignByKey(draft, 'Serial No', ' EDW1 ');
    expect(draft.serialNumber).toBe('EDW1');
    expect(isDraftEmpty(draft)).toBe(false);
  });
});
