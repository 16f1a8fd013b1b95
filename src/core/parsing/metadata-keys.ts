/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogMetadata, MetadataKey } from '../types.js';

export type LogFieldKey = 'serialNumber' | MetadataKey;

const SYSTEM_INFO_SECTION = 'SYSTEM_INFO';

/**
 * Maps a free-form log key onto a normalized field. Rules are lower-cased
 * substring tests and the first hit wins.
 */
export function classifyMetadataKey(key: string, section?: string): LogFieldKey | undefined {
  const lower = key.trim().toLowerCase();
  if (lower.includes('serial') && lower.includes('no')) {
    return 'serialNumber';
  }
  if ((lower.includes('model') && lower.includes('type')) || lower === 'model') {
    return 'model';
  }
  if (lower.includes('firmware')) {
    return 'firmwareVersion';
  }
  if (
    lower.includes('version') &&
    (lower.includes('software') || section === SYSTEM_INFO_SECTION)
  ) {
    return 'softwareVersion';
  }
  if (lower === 'date') {
    return 'date';
  }
  if (lower === 'tool_name') {
    return 'toolName';
  }
  return undefined;
}

/**
 * Key rules for `key,value` header lines. Looser than the section rules:
 * any key mentioning date, software, firmware or model counts.
 */
export function classifyHeaderKey(key: string): LogFieldKey | undefined {
  const lower = key.trim().toLowerCase();
  if (lower.includes('serial no') || lower.includes('serialno')) {
    return 'serialNumber';
  }
  if (lower.includes('date')) {
    return 'date';
  }
  if (lower.includes('software')) {
    return 'softwareVersion';
  }
  if (lower.includes('firmware')) {
    return 'firmwareVersion';
  }
  if (lower.includes('model')) {
    return 'model';
  }
  if (lower.includes('tool_name')) {
    return 'toolName';
  }
  return undefined;
}

/**
 * Mutable accumulator used while a strategy walks a file.
 */
export interface LogDraft {
  serialNumber?: string;
  metadata: LogMetadata;
}

export const createDraft = (): LogDraft => ({ metadata: {} });

export const isDraftEmpty = (draft: LogDraft): boolean =>
  draft.serialNumber === undefined && Object.keys(draft.metadata).length === 0;

export function assignField(draft: LogDraft, field: LogFieldKey, rawValue: string): void {
  const value = rawValue.trim();
  if (!value) {
    return;
  }
  if (field === 'serialNumber') {
    draft.serialNumber = value;
  } else {
    draft.metadata[field] = value;
  }
}

export function assignByKey(draft: LogDraft, key: string, value: string, section?: string): void {
  const field = classifyMetadataKey(key, section);
  if (field) {
    assignField(draft, field, value);
  }
}
