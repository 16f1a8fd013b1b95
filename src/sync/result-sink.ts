/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import axios, { type AxiosInstance } from 'axios';
import type { VerdictLabel } from '../core/types.js';

export const DEFAULT_SYNC_TARGET = 'Verification_Results';
export const DEFAULT_SYNC_TIMEOUT_MS = 10_000;

export interface SyncEntry {
  serialNumber: string;
  configTag: string;
  result: VerdictLabel;
  resultFolderPath: string;
  verificationDate: Date;
}

export type SyncResult = { ok: true } | { ok: false; error: string };

/**
 * Best-effort recorder for finished verifications. Implementations report
 * failure through the result instead of throwing.
 */
export interface ResultSink {
  record(entry: SyncEntry): Promise<SyncResult>;
}

export interface SyncPayload {
  list: string;
  item: {
    Title: string;
    SerialNumber: string;
    ConfigTag: string;
    Result: VerdictLabel;
    VerificationDate: string;
    ResultFolder: string;
  };
}

export const buildSyncPayload = (entry: SyncEntry, list: string): SyncPayload => ({
  list,
  item: {
    Title: `${entry.serialNumber} - ${entry.result}`,
    SerialNumber: entry.serialNumber,
    ConfigTag: entry.configTag,
    Result: entry.result,
    VerificationDate: entry.verificationDate.toISOString(),
    ResultFolder: entry.resultFolderPath,
  },
});

export const describeSyncError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `request failed with status ${error.response.status}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

export interface HttpResultSinkOptions {
  endpoint: string;
  target?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

/**
 * Posts one list item per verification to an HTTP endpoint.
 */
export class HttpResultSink implements ResultSink {
  readonly endpoint: string;
  readonly target: string;
  private readonly timeoutMs: number;
  private readonly client: AxiosInstance;

  constructor(options: HttpResultSinkOptions) {
    this.endpoint = options.endpoint;
    this.target = options.target ?? DEFAULT_SYNC_TARGET;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    this.client = options.client ?? axios.create();
  }

  async record(entry: SyncEntry): Promise<SyncResult> {
    try {
      await this.client.post(this.endpoint, buildSyncPayload(entry, this.target), {
        timeout: this.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, error: describeSyncError(error) };
    }
  }
}
