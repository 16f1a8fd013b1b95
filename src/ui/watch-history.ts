/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ProcessOutcome } from '../types/observer.js';

export const HISTORY_LIMIT = 100;

export interface WatchStats {
  queued: number;
  passed: number;
  failed: number;
  errors: number;
}

export const emptyWatchStats = (): WatchStats => ({ queued: 0, passed: 0, failed: 0, errors: 0 });

/** Appends `outcome`, dropping the oldest entries past {@link HISTORY_LIMIT}. */
export function appendOutcome(history: ProcessOutcome[], outcome: ProcessOutcome): ProcessOutcome[] {
  const next = [...history, outcome];
  return next.length > HISTORY_LIMIT ? next.slice(next.length - HISTORY_LIMIT) : next;
}

export function tallyOutcome(stats: WatchStats, outcome: ProcessOutcome): WatchStats {
  if (!outcome.success) {
    return { ...stats, errors: stats.errors + 1 };
  }
  return outcome.verdict?.isPass
    ? { ...stats, passed: stats.passed + 1 }
    : { ...stats, failed: stats.failed + 1 };
}
