/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import type { ProcessOutcome } from '../types/observer.js';
import { appendOutcome, emptyWatchStats, HISTORY_LIMIT, tallyOutcome } from './watch-history.js';

const outcome = (index: number, extra: Partial<ProcessOutcome> = {}): ProcessOutcome => ({
  success: true,
  message: `run ${index}`,
  sourcePath: `/logs/${index}.csv`,
  stage: 'done',
  ...extra,
});

describe('appendOutcome', () => {
  it('keeps only the newest entries', () => {
    let history: ProcessOutcome[] = [];
    for (let index = 0; index < HISTORY_LIMIT + 3; index += 1) {
      history = appendOutcome(history, outcome(index));
    }

    expect(history).toHaveLength(HISTORY_LIMIT);
    expect(history[0].message).toBe('run 3');
    expect(history[HISTORY_LIMIT - 1].message).toBe(`run ${HISTORY_LIMIT + 2}`);
  });
});

describe('tallyOutcome', () => {
  it('counts verdicts and errors separately', () => {
    let stats = emptyWatchStats();
    stats = tallyOutcome(stats, outcome(1, { verdict: { isPass: true, configTag: 'CFG-A' } }));
    stats = tallyOutcome(stats, outcome(2, { verdict: { isPass: false, configTag: 'N/A' } }));
    stats = tallyOutcome(stats, outcome(3, { success: false, stage: 'parsing' }));

    expect(stats).toEqual({ queued: 0, passed: 1, failed: 1, errors: 1 });
  });
});
