/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ProcessOutcome } from '../types/observer.js';
import { FolderWatcher, waitForStableSize, type SizeProbe } from './folder-watcher.js';

const probeOf = (sizes: Array<number | undefined>): { probe: SizeProbe; calls: () => number } => {
  let index = 0;
  return {
    probe: async () => sizes[Math.min(index++, sizes.length - 1)],
    calls: () => index,
  };
};

describe('waitForStableSize', () => {
  it('resolves once two reads agree', async () => {
    const { probe, calls } = probeOf([10, 20, 20]);
    expect(await waitForStableSize('/logs/a.csv', { probe, intervalMs: 0 })).toBe(20);
    expect(calls()).toBe(3);
  });

  it('resolves undefined when the file disappears', async () => {
    const { probe } = probeOf([10, undefined]);
    expect(await waitForStableSize('/logs/a.csv', { probe, intervalMs: 0 })).toBeUndefined();
  });

  it('gives up after the configured number of checks', async () => {
    const { probe, calls } = probeOf([1, 2, 3, 4]);
    expect(await waitForStableSize('/logs/a.csv', { probe, intervalMs: 0, maxChecks: 2 })).toBe(3);
    expect(calls()).toBe(3);
  });
});

describe('FolderWatcher', () => {
  let workDir: string;
  let watchDir: string;
  let dropDir: string;
  let processed: string[];
  let ignored: Array<{ filePath: string; reason: string }>;

  const processFile = async (filePath: string): Promise<ProcessOutcome> => {
    processed.push(filePath);
    return { success: true, message: 'ok', sourcePath: filePath, stage: 'done' };
  };

  const createWatcher = (): FolderWatcher =>
    new FolderWatcher({
      folder: watchDir,
      process: processFile,
      stability: { intervalMs: 0 },
      observer: { onIgnored: (info) => ignored.push(info) },
    });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'watcher-test-'));
    watchDir = join(workDir, 'Logs');
    dropDir = join(workDir, 'drop');
    await fs.mkdir(dropDir);
    processed = [];
    ignored = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('accepts log extensions regardless of case', () => {
    const watcher = createWatcher();
    expect(watcher.accepts('/x/a.csv')).toBe(true);
    expect(watcher.accepts('/x/b.XLSX')).toBe(true);
    expect(watcher.accepts('/x/c.xls')).toBe(true);
    expect(watcher.accepts('/x/d.txt')).toBe(false);
  });

  it('queues each path once', async () => {
    const filePath = join(dropDir, 'pump.csv');
    await fs.writeFile(filePath, 'Serial No\nEDW1\n');
    const watcher = createWatcher();

    expect(await watcher.handleCreated(filePath)).toBe(true);
    expect(await watcher.handleCreated(filePath)).toBe(false);

    expect(ignored).toEqual([{ filePath, reason: 'already submitted' }]);
  });

  it('ignores unsupported extensions', async () => {
    const filePath = join(dropDir, 'notes.txt');
    await fs.writeFile(filePath, 'hello');
    const watcher = createWatcher();

    expect(await watcher.handleCreated(filePath)).toBe(false);
    expect(ignored).toEqual([{ filePath, reason: 'unsupported extension' }]);
  });

  it('forgets files that vanish before they settle', async () => {
    const filePath = join(dropDir, 'late.csv');
    const watcher = createWatcher();

    expect(await watcher.handleCreated(filePath)).toBe(false);
    expect(ignored).toEqual([{ filePath, reason: 'file disappeared' }]);

    await fs.writeFile(filePath, 'Serial No\nEDW1\n');
    expect(await watcher.handleCreated(filePath)).toBe(true);
  });

  it('processes queued files and drains on stop', async () => {
    const first = join(dropDir, 'a.csv');
    const second = join(dropDir, 'b.xlsx');
    await fs.writeFile(first, 'a');
    await fs.writeFile(second, 'b');
    const watcher = createWatcher();

    await watcher.start();
    expect(watcher.isRunning).toBe(true);
    await watcher.handleCreated(first);
    await watcher.handleCreated(second);
    await watcher.stop();

    expect(processed).toEqual([first, second]);
    expect(watcher.isRunning).toBe(false);
  });

  it('picks up files created in the watched folder', async () => {
    const watcher = createWatcher();
    await watcher.start();
    const filePath = join(watchDir, 'new.csv');

    try {
      await fs.writeFile(filePath, 'Serial No\nEDW1\n');
      await vi.waitFor(() => expect(processed).toEqual([filePath]), { timeout: 5000, interval: 50 });
    } finally {
      await watcher.stop();
    }
  });
});
