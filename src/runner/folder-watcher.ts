/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { extname, resolve } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { watch, type FSWatcher } from 'chokidar';
import { describeError, logConsole } from '../core/logging.js';
import type { ProcessOutcome, WatchObserver } from '../types/observer.js';
import { ensureDirectory } from '../tools/files.js';
import { BoundedQueue } from './bounded-queue.js';

export const WATCHED_EXTENSIONS: readonly string[] = ['.csv', '.xlsx', '.xls'];

export type SizeProbe = (filePath: string) => Promise<number | undefined>;

const statSize: SizeProbe = async (filePath) => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch {
    return undefined;
  }
};

export interface StableSizeOptions {
  intervalMs?: number;
  maxChecks?: number;
  probe?: SizeProbe;
}

/**
 * Polls a file's size until two consecutive reads agree. Resolves the size,
 * the last size seen when `maxChecks` runs out, or `undefined` when the
 * file disappears.
 */
export async function waitForStableSize(
  filePath: string,
  options: StableSizeOptions = {},
): Promise<number | undefined> {
  const probe = options.probe ?? statSize;
  const intervalMs = options.intervalMs ?? 1000;
  const maxChecks = options.maxChecks ?? 10;

  let previous = await probe(filePath);
  if (previous === undefined) {
    return undefined;
  }
  for (let check = 0; check < maxChecks; check += 1) {
    await delay(intervalMs);
    const current = await probe(filePath);
    if (current === undefined) {
      return undefined;
    }
    if (current === previous) {
      return current;
    }
    previous = current;
  }
  return previous;
}

export interface FolderWatcherOptions {
  folder: string;
  process: (filePath: string) => Promise<ProcessOutcome>;
  extensions?: readonly string[];
  queueCapacity?: number;
  stability?: StableSizeOptions;
  observer?: WatchObserver;
}

/**
 * Watches one folder (not its subfolders) for new log files and feeds them,
 * one at a time, to `process`. Each absolute path is submitted at most once.
 */
export class FolderWatcher {
  readonly folder: string;
  private readonly extensions: Set<string>;
  private readonly queue: BoundedQueue<string>;
  private readonly submitted = new Set<string>();
  private watcher?: FSWatcher;
  private consumer?: Promise<void>;

  constructor(private readonly options: FolderWatcherOptions) {
    this.folder = resolve(options.folder);
    this.extensions = new Set(
      (options.extensions ?? WATCHED_EXTENSIONS).map((extension) => extension.toLowerCase()),
    );
    this.queue = new BoundedQueue<string>(options.queueCapacity ?? 64);
  }

  get isRunning(): boolean {
    return this.consumer !== undefined;
  }

  async start(): Promise<void> {
    if (this.consumer) {
      return;
    }
    await ensureDirectory(this.folder);
    this.consumer = this.consume();
    const watcher = watch(this.folder, { depth: 0, ignoreInitial: true });
    watcher.on('add', (filePath: string) => {
      this.handleCreated(filePath).catch((error: unknown) => {
        logConsole('error', 'Failed to queue detected file', [
          ['file', filePath],
          ['error', describeError(error)],
        ]);
      });
    });
    watcher.on('error', (error: unknown) => {
      logConsole('error', 'Folder watcher error', [
        ['folder', this.folder],
        ['error', describeError(error)],
      ]);
    });
    this.watcher = watcher;
    logConsole('info', 'Watching folder', [
      ['folder', this.folder],
      ['extensions', [...this.extensions].join(', ')],
    ]);
  }

  accepts(filePath: string): boolean {
    return this.extensions.has(extname(filePath).toLowerCase());
  }

  /**
   * Filters, debounces and queues one created file.
   *
   * @returns whether the file was queued
   */
  async handleCreated(filePath: string): Promise<boolean> {
    const absolutePath = resolve(filePath);
    if (!this.accepts(absolutePath)) {
      this.options.observer?.onIgnored?.({ filePath: absolutePath, reason: 'unsupported extension' });
      return false;
    }
    if (this.submitted.has(absolutePath)) {
      this.options.observer?.onIgnored?.({ filePath: absolutePath, reason: 'already submitted' });
      return false;
    }
    this.submitted.add(absolutePath);

    const size = await waitForStableSize(absolutePath, this.options.stability);
    if (size === undefined) {
      this.submitted.delete(absolutePath);
      this.options.observer?.onIgnored?.({ filePath: absolutePath, reason: 'file disappeared' });
      return false;
    }

    await this.queue.push(absolutePath);
    this.options.observer?.onQueued?.({ filePath: absolutePath, depth: this.queue.size });
    return true;
  }

  /** Closes the watcher and waits for queued files to finish. */
  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = undefined;
    if (watcher) {
      await watcher.close();
    }
    this.queue.close();
    await this.consumer;
    this.consumer = undefined;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const filePath = await this.queue.take();
      if (filePath === undefined) {
        return;
      }
      try {
        const outcome = await this.options.process(filePath);
        this.options.observer?.onProcessed?.(outcome);
      } catch (error) {
        logConsole('error', 'Error processing file from queue', [
          ['file', filePath],
          ['error', describeError(error)],
        ]);
      }
    }
  }
}
