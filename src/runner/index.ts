/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { BoundedQueue } from './bounded-queue.js';
export {
  FolderWatcher,
  waitForStableSize,
  WATCHED_EXTENSIONS,
  type FolderWatcherOptions,
  type SizeProbe,
  type StableSizeOptions,
} from './folder-watcher.js';
