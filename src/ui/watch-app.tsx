/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text } from 'ink';
import { basename } from 'node:path';
import { createPipeline, type PipelineConfig } from '../core/pipeline/index.js';
import { describeError, logConsole } from '../core/logging.js';
import { FolderWatcher } from '../runner/folder-watcher.js';
import type { ProcessOutcome } from '../types/observer.js';
import { appendOutcome, emptyWatchStats, tallyOutcome, type WatchStats } from './watch-history.js';

const VISIBLE_OUTCOMES = 5;

export interface WatchAppProps {
  folder: string;
  config: PipelineConfig;
}

const outcomeLabel = (outcome: ProcessOutcome): { text: string; color: string } => {
  if (!outcome.success) return { text: 'ERROR', color: 'red' };
  return outcome.verdict?.isPass ? { text: 'PASS', color: 'greenBright' } : { text: 'FAIL', color: 'yellow' };
};

export const WatchApp: React.FC<WatchAppProps> = ({ folder, config }) => {
  const [history, setHistory] = useState<ProcessOutcome[]>([]);
  const [stats, setStats] = useState<WatchStats>(emptyWatchStats);
  const [lastEvent, setLastEvent] = useState('Starting watcher...');

  useEffect(() => {
    let cancelled = false;
    const pipeline = createPipeline(config);
    const watcher = new FolderWatcher({
      folder,
      process: (filePath) => pipeline.process(filePath),
      observer: {
        onQueued: ({ filePath }) => {
          if (cancelled) return;
          setStats((prev) => ({ ...prev, queued: prev.queued + 1 }));
          setLastEvent(`Queued ${basename(filePath)}`);
        },
        onIgnored: ({ filePath, reason }) => {
          if (cancelled) return;
          setLastEvent(`Skipped ${basename(filePath)} (${reason})`);
        },
        onProcessed: (outcome) => {
          if (cancelled) return;
          setHistory((prev) => appendOutcome(prev, outcome));
          setStats((prev) => tallyOutcome(prev, outcome));
          setLastEvent(outcome.message);
        },
      },
    });

    watcher
      .start()
      .then(() => {
        if (!cancelled) setLastEvent(`Watching ${watcher.folder}`);
      })
      .catch((error: unknown) => {
        logConsole('error', 'Failed to start folder watcher', [['error', describeError(error)]]);
        if (!cancelled) setLastEvent(`Watcher failed: ${describeError(error)}`);
      });

    return () => {
      cancelled = true;
      watcher.stop().catch((error: unknown) => {
        logConsole('error', 'Failed to stop folder watcher', [['error', describeError(error)]]);
      });
    };
  }, [folder, config]);

  const recent = history.slice(-VISIBLE_OUTCOMES).reverse();

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          PUMP CONFIG VERIFIER · WATCH
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Folder: </Text>
          <Text color="white">{folder}</Text>
        </Box>
        <Box>
          <Text dimColor>Queued: </Text>
          <Text>{stats.queued}</Text>
          <Text dimColor> | Pass: </Text>
          <Text color="greenBright">{stats.passed}</Text>
          <Text dimColor> | Fail: </Text>
          <Text color="yellow">{stats.failed}</Text>
          <Text dimColor> | Errors: </Text>
          <Text color="red">{stats.errors}</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{lastEvent}</Text>
      </Box>

      {recent.length > 0 && (
        <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
          {recent.map((outcome, index) => {
            const label = outcomeLabel(outcome);
            return (
              <Box key={`${outcome.sourcePath}-${index}`}>
                <Text color={label.color}>{label.text.padEnd(6)}</Text>
                <Text>{basename(outcome.sourcePath)}</Text>
                <Text dimColor> {outcome.serialNumber ?? ''}</Text>
              </Box>
            );
          })}
        </Box>
      )}

      <Text dimColor>Press Ctrl+C to stop.</Text>
    </Box>
  );
};
