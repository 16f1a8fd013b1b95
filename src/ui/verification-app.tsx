/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { createPipeline, type PipelineConfig } from '../core/pipeline/index.js';
import type { PipelineObserver, PipelineStage, ProcessOutcome } from '../types/observer.js';
import { OutcomePanel } from './outcome-panel.js';

interface AppState {
  stage: PipelineStage | 'starting';
  lastEvent: string;
}

export interface VerificationAppProps {
  inputPath: string;
  config: PipelineConfig;
}

export const VerificationApp: React.FC<VerificationAppProps> = ({ inputPath, config }) => {
  const [state, setState] = useState<AppState>({ stage: 'starting', lastEvent: 'Initializing...' });
  const [outcome, setOutcome] = useState<ProcessOutcome | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: PipelineObserver = {
      onStage: (event) => {
        if (cancelled) return;
        setState({ stage: event.stage, lastEvent: `[${event.stage}] ${event.message}` });
      },
    };

    createPipeline(config, { observer })
      .process(inputPath)
      .then((res) => {
        if (cancelled) return;
        setOutcome(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [inputPath, config]);

  useEffect(() => {
    if (outcome || error) {
      const failure = error ?? (outcome && !outcome.success ? outcome.message : undefined);
      const timer = setTimeout(() => exit(failure ? new Error(failure) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [outcome, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          PUMP CONFIG VERIFIER
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Log: </Text>
          <Text color="white">{inputPath}</Text>
        </Box>
        <Box>
          <Text dimColor>Master list: </Text>
          <Text color="cyan">{config.masterListPath}</Text>
          <Text dimColor> | Stage: </Text>
          <Text>{state.stage}</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {outcome && <OutcomePanel outcome={outcome} />}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};
