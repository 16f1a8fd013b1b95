/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ProcessOutcome } from '../types/observer.js';

export const OutcomePanel: React.FC<{ outcome: ProcessOutcome }> = ({ outcome }) => {
  if (!outcome.success) {
    return (
      <Box marginTop={1} borderStyle="bold" borderColor="red" flexDirection="column" paddingX={1} paddingY={0}>
        <Text color="redBright">✗ {outcome.message}</Text>
        <Text dimColor>
          Stopped at {outcome.stage}: {outcome.sourcePath}
        </Text>
      </Box>
    );
  }

  const verdict = outcome.verdict;
  const passed = verdict?.isPass === true;
  return (
    <Box
      marginTop={1}
      borderStyle="double"
      borderColor={passed ? 'greenBright' : 'yellow'}
      flexDirection="column"
      paddingX={1}
      paddingY={0}
    >
      <Text bold color={passed ? 'greenBright' : 'redBright'}>
        {passed ? '✓ PASS' : '✗ FAIL'}
      </Text>
      <Text>
        Serial: <Text color="cyan">{outcome.serialNumber ?? 'N/A'}</Text> | Config tag:{' '}
        <Text color="cyan">{verdict?.configTag ?? 'N/A'}</Text>
      </Text>
      {verdict?.error && <Text color="yellow">Reason: {verdict.error}</Text>}
      {outcome.reportPath && <Text dimColor>Report: {outcome.reportPath}</Text>}
      {outcome.synced === false && <Text color="yellow">Result sync failed (see log)</Text>}
    </Box>
  );
};
