#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { render } from 'ink';
import { resolveVerifierConfig } from '../config/verifier-config.js';
import type { PipelineConfig } from '../core/pipeline/index.js';
import { describeError, logConsole } from '../core/logging.js';
import { VerificationApp } from '../ui/verification-app.js';
import { WatchApp } from '../ui/watch-app.js';
import { parseArgs, toConfigOverrides } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  if (!options.watch && !options.inputPath) {
    throw new Error('Missing --input <path> or --watch [folder] argument.');
  }

  const config = resolveVerifierConfig(toConfigOverrides(options));
  const pipelineConfig: PipelineConfig = {
    masterListPath: config.masterListPath,
    outputFolder: config.outputFolder,
    syncEndpoint: config.syncEndpoint,
    syncTarget: config.syncTarget,
    syncTimeoutMs: config.syncTimeoutMs,
    timeZone: config.timeZone,
  };

  const app = options.inputPath && !options.watch ? (
    <VerificationApp inputPath={options.inputPath} config={pipelineConfig} />
  ) : (
    <WatchApp folder={config.watchFolder} config={pipelineConfig} />
  );

  const { waitUntilExit } = render(app);
  await waitUntilExit();
};

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    logConsole('error', 'Verification run failed', [['error', describeError(error)]]);
    process.exitCode = 1;
  });
}
