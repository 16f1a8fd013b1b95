/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_REPORT_TIME_ZONE, isValidTimeZone } from '../report/timestamps.js';
import { DEFAULT_SYNC_TARGET, DEFAULT_SYNC_TIMEOUT_MS } from '../sync/result-sink.js';

export const CONFIG_DEFAULTS = {
  masterListPath: 'Master_Config_List.xlsx',
  outputFolder: 'Results',
  watchFolder: 'Logs',
  syncTarget: DEFAULT_SYNC_TARGET,
  syncTimeoutMs: DEFAULT_SYNC_TIMEOUT_MS,
  timeZone: DEFAULT_REPORT_TIME_ZONE,
} as const;

export const CONFIG_ENV_VARS = {
  masterListPath: 'PUMP_VERIFY_MASTER_LIST',
  outputFolder: 'PUMP_VERIFY_OUTPUT_DIR',
  watchFolder: 'PUMP_VERIFY_WATCH_DIR',
  syncEndpoint: 'PUMP_VERIFY_SYNC_ENDPOINT',
  syncTarget: 'PUMP_VERIFY_SYNC_TARGET',
  syncTimeoutMs: 'PUMP_VERIFY_SYNC_TIMEOUT_MS',
  timeZone: 'PUMP_VERIFY_TIMEZONE',
} as const;

export const verifierConfigSchema = z.object({
  masterListPath: z.string().trim().min(1, 'master list path is required'),
  outputFolder: z.string().trim().min(1, 'output folder is required'),
  watchFolder: z.string().trim().min(1, 'watch folder is required'),
  syncEndpoint: z.string().trim().url('sync endpoint must be a URL').optional(),
  syncTarget: z.string().trim().min(1),
  syncTimeoutMs: z.coerce.number().int().positive(),
  timeZone: z.string().trim().refine(isValidTimeZone, 'time zone must be an IANA zone name'),
});

export type VerifierConfig = z.infer<typeof verifierConfigSchema>;

export type ConfigKey = keyof typeof CONFIG_ENV_VARS;

export type ConfigOverrides = Partial<Record<ConfigKey, string | number | undefined>>;

const CONFIG_KEYS: readonly ConfigKey[] = [
  'masterListPath',
  'outputFolder',
  'watchFolder',
  'syncEndpoint',
  'syncTarget',
  'syncTimeoutMs',
  'timeZone',
];

const definedEntries = (values: ConfigOverrides): Record<string, string | number> =>
  Object.fromEntries(
    Object.entries(values).filter(
      (entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== '',
    ),
  );

export function readConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const values: ConfigOverrides = {};
  for (const key of CONFIG_KEYS) {
    const value = env[CONFIG_ENV_VARS[key]]?.trim();
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Merges defaults, environment and explicit overrides (highest wins),
 * validates the result and resolves relative paths against `cwd`.
 *
 * @throws ConfigError listing every invalid setting.
 */
export function resolveVerifierConfig(
  overrides: ConfigOverrides = {},
  options: ResolveConfigOptions = {},
): VerifierConfig {
  const cwd = options.cwd ?? process.cwd();
  const merged = {
    ...CONFIG_DEFAULTS,
    ...definedEntries(readConfigFromEnv(options.env)),
    ...definedEntries(overrides),
  };
  const parsed = verifierConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const toAbsolute = (path: string): string => (isAbsolute(path) ? path : resolve(cwd, path));
  return {
    ...parsed.data,
    masterListPath: toAbsolute(parsed.data.masterListPath),
    outputFolder: toAbsolute(parsed.data.outputFolder),
    watchFolder: toAbsolute(parsed.data.watchFolder),
  };
}
