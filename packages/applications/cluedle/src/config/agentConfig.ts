/**
 * @fileoverview Cluedle agent configuration loading from YAML.
 * Validates and caches the connection and strategy settings.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  AgentConfigSchema,
  createLogger,
  InvalidAgentConfigError,
  type AgentConfig,
} from '@turnkit/agent';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  KeywordStrategyConfigSchema,
  type KeywordStrategyConfig,
} from '../strategy/KeywordCluedleStrategy.js';

const log = createLogger('config');

// The agent section is validated after environment overrides are merged in
const CluedleConfigFileSchema = z.object({
  agent: z.record(z.string(), z.unknown()).default({}),
  strategy: KeywordStrategyConfigSchema.default({}),
});

export interface CluedleConfig {
  readonly agent: AgentConfig;
  readonly strategy: KeywordStrategyConfig;
}

const NUMERIC_OVERRIDES = {
  TURNKIT_CONNECT_TIMEOUT_MS: 'connectTimeoutMs',
  TURNKIT_RECEIVE_TIMEOUT_MS: 'receiveTimeoutMs',
  TURNKIT_MAX_RECONNECT_ATTEMPTS: 'maxReconnectAttempts',
  TURNKIT_RECONNECT_DELAY_MS: 'reconnectDelayMs',
} as const;

function parseFlag(value: string): boolean | string {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return value;
  }
}

/**
 * Agent settings taken from TURNKIT_* environment variables.
 * Values are coerced but not validated; the schema rejects bad ones.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const url = env['TURNKIT_URL'];
  if (url !== undefined && url !== '') {
    overrides['url'] = url;
  }

  const keepAlive = env['TURNKIT_KEEP_ALIVE'];
  if (keepAlive !== undefined && keepAlive !== '') {
    overrides['keepAlive'] = parseFlag(keepAlive);
  }

  for (const [variable, key] of Object.entries(NUMERIC_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      overrides[key] = Number(value);
    }
  }

  return overrides;
}

function fail(configPath: string, issues: readonly z.ZodIssue[]): never {
  const error = new InvalidAgentConfigError(issues);
  log.error(error.message, { configPath });
  throw error;
}

let cachedConfig: CluedleConfig | null = null;

/**
 * Load and validate the Cluedle agent configuration.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/agent.yaml relative to cwd
 *
 * TURNKIT_URL, TURNKIT_KEEP_ALIVE and the TURNKIT_*_MS / attempt variables
 * override the file's `agent` section.
 *
 * @throws {InvalidAgentConfigError} if the file content does not validate
 */
export function loadCluedleConfig(env: NodeJS.ProcessEnv = process.env): CluedleConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = env['CONFIG_PATH'] ?? join(process.cwd(), 'config/agent.yaml');
  const rawConfig: unknown = parseYaml(readFileSync(configPath, 'utf8')) ?? {};

  const file = CluedleConfigFileSchema.safeParse(rawConfig);
  if (!file.success) {
    return fail(configPath, file.error.issues);
  }

  const agent = AgentConfigSchema.safeParse({ ...file.data.agent, ...readEnvOverrides(env) });
  if (!agent.success) {
    return fail(
      configPath,
      agent.error.issues.map((issue) => ({ ...issue, path: ['agent', ...issue.path] }))
    );
  }

  log.debug('Loaded configuration', { configPath });
  cachedConfig = Object.freeze({
    agent: Object.freeze(agent.data),
    strategy: file.data.strategy,
  });
  return cachedConfig;
}

/**
 * Clear the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
