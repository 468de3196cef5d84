// Harness configuration from the environment
// .env is loaded by the CLI before this is read

import { ConfigError } from '../domain/types/errors';
import { LogLevel } from '../infrastructure/adapters/logging/logger';

export interface HarnessConfig {
  maxAttempts: number;
  maxRetries: number;
  backoffBaseMs: number;
  agentName: string;
  projectRoot: string;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['verbose', 'info', 'silent'];

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.HARNESS_LOG_LEVEL;
  if (raw === undefined || raw === '') {
    return 'verbose';
  }
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  if (!level) {
    throw new ConfigError(`HARNESS_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'`);
  }
  return level;
}

export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): HarnessConfig {
  return {
    maxAttempts: readPositiveInt(env, 'HARNESS_MAX_ATTEMPTS', 3),
    maxRetries: readPositiveInt(env, 'HARNESS_MAX_RETRIES', 3),
    backoffBaseMs: readPositiveInt(env, 'HARNESS_BACKOFF_BASE_MS', 1000, 0),
    agentName: env.HARNESS_AGENT_NAME || 'agent',
    projectRoot: env.HARNESS_PROJECT_ROOT || cwd,
    logLevel: readLogLevel(env),
  };
}
