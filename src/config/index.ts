/**
 * Process configuration, read from the environment once at startup.
 */

import { ConfigError, configError } from '../domain/errors';
import { LogLevel, parseLogLevel } from '../logger';
import { DEFAULT_MESSAGES_PATH } from './messages';

/** Simulated latency of each agent node, in milliseconds. */
export interface NodeLatencyConfig {
  plan: number;
  execute: number;
  checkResult: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** Timeout for a single node execution. 0 disables it. */
  nodeTimeoutMs: number;
  /** Upper bound on node executions per run. */
  maxSteps: number;
  /** Events buffered per stream before the producer waits. */
  streamCapacity: number;
  latency: NodeLatencyConfig;
  messagesPath: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 5000,
  logLevel: LogLevel.Info,
  nodeTimeoutMs: 30_000,
  maxSteps: 25,
  streamCapacity: 16,
  latency: {
    plan: 500,
    execute: 3000,
    checkResult: 500,
  },
  messagesPath: DEFAULT_MESSAGES_PATH,
};

/** Build the configuration from environment variables. Throws ConfigError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port, 1),
    logLevel: readLogLevel(env, 'LOG_LEVEL', DEFAULT_CONFIG.logLevel),
    nodeTimeoutMs: readInt(env, 'NODE_TIMEOUT_MS', DEFAULT_CONFIG.nodeTimeoutMs, 0),
    maxSteps: readInt(env, 'MAX_STEPS', DEFAULT_CONFIG.maxSteps, 1),
    streamCapacity: readInt(env, 'STREAM_CAPACITY', DEFAULT_CONFIG.streamCapacity, 1),
    latency: {
      plan: readInt(env, 'PLAN_LATENCY_MS', DEFAULT_CONFIG.latency.plan, 0),
      execute: readInt(env, 'EXECUTE_LATENCY_MS', DEFAULT_CONFIG.latency.execute, 0),
      checkResult: readInt(env, 'CHECK_LATENCY_MS', DEFAULT_CONFIG.latency.checkResult, 0),
    },
    messagesPath: env.MESSAGES_PATH?.trim() || DEFAULT_CONFIG.messagesPath,
  };
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(configError(key, raw, `an integer >= ${min}`));
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(configError(key, raw, `an integer >= ${min}`));
  }
  return value;
}

function readLogLevel(env: NodeJS.ProcessEnv, key: string, fallback: LogLevel): LogLevel {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const level = parseLogLevel(raw);
  if (!level) {
    throw new ConfigError(configError(key, raw, Object.values(LogLevel).join('|')));
  }
  return level;
}
