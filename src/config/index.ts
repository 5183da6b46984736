/**
 * Configuration loader
 * Loads from environment variables and, on request, a .env file
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigSchema, type Config } from './schema.js';
import { Ok, Err, type Result } from '../models/index.js';
import type { WaitOptions, RetryOptions } from '../core/index.js';

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Env;
  /** Read .env into process.env first. */
  dotenv?: boolean;
}

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  return env[key] ?? defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue?: boolean): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value === 'true' || value === '1';
}

export function loadConfig(options: LoadConfigOptions = {}): Result<Config, string> {
  try {
    if (options.dotenv) {
      loadDotenv();
    }
    const env = options.env ?? process.env;

    const config = {
      wait: {
        pollIntervalMs: getEnvNumber(env, 'QBC_WAIT_POLL_INTERVAL_MS', 500),
        maxPolls: getEnvNumber(env, 'QBC_WAIT_MAX_POLLS', 600),
      },
      retry: {
        maxAttempts: getEnvNumber(env, 'QBC_RETRY_MAX_ATTEMPTS', 3),
        baseDelayMs: getEnvNumber(env, 'QBC_RETRY_BASE_DELAY_MS', 250),
        maxDelayMs: getEnvNumber(env, 'QBC_RETRY_MAX_DELAY_MS', 5000),
      },
      simulator: {
        numQubits: getEnvNumber(env, 'QBC_SIM_QUBITS', 5),
        queueMs: getEnvNumber(env, 'QBC_SIM_QUEUE_MS', 500),
        runMs: getEnvNumber(env, 'QBC_SIM_RUN_MS', 500),
      },
      logging: {
        level: getEnv(env, 'LOG_LEVEL', 'info'),
        pretty: getEnvBoolean(env, 'LOG_PRETTY', true),
      },
    };

    const parsed = ConfigSchema.safeParse(config);
    if (!parsed.success) {
      return Err(`Invalid configuration: ${parsed.error.message}`);
    }

    return Ok(parsed.data);
  } catch (error) {
    return Err(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function waitOptionsFromConfig(config: Config): WaitOptions {
  return {
    pollIntervalMs: config.wait.pollIntervalMs,
    maxPolls: config.wait.maxPolls,
  };
}

export function retryOptionsFromConfig(config: Config): RetryOptions {
  return {
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
  };
}

export type { Config } from './schema.js';
