/**
 * Retry with exponential backoff
 *
 * Only transient failures (BACKEND_UNAVAILABLE, TIMEOUT, and backend-defined
 * errors flagged transient) are retried. Everything else is handed back to
 * the caller on first occurrence.
 */

import type { Logger } from 'pino';
import { ContractError, Err } from '../models/index.js';
import { sleep as defaultSleep, throwIfAborted, type Sleep } from '../utils/abort.js';
import type { BackendResult } from './backend.js';
import { settle } from './wait.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
}

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 250;
export const DEFAULT_RETRY_MAX_DELAY_MS = 5_000;

export function computeRetryDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<BackendResult<T>>,
  options: RetryOptions = {}
): Promise<BackendResult<T>> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
  const { signal, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    return Err(new ContractError('CONFIGURATION', `maxAttempts must be a positive integer, got ${maxAttempts}`));
  }

  let attempt = 1;
  for (;;) {
    throwIfAborted(signal);
    const result = await settle(() => operation(attempt), undefined, signal);
    if (result.ok || !result.error.isTransient || attempt >= maxAttempts) {
      return result;
    }

    const delayMs = computeRetryDelay(attempt, baseDelayMs, maxDelayMs);
    logger?.warn(
      { kind: result.error.kind, attempt, maxAttempts, delayMs },
      'Transient backend failure, retrying'
    );
    await sleep(delayMs, signal);
    attempt++;
  }
}
