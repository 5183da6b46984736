/**
 * Default wait-for-completion: bounded polling
 *
 * Built only from status() and result(), so a backend that implements the
 * required methods gets a working wait for free.
 */

import type { Logger } from 'pino';
import {
  ContractError,
  Err,
  assertNever,
  toContractError,
  type ExecutionResult,
  type JobId,
} from '../models/index.js';
import { sleep as defaultSleep, throwIfAborted, type Sleep } from '../utils/abort.js';
import type { Backend, BackendResult } from './backend.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_MAX_POLLS = 600; // ≈5 minutes at the default interval

export interface WaitOptions {
  pollIntervalMs?: number;
  maxPolls?: number;
  /**
   * Stops the wait (rejecting with the signal's reason). Does not cancel
   * the job itself; call backend.cancel() for that.
   */
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Uses the backend's own wait() when it provides one, otherwise polls.
 */
export function waitForResult<C>(
  backend: Backend<C>,
  jobId: JobId,
  options: WaitOptions = {}
): Promise<BackendResult<ExecutionResult>> {
  if (backend.wait) {
    return backend.wait(jobId, options);
  }
  return pollUntilTerminal(backend, jobId, options);
}

export async function pollUntilTerminal<C>(
  backend: Backend<C>,
  jobId: JobId,
  options: WaitOptions = {}
): Promise<BackendResult<ExecutionResult>> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxPolls = options.maxPolls ?? DEFAULT_MAX_POLLS;
  const { signal, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
    return Err(new ContractError('CONFIGURATION', `pollIntervalMs must be >= 0, got ${pollIntervalMs}`));
  }
  if (!Number.isInteger(maxPolls) || maxPolls < 1) {
    return Err(new ContractError('CONFIGURATION', `maxPolls must be a positive integer, got ${maxPolls}`));
  }

  for (let poll = 1; poll <= maxPolls; poll++) {
    throwIfAborted(signal);

    const statusResult = await settle(() => backend.status(jobId, { signal }), jobId, signal);
    if (!statusResult.ok) {
      return statusResult;
    }

    const status = statusResult.value;
    switch (status) {
      case 'COMPLETED':
        logger?.info({ jobId, backend: backend.name(), poll }, 'Job completed');
        return settle(() => backend.result(jobId, { signal }), jobId, signal);
      case 'FAILED':
        logger?.warn({ jobId, backend: backend.name(), poll }, 'Job failed');
        return Err(new ContractError('JOB_FAILED', `job ${jobId} failed`, { jobId }));
      case 'CANCELLED':
        logger?.warn({ jobId, backend: backend.name(), poll }, 'Job cancelled');
        return Err(new ContractError('JOB_CANCELLED', `job ${jobId} cancelled`, { jobId }));
      case 'QUEUED':
      case 'RUNNING':
        logger?.debug({ jobId, status, poll, maxPolls }, 'Job pending');
        await sleep(pollIntervalMs, signal);
        break;
      default:
        assertNever(status);
    }
  }

  logger?.warn({ jobId, maxPolls, pollIntervalMs }, 'Gave up waiting for job');
  return Err(new ContractError('TIMEOUT', `${jobId} (no terminal status after ${maxPolls} polls)`, { jobId }));
}

/**
 * Run a backend call, folding anything it throws into the taxonomy. A
 * rejection caused by our own signal is rethrown as the abort reason.
 */
export async function settle<T>(
  call: () => Promise<BackendResult<T>>,
  jobId: JobId | undefined,
  signal: AbortSignal | undefined
): Promise<BackendResult<T>> {
  try {
    return await call();
  } catch (error) {
    throwIfAborted(signal);
    return Err(toContractError(error, jobId));
  }
}
