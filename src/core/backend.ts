/**
 * Backend contract
 *
 *   capabilities() ──→ validate() ──→ submit() ──→ status() ──→ result()
 *     (sync, cached)     (async)       (async)      (async)      (async)
 *
 * Generic over `C`, the circuit type, which this layer never inspects.
 * Every async operation resolves to a Result; the only rejection is the
 * caller's own AbortSignal firing.
 */

import type {
  Capabilities,
  BackendAvailability,
  ValidationResult,
  ExecutionResult,
  JobId,
  JobStatus,
  ContractError,
  Result,
} from '../models/index.js';
import type { WaitOptions } from './wait.js';

export type BackendResult<T> = Result<T, ContractError>;

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface Backend<C> {
  /** Stable identifier. No side effects. */
  name(): string;

  /**
   * Served from a value computed at construction time; never does I/O.
   * Callers must treat the returned snapshot as read-only.
   */
  capabilities(): Capabilities;

  /**
   * Live queue information. "Busy" is a BackendAvailability, not an error;
   * only auth/configuration problems fail.
   */
  availability(options?: OperationOptions): Promise<BackendResult<BackendAvailability>>;

  /**
   * Check qubit count, gate-set membership and connectivity against
   * capabilities(). Problems come back as a ValidationResult, not a failure.
   */
  validate(circuit: C, options?: OperationOptions): Promise<BackendResult<ValidationResult>>;

  /**
   * INVALID_SHOTS when shots <= 0 or shots > capabilities().maxShots;
   * INVALID_CIRCUIT / CIRCUIT_TOO_LARGE / UNSUPPORTED per validation.
   * The job is observable as QUEUED once this resolves.
   */
  submit(circuit: C, shots: number, options?: OperationOptions): Promise<BackendResult<JobId>>;

  /** JOB_NOT_FOUND for identifiers this backend never issued. */
  status(jobId: JobId, options?: OperationOptions): Promise<BackendResult<JobStatus>>;

  /** Only defined once status() has reported COMPLETED. */
  result(jobId: JobId, options?: OperationOptions): Promise<BackendResult<ExecutionResult>>;

  /** Best effort. Cancelling a job already in a terminal state is a no-op. */
  cancel(jobId: JobId, options?: OperationOptions): Promise<BackendResult<void>>;

  /**
   * Optional override for backends that can do better than polling
   * (push notifications, server-side long-poll). See waitForResult().
   */
  wait?(jobId: JobId, options?: WaitOptions): Promise<BackendResult<ExecutionResult>>;
}
