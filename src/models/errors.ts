/**
 * Error taxonomy for backend operations
 *
 * Callers branch on `kind` (or on `recovery` / `isTransient`), never on
 * message text.
 */

import type { JobId } from './brands.js';

export const ErrorKinds = {
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  TIMEOUT: 'TIMEOUT',
  INVALID_CIRCUIT: 'INVALID_CIRCUIT',
  CIRCUIT_TOO_LARGE: 'CIRCUIT_TOO_LARGE',
  INVALID_SHOTS: 'INVALID_SHOTS',
  UNSUPPORTED: 'UNSUPPORTED',
  SUBMISSION_FAILED: 'SUBMISSION_FAILED',
  JOB_FAILED: 'JOB_FAILED',
  JOB_CANCELLED: 'JOB_CANCELLED',
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  CONFIGURATION: 'CONFIGURATION',
  BACKEND: 'BACKEND',
} as const;

export type ErrorKind = (typeof ErrorKinds)[keyof typeof ErrorKinds];

export const RecoveryClasses = {
  TRANSIENT: 'transient', // Retry with backoff
  PERMANENT: 'permanent', // Fix input or configuration
  TERMINAL: 'terminal', // No further polling will yield a result
  BACKEND_DEFINED: 'backend-defined', // The backend flags each instance
} as const;

export type RecoveryClass = (typeof RecoveryClasses)[keyof typeof RecoveryClasses];

const RECOVERY: Record<ErrorKind, RecoveryClass> = {
  BACKEND_UNAVAILABLE: 'transient',
  TIMEOUT: 'transient',
  INVALID_CIRCUIT: 'permanent',
  CIRCUIT_TOO_LARGE: 'permanent',
  INVALID_SHOTS: 'permanent',
  UNSUPPORTED: 'permanent',
  SUBMISSION_FAILED: 'backend-defined',
  JOB_FAILED: 'terminal',
  JOB_CANCELLED: 'terminal',
  JOB_NOT_FOUND: 'permanent',
  AUTHENTICATION_FAILED: 'permanent',
  CONFIGURATION: 'permanent',
  BACKEND: 'backend-defined',
};

const DESCRIPTIONS: Record<ErrorKind, string> = {
  BACKEND_UNAVAILABLE: 'Backend not available',
  TIMEOUT: 'Timeout waiting for job',
  INVALID_CIRCUIT: 'Invalid circuit',
  CIRCUIT_TOO_LARGE: 'Circuit exceeds backend capabilities',
  INVALID_SHOTS: 'Invalid shots',
  UNSUPPORTED: 'Unsupported feature',
  SUBMISSION_FAILED: 'Job submission failed',
  JOB_FAILED: 'Job failed',
  JOB_CANCELLED: 'Job cancelled',
  JOB_NOT_FOUND: 'Job not found',
  AUTHENTICATION_FAILED: 'Authentication failed',
  CONFIGURATION: 'Configuration error',
  BACKEND: 'Backend error',
};

export function recoveryOf(kind: ErrorKind): RecoveryClass {
  return RECOVERY[kind];
}

export interface ContractErrorOptions {
  jobId?: JobId;
  cause?: unknown;
  /** Only consulted for backend-defined kinds. */
  transient?: boolean;
}

export class ContractError extends Error {
  readonly kind: ErrorKind;
  readonly recovery: RecoveryClass;
  readonly detail: string;
  readonly jobId: JobId | undefined;
  private readonly transientHint: boolean;

  constructor(kind: ErrorKind, detail: string, options: ContractErrorOptions = {}) {
    super(`${DESCRIPTIONS[kind]}: ${detail}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ContractError';
    this.kind = kind;
    this.recovery = RECOVERY[kind];
    this.detail = detail;
    this.jobId = options.jobId;
    this.transientHint = options.transient ?? false;
  }

  get isTransient(): boolean {
    if (this.recovery === 'backend-defined') {
      return this.transientHint;
    }
    return this.recovery === 'transient';
  }

  get isTerminal(): boolean {
    return this.recovery === 'terminal';
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      recovery: this.recovery,
      transient: this.isTransient,
      message: this.message,
      ...(this.jobId !== undefined ? { jobId: this.jobId } : {}),
    };
  }
}

export function isContractError(value: unknown): value is ContractError {
  return value instanceof ContractError;
}

/**
 * Normalize anything a backend threw into the taxonomy.
 */
export function toContractError(error: unknown, jobId?: JobId): ContractError {
  if (error instanceof ContractError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new ContractError('BACKEND', detail, {
    cause: error,
    ...(jobId !== undefined ? { jobId } : {}),
  });
}
