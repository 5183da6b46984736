/**
 * State machine definitions for job lifecycle
 *
 *   submit() ──→ QUEUED ──→ RUNNING ──→ COMPLETED
 *                  │           │
 *                  │           ├──→ FAILED
 *                  │           │
 *                  └───────────┴──→ CANCELLED
 */

export const JobStatuses = {
  QUEUED: 'QUEUED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type JobStatus = (typeof JobStatuses)[keyof typeof JobStatuses];

export type TerminalStatus = Extract<JobStatus, 'COMPLETED' | 'FAILED' | 'CANCELLED'>;

export type PendingStatus = Extract<JobStatus, 'QUEUED' | 'RUNNING'>;

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === 'COMPLETED' || status === 'FAILED' || status === 'CANCELLED';
}

export function isPending(status: JobStatus): status is PendingStatus {
  return status === 'QUEUED' || status === 'RUNNING';
}

export function isSuccess(status: JobStatus): status is 'COMPLETED' {
  return status === 'COMPLETED';
}

// Exhaustiveness checking
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}

// Transitions are monotonic: a job never moves backward
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (isTerminal(from)) {
    return false;
  }

  switch (from) {
    case 'QUEUED':
      return to === 'RUNNING' || to === 'CANCELLED';
    case 'RUNNING':
      return to === 'COMPLETED' || to === 'FAILED' || to === 'CANCELLED';
    default:
      assertNever(from);
  }
}
