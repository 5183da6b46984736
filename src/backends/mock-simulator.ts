/**
 * In-memory simulator backend
 *
 * Implements the full contract without a device: jobs move QUEUED →
 * RUNNING → COMPLETED on a clock, and results are produced at submit time.
 * Useful as a reference implementation and as a test double.
 */

import type { Logger } from 'pino';
import {
  BackendAvailability,
  Capabilities,
  ContractError,
  Counts,
  Err,
  ExecutionResult,
  Ok,
  asJobId,
  canTransition,
  isTerminal,
  type CircuitSummary,
  type CountsData,
  type JobId,
  type JobStatus,
  type ValidationResult,
} from '../models/index.js';
import type { Backend, BackendResult, OperationOptions } from '../core/backend.js';
import { checkCircuit, checkShots, circuitError } from '../core/preflight.js';
import { throwIfAborted } from '../utils/abort.js';
import { generateJobId } from '../utils/hash.js';

export type MockCircuit = CircuitSummary;

export type Sampler = (circuit: MockCircuit, shots: number) => Counts;

export interface MockSimulatorOptions {
  name?: string;
  /** Defaults to Capabilities.simulator(numQubits). */
  capabilities?: Capabilities;
  numQubits?: number;
  /** Time a job spends QUEUED. */
  queueMs?: number;
  /** Time a job spends RUNNING. */
  runMs?: number;
  availability?: BackendAvailability;
  sample?: Sampler;
  /** Return a reason to make the job end FAILED instead of COMPLETED. */
  fail?: (circuit: MockCircuit, shots: number) => string | undefined;
  now?: () => number;
  /** Jobs kept before the oldest terminal ones are forgotten. */
  maxJobs?: number;
  logger?: Logger;
}

interface MockJob {
  status: JobStatus;
  submittedAt: number;
  counts: CountsData;
  shots: number;
  failure: string | undefined;
}

/**
 * Half the shots land on all-zeros, the rest on all-ones.
 */
export const splitSampler: Sampler = (circuit, shots) => {
  const width = Math.max(circuit.numQubits, 1);
  const zeros = Math.floor(shots / 2);
  const counts = new Counts();
  if (zeros > 0) {
    counts.insert('0'.repeat(width), zeros);
  }
  if (shots - zeros > 0) {
    counts.insert('1'.repeat(width), shots - zeros);
  }
  return counts;
};

export class MockSimulatorBackend implements Backend<MockCircuit> {
  private readonly backendName: string;
  private readonly caps: Capabilities;
  private readonly queueMs: number;
  private readonly runMs: number;
  private readonly currentAvailability: BackendAvailability;
  private readonly sample: Sampler;
  private readonly fail: MockSimulatorOptions['fail'];
  private readonly now: () => number;
  private readonly maxJobs: number;
  private readonly logger: Logger | undefined;
  private readonly jobs = new Map<JobId, MockJob>();

  constructor(options: MockSimulatorOptions = {}) {
    this.backendName = options.name ?? 'mock-simulator';
    this.caps = options.capabilities ?? Capabilities.simulator(options.numQubits ?? 5);
    this.queueMs = options.queueMs ?? 500;
    this.runMs = options.runMs ?? 500;
    this.currentAvailability = options.availability ?? BackendAvailability.alwaysAvailable();
    this.sample = options.sample ?? splitSampler;
    this.fail = options.fail;
    this.now = options.now ?? Date.now;
    this.maxJobs = options.maxJobs ?? 10_000;
    this.logger = options.logger;
  }

  name(): string {
    return this.backendName;
  }

  capabilities(): Capabilities {
    return this.caps;
  }

  async availability(options?: OperationOptions): Promise<BackendResult<BackendAvailability>> {
    throwIfAborted(options?.signal);
    return Ok(this.currentAvailability);
  }

  async validate(circuit: MockCircuit, options?: OperationOptions): Promise<BackendResult<ValidationResult>> {
    throwIfAborted(options?.signal);
    return Ok(checkCircuit(circuit, this.caps));
  }

  async submit(circuit: MockCircuit, shots: number, options?: OperationOptions): Promise<BackendResult<JobId>> {
    throwIfAborted(options?.signal);

    const shotsCheck = checkShots(shots, this.caps);
    if (!shotsCheck.ok) {
      return shotsCheck;
    }

    const rejection = circuitError(circuit, this.caps, checkCircuit(circuit, this.caps));
    if (rejection) {
      return Err(rejection);
    }

    if (!this.currentAvailability.isAvailable) {
      return Err(
        new ContractError(
          'BACKEND_UNAVAILABLE',
          `${this.backendName}: ${this.currentAvailability.statusMessage ?? 'offline'}`
        )
      );
    }

    let counts: CountsData;
    let failure: string | undefined;
    try {
      counts = this.sample(circuit, shots).toRecord();
      failure = this.fail?.(circuit, shots);
    } catch (error) {
      const message =
        error instanceof ContractError ? error.detail : error instanceof Error ? error.message : String(error);
      return Err(new ContractError('SUBMISSION_FAILED', `${this.backendName}: ${message}`, { cause: error }));
    }

    const jobId = asJobId(generateJobId('sim'));
    this.jobs.set(jobId, { status: 'QUEUED', submittedAt: this.now(), counts, shots, failure });
    this.evictFinished();

    this.logger?.info({ jobId, backend: this.backendName, shots, numQubits: circuit.numQubits }, 'Job submitted');
    return Ok(jobId);
  }

  async status(jobId: JobId, options?: OperationOptions): Promise<BackendResult<JobStatus>> {
    throwIfAborted(options?.signal);

    const job = this.jobs.get(jobId);
    if (!job) {
      return Err(new ContractError('JOB_NOT_FOUND', jobId, { jobId }));
    }
    return Ok(this.observe(jobId, job));
  }

  async result(jobId: JobId, options?: OperationOptions): Promise<BackendResult<ExecutionResult>> {
    throwIfAborted(options?.signal);

    const job = this.jobs.get(jobId);
    if (!job) {
      return Err(new ContractError('JOB_NOT_FOUND', jobId, { jobId }));
    }

    const status = this.observe(jobId, job);
    if (status !== 'COMPLETED') {
      return Err(
        new ContractError('JOB_NOT_FOUND', `result not available for ${jobId} in state ${status}`, { jobId })
      );
    }
    // A fresh Counts per call; callers own what they get back.
    return Ok(
      new ExecutionResult(Counts.fromRecord(job.counts), job.shots, this.runMs, {
        backend: this.backendName,
        simulated: true,
      })
    );
  }

  async cancel(jobId: JobId, options?: OperationOptions): Promise<BackendResult<void>> {
    throwIfAborted(options?.signal);

    const job = this.jobs.get(jobId);
    if (!job) {
      return Err(new ContractError('JOB_NOT_FOUND', jobId, { jobId }));
    }

    const status = this.observe(jobId, job);
    if (isTerminal(status)) {
      return Ok(undefined);
    }

    this.transition(jobId, job, 'CANCELLED');
    return Ok(undefined);
  }

  // Catch the stored status up with the clock. Reads never move a job
  // further than elapsed time allows, so repeated calls agree.
  private observe(jobId: JobId, job: MockJob): JobStatus {
    if (isTerminal(job.status)) {
      return job.status;
    }

    const elapsed = this.now() - job.submittedAt;
    let target: JobStatus;
    if (elapsed < this.queueMs) {
      target = 'QUEUED';
    } else if (elapsed < this.queueMs + this.runMs) {
      target = 'RUNNING';
    } else {
      target = job.failure === undefined ? 'COMPLETED' : 'FAILED';
    }

    if (job.status === 'QUEUED' && target !== 'QUEUED') {
      this.transition(jobId, job, 'RUNNING');
    }
    if (job.status !== target) {
      this.transition(jobId, job, target);
    }
    return job.status;
  }

  // Oldest terminal jobs go first; live jobs are never dropped.
  private evictFinished(): void {
    for (const [jobId, job] of this.jobs) {
      if (this.jobs.size <= this.maxJobs) {
        return;
      }
      if (isTerminal(this.observe(jobId, job))) {
        this.jobs.delete(jobId);
        this.logger?.debug({ jobId }, 'Job evicted');
      }
    }
  }

  private transition(jobId: JobId, job: MockJob, to: JobStatus): void {
    if (!canTransition(job.status, to)) {
      throw new Error(`Illegal transition ${job.status} -> ${to} for ${jobId}`);
    }
    this.logger?.debug(
      { jobId, from: job.status, to, ...(to === 'FAILED' ? { reason: job.failure } : {}) },
      'Job transition'
    );
    job.status = to;
  }
}
