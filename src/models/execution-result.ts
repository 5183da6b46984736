/**
 * Result of circuit execution
 */

import { ExecutionResultSchema, type ExecutionResultData } from './schemas.js';
import { Counts } from './counts.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export interface BitstringProbability {
  bitstring: string;
  probability: number;
}

export class ExecutionResult {
  readonly counts: Counts;
  readonly shots: number;
  readonly executionTimeMs: number | undefined;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(
    counts: Counts,
    shots: number,
    executionTimeMs?: number,
    metadata: Record<string, unknown> = {}
  ) {
    this.counts = counts;
    this.shots = shots;
    this.executionTimeMs = executionTimeMs;
    this.metadata = Object.freeze({ ...metadata });
  }

  static parse(data: unknown): Result<ExecutionResult, ContractError> {
    const parsed = ExecutionResultSchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid execution result: ${parsed.error.message}`));
    }

    const counts = Counts.parse(parsed.data.counts);
    if (!counts.ok) {
      return counts;
    }
    return Ok(
      new ExecutionResult(counts.value, parsed.data.shots, parsed.data.executionTimeMs, parsed.data.metadata)
    );
  }

  withExecutionTime(executionTimeMs: number): ExecutionResult {
    return new ExecutionResult(this.counts, this.shots, executionTimeMs, this.metadata);
  }

  withMetadata(metadata: Record<string, unknown>): ExecutionResult {
    return new ExecutionResult(this.counts, this.shots, this.executionTimeMs, metadata);
  }

  probabilities(): Map<string, number> {
    return this.counts.probabilities();
  }

  mostFrequent(): BitstringProbability | undefined {
    const total = this.counts.totalShots();
    const top = this.counts.mostFrequent();
    if (total === 0 || !top) {
      return undefined;
    }
    return { bitstring: top.bitstring, probability: top.count / total };
  }

  toJSON(): ExecutionResultData {
    return {
      counts: this.counts.toRecord(),
      shots: this.shots,
      ...(this.executionTimeMs !== undefined ? { executionTimeMs: this.executionTimeMs } : {}),
      metadata: { ...this.metadata },
    };
  }
}
