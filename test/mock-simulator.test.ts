/**
 * In-memory simulator backend tests
 */

import { describe, test, expect } from 'vitest';
import { MockSimulatorBackend, splitSampler } from '../src/backends/mock-simulator.js';
import { waitForResult } from '../src/core/wait.js';
import {
  BackendAvailability,
  Capabilities,
  ContractError,
  Counts,
  asJobId,
  type CircuitSummary,
} from '../src/models/index.js';
import { simulatedClock } from './support/scripted-backend.js';

const bell: CircuitSummary = {
  numQubits: 2,
  operations: [
    { gate: 'h', qubits: [0] },
    { gate: 'cx', qubits: [0, 1] },
  ],
};

function manualClock(): { now: () => number; set: (ms: number) => void } {
  let current = 0;
  return { now: () => current, set: (ms) => (current = ms) };
}

async function submitOk(backend: MockSimulatorBackend, circuit: CircuitSummary, shots: number) {
  const submitted = await backend.submit(circuit, shots);
  if (!submitted.ok) {
    throw submitted.error;
  }
  return submitted.value;
}

describe('MockSimulatorBackend', () => {
  test('identity and capabilities', () => {
    const backend = new MockSimulatorBackend();
    expect(backend.name()).toBe('mock-simulator');
    expect(backend.capabilities()).toBe(backend.capabilities());
    expect(backend.capabilities().numQubits).toBe(5);
    expect(backend.capabilities().isSimulator).toBe(true);
  });

  test('job moves QUEUED → RUNNING → COMPLETED with the clock', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now, queueMs: 100, runMs: 200 });
    const jobId = await submitOk(backend, bell, 1000);

    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'QUEUED' });
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'QUEUED' });

    clock.set(100);
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'RUNNING' });

    clock.set(300);
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'COMPLETED' });

    const result = await backend.result(jobId);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.counts.toRecord()).toEqual({ '00': 500, '11': 500 });
      expect(result.value.shots).toBe(1000);
      expect(result.value.executionTimeMs).toBe(200);
      expect(result.value.metadata).toEqual({ backend: 'mock-simulator', simulated: true });
    }
  });

  test('a late first status read still lands on COMPLETED', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now });
    const jobId = await submitOk(backend, bell, 10);

    clock.set(5_000);
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'COMPLETED' });
  });

  test('result before completion is not available', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now });
    const jobId = await submitOk(backend, bell, 10);

    const result = await backend.result(jobId);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('JOB_NOT_FOUND');
      expect(result.error.detail).toBe(`result not available for ${jobId} in state QUEUED`);
    }
  });

  test('splitSampler puts the odd shot on all-ones', () => {
    const counts = splitSampler({ numQubits: 3, operations: [] }, 5);
    expect(counts.toRecord()).toEqual({ '000': 2, '111': 3 });
    expect(splitSampler({ numQubits: 2, operations: [] }, 1).toRecord()).toEqual({ '11': 1 });
  });

  test('custom sampler', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({
      now: clock.now,
      sample: (_circuit, shots) => Counts.fromRecord({ '01': shots }),
    });
    const jobId = await submitOk(backend, bell, 8);

    clock.set(1_000);
    const result = await backend.result(jobId);
    expect(result.ok && result.value.counts.get('01')).toBe(8);
  });

  test('submit rejects invalid shots', async () => {
    const backend = new MockSimulatorBackend();
    for (const shots of [0, 100_001]) {
      const result = await backend.submit(bell, shots);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('INVALID_SHOTS');
      }
    }
  });

  test('submit maps validation failures to error kinds', async () => {
    const backend = new MockSimulatorBackend({ numQubits: 2 });

    const tooLarge = await backend.submit({ numQubits: 3, operations: [] }, 10);
    const unsupported = await backend.submit({ numQubits: 2, operations: [{ gate: 'ecr', qubits: [0, 1] }] }, 10);
    const invalid = await backend.submit({ numQubits: 2, operations: [{ gate: 'cx', qubits: [0] }] }, 10);

    expect(!tooLarge.ok && tooLarge.error.kind).toBe('CIRCUIT_TOO_LARGE');
    expect(!unsupported.ok && unsupported.error.kind).toBe('UNSUPPORTED');
    expect(!invalid.ok && invalid.error.kind).toBe('INVALID_CIRCUIT');
  });

  test('submit refuses operations beyond the declared width', async () => {
    const backend = new MockSimulatorBackend({ numQubits: 5 });
    const result = await backend.submit({ numQubits: 2, operations: [{ gate: 'x', qubits: [4] }] }, 10);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('INVALID_CIRCUIT');
      expect(result.error.detail).toBe("Operation 0 (x) targets qubit 4, beyond the circuit's 2 qubits");
    }
  });

  test('validate reports problems as a value', async () => {
    const backend = new MockSimulatorBackend({ numQubits: 2 });

    const result = await backend.validate({ numQubits: 3, operations: [] });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.isValid).toBe(false);
      expect(result.value.reasons).toEqual(['Circuit requires 3 qubits, backend has 2']);
    }
  });

  test('unknown job ids', async () => {
    const backend = new MockSimulatorBackend();
    const unknown = asJobId('sim_unknown');

    for (const result of [await backend.status(unknown), await backend.result(unknown), await backend.cancel(unknown)]) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('JOB_NOT_FOUND');
        expect(result.error.jobId).toBe('sim_unknown');
      }
    }
  });

  test('cancel stops a pending job', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now });
    const jobId = await submitOk(backend, bell, 10);

    expect(await backend.cancel(jobId)).toEqual({ ok: true, value: undefined });
    clock.set(10_000);
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'CANCELLED' });

    const waited = await waitForResult(backend, jobId, { sleep: simulatedClock().sleep });
    expect(!waited.ok && waited.error.kind).toBe('JOB_CANCELLED');
  });

  test('cancel on a finished job is a no-op', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now });
    const jobId = await submitOk(backend, bell, 10);

    clock.set(10_000);
    expect(await backend.cancel(jobId)).toEqual({ ok: true, value: undefined });
    expect(await backend.status(jobId)).toEqual({ ok: true, value: 'COMPLETED' });
  });

  test('fail hook ends the job FAILED', async () => {
    const clock = simulatedClock();
    const backend = new MockSimulatorBackend({
      now: clock.now,
      fail: (_circuit, shots) => (shots > 100 ? 'calibration drift' : undefined),
    });
    const jobId = await submitOk(backend, bell, 500);

    const result = await waitForResult(backend, jobId, { sleep: clock.sleep });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('JOB_FAILED');
    }
  });

  test('offline backend refuses submissions', async () => {
    const availability = BackendAvailability.unavailable('Maintenance');
    const backend = new MockSimulatorBackend({ availability });

    expect(await backend.availability()).toEqual({ ok: true, value: availability });

    const result = await backend.submit(bell, 10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('BACKEND_UNAVAILABLE');
      expect(result.error.detail).toBe('mock-simulator: Maintenance');
      expect(result.error.isTransient).toBe(true);
    }
  });

  test('waitForResult polls the simulator to completion', async () => {
    const clock = simulatedClock();
    const backend = new MockSimulatorBackend({ now: clock.now, capabilities: Capabilities.simulator(3) });
    const jobId = await submitOk(backend, bell, 100);

    const result = await waitForResult(backend, jobId, { sleep: clock.sleep });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.counts.totalShots()).toBe(100);
    }
    expect(clock.sleeps).toEqual([500, 500]);
  });

  test('aborted signals reject', async () => {
    const backend = new MockSimulatorBackend();
    await expect(backend.submit(bell, 10, { signal: AbortSignal.abort(new Error('stop')) })).rejects.toThrow('stop');
  });

  test('job ids are unique', async () => {
    const backend = new MockSimulatorBackend();
    const first = await submitOk(backend, bell, 10);
    const second = await submitOk(backend, bell, 10);
    expect(first).not.toBe(second);
    expect(first.startsWith('sim_')).toBe(true);
  });
  test('each result call hands out its own counts', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now });
    const jobId = await submitOk(backend, bell, 10);
    clock.set(1_000);

    const first = await backend.result(jobId);
    if (!first.ok) {
      throw first.error;
    }
    first.value.counts.insert('00', 1_000);

    const second = await backend.result(jobId);
    expect(second.ok).toBe(true);
    if (second.ok) {
      expect(second.value).not.toBe(first.value);
      expect(second.value.counts.totalShots()).toBe(10);
      expect(second.value.counts.toRecord()).toEqual({ '00': 5, '11': 5 });
    }
  });

  test('a throwing sampler fails the submission', async () => {
    const backend = new MockSimulatorBackend({
      sample: () => {
        const counts = new Counts();
        counts.insert('0', 1);
        counts.insert('01', 1);
        return counts;
      },
    });

    const result = await backend.submit(bell, 10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('SUBMISSION_FAILED');
      expect(result.error.detail).toBe('mock-simulator: Bitstring 01 has width 2, expected 1');
      expect(result.error.cause).toBeInstanceOf(ContractError);
      expect(result.error.isTransient).toBe(false);
    }
  });

  test('a throwing fail hook fails the submission', async () => {
    const backend = new MockSimulatorBackend({
      fail: () => {
        throw new Error('hook exploded');
      },
    });

    const result = await backend.submit(bell, 10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('SUBMISSION_FAILED');
      expect(result.error.detail).toBe('mock-simulator: hook exploded');
    }
  });

  test('finished jobs beyond maxJobs are forgotten oldest first', async () => {
    const clock = manualClock();
    const backend = new MockSimulatorBackend({ now: clock.now, maxJobs: 2 });
    const oldest = await submitOk(backend, bell, 10);
    clock.set(1_000);

    const second = await submitOk(backend, bell, 10);
    const third = await submitOk(backend, bell, 10);

    const forgotten = await backend.status(oldest);
    expect(!forgotten.ok && forgotten.error.kind).toBe('JOB_NOT_FOUND');
    expect(await backend.status(second)).toEqual({ ok: true, value: 'QUEUED' });
    expect(await backend.status(third)).toEqual({ ok: true, value: 'QUEUED' });
  });

  test('live jobs are kept past maxJobs', async () => {
    const backend = new MockSimulatorBackend({ now: () => 0, maxJobs: 1 });
    const first = await submitOk(backend, bell, 10);
    const second = await submitOk(backend, bell, 10);

    expect(await backend.status(first)).toEqual({ ok: true, value: 'QUEUED' });
    expect(await backend.status(second)).toEqual({ ok: true, value: 'QUEUED' });
  });
});
