/**
 * Pre-flight checks against a Capabilities snapshot
 *
 * Backends describe their own circuit type as a CircuitSummary (qubit count
 * plus the gate/qubit list) and reuse these checks in validate() and
 * submit().
 */

import {
  ContractError,
  Err,
  Ok,
  ValidationResult,
  type Capabilities,
  type CircuitSummary,
  type Operation,
} from '../models/index.js';
import type { BackendResult } from './backend.js';

export function checkShots(shots: number, capabilities: Capabilities): BackendResult<number> {
  if (!Number.isInteger(shots) || shots <= 0 || shots > capabilities.maxShots) {
    return Err(
      new ContractError('INVALID_SHOTS', `shots must be in 1..=${capabilities.maxShots}, got ${shots}`)
    );
  }
  return Ok(shots);
}

/**
 * Structural problems (too many qubits, qubit indices out of range of the
 * device or of the circuit's declared width, bad arity) make the circuit
 * invalid. Gates outside the native set and
 * multi-qubit operations on uncoupled qubits only need transpilation.
 */
export function checkCircuit(summary: CircuitSummary, capabilities: Capabilities): ValidationResult {
  const reasons: string[] = [];
  const rewrites = new Set<string>();

  if (summary.numQubits > capabilities.numQubits) {
    reasons.push(`Circuit requires ${summary.numQubits} qubits, backend has ${capabilities.numQubits}`);
  }

  summary.operations.forEach((operation, index) => {
    const problem = structuralProblem(operation, index, summary.numQubits, capabilities);
    if (problem) {
      reasons.push(problem);
      return;
    }

    const gate = operation.gate.toLowerCase();
    if (!capabilities.gateSet.contains(gate)) {
      rewrites.add(`gate ${gate} is not supported and must be decomposed`);
    } else if (!capabilities.gateSet.isNative(gate)) {
      rewrites.add(`gate ${gate} is not native`);
    }

    if (operation.qubits.length > 1 && !capabilities.topology.isUnspecified()) {
      for (const [a, b] of uncoupledPairs(operation.qubits, capabilities)) {
        rewrites.add(`qubits ${a} and ${b} are not coupled (${gate})`);
      }
    }
  });

  if (reasons.length > 0) {
    return ValidationResult.invalid(reasons);
  }
  if (rewrites.size > 0) {
    return ValidationResult.needsTranspilation([...rewrites].join('; '));
  }
  return ValidationResult.valid();
}

/**
 * Map a failed validation to the error submit() should report.
 */
export function circuitError(
  summary: CircuitSummary,
  capabilities: Capabilities,
  validation: ValidationResult
): ContractError | undefined {
  if (validation.isValid) {
    return undefined;
  }
  if (summary.numQubits > capabilities.numQubits) {
    return new ContractError(
      'CIRCUIT_TOO_LARGE',
      `circuit uses ${summary.numQubits} qubits, ${capabilities.name} has ${capabilities.numQubits}`
    );
  }
  if (validation.requiresTranspilation) {
    return new ContractError(
      'UNSUPPORTED',
      `circuit requires transpilation for ${capabilities.name}: ${validation.transpilationDetails ?? 'no details'}`
    );
  }
  return new ContractError('INVALID_CIRCUIT', validation.reasons.join('; '));
}

function structuralProblem(
  operation: Operation,
  index: number,
  circuitQubits: number,
  capabilities: Capabilities
): string | undefined {
  const gate = operation.gate.toLowerCase();
  const arity = operation.qubits.length;

  if (arity < 1 || arity > 3) {
    return `Operation ${index} (${gate}) acts on ${arity} qubits; only 1-3 qubit operations are supported`;
  }

  const expected = capabilities.gateSet.arityOf(gate);
  if (expected !== undefined && expected !== arity) {
    return `Operation ${index} (${gate}) acts on ${arity} qubits, gate takes ${expected}`;
  }

  for (const qubit of operation.qubits) {
    if (!Number.isInteger(qubit) || qubit < 0 || qubit >= capabilities.numQubits) {
      return `Operation ${index} (${gate}) targets qubit ${qubit}, outside 0..${capabilities.numQubits - 1}`;
    }
    if (qubit >= circuitQubits) {
      return `Operation ${index} (${gate}) targets qubit ${qubit}, beyond the circuit's ${circuitQubits} qubits`;
    }
  }

  if (new Set(operation.qubits).size !== arity) {
    return `Operation ${index} (${gate}) repeats a qubit`;
  }

  return undefined;
}

// Three-qubit operations need every operand pair coupled.
function uncoupledPairs(qubits: readonly number[], capabilities: Capabilities): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < qubits.length; i++) {
    for (let j = i + 1; j < qubits.length; j++) {
      const a = qubits[i];
      const b = qubits[j];
      if (a !== undefined && b !== undefined && !capabilities.topology.isConnected(a, b)) {
        pairs.push([a, b]);
      }
    }
  }
  return pairs;
}
