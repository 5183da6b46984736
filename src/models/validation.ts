/**
 * Result of checking a circuit against backend constraints
 *
 * Three outcomes:
 * - valid: submit as-is
 * - invalid: cannot run on this backend (see `reasons`)
 * - requires transpilation: structurally fine, but gates or qubit pairs
 *   must be rewritten for the native gate set / topology first
 */

import { ValidationResultSchema, type ValidationResultData } from './schemas.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export interface ValidationResult {
  readonly isValid: boolean;
  readonly reasons: readonly string[];
  readonly requiresTranspilation: boolean;
  readonly transpilationDetails?: string | undefined;
}

export const ValidationResult = {
  valid(): ValidationResult {
    return Object.freeze({ isValid: true, reasons: [], requiresTranspilation: false });
  },

  invalid(reasons: readonly string[]): ValidationResult {
    return Object.freeze({
      isValid: false,
      reasons: Object.freeze([...reasons]),
      requiresTranspilation: false,
    });
  },

  needsTranspilation(details: string): ValidationResult {
    return Object.freeze({
      isValid: false,
      reasons: [],
      requiresTranspilation: true,
      transpilationDetails: details,
    });
  },

  parse(data: unknown): Result<ValidationResult, ContractError> {
    const parsed = ValidationResultSchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid validation result: ${parsed.error.message}`));
    }
    return Ok(Object.freeze(parsed.data));
  },

  toJSON(result: ValidationResult): ValidationResultData {
    return {
      isValid: result.isValid,
      reasons: [...result.reasons],
      requiresTranspilation: result.requiresTranspilation,
      ...(result.transpilationDetails !== undefined
        ? { transpilationDetails: result.transpilationDetails }
        : {}),
    };
  },
};
