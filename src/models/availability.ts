/**
 * Backend availability
 *
 * "Busy" or "offline" is a value, not a failure: callers can tell a live but
 * loaded backend apart from one they cannot reach.
 */

import { BackendAvailabilitySchema, type BackendAvailabilityData } from './schemas.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export type BackendAvailability = Readonly<BackendAvailabilityData>;

export const BackendAvailability = {
  /** Zero queue, zero wait. Typical for simulators. */
  alwaysAvailable(): BackendAvailability {
    return Object.freeze({ isAvailable: true, queueDepth: 0, estimatedWaitSecs: 0 });
  },

  unavailable(reason: string): BackendAvailability {
    return Object.freeze({ isAvailable: false, statusMessage: reason });
  },

  parse(data: unknown): Result<BackendAvailability, ContractError> {
    const parsed = BackendAvailabilitySchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid availability: ${parsed.error.message}`));
    }
    return Ok(Object.freeze(parsed.data));
  },
};
