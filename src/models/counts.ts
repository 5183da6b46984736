/**
 * Measurement counts from circuit execution
 *
 * Maps fixed-width bitstrings to occurrence counts. The rightmost character
 * is qubit 0: "01" means qubit 0 measured 1 and qubit 1 measured 0.
 */

import { CountsSchema, type CountsData } from './schemas.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

const BITSTRING = /^[01]+$/;

export interface BitstringCount {
  bitstring: string;
  count: number;
}

export class Counts implements Iterable<[string, number]> {
  private readonly counts = new Map<string, number>();
  private width: number | undefined;

  /** Duplicate bitstrings accumulate, as with insert(). */
  static fromPairs(pairs: Iterable<readonly [string, number]>): Counts {
    const counts = new Counts();
    for (const [bitstring, count] of pairs) {
      counts.insert(bitstring, count);
    }
    return counts;
  }

  static fromRecord(record: Readonly<Record<string, number>>): Counts {
    return Counts.fromPairs(Object.entries(record));
  }

  static parse(data: unknown): Result<Counts, ContractError> {
    const parsed = CountsSchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid counts: ${parsed.error.message}`));
    }
    try {
      return Ok(Counts.fromRecord(parsed.data));
    } catch (error) {
      const detail = error instanceof ContractError ? error.detail : String(error);
      return Err(new ContractError('CONFIGURATION', `invalid counts: ${detail}`, { cause: error }));
    }
  }

  /** Throws a BACKEND ContractError on a malformed bitstring, count or width. */
  insert(bitstring: string, count: number): void {
    if (!BITSTRING.test(bitstring)) {
      throw new ContractError('BACKEND', `Invalid bitstring: "${bitstring}"`);
    }
    if (!Number.isInteger(count) || count < 0) {
      throw new ContractError('BACKEND', `Invalid count for ${bitstring}: ${count}`);
    }
    if (this.width !== undefined && bitstring.length !== this.width) {
      throw new ContractError('BACKEND', `Bitstring ${bitstring} has width ${bitstring.length}, expected ${this.width}`);
    }

    this.width = bitstring.length;
    this.counts.set(bitstring, (this.counts.get(bitstring) ?? 0) + count);
  }

  get(bitstring: string): number {
    return this.counts.get(bitstring) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  isEmpty(): boolean {
    return this.counts.size === 0;
  }

  totalShots(): number {
    let total = 0;
    for (const count of this.counts.values()) {
      total += count;
    }
    return total;
  }

  /**
   * Highest count; ties go to the lexicographically smallest bitstring.
   */
  mostFrequent(): BitstringCount | undefined {
    let best: BitstringCount | undefined;
    for (const [bitstring, count] of this.counts) {
      if (!best || count > best.count || (count === best.count && bitstring < best.bitstring)) {
        best = { bitstring, count };
      }
    }
    return best;
  }

  /** Empty when there are no shots. */
  probabilities(): Map<string, number> {
    const total = this.totalShots();
    const probabilities = new Map<string, number>();
    if (total === 0) {
      return probabilities;
    }
    for (const [bitstring, count] of this.counts) {
      probabilities.set(bitstring, count / total);
    }
    return probabilities;
  }

  /** Count descending, then bitstring ascending. */
  sorted(): BitstringCount[] {
    return [...this.counts]
      .map(([bitstring, count]) => ({ bitstring, count }))
      .sort((a, b) => b.count - a.count || (a.bitstring < b.bitstring ? -1 : a.bitstring > b.bitstring ? 1 : 0));
  }

  entries(): IterableIterator<[string, number]> {
    return this.counts.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, number]> {
    return this.counts.entries();
  }

  toRecord(): CountsData {
    return Object.fromEntries(this.counts);
  }

  toJSON(): CountsData {
    return this.toRecord();
  }
}

/**
 * Build a bitstring from per-qubit outcomes where `bits[i]` is qubit i.
 * Backends reporting qubit-0-first results use this to reorder.
 */
export function bitstringFromQubits(bits: readonly (0 | 1)[]): string {
  return [...bits].reverse().join('');
}

/** Outcome of `qubit` in a bitstring (rightmost character is qubit 0). */
export function qubitValue(bitstring: string, qubit: number): 0 | 1 {
  const char = bitstring.charAt(bitstring.length - 1 - qubit);
  if (qubit < 0 || char === '') {
    throw new ContractError('BACKEND', `Qubit ${qubit} out of range for bitstring ${bitstring}`);
  }
  return char === '1' ? 1 : 0;
}
