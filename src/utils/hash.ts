/**
 * Hashing utilities
 */

import { createHash, randomBytes } from 'crypto';

export function generateJobId(prefix = 'job'): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString('hex');
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Stable SHA-256 of a JSON-serializable value (toJSON() is honoured).
 * Object keys are sorted recursively, so key order does not matter.
 */
export function stableHash(value: unknown): string {
  const canonicalize = (obj: unknown): unknown => {
    if (obj === null || obj === undefined) {
      return obj;
    }
    if (Array.isArray(obj)) {
      return obj.map(canonicalize);
    }
    if (typeof obj === 'object') {
      const sorted: Record<string, unknown> = {};
      const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [key, entry] of entries) {
        sorted[key] = canonicalize(entry);
      }
      return sorted;
    }
    return obj;
  };

  const serialized = JSON.stringify(value ?? null);
  const plain: unknown = JSON.parse(serialized);
  const content = JSON.stringify(canonicalize(plain));
  return createHash('sha256').update(content, 'utf8').digest('hex');
}
