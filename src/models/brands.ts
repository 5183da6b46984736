/**
 * Branded types to prevent string mixing
 * Using nominal typing pattern for type safety
 */

declare const brand: unique symbol;

export type Brand<T, TBrand extends string> = T & { readonly [brand]: TBrand };

// Backend-issued, opaque to callers. Compared by value.
export type JobId = Brand<string, 'JobId'>;

export function isJobId(value: unknown): value is JobId {
  return typeof value === 'string' && value.length > 0;
}

export function asJobId(value: string): JobId {
  if (!isJobId(value)) {
    throw new Error(`Invalid JobId: ${value}`);
  }
  return value;
}
