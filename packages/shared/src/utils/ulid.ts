import { decodeTime, monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

// Monotonic so that ids minted in the same millisecond still sort in creation order.
const nextUlid = monotonicFactory();

export function generateUlid(seedTime?: number): string {
  return nextUlid(seedTime);
}

export function isValidUlid(value: unknown): value is string {
  return typeof value === 'string' && CROCKFORD_BASE32.test(value);
}

/** Millisecond timestamp encoded in a ULID, or null when the value is not one. */
export function ulidTime(value: string): number | null {
  if (!isValidUlid(value)) return null;
  return decodeTime(value);
}
