import { randomUUID } from 'crypto';
import { InvalidIdentityError } from './error-log.errors';

const HEX32 = /^[0-9a-f]{32}$/;
const HYPHENATED = /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/;

/** Allocates a random 128-bit identity in its hyphenated form. */
export function newErrorId(): string {
  return randomUUID();
}

/**
 * Accepts the 32-hex storage key, the hyphenated form, or the hyphenated
 * form in braces (any case) and returns the canonical hyphenated form.
 */
export function parseErrorId(raw: string): string {
  if (typeof raw !== 'string' || raw.length === 0) {
    throw new InvalidIdentityError('Error id is required');
  }
  let s = raw.trim().toLowerCase();
  if (s.startsWith('{') && s.endsWith('}')) s = s.slice(1, -1);
  if (HEX32.test(s)) {
    return [s.slice(0, 8), s.slice(8, 12), s.slice(12, 16), s.slice(16, 20), s.slice(20)].join('-');
  }
  if (HYPHENATED.test(s)) return s;
  throw new InvalidIdentityError(`Malformed error id: "${raw}"`);
}

export function toStorageKey(id: string): string {
  return parseErrorId(id).replace(/-/g, '');
}

export function fromStorageKey(key: string): string {
  return parseErrorId(key);
}
