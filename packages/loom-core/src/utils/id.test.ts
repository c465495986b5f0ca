import { describe, it, expect } from 'vitest';
import { generateId, isValidId } from './id.js';

describe('id generation', () => {
  it('generates a ULID', () => {
    const id = generateId();
    expect(id).toHaveLength(26);
    expect(isValidId(id)).toBe(true);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });

  it('validates ULID format', () => {
    expect(isValidId('01ARZ3NDEKTSV4RRFFQ69G5FAV')).toBe(true);
  });

  it('rejects invalid IDs', () => {
    expect(isValidId('')).toBe(false);
    expect(isValidId('too-short')).toBe(false);
    // I, L, O and U are outside the Crockford alphabet
    expect(isValidId('01ARZ3NDEKTSV4RRFFQ69G5FAI')).toBe(false);
  });
});
