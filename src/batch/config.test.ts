/**
 * Tests for batch limits
 */

import { describe, it, expect } from 'vitest';
import { validateCapacity, DEFAULT_CAPACITY, EVENT_BYTE_LIMIT } from './config.js';
import { ConfigurationError } from '../error/index.js';

describe('validateCapacity', () => {
  it('should default when capacity is absent or zero', () => {
    expect(validateCapacity()).toBe(DEFAULT_CAPACITY);
    expect(validateCapacity(0)).toBe(10);
  });

  it('should accept values up to the service ceiling', () => {
    expect(validateCapacity(1)).toBe(1);
    expect(validateCapacity(10_000)).toBe(10_000);
  });

  it('should reject values out of range', () => {
    expect(() => validateCapacity(-1)).toThrow(ConfigurationError);
    expect(() => validateCapacity(-1)).toThrow('Maximum capacity not in range 0 ... 10000: -1');
    expect(() => validateCapacity(10_001)).toThrow('Maximum capacity not in range 0 ... 10000: 10001');
  });

  it('should reject non-integers', () => {
    expect(() => validateCapacity(2.5)).toThrow(ConfigurationError);
    expect(() => validateCapacity(Number.NaN)).toThrow(ConfigurationError);
  });
});

describe('EVENT_BYTE_LIMIT', () => {
  it('should leave room for the per-event overhead', () => {
    expect(EVENT_BYTE_LIMIT).toBe(1_048_550);
  });
});
