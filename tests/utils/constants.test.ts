import { describe, it, expect } from '@jest/globals';
import { parsePositiveInt } from '../../src/utils/constants';

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('2500', 10000)).toBe(2500);
  });

  it('should fall back when unset or empty', () => {
    expect(parsePositiveInt(undefined, 10000)).toBe(10000);
    expect(parsePositiveInt('', 10000)).toBe(10000);
  });

  it('should fall back for invalid or non-positive values', () => {
    expect(parsePositiveInt('soon', 10000)).toBe(10000);
    expect(parsePositiveInt('0', 10000)).toBe(10000);
    expect(parsePositiveInt('-5', 10000)).toBe(10000);
  });
});
