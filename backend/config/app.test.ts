import { describe, expect, it } from 'vitest';
import { parsePositiveInt } from './app';

describe('parsePositiveInt', () => {
    it('reads a positive integer', () => {
        expect(parsePositiveInt('3', 5)).toBe(3);
        expect(parsePositiveInt(' 8 ', 5)).toBe(8);
    });

    it('falls back for missing, non-numeric, zero or fractional values', () => {
        expect(parsePositiveInt(undefined, 5)).toBe(5);
        expect(parsePositiveInt('', 5)).toBe(5);
        expect(parsePositiveInt('deep', 5)).toBe(5);
        expect(parsePositiveInt('0', 5)).toBe(5);
        expect(parsePositiveInt('-2', 5)).toBe(5);
        expect(parsePositiveInt('2.5', 5)).toBe(5);
    });
});
