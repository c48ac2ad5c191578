import { describe, it, expect } from 'vitest';
import { computeCodingStats, fixedCodeWidth } from '../src/vqh/metrics.js';
import { countFrequencies } from '../src/vqh/frequency.js';
import { buildCodeTable } from '../src/vqh/tree.js';
import { UnknownSymbolError } from '../src/vqh/errors.js';

describe('computeCodingStats()', () => {
    it('reports the documented example', () => {
        const freq = countFrequencies([2, 2, 2, 3, 3, 1]);
        const stats = computeCodingStats(freq, buildCodeTable(freq));

        expect(stats.symbolCount).toBe(6);
        expect(stats.distinctSymbols).toBe(3);
        expect(stats.totalBits).toBe(9);
        expect(stats.averageCodeLength).toBe(1.5);
        expect(stats.entropyBits).toBeCloseTo(1.459148, 5);
        expect(stats.efficiency).toBeCloseTo(0.972765, 5);
        expect(stats.fixedWidthBits).toBe(12);
        expect(stats.ratio).toBeCloseTo(12 / 9, 10);
    });

    it('reports zero entropy for a single symbol', () => {
        const freq = countFrequencies([4, 4, 4, 4]);
        const stats = computeCodingStats(freq, buildCodeTable(freq));
        expect(stats.totalBits).toBe(4);
        expect(stats.averageCodeLength).toBe(1);
        expect(stats.entropyBits).toBeCloseTo(0, 12);
        expect(stats.fixedWidthBits).toBe(12);
    });

    it('rejects a table missing a counted symbol', () => {
        const freq = countFrequencies([0, 1]);
        expect(() => computeCodingStats(freq, new Map([[0, '0']]))).toThrow(UnknownSymbolError);
    });
});

describe('fixedCodeWidth()', () => {
    it('returns the bits needed for the largest symbol', () => {
        expect(fixedCodeWidth(0)).toBe(1);
        expect(fixedCodeWidth(1)).toBe(1);
        expect(fixedCodeWidth(255)).toBe(8);
        expect(fixedCodeWidth(256)).toBe(9);
        expect(fixedCodeWidth(1023)).toBe(10);
    });
});
