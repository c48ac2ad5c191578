import type { CodeTable, FrequencyTable } from '../vqh-types.js';
import { UnknownSymbolError } from './errors.js';
import { sortedSymbols } from './frequency.js';

export interface CodingStats {
    symbolCount: number;
    distinctSymbols: number;
    /** Payload size in bits before padding. */
    totalBits: number;
    averageCodeLength: number;
    /** Shannon entropy of the frequency table, bits per symbol. */
    entropyBits: number;
    /** entropyBits / averageCodeLength, 1 for a perfectly efficient code. */
    efficiency: number;
    /** Bits needed with a fixed-width code wide enough for the largest symbol. */
    fixedWidthBits: number;
    /** fixedWidthBits / totalBits */
    ratio: number;
}

export function fixedCodeWidth(maxSymbol: number): number {
    return Math.max(1, Math.ceil(Math.log2(maxSymbol + 1)));
}

export function computeCodingStats(freq: FrequencyTable, table: CodeTable): CodingStats {
    let symbolCount = 0;
    let totalBits = 0;
    let maxSymbol = 0;
    for (const symbol of sortedSymbols(freq)) {
        const count = freq.get(symbol) ?? 0;
        const code = table.get(symbol);
        if (code === undefined) throw new UnknownSymbolError(symbol);
        symbolCount += count;
        totalBits += count * code.length;
        maxSymbol = Math.max(maxSymbol, symbol);
    }

    let entropyBits = 0;
    for (const count of freq.values()) {
        const p = count / symbolCount;
        entropyBits -= p * Math.log2(p);
    }

    const averageCodeLength = symbolCount > 0 ? totalBits / symbolCount : 0;
    const fixedWidthBits = symbolCount * fixedCodeWidth(maxSymbol);
    return {
        symbolCount,
        distinctSymbols: freq.size,
        totalBits,
        averageCodeLength,
        entropyBits,
        efficiency: averageCodeLength > 0 ? entropyBits / averageCodeLength : 0,
        fixedWidthBits,
        ratio: totalBits > 0 ? fixedWidthBits / totalBits : 0,
    };
}
