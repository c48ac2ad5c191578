import type { FrequencyTable, VqSymbol } from '../vqh-types.js';
import { EmptyInputError, InvalidSymbolError } from './errors.js';

export function isValidSymbol(value: unknown): value is VqSymbol {
    return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Counts occurrences of every symbol in the sequence.
 * Map iteration order follows first appearance; consumers that serialize the
 * table must sort by symbol (see sortedSymbols).
 */
export function countFrequencies(symbols: ArrayLike<number>): FrequencyTable {
    if (symbols.length === 0) throw new EmptyInputError();

    const freq: FrequencyTable = new Map();
    for (let i = 0; i < symbols.length; i++) {
        const s = symbols[i];
        if (!isValidSymbol(s)) throw new InvalidSymbolError(s, i);
        freq.set(s, (freq.get(s) ?? 0) + 1);
    }
    return freq;
}

export function sortedSymbols<T>(table: Map<VqSymbol, T>): VqSymbol[] {
    return Array.from(table.keys()).sort((a, b) => a - b);
}
