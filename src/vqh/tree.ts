/**
 * Huffman tree construction and code-table extraction.
 *
 * Convention (fixed, part of the container format):
 * - Leaves are ranked by ascending symbol value (order 0..N-1).
 * - Every merged node takes the next order value (N, N+1, ...).
 * - The heap pops by (weight, order), so equal weights resolve to the
 *   lower-ranked node first.
 * - The first node popped becomes the '0' child, the second the '1' child.
 * - A table with a single symbol assigns it the code "0".
 *
 * Rebuilding from an identical frequency table therefore always yields
 * byte-identical codes.
 */
import type { CodeTable, FrequencyTable, VqSymbol } from '../vqh-types.js';
import { DegenerateTableError, EmptyInputError } from './errors.js';
import { isValidSymbol, sortedSymbols } from './frequency.js';
import { MinHeap } from './min-heap.js';

export interface HuffmanLeaf {
    kind: 'leaf';
    symbol: VqSymbol;
    weight: number;
    order: number;
}

export interface HuffmanInternal {
    kind: 'internal';
    weight: number;
    order: number;
    zero: HuffmanNode;
    one: HuffmanNode;
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

export const SINGLE_SYMBOL_CODE = '0';

function compareNodes(a: HuffmanNode, b: HuffmanNode): number {
    return a.weight !== b.weight ? a.weight - b.weight : a.order - b.order;
}

export function buildHuffmanTree(freq: FrequencyTable): HuffmanNode {
    if (freq.size === 0) throw new EmptyInputError('Cannot build a Huffman tree from an empty frequency table');

    const heap = new MinHeap<HuffmanNode>(compareNodes);
    let order = 0;
    for (const symbol of sortedSymbols(freq)) {
        const weight = freq.get(symbol) ?? 0;
        if (!isValidSymbol(symbol)) {
            throw new DegenerateTableError(`Frequency table contains invalid symbol ${symbol}`);
        }
        if (!Number.isSafeInteger(weight) || weight <= 0) {
            throw new DegenerateTableError(`Frequency table has non-positive count ${weight} for symbol ${symbol}`);
        }
        heap.push({ kind: 'leaf', symbol, weight, order: order++ });
    }

    for (;;) {
        const zero = heap.pop();
        const one = heap.pop();
        if (!zero) throw new EmptyInputError('Cannot build a Huffman tree from an empty frequency table');
        if (!one) return zero;
        heap.push({ kind: 'internal', weight: zero.weight + one.weight, order: order++, zero, one });
    }
}

export function codeTableFromTree(root: HuffmanNode): CodeTable {
    const table: CodeTable = new Map();
    if (root.kind === 'leaf') {
        table.set(root.symbol, SINGLE_SYMBOL_CODE);
        return table;
    }

    // Iterative walk; depth is bounded by the alphabet size but can still be large for skewed inputs.
    const stack: Array<{ node: HuffmanNode; code: string }> = [{ node: root, code: '' }];
    for (let entry = stack.pop(); entry; entry = stack.pop()) {
        const { node, code } = entry;
        if (node.kind === 'leaf') {
            table.set(node.symbol, code);
        } else {
            stack.push({ node: node.one, code: code + '1' });
            stack.push({ node: node.zero, code: code + '0' });
        }
    }
    return table;
}

export function buildCodeTable(freq: FrequencyTable): CodeTable {
    return codeTableFromTree(buildHuffmanTree(freq));
}

/**
 * Returns a description of the first structural problem in the table, or null.
 * Checks: non-empty table, valid symbols, non-empty binary codes, prefix property.
 */
export function findCodeTableViolation(table: CodeTable): string | null {
    if (table.size === 0) return 'table is empty';

    const entries: Array<{ symbol: VqSymbol; code: string }> = [];
    for (const [symbol, code] of table) {
        if (!isValidSymbol(symbol)) return `symbol ${symbol} is not a non-negative integer`;
        if (typeof code !== 'string' || code.length === 0) return `symbol ${symbol} has an empty code`;
        if (!/^[01]+$/.test(code)) return `symbol ${symbol} has a non-binary code "${code}"`;
        entries.push({ symbol, code });
    }

    // After lexicographic sort, a prefix always sorts immediately before some code it prefixes.
    entries.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
    for (let i = 1; i < entries.length; i++) {
        const prev = entries[i - 1];
        const cur = entries[i];
        if (cur.code.startsWith(prev.code)) {
            return prev.code === cur.code
                ? `symbols ${prev.symbol} and ${cur.symbol} share code "${cur.code}"`
                : `code "${prev.code}" of symbol ${prev.symbol} is a prefix of "${cur.code}" (symbol ${cur.symbol})`;
        }
    }
    return null;
}

export function assertPrefixFree(table: CodeTable): void {
    const violation = findCodeTableViolation(table);
    if (violation !== null) throw new DegenerateTableError(`Invalid code table: ${violation}`);
}
