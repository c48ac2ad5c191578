import type { CodeTable, PackedBits, VqSymbol } from '../vqh-types.js';
import { BitWriter } from './bit-writer.js';
import { CorruptStreamError, InvalidSymbolError, UnknownSymbolError } from './errors.js';
import { isValidSymbol } from './frequency.js';
import { assertPrefixFree } from './tree.js';

/**
 * Decoding trie node. Index 0 follows a '0' bit, index 1 a '1' bit.
 */
interface TrieNode {
    symbol: VqSymbol | null;
    next: [TrieNode | null, TrieNode | null];
}

function newTrieNode(): TrieNode {
    return { symbol: null, next: [null, null] };
}

function buildDecodingTrie(table: CodeTable): TrieNode {
    assertPrefixFree(table);
    const root = newTrieNode();
    for (const [symbol, code] of table) {
        let node = root;
        for (let i = 0; i < code.length; i++) {
            const bit = code.charCodeAt(i) === 0x31 ? 1 : 0;
            let child = node.next[bit];
            if (!child) {
                child = newTrieNode();
                node.next[bit] = child;
            }
            node = child;
        }
        node.symbol = symbol;
    }
    return root;
}

export function packedByteLength(bitLength: number): number {
    return Math.ceil(bitLength / 8);
}

/**
 * Concatenates the code of each symbol in order and zero-pads the last byte.
 */
export function packSymbols(symbols: ArrayLike<number>, table: CodeTable): PackedBits {
    let totalBits = 0;
    for (let i = 0; i < symbols.length; i++) {
        const s = symbols[i];
        if (!isValidSymbol(s)) throw new InvalidSymbolError(s, i);
        const code = table.get(s);
        if (code === undefined) throw new UnknownSymbolError(s, i);
        totalBits += code.length;
    }

    const writer = new BitWriter(totalBits);
    for (let i = 0; i < symbols.length; i++) {
        const code = table.get(symbols[i]);
        if (code === undefined) throw new UnknownSymbolError(symbols[i], i);
        writer.writeCode(code);
    }
    return { bytes: writer.finish(), bitLength: writer.bitLength };
}

/**
 * Walks exactly `bitLength` bits through the table's decoding trie.
 * Any disagreement between the stream, the bit length and the expected
 * symbol count raises CorruptStreamError.
 */
export function unpackSymbols(
    bytes: Uint8Array,
    bitLength: number,
    table: CodeTable,
    expectedCount: number
): VqSymbol[] {
    if (!Number.isSafeInteger(bitLength) || bitLength < 0) {
        throw new CorruptStreamError(`Invalid bit length ${bitLength}`);
    }
    if (!Number.isSafeInteger(expectedCount) || expectedCount < 0) {
        throw new CorruptStreamError(`Invalid expected symbol count ${expectedCount}`);
    }
    const expectedBytes = packedByteLength(bitLength);
    if (bytes.length !== expectedBytes) {
        throw new CorruptStreamError('Payload length does not match bit length', expectedBytes, bytes.length);
    }

    const root = buildDecodingTrie(table);
    const out: VqSymbol[] = [];
    let node = root;

    for (let pos = 0; pos < bitLength; pos++) {
        const bit = (bytes[pos >>> 3] >>> (7 - (pos & 7))) & 1;
        const child = node.next[bit];
        if (!child) {
            throw new CorruptStreamError(`Bit ${pos} leads outside the code table`);
        }
        if (child.symbol !== null) {
            if (out.length === expectedCount) {
                throw new CorruptStreamError('Stream holds more symbols than expected', expectedCount, out.length + 1);
            }
            out.push(child.symbol);
            node = root;
        } else {
            node = child;
        }
    }

    if (node !== root) {
        throw new CorruptStreamError('Stream ends in the middle of a code');
    }
    if (out.length !== expectedCount) {
        throw new CorruptStreamError('Symbol count mismatch', expectedCount, out.length);
    }

    const padBits = expectedBytes * 8 - bitLength;
    if (padBits > 0) {
        const mask = (1 << padBits) - 1;
        if ((bytes[expectedBytes - 1] & mask) !== 0) {
            throw new CorruptStreamError('Non-zero padding bits after the last code');
        }
    }
    return out;
}
