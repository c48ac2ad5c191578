/**
 * Container codec: binary and text forms, strict parsing, checksum handling.
 */
import { describe, it, expect, vi } from 'vitest';
import {
    serializeArtifact, parseArtifact, artifactToText, artifactFromText,
    readBinaryContainer, readTextContainer, detectFormat, canonicalMetadata
} from '../src/vqh/container.js';
import { IntegrityError, MalformedContainerError } from '../src/vqh/errors.js';
import type { CompressedArtifact } from '../src/vqh-types.js';
import { tableToObject } from './helpers/test-utils.js';

const HEADER_JSON = '{"shape":[1,2,3],"symbol_count":6,"code_table":{"1":"10","2":"0","3":"11"},"bit_length":9,"payload_length":2}';

function exampleArtifact(): CompressedArtifact {
    return {
        shape: [1, 2, 3],
        symbolCount: 6,
        codeTable: new Map([[1, '10'], [2, '0'], [3, '11']]),
        bitLength: 9,
        payload: Uint8Array.of(0x1f, 0x00),
    };
}

function textDoc(artifact: CompressedArtifact = exampleArtifact()): Record<string, unknown> {
    return JSON.parse(artifactToText(artifact));
}

function expectMalformed(fn: () => unknown, field: string): void {
    try {
        fn();
        expect.unreachable();
    } catch (err) {
        expect(err).toBeInstanceOf(MalformedContainerError);
        expect(err).toMatchObject({ field });
    }
}

describe('Binary container', () => {
    it('writes the documented layout', () => {
        const bytes = serializeArtifact(exampleArtifact());
        const headerLen = new TextEncoder().encode(HEADER_JSON).length;

        expect(new TextDecoder().decode(bytes.subarray(0, 4))).toBe('VQHC');
        expect(Array.from(bytes.subarray(4, 8))).toEqual([1, 0, 0, 0]);
        expect(new DataView(bytes.buffer, bytes.byteOffset).getUint32(8, true)).toBe(headerLen);
        expect(new TextDecoder().decode(bytes.subarray(12, 12 + headerLen))).toBe(HEADER_JSON);
        expect(Array.from(bytes.subarray(12 + headerLen, 14 + headerLen))).toEqual([0x1f, 0x00]);
        expect(bytes.length).toBe(12 + headerLen + 2 + 32);
    });

    it('round-trips an artifact', () => {
        const parsed = parseArtifact(serializeArtifact(exampleArtifact()));
        expect(parsed.shape).toEqual([1, 2, 3]);
        expect(parsed.symbolCount).toBe(6);
        expect(parsed.bitLength).toBe(9);
        expect(tableToObject(parsed.codeTable)).toEqual({ 1: '10', 2: '0', 3: '11' });
        expect(Array.from(parsed.payload)).toEqual([0x1f, 0x00]);
    });

    it('is byte-identical regardless of code table insertion order', () => {
        const reordered = { ...exampleArtifact(), codeTable: new Map([[3, '11'], [2, '0'], [1, '10']]) };
        expect(serializeArtifact(reordered)).toEqual(serializeArtifact(exampleArtifact()));
    });

    it('rejects bad magic, version and truncated preambles', () => {
        const bytes = serializeArtifact(exampleArtifact());

        const badMagic = bytes.slice();
        badMagic[0] = 0x58;
        expectMalformed(() => readBinaryContainer(badMagic), 'magic');

        const badVersion = bytes.slice();
        badVersion[4] = 2;
        expectMalformed(() => readBinaryContainer(badVersion), 'version');

        const badCodec = bytes.slice();
        badCodec[6] = 9;
        expectMalformed(() => readBinaryContainer(badCodec), 'outer_codec');

        const badFlags = bytes.slice();
        badFlags[5] = 0x01;
        expectMalformed(() => readBinaryContainer(badFlags), 'flags');

        expectMalformed(() => readBinaryContainer(bytes.slice(0, 10)), 'preamble');
    });

    it('rejects a header length that runs past the container', () => {
        const bytes = serializeArtifact(exampleArtifact());
        new DataView(bytes.buffer, bytes.byteOffset).setUint32(8, 10_000, true);
        expectMalformed(() => readBinaryContainer(bytes), 'header_length');
    });

    it('raises IntegrityError when a payload or header byte changes', () => {
        const bytes = serializeArtifact(exampleArtifact());
        const headerLen = bytes.length - 12 - 2 - 32;

        const payloadFlip = bytes.slice();
        payloadFlip[12 + headerLen] ^= 0x01;
        expect(() => readBinaryContainer(payloadFlip)).toThrow(IntegrityError);

        const headerFlip = bytes.slice();
        headerFlip[20] ^= 0x01;
        expect(() => readBinaryContainer(headerFlip)).toThrow(IntegrityError);
    });

    it('logs and continues on checksum mismatch in warn mode', () => {
        const bytes = serializeArtifact(exampleArtifact());
        bytes[bytes.length - 1] ^= 0xff;
        const warn = vi.fn();

        const container = readBinaryContainer(bytes, { integrityMode: 'warn', logger: { warn } });
        expect(container.header.symbolCount).toBe(6);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(
            '[vqh] Container checksum mismatch: data was modified or truncated; continuing in warn mode'
        );
    });

    it('rejects every truncation of a container', () => {
        const bytes = serializeArtifact(exampleArtifact());
        for (let i = 0; i < bytes.length; i++) {
            expect(() => parseArtifact(bytes.slice(0, i)), `offset ${i}/${bytes.length}`).toThrow();
        }
    });
});

describe('Text container', () => {
    it('writes a JSON document with base64 payload and checksum', () => {
        const doc = textDoc();
        expect(doc.format).toBe('vqh');
        expect(doc.version).toBe(1);
        expect(doc.outer_codec).toBe('none');
        expect(doc.shape).toEqual([1, 2, 3]);
        expect(doc.code_table).toEqual({ 1: '10', 2: '0', 3: '11' });
        expect(doc.bit_length).toBe(9);
        expect(doc.payload).toBe('HwA=');
        expect(doc.checksum).toMatch(/^[0-9a-f]{64}$/);
        expect(doc.encryption).toBeUndefined();
    });

    it('round-trips an artifact', () => {
        const parsed = artifactFromText(artifactToText(exampleArtifact()));
        expect(parsed.shape).toEqual([1, 2, 3]);
        expect(tableToObject(parsed.codeTable)).toEqual({ 1: '10', 2: '0', 3: '11' });
        expect(Array.from(parsed.payload)).toEqual([0x1f, 0x00]);
    });

    it('names the missing or invalid field', () => {
        const cases: Array<[string, (doc: Record<string, unknown>) => void]> = [
            ['shape', (d) => { delete d.shape; }],
            ['shape', (d) => { d.shape = [2, 0]; }],
            ['symbol_count', (d) => { d.symbol_count = 0; }],
            ['code_table', (d) => { d.code_table = {}; }],
            ['code_table', (d) => { d.code_table = { 1: '0', 2: '01' }; }],
            ['code_table', (d) => { d.code_table = { x: '0' }; }],
            ['bit_length', (d) => { d.bit_length = -1; }],
            ['payload_length', (d) => { d.payload_length = 3; }],
            ['payload', (d) => { d.payload = 'not base64!'; }],
            ['checksum', (d) => { delete d.checksum; }],
            ['format', (d) => { d.format = 'other'; }],
            ['version', (d) => { d.version = 2; }],
            ['outer_codec', (d) => { d.outer_codec = 'brotli'; }],
        ];
        for (const [field, mutate] of cases) {
            const doc = textDoc();
            mutate(doc);
            expectMalformed(() => readTextContainer(JSON.stringify(doc)), field);
        }
    });

    it('detects tampering with header fields through the checksum', () => {
        const doc = textDoc();
        doc.bit_length = 10;
        expect(() => readTextContainer(JSON.stringify(doc))).toThrow(IntegrityError);
    });

    it('rejects documents that are not JSON objects', () => {
        expectMalformed(() => readTextContainer('{"format":'), 'document');
        expectMalformed(() => readTextContainer('[]'), 'document');
    });
});

describe('detectFormat()', () => {
    it('tells binary from text', () => {
        expect(detectFormat(serializeArtifact(exampleArtifact()))).toBe('binary');
        expect(detectFormat(new TextEncoder().encode('\n  {"format":"vqh"}'))).toBe('text');
        expect(detectFormat(Uint8Array.of(0x00, 0x01))).toBeNull();
        expect(detectFormat(new Uint8Array(0))).toBeNull();
    });
});

describe('canonicalMetadata()', () => {
    it('covers shape, count, table and bit length in fixed order', () => {
        const meta = new TextDecoder().decode(canonicalMetadata(exampleArtifact()));
        expect(meta).toBe('{"shape":[1,2,3],"symbol_count":6,"code_table":{"1":"10","2":"0","3":"11"},"bit_length":9}');
    });
});
