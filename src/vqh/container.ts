/**
 * VQH container codec.
 *
 * Binary layout (little-endian):
 *   [magic "VQHC" (4)] [version u8] [flags u8] [outerCodec u8] [reserved u8]
 *   [headerLen u32] [header JSON (headerLen)] [stored payload] [SHA-256 (32)]
 *
 * Text layout: a single JSON document carrying the same header fields plus
 * `format`, `version`, `outer_codec`, base64 `payload` and a hex `checksum`.
 *
 * The header JSON is canonical: fixed key order and code-table keys in
 * ascending symbol order, so identical artifacts produce identical bytes.
 */
import type { CodeTable, CompressedArtifact } from '../vqh-types.js';
import type { ContainerFormat, VqhLogger } from './types.js';
import {
    VQH_MAGIC, VQH_VERSION_BYTE, VQH_PREAMBLE_SIZE, VQH_CHECKSUM_SIZE, VQH_TEXT_FORMAT,
    VQH_FLAGS, OuterCodecId, OUTER_CODEC_NAMES, ENCRYPTION_KDF, toOuterCodecId
} from './format.js';
import { IntegrityError, MalformedContainerError } from './errors.js';
import { sortedSymbols } from './frequency.js';
import { findCodeTableViolation } from './tree.js';
import { isValidShape } from './grid.js';
import { digestsEqual, sha256, sha256Hex } from './integrity.js';
import type { EncryptionParams } from './encryption.js';

export interface ContainerHeader {
    shape: number[];
    symbolCount: number;
    codeTable: CodeTable;
    bitLength: number;
    /** Length of the payload as stored (after outer codec and encryption). */
    payloadLength: number;
    encryption: EncryptionParams | null;
}

/** A parsed container before the stored payload is decrypted and decompressed. */
export interface StoredContainer {
    format: ContainerFormat;
    version: number;
    outerCodec: OuterCodecId;
    header: ContainerHeader;
    payload: Uint8Array;
}

export interface ParseOptions {
    integrityMode?: 'strict' | 'warn';
    logger?: VqhLogger | null;
}

type JsonRecord = Record<string, unknown>;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInt(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

// ----------------------------------------------------------------------------
// Canonical JSON
// ----------------------------------------------------------------------------

function codeTableToObject(table: CodeTable): Record<string, string> {
    const out: Record<string, string> = {};
    for (const symbol of sortedSymbols(table)) {
        const code = table.get(symbol);
        if (code !== undefined) out[String(symbol)] = code;
    }
    return out;
}

function toBase64(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Canonical metadata shared by every encoding; also the AAD for encryption.
 */
export function canonicalMetadata(meta: Pick<ContainerHeader, 'shape' | 'symbolCount' | 'codeTable' | 'bitLength'>): Uint8Array {
    return textEncoder.encode(JSON.stringify({
        shape: meta.shape,
        symbol_count: meta.symbolCount,
        code_table: codeTableToObject(meta.codeTable),
        bit_length: meta.bitLength,
    }));
}

function headerToObject(header: ContainerHeader): JsonRecord {
    const obj: JsonRecord = {
        shape: header.shape,
        symbol_count: header.symbolCount,
        code_table: codeTableToObject(header.codeTable),
        bit_length: header.bitLength,
        payload_length: header.payloadLength,
    };
    if (header.encryption) {
        obj.encryption = {
            kdf: header.encryption.kdf,
            iterations: header.encryption.iterations,
            salt: toBase64(header.encryption.salt),
            nonce: toBase64(header.encryption.nonce),
            tag: toBase64(header.encryption.tag),
        };
    }
    return obj;
}

function canonicalHeaderBytes(header: ContainerHeader): Uint8Array {
    return textEncoder.encode(JSON.stringify(headerToObject(header)));
}

// ----------------------------------------------------------------------------
// Strict field validation
// ----------------------------------------------------------------------------

function requireField(obj: JsonRecord, field: string, prefix: string = ''): unknown {
    const value = obj[field];
    if (value === undefined || value === null) {
        throw new MalformedContainerError(prefix + field, 'is missing');
    }
    return value;
}

function decodeBase64Field(value: unknown, field: string, expectedLength?: number): Uint8Array {
    if (typeof value !== 'string' || value.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(value)) {
        throw new MalformedContainerError(field, 'is not a base64 string');
    }
    const bytes = new Uint8Array(Buffer.from(value, 'base64'));
    if (expectedLength !== undefined && bytes.length !== expectedLength) {
        throw new MalformedContainerError(field, `must decode to ${expectedLength} bytes, got ${bytes.length}`);
    }
    return bytes;
}

function parseCodeTable(value: unknown): CodeTable {
    if (!isRecord(value)) {
        throw new MalformedContainerError('code_table', 'must be an object of symbol -> bit string');
    }
    const table: CodeTable = new Map();
    for (const [key, code] of Object.entries(value)) {
        if (!/^(0|[1-9]\d*)$/.test(key) || !Number.isSafeInteger(Number(key))) {
            throw new MalformedContainerError('code_table', `has non-integer symbol key "${key}"`);
        }
        if (typeof code !== 'string') {
            throw new MalformedContainerError('code_table', `has a non-string code for symbol ${key}`);
        }
        table.set(Number(key), code);
    }
    const violation = findCodeTableViolation(table);
    if (violation !== null) {
        throw new MalformedContainerError('code_table', violation);
    }
    return table;
}

function parseEncryption(value: unknown): EncryptionParams {
    if (!isRecord(value)) {
        throw new MalformedContainerError('encryption', 'must be an object');
    }
    const kdf = requireField(value, 'kdf', 'encryption.');
    if (kdf !== ENCRYPTION_KDF) {
        throw new MalformedContainerError('encryption.kdf', `must be "${ENCRYPTION_KDF}"`);
    }
    const iterations = requireField(value, 'iterations', 'encryption.');
    if (!isNonNegativeInt(iterations) || iterations === 0) {
        throw new MalformedContainerError('encryption.iterations', 'must be a positive integer');
    }
    return {
        kdf: ENCRYPTION_KDF,
        iterations,
        salt: decodeBase64Field(requireField(value, 'salt', 'encryption.'), 'encryption.salt', 16),
        nonce: decodeBase64Field(requireField(value, 'nonce', 'encryption.'), 'encryption.nonce', 12),
        tag: decodeBase64Field(requireField(value, 'tag', 'encryption.'), 'encryption.tag', 16),
    };
}

function parseHeaderObject(obj: JsonRecord): ContainerHeader {
    const shape = requireField(obj, 'shape');
    if (!isValidShape(shape)) {
        throw new MalformedContainerError('shape', 'must be a non-empty array of positive integers');
    }

    const symbolCount = requireField(obj, 'symbol_count');
    if (!isNonNegativeInt(symbolCount) || symbolCount === 0) {
        throw new MalformedContainerError('symbol_count', 'must be a positive integer');
    }

    const codeTable = parseCodeTable(requireField(obj, 'code_table'));

    const bitLength = requireField(obj, 'bit_length');
    if (!isNonNegativeInt(bitLength)) {
        throw new MalformedContainerError('bit_length', 'must be a non-negative integer');
    }

    const payloadLength = requireField(obj, 'payload_length');
    if (!isNonNegativeInt(payloadLength)) {
        throw new MalformedContainerError('payload_length', 'must be a non-negative integer');
    }

    const encryption = obj.encryption === undefined ? null : parseEncryption(obj.encryption);

    return { shape: [...shape], symbolCount, codeTable, bitLength, payloadLength, encryption };
}

function parseJson(bytes: Uint8Array, field: string): JsonRecord {
    let parsed: unknown;
    try {
        parsed = JSON.parse(textDecoder.decode(bytes));
    } catch (err) {
        throw new MalformedContainerError(field, `is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isRecord(parsed)) {
        throw new MalformedContainerError(field, 'must be a JSON object');
    }
    return parsed;
}

function checkIntegrity(ok: boolean, options: ParseOptions): void {
    if (ok) return;
    const msg = 'Container checksum mismatch: data was modified or truncated';
    if ((options.integrityMode ?? 'strict') === 'strict') {
        throw new IntegrityError(msg);
    }
    options.logger?.warn?.(`[vqh] ${msg}; continuing in warn mode`);
}

// ----------------------------------------------------------------------------
// Binary form
// ----------------------------------------------------------------------------

export function writeBinaryContainer(container: Omit<StoredContainer, 'format' | 'version'>): Uint8Array {
    const { header, payload, outerCodec } = container;
    if (header.payloadLength !== payload.length) {
        throw new MalformedContainerError('payload_length', `is ${header.payloadLength} but payload holds ${payload.length} bytes`);
    }
    const headerBytes = canonicalHeaderBytes(header);
    const bodyLength = VQH_PREAMBLE_SIZE + headerBytes.length + payload.length;
    const out = new Uint8Array(bodyLength + VQH_CHECKSUM_SIZE);
    const view = new DataView(out.buffer);

    out.set(VQH_MAGIC, 0);
    out[4] = VQH_VERSION_BYTE;
    out[5] = header.encryption ? VQH_FLAGS.ENCRYPTED : VQH_FLAGS.NONE;
    out[6] = outerCodec;
    out[7] = 0;
    view.setUint32(8, headerBytes.length, true);
    out.set(headerBytes, VQH_PREAMBLE_SIZE);
    out.set(payload, VQH_PREAMBLE_SIZE + headerBytes.length);
    out.set(sha256(out.subarray(0, bodyLength)), bodyLength);
    return out;
}

export function readBinaryContainer(data: Uint8Array, options: ParseOptions = {}): StoredContainer {
    if (data.length < VQH_PREAMBLE_SIZE + VQH_CHECKSUM_SIZE) {
        throw new MalformedContainerError('preamble', `is truncated (${data.length} bytes)`);
    }
    for (let i = 0; i < VQH_MAGIC.length; i++) {
        if (data[i] !== VQH_MAGIC[i]) throw new MalformedContainerError('magic', 'does not match "VQHC"');
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const version = data[4];
    if (version !== VQH_VERSION_BYTE) {
        throw new MalformedContainerError('version', `${version} is not supported`);
    }
    const flags = data[5];
    if ((flags & ~VQH_FLAGS.ENCRYPTED) !== 0) {
        throw new MalformedContainerError('flags', `has unknown bits 0x${flags.toString(16)}`);
    }
    const outerCodec = toOuterCodecId(data[6]);
    if (outerCodec === undefined) {
        throw new MalformedContainerError('outer_codec', `id ${data[6]} is unknown`);
    }
    const headerLen = view.getUint32(8, true);
    const bodyLength = data.length - VQH_CHECKSUM_SIZE;
    if (VQH_PREAMBLE_SIZE + headerLen > bodyLength) {
        throw new MalformedContainerError('header_length', `${headerLen} exceeds the container size`);
    }

    checkIntegrity(digestsEqual(sha256(data.subarray(0, bodyLength)), data.subarray(bodyLength)), options);

    const header = parseHeaderObject(parseJson(data.subarray(VQH_PREAMBLE_SIZE, VQH_PREAMBLE_SIZE + headerLen), 'header'));
    const payload = data.slice(VQH_PREAMBLE_SIZE + headerLen, bodyLength);
    if (payload.length !== header.payloadLength) {
        throw new MalformedContainerError('payload_length', `is ${header.payloadLength} but ${payload.length} bytes are present`);
    }
    if (((flags & VQH_FLAGS.ENCRYPTED) !== 0) !== (header.encryption !== null)) {
        throw new MalformedContainerError('encryption', 'disagrees with the ENCRYPTED flag');
    }

    return { format: 'binary', version, outerCodec, header, payload };
}

// ----------------------------------------------------------------------------
// Text form
// ----------------------------------------------------------------------------

export function writeTextContainer(container: Omit<StoredContainer, 'format' | 'version'>): string {
    const { header, payload, outerCodec } = container;
    if (header.payloadLength !== payload.length) {
        throw new MalformedContainerError('payload_length', `is ${header.payloadLength} but payload holds ${payload.length} bytes`);
    }
    const doc = {
        format: VQH_TEXT_FORMAT,
        version: VQH_VERSION_BYTE,
        outer_codec: OUTER_CODEC_NAMES[outerCodec],
        ...headerToObject(header),
        payload: toBase64(payload),
        checksum: sha256Hex(concatBytes(canonicalHeaderBytes(header), payload)),
    };
    return JSON.stringify(doc, null, 2) + '\n';
}

export function readTextContainer(text: string | Uint8Array, options: ParseOptions = {}): StoredContainer {
    const doc = parseJson(typeof text === 'string' ? textEncoder.encode(text) : text, 'document');

    if (requireField(doc, 'format') !== VQH_TEXT_FORMAT) {
        throw new MalformedContainerError('format', `must be "${VQH_TEXT_FORMAT}"`);
    }
    const version = requireField(doc, 'version');
    if (version !== VQH_VERSION_BYTE) {
        throw new MalformedContainerError('version', `${String(version)} is not supported`);
    }
    const codecName = requireField(doc, 'outer_codec');
    const outerCodec = typeof codecName === 'string' ? toOuterCodecId(codecName) : undefined;
    if (outerCodec === undefined) {
        throw new MalformedContainerError('outer_codec', `"${String(codecName)}" is unknown`);
    }

    const header = parseHeaderObject(doc);
    const payload = decodeBase64Field(requireField(doc, 'payload'), 'payload');
    if (payload.length !== header.payloadLength) {
        throw new MalformedContainerError('payload_length', `is ${header.payloadLength} but payload decodes to ${payload.length} bytes`);
    }
    const checksum = requireField(doc, 'checksum');
    if (typeof checksum !== 'string' || !/^[0-9a-f]{64}$/.test(checksum)) {
        throw new MalformedContainerError('checksum', 'must be a 64-character hex SHA-256 digest');
    }
    checkIntegrity(sha256Hex(concatBytes(canonicalHeaderBytes(header), payload)) === checksum, options);

    return { format: 'text', version: VQH_VERSION_BYTE, outerCodec, header, payload };
}

// ----------------------------------------------------------------------------
// Format detection
// ----------------------------------------------------------------------------

export function detectFormat(data: Uint8Array): ContainerFormat | null {
    if (data.length >= VQH_MAGIC.length && VQH_MAGIC.every((b, i) => data[i] === b)) return 'binary';
    for (const byte of data) {
        if (byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d) continue;
        return byte === 0x7b ? 'text' : null; // '{'
    }
    return null;
}

export function readContainer(data: Uint8Array, options: ParseOptions = {}): StoredContainer {
    switch (detectFormat(data)) {
        case 'binary': return readBinaryContainer(data, options);
        case 'text': return readTextContainer(data, options);
        default: throw new MalformedContainerError('magic', 'is neither a VQH binary container nor a VQH JSON document');
    }
}

// ----------------------------------------------------------------------------
// Plain artifacts (no outer codec, no encryption)
// ----------------------------------------------------------------------------

function plainContainer(artifact: CompressedArtifact): Omit<StoredContainer, 'format' | 'version'> {
    return {
        outerCodec: OuterCodecId.NONE,
        header: {
            shape: artifact.shape,
            symbolCount: artifact.symbolCount,
            codeTable: artifact.codeTable,
            bitLength: artifact.bitLength,
            payloadLength: artifact.payload.length,
            encryption: null,
        },
        payload: artifact.payload,
    };
}

function plainArtifact(container: StoredContainer): CompressedArtifact {
    if (container.outerCodec !== OuterCodecId.NONE || container.header.encryption) {
        throw new MalformedContainerError('outer_codec', 'requires the decoder (payload is compressed or encrypted)');
    }
    const { shape, symbolCount, codeTable, bitLength } = container.header;
    return { shape, symbolCount, codeTable, bitLength, payload: container.payload };
}

export function serializeArtifact(artifact: CompressedArtifact): Uint8Array {
    return writeBinaryContainer(plainContainer(artifact));
}

export function parseArtifact(data: Uint8Array): CompressedArtifact {
    return plainArtifact(readBinaryContainer(data));
}

export function artifactToText(artifact: CompressedArtifact): string {
    return writeTextContainer(plainContainer(artifact));
}

export function artifactFromText(text: string): CompressedArtifact {
    return plainArtifact(readTextContainer(text));
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
    const total = parts.reduce((acc, p) => acc + p.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const p of parts) {
        out.set(p, offset);
        offset += p.length;
    }
    return out;
}
