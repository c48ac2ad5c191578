import type { CompressedArtifact, IndexGrid, Shape } from '../vqh-types.js';
import type { ResolvedEncoderOptions, VqhEncoderOptions } from './types.js';
import { COMPRESSION_PRESETS } from './types.js';
import { DEFAULT_KDF_ITERATIONS, OuterCodecId, toOuterCodecId } from './format.js';
import { ShapeMismatchError, VqhError } from './errors.js';
import { countFrequencies } from './frequency.js';
import { buildCodeTable } from './tree.js';
import { packSymbols } from './bit-packer.js';
import { flattenGrid, isValidShape, shapeSize } from './grid.js';
import { canonicalMetadata, writeBinaryContainer, writeTextContainer } from './container.js';
import { getOuterCodec } from './outer-codecs.js';
import { encryptPayload, type EncryptionParams } from './encryption.js';
import { computeCodingStats, type CodingStats } from './metrics.js';

export interface EncodeTelemetry {
    /** Null when the artifact was not built by this encoder. */
    stats: CodingStats | null;
    /** Packed Huffman payload, bytes. */
    payloadBytes: number;
    /** Payload after outer codec and encryption, bytes. */
    storedBytes: number;
    /** Whole container, bytes. */
    containerBytes: number;
    outerCodec: string;
    encrypted: boolean;
}

function resolveOptions(options: VqhEncoderOptions): ResolvedEncoderOptions {
    const preset = COMPRESSION_PRESETS[options.preset ?? 'raw'];
    if (!preset) throw new VqhError(`Unknown preset "${String(options.preset)}"`);

    const outerCodec = options.outerCodec ?? preset.outerCodec;
    if (toOuterCodecId(outerCodec) === undefined) throw new VqhError(`Unknown outer codec "${String(outerCodec)}"`);

    let compressionLevel = options.compressionLevel ?? preset.compressionLevel;
    if (outerCodec === 'zstd') {
        if (compressionLevel === 0) compressionLevel = 3;
        if (!Number.isInteger(compressionLevel) || compressionLevel < 1 || compressionLevel > 22) {
            throw new VqhError(`Zstd compression level must be an integer in 1-22, got ${compressionLevel}`);
        }
    }

    const kdfIterations = options.kdfIterations ?? DEFAULT_KDF_ITERATIONS;
    if (!Number.isSafeInteger(kdfIterations) || kdfIterations < 1) {
        throw new VqhError(`kdfIterations must be a positive integer, got ${kdfIterations}`);
    }

    return {
        outerCodec,
        compressionLevel,
        format: options.format ?? 'binary',
        password: options.password ?? '',
        kdfIterations,
        logger: options.logger ?? null,
    };
}

export class VqhEncoder {
    private readonly options: ResolvedEncoderOptions;
    private lastTelemetry: EncodeTelemetry | null = null;
    private readonly statsByArtifact = new WeakMap<CompressedArtifact, CodingStats>();

    constructor(options: VqhEncoderOptions = {}) {
        this.options = resolveOptions(options);
    }

    getTelemetry(): EncodeTelemetry | null {
        return this.lastTelemetry;
    }

    /**
     * Huffman-codes a row-major symbol sequence laid out on `shape`.
     */
    buildArtifact(symbols: ArrayLike<number>, shape: Shape): CompressedArtifact {
        const freq = countFrequencies(symbols);
        if (!isValidShape(shape)) {
            throw new ShapeMismatchError(`Shape [${shape.join(', ')}] must list positive integer dimensions`, 1, 0);
        }
        const expected = shapeSize(shape);
        if (symbols.length !== expected) {
            throw new ShapeMismatchError('Symbol count does not match the product of the shape', expected, symbols.length);
        }

        const codeTable = buildCodeTable(freq);
        const packed = packSymbols(symbols, codeTable);
        const artifact: CompressedArtifact = {
            shape: [...shape],
            symbolCount: symbols.length,
            codeTable,
            bitLength: packed.bitLength,
            payload: packed.bytes,
        };
        this.statsByArtifact.set(artifact, computeCodingStats(freq, codeTable));
        return artifact;
    }

    async encodeSymbols(symbols: ArrayLike<number>, shape: Shape): Promise<Uint8Array> {
        return this.encodeArtifact(this.buildArtifact(symbols, shape));
    }

    async encodeGrid(grid: IndexGrid, shape: Shape): Promise<Uint8Array> {
        return this.encodeSymbols(flattenGrid(grid, shape), shape);
    }

    /**
     * Wraps an artifact: outer codec, then encryption, then the container.
     */
    async encodeArtifact(artifact: CompressedArtifact): Promise<Uint8Array> {
        const { outerCodec: codecName, compressionLevel, password, kdfIterations, format, logger } = this.options;
        const codecId = toOuterCodecId(codecName) ?? OuterCodecId.NONE;

        let stored = await getOuterCodec(codecId).compress(artifact.payload, compressionLevel);
        let encryption: EncryptionParams | null = null;
        if (password) {
            const aad = canonicalMetadata(artifact);
            const encrypted = encryptPayload(stored, password, kdfIterations, aad);
            stored = encrypted.ciphertext;
            encryption = encrypted.params;
        }

        const container = {
            outerCodec: codecId,
            header: {
                shape: artifact.shape,
                symbolCount: artifact.symbolCount,
                codeTable: artifact.codeTable,
                bitLength: artifact.bitLength,
                payloadLength: stored.length,
                encryption,
            },
            payload: stored,
        };
        const bytes = format === 'text'
            ? new TextEncoder().encode(writeTextContainer(container))
            : writeBinaryContainer(container);

        this.lastTelemetry = {
            stats: this.statsByArtifact.get(artifact) ?? null,
            payloadBytes: artifact.payload.length,
            storedBytes: stored.length,
            containerBytes: bytes.length,
            outerCodec: codecName,
            encrypted: encryption !== null,
        };
        logger?.info?.(
            `[vqh] ${artifact.symbolCount} symbols, ${artifact.codeTable.size} distinct -> ` +
            `${artifact.bitLength} bits; ${format} container ${bytes.length} bytes (outer=${codecName}${encryption ? ', encrypted' : ''})`
        );
        return bytes;
    }
}
