import type { CompressedArtifact, EncodedIndices, VqSymbol } from '../vqh-types.js';
import type { ContainerFormat, OuterCodecName, VqhDecoderOptions } from './types.js';
import { OUTER_CODEC_NAMES, OuterCodecId } from './format.js';
import { IntegrityError } from './errors.js';
import { canonicalMetadata, readContainer, type StoredContainer } from './container.js';
import { getOuterCodec } from './outer-codecs.js';
import { decryptPayload } from './encryption.js';
import { packedByteLength, unpackSymbols } from './bit-packer.js';
import { reshapeSymbols } from './grid.js';

export interface ContainerSummary {
    format: ContainerFormat;
    version: number;
    outerCodec: OuterCodecName;
    encrypted: boolean;
    shape: number[];
    symbolCount: number;
    bitLength: number;
    payloadLength: number;
    distinctSymbols: number;
    /** Longest code in the table, bits. */
    maxCodeLength: number;
}

export class VqhDecoder {
    private readonly data: Uint8Array;
    private readonly options: Required<VqhDecoderOptions>;
    private container: StoredContainer | null = null;

    constructor(data: Uint8Array | string, options: VqhDecoderOptions = {}) {
        this.data = typeof data === 'string' ? new TextEncoder().encode(data) : data;
        const defaults: Required<VqhDecoderOptions> = {
            integrityMode: 'strict',
            password: '',
            logger: null,
        };
        this.options = { ...defaults, ...options };
    }

    private getContainer(): StoredContainer {
        if (!this.container) {
            this.container = readContainer(this.data, {
                integrityMode: this.options.integrityMode,
                logger: this.options.logger,
            });
        }
        return this.container;
    }

    /**
     * Header fields only; the payload is neither decrypted nor decompressed.
     */
    inspect(): ContainerSummary {
        const { format, version, outerCodec, header } = this.getContainer();
        let maxCodeLength = 0;
        for (const code of header.codeTable.values()) maxCodeLength = Math.max(maxCodeLength, code.length);
        return {
            format,
            version,
            outerCodec: OUTER_CODEC_NAMES[outerCodec],
            encrypted: header.encryption !== null,
            shape: [...header.shape],
            symbolCount: header.symbolCount,
            bitLength: header.bitLength,
            payloadLength: header.payloadLength,
            distinctSymbols: header.codeTable.size,
            maxCodeLength,
        };
    }

    /**
     * Verifies the container checksum WITHOUT decoding the payload.
     * Structural problems still throw MalformedContainerError.
     */
    verifyIntegrityOnly(): boolean {
        try {
            readContainer(this.data, { integrityMode: 'strict' });
            return true;
        } catch (err) {
            if (err instanceof IntegrityError) return false;
            throw err;
        }
    }

    async getArtifact(): Promise<CompressedArtifact> {
        const { outerCodec, header, payload } = this.getContainer();

        let stored = payload;
        if (header.encryption) {
            if (!this.options.password) {
                throw new IntegrityError('Container is encrypted; a password is required');
            }
            stored = decryptPayload(stored, this.options.password, header.encryption, canonicalMetadata(header));
        }

        // Uncompressed payloads are length-checked by unpackSymbols instead.
        const maxSize = outerCodec === OuterCodecId.NONE ? undefined : packedByteLength(header.bitLength);
        const raw = await getOuterCodec(outerCodec).decompress(stored, maxSize);
        return {
            shape: [...header.shape],
            symbolCount: header.symbolCount,
            codeTable: header.codeTable,
            bitLength: header.bitLength,
            payload: raw,
        };
    }

    async getSymbols(): Promise<VqSymbol[]> {
        const artifact = await this.getArtifact();
        return unpackSymbols(artifact.payload, artifact.bitLength, artifact.codeTable, artifact.symbolCount);
    }

    async getGrid(): Promise<EncodedIndices> {
        const { shape } = this.getContainer().header;
        const symbols = await this.getSymbols();
        return { grid: reshapeSymbols(symbols, shape), shape: [...shape] };
    }
}
