import zstdCodec from 'zstd-codec';
import type { ZstdModule } from 'zstd-codec';
import { OuterCodecId } from './format.js';
import { LimitExceededError, VqhError } from './errors.js';

export interface OuterCodec {
    id: OuterCodecId;
    name: string;
    compress(data: Uint8Array, level?: number): Promise<Uint8Array>;
    decompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array>;
}

/**
 * Registry of available outer codecs.
 */
export const OUTER_CODECS: Map<OuterCodecId, OuterCodec> = new Map();

/**
 * Identity codec (no compression).
 */
export const OuterCodecNone: OuterCodec = {
    id: OuterCodecId.NONE,
    name: 'none',
    async compress(data: Uint8Array) {
        return data;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        if (maxSize !== undefined && data.length > maxSize) {
            throw new LimitExceededError(`Decompressed size limit exceeded (Input: ${data.length} > Limit: ${maxSize})`);
        }
        return data;
    },
};

const ZSTD_FRAME_MAGIC = 0xfd2fb528;

/**
 * Frame_Content_Size declared in a zstd frame header, or null when the
 * frame does not declare one (or is not a zstd frame).
 */
export function readZstdContentSize(data: Uint8Array): number | null {
    if (data.length < 5) return null;
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    if (view.getUint32(0, true) !== ZSTD_FRAME_MAGIC) return null;

    const descriptor = data[4];
    const fcsFlag = descriptor >>> 6;
    const singleSegment = (descriptor & 0x20) !== 0;
    const dictIdSize = [0, 1, 2, 4][descriptor & 0x03];
    const fcsSize = [singleSegment ? 1 : 0, 2, 4, 8][fcsFlag];
    if (fcsSize === 0) return null;

    const offset = 5 + (singleSegment ? 0 : 1) + dictIdSize;
    if (data.length < offset + fcsSize) return null;
    switch (fcsSize) {
        case 1: return data[offset];
        case 2: return view.getUint16(offset, true) + 256;
        case 4: return view.getUint32(offset, true);
        default: return Number(view.getBigUint64(offset, true));
    }
}

let zstdInstance: Promise<ZstdModule> | null = null;

function getZstd(): Promise<ZstdModule> {
    if (!zstdInstance) {
        zstdInstance = new Promise((resolve) => {
            zstdCodec.ZstdCodec.run((zstd) => resolve(zstd));
        });
    }
    return zstdInstance;
}

export const OuterCodecZstd: OuterCodec = {
    id: OuterCodecId.ZSTD,
    name: 'zstd',
    async compress(data: Uint8Array, level: number = 3) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const compressed = simple.compress(data, level);
        if (!compressed) throw new VqhError('Zstd compression failed');
        return compressed;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const declared = readZstdContentSize(data);
        if (maxSize !== undefined && declared !== null && declared > maxSize) {
            throw new LimitExceededError(`Declared zstd content size exceeds limit (${declared} > ${maxSize})`);
        }
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const decompressed = simple.decompress(data);
        if (!decompressed) throw new VqhError('Zstd decompression failed');

        if (maxSize !== undefined && decompressed.length > maxSize) {
            throw new LimitExceededError(`Decompressed size limit exceeded (${decompressed.length} > ${maxSize})`);
        }
        return decompressed;
    },
};

OUTER_CODECS.set(OuterCodecId.NONE, OuterCodecNone);
OUTER_CODECS.set(OuterCodecId.ZSTD, OuterCodecZstd);

export function getOuterCodec(id: OuterCodecId): OuterCodec {
    const codec = OUTER_CODECS.get(id);
    if (!codec) {
        throw new VqhError(`Unknown OuterCodecId: ${id}`);
    }
    return codec;
}
