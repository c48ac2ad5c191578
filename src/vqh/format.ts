export const VQH_MAGIC = new Uint8Array([0x56, 0x51, 0x48, 0x43]); // "VQHC"
export const VQH_VERSION_BYTE = 0x01;

export const VQH_TEXT_FORMAT = 'vqh';

// magic(4) + version(1) + flags(1) + outerCodec(1) + reserved(1) + headerLen(4)
export const VQH_PREAMBLE_SIZE = 12;
export const VQH_CHECKSUM_SIZE = 32; // SHA-256

export enum OuterCodecId {
    NONE = 0,
    ZSTD = 1,
}

export enum VQH_FLAGS {
    NONE = 0,
    ENCRYPTED = 0x80,
}

export const OUTER_CODEC_NAMES: Record<OuterCodecId, 'none' | 'zstd'> = {
    [OuterCodecId.NONE]: 'none',
    [OuterCodecId.ZSTD]: 'zstd',
};

export const OUTER_CODEC_IDS: readonly OuterCodecId[] = [OuterCodecId.NONE, OuterCodecId.ZSTD];

export function toOuterCodecId(value: unknown): OuterCodecId | undefined {
    return OUTER_CODEC_IDS.find((id) => id === value || OUTER_CODEC_NAMES[id] === value);
}

export const ENCRYPTION_KDF = 'pbkdf2-sha256';
export const DEFAULT_KDF_ITERATIONS = 100_000;
