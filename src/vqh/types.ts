export type VqhLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type OuterCodecName = 'none' | 'zstd';

export type ContainerFormat = 'binary' | 'text';

/**
 * Reproducible container presets.
 *
 * - `raw`: Huffman payload stored as-is (default)
 * - `balanced`: payload passed through zstd at level 3
 * - `max_ratio`: payload passed through zstd at level 19
 */
export type CompressionPreset = 'raw' | 'balanced' | 'max_ratio';

export const COMPRESSION_PRESETS: Record<CompressionPreset, { outerCodec: OuterCodecName; compressionLevel: number }> = {
    raw:       { outerCodec: 'none', compressionLevel: 0 },
    balanced:  { outerCodec: 'zstd', compressionLevel: 3 },
    max_ratio: { outerCodec: 'zstd', compressionLevel: 19 },
};

export type VqhEncoderOptions = {
    /** Container preset. Sets outerCodec and compressionLevel. Default: `raw`. */
    preset?: CompressionPreset;
    /** Outer codec applied to the packed payload. Overrides the preset value. */
    outerCodec?: OuterCodecName;
    /** Zstd compression level (1-22). Overrides the preset value. */
    compressionLevel?: number;
    /** Binary container (default) or JSON text document. */
    format?: ContainerFormat;
    /** Optional password for AES-256-GCM payload encryption. */
    password?: string;
    /** PBKDF2 iterations used when a password is set. Default 100000. */
    kdfIterations?: number;
    /** Optional logger hook; the library never writes to the console. */
    logger?: VqhLogger | null;
};

export type VqhDecoderOptions = {
    /**
     * Checksum verification mode.
     * - 'strict' (default): throw IntegrityError on mismatch
     * - 'warn': log through the logger and keep decoding
     */
    integrityMode?: 'strict' | 'warn';
    /** Password for encrypted containers. */
    password?: string;
    logger?: VqhLogger | null;
};

/** Fully resolved encoder settings. */
export interface ResolvedEncoderOptions {
    outerCodec: OuterCodecName;
    compressionLevel: number;
    format: ContainerFormat;
    password: string;
    kdfIterations: number;
    logger: VqhLogger | null;
}
