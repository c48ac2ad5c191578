/**
 * VQH Types - Core type definitions
 *
 * @module vqh
 *
 * Symbols are codebook indices emitted by a vector-quantization model. They are
 * laid out on an N-dimensional grid (typically [1, H, W]) and flattened in
 * row-major order before entropy coding.
 */

export const VQH_VERSION = '1.0.0';

/** Non-negative integer naming one codebook entry. */
export type VqSymbol = number;

/** Index grid dimensions, outermost first. Every entry is a positive integer. */
export type Shape = readonly number[];

/**
 * Nested index grid. The nesting depth equals the shape's length and the
 * length of every array at depth d equals shape[d].
 */
export type IndexGrid = readonly (number | IndexGrid)[];

/** Symbol → occurrence count. */
export type FrequencyTable = Map<VqSymbol, number>;

/** Symbol → bit string made of '0' and '1'. */
export type CodeTable = Map<VqSymbol, string>;

export interface PackedBits {
    /** Packed bitstream, MSB-first within each byte, zero padded. */
    bytes: Uint8Array;
    /** Exact number of meaningful bits in `bytes`. */
    bitLength: number;
}

/**
 * Everything needed to rebuild the flattened symbol sequence and its grid.
 */
export interface CompressedArtifact {
    shape: number[];
    symbolCount: number;
    codeTable: CodeTable;
    bitLength: number;
    /** Raw packed bitstream (before any outer codec or encryption). */
    payload: Uint8Array;
}

/** Output of the external model's encoder. */
export interface EncodedIndices {
    grid: IndexGrid;
    shape: Shape;
}

/**
 * Boundary of the external vector-quantization model. Implementations own
 * image preprocessing, the codebook and pixel I/O.
 */
export interface VectorQuantizer<TImage> {
    encodeImage(image: TImage): EncodedIndices | Promise<EncodedIndices>;
    decodeIndices(grid: IndexGrid, shape: Shape): TImage | Promise<TImage>;
}
