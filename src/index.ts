/**
 * VQH Public API
 *
 * Huffman coding of vector-quantization indices into a self-describing container.
 *
 * @module vqh
 */

import { VqhEncoder } from './vqh/encode.js';
import { VqhDecoder, type ContainerSummary } from './vqh/decode.js';
import type { EncodedIndices, IndexGrid, Shape, VqSymbol } from './vqh-types.js';
import type { VqhEncoderOptions, VqhDecoderOptions } from './vqh/types.js';

export type {
    VqSymbol, Shape, IndexGrid, FrequencyTable, CodeTable, PackedBits,
    CompressedArtifact, EncodedIndices, VectorQuantizer
} from './vqh-types.js';
export { VQH_VERSION } from './vqh-types.js';
export type {
    VqhEncoderOptions as EncoderOptions, VqhDecoderOptions as DecoderOptions, VqhLogger as Logger,
    CompressionPreset, OuterCodecName, ContainerFormat
} from './vqh/types.js';
export { COMPRESSION_PRESETS } from './vqh/types.js';
export {
    VqhError, EmptyInputError, DegenerateTableError, InvalidSymbolError, UnknownSymbolError,
    CorruptStreamError, MalformedContainerError, ShapeMismatchError, IntegrityError, LimitExceededError
} from './vqh/errors.js';
export { countFrequencies } from './vqh/frequency.js';
export { buildHuffmanTree, buildCodeTable, codeTableFromTree, findCodeTableViolation, assertPrefixFree } from './vqh/tree.js';
export type { HuffmanNode, HuffmanLeaf, HuffmanInternal } from './vqh/tree.js';
export { packSymbols, unpackSymbols } from './vqh/bit-packer.js';
export { flattenGrid, reshapeSymbols, shapeSize } from './vqh/grid.js';
export { serializeArtifact, parseArtifact, artifactToText, artifactFromText } from './vqh/container.js';
export { computeCodingStats } from './vqh/metrics.js';
export type { CodingStats } from './vqh/metrics.js';
export type { ContainerSummary } from './vqh/decode.js';
export type { EncodeTelemetry } from './vqh/encode.js';
export { VqhEncoder, VqhDecoder };
export { ImageCodec } from './pipeline.js';
export type { ImageCodecOptions } from './pipeline.js';

// The VQH Namespace Object
export const VQH = {
    /**
     * Compresses a row-major symbol sequence laid out on `shape`.
     */
    compress: async (symbols: ArrayLike<number>, shape: Shape, options?: VqhEncoderOptions): Promise<Uint8Array> => {
        return new VqhEncoder(options).encodeSymbols(symbols, shape);
    },

    /**
     * Compresses a nested index grid.
     */
    compressGrid: async (grid: IndexGrid, shape: Shape, options?: VqhEncoderOptions): Promise<Uint8Array> => {
        return new VqhEncoder(options).encodeGrid(grid, shape);
    },

    /**
     * Decompresses a container (binary or text) into the flat symbol sequence.
     */
    decompress: async (data: Uint8Array | string, options?: VqhDecoderOptions): Promise<VqSymbol[]> => {
        return new VqhDecoder(data, options).getSymbols();
    },

    /**
     * Decompresses a container into its nested index grid and shape.
     */
    decompressGrid: async (data: Uint8Array | string, options?: VqhDecoderOptions): Promise<EncodedIndices> => {
        return new VqhDecoder(data, options).getGrid();
    },

    /**
     * Reads header fields without decoding the payload.
     */
    inspect: async (data: Uint8Array | string): Promise<ContainerSummary> => {
        return new VqhDecoder(data).inspect();
    },

    /**
     * Verifies the container checksum WITHOUT decoding the payload.
     */
    verify: async (data: Uint8Array | string): Promise<boolean> => {
        return new VqhDecoder(data).verifyIntegrityOnly();
    },

    Encoder: VqhEncoder,

    Decoder: VqhDecoder,
};

export default VQH;
