/**
 * Image ↔ container pipeline around an external vector-quantization model.
 *
 * compressImage:   image → model.encodeImage → flatten (row-major) → Huffman → container
 * decompressImage: container → Huffman → reshape (row-major) → model.decodeIndices → image
 *
 * Model failures are not caught or wrapped here.
 */
import type { VectorQuantizer } from './vqh-types.js';
import type { VqhDecoderOptions, VqhEncoderOptions } from './vqh/types.js';
import { VqhEncoder, type EncodeTelemetry } from './vqh/encode.js';
import { VqhDecoder } from './vqh/decode.js';

export interface ImageCodecOptions {
    encoder?: VqhEncoderOptions;
    decoder?: VqhDecoderOptions;
}

export class ImageCodec<TImage> {
    private readonly encoder: VqhEncoder;

    constructor(
        private readonly model: VectorQuantizer<TImage>,
        private readonly options: ImageCodecOptions = {}
    ) {
        this.encoder = new VqhEncoder(options.encoder);
    }

    async compressImage(image: TImage): Promise<Uint8Array> {
        const { grid, shape } = await this.model.encodeImage(image);
        return this.encoder.encodeGrid(grid, shape);
    }

    async decompressImage(data: Uint8Array | string): Promise<TImage> {
        const decoder = new VqhDecoder(data, this.options.decoder);
        const { grid, shape } = await decoder.getGrid();
        return this.model.decodeIndices(grid, shape);
    }

    /** Telemetry of the most recent compressImage call. */
    getTelemetry(): EncodeTelemetry | null {
        return this.encoder.getTelemetry();
    }
}
