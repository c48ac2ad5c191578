/**
 * Type declarations for zstd-codec (the package ships none)
 * @see https://www.npmjs.com/package/zstd-codec
 */
declare module 'zstd-codec' {
    export interface ZstdSimple {
        compress(data: Uint8Array, level?: number): Uint8Array | null;
        decompress(data: Uint8Array): Uint8Array | null;
    }

    export interface ZstdModule {
        Simple: new () => ZstdSimple;
    }

    export interface ZstdCodecRunner {
        run(callback: (zstd: ZstdModule) => void): void;
    }

    const zstdCodec: {
        ZstdCodec: ZstdCodecRunner;
    };
    export default zstdCodec;
}
