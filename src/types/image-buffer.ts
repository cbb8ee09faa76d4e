export type ChannelCount = 1 | 2 | 3 | 4;

/**
 * Decoded raster: row-major, interleaved 8-bit channels.
 * Never mutated once built; stages that change pixels allocate a new one.
 */
export interface ImageBuffer {
    readonly width: number;
    readonly height: number;
    readonly channels: ChannelCount;
    readonly data: Uint8Array;
}

export function isChannelCount(n: number): n is ChannelCount {
    return n === 1 || n === 2 || n === 3 || n === 4;
}

export function createImageBuffer(width: number, height: number, channels: ChannelCount, data?: Uint8Array): ImageBuffer {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new Error(`Invalid image size: ${width}x${height}`);
    }
    const expected = width * height * channels;
    const pixels = data ?? new Uint8Array(expected);
    if (pixels.length !== expected) {
        throw new Error(`Pixel data length ${pixels.length} does not match ${width}x${height}x${channels}`);
    }
    return Object.freeze({ width, height, channels, data: pixels });
}
