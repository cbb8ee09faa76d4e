import { createImageBuffer, type ChannelCount, type ImageBuffer } from "../src/types/image-buffer";
import type { DetectionResult } from "../src/types/detection.types";

/** Every channel of pixel (x, y) holds (x + y * width) % 256. */
export function gradientImage(width: number, height: number, channels: ChannelCount = 1): ImageBuffer {
    const data = new Uint8Array(width * height * channels);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const v = (x + y * width) % 256;
            for (let c = 0; c < channels; c++) data[(y * width + x) * channels + c] = v;
        }
    }
    return createImageBuffer(width, height, channels, data);
}

export function solidImage(width: number, height: number, value: number, channels: ChannelCount = 3): ImageBuffer {
    return createImageBuffer(width, height, channels, new Uint8Array(width * height * channels).fill(value));
}

/** Normalized rectangle from `lo` to `hi` on both axes. */
export function squareDetection(lo: number, hi: number, confidence = 0.9): DetectionResult {
    return {
        topLeft: { x: lo, y: lo },
        topRight: { x: hi, y: lo },
        bottomLeft: { x: lo, y: hi },
        bottomRight: { x: hi, y: hi },
        confidence,
    };
}
