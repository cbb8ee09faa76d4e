import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Quadrilateral } from "../types/geometry.types";
import { createImageBuffer, type ImageBuffer } from "../types/image-buffer";
import { assertNonDegenerate, outputSize } from "../geometry/quadrilateral";
import { applyHomography, solveHomography } from "../geometry/homography";
import { GeometryError } from "../errors/geometry-error";

export type CorrectOptions = {
    signal?: AbortSignal;
};

/**
 * Deskew the quadrilateral `corners` (original image pixels) into an upright
 * rectangle. Output size comes from the longest opposite edges; every output
 * pixel centre is mapped back into the source and sampled bilinearly.
 */
export function correct(image: ImageBuffer, corners: Quadrilateral): ImageBuffer {
    assertNonDegenerate(corners);

    const { width, height } = outputSize(corners);
    if (width < 1 || height < 1) {
        throw GeometryError.degenerate(`output would be ${width}x${height}`);
    }

    // Inverse mapping: output rectangle -> source quadrilateral
    const h = solveHomography(
        [{ x: 0, y: 0 }, { x: width, y: 0 }, { x: width, y: height }, { x: 0, y: height }],
        corners,
    );

    const { channels } = image;
    const out = new Uint8Array(width * height * channels);
    const px = new Float64Array(channels);

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const src = applyHomography(h, { x: x + 0.5, y: y + 0.5 });
            sampleBilinear(image, src.x - 0.5, src.y - 0.5, px);
            const o = (y * width + x) * channels;
            for (let c = 0; c < channels; c++) out[o + c] = Math.round(px[c]);
        }
    }

    return createImageBuffer(width, height, channels, out);
}

/**
 * Same as `correct`, but yields to the event loop first so the caller can
 * repaint, and honours `signal` before and after the warp.
 */
export async function correctAsync(
    image: ImageBuffer,
    corners: Quadrilateral,
    opts: CorrectOptions = {},
): Promise<ImageBuffer> {
    const { signal } = opts;
    signal?.throwIfAborted();
    await yieldToEventLoop();
    signal?.throwIfAborted();
    const result = correct(image, corners);
    signal?.throwIfAborted();
    return result;
}

/** Bilinear sample at pixel-index coordinates (fx, fy), clamped to the edges. */
function sampleBilinear(image: ImageBuffer, fx: number, fy: number, out: Float64Array) {
    const { width: W, height: H, channels, data } = image;
    const x = Math.max(0, Math.min(W - 1, fx));
    const y = Math.max(0, Math.min(H - 1, fy));
    const x0 = Math.floor(x);
    const y0 = Math.floor(y);
    const x1 = Math.min(W - 1, x0 + 1);
    const y1 = Math.min(H - 1, y0 + 1);
    const ax = x - x0;
    const ay = y - y0;

    const i00 = (y0 * W + x0) * channels;
    const i10 = (y0 * W + x1) * channels;
    const i01 = (y1 * W + x0) * channels;
    const i11 = (y1 * W + x1) * channels;
    for (let c = 0; c < channels; c++) {
        const top = data[i00 + c] * (1 - ax) + data[i10 + c] * ax;
        const bottom = data[i01 + c] * (1 - ax) + data[i11 + c] * ax;
        out[c] = top * (1 - ay) + bottom * ay;
    }
}
