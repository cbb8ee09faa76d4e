import { describe, it, expect } from "vitest";
import { detectionToImageSpace, fitImage, insetQuadrilateral, seed } from "../src/adapters/detection-adapter";
import type { Quadrilateral } from "../src/types/geometry.types";
import { squareDetection } from "./helpers";

function expectQuad(actual: Quadrilateral, expected: Array<[number, number]>) {
    actual.forEach((p, i) => {
        expect(p.x).toBeCloseTo(expected[i][0], 9);
        expect(p.y).toBeCloseTo(expected[i][1], 9);
    });
}

describe('fitImage', () => {
    it('letterboxes a wide image', () => {
        const fitted = fitImage({ width: 300, height: 400 }, 2);
        expect(fitted.size).toEqual({ width: 300, height: 150 });
        expect(fitted.offset).toEqual({ x: 0, y: 125 });
    });

    it('pillarboxes a tall image', () => {
        const fitted = fitImage({ width: 300, height: 400 }, 0.5);
        expect(fitted.size).toEqual({ width: 200, height: 400 });
        expect(fitted.offset).toEqual({ x: 50, y: 0 });
    });
});

describe('seed', () => {
    it('insets the fitted image by 10% without a detection', () => {
        expectQuad(seed(null, { width: 300, height: 400 }, 0.75), [[30, 40], [270, 40], [270, 360], [30, 360]]);
    });

    it('insets relative to the fitted image, not the container', () => {
        // 200 x 400 inside 300 x 400
        expectQuad(seed(undefined, { width: 300, height: 400 }, 0.5), [[20, 40], [180, 40], [180, 360], [20, 360]]);
    });

    it('returns identical corners for identical inputs', () => {
        const a = seed(null, { width: 321, height: 487 }, 0.61);
        const b = seed(null, { width: 321, height: 487 }, 0.61);
        expect(a).toEqual(b);
    });

    it('flips detector y and re-labels corners into display order', () => {
        const corners = seed(squareDetection(0.1, 0.9), { width: 300, height: 400 }, 0.75);
        // normalized topLeft (0.1, 0.1) lands at (30, 360): the bottom-left of the display
        expectQuad(corners, [[30, 40], [270, 40], [270, 360], [30, 360]]);
        expect(corners[0].y).toBeLessThan(corners[3].y);
    });

    it('keeps a detector-space topLeft on top when it carries the larger y', () => {
        const corners = seed({
            topLeft: { x: 0.2, y: 0.8 },
            topRight: { x: 0.8, y: 0.8 },
            bottomLeft: { x: 0.2, y: 0.2 },
            bottomRight: { x: 0.8, y: 0.2 },
            confidence: 0.95,
        }, { width: 100, height: 100 }, 1);
        expectQuad(corners, [[20, 20], [80, 20], [80, 80], [20, 80]]);
    });
});

describe('detectionToImageSpace', () => {
    it('maps onto full-resolution pixels', () => {
        const corners = detectionToImageSpace(squareDetection(0.05, 0.95), { width: 1000, height: 1400 });
        expectQuad(corners, [[50, 70], [950, 70], [950, 1330], [50, 1330]]);
    });

    it('builds the same inset as seed for a given size', () => {
        expectQuad(insetQuadrilateral({ width: 10, height: 20 }, 0.25), [[2.5, 5], [7.5, 5], [7.5, 15], [2.5, 15]]);
    });
});
