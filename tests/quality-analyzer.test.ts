import { describe, it, expect } from "vitest";
import {
    ImageQualityAnalyzer,
    QUALITY_ISSUES,
    measureBrightness,
    measureSharpness,
    rectangleQuality,
} from "../src/analysis/quality-analyzer";
import { ReceiptImageProcessor } from "../src/processors/image-processor";
import { createImageBuffer } from "../src/types/image-buffer";
import type { DetectionResult } from "../src/types/detection.types";
import type { IRectangleDetector } from "../src/interfaces/rectangle-detector.interface";
import { solidImage, squareDetection } from "./helpers";

class FixedDetector implements IRectangleDetector {
    constructor(private readonly results: DetectionResult[]) {}
    async detectRectangles(): Promise<DetectionResult[]> {
        return this.results;
    }
}

function checkerboard(size: number) {
    const data = new Uint8Array(size * size * 3);
    for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
            const v = (x + y) % 2 === 0 ? 255 : 0;
            data.fill(v, (y * size + x) * 3, (y * size + x) * 3 + 3);
        }
    }
    return createImageBuffer(size, size, 3, data);
}

const processor = new ReceiptImageProcessor();

describe('signals', () => {
    it('measures mid-grey brightness', async () => {
        expect(await measureBrightness(processor, solidImage(100, 100, 128))).toBeCloseTo(128 / 255, 6);
    });

    it('finds no edges in a flat image and many in a checkerboard', async () => {
        expect(await measureSharpness(processor, solidImage(100, 100, 128))).toBeLessThan(0.4);
        expect(await measureSharpness(processor, checkerboard(64))).toBeGreaterThan(0.4);
    });
});

describe('rectangleQuality', () => {
    it('keeps the confidence of a large, regular rectangle', () => {
        expect(rectangleQuality(squareDetection(0.1, 0.9, 0.9))).toBeCloseTo(0.9, 9);
    });

    it('halves it for a box under 10% of the image', () => {
        expect(rectangleQuality(squareDetection(0.4, 0.6, 0.9))).toBeCloseTo(0.45, 9);
    });

    it('penalises an extreme aspect ratio', () => {
        const strip: DetectionResult = {
            topLeft: { x: 0.0, y: 0.6 },
            topRight: { x: 1.0, y: 0.6 },
            bottomLeft: { x: 0.0, y: 0.4 },
            bottomRight: { x: 1.0, y: 0.4 },
            confidence: 1,
        };
        // area 0.2, aspect 5 -> x0.7; sides 1, 0.2, 1, 0.2 deviate by 0.4 of a 0.6 mean -> x0.8
        expect(rectangleQuality(strip)).toBeCloseTo(0.56, 9);
    });
});

describe('ImageQualityAnalyzer', () => {
    it('flags a flat image without a detector as blurry and undetected', async () => {
        const analyzer = new ImageQualityAnalyzer(processor);
        const result = await analyzer.analyze(solidImage(100, 100, 128), 'Camera');
        expect(result.qualityIssues).toEqual([QUALITY_ISSUES.blurry, QUALITY_ISSUES.noDocument]);
        expect(result.overallConfidence).toBeCloseTo(0.6, 9);
        expect(result.canAdjustManually).toBe(false);
        expect(result.detectedRectangle).toBeNull();
        expect(result.processingType).toBe('Camera');
    });

    it('flags a dark image', async () => {
        const result = await new ImageQualityAnalyzer(processor).analyze(solidImage(100, 100, 20), 'Gallery');
        expect(result.qualityIssues).toEqual([QUALITY_ISSUES.tooDark, QUALITY_ISSUES.blurry, QUALITY_ISSUES.noDocument]);
        expect(result.overallConfidence).toBeCloseTo(0.4, 9);
    });

    it('flags an overexposed image', async () => {
        const result = await new ImageQualityAnalyzer(processor).analyze(solidImage(100, 100, 240), 'Gallery');
        expect(result.qualityIssues[0]).toBe(QUALITY_ISSUES.overexposed);
    });

    it('uses the detected rectangle and enables manual adjustment', async () => {
        const detection = squareDetection(0.1, 0.9, 0.9);
        const analyzer = new ImageQualityAnalyzer(processor, new FixedDetector([detection]));
        const result = await analyzer.analyze(solidImage(100, 100, 128), 'Camera');
        expect(result.qualityIssues).toEqual([QUALITY_ISSUES.blurry]);
        expect(result.overallConfidence).toBeCloseTo(0.75, 9);
        expect(result.canAdjustManually).toBe(true);
        expect(result.detectedRectangle).toBe(detection);
    });

    it('reports a weak detection', async () => {
        const analyzer = new ImageQualityAnalyzer(processor, new FixedDetector([squareDetection(0.2, 0.51, 0.9)]));
        const result = await analyzer.analyze(solidImage(100, 100, 128), 'Camera');
        expect(result.qualityIssues).toEqual([QUALITY_ISSUES.blurry, QUALITY_ISSUES.weakDetection]);
        expect(result.overallConfidence).toBeCloseTo(0.65, 9);
    });

    it('reports an unusual aspect ratio', async () => {
        const result = await new ImageQualityAnalyzer(processor).analyze(solidImage(300, 100, 128), 'Camera');
        expect(result.qualityIssues).toEqual([QUALITY_ISSUES.blurry, QUALITY_ISSUES.noDocument, QUALITY_ISSUES.unusualAspect]);
        expect(result.signals.aspectRatio).toBe(3);
        expect(result.overallConfidence).toBeCloseTo(0.55, 9);
    });
});
