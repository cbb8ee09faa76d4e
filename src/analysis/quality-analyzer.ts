import type { ImageBuffer } from "../types/image-buffer";
import type { DetectionResult } from "../types/detection.types";
import type { IRectangleDetector } from "../interfaces/rectangle-detector.interface";
import type { ImageProcessingResult } from "../interfaces/processing-result";
import type { ReceiptImageProcessor } from "../processors/image-processor";
import { toImageBuffer } from "../utils/open-sharp";
import { distance } from "../geometry/quadrilateral";
import { selectDocumentRectangle, detectionBoundingBox } from "./rectangle-selection";

export const QUALITY_ISSUES = {
    tooDark: "Low lighting detected - image may be too dark",
    overexposed: "High brightness detected - image may be overexposed",
    blurry: "Image appears blurry - consider retaking",
    noDocument: "Could not detect document boundaries",
    weakDetection: "Low confidence document detection",
    unusualAspect: "Unusual aspect ratio detected",
} as const;

type Thresholds = {
    darkBelow: number;
    brightAbove: number;
    blurryBelow: number;
    weakRectangleBelow: number;
    minAspect: number;
    maxAspect: number;
};

const DEFAULT_THRESHOLDS: Thresholds = {
    darkBelow: 0.3,
    brightAbove: 0.8,
    blurryBelow: 0.4,
    weakRectangleBelow: 0.7,
    minAspect: 0.5,
    maxAspect: 2.0,
};

const LAPLACIAN = { width: 3, height: 3, kernel: [0, -1, 0, -1, 4, -1, 0, -1, 0], scale: 1, offset: 0 };

export type QualitySignals = {
    brightness: number;
    sharpness: number;
    rectangleQuality?: number;
    aspectRatio: number;
};

/** Mean Rec.601 luminance (0..1) of the centre half of the image. */
export async function measureBrightness(processor: ReceiptImageProcessor, image: ImageBuffer): Promise<number> {
    const left = Math.floor(image.width * 0.25);
    const top = Math.floor(image.height * 0.25);
    const width = Math.max(1, Math.floor(image.width * 0.5));
    const height = Math.max(1, Math.floor(image.height * 0.5));
    const centre = await toImageBuffer(processor.asSRGB(image).extract({ left, top, width, height }));

    const { data, channels } = centre;
    let r = 0, g = 0, b = 0;
    const n = centre.width * centre.height;
    for (let i = 0; i < data.length; i += channels) {
        r += data[i];
        g += data[i + 1];
        b += data[i + 2];
    }
    return (0.299 * r + 0.587 * g + 0.114 * b) / n / 255;
}

/** Mean Laplacian response of the greyscale image, scaled into 0..1. */
export async function measureSharpness(processor: ReceiptImageProcessor, image: ImageBuffer): Promise<number> {
    const edges = await toImageBuffer(processor.asSRGB(image).toColourspace('b-w').convolve(LAPLACIAN));
    let sum = 0;
    for (let i = 0; i < edges.data.length; i += edges.channels) sum += edges.data[i];
    const mean = sum / (edges.width * edges.height) / 255;
    return Math.min(1, mean * 10);
}

/**
 * 0..1 plausibility of a detected receipt rectangle: detector confidence,
 * penalised for a small box, an extreme aspect or uneven sides.
 */
export function rectangleQuality(detection: DetectionResult): number {
    let quality = detection.confidence;

    const box = detectionBoundingBox(detection);
    if (box.width * box.height < 0.1) {
        quality *= 0.5;
    }
    const aspect = box.width / box.height;
    if (aspect > 3.0 || aspect < 0.3) {
        quality *= 0.7;
    }

    const ring = [detection.topLeft, detection.topRight, detection.bottomRight, detection.bottomLeft];
    const sides = ring.map((p, i) => distance(p, ring[(i + 1) % 4]));
    const avg = sides.reduce((s, d) => s + d, 0) / sides.length;
    const deviation = sides.reduce((s, d) => s + Math.abs(d - avg), 0) / sides.length;
    if (deviation > avg * 0.5) {
        quality *= 0.8;
    }
    return quality;
}

export class ImageQualityAnalyzer {
    private readonly thresholds: Thresholds;

    constructor(
        private readonly processor: ReceiptImageProcessor,
        private readonly detector?: IRectangleDetector,
        thresholds: Partial<Thresholds> = {},
    ) {
        this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    }

    async analyze(image: ImageBuffer, processingType: string): Promise<ImageProcessingResult & { signals: QualitySignals }> {
        const t = this.thresholds;
        const issues: string[] = [];
        let confidence = 1.0;

        const brightness = await measureBrightness(this.processor, image);
        if (brightness < t.darkBelow) {
            issues.push(QUALITY_ISSUES.tooDark);
            confidence -= 0.2;
        } else if (brightness > t.brightAbove) {
            issues.push(QUALITY_ISSUES.overexposed);
            confidence -= 0.1;
        }

        const sharpness = await measureSharpness(this.processor, image);
        if (sharpness < t.blurryBelow) {
            issues.push(QUALITY_ISSUES.blurry);
            confidence -= 0.25;
        }

        const detection = this.detector
            ? selectDocumentRectangle(await this.detector.detectRectangles(image))
            : null;
        let rectQuality: number | undefined;
        if (!detection) {
            issues.push(QUALITY_ISSUES.noDocument);
            confidence -= 0.15;
        } else {
            rectQuality = rectangleQuality(detection);
            if (rectQuality < t.weakRectangleBelow) {
                issues.push(QUALITY_ISSUES.weakDetection);
                confidence -= 0.1;
            }
        }

        const aspectRatio = image.width / image.height;
        if (aspectRatio > t.maxAspect || aspectRatio < t.minAspect) {
            issues.push(QUALITY_ISSUES.unusualAspect);
            confidence -= 0.05;
        }

        return {
            overallConfidence: Math.max(0, Math.min(1, confidence)),
            processingType,
            detectedRectangle: detection,
            qualityIssues: issues,
            canAdjustManually: detection !== null,
            isStitched: false,
            signals: { brightness, sharpness, rectangleQuality: rectQuality, aspectRatio },
        };
    }
}
