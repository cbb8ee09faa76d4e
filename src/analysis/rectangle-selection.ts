import type { DetectionResult, NormalizedBox } from "../types/detection.types";

export type RectangleSelectionOptions = {
    maximumObservations: number; // candidates considered, in detector order
    minimumAspectRatio: number;  // tall receipts
    maximumAspectRatio: number;  // wide receipts
    minimumSize: number;         // larger box side, fraction of the image
    minimumConfidence: number;
};

export const DEFAULT_SELECTION: RectangleSelectionOptions = {
    maximumObservations: 5,
    minimumAspectRatio: 0.2,
    maximumAspectRatio: 5.0,
    minimumSize: 0.3,
    minimumConfidence: 0.7,
};

/** Detector-supplied box, or the axis-aligned hull of the four corners. */
export function detectionBoundingBox(d: DetectionResult): NormalizedBox {
    if (d.boundingBox) return d.boundingBox;
    const xs = [d.topLeft.x, d.topRight.x, d.bottomLeft.x, d.bottomRight.x];
    const ys = [d.topLeft.y, d.topRight.y, d.bottomLeft.y, d.bottomRight.y];
    const x = Math.min(...xs);
    const y = Math.min(...ys);
    return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
}

/**
 * Pick the rectangle most likely to be the receipt: the largest bounding box
 * among candidates that pass the size, aspect and confidence limits.
 */
export function selectDocumentRectangle(
    candidates: readonly DetectionResult[],
    options: Partial<RectangleSelectionOptions> = {},
): DetectionResult | null {
    const opts: RectangleSelectionOptions = { ...DEFAULT_SELECTION, ...options };

    let best: DetectionResult | null = null;
    let bestArea = -Infinity;
    for (const candidate of candidates.slice(0, opts.maximumObservations)) {
        if (candidate.confidence < opts.minimumConfidence) continue;
        const box = detectionBoundingBox(candidate);
        if (box.width <= 0 || box.height <= 0) continue;
        const aspect = box.width / box.height;
        if (aspect < opts.minimumAspectRatio || aspect > opts.maximumAspectRatio) continue;
        if (Math.max(box.width, box.height) < opts.minimumSize) continue;

        const area = box.width * box.height;
        if (area > bestArea) {
            best = candidate;
            bestArea = area;
        }
    }
    return best;
}
