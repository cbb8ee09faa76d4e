import { describe, it, expect } from "vitest";
import { detectionBoundingBox, selectDocumentRectangle } from "../src/analysis/rectangle-selection";
import type { DetectionResult } from "../src/types/detection.types";
import { squareDetection } from "./helpers";

function box(x: number, y: number, w: number, h: number, confidence = 0.9): DetectionResult {
    return {
        topLeft: { x, y: y + h },
        topRight: { x: x + w, y: y + h },
        bottomLeft: { x, y },
        bottomRight: { x: x + w, y },
        confidence,
    };
}

describe('detectionBoundingBox', () => {
    it('spans the corners when the detector gives no box', () => {
        const b = detectionBoundingBox(box(0.1, 0.2, 0.5, 0.6));
        expect(b.x).toBeCloseTo(0.1, 9);
        expect(b.y).toBeCloseTo(0.2, 9);
        expect(b.width).toBeCloseTo(0.5, 9);
        expect(b.height).toBeCloseTo(0.6, 9);
    });

    it('prefers the detector box', () => {
        const d = { ...squareDetection(0.1, 0.9), boundingBox: { x: 0, y: 0, width: 1, height: 1 } };
        expect(detectionBoundingBox(d)).toEqual({ x: 0, y: 0, width: 1, height: 1 });
    });
});

describe('selectDocumentRectangle', () => {
    it('returns null without candidates', () => {
        expect(selectDocumentRectangle([])).toBeNull();
    });

    it('picks the largest qualifying rectangle', () => {
        const small = box(0.1, 0.1, 0.4, 0.5);
        const large = box(0.05, 0.05, 0.8, 0.9);
        expect(selectDocumentRectangle([small, large])).toBe(large);
    });

    it('skips low confidence, tiny and extreme-aspect candidates', () => {
        const lowConfidence = box(0, 0, 1, 1, 0.5);
        const tiny = box(0.4, 0.4, 0.2, 0.2);
        const sliver = box(0, 0.45, 0.9, 0.1); // aspect 9
        const ok = box(0.2, 0.1, 0.3, 0.8);
        expect(selectDocumentRectangle([lowConfidence, tiny, sliver, ok])).toBe(ok);
    });

    it('considers only the first maximumObservations candidates', () => {
        const first = box(0.1, 0.1, 0.4, 0.5);
        const second = box(0, 0, 1, 1);
        expect(selectDocumentRectangle([first, second], { maximumObservations: 1 })).toBe(first);
    });

    it('allows long, narrow receipts', () => {
        const tall = box(0.4, 0.0, 0.25, 1.0);
        expect(selectDocumentRectangle([tall])).toBe(tall);
    });
});
