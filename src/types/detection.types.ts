import type { Point2D } from './geometry.types';

export type DetectionMeta = {
    source?: 'detector' | 'fallback';
    reason?: string;                    // Brief reason
};

/** Normalized [0,1] box, origin bottom-left like the detector's points. */
export type NormalizedBox = { x: number; y: number; width: number; height: number };

/**
 * Rectangle produced by an external document detector.
 * Points are normalized to [0,1]² with the origin at the bottom-left.
 */
export type DetectionResult = {
    topLeft: Point2D;
    topRight: Point2D;
    bottomLeft: Point2D;
    bottomRight: Point2D;
    confidence: number;
    boundingBox?: NormalizedBox;
    meta?: DetectionMeta;
};
