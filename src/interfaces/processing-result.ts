import type { DetectionResult } from "../types/detection.types";

export type QualityLabel = 'Excellent' | 'Good' | 'Fair' | 'Poor';
export type ConfidenceLevel = 'high' | 'medium' | 'low';

export interface ImageProcessingResult {
    overallConfidence: number;                  // 0..1
    processingType: string;                     // e.g. 'Camera', 'Gallery', 'Document Scan'
    detectedRectangle: DetectionResult | null;  // Seeds manual adjustment when present
    qualityIssues: string[];                    // Human-readable issues, in detection order
    canAdjustManually: boolean;
    isStitched: boolean;                        // Built from several partial shots
}

export function hasIssues(result: ImageProcessingResult): boolean {
    return result.qualityIssues.length > 0;
}

export function qualityLabel(confidence: number): QualityLabel {
    if (confidence >= 0.9) return 'Excellent';
    if (confidence >= 0.75) return 'Good';
    if (confidence >= 0.6) return 'Fair';
    return 'Poor';
}

/** Coarser banding used for the confidence badge. */
export function confidenceLevel(confidence: number): ConfidenceLevel {
    if (confidence >= 0.8) return 'high';
    if (confidence >= 0.6) return 'medium';
    return 'low';
}
