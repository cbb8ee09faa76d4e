import type { ImageSource } from "../types/image-source";
import type { DetectionResult } from "../types/detection.types";

/** External document-rectangle detector (vision model, native scanner, ...). */
export interface IRectangleDetector {
    /** All candidate rectangles, normalized with a bottom-left origin. */
    detectRectangles(src: ImageSource): Promise<DetectionResult[]>;
}
