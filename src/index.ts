export * from './types/geometry.types';
export * from './types/image-buffer';
export type { ImageSource } from './types/image-source';
export type { DetectionResult, DetectionMeta, NormalizedBox } from './types/detection.types';

export * from './errors/geometry-error';
export * from './errors/preview-state-error';

export * from './geometry/quadrilateral';
export * from './geometry/homography';

export * from './adapters/detection-adapter';
export * from './editor/corner-editor';
export * from './editor/crop-session';
export * from './processors/perspective-corrector';
export * from './preview/receipt-preview';

export * from './processors/image-processor';
export * from './analysis/quality-analyzer';
export * from './analysis/rectangle-selection';
export * from './interfaces/processing-result';
export type { IRectangleDetector } from './interfaces/rectangle-detector.interface';
export { openSharp, toImageBuffer, isImageBuffer } from './utils/open-sharp';
export * from './utils/draw-crop-overlay';
