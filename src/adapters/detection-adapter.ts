import type { Point2D, Quadrilateral, Size } from "../types/geometry.types";
import type { DetectionResult } from "../types/detection.types";
import { orderCorners } from "../geometry/quadrilateral";

/** Fraction of the fitted image left around the default crop. */
export const DEFAULT_INSET = 0.1;

export type FittedImage = {
    size: Size;      // displayed image size inside the container
    offset: Point2D; // top-left of the displayed image within the container
};

/** Aspect-fit (letterbox / pillarbox) the image inside the container, centred. */
export function fitImage(containerSize: Size, imageAspectRatio: number): FittedImage {
    const containerAspect = containerSize.width / containerSize.height;
    let width: number;
    let height: number;
    if (imageAspectRatio > containerAspect) {
        // wider than the container
        width = containerSize.width;
        height = containerSize.width / imageAspectRatio;
    } else {
        height = containerSize.height;
        width = containerSize.height * imageAspectRatio;
    }
    return {
        size: { width, height },
        offset: {
            x: (containerSize.width - width) / 2,
            y: (containerSize.height - height) / 2,
        },
    };
}

/**
 * Map a detection (normalized, origin bottom-left) onto a top-left-origin
 * surface of `size`, then re-label the corners by where they land.
 */
export function detectionToSurface(detection: DetectionResult, size: Size): Quadrilateral {
    const toSurface = (p: Point2D): Point2D => ({
        x: p.x * size.width,
        y: (1 - p.y) * size.height,
    });
    return orderCorners([
        toSurface(detection.topLeft),
        toSurface(detection.topRight),
        toSurface(detection.bottomLeft),
        toSurface(detection.bottomRight),
    ]);
}

/** Same mapping against the full-resolution image. */
export function detectionToImageSpace(detection: DetectionResult, imageSize: Size): Quadrilateral {
    return detectionToSurface(detection, imageSize);
}

export function insetQuadrilateral(size: Size, inset = DEFAULT_INSET): Quadrilateral {
    const { width: w, height: h } = size;
    return [
        { x: w * inset, y: h * inset },
        { x: w * (1 - inset), y: h * inset },
        { x: w * (1 - inset), y: h * (1 - inset) },
        { x: w * inset, y: h * (1 - inset) },
    ];
}

/**
 * Initial crop corners in displayed-image coordinates: the detection when
 * there is one, else a rectangle inset by 10% on each side.
 */
export function seed(detection: DetectionResult | null | undefined, displaySize: Size, imageAspectRatio: number): Quadrilateral {
    const { size } = fitImage(displaySize, imageAspectRatio);
    return detection ? detectionToSurface(detection, size) : insetQuadrilateral(size);
}
