/** Pixel-space point; no identity beyond its coordinates. */
export type Point2D = { x: number; y: number };

export type Size = { width: number; height: number };

export type Rect = { x: number; y: number; width: number; height: number };

/** Corner order: topLeft, topRight, bottomRight, bottomLeft (closed winding). */
export type Quadrilateral = readonly [Point2D, Point2D, Point2D, Point2D];

export type CornerIndex = 0 | 1 | 2 | 3;

export function isCornerIndex(index: number): index is CornerIndex {
    return Number.isInteger(index) && index >= 0 && index <= 3;
}
