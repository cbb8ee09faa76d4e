import type { Point2D, Quadrilateral, Size } from "../types/geometry.types";
import { GeometryError } from "../errors/geometry-error";

/** Relative tolerance for area and collinearity checks. */
const EPS = 1e-9;

export function clamp(v: number, lo: number, hi: number) {
    return Math.max(lo, Math.min(hi, v));
}

export function distance(a: Point2D, b: Point2D): number {
    return Math.hypot(a.x - b.x, a.y - b.y);
}

/** z of (b - a) × (c - a) */
function cross(a: Point2D, b: Point2D, c: Point2D): number {
    return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

/** Signed shoelace area; positive for clockwise corners when y grows downwards. */
export function signedArea(q: Quadrilateral): number {
    let s = 0;
    for (let i = 0; i < 4; i++) {
        const p = q[i];
        const n = q[(i + 1) % 4];
        s += p.x * n.y - n.x * p.y;
    }
    return s / 2;
}

function segmentsCross(a: Point2D, b: Point2D, c: Point2D, d: Point2D): boolean {
    const d1 = cross(c, d, a);
    const d2 = cross(c, d, b);
    const d3 = cross(a, b, c);
    const d4 = cross(a, b, d);
    return ((d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)) &&
        ((d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0));
}

/** True when either pair of opposite edges crosses (bowtie). */
export function isSelfIntersecting(q: Quadrilateral): boolean {
    const [tl, tr, br, bl] = q;
    return segmentsCross(tl, tr, br, bl) || segmentsCross(tr, br, bl, tl);
}

export function scaleQuad(q: Quadrilateral, sx: number, sy: number): Quadrilateral {
    const [a, b, c, d] = q.map(p => ({ x: p.x * sx, y: p.y * sy }));
    return [a, b, c, d];
}

/**
 * Re-label four arbitrary points as topLeft, topRight, bottomRight, bottomLeft
 * (y grows downwards). Sorted clockwise around the centroid, starting at the
 * point with the smallest x + y.
 */
export function orderCorners(points: readonly Point2D[]): Quadrilateral {
    if (points.length !== 4) {
        throw new RangeError(`Expected 4 points, got ${points.length}`);
    }
    const cx = points.reduce((s, p) => s + p.x, 0) / 4;
    const cy = points.reduce((s, p) => s + p.y, 0) / 4;
    const sorted = [...points].sort(
        (p, q) => Math.atan2(p.y - cy, p.x - cx) - Math.atan2(q.y - cy, q.x - cx)
    );
    let start = 0;
    for (let i = 1; i < 4; i++) {
        if (sorted[i].x + sorted[i].y < sorted[start].x + sorted[start].y) start = i;
    }
    const at = (k: number) => {
        const p = sorted[(start + k) % 4];
        return { x: p.x, y: p.y };
    };
    return [at(0), at(1), at(2), at(3)];
}

/**
 * Throws GeometryError('degenerateQuadrilateral') when no homography can map
 * the corners onto a rectangle.
 */
export function assertNonDegenerate(q: Quadrilateral): void {
    if (!q.every(p => Number.isFinite(p.x) && Number.isFinite(p.y))) {
        throw GeometryError.degenerate('non-finite coordinate');
    }
    const extent = Math.max(
        ...q.map(p => Math.abs(p.x)),
        ...q.map(p => Math.abs(p.y)),
        1,
    );
    const tol = EPS * extent * extent;

    if (Math.abs(signedArea(q)) <= tol) {
        throw GeometryError.degenerate('zero area');
    }
    for (let i = 0; i < 4; i++) {
        const a = q[i], b = q[(i + 1) % 4], c = q[(i + 2) % 4];
        if (Math.abs(cross(a, b, c)) <= tol) {
            throw GeometryError.degenerate('three corners are collinear');
        }
    }
    if (isSelfIntersecting(q)) {
        throw GeometryError.degenerate('edges cross each other');
    }
}

/** Upright output size: longest horizontal and vertical edge, rounded to pixels. */
export function outputSize(q: Quadrilateral): Size {
    const [tl, tr, br, bl] = q;
    const width = Math.max(distance(tl, tr), distance(bl, br));
    const height = Math.max(distance(tl, bl), distance(tr, br));
    return { width: Math.round(width), height: Math.round(height) };
}

/** Exact (unrounded) width / height of the upright output. */
export function outputAspectRatio(q: Quadrilateral): number {
    const [tl, tr, br, bl] = q;
    return Math.max(distance(tl, tr), distance(bl, br)) / Math.max(distance(tl, bl), distance(tr, br));
}
