import type { Point2D, Quadrilateral } from "../types/geometry.types";
import { GeometryError } from "../errors/geometry-error";

/** Row-major 3×3 projective matrix, h[8] normalized to 1. */
export type Homography = readonly [
    number, number, number,
    number, number, number,
    number, number, number,
];

const PIVOT_EPS = 1e-12;

/**
 * Solve A·x = b in place (Gaussian elimination, partial pivoting).
 * Returns null for a singular system.
 */
function solveLinear(a: number[][], b: number[]): number[] | null {
    const n = b.length;
    for (let col = 0; col < n; col++) {
        let pivot = col;
        for (let r = col + 1; r < n; r++) {
            if (Math.abs(a[r][col]) > Math.abs(a[pivot][col])) pivot = r;
        }
        if (Math.abs(a[pivot][col]) < PIVOT_EPS) return null;
        if (pivot !== col) {
            [a[col], a[pivot]] = [a[pivot], a[col]];
            [b[col], b[pivot]] = [b[pivot], b[col]];
        }
        for (let r = col + 1; r < n; r++) {
            const f = a[r][col] / a[col][col];
            if (f === 0) continue;
            for (let c = col; c < n; c++) a[r][c] -= f * a[col][c];
            b[r] -= f * b[col];
        }
    }
    const x = new Array<number>(n).fill(0);
    for (let r = n - 1; r >= 0; r--) {
        let s = b[r];
        for (let c = r + 1; c < n; c++) s -= a[r][c] * x[c];
        x[r] = s / a[r][r];
    }
    return x;
}

/**
 * Projective transform taking each `from[i]` onto `to[i]`.
 * Throws GeometryError('degenerateQuadrilateral') when the points admit no unique solution.
 */
export function solveHomography(from: Quadrilateral, to: Quadrilateral): Homography {
    const a: number[][] = [];
    const b: number[] = [];
    for (let i = 0; i < 4; i++) {
        const { x: u, y: v } = from[i];
        const { x, y } = to[i];
        a.push([u, v, 1, 0, 0, 0, -u * x, -v * x]);
        b.push(x);
        a.push([0, 0, 0, u, v, 1, -u * y, -v * y]);
        b.push(y);
    }
    const h = solveLinear(a, b);
    if (!h || !h.every(Number.isFinite)) {
        throw GeometryError.degenerate('no unique perspective transform');
    }
    return [h[0], h[1], h[2], h[3], h[4], h[5], h[6], h[7], 1];
}

export function applyHomography(h: Homography, p: Point2D): Point2D {
    const w = h[6] * p.x + h[7] * p.y + h[8];
    return {
        x: (h[0] * p.x + h[1] * p.y + h[2]) / w,
        y: (h[3] * p.x + h[4] * p.y + h[5]) / w,
    };
}
