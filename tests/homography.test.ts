import { describe, it, expect } from "vitest";
import { applyHomography, solveHomography } from "../src/geometry/homography";
import { GeometryError } from "../src/errors/geometry-error";
import type { Quadrilateral } from "../src/types/geometry.types";

const unit: Quadrilateral = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }];

describe('solveHomography', () => {
    it('maps each source corner onto its target', () => {
        const target: Quadrilateral = [{ x: 12, y: 8 }, { x: 210, y: 30 }, { x: 190, y: 260 }, { x: 5, y: 240 }];
        const h = solveHomography(unit, target);
        unit.forEach((p, i) => {
            const q = applyHomography(h, p);
            expect(q.x).toBeCloseTo(target[i].x, 6);
            expect(q.y).toBeCloseTo(target[i].y, 6);
        });
    });

    it('reduces to a scale for two axis-aligned rectangles', () => {
        const h = solveHomography(unit, [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 2 }, { x: 0, y: 2 }]);
        const mid = applyHomography(h, { x: 0.5, y: 0.5 });
        expect(mid.x).toBeCloseTo(2, 9);
        expect(mid.y).toBeCloseTo(1, 9);
    });

    it('throws a degenerate-quadrilateral error when the source collapses', () => {
        const p = { x: 3, y: 3 };
        expect(() => solveHomography([p, p, p, p], unit)).toThrow(GeometryError);
    });
});
