import { isCornerIndex, type Point2D, type Quadrilateral, type Rect } from "../types/geometry.types";
import { clamp } from "../geometry/quadrilateral";

export type CornerListener = (corners: Quadrilateral) => void;

/**
 * Coordinate state for the four crop handles. Rendering subscribes and reads;
 * only drag handling writes.
 */
export class CornerEditor {
    private corners: Quadrilateral;
    private seedCorners: Quadrilateral;
    private isLocked = false;
    private moved = false;
    private readonly listeners = new Set<CornerListener>();

    constructor(seed: Quadrilateral) {
        this.seedCorners = copyQuad(seed);
        this.corners = copyQuad(seed);
    }

    get quadrilateral(): Quadrilateral {
        return copyQuad(this.corners);
    }

    /** True once a corner has been dragged since the last reset. */
    get isDirty(): boolean {
        return this.moved;
    }

    get locked(): boolean {
        return this.isLocked;
    }

    /** While locked (a correction is pending) drags are ignored. */
    setLocked(locked: boolean) {
        this.isLocked = locked;
    }

    /**
     * Move one corner, clamped into [0, width] × [0, height] of the displayed image.
     * Returns false when the editor is locked.
     */
    dragCorner(index: number, to: Point2D, imageBounds: Rect): boolean {
        if (!isCornerIndex(index)) {
            throw new RangeError(`Corner index must be 0..3, got ${index}`);
        }
        if (!Number.isFinite(to.x) || !Number.isFinite(to.y)) {
            throw new RangeError(`Corner target must be finite, got (${to.x}, ${to.y})`);
        }
        if (this.isLocked) return false;

        const next: [Point2D, Point2D, Point2D, Point2D] = [...this.corners];
        next[index] = {
            x: clamp(to.x, 0, imageBounds.width),
            y: clamp(to.y, 0, imageBounds.height),
        };
        this.corners = next;
        this.moved = true;
        this.emit();
        return true;
    }

    /** Discard all edits and adopt `seed` as the new baseline. */
    reset(seed: Quadrilateral) {
        this.seedCorners = copyQuad(seed);
        this.corners = copyQuad(seed);
        this.moved = false;
        this.emit();
    }

    /**
     * Swap in re-projected corners and seed after the display geometry changed.
     * An untouched editor takes the seed itself.
     */
    replace(corners: Quadrilateral, seed: Quadrilateral) {
        this.seedCorners = copyQuad(seed);
        this.corners = copyQuad(this.moved ? corners : seed);
        this.emit();
    }

    subscribe(listener: CornerListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private emit() {
        const snapshot = this.quadrilateral;
        for (const listener of this.listeners) listener(snapshot);
    }
}

function copyQuad(q: Quadrilateral): Quadrilateral {
    const [a, b, c, d] = q;
    return [{ ...a }, { ...b }, { ...c }, { ...d }];
}
