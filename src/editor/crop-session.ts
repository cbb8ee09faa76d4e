import type { Point2D, Quadrilateral, Size } from "../types/geometry.types";
import type { DetectionResult } from "../types/detection.types";
import type { ImageBuffer } from "../types/image-buffer";
import { CornerEditor } from "./corner-editor";
import { fitImage, seed, type FittedImage } from "../adapters/detection-adapter";
import { clamp, scaleQuad } from "../geometry/quadrilateral";
import { correct, correctAsync } from "../processors/perspective-corrector";
import { ADJUST_CORNERS_PROMPT, GeometryError } from "../errors/geometry-error";

export type DisplayLayout = FittedImage & {
    imageSize: Size;
    /** original pixels per displayed pixel */
    scale: { x: number; y: number };
};

export type CropOutcome =
    | { kind: 'applied'; image: ImageBuffer; corners: Quadrilateral }
    | { kind: 'invalid'; error: GeometryError; message: string }
    | { kind: 'cancelled' };

export type CropSessionOptions = {
    /** Throw on a corner outside the displayed image instead of clamping it. */
    strictBounds?: boolean;
    debug?: boolean;
};

const DEFAULT_OPTIONS: Required<CropSessionOptions> = {
    strictBounds: process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test',
    debug: false,
};

export function computeLayout(containerSize: Size, imageSize: Size): DisplayLayout {
    const fitted = fitImage(containerSize, imageSize.width / imageSize.height);
    return {
        ...fitted,
        imageSize: { width: imageSize.width, height: imageSize.height },
        scale: {
            x: imageSize.width / fitted.size.width,
            y: imageSize.height / fitted.size.height,
        },
    };
}

/**
 * Map corners from displayed-image coordinates into original image pixels.
 * Out-of-bounds corners throw with `strictBounds`, otherwise they are clamped.
 */
export function displayToImageSpace(corners: Quadrilateral, layout: DisplayLayout, strictBounds: boolean): Quadrilateral {
    const { width, height } = layout.size;
    const slack = 1e-6 * Math.max(width, height);
    const inBounds = corners.map((p, i) => {
        const outside = p.x < -slack || p.y < -slack || p.x > width + slack || p.y > height + slack;
        if (outside && strictBounds) {
            throw GeometryError.outOfBounds(i, p.x, p.y);
        }
        return { x: clamp(p.x, 0, width), y: clamp(p.y, 0, height) };
    });
    const [a, b, c, d] = inBounds;
    return scaleQuad([a, b, c, d], layout.scale.x, layout.scale.y);
}

/**
 * State of one manual crop: the editable corners in display space, the
 * layout that ties them to the original image, and the pending correction.
 */
export class CropSession {
    readonly editor: CornerEditor;
    private currentLayout: DisplayLayout;
    private seedCorners: Quadrilateral;
    private readonly config: Required<CropSessionOptions>;
    private pending: AbortController | null = null;
    private closed = false;

    constructor(
        private readonly image: ImageBuffer,
        private readonly detection: DetectionResult | null,
        containerSize: Size,
        options: CropSessionOptions = {},
    ) {
        this.config = { ...DEFAULT_OPTIONS, ...options };
        this.currentLayout = computeLayout(containerSize, image);
        this.seedCorners = seed(detection, containerSize, image.width / image.height);
        this.editor = new CornerEditor(this.seedCorners);
        this.log(`seeded from ${detection ? 'detection' : 'default inset'}: ${formatQuad(this.seedCorners)}`);
    }

    get layout(): DisplayLayout {
        return this.currentLayout;
    }

    get seed(): Quadrilateral {
        return this.seedCorners;
    }

    get corners(): Quadrilateral {
        return this.editor.quadrilateral;
    }

    get isDirty(): boolean {
        return this.editor.isDirty;
    }

    get isPending(): boolean {
        return this.pending !== null;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Drag with a point in container coordinates (as delivered by the gesture). */
    dragCorner(index: number, containerPoint: Point2D): boolean {
        const { offset } = this.currentLayout;
        return this.dragCornerInImage(index, { x: containerPoint.x - offset.x, y: containerPoint.y - offset.y });
    }

    /** Drag with a point relative to the displayed image's top-left. */
    dragCornerInImage(index: number, point: Point2D): boolean {
        this.assertOpen('drag a corner');
        const { width, height } = this.currentLayout.size;
        return this.editor.dragCorner(index, point, { x: 0, y: 0, width, height });
    }

    /** Ignored while a correction is pending. */
    reset() {
        this.assertOpen('reset');
        if (this.pending) return;
        this.editor.reset(this.seedCorners);
    }

    /** Re-project corners and seed onto a new container (rotation, resize). */
    relayout(containerSize: Size) {
        this.assertOpen('relayout');
        if (this.pending) throw new Error('Cannot relayout while a correction is pending');
        const prev = this.currentLayout.size;
        const next = computeLayout(containerSize, this.image);
        const sx = next.size.width / prev.width;
        const sy = next.size.height / prev.height;
        this.currentLayout = next;
        this.seedCorners = seed(this.detection, containerSize, this.image.width / this.image.height);
        this.editor.replace(scaleQuad(this.editor.quadrilateral, sx, sy), this.seedCorners);
    }

    toImageSpace(): Quadrilateral {
        return displayToImageSpace(this.editor.quadrilateral, this.currentLayout, this.config.strictBounds);
    }

    /** Warp synchronously. A degenerate crop leaves the session open. */
    apply(): CropOutcome {
        this.assertOpen('apply');
        if (this.pending) throw new Error('A correction is already pending');
        try {
            const corners = this.toImageSpace();
            const image = correct(this.image, corners);
            this.closed = true;
            this.log(`applied: ${image.width}x${image.height}`);
            return { kind: 'applied', image, corners };
        } catch (e) {
            return this.invalidOrThrow(e);
        }
    }

    /**
     * Warp off the current tick. Drags are ignored until it settles; `cancel()`
     * drops the result.
     */
    async applyAsync(): Promise<CropOutcome> {
        this.assertOpen('apply');
        if (this.pending) throw new Error('A correction is already pending');

        const controller = new AbortController();
        this.pending = controller;
        this.editor.setLocked(true);
        try {
            const corners = this.toImageSpace();
            const image = await correctAsync(this.image, corners, { signal: controller.signal });
            this.closed = true;
            this.log(`applied: ${image.width}x${image.height}`);
            return { kind: 'applied', image, corners };
        } catch (e) {
            if (controller.signal.aborted) {
                return { kind: 'cancelled' };
            }
            return this.invalidOrThrow(e);
        } finally {
            this.pending = null;
            this.editor.setLocked(false);
        }
    }

    /** Close without applying; a pending correction is aborted. */
    cancel(): CropOutcome {
        if (this.pending) {
            this.pending.abort(new Error('Crop cancelled'));
        }
        this.closed = true;
        this.log('cancelled');
        return { kind: 'cancelled' };
    }

    private invalidOrThrow(e: unknown): CropOutcome {
        if (e instanceof GeometryError) {
            this.log(`refused: ${e.message}`);
            return { kind: 'invalid', error: e, message: ADJUST_CORNERS_PROMPT };
        }
        throw e;
    }

    private assertOpen(action: string) {
        if (this.closed) throw new Error(`Cannot ${action}: crop session is closed`);
    }

    private log(text: string) {
        if (this.config.debug) {
            console.log(`[CropSession] ${text}`);
        }
    }
}

function formatQuad(q: Quadrilateral): string {
    return q.map(p => `(${p.x.toFixed(1)}, ${p.y.toFixed(1)})`).join(' ');
}
