export type GeometryErrorKind = 'degenerateQuadrilateral' | 'cornerOutOfBounds';

/** Prompt shown when a manual crop cannot be applied. */
export const ADJUST_CORNERS_PROMPT = 'Adjust the corners and try again';

export class GeometryError extends Error {
    readonly kind: GeometryErrorKind;

    constructor(kind: GeometryErrorKind, message: string) {
        super(message);
        this.name = 'GeometryError';
        this.kind = kind;
    }

    static degenerate(reason: string): GeometryError {
        return new GeometryError('degenerateQuadrilateral', `Degenerate quadrilateral: ${reason}`);
    }

    static outOfBounds(index: number, x: number, y: number): GeometryError {
        return new GeometryError('cornerOutOfBounds', `Corner ${index} (${x}, ${y}) is outside the displayed image`);
    }
}
