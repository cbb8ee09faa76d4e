import sharp from "sharp";
import type { Point2D, Quadrilateral } from "../types/geometry.types";
import type { ImageSource } from "../types/image-source";
import { openSharp } from "./open-sharp";

export type OverlayStyle = {
    color?: string;        // outline and handles
    handleRadius?: number; // px
    strokeWidth?: number;  // px; defaults to ~0.3% of the shorter side
    offset?: Point2D;      // added to every corner (container offset of the fitted image)
};

/** SVG with the crop outline and the four corner handles, sized W × H. */
export function cropOverlaySvg(W: number, H: number, corners: Quadrilateral, style: OverlayStyle = {}): string {
    const color = style.color ?? '#3b82f6';
    const radius = style.handleRadius ?? 10;
    const strokeWidth = style.strokeWidth ?? Math.max(2, Math.floor(Math.min(W, H) * 0.003));
    const dx = style.offset?.x ?? 0;
    const dy = style.offset?.y ?? 0;

    const pts = corners.map(p => ({ x: round(p.x + dx), y: round(p.y + dy) }));
    const polygon = pts.map(p => `${p.x},${p.y}`).join(' ');
    const handles = pts
        .map(p => `<circle cx="${p.x}" cy="${p.y}" r="${radius}" fill="${color}"/>`)
        .join('');

    return `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">` +
        `<polygon points="${polygon}" fill="none" stroke="${color}" stroke-width="${strokeWidth}"/>` +
        handles +
        `</svg>`;
}

/** Draw the crop outline over an image; returns PNG bytes. */
export async function drawCropOverlay(src: ImageSource, corners: Quadrilateral, style: OverlayStyle = {}): Promise<Buffer> {
    const { sh } = openSharp(src);
    const base = await sh.png().toBuffer();
    const meta = await sharp(base).metadata();
    const W = meta.width ?? 0;
    const H = meta.height ?? 0;
    if (!W || !H) throw new Error('Could not read image size');

    const svg = cropOverlaySvg(W, H, corners, style);
    return sharp(base)
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .png()
        .toBuffer();
}

function round(v: number) {
    return Math.round(v * 10) / 10;
}
