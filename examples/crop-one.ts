import path from "node:path";
import { promises as fs } from "node:fs";
import sharp from "sharp";
import {ReceiptImageProcessor} from "../src/processors/image-processor";
import {insetQuadrilateral} from "../src/adapters/detection-adapter";
import {correct} from "../src/processors/perspective-corrector";
import {drawCropOverlay} from "../src/utils/draw-crop-overlay";
import {GeometryError} from "../src/errors/geometry-error";
import type {Point2D, Quadrilateral} from "../src/types/geometry.types";

const [, , imagePathArg, ...cornerArgs] = process.argv;
if (!imagePathArg) {
    console.error("Usage: tsx examples/crop-one.ts path/to/receipt.jpg [x,y x,y x,y x,y]");
    console.error("Corners are original-image pixels: topLeft topRight bottomRight bottomLeft.");
    process.exit(1);
}
const imagePath = path.resolve(process.cwd(), imagePathArg);
const outDir = path.resolve(process.cwd(), "images/processed");
await fs.mkdir(outDir, { recursive: true });

const processor = new ReceiptImageProcessor({ debug: true });
const image = await processor.decode(imagePath);

function parsePoint(arg: string): Point2D {
    const [x, y] = arg.split(",").map(Number);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
        throw new Error(`Bad corner "${arg}", expected x,y`);
    }
    return { x, y };
}

let corners: Quadrilateral;
if (cornerArgs.length === 4) {
    const [a, b, c, d] = cornerArgs.map(parsePoint);
    corners = [a, b, c, d];
} else {
    corners = insetQuadrilateral(image);
    console.log("No corners given, using a 10% inset crop");
}

const overlayPath = path.join(outDir, `corners-${path.basename(imagePath, path.extname(imagePath))}.png`);
await sharp(await drawCropOverlay(image, corners)).toFile(overlayPath);
console.log("Saved overlay:", overlayPath);

try {
    const corrected = correct(image, corners);
    const outPath = path.join(outDir, `deskewed-${path.basename(imagePath, path.extname(imagePath))}.png`);
    await fs.writeFile(outPath, await processor.encode(corrected, "png"));
    console.log(`Saved ${corrected.width}x${corrected.height}:`, outPath);
} catch (e) {
    if (e instanceof GeometryError) {
        console.error(`❌ ${e.message}`);
        process.exit(2);
    }
    throw e;
}
