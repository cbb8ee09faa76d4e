import path from "path";
import type { Sharp } from "sharp";
import { openSharp, toImageBuffer } from "../utils/open-sharp";
import type { ImageSource } from "../types/image-source";
import type { ImageBuffer } from "../types/image-buffer";
import type { DetectionResult } from "../types/detection.types";
import type { IRectangleDetector } from "../interfaces/rectangle-detector.interface";
import type { ImageProcessingResult } from "../interfaces/processing-result";
import { detectionToImageSpace } from "../adapters/detection-adapter";
import { correct } from "./perspective-corrector";
import { selectDocumentRectangle } from "../analysis/rectangle-selection";
import { ImageQualityAnalyzer } from "../analysis/quality-analyzer";

interface ImageMetadata {
    width: number;
    height: number;
    format: string;
    colorspace: string;
    hasAlpha: boolean;
    density?: number;
}

export type EncodeFormat = 'png' | 'jpeg' | 'webp';

export interface ImageEnhancementConfig {
    exposureAdjustment: number;   // EV stops, pixel values scale by 2^ev
    brightnessBoost: number;      // added offset as a fraction of full scale
    contrastMultiplier: number;   // around mid-grey
    sharpnessAmount: number;      // 0..1
    noiseReductionAmount: number; // 0 disables the median pass
}

export const RECEIPT_ENHANCEMENT: ImageEnhancementConfig = {
    exposureAdjustment: 0.5,
    brightnessBoost: 0.1,
    contrastMultiplier: 1.2,
    sharpnessAmount: 0.6,
    noiseReductionAmount: 0.02,
};

export const OCR_OPTIMIZED: ImageEnhancementConfig = {
    exposureAdjustment: 0.3,
    brightnessBoost: 0.15,
    contrastMultiplier: 1.4,
    sharpnessAmount: 0.8,
    noiseReductionAmount: 0.03,
};

/** Longest side sent to the receipt-reading model. */
export const MAX_AI_DIMENSION = 2048;

export type ReceiptImageProcessorOptions = {
    detector?: IRectangleDetector;
    debug?: boolean;
};

export type AnalyzedImage = {
    original: ImageBuffer;
    image: ImageBuffer;
    result: ImageProcessingResult;
};

export class ReceiptImageProcessor {
    private readonly detector?: IRectangleDetector;
    private readonly debug: boolean;
    private readonly analyzer: ImageQualityAnalyzer;

    constructor(options: ReceiptImageProcessorOptions = {}) {
        this.detector = options.detector;
        this.debug = options.debug ?? false;
        this.analyzer = new ImageQualityAnalyzer(this, this.detector);
    }

    async getImageMetadata(src: ImageSource): Promise<ImageMetadata> {
        const meta = await this.asSRGB(src).metadata();
        const width  = meta.width  ?? 0;
        const height = meta.height ?? 0;
        if (width === 0 || height === 0) {
            throw new Error(`Invalid image size: ${width}x${height}`);
        }
        return {
            width,
            height,
            format: meta.format || "unknown",
            colorspace: meta.space || "srgb",
            hasAlpha: meta.hasAlpha || false,
            density: meta.density,
        };
    }

    /** EXIF-rotated sRGB pixels without alpha. */
    async decode(src: ImageSource): Promise<ImageBuffer> {
        return toImageBuffer(this.asSRGB(src));
    }

    async encode(image: ImageBuffer, format: EncodeFormat = 'png'): Promise<Buffer> {
        const { sh } = openSharp(image);
        return sh.toFormat(format).toBuffer();
    }

    async getImageAsBase64(src: ImageSource, format: EncodeFormat = 'jpeg'): Promise<string> {
        const { sh } = openSharp(src);
        const buffer = await sh.toFormat(format).toBuffer();
        return buffer.toString("base64");
    }

    /**
     * Brighten, add contrast, sharpen and lightly denoise for text recognition.
     * Exposure, brightness and contrast fold into one `linear`: sharp keeps only
     * the last one set on a pipeline.
     */
    async enhanceReceiptImage(src: ImageSource, config: ImageEnhancementConfig = RECEIPT_ENHANCEMENT): Promise<ImageBuffer> {
        const gain = Math.pow(2, config.exposureAdjustment);
        const c = config.contrastMultiplier;
        let sh = this.asSRGB(src)
            .linear(c * gain, c * config.brightnessBoost * 255 + 128 * (1 - c))
            .sharpen({ sigma: 0.5 + config.sharpnessAmount });
        if (config.noiseReductionAmount > 0) {
            sh = sh.median(3);
        }
        this.log(`enhanced with contrast ${c}, gain ${gain.toFixed(2)}`);
        return toImageBuffer(sh);
    }

    /** Fit inside 2048 px (never enlarge), sharpen, greyscale, contrast 1.3. */
    async optimizeForAI(src: ImageSource): Promise<ImageBuffer> {
        const sh = this.asSRGB(src)
            .resize({ width: MAX_AI_DIMENSION, height: MAX_AI_DIMENSION, fit: 'inside', withoutEnlargement: true })
            .sharpen({ sigma: 1.3 })
            .linear(1.3, 128 * (1 - 1.3))
            .toColourspace('b-w');
        return toImageBuffer(sh);
    }

    /** Perspective-correct the detected document out of the full image. */
    cropToDocument(image: ImageBuffer, detection: DetectionResult): ImageBuffer {
        const corners = detectionToImageSpace(detection, image);
        return correct(image, corners);
    }

    /** Detect the receipt, crop to it when found, then enhance. */
    async processGalleryImage(src: ImageSource): Promise<ImageBuffer> {
        const image = await this.decode(src);
        const detection = await this.detectDocumentRectangle(image);

        let processed = image;
        if (detection) {
            this.log("document rectangle detected - cropping");
            try {
                processed = this.cropToDocument(image, detection);
            } catch (e) {
                console.error("[ReceiptImageProcessor] crop to document failed, keeping full image:", e);
            }
        } else {
            this.log("no document rectangle detected - processing full image");
        }
        return this.enhanceReceiptImage(processed);
    }

    async processImageWithAnalysis(src: ImageSource, processingType: string): Promise<AnalyzedImage> {
        const original = await this.decode(src);
        const result = await this.analyzer.analyze(original, processingType);
        const image = await this.enhanceReceiptImage(original);
        return { original, image, result };
    }

    async detectDocumentRectangle(src: ImageSource): Promise<DetectionResult | null> {
        if (!this.detector) return null;
        const candidates = await this.detector.detectRectangles(src);
        const best = selectDocumentRectangle(candidates);
        this.log(`rectangles: ${candidates.length} candidate(s), ${best ? 'selected one' : 'none usable'}`);
        return best;
    }

    isValidImageFile(filename: string): boolean {
        const validExtensions = [".jpg", ".jpeg", ".png", ".webp", ".tiff", ".heic"];
        const ext = path.extname(filename).toLowerCase();
        return validExtensions.includes(ext);
    }

    asSRGB(src: ImageSource): Sharp {
        const { sh } = openSharp(src);
        return sh
            .rotate()
            .toColourspace('srgb')
            .removeAlpha();
    }

    private log(text: string) {
        if (this.debug) {
            console.log(`[ReceiptImageProcessor] ${text}`);
        }
    }
}
