import sharp, { type Sharp } from 'sharp';
import path from 'node:path';
import type { ImageSource } from '../types/image-source';
import { isChannelCount, type ImageBuffer } from '../types/image-buffer';

export function isImageBuffer(src: ImageSource): src is ImageBuffer {
    return typeof src === 'object' && !Buffer.isBuffer(src) && 'channels' in src;
}

export function openSharp(src: ImageSource): { sh: Sharp; filename?: string } {
    if (typeof src === 'string') {
        return { sh: sharp(src), filename: path.basename(src) };
    }
    if (Buffer.isBuffer(src)) {
        return { sh: sharp(src) };
    }
    if (isImageBuffer(src)) {
        const { width, height, channels, data } = src;
        return { sh: sharp(data, { raw: { width, height, channels } }) };
    }
    // { data: Buffer, ... }
    return { sh: sharp(src.data), filename: src.filename };
}

/** Run the pipeline to raw pixels and wrap them as an ImageBuffer. */
export async function toImageBuffer(sh: Sharp): Promise<ImageBuffer> {
    const { data, info } = await sh.raw().toBuffer({ resolveWithObject: true });
    const { width, height, channels } = info;
    if (!isChannelCount(channels)) {
        throw new Error(`Unsupported channel count: ${channels}`);
    }
    return Object.freeze({
        width,
        height,
        channels,
        data: new Uint8Array(data.buffer, data.byteOffset, data.length),
    });
}
