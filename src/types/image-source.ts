import type { ImageBuffer } from './image-buffer';

export type ImageSource =
    | string                  // path
    | Buffer                  // encoded bytes (jpeg, png, ...)
    | { data: Buffer; filename?: string; mime?: string } // encoded bytes with a name
    | ImageBuffer;            // already decoded raster
