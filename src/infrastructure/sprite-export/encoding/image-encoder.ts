import { PNG } from 'pngjs';
import sharp from 'sharp';

import {
  ExportError,
  hasRgbaLayout,
  type FrameBuffer,
  type OutputFormat,
} from '../../../domain/sprite-export/index.js';

/** Largest width or height a WebP bitstream can describe. */
export const WEBP_MAX_DIMENSION = 16_383;

const PNG_RGBA = 6;

export interface ImageEncoder {
  encode(frame: FrameBuffer, format: OutputFormat): Promise<Buffer>;
}

export interface RasterImageEncoderOptions {
  readonly webpQuality: number;
  readonly pngDeflateLevel?: number;
}

/**
 * Lossless 8-bit RGBA PNG.
 */
export function encodePng(frame: FrameBuffer, deflateLevel = 9): Buffer {
  const png = new PNG({ width: frame.width, height: frame.height });
  png.data = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  return PNG.sync.write(png, {
    colorType: PNG_RGBA,
    inputHasAlpha: true,
    deflateLevel,
  });
}

export function decodePng(buffer: Buffer): FrameBuffer {
  const png = PNG.sync.read(buffer);
  return { width: png.width, height: png.height, data: png.data };
}

/**
 * Lossless WebP straight from the RGBA buffer, so partially transparent
 * pixels keep their exact colour.
 */
export async function encodeWebp(frame: FrameBuffer, quality: number): Promise<Buffer> {
  return sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: 4 },
  })
    .webp({ lossless: true, quality, alphaQuality: 100, effort: 4 })
    .toBuffer();
}

export class RasterImageEncoder implements ImageEncoder {
  private readonly webpQuality: number;

  private readonly pngDeflateLevel: number;

  public constructor(options: RasterImageEncoderOptions) {
    this.webpQuality = options.webpQuality;
    this.pngDeflateLevel = options.pngDeflateLevel ?? 9;
  }

  public async encode(frame: FrameBuffer, format: OutputFormat): Promise<Buffer> {
    if (!hasRgbaLayout(frame)) {
      throw new ExportError({ kind: 'EncodeFailed', format });
    }

    switch (format) {
      case 'png':
        return this.guard(format, () => encodePng(frame, this.pngDeflateLevel));
      case 'webp': {
        if (frame.width > WEBP_MAX_DIMENSION || frame.height > WEBP_MAX_DIMENSION) {
          throw new ExportError({ kind: 'EncodeFailed', format });
        }
        return this.guard(format, () => encodeWebp(frame, this.webpQuality));
      }
      default: {
        const exhaustive: never = format;
        throw new ExportError({ kind: 'EncodeFailed', format: exhaustive });
      }
    }
  }

  private async guard(format: OutputFormat, encode: () => Buffer | Promise<Buffer>): Promise<Buffer> {
    try {
      return await encode();
    } catch (error) {
      throw new ExportError({ kind: 'EncodeFailed', format }, error);
    }
  }
}
