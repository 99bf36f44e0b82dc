import * as jpeg from 'jpeg-js';
import { FrameDecodeError } from '../errors';
import { PreprocessResult } from '../types';

export interface DecodedImage {
  width: number;
  height: number;
  /** RGBA, row-major. */
  data: Uint8Array;
}

// Upper bound on decoder allocations for a single frame.
const MAX_DECODE_MEMORY_MB = 256;

export class ImageProcessor {
  static decode(jpegBytes: Uint8Array): DecodedImage {
    let raw: DecodedImage;
    try {
      raw = jpeg.decode(jpegBytes, {
        useTArray: true,
        formatAsRGBA: true,
        maxMemoryUsageInMB: MAX_DECODE_MEMORY_MB,
      });
    } catch (error) {
      throw new FrameDecodeError(`JPEG decode failed (${jpegBytes.length} bytes)`, { cause: error });
    }
    if (!raw.data || raw.width <= 0 || raw.height <= 0) {
      throw new FrameDecodeError(`JPEG decoded to an empty ${raw.width}x${raw.height} image`);
    }
    return raw;
  }

  /**
   * Decodes a JPEG frame and packs it into the model's uint8 input layout:
   * [1, inputHeight, inputWidth, 3], RGB, row-major.
   */
  static preprocess(jpegBytes: Uint8Array, inputWidth: number, inputHeight: number): PreprocessResult {
    const raw = ImageProcessor.decode(jpegBytes);
    const imageData = ImageProcessor.resizeToRgb(
      raw.data,
      raw.width,
      raw.height,
      inputWidth,
      inputHeight,
    );
    return {
      imageData,
      originalWidth: raw.width,
      originalHeight: raw.height,
      inputWidth,
      inputHeight,
    };
  }

  /**
   * Nearest-neighbour resize of an RGBA image into packed RGB.
   * Source offsets are precomputed per row and per column.
   */
  static resizeToRgb(
    rgba: Uint8Array,
    srcW: number,
    srcH: number,
    dstW: number,
    dstH: number,
  ): Uint8Array {
    const rgb = new Uint8Array(dstW * dstH * 3);

    const srcRowOffset = new Int32Array(dstH);
    for (let y = 0; y < dstH; y++) {
      srcRowOffset[y] = Math.min(srcH - 1, Math.floor((y / dstH) * srcH)) * srcW * 4;
    }

    const srcXOffset = new Int32Array(dstW);
    for (let x = 0; x < dstW; x++) {
      srcXOffset[x] = Math.min(srcW - 1, Math.floor((x / dstW) * srcW)) * 4;
    }

    for (let y = 0; y < dstH; y++) {
      const rowOff = srcRowOffset[y];
      const dstRowOff = y * dstW * 3;

      for (let x = 0; x < dstW; x++) {
        const srcIdx = rowOff + srcXOffset[x];
        const dstIdx = dstRowOff + x * 3;

        rgb[dstIdx] = rgba[srcIdx];
        rgb[dstIdx + 1] = rgba[srcIdx + 1];
        rgb[dstIdx + 2] = rgba[srcIdx + 2];
      }
    }

    return rgb;
  }
}
