/**
 * PNG Codec
 *
 * Decoding and encoding between PNG bytes and raster images, via pngjs.
 * Decoded images are always RGBA.
 */

import { PNG } from 'pngjs';
import { errorMessage } from '../utils/error.js';
import { assertValidImage, convertMode, type RasterImage } from './raster.js';

export class ImageDecodeError extends Error {
  readonly code = 'IMAGE_DECODE_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageDecodeError';
  }
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function isPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function decodePng(bytes: Uint8Array): RasterImage {
  if (bytes.length === 0) {
    throw new ImageDecodeError('Image data is empty');
  }
  if (!isPng(bytes)) {
    throw new ImageDecodeError('Image data is not a PNG (bad signature)');
  }

  let png: PNG;
  try {
    png = PNG.sync.read(toBuffer(bytes));
  } catch (error) {
    throw new ImageDecodeError(`Failed to decode PNG: ${errorMessage(error)}`, { cause: error });
  }

  return {
    width: png.width,
    height: png.height,
    mode: 'RGBA',
    data: new Uint8Array(png.data),
  };
}

export function encodePng(image: RasterImage): Buffer {
  assertValidImage(image);
  const rgba = convertMode(image, 'RGBA');

  const png = new PNG({ width: rgba.width, height: rgba.height });
  png.data = Buffer.from(rgba.data);

  return PNG.sync.write(png);
}
