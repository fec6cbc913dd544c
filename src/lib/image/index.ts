/**
 * Image Module
 *
 * Provides:
 * - Raster image model (L / RGB / RGBA)
 * - Mode conversion and luminance
 * - Lanczos resampling
 * - PNG decode/encode
 */

export {
  InvalidImageError,
  isColorMode,
  channelsOf,
  createImage,
  assertValidImage,
  isValidImage,
  getPixel,
  fillRect,
  cropImage,
  pasteImage,
  luma,
  convertMode,
  toLuminance,
  type ColorMode,
  type RasterImage,
  type Pixel,
  type Rect,
} from './raster.js';

export { resizeLanczos } from './resize.js';

export { ImageDecodeError, isPng, decodePng, encodePng } from './codec.js';
