/**
 * Raster Images
 *
 * In-memory pixel grids shared by the codec, the comparator and the
 * screenshot store. Every operation returns a new image; inputs are
 * never written to.
 */

// ============================================================================
// Types
// ============================================================================

export type ColorMode = 'L' | 'RGB' | 'RGBA';

export interface RasterImage {
  width: number;
  height: number;
  mode: ColorMode;
  /** Row-major, interleaved channels, 0-255 */
  data: Uint8Array;
}

export type Pixel = readonly number[];

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export class InvalidImageError extends Error {
  readonly code: 'EMPTY_IMAGE' | 'BUFFER_SIZE_MISMATCH' | 'UNSUPPORTED_MODE';

  constructor(code: InvalidImageError['code'], message: string) {
    super(message);
    this.name = 'InvalidImageError';
    this.code = code;
  }
}

// ============================================================================
// Construction & validation
// ============================================================================

const CHANNELS: Record<ColorMode, number> = {
  L: 1,
  RGB: 3,
  RGBA: 4,
};

export function isColorMode(value: unknown): value is ColorMode {
  return value === 'L' || value === 'RGB' || value === 'RGBA';
}

export function channelsOf(mode: ColorMode): number {
  return CHANNELS[mode];
}

/**
 * Create a blank image, optionally filled with a single pixel value.
 */
export function createImage(
  width: number,
  height: number,
  mode: ColorMode,
  fill?: Pixel
): RasterImage {
  const channels = channelsOf(mode);
  const data = new Uint8Array(width * height * channels);

  if (fill) {
    for (let i = 0; i < data.length; i += channels) {
      for (let c = 0; c < channels; c++) {
        data[i + c] = fill[c] ?? 0;
      }
    }
  }

  return { width, height, mode, data };
}

export function assertValidImage(image: RasterImage, label = 'image'): void {
  if (!isColorMode(image.mode)) {
    throw new InvalidImageError('UNSUPPORTED_MODE', `${label} has unsupported color mode "${String(image.mode)}"`);
  }

  if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width <= 0 || image.height <= 0) {
    throw new InvalidImageError(
      'EMPTY_IMAGE',
      `${label} has no pixels (${image.width}x${image.height})`
    );
  }

  const expected = image.width * image.height * channelsOf(image.mode);
  if (image.data.length !== expected) {
    throw new InvalidImageError(
      'BUFFER_SIZE_MISMATCH',
      `${label} buffer holds ${image.data.length} bytes, expected ${expected} for ${image.width}x${image.height} ${image.mode}`
    );
  }
}

export function isValidImage(image: RasterImage): boolean {
  try {
    assertValidImage(image);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Pixel access
// ============================================================================

export function getPixel(image: RasterImage, x: number, y: number): number[] {
  const channels = channelsOf(image.mode);
  const offset = (y * image.width + x) * channels;
  return Array.from(image.data.subarray(offset, offset + channels));
}

/**
 * Copy of `image` with `rect` painted in `pixel`. The rect is clipped to
 * the image bounds.
 */
export function fillRect(image: RasterImage, rect: Rect, pixel: Pixel): RasterImage {
  const channels = channelsOf(image.mode);
  const data = new Uint8Array(image.data);
  const x0 = Math.max(0, rect.x);
  const y0 = Math.max(0, rect.y);
  const x1 = Math.min(image.width, rect.x + rect.width);
  const y1 = Math.min(image.height, rect.y + rect.height);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const offset = (y * image.width + x) * channels;
      for (let c = 0; c < channels; c++) {
        data[offset + c] = pixel[c] ?? 0;
      }
    }
  }

  return { ...image, data };
}

export function cropImage(image: RasterImage, rect: Rect): RasterImage {
  const x0 = Math.max(0, rect.x);
  const y0 = Math.max(0, rect.y);
  const width = Math.max(0, Math.min(image.width, rect.x + rect.width) - x0);
  const height = Math.max(0, Math.min(image.height, rect.y + rect.height) - y0);
  const channels = channelsOf(image.mode);
  const out = createImage(width, height, image.mode);

  for (let y = 0; y < height; y++) {
    const start = ((y0 + y) * image.width + x0) * channels;
    out.data.set(image.data.subarray(start, start + width * channels), y * width * channels);
  }

  return out;
}

/**
 * Copy of `target` with `source` drawn at (x, y). Source is converted to
 * the target's mode first; anything outside the target is dropped.
 */
export function pasteImage(target: RasterImage, source: RasterImage, x: number, y: number): RasterImage {
  const src = convertMode(source, target.mode);
  const channels = channelsOf(target.mode);
  const data = new Uint8Array(target.data);

  for (let sy = 0; sy < src.height; sy++) {
    const ty = y + sy;
    if (ty < 0 || ty >= target.height) continue;
    for (let sx = 0; sx < src.width; sx++) {
      const tx = x + sx;
      if (tx < 0 || tx >= target.width) continue;
      const s = (sy * src.width + sx) * channels;
      const t = (ty * target.width + tx) * channels;
      for (let c = 0; c < channels; c++) {
        data[t + c] = src.data[s + c];
      }
    }
  }

  return { ...target, data };
}

// ============================================================================
// Mode conversion
// ============================================================================

/**
 * ITU-R 601-2 luma in 16-bit fixed point, rounded.
 */
export function luma(r: number, g: number, b: number): number {
  return (r * 19595 + g * 38470 + b * 7471 + 0x8000) >> 16;
}

/**
 * Convert to another color mode. Alpha is dropped, not composited;
 * gaining an alpha channel makes every pixel opaque.
 */
export function convertMode(image: RasterImage, mode: ColorMode): RasterImage {
  if (image.mode === mode) {
    return image;
  }

  const pixels = image.width * image.height;
  const from = channelsOf(image.mode);
  const to = channelsOf(mode);
  const src = image.data;
  const data = new Uint8Array(pixels * to);

  for (let i = 0; i < pixels; i++) {
    const s = i * from;
    const d = i * to;

    if (from === 1) {
      const v = src[s];
      data[d] = v;
      if (to >= 3) {
        data[d + 1] = v;
        data[d + 2] = v;
      }
    } else if (to === 1) {
      data[d] = luma(src[s], src[s + 1], src[s + 2]);
    } else {
      data[d] = src[s];
      data[d + 1] = src[s + 1];
      data[d + 2] = src[s + 2];
    }

    if (to === 4) {
      data[d + 3] = from === 4 ? src[s + 3] : 255;
    }
  }

  return { width: image.width, height: image.height, mode, data };
}

/**
 * Single-channel luminance as floats, one entry per pixel.
 */
export function toLuminance(image: RasterImage): Float64Array {
  const gray = convertMode(image, 'L');
  return Float64Array.from(gray.data);
}
