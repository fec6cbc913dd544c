import { channelsOf, createImage, type RasterImage, type Rect } from '../image/index.js';
import type { DiffImage, RGBA } from './types.js';

export const DEFAULT_DIFF_COLOR: RGBA = [255, 0, 0, 255];

export interface PixelDifference {
  differentPixels: number;
  totalPixels: number;
  ratio: number;
  diff?: DiffImage;
}

/**
 * Strict per-pixel comparison of two same-shaped images: a pixel differs
 * when any channel differs at all.
 */
export function pixelDifference(
  a: RasterImage,
  b: RasterImage,
  options: { diffColor?: RGBA; generateDiff?: boolean } = {}
): PixelDifference {
  if (a.width !== b.width || a.height !== b.height || a.mode !== b.mode) {
    throw new RangeError(
      `Pixel diff needs equal shapes: ${a.width}x${a.height} ${a.mode} vs ${b.width}x${b.height} ${b.mode}`
    );
  }

  const { width, height } = a;
  const channels = channelsOf(a.mode);
  const totalPixels = width * height;
  const color = options.diffColor ?? DEFAULT_DIFF_COLOR;
  const out = options.generateDiff === false ? null : createImage(width, height, 'RGBA');

  let differentPixels = 0;
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const p = y * width + x;
      const offset = p * channels;

      let changed = false;
      for (let c = 0; c < channels; c++) {
        if (a.data[offset + c] !== b.data[offset + c]) {
          changed = true;
          break;
        }
      }
      if (!changed) continue;

      differentPixels++;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;

      if (out) {
        out.data.set(color, p * 4);
      }
    }
  }

  const bounds: Rect | null =
    differentPixels > 0 ? { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 } : null;

  return {
    differentPixels,
    totalPixels,
    ratio: totalPixels > 0 ? differentPixels / totalPixels : 0,
    diff: out ? Object.freeze({ image: out, changedPixels: differentPixels, bounds }) : undefined,
  };
}
