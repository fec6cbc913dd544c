/**
 * Lanczos Resampling
 *
 * Separable Lanczos-3 resize. When shrinking, the kernel is stretched by
 * the scale factor so every source pixel contributes.
 */

import { channelsOf, createImage, type RasterImage } from './raster.js';

const LOBES = 3;

function lanczos(x: number): number {
  if (x === 0) return 1;
  if (x <= -LOBES || x >= LOBES) return 0;
  const px = Math.PI * x;
  return (LOBES * Math.sin(px) * Math.sin(px / LOBES)) / (px * px);
}

interface Contribution {
  start: number;
  weights: Float64Array;
}

function contributions(srcSize: number, dstSize: number): Contribution[] {
  const scale = srcSize / dstSize;
  const filterScale = Math.max(scale, 1);
  const support = LOBES * filterScale;
  const result: Contribution[] = [];

  for (let i = 0; i < dstSize; i++) {
    const center = (i + 0.5) * scale;
    const start = Math.max(0, Math.floor(center - support));
    const end = Math.min(srcSize, Math.ceil(center + support));
    const weights = new Float64Array(Math.max(1, end - start));

    let sum = 0;
    for (let j = start; j < end; j++) {
      const w = lanczos((j + 0.5 - center) / filterScale);
      weights[j - start] = w;
      sum += w;
    }

    if (sum !== 0) {
      for (let k = 0; k < weights.length; k++) weights[k] /= sum;
    } else {
      // Degenerate window; fall back to the nearest source pixel
      weights.fill(0);
      weights[Math.min(weights.length - 1, Math.max(0, Math.floor(center) - start))] = 1;
    }

    result.push({ start, weights });
  }

  return result;
}

/**
 * Resize to `width` x `height`. Returns the input itself when the size
 * already matches.
 */
export function resizeLanczos(image: RasterImage, width: number, height: number): RasterImage {
  if (image.width === width && image.height === height) {
    return image;
  }

  const channels = channelsOf(image.mode);
  const src = image.data;

  // Horizontal pass into floats: image.height rows of `width` pixels
  const horizontal = contributions(image.width, width);
  const mid = new Float64Array(image.height * width * channels);

  for (let y = 0; y < image.height; y++) {
    const rowOffset = y * image.width;
    for (let x = 0; x < width; x++) {
      const { start, weights } = horizontal[x];
      const out = (y * width + x) * channels;
      for (let k = 0; k < weights.length; k++) {
        const w = weights[k];
        if (w === 0) continue;
        const s = (rowOffset + start + k) * channels;
        for (let c = 0; c < channels; c++) {
          mid[out + c] += src[s + c] * w;
        }
      }
    }
  }

  // Vertical pass, rounded and clamped back to bytes
  const vertical = contributions(image.height, height);
  const result = createImage(width, height, image.mode);
  const acc = new Float64Array(channels);

  for (let y = 0; y < height; y++) {
    const { start, weights } = vertical[y];
    for (let x = 0; x < width; x++) {
      acc.fill(0);
      for (let k = 0; k < weights.length; k++) {
        const w = weights[k];
        if (w === 0) continue;
        const s = ((start + k) * width + x) * channels;
        for (let c = 0; c < channels; c++) {
          acc[c] += mid[s + c] * w;
        }
      }
      const out = (y * width + x) * channels;
      for (let c = 0; c < channels; c++) {
        result.data[out + c] = Math.min(255, Math.max(0, Math.round(acc[c])));
      }
    }
  }

  return result;
}
