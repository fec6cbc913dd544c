/**
 * Structural Similarity Index
 *
 * Gaussian-weighted SSIM over luminance, "valid" windows only (the window
 * never hangs off the image edge). Images smaller than the window get a
 * single-window estimate from global statistics instead, flagged as
 * degraded.
 */

import { toLuminance, type RasterImage } from '../image/index.js';

export const DEFAULT_SSIM_WINDOW = 11;
export const DEFAULT_SSIM_SIGMA = 1.5;

const L = 255;
export const C1 = (0.01 * L) ** 2;
export const C2 = (0.03 * L) ** 2;

export interface SsimOptions {
  windowSize?: number;
  sigma?: number;
}

export interface SsimResult {
  ssim: number;
  degraded: boolean;
  reason?: string;
}

/**
 * Problem with the window size or sigma, or null when both are usable.
 * The window must be an odd integer so it has a centre pixel.
 */
export function ssimOptionsError(windowSize: number, sigma: number): string | null {
  if (!Number.isInteger(windowSize) || windowSize < 1 || windowSize % 2 === 0) {
    return `ssimWindowSize must be an odd integer >= 1, got ${windowSize}`;
  }
  if (!Number.isFinite(sigma) || sigma <= 0) {
    return `ssimSigma must be a finite number > 0, got ${sigma}`;
  }
  return null;
}

/**
 * Normalised 1-D Gaussian; the 2-D window is its outer product.
 */
export function gaussianKernel(size: number, sigma: number): Float64Array {
  const kernel = new Float64Array(size);
  const offset = Math.floor(size / 2);
  let sum = 0;

  for (let i = 0; i < size; i++) {
    const x = i - offset;
    kernel[i] = Math.exp(-(x * x) / (2 * sigma * sigma));
    sum += kernel[i];
  }
  for (let i = 0; i < size; i++) kernel[i] /= sum;

  return kernel;
}

/**
 * Separable "valid" convolution; output is (w - k + 1) x (h - k + 1).
 */
function filterValid(src: Float64Array, width: number, height: number, kernel: Float64Array): Float64Array {
  const k = kernel.length;
  const outW = width - k + 1;
  const outH = height - k + 1;

  const rows = new Float64Array(height * outW);
  for (let y = 0; y < height; y++) {
    const base = y * width;
    for (let x = 0; x < outW; x++) {
      let acc = 0;
      for (let i = 0; i < k; i++) acc += src[base + x + i] * kernel[i];
      rows[y * outW + x] = acc;
    }
  }

  const out = new Float64Array(outH * outW);
  for (let y = 0; y < outH; y++) {
    for (let x = 0; x < outW; x++) {
      let acc = 0;
      for (let i = 0; i < k; i++) acc += rows[(y + i) * outW + x] * kernel[i];
      out[y * outW + x] = acc;
    }
  }

  return out;
}

function product(a: Float64Array, b: Float64Array): Float64Array {
  const out = new Float64Array(a.length);
  for (let i = 0; i < a.length; i++) out[i] = a[i] * b[i];
  return out;
}

function ssimIndex(mu1: number, mu2: number, var1: number, var2: number, cov: number): number {
  return ((2 * mu1 * mu2 + C1) * (2 * cov + C2)) / ((mu1 * mu1 + mu2 * mu2 + C1) * (var1 + var2 + C2));
}

/**
 * SSIM from whole-image means and variances. Coarser than the windowed
 * map but defined for any non-empty pair.
 */
export function globalSsim(a: Float64Array, b: Float64Array): number {
  const n = a.length;
  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
  }
  const muA = sumA / n;
  const muB = sumB / n;

  let varA = 0;
  let varB = 0;
  let cov = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - muA;
    const db = b[i] - muB;
    varA += da * da;
    varB += db * db;
    cov += da * db;
  }

  return ssimIndex(muA, muB, varA / n, varB / n, cov / n);
}

/**
 * Mean SSIM of two same-sized images.
 */
export function computeSsim(a: RasterImage, b: RasterImage, options: SsimOptions = {}): SsimResult {
  const windowSize = options.windowSize ?? DEFAULT_SSIM_WINDOW;
  const sigma = options.sigma ?? DEFAULT_SSIM_SIGMA;

  const invalid = ssimOptionsError(windowSize, sigma);
  if (invalid) throw new RangeError(invalid);

  if (a.width !== b.width || a.height !== b.height) {
    throw new RangeError(`SSIM needs equal sizes: ${a.width}x${a.height} vs ${b.width}x${b.height}`);
  }

  const lumA = toLuminance(a);
  const lumB = toLuminance(b);
  const { width, height } = a;

  if (width < windowSize || height < windowSize) {
    return fallback(lumA, lumB, `image ${width}x${height} is smaller than the ${windowSize}x${windowSize} SSIM window`);
  }

  const kernel = gaussianKernel(windowSize, sigma);
  const mu1 = filterValid(lumA, width, height, kernel);
  const mu2 = filterValid(lumB, width, height, kernel);
  const sq1 = filterValid(product(lumA, lumA), width, height, kernel);
  const sq2 = filterValid(product(lumB, lumB), width, height, kernel);
  const cross = filterValid(product(lumA, lumB), width, height, kernel);

  let sum = 0;
  for (let i = 0; i < mu1.length; i++) {
    const m1 = mu1[i];
    const m2 = mu2[i];
    sum += ssimIndex(m1, m2, sq1[i] - m1 * m1, sq2[i] - m2 * m2, cross[i] - m1 * m2);
  }
  const ssim = sum / mu1.length;

  if (!Number.isFinite(ssim)) {
    return fallback(lumA, lumB, 'windowed SSIM produced a non-finite value');
  }

  return { ssim, degraded: false };
}

function fallback(lumA: Float64Array, lumB: Float64Array, reason: string): SsimResult {
  const ssim = globalSsim(lumA, lumB);
  if (!Number.isFinite(ssim)) {
    return { ssim: 0, degraded: true, reason: `${reason}; global estimate also failed` };
  }
  return { ssim, degraded: true, reason };
}
