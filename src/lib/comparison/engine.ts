/**
 * Image Comparison Engine
 *
 * Compares two screenshots with three independent signals:
 * - average-hash similarity (coarse layout)
 * - SSIM (local luminance, contrast and structure)
 * - strict pixel-difference ratio (diagnostics and the diff image)
 *
 * Only the first two gate the verdict. The engine never throws: every
 * failure comes back as a result with `similar: false` and `error` set.
 */

import {
  ImageDecodeError,
  InvalidImageError,
  assertValidImage,
  convertMode,
  decodePng,
  resizeLanczos,
  type RasterImage,
} from '../image/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { errorMessage } from '../utils/error.js';
import { DEFAULT_HASH_SIZE, averageHash, hashSimilarity, hashSizeError } from './hash.js';
import { DEFAULT_DIFF_COLOR, pixelDifference } from './pixel-diff.js';
import { DEFAULT_SSIM_SIGMA, DEFAULT_SSIM_WINDOW, computeSsim, ssimOptionsError } from './ssim.js';
import type {
  ComparatorOptions,
  ComparisonFailure,
  ComparisonResult,
  FailureKind,
  ImageInput,
} from './types.js';

export const DEFAULT_THRESHOLD = 0.95;

type ResolvedOptions = Required<Omit<ComparatorOptions, 'logger'>>;

export const DEFAULT_COMPARATOR_OPTIONS: ResolvedOptions = {
  hashSize: DEFAULT_HASH_SIZE,
  ssimWindowSize: DEFAULT_SSIM_WINDOW,
  ssimSigma: DEFAULT_SSIM_SIGMA,
  diffColor: DEFAULT_DIFF_COLOR,
  generateDiff: true,
};

function resolveOptions(base: ResolvedOptions, overrides: Omit<ComparatorOptions, 'logger'>): ResolvedOptions {
  return {
    hashSize: overrides.hashSize ?? base.hashSize,
    ssimWindowSize: overrides.ssimWindowSize ?? base.ssimWindowSize,
    ssimSigma: overrides.ssimSigma ?? base.ssimSigma,
    diffColor: overrides.diffColor ?? base.diffColor,
    generateDiff: overrides.generateDiff ?? base.generateDiff,
  };
}

class ComparisonAbort extends Error {
  constructor(readonly kind: FailureKind, message: string) {
    super(message);
    this.name = 'ComparisonAbort';
  }
}

function failureKindOf(error: unknown): FailureKind {
  if (error instanceof ComparisonAbort) return error.kind;
  if (error instanceof ImageDecodeError) return 'DecodeFailure';
  if (error instanceof InvalidImageError) {
    switch (error.code) {
      case 'EMPTY_IMAGE':
        return 'EmptyImage';
      case 'UNSUPPORTED_MODE':
        return 'UnsupportedMode';
      case 'BUFFER_SIZE_MISMATCH':
        return 'DecodeFailure';
    }
  }
  return 'InternalError';
}

/**
 * Result for a comparison that could not be carried out
 */
export function failedComparison(threshold: number, failure: ComparisonFailure): ComparisonResult {
  return Object.freeze({
    similar: false,
    hashSimilarity: 0,
    ssim: 0,
    pixelDifferenceRatio: 0,
    differentPixels: 0,
    totalPixels: 0,
    threshold,
    confidence: 'degraded' as const,
    warnings: Object.freeze([]),
    error: Object.freeze(failure),
  });
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

// ============================================================================
// Comparison Engine
// ============================================================================

export class ComparisonEngine {
  private options: ResolvedOptions;
  private logger: Logger;

  constructor(options: ComparatorOptions = {}) {
    const { logger, ...rest } = options;
    this.logger = logger ?? silentLogger;
    this.options = resolveOptions(DEFAULT_COMPARATOR_OPTIONS, rest);
  }

  /**
   * Compare two images. `imageB` is converted to `imageA`'s mode and
   * resized to its dimensions before any signal is computed.
   */
  compare(
    imageA: ImageInput,
    imageB: ImageInput,
    threshold: number = DEFAULT_THRESHOLD,
    overrides: Omit<ComparatorOptions, 'logger'> = {}
  ): ComparisonResult {
    const opts = resolveOptions(this.options, overrides);

    try {
      return this.run(imageA, imageB, threshold, opts);
    } catch (error) {
      const failure: ComparisonFailure = { kind: failureKindOf(error), message: errorMessage(error) };
      this.logger.error({ kind: failure.kind, error: failure.message }, 'Failed to compare screenshots');
      return failedComparison(threshold, failure);
    }
  }

  /**
   * Current default options
   */
  getOptions(): ResolvedOptions {
    return { ...this.options };
  }

  private run(
    inputA: ImageInput,
    inputB: ImageInput,
    threshold: number,
    opts: ResolvedOptions
  ): ComparisonResult {
    if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ComparisonAbort('InvalidThreshold', `Threshold must be a number in [0, 1], got ${String(threshold)}`);
    }

    const invalidOption = hashSizeError(opts.hashSize) ?? ssimOptionsError(opts.ssimWindowSize, opts.ssimSigma);
    if (invalidOption) {
      throw new ComparisonAbort('InvalidOptions', invalidOption);
    }

    const a = this.load(inputA, 'image A');
    const b = this.load(inputB, 'image B');

    // Normalise B towards A, never the reverse
    let normalizedB = b;
    if (normalizedB.mode !== a.mode) {
      normalizedB = convertMode(normalizedB, a.mode);
    }
    if (normalizedB.width !== a.width || normalizedB.height !== a.height) {
      normalizedB = resizeLanczos(normalizedB, a.width, a.height);
    }

    if (
      normalizedB.width !== a.width ||
      normalizedB.height !== a.height ||
      normalizedB.mode !== a.mode ||
      normalizedB.data.length !== a.data.length
    ) {
      throw new ComparisonAbort(
        'ShapeMismatch',
        `Images still differ after normalization: ${a.width}x${a.height} ${a.mode} vs ` +
          `${normalizedB.width}x${normalizedB.height} ${normalizedB.mode}`
      );
    }

    const warnings: string[] = [];

    const hash = hashSimilarity(averageHash(a, opts.hashSize), averageHash(normalizedB, opts.hashSize));

    const ssimResult = computeSsim(a, normalizedB, { windowSize: opts.ssimWindowSize, sigma: opts.ssimSigma });
    if (ssimResult.degraded) {
      warnings.push(`SSIM degraded: ${ssimResult.reason ?? 'unknown reason'}`);
      this.logger.warn({ reason: ssimResult.reason }, 'SSIM calculation degraded, using global estimate');
    }
    const ssim = clampUnit(ssimResult.ssim);

    const pixels = pixelDifference(a, normalizedB, {
      diffColor: opts.diffColor,
      generateDiff: opts.generateDiff,
    });

    const similar = hash >= threshold && ssim >= threshold;

    this.logger.info(
      { hashSimilarity: hash, ssim, pixelDifferenceRatio: pixels.ratio, similar },
      `Screenshot comparison: ${hash.toFixed(3)} similarity`
    );

    return Object.freeze({
      similar,
      hashSimilarity: hash,
      ssim,
      pixelDifferenceRatio: pixels.ratio,
      differentPixels: pixels.differentPixels,
      totalPixels: pixels.totalPixels,
      threshold,
      confidence: ssimResult.degraded ? ('degraded' as const) : ('full' as const),
      warnings: Object.freeze(warnings),
      dimensions: Object.freeze({
        a: { width: a.width, height: a.height, mode: a.mode },
        b: { width: b.width, height: b.height, mode: b.mode },
        compared: { width: a.width, height: a.height },
        normalized: normalizedB !== b,
      }),
      diffImage: pixels.diff,
    });
  }

  private load(input: ImageInput, label: string): RasterImage {
    const image = isRasterImage(input) ? input : decodePng(input);
    assertValidImage(image, label);
    return image;
  }
}

function isRasterImage(input: ImageInput): input is RasterImage {
  return !(input instanceof Uint8Array);
}

// ============================================================================
// Factory
// ============================================================================

export function createComparisonEngine(options?: ComparatorOptions): ComparisonEngine {
  return new ComparisonEngine(options);
}

/**
 * One-off comparison with default options
 */
export function compareImages(
  imageA: ImageInput,
  imageB: ImageInput,
  threshold: number = DEFAULT_THRESHOLD,
  options?: ComparatorOptions
): ComparisonResult {
  return new ComparisonEngine(options).compare(imageA, imageB, threshold);
}
