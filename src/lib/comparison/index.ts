/**
 * Comparison Module
 *
 * Provides:
 * - Average-hash, SSIM and strict pixel-diff signals
 * - Verdict against a caller-supplied threshold
 * - Diff image with changed pixels highlighted
 * - Failures reported on the result, never thrown
 */

export {
  ComparisonEngine,
  createComparisonEngine,
  compareImages,
  failedComparison,
  DEFAULT_THRESHOLD,
  DEFAULT_COMPARATOR_OPTIONS,
} from './engine.js';

export {
  averageHash,
  hammingDistance,
  hashSimilarity,
  hashToHex,
  hashSizeError,
  DEFAULT_HASH_SIZE,
  type PerceptualHash,
} from './hash.js';

export {
  computeSsim,
  globalSsim,
  gaussianKernel,
  ssimOptionsError,
  DEFAULT_SSIM_WINDOW,
  DEFAULT_SSIM_SIGMA,
  type SsimOptions,
  type SsimResult,
} from './ssim.js';

export { pixelDifference, DEFAULT_DIFF_COLOR, type PixelDifference } from './pixel-diff.js';

export type {
  ImageInput,
  RGBA,
  ComparatorOptions,
  FailureKind,
  ComparisonFailure,
  Confidence,
  DiffImage,
  ImageDimensions,
  ComparisonResult,
} from './types.js';
