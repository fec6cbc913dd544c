import type { ColorMode, RasterImage, Rect } from '../image/index.js';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Inputs
// ============================================================================

/** A decoded image, or encoded PNG bytes to decode first */
export type ImageInput = RasterImage | Uint8Array;

export type RGBA = readonly [number, number, number, number];

export interface ComparatorOptions {
  /** Side length of the average-hash grid (bits = hashSize²) */
  hashSize?: number;
  /** Gaussian window side length for SSIM */
  ssimWindowSize?: number;
  ssimSigma?: number;
  /** Color painted on changed pixels in the diff image */
  diffColor?: RGBA;
  /** Build the diff image (the ratio is always computed) */
  generateDiff?: boolean;
  logger?: Logger;
}

// ============================================================================
// Outputs
// ============================================================================

export type FailureKind =
  | 'DecodeFailure'
  | 'ShapeMismatch'
  | 'EmptyImage'
  | 'UnsupportedMode'
  | 'InvalidThreshold'
  | 'InvalidOptions'
  | 'InternalError';

export interface ComparisonFailure {
  kind: FailureKind;
  message: string;
}

export type Confidence = 'full' | 'degraded';

export interface DiffImage {
  /** RGBA; changed pixels carry the diff color, the rest are transparent */
  image: RasterImage;
  changedPixels: number;
  /** Smallest rectangle holding every changed pixel */
  bounds: Rect | null;
}

export interface ImageDimensions {
  width: number;
  height: number;
  mode: ColorMode;
}

export interface ComparisonResult {
  similar: boolean;
  hashSimilarity: number;
  ssim: number;
  pixelDifferenceRatio: number;
  differentPixels: number;
  totalPixels: number;
  threshold: number;
  confidence: Confidence;
  warnings: readonly string[];
  dimensions?: {
    a: ImageDimensions;
    b: ImageDimensions;
    compared: { width: number; height: number };
    /** B was converted or resized to match A */
    normalized: boolean;
  };
  diffImage?: DiffImage;
  error?: ComparisonFailure;
}
