/**
 * Average Hash
 *
 * Downsample to a hashSize x hashSize luminance grid and set one bit per
 * cell that is brighter than the grid mean.
 */

import { convertMode, resizeLanczos, type RasterImage } from '../image/index.js';

export const DEFAULT_HASH_SIZE = 8;

export interface PerceptualHash {
  size: number;
  /** One entry (0 or 1) per cell, row-major */
  bits: Uint8Array;
}

export function hashSizeError(hashSize: number): string | null {
  return Number.isInteger(hashSize) && hashSize >= 2 ? null : `hashSize must be an integer >= 2, got ${hashSize}`;
}

export function averageHash(image: RasterImage, hashSize: number = DEFAULT_HASH_SIZE): PerceptualHash {
  const invalid = hashSizeError(hashSize);
  if (invalid) throw new RangeError(invalid);

  const small = resizeLanczos(convertMode(image, 'L'), hashSize, hashSize);
  const cells = small.data;

  let sum = 0;
  for (let i = 0; i < cells.length; i++) sum += cells[i];
  const mean = sum / cells.length;

  const bits = new Uint8Array(cells.length);
  for (let i = 0; i < cells.length; i++) {
    bits[i] = cells[i] > mean ? 1 : 0;
  }

  return { size: hashSize, bits };
}

export function hammingDistance(a: PerceptualHash, b: PerceptualHash): number {
  if (a.bits.length !== b.bits.length) {
    throw new RangeError(`Hash lengths differ: ${a.bits.length} vs ${b.bits.length}`);
  }

  let distance = 0;
  for (let i = 0; i < a.bits.length; i++) {
    if (a.bits[i] !== b.bits[i]) distance++;
  }
  return distance;
}

/**
 * 1 - hamming / bitCount
 */
export function hashSimilarity(a: PerceptualHash, b: PerceptualHash): number {
  return 1 - hammingDistance(a, b) / a.bits.length;
}

export function hashToHex(hash: PerceptualHash): string {
  let hex = '';
  for (let i = 0; i < hash.bits.length; i += 4) {
    let nibble = 0;
    for (let j = 0; j < 4; j++) {
      nibble = (nibble << 1) | (hash.bits[i + j] ?? 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
}
