/**
 * pixelverdict - Screenshot comparison for visual regression checks
 *
 * Decide whether two screenshots show the same thing using average-hash
 * similarity and SSIM, with a strict pixel diff for diagnostics.
 */

// Raster images, PNG codec, Lanczos resize
export * from './lib/image/index.js';

// Hash / SSIM / pixel-diff comparison engine
export * from './lib/comparison/index.js';

// Screenshot storage, diffs, collages, cleanup
export * from './lib/screenshots/index.js';

// Versioned baselines
export * from './lib/baseline/index.js';

// Status checks / thresholds
export * from './lib/checks/index.js';

// JSON + HTML reports
export * from './lib/report/index.js';

// .pixelverdict.yml
export * from './lib/config/index.js';

// Structured logging
export * from './lib/logging/index.js';

// Version
export const VERSION = '0.1.0';
