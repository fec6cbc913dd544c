/**
 * Baseline Module
 *
 * Provides:
 * - Versioned reference screenshots with a JSON manifest
 * - Content-hash change detection
 * - Checking new captures against a baseline
 */

export {
  BaselineManager,
  createBaselineManager,
  type BaselineEntry,
  type BaselineManifest,
  type BaselineCandidate,
  type BaselineDiff,
  type BaselineCheckResult,
  type BaselineManagerOptions,
} from './manager.js';
