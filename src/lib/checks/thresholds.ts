/**
 * Status Checks / Thresholds
 *
 * Decide whether CI checks pass or fail based on screenshot comparison
 * results. The pixel-difference ratio warns by default and only fails a
 * check when explicitly asked to.
 */

import type { ComparisonResult } from '../comparison/index.js';

// ============================================================================
// Types
// ============================================================================

export interface Thresholds {
  /** Minimum average-hash similarity (0-1) */
  minHashSimilarity?: number;
  /** Minimum SSIM (0-1) */
  minSsim?: number;
  /** Maximum fraction of differing pixels (0-1) */
  maxPixelDifference?: number;
  /** Treat maxPixelDifference as a failure instead of a warning */
  failOnPixelDifference?: boolean;
  /** Accept results whose SSIM fell back to the global estimate */
  allowDegraded?: boolean;
}

export type CheckStatus = 'success' | 'warning' | 'failure';

export interface CheckResult {
  status: CheckStatus;
  passed: boolean;
  scores: {
    hashSimilarity: number;
    ssim: number;
    pixelDifferenceRatio: number;
  };
  failureReasons: string[];
  warningReasons: string[];
}

export interface MultiCheckResult {
  status: CheckStatus;
  passed: boolean;
  averageSsim: number;
  comparisons: Array<{
    name: string;
    result: CheckResult;
  }>;
  summary: {
    total: number;
    passed: number;
    failed: number;
    warnings: number;
  };
  failureReasons: string[];
}

// ============================================================================
// Default Thresholds
// ============================================================================

export const DEFAULT_THRESHOLDS: Required<Thresholds> = {
  minHashSimilarity: 0.95,
  minSsim: 0.95,
  maxPixelDifference: 0.01,
  failOnPixelDifference: false,
  allowDegraded: true,
};

export const STRICT_THRESHOLDS: Required<Thresholds> = {
  minHashSimilarity: 0.99,
  minSsim: 0.99,
  maxPixelDifference: 0.001,
  failOnPixelDifference: true,
  allowDegraded: false,
};

export const LENIENT_THRESHOLDS: Required<Thresholds> = {
  minHashSimilarity: 0.85,
  minSsim: 0.85,
  maxPixelDifference: 0.05,
  failOnPixelDifference: false,
  allowDegraded: true,
};

/** Scores this close above a minimum still raise a warning */
const WARNING_MARGIN = 0.01;

const pct = (value: number): string => `${(value * 100).toFixed(2)}%`;
const fixed = (value: number): string => value.toFixed(3);

// ============================================================================
// Threshold Checker
// ============================================================================

export class ThresholdChecker {
  private thresholds: Required<Thresholds>;

  constructor(thresholds: Thresholds = {}) {
    this.thresholds = {
      minHashSimilarity: thresholds.minHashSimilarity ?? DEFAULT_THRESHOLDS.minHashSimilarity,
      minSsim: thresholds.minSsim ?? DEFAULT_THRESHOLDS.minSsim,
      maxPixelDifference: thresholds.maxPixelDifference ?? DEFAULT_THRESHOLDS.maxPixelDifference,
      failOnPixelDifference: thresholds.failOnPixelDifference ?? DEFAULT_THRESHOLDS.failOnPixelDifference,
      allowDegraded: thresholds.allowDegraded ?? DEFAULT_THRESHOLDS.allowDegraded,
    };
  }

  /**
   * Check a single comparison result against thresholds
   */
  check(result: ComparisonResult): CheckResult {
    const t = this.thresholds;
    const failureReasons: string[] = [];
    const warningReasons: string[] = [];
    const scores = {
      hashSimilarity: result.hashSimilarity,
      ssim: result.ssim,
      pixelDifferenceRatio: result.pixelDifferenceRatio,
    };

    if (result.error) {
      return {
        status: 'failure',
        passed: false,
        scores,
        failureReasons: [`Comparison failed (${result.error.kind}): ${result.error.message}`],
        warningReasons,
      };
    }

    // Hash similarity
    if (result.hashSimilarity < t.minHashSimilarity) {
      failureReasons.push(
        `Hash similarity ${fixed(result.hashSimilarity)} below threshold ${fixed(t.minHashSimilarity)}`
      );
    } else if (result.hashSimilarity < t.minHashSimilarity + WARNING_MARGIN && result.hashSimilarity < 1) {
      warningReasons.push(
        `Hash similarity ${fixed(result.hashSimilarity)} close to threshold ${fixed(t.minHashSimilarity)}`
      );
    }

    // SSIM
    if (result.ssim < t.minSsim) {
      failureReasons.push(`SSIM ${fixed(result.ssim)} below threshold ${fixed(t.minSsim)}`);
    } else if (result.ssim < t.minSsim + WARNING_MARGIN && result.ssim < 1) {
      warningReasons.push(`SSIM ${fixed(result.ssim)} close to threshold ${fixed(t.minSsim)}`);
    }

    // Pixel difference
    if (result.pixelDifferenceRatio > t.maxPixelDifference) {
      const reason = `${pct(result.pixelDifferenceRatio)} of pixels differ (max: ${pct(t.maxPixelDifference)})`;
      if (t.failOnPixelDifference) {
        failureReasons.push(reason);
      } else {
        warningReasons.push(reason);
      }
    }

    // Degraded SSIM
    if (result.confidence === 'degraded') {
      if (t.allowDegraded) {
        warningReasons.push('SSIM computed in degraded mode');
      } else {
        failureReasons.push('SSIM computed in degraded mode (not allowed)');
      }
    }

    // Determine status
    let status: CheckStatus;
    if (failureReasons.length > 0) {
      status = 'failure';
    } else if (warningReasons.length > 0) {
      status = 'warning';
    } else {
      status = 'success';
    }

    return {
      status,
      passed: failureReasons.length === 0,
      scores,
      failureReasons,
      warningReasons,
    };
  }

  /**
   * Check several named comparisons
   */
  checkMultiple(
    results: Array<{ name: string; result: ComparisonResult }>
  ): MultiCheckResult {
    const comparisons = results.map(({ name, result }) => ({
      name,
      result: this.check(result),
    }));

    const passed = comparisons.filter(c => c.result.passed).length;
    const warnings = comparisons.filter(c => c.result.status === 'warning').length;
    const averageSsim = comparisons.length > 0
      ? comparisons.reduce((sum, c) => sum + c.result.scores.ssim, 0) / comparisons.length
      : 0;

    const allFailureReasons: string[] = [];
    for (const comparison of comparisons) {
      if (!comparison.result.passed) {
        allFailureReasons.push(`${comparison.name}: ${comparison.result.failureReasons.join(', ')}`);
      }
    }

    const status: CheckStatus =
      allFailureReasons.length > 0 ? 'failure' :
      warnings > 0 ? 'warning' :
      'success';

    return {
      status,
      passed: allFailureReasons.length === 0,
      averageSsim,
      comparisons,
      summary: {
        total: results.length,
        passed,
        failed: results.length - passed,
        warnings,
      },
      failureReasons: allFailureReasons,
    };
  }

  /**
   * Get current thresholds
   */
  getThresholds(): Required<Thresholds> {
    return { ...this.thresholds };
  }

  /**
   * Format result for GitHub Actions
   */
  static formatForGitHub(result: CheckResult): string {
    if (result.status === 'failure') {
      return `::error::Screenshot check failed: ${result.failureReasons.join('; ')}`;
    } else if (result.status === 'warning') {
      return `::warning::Screenshot check warnings: ${result.warningReasons.join('; ')}`;
    }
    return `::notice::Screenshot check passed with SSIM ${fixed(result.scores.ssim)}`;
  }

  /**
   * Format as exit code
   */
  static toExitCode(result: CheckResult | MultiCheckResult): number {
    return result.passed ? 0 : 1;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createThresholdChecker(thresholds?: Thresholds): ThresholdChecker {
  return new ThresholdChecker(thresholds);
}

/**
 * Quick check function for simple use cases
 */
export function quickCheck(
  result: ComparisonResult,
  thresholds?: Thresholds
): CheckResult {
  return new ThresholdChecker(thresholds).check(result);
}
