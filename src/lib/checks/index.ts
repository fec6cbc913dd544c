/**
 * Checks Module
 *
 * Provides:
 * - Pass/fail/warning status for comparison results
 * - Default, strict and lenient presets
 * - GitHub Actions annotations and exit codes
 */

export {
  ThresholdChecker,
  createThresholdChecker,
  quickCheck,
  DEFAULT_THRESHOLDS,
  STRICT_THRESHOLDS,
  LENIENT_THRESHOLDS,
  type Thresholds,
  type CheckStatus,
  type CheckResult,
  type MultiCheckResult,
} from './thresholds.js';
