/**
 * Report Module
 *
 * Provides:
 * - JSON and HTML reports per comparison
 * - Combined reports with pass/fail summary
 * - Optional base64-embedded images
 */

export {
  ReportGenerator,
  createReportGenerator,
  escapeHtml,
  type ReportOptions,
  type ReportImages,
  type ReportEntry,
  type ReportResult,
  type ComparisonReport,
  type MultiComparisonReport,
} from './generator.js';
