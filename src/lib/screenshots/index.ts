/**
 * Screenshots Module
 *
 * Provides:
 * - Categorised screenshot storage
 * - File-to-file comparison with diff image output
 * - Archiving, collages, cleanup and statistics
 */

export {
  ScreenshotManager,
  createScreenshotManager,
  SCREENSHOT_CATEGORIES,
  type ScreenshotCategory,
  type ScreenshotManagerOptions,
  type FileComparisonResult,
  type CleanupResult,
  type DirectoryStatistics,
  type ScreenshotStatistics,
} from './manager.js';
