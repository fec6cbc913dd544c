/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - Default configuration merging
 * - Conversion to comparator and checker options
 */

export {
  ConfigParser,
  ConfigError,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  PixelVerdictConfigSchema,
  type ComparisonConfig,
  type ThresholdsConfig,
  type PixelVerdictConfig,
} from './parser.js';
