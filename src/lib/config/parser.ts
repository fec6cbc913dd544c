/**
 * Configuration Parser
 *
 * Parse .pixelverdict.yml config files to configure comparison defaults,
 * pass/fail thresholds, output directories and logging.
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ComparatorOptions, RGBA } from '../comparison/index.js';
import type { Thresholds } from '../checks/index.js';
import { LOG_LEVELS } from '../logging/index.js';

// ============================================================================
// Schemas
// ============================================================================

const unit = z.number().min(0).max(1);
const channel = z.number().int().min(0).max(255);

const ComparisonSchema = z.object({
  threshold: unit.optional(),
  hash_size: z.number().int().min(2).max(64).optional(),
  ssim_window: z.number().int().min(3).refine(n => n % 2 === 1, 'ssim_window must be odd').optional(),
  ssim_sigma: z.number().positive().optional(),
  diff_color: z.tuple([channel, channel, channel, channel]).optional(),
  generate_diff: z.boolean().optional(),
});

const ThresholdsSchema = z.object({
  min_hash_similarity: unit.optional(),
  min_ssim: unit.optional(),
  max_pixel_difference: unit.optional(),
  fail_on_pixel_difference: z.boolean().optional(),
  allow_degraded: z.boolean().optional(),
});

const ScreenshotsSchema = z.object({
  base_dir: z.string().optional(),
});

const ReportsSchema = z.object({
  output_dir: z.string().optional(),
  project_name: z.string().optional(),
});

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
});

export const PixelVerdictConfigSchema = z.object({
  comparison: ComparisonSchema.optional(),
  thresholds: ThresholdsSchema.optional(),
  screenshots: ScreenshotsSchema.optional(),
  reports: ReportsSchema.optional(),
  logging: LoggingSchema.optional(),
});

// ============================================================================
// Types
// ============================================================================

export type ComparisonConfig = z.infer<typeof ComparisonSchema>;
export type ThresholdsConfig = z.infer<typeof ThresholdsSchema>;
export type PixelVerdictConfig = z.infer<typeof PixelVerdictConfigSchema>;

export class ConfigError extends Error {
  readonly code = 'CONFIG_VALIDATION_FAILED';
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid config in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG = {
  comparison: {
    threshold: 0.95,
    hash_size: 8,
    ssim_window: 11,
    ssim_sigma: 1.5,
    diff_color: [255, 0, 0, 255],
    generate_diff: true,
  },
  thresholds: {
    fail_on_pixel_difference: false,
    allow_degraded: true,
  },
  screenshots: {
    base_dir: 'reports/screenshots',
  },
  reports: {
    output_dir: './.pixelverdict-reports',
    project_name: 'Screenshot Comparison',
  },
  logging: {
    level: 'info',
  },
} satisfies PixelVerdictConfig;

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<PixelVerdictConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): PixelVerdictConfig {
    let parsed: unknown;

    try {
      parsed = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigError(filename, [error instanceof Error ? error.message : String(error)]);
    }

    // An empty YAML document means "all defaults"
    const validated = this.validate(parsed ?? {}, filename);

    return this.mergeWithDefaults(validated);
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: PixelVerdictConfig): PixelVerdictConfig {
    return {
      comparison: { ...DEFAULT_CONFIG.comparison, ...config.comparison },
      thresholds: { ...DEFAULT_CONFIG.thresholds, ...config.thresholds },
      screenshots: { ...DEFAULT_CONFIG.screenshots, ...config.screenshots },
      reports: { ...DEFAULT_CONFIG.reports, ...config.reports },
      logging: { ...DEFAULT_CONFIG.logging, ...config.logging },
    };
  }

  /**
   * Validate config object
   */
  validate(config: unknown, source: string = 'config'): PixelVerdictConfig {
    const result = PixelVerdictConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigError(
        source,
        result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return result.data;
  }

  /**
   * Threshold the comparator should use when none is given
   */
  getThreshold(config: PixelVerdictConfig): number {
    return config.comparison?.threshold ?? DEFAULT_CONFIG.comparison.threshold;
  }

  /**
   * Convert config to comparison engine options
   */
  toComparatorOptions(config: PixelVerdictConfig): Omit<ComparatorOptions, 'logger'> {
    const c: ComparisonConfig = config.comparison ?? {};
    const color: RGBA | undefined = c.diff_color;
    return {
      hashSize: c.hash_size,
      ssimWindowSize: c.ssim_window,
      ssimSigma: c.ssim_sigma,
      diffColor: color,
      generateDiff: c.generate_diff,
    };
  }

  /**
   * Convert config thresholds to checker format. Similarity minimums
   * fall back to the comparison threshold.
   */
  toCheckerThresholds(config: PixelVerdictConfig): Thresholds {
    const t: ThresholdsConfig = config.thresholds ?? {};
    const threshold = this.getThreshold(config);
    return {
      minHashSimilarity: t.min_hash_similarity ?? threshold,
      minSsim: t.min_ssim ?? threshold,
      maxPixelDifference: t.max_pixel_difference,
      failOnPixelDifference: t.fail_on_pixel_difference,
      allowDegraded: t.allow_degraded,
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# Screenshot comparison configuration

comparison:
  threshold: 0.95        # hash similarity and SSIM must both reach this
  hash_size: 8           # average-hash grid (8 -> 64 bits)
  ssim_window: 11
  ssim_sigma: 1.5
  diff_color: [255, 0, 0, 255]
  generate_diff: true

thresholds:
  max_pixel_difference: 0.01
  fail_on_pixel_difference: false
  allow_degraded: true

screenshots:
  base_dir: reports/screenshots

reports:
  output_dir: ./.pixelverdict-reports
  project_name: Screenshot Comparison

logging:
  level: info
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<PixelVerdictConfig> {
  return new ConfigParser().loadFile(path);
}
