/**
 * Config Parser Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  ConfigError,
  ConfigParser,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  PixelVerdictConfigSchema,
} from '../src/lib/config/index.js';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

describe('ConfigParser', () => {
  const parser = createConfigParser();
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pixelverdict-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('parse', () => {
    it('should parse YAML config', () => {
      const config = parser.parse(
        `
comparison:
  threshold: 0.9
  hash_size: 16
thresholds:
  fail_on_pixel_difference: true
`,
        '.pixelverdict.yml'
      );

      expect(config.comparison?.threshold).toBe(0.9);
      expect(config.comparison?.hash_size).toBe(16);
      expect(config.comparison?.ssim_window).toBe(11);
      expect(config.thresholds?.fail_on_pixel_difference).toBe(true);
      expect(config.thresholds?.allow_degraded).toBe(true);
    });

    it('should parse JSON config', () => {
      const config = parser.parse(
        JSON.stringify({ reports: { project_name: 'Checkout' }, logging: { level: 'debug' } }),
        'config.json'
      );

      expect(config.reports).toEqual({ output_dir: './.pixelverdict-reports', project_name: 'Checkout' });
      expect(config.logging?.level).toBe('debug');
    });

    it('should treat an empty document as all defaults', () => {
      expect(parser.parse('', 'empty.yml')).toEqual(parser.mergeWithDefaults({}));
    });

    it('should reject an even SSIM window', () => {
      try {
        parser.parse('comparison:\n  ssim_window: 10\n', 'bad.yml');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        expect(error instanceof ConfigError && error.issues).toEqual([
          'comparison.ssim_window: ssim_window must be odd',
        ]);
      }
    });

    it('should reject thresholds above 1', () => {
      expect(() => parser.parse('comparison:\n  threshold: 1.5\n', 'bad.yml')).toThrow(
        /^Invalid config in bad\.yml: comparison\.threshold: /
      );
    });

    it('should reject unknown log levels', () => {
      expect(() => parser.parse('logging:\n  level: loud\n', 'bad.yml')).toThrow(ConfigError);
    });

    it('should reject malformed YAML', () => {
      expect(() => parser.parse('comparison: [unclosed', 'broken.yml')).toThrow(ConfigError);
    });

    it('should reject malformed JSON', () => {
      expect(() => parser.parse('{', 'broken.json')).toThrow(/^Invalid config in broken\.json: /);
    });
  });

  describe('conversion', () => {
    it('should map comparison settings to comparator options', () => {
      const config = parser.mergeWithDefaults({});

      expect(parser.toComparatorOptions(config)).toEqual({
        hashSize: 8,
        ssimWindowSize: 11,
        ssimSigma: 1.5,
        diffColor: [255, 0, 0, 255],
        generateDiff: true,
      });
    });

    it('should fall back to the comparison threshold for similarity minimums', () => {
      const config = parser.mergeWithDefaults({ comparison: { threshold: 0.9 } });

      expect(parser.toCheckerThresholds(config)).toEqual({
        minHashSimilarity: 0.9,
        minSsim: 0.9,
        maxPixelDifference: undefined,
        failOnPixelDifference: false,
        allowDegraded: true,
      });
    });

    it('should prefer explicit minimums', () => {
      const config = parser.mergeWithDefaults({ thresholds: { min_ssim: 0.8 } });

      expect(parser.toCheckerThresholds(config).minSsim).toBe(0.8);
      expect(parser.toCheckerThresholds(config).minHashSimilarity).toBe(0.95);
    });

    it('should read the threshold', () => {
      expect(parser.getThreshold({})).toBe(0.95);
      expect(parser.getThreshold({ comparison: { threshold: 0.7 } })).toBe(0.7);
    });
  });

  describe('loadFile', () => {
    it('should load config from disk', async () => {
      const path = join(dir, '.pixelverdict.yml');
      await writeFile(path, 'screenshots:\n  base_dir: shots\n');

      const config = await loadConfig(path);

      expect(config.screenshots?.base_dir).toBe('shots');
    });

    it('should name the file in validation errors', async () => {
      const path = join(dir, 'invalid.json');
      await writeFile(path, JSON.stringify({ comparison: { hash_size: 1 } }));

      await expect(parser.loadFile(path)).rejects.toThrow(`Invalid config in ${path}: comparison.hash_size: `);
    });
  });

  describe('defaults', () => {
    it('should validate the default config', () => {
      expect(PixelVerdictConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
    });

    it('should generate an example that parses back', () => {
      const config = parser.parse(ConfigParser.generateExample(), 'example.yml');

      expect(config.thresholds?.max_pixel_difference).toBe(0.01);
      expect(config.comparison?.diff_color).toEqual([255, 0, 0, 255]);
    });
  });
});
