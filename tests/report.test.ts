/**
 * Report Generator Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ReportGenerator,
  createReportGenerator,
  escapeHtml,
} from '../src/lib/report/index.js';
import type { ComparisonResult } from '../src/lib/comparison/index.js';

const createMockResult = (overrides: Partial<ComparisonResult> = {}): ComparisonResult => ({
  similar: true,
  hashSimilarity: 1,
  ssim: 0.99,
  pixelDifferenceRatio: 0.001,
  differentPixels: 10,
  totalPixels: 10000,
  threshold: 0.95,
  confidence: 'full',
  warnings: [],
  ...overrides,
});

const failedResult = createMockResult({
  similar: false,
  hashSimilarity: 0,
  ssim: 0,
  pixelDifferenceRatio: 0,
  differentPixels: 0,
  totalPixels: 0,
  confidence: 'degraded',
  error: { kind: 'DecodeFailure', message: 'Image data is empty' },
});

describe('ReportGenerator', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pixelverdict-reports-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('buildReport', () => {
    const generator = createReportGenerator();

    it('should summarise a passing comparison', () => {
      const report = generator.buildReport({ name: 'home', result: createMockResult() });

      expect(report.name).toBe('home');
      expect(report.summary).toEqual({
        similar: true,
        passed: true,
        status: 'success',
        hashSimilarity: 1,
        ssim: 0.99,
        pixelDifferenceRatio: 0.001,
        differentPixels: 10,
        totalPixels: 10000,
        threshold: 0.95,
        confidence: 'full',
      });
      expect(report.reasons).toEqual([]);
      expect(report.error).toBeNull();
      expect(report.dimensions).toBeNull();
    });

    it('should carry failure reasons and the error', () => {
      const report = generator.buildReport({ name: 'broken', result: failedResult });

      expect(report.summary.passed).toBe(false);
      expect(report.summary.status).toBe('failure');
      expect(report.reasons).toEqual(['Comparison failed (DecodeFailure): Image data is empty']);
      expect(report.error).toEqual({ kind: 'DecodeFailure', message: 'Image data is empty' });
    });

    it('should merge result and check warnings', () => {
      const report = generator.buildReport({
        name: 'tiny',
        result: createMockResult({ confidence: 'degraded', warnings: ['SSIM degraded: tiny'] }),
      });

      expect(report.warnings).toEqual(['SSIM degraded: tiny', 'SSIM computed in degraded mode']);
    });

    it('should apply custom thresholds', () => {
      const strict = new ReportGenerator({ thresholds: { minSsim: 0.995 } });
      const report = strict.buildReport({ name: 'home', result: createMockResult() });

      expect(report.reasons).toEqual(['SSIM 0.990 below threshold 0.995']);
    });
  });

  describe('buildMultiReport', () => {
    it('should aggregate several comparisons', () => {
      const generator = createReportGenerator({ projectName: 'Checkout Flow' });
      const report = generator.buildMultiReport([
        { name: 'cart', result: createMockResult() },
        { name: 'payment', result: failedResult },
      ]);

      expect(report.projectName).toBe('Checkout Flow');
      expect(report.summary).toEqual({
        total: 2,
        similarCount: 1,
        passCount: 1,
        failCount: 1,
        errorCount: 1,
        averageHashSimilarity: 0.5,
        averageSsim: 0.495,
      });
    });

    it('should handle no comparisons', () => {
      const report = createReportGenerator().buildMultiReport([]);

      expect(report.summary.total).toBe(0);
      expect(report.summary.averageSsim).toBe(0);
    });
  });

  describe('generate', () => {
    it('should write JSON and HTML reports', async () => {
      const generator = createReportGenerator({ outputDir: dir, projectName: 'Site' });

      const output = await generator.generate(createMockResult(), '<Home>', {
        a: join(dir, 'a.png'),
        b: join(dir, 'b.png'),
      });

      expect(output.jsonPath).toBe(join(dir, `home_${output.timestamp}.json`));
      expect(output.htmlPath).toBe(join(dir, `home_${output.timestamp}.html`));

      const json: unknown = JSON.parse(await readFile(output.jsonPath, 'utf-8'));
      expect(json).toMatchObject({ name: '<Home>', summary: { passed: true, ssim: 0.99 } });

      const html = await readFile(output.htmlPath, 'utf-8');
      expect(html).toContain('<title>Site - &lt;Home&gt;</title>');
      expect(html).toContain('✓ PASS');
      expect(html).toContain('<div class="value" style="color: #28a745">0.990</div>');
      expect(html).toContain('<figcaption>Expected</figcaption><img src="a.png" alt="Expected">');
      expect(html).not.toContain('<figcaption>Difference</figcaption>');
    });

    it('should render failures with the error', async () => {
      const generator = createReportGenerator({ outputDir: dir });

      const output = await generator.generate(failedResult, 'broken');
      const html = await readFile(output.htmlPath, 'utf-8');

      expect(html).toContain('✗ FAIL');
      expect(html).toContain('<div class="error">DecodeFailure: Image data is empty</div>');
    });

    it('should embed images as data URIs', async () => {
      const imagePath = join(dir, 'diff.png');
      await writeFile(imagePath, Buffer.from([1, 2, 3]));
      const generator = createReportGenerator({ outputDir: dir, embedImages: true });

      const output = await generator.generate(createMockResult(), 'embedded', {
        diff: imagePath,
        b: join(dir, 'missing.png'),
      });
      const html = await readFile(output.htmlPath, 'utf-8');

      expect(html).toContain('<img src="data:image/png;base64,AQID" alt="Difference">');
      expect(html).toContain('<img src="missing.png" alt="Actual">');
    });

    it('should link images relative to the report directory', async () => {
      const generator = createReportGenerator({ outputDir: join(dir, 'out') });

      const output = await generator.generate(createMockResult(), 'linked', {
        a: join(dir, 'shots', 'expected.png'),
        diff: join(dir, 'shots', 'diff.png'),
      });
      const html = await readFile(output.htmlPath, 'utf-8');

      expect(html).toContain('<img src="../shots/expected.png" alt="Expected">');
      expect(html).toContain('<img src="../shots/diff.png" alt="Difference">');
    });
  });

  describe('generateMulti', () => {
    it('should write a combined report', async () => {
      const generator = createReportGenerator({ outputDir: dir, projectName: 'Checkout Flow' });

      const output = await generator.generateMulti([
        { name: 'cart', result: createMockResult() },
        { name: 'payment', result: failedResult },
      ]);

      expect(output.htmlPath).toBe(join(dir, `report_${output.timestamp}.html`));
      const html = await readFile(output.htmlPath, 'utf-8');
      expect(html).toContain('<title>Checkout Flow - Comparison Report</title>');
      expect(html).toContain('<div class="stat-value">2</div><div class="stat-label">Comparisons</div>');
      expect(html).toContain('<div class="stat-value">1</div><div class="stat-label">Errors</div>');
    });
  });

  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
    });
  });
});
