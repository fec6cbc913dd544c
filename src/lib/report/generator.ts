/**
 * Comparison Report Generator
 *
 * Writes JSON and HTML reports for one or many screenshot comparisons,
 * with optional embedded images.
 */

import { writeFile, mkdir, readFile } from 'fs/promises';
import { join, relative, resolve, sep } from 'path';
import type { ComparisonResult } from '../comparison/index.js';
import { ThresholdChecker, type CheckResult, type Thresholds } from '../checks/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { errorMessage, isErrnoException } from '../utils/error.js';

// ============================================================================
// Types
// ============================================================================

export interface ReportOptions {
  /** Output directory */
  outputDir?: string;
  /** Include embedded images (base64) */
  embedImages?: boolean;
  /** Project name for report title */
  projectName?: string;
  /** Thresholds deciding pass/fail per comparison */
  thresholds?: Thresholds;
  logger?: Logger;
}

export interface ReportImages {
  a?: string;
  b?: string;
  diff?: string | null;
}

export interface ReportEntry {
  name: string;
  result: ComparisonResult;
  images?: ReportImages;
}

export interface ReportResult {
  jsonPath: string;
  htmlPath: string;
  timestamp: string;
}

export interface ComparisonReport {
  name: string;
  generatedAt: string;
  summary: {
    similar: boolean;
    passed: boolean;
    status: CheckResult['status'];
    hashSimilarity: number;
    ssim: number;
    pixelDifferenceRatio: number;
    differentPixels: number;
    totalPixels: number;
    threshold: number;
    confidence: ComparisonResult['confidence'];
  };
  dimensions: ComparisonResult['dimensions'] | null;
  images: ReportImages;
  reasons: string[];
  warnings: string[];
  error: ComparisonResult['error'] | null;
}

export interface MultiComparisonReport {
  projectName: string;
  generatedAt: string;
  summary: {
    total: number;
    similarCount: number;
    passCount: number;
    failCount: number;
    errorCount: number;
    averageHashSimilarity: number;
    averageSsim: number;
  };
  comparisons: ComparisonReport[];
}

// ============================================================================
// Report Generator
// ============================================================================

export class ReportGenerator {
  private options: Required<Omit<ReportOptions, 'thresholds' | 'logger'>>;
  private checker: ThresholdChecker;
  private logger: Logger;

  constructor(options: ReportOptions = {}) {
    this.options = {
      outputDir: options.outputDir ?? './.pixelverdict-reports',
      embedImages: options.embedImages ?? false,
      projectName: options.projectName ?? 'Screenshot Comparison',
    };
    this.checker = new ThresholdChecker(options.thresholds);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Generate JSON and HTML reports for a single comparison
   */
  async generate(
    result: ComparisonResult,
    name: string = 'comparison',
    images: ReportImages = {}
  ): Promise<ReportResult> {
    await mkdir(this.options.outputDir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const baseName = `${this.slugify(name)}_${timestamp}`;
    const jsonPath = join(this.options.outputDir, `${baseName}.json`);
    const htmlPath = join(this.options.outputDir, `${baseName}.html`);

    const report = this.buildReport({ name, result, images });
    await writeFile(jsonPath, JSON.stringify(report, null, 2));
    await writeFile(htmlPath, this.renderPage(`${this.options.projectName} - ${name}`, await this.renderComparison(report)));

    this.logger.info({ htmlPath }, 'Report generated');

    return { jsonPath, htmlPath, timestamp };
  }

  /**
   * Generate one combined report for several comparisons
   */
  async generateMulti(entries: ReportEntry[]): Promise<ReportResult> {
    await mkdir(this.options.outputDir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const jsonPath = join(this.options.outputDir, `report_${timestamp}.json`);
    const htmlPath = join(this.options.outputDir, `report_${timestamp}.html`);

    const report = this.buildMultiReport(entries);
    await writeFile(jsonPath, JSON.stringify(report, null, 2));
    await writeFile(htmlPath, await this.renderMulti(report));

    this.logger.info({ htmlPath, comparisons: entries.length }, 'Multi-comparison report generated');

    return { jsonPath, htmlPath, timestamp };
  }

  // --------------------------------------------------------------------------
  // JSON Generation
  // --------------------------------------------------------------------------

  buildReport(entry: ReportEntry): ComparisonReport {
    const { result } = entry;
    const check = this.checker.check(result);

    return {
      name: entry.name,
      generatedAt: new Date().toISOString(),
      summary: {
        similar: result.similar,
        passed: check.passed,
        status: check.status,
        hashSimilarity: result.hashSimilarity,
        ssim: result.ssim,
        pixelDifferenceRatio: result.pixelDifferenceRatio,
        differentPixels: result.differentPixels,
        totalPixels: result.totalPixels,
        threshold: result.threshold,
        confidence: result.confidence,
      },
      dimensions: result.dimensions ?? null,
      images: entry.images ?? {},
      reasons: check.failureReasons,
      warnings: [...result.warnings, ...check.warningReasons],
      error: result.error ?? null,
    };
  }

  buildMultiReport(entries: ReportEntry[]): MultiComparisonReport {
    const comparisons = entries.map(entry => this.buildReport(entry));
    const total = comparisons.length;
    const average = (pick: (r: ComparisonReport) => number): number =>
      total > 0 ? comparisons.reduce((sum, r) => sum + pick(r), 0) / total : 0;
    const passCount = comparisons.filter(r => r.summary.passed).length;

    return {
      projectName: this.options.projectName,
      generatedAt: new Date().toISOString(),
      summary: {
        total,
        similarCount: comparisons.filter(r => r.summary.similar).length,
        passCount,
        failCount: total - passCount,
        errorCount: comparisons.filter(r => r.error !== null).length,
        averageHashSimilarity: average(r => r.summary.hashSimilarity),
        averageSsim: average(r => r.summary.ssim),
      },
      comparisons,
    };
  }

  // --------------------------------------------------------------------------
  // HTML Generation
  // --------------------------------------------------------------------------

  private renderPage(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f5f5; color: #333; line-height: 1.6; }
    .container { max-width: 1400px; margin: 0 auto; padding: 20px; }
    header { background: #1a1a2e; color: white; padding: 20px; margin-bottom: 20px; border-radius: 8px; }
    h1 { font-size: 24px; margin-bottom: 10px; }
    .comparison { background: white; border-radius: 8px; padding: 20px; margin-bottom: 20px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    .comparison h2 { font-size: 18px; margin-bottom: 10px; display: flex; gap: 10px; align-items: center; }
    .status { padding: 3px 12px; border-radius: 20px; font-size: 12px; font-weight: 600; }
    .status-success { background: #d4edda; color: #155724; }
    .status-warning { background: #fff3cd; color: #856404; }
    .status-failure { background: #f8d7da; color: #721c24; }
    .scores { display: grid; grid-template-columns: repeat(4, 1fr); gap: 15px; margin: 15px 0; }
    .score { text-align: center; padding: 15px; background: #f8f8f8; border-radius: 8px; }
    .score .value { font-size: 24px; font-weight: bold; }
    .score .label { font-size: 12px; opacity: 0.8; }
    .images { display: grid; grid-template-columns: repeat(3, 1fr); gap: 15px; }
    .images figure { background: #f8f8f8; border-radius: 8px; overflow: hidden; }
    .images figcaption { padding: 8px 12px; font-size: 13px; border-bottom: 1px solid #eee; }
    .images img { width: 100%; height: auto; display: block; }
    .reasons li, .warnings li { margin-left: 20px; font-size: 14px; }
    .error { padding: 12px; background: #f8d7da; color: #721c24; border-radius: 4px; margin-top: 10px; }
    .stats { display: grid; grid-template-columns: repeat(4, 1fr); gap: 20px; margin-top: 20px; }
    .stat { padding: 15px; background: rgba(255,255,255,0.1); border-radius: 8px; text-align: center; }
    .stat-value { font-size: 28px; font-weight: bold; }
    .stat-label { font-size: 12px; opacity: 0.8; }
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
  }

  private async renderComparison(report: ComparisonReport): Promise<string> {
    const s = report.summary;
    const images = await this.renderImages(report.images);

    return `
    <section class="comparison">
      <h2>${escapeHtml(report.name)} <span class="status status-${s.status}">${s.passed ? '✓ PASS' : '✗ FAIL'}</span></h2>
      <div class="scores">
        <div class="score"><div class="value" style="color: ${this.getScoreColor(s.hashSimilarity)}">${s.hashSimilarity.toFixed(3)}</div><div class="label">Hash Similarity</div></div>
        <div class="score"><div class="value" style="color: ${this.getScoreColor(s.ssim)}">${s.ssim.toFixed(3)}</div><div class="label">SSIM</div></div>
        <div class="score"><div class="value">${(s.pixelDifferenceRatio * 100).toFixed(2)}%</div><div class="label">Pixels Changed</div></div>
        <div class="score"><div class="value">${s.threshold}</div><div class="label">Threshold</div></div>
      </div>
      ${report.error ? `<div class="error">${escapeHtml(`${report.error.kind}: ${report.error.message}`)}</div>` : ''}
      ${report.reasons.length > 0 ? `<ul class="reasons">${report.reasons.map(r => `<li>${escapeHtml(r)}</li>`).join('')}</ul>` : ''}
      ${report.warnings.length > 0 ? `<ul class="warnings">${report.warnings.map(w => `<li>⚠️ ${escapeHtml(w)}</li>`).join('')}</ul>` : ''}
      ${images}
    </section>`;
  }

  private async renderImages(images: ReportImages): Promise<string> {
    const figures: string[] = [];
    const slots: Array<[string, string | null | undefined]> = [
      ['Expected', images.a],
      ['Actual', images.b],
      ['Difference', images.diff],
    ];

    for (const [caption, path] of slots) {
      if (!path) continue;
      const src = await this.imageSource(path);
      figures.push(
        `<figure><figcaption>${caption}</figcaption><img src="${escapeHtml(src)}" alt="${caption}"></figure>`
      );
    }

    return figures.length > 0 ? `<div class="images">${figures.join('')}</div>` : '';
  }

  private async renderMulti(report: MultiComparisonReport): Promise<string> {
    const s = report.summary;
    const sections: string[] = [];
    for (const comparison of report.comparisons) {
      sections.push(await this.renderComparison(comparison));
    }

    const header = `
    <header>
      <h1>${escapeHtml(report.projectName)}</h1>
      <div>Average SSIM ${s.averageSsim.toFixed(3)} · Average hash similarity ${s.averageHashSimilarity.toFixed(3)}</div>
      <div class="stats">
        <div class="stat"><div class="stat-value">${s.total}</div><div class="stat-label">Comparisons</div></div>
        <div class="stat"><div class="stat-value" style="color: #28a745">${s.passCount}</div><div class="stat-label">Passed</div></div>
        <div class="stat"><div class="stat-value" style="color: #dc3545">${s.failCount}</div><div class="stat-label">Failed</div></div>
        <div class="stat"><div class="stat-value">${s.errorCount}</div><div class="stat-label">Errors</div></div>
      </div>
    </header>`;

    return this.renderPage(`${report.projectName} - Comparison Report`, header + sections.join('\n'));
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async imageSource(path: string): Promise<string> {
    if (!this.options.embedImages) return this.linkFromReport(path);

    try {
      const data = await readFile(path);
      return `data:image/png;base64,${data.toString('base64')}`;
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) throw error;
      this.logger.warn({ path, error: errorMessage(error) }, 'Image missing, linking instead of embedding');
      return this.linkFromReport(path);
    }
  }

  /** Browser-resolvable link from the report's directory */
  private linkFromReport(path: string): string {
    return relative(resolve(this.options.outputDir), resolve(path)).split(sep).join('/');
  }

  private getScoreColor(score: number): string {
    if (score >= 0.95) return '#28a745';
    if (score >= 0.85) return '#ffc107';
    if (score >= 0.7) return '#fd7e14';
    return '#dc3545';
  }

  private slugify(name: string): string {
    return name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-|-$/g, '') || 'comparison';
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// ============================================================================
// Factory
// ============================================================================

export function createReportGenerator(options?: ReportOptions): ReportGenerator {
  return new ReportGenerator(options);
}
