/**
 * CLI: Screenshot Comparison
 *
 * Argument parsing and the compare command itself, kept apart from the
 * process entry point so it can be driven from tests.
 */

import { basename, extname } from 'path';
import { ComparisonEngine } from '../lib/comparison/index.js';
import { ConfigParser, type PixelVerdictConfig } from '../lib/config/index.js';
import { createLogger, isLogLevel, levelFromEnv, type Logger, type LogLevel } from '../lib/logging/index.js';
import { createReportGenerator } from '../lib/report/index.js';
import { ScreenshotManager } from '../lib/screenshots/index.js';

export interface CompareArgs {
  imageA: string;
  imageB: string;
  threshold?: number;
  configPath?: string;
  outputDir?: string;
  json: boolean;
  report: boolean;
  logLevel?: LogLevel;
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'error'; message: string }
  | { kind: 'compare'; args: CompareArgs };

export interface CliIO {
  out: (line: string) => void;
  /** Logger factory; the default writes pino output to stderr */
  logger?: (level: LogLevel) => Logger;
}

export const USAGE = `
Screenshot Comparison

Usage:
  pixelverdict <imageA.png> <imageB.png> [options]

Arguments:
  imageA      Reference screenshot (PNG)
  imageB      Screenshot to check (PNG); resized/converted to match imageA

Options:
  --threshold  Minimum hash similarity and SSIM, 0-1 (default: 0.95)
  --config     Path to a .pixelverdict.yml / .json config file
  --output     Screenshot directory for diff images (default: reports/screenshots)
  --json       Print the comparison result as JSON
  --report     Also write JSON + HTML reports
  --log-level  silent | debug | info | warn | error (default: warn, or
               PIXELVERDICT_LOG_LEVEL / logging.level from --config)

Examples:
  pixelverdict expected.png actual.png
  pixelverdict expected.png actual.png --threshold 0.98 --report
`;

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

const VALUE_OPTIONS = new Set(['--threshold', '--config', '--output', '--log-level']);

export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1 && VALUE_OPTIONS.has(arg.slice(0, eq))) {
      return { kind: 'error', message: `Use "${arg.slice(0, eq)} <value>", not "${arg}"` };
    }
    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return { kind: 'error', message: `Missing value for ${arg}` };
      }
      i++;
    } else if (!arg.startsWith('--')) {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    return { kind: 'error', message: 'Expected exactly two image paths' };
  }

  let threshold: number | undefined;
  const thresholdArg = optionValue(argv, '--threshold');
  if (thresholdArg !== undefined) {
    threshold = Number(thresholdArg);
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      return { kind: 'error', message: `--threshold must be a number between 0 and 1, got "${thresholdArg}"` };
    }
  }

  const levelArg = optionValue(argv, '--log-level');
  if (levelArg !== undefined && !isLogLevel(levelArg)) {
    return { kind: 'error', message: `Unknown log level "${levelArg}"` };
  }

  return {
    kind: 'compare',
    args: {
      imageA: positional[0],
      imageB: positional[1],
      threshold,
      configPath: optionValue(argv, '--config'),
      outputDir: optionValue(argv, '--output'),
      json: argv.includes('--json'),
      report: argv.includes('--report'),
      logLevel: isLogLevel(levelArg) ? levelArg : undefined,
    },
  };
}

/**
 * Run the compare command. Resolves to the process exit code: 0 when the
 * screenshots are similar, 1 otherwise.
 */
export async function runCompare(args: CompareArgs, io: CliIO): Promise<number> {
  const parser = new ConfigParser();
  const config: PixelVerdictConfig = args.configPath
    ? await parser.loadFile(args.configPath)
    : parser.mergeWithDefaults({});

  // Flag, then environment, then an explicit config file; quiet otherwise
  const level = args.logLevel ?? levelFromEnv() ?? (args.configPath ? config.logging?.level : undefined) ?? 'warn';
  const logger = io.logger ? io.logger(level) : createLogger({ module: 'cli' }, { level });

  const threshold = args.threshold ?? parser.getThreshold(config);
  const engine = new ComparisonEngine({ ...parser.toComparatorOptions(config), logger });
  const manager = new ScreenshotManager(args.outputDir ?? config.screenshots?.base_dir, { engine, logger });

  const result = await manager.compareFiles(args.imageA, args.imageB, threshold);

  if (args.json) {
    const { diffImage, ...printable } = result;
    io.out(JSON.stringify({ ...printable, diffImage: diffImage ? { changedPixels: diffImage.changedPixels, bounds: diffImage.bounds } : null }, null, 2));
  } else {
    io.out(`🔍 Comparing ${args.imageA} ↔ ${args.imageB}`);
    if (result.error) {
      io.out(`❌ ${result.error.kind}: ${result.error.message}`);
    } else {
      io.out(`  Hash similarity: ${result.hashSimilarity.toFixed(4)}`);
      io.out(`  SSIM:            ${result.ssim.toFixed(4)}${result.confidence === 'degraded' ? ' (degraded)' : ''}`);
      io.out(`  Pixels changed:  ${(result.pixelDifferenceRatio * 100).toFixed(4)}% (${result.differentPixels}/${result.totalPixels})`);
      io.out(`  Threshold:       ${threshold}`);
      if (result.diffPath) io.out(`  Diff image:      ${result.diffPath}`);
      for (const warning of result.warnings) io.out(`  ⚠️ ${warning}`);
      io.out(result.similar ? '✅ Screenshots are similar' : '❌ Screenshots differ');
    }
  }

  if (args.report) {
    const generator = createReportGenerator({
      outputDir: config.reports?.output_dir,
      projectName: config.reports?.project_name,
      thresholds: parser.toCheckerThresholds({ ...config, comparison: { ...config.comparison, threshold } }),
      logger,
    });
    const report = await generator.generate(result, `${basenameOf(args.imageA)}-vs-${basenameOf(args.imageB)}`, {
      a: args.imageA,
      b: args.imageB,
      diff: result.diffPath,
    });
    if (!args.json) io.out(`📄 Report: ${report.htmlPath}`);
  }

  return result.similar ? 0 : 1;
}

function basenameOf(path: string): string {
  return basename(path, extname(path));
}
