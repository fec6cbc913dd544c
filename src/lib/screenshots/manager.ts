/**
 * Screenshot Manager
 *
 * Organises screenshot files on disk and runs file-level comparisons.
 * All file I/O around the comparison engine happens here: loading the
 * two captures, persisting the diff image, archiving and cleanup.
 */

import type { Dirent } from 'fs';
import { mkdir, readFile, readdir, rename, stat, unlink, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import {
  ComparisonEngine,
  DEFAULT_THRESHOLD,
  failedComparison,
  type ComparisonResult,
} from '../comparison/index.js';
import {
  createImage,
  decodePng,
  encodePng,
  pasteImage,
  resizeLanczos,
  type RasterImage,
} from '../image/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { errorMessage, isErrnoException } from '../utils/error.js';

// ============================================================================
// Types
// ============================================================================

export const SCREENSHOT_CATEGORIES = ['failures', 'successes', 'comparisons', 'elements', 'archived'] as const;

export type ScreenshotCategory = (typeof SCREENSHOT_CATEGORIES)[number];

export interface ScreenshotManagerOptions {
  engine?: ComparisonEngine;
  logger?: Logger;
  /** Clock used for file names and age checks */
  now?: () => Date;
}

export interface FileComparisonResult extends ComparisonResult {
  fileA: string;
  fileB: string;
  /** Written only when at least one pixel differs */
  diffPath: string | null;
}

export interface CleanupResult {
  deleted: number;
  freedBytes: number;
}

export interface DirectoryStatistics {
  count: number;
  sizeBytes: number;
  files: string[];
}

export interface ScreenshotStatistics {
  totalScreenshots: number;
  totalSizeBytes: number;
  byDirectory: Record<'root' | ScreenshotCategory, DirectoryStatistics>;
  oldest: { path: string; modifiedAt: string } | null;
  newest: { path: string; modifiedAt: string } | null;
}

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);
const COLLAGE_TILE_WIDTH = 400;
const COLLAGE_MAX_COLUMNS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Screenshot Manager
// ============================================================================

export class ScreenshotManager {
  private baseDir: string;
  private engine: ComparisonEngine;
  private logger: Logger;
  private now: () => Date;

  constructor(baseDir: string = 'reports/screenshots', options: ScreenshotManagerOptions = {}) {
    this.baseDir = baseDir;
    this.logger = options.logger ?? silentLogger;
    this.engine = options.engine ?? new ComparisonEngine({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create the base directory and its category subdirectories
   */
  async init(): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    for (const category of SCREENSHOT_CATEGORIES) {
      await mkdir(this.getDir(category), { recursive: true });
    }
  }

  getDir(category?: ScreenshotCategory): string {
    return category ? join(this.baseDir, category) : this.baseDir;
  }

  /**
   * Store PNG bytes under a timestamped, slugified name. An existing file is
   * never replaced: a numeric suffix is added until the name is free.
   */
  async save(name: string, png: Uint8Array, category: ScreenshotCategory = 'successes'): Promise<string> {
    await mkdir(this.getDir(category), { recursive: true });
    const stem = join(this.getDir(category), `${this.slugify(name)}_${this.timestamp()}`);

    for (let attempt = 0; ; attempt++) {
      const path = attempt === 0 ? `${stem}.png` : `${stem}_${attempt}.png`;
      try {
        await writeFile(path, png, { flag: 'wx' });
      } catch (error) {
        if (isErrnoException(error, 'EEXIST')) continue;
        throw error;
      }
      this.logger.info({ path, category }, 'Screenshot saved');
      return path;
    }
  }

  /**
   * Compare two PNG files. The diff image goes to `comparisons/` when any
   * pixel differs. Unreadable files give a failed result, not an exception.
   */
  async compareFiles(
    fileA: string,
    fileB: string,
    threshold: number = DEFAULT_THRESHOLD
  ): Promise<FileComparisonResult> {
    let bytesA: Buffer;
    let bytesB: Buffer;
    try {
      [bytesA, bytesB] = await Promise.all([readFile(fileA), readFile(fileB)]);
    } catch (error) {
      this.logger.error({ fileA, fileB, error: errorMessage(error) }, 'Failed to read screenshots');
      return {
        ...failedComparison(threshold, { kind: 'DecodeFailure', message: errorMessage(error) }),
        fileA,
        fileB,
        diffPath: null,
      };
    }

    const result = this.engine.compare(bytesA, bytesB, threshold);

    let diffPath: string | null = null;
    if (result.diffImage && result.pixelDifferenceRatio > 0) {
      await mkdir(this.getDir('comparisons'), { recursive: true });
      diffPath = join(this.getDir('comparisons'), `diff_${this.stem(fileA)}_${this.stem(fileB)}.png`);
      await writeFile(diffPath, encodePng(result.diffImage.image));
      this.logger.debug({ diffPath }, 'Difference image written');
    }

    return { ...result, fileA, fileB, diffPath };
  }

  /**
   * Move a screenshot into `archived/`, tagging the name with the reason
   */
  async archive(path: string, reason: string = 'test_completion'): Promise<string> {
    await mkdir(this.getDir('archived'), { recursive: true });
    const target = join(
      this.getDir('archived'),
      `${this.stem(path)}_${this.slugify(reason)}_${this.timestamp()}${extname(path)}`
    );
    await rename(path, target);
    this.logger.info({ from: path, to: target }, 'Screenshot archived');
    return target;
  }

  async toBase64(path: string): Promise<string> {
    const data = await readFile(path);
    return data.toString('base64');
  }

  /**
   * Tile screenshots (scaled to 400px wide) into a grid of up to three
   * columns. Missing or undecodable files are skipped; returns null when
   * nothing could be used.
   */
  async createCollage(paths: string[], outputPath?: string): Promise<string | null> {
    const tiles: RasterImage[] = [];

    for (const path of paths) {
      try {
        const image = decodePng(await readFile(path));
        const height = Math.max(1, Math.floor((image.height * COLLAGE_TILE_WIDTH) / image.width));
        tiles.push(resizeLanczos(image, COLLAGE_TILE_WIDTH, height));
      } catch (error) {
        this.logger.warn({ path, error: errorMessage(error) }, 'Skipping screenshot in collage');
      }
    }

    if (tiles.length === 0) {
      this.logger.warn('No valid screenshots for collage');
      return null;
    }

    const columns = Math.min(COLLAGE_MAX_COLUMNS, tiles.length);
    const rowHeights: number[] = [];
    tiles.forEach((tile, i) => {
      const row = Math.floor(i / columns);
      rowHeights[row] = Math.max(rowHeights[row] ?? 0, tile.height);
    });

    const totalHeight = rowHeights.reduce((sum, h) => sum + h, 0);
    let collage = createImage(columns * COLLAGE_TILE_WIDTH, totalHeight, 'RGB', [255, 255, 255]);

    let y = 0;
    rowHeights.forEach((rowHeight, row) => {
      for (let col = 0; col < columns; col++) {
        const tile = tiles[row * columns + col];
        if (!tile) break;
        collage = pasteImage(collage, tile, col * COLLAGE_TILE_WIDTH, y);
      }
      y += rowHeight;
    });

    const target = outputPath ?? join(this.baseDir, `collage_${this.timestamp()}.png`);
    await writeFile(target, encodePng(collage));
    this.logger.info({ path: target, tiles: tiles.length }, 'Created screenshot collage');

    return target;
  }

  /**
   * Delete screenshots last modified more than `daysToKeep` days ago
   */
  async cleanOld(daysToKeep: number = 7): Promise<CleanupResult> {
    const cutoff = this.now().getTime() - daysToKeep * DAY_MS;
    let deleted = 0;
    let freedBytes = 0;

    for (const [, dir] of this.directories()) {
      for (const file of await this.listImages(dir)) {
        const info = await stat(file);
        if (info.mtimeMs < cutoff) {
          await unlink(file);
          deleted++;
          freedBytes += info.size;
        }
      }
    }

    this.logger.info(
      { deleted, freedMb: Number((freedBytes / 1024 / 1024).toFixed(2)) },
      `Cleaned ${deleted} old screenshots`
    );

    return { deleted, freedBytes };
  }

  async statistics(): Promise<ScreenshotStatistics> {
    const empty = (): DirectoryStatistics => ({ count: 0, sizeBytes: 0, files: [] });
    const stats: ScreenshotStatistics = {
      totalScreenshots: 0,
      totalSizeBytes: 0,
      byDirectory: {
        root: empty(),
        failures: empty(),
        successes: empty(),
        comparisons: empty(),
        elements: empty(),
        archived: empty(),
      },
      oldest: null,
      newest: null,
    };

    let oldestTime = Infinity;
    let newestTime = -Infinity;

    for (const [name, dir] of this.directories()) {
      const dirStats = stats.byDirectory[name];
      for (const file of await this.listImages(dir)) {
        const info = await stat(file);
        dirStats.count++;
        dirStats.sizeBytes += info.size;
        dirStats.files.push(basename(file));

        if (info.mtimeMs < oldestTime) {
          oldestTime = info.mtimeMs;
          stats.oldest = { path: file, modifiedAt: info.mtime.toISOString() };
        }
        if (info.mtimeMs > newestTime) {
          newestTime = info.mtimeMs;
          stats.newest = { path: file, modifiedAt: info.mtime.toISOString() };
        }
      }
      stats.totalScreenshots += dirStats.count;
      stats.totalSizeBytes += dirStats.sizeBytes;
    }

    return stats;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private directories(): Array<['root' | ScreenshotCategory, string]> {
    return [['root', this.baseDir], ...SCREENSHOT_CATEGORIES.map((c): [ScreenshotCategory, string] => [c, this.getDir(c)])];
  }

  private async listImages(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown): Dirent[] => {
      if (isErrnoException(error, 'ENOENT')) return [];
      throw error;
    });

    return entries
      .filter(entry => entry.isFile() && IMAGE_EXTENSIONS.has(extname(entry.name).toLowerCase()))
      .map(entry => join(dir, entry.name))
      .sort();
  }

  private stem(path: string): string {
    return basename(path, extname(path));
  }

  private timestamp(): string {
    const d = this.now();
    const pad = (n: number): string => String(n).padStart(2, '0');
    return (
      `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_` +
      `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}_` +
      String(d.getMilliseconds()).padStart(3, '0')
    );
  }

  private slugify(name: string): string {
    return name
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-|-$/g, '');
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScreenshotManager(
  baseDir?: string,
  options?: ScreenshotManagerOptions
): ScreenshotManager {
  return new ScreenshotManager(baseDir, options);
}
