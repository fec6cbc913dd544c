/**
 * Baseline Manager
 *
 * Named reference screenshots with a versioned manifest. Update a
 * baseline when the UI intentionally changes; check new captures
 * against it otherwise.
 */

import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { createHash, randomBytes } from 'crypto';
import { z } from 'zod';
import {
  ComparisonEngine,
  DEFAULT_THRESHOLD,
  failedComparison,
  type ComparisonResult,
} from '../comparison/index.js';
import { decodePng } from '../image/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import { errorMessage, isErrnoException } from '../utils/error.js';

// ============================================================================
// Types
// ============================================================================

const BaselineEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  contentHash: z.string(),
  imagePath: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  version: z.number().int().positive(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  viewport: z.object({ width: z.number(), height: z.number() }).optional(),
  metadata: z.record(z.unknown()).optional(),
});

const BaselineManifestSchema = z.object({
  version: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  entries: z.array(BaselineEntrySchema),
});

export type BaselineEntry = z.infer<typeof BaselineEntrySchema>;
export type BaselineManifest = z.infer<typeof BaselineManifestSchema>;

export interface BaselineCandidate {
  name: string;
  contentHash: string;
}

export interface BaselineDiff {
  added: BaselineCandidate[];
  removed: BaselineEntry[];
  changed: Array<{
    old: BaselineEntry;
    new: BaselineCandidate;
  }>;
  unchanged: BaselineEntry[];
}

export interface BaselineCheckResult extends ComparisonResult {
  name: string;
  baselineVersion: number | null;
}

export interface BaselineManagerOptions {
  engine?: ComparisonEngine;
  logger?: Logger;
}

const MANIFEST_VERSION = '1.0';

// ============================================================================
// Baseline Manager
// ============================================================================

export class BaselineManager {
  private baselineDir: string;
  private manifest: BaselineManifest | null = null;
  private engine: ComparisonEngine;
  private logger: Logger;

  constructor(baselineDir: string = './.pixelverdict-baselines', options: BaselineManagerOptions = {}) {
    this.baselineDir = baselineDir;
    this.logger = options.logger ?? silentLogger;
    this.engine = options.engine ?? new ComparisonEngine({ logger: this.logger });
  }

  /**
   * Initialize baseline directory and manifest
   */
  async init(): Promise<void> {
    await mkdir(join(this.baselineDir, 'images'), { recursive: true });

    try {
      await this.loadManifest();
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) throw error;

      const now = new Date().toISOString();
      this.manifest = {
        version: MANIFEST_VERSION,
        createdAt: now,
        updatedAt: now,
        entries: [],
      };
      await this.saveManifest();
    }
  }

  /**
   * Load manifest from disk
   */
  async loadManifest(): Promise<BaselineManifest> {
    const content = await readFile(this.manifestPath(), 'utf-8');
    const manifest = BaselineManifestSchema.parse(JSON.parse(content));
    this.manifest = manifest;
    return manifest;
  }

  /**
   * Save manifest to disk
   */
  async saveManifest(): Promise<void> {
    if (!this.manifest) return;

    this.manifest.updatedAt = new Date().toISOString();
    await writeFile(this.manifestPath(), JSON.stringify(this.manifest, null, 2));
  }

  /**
   * Get current manifest
   */
  getManifest(): BaselineManifest | null {
    return this.manifest;
  }

  /**
   * Add or update a baseline. Identical content keeps the current version.
   */
  async set(
    name: string,
    png: Uint8Array,
    options: {
      viewport?: { width: number; height: number };
      metadata?: Record<string, unknown>;
    } = {}
  ): Promise<BaselineEntry> {
    const manifest = await this.ensureManifest();

    // Reject anything that is not a readable PNG before touching disk
    const image = decodePng(png);
    const contentHash = this.hashContent(png);
    const existing = manifest.entries.find(e => e.name === name);

    if (existing && existing.contentHash === contentHash) {
      this.logger.info({ name }, 'Baseline unchanged (hash match)');
      return existing;
    }

    // The id keeps names that slugify alike from sharing a file
    const id = existing?.id ?? this.generateId();
    const imagePath = join(this.baselineDir, 'images', `${this.slugify(name)}_${id}_${contentHash.slice(0, 8)}.png`);
    await writeFile(imagePath, png);

    const now = new Date().toISOString();
    const entry: BaselineEntry = {
      id,
      name,
      contentHash,
      imagePath,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
      version: (existing?.version ?? 0) + 1,
      width: image.width,
      height: image.height,
      viewport: options.viewport,
      metadata: options.metadata,
    };

    if (existing) {
      manifest.entries[manifest.entries.indexOf(existing)] = entry;
      if (existing.imagePath !== entry.imagePath) {
        await this.removeFile(existing.imagePath);
      }
      this.logger.info({ name, version: entry.version }, 'Baseline updated');
    } else {
      manifest.entries.push(entry);
      this.logger.info({ name }, 'Baseline added');
    }

    await this.saveManifest();
    return entry;
  }

  /**
   * Get a baseline entry by name
   */
  get(name: string): BaselineEntry | undefined {
    return this.manifest?.entries.find(e => e.name === name);
  }

  /**
   * Get all baseline entries
   */
  list(): BaselineEntry[] {
    return this.manifest?.entries ?? [];
  }

  /**
   * Remove a baseline entry
   */
  async remove(name: string): Promise<boolean> {
    if (!this.manifest) return false;

    const index = this.manifest.entries.findIndex(e => e.name === name);
    if (index === -1) return false;

    const [entry] = this.manifest.entries.splice(index, 1);
    await this.removeFile(entry.imagePath);
    await this.saveManifest();

    this.logger.info({ name }, 'Baseline removed');
    return true;
  }

  /**
   * Clear all baselines
   */
  async clear(): Promise<void> {
    if (!this.manifest) return;

    for (const entry of this.manifest.entries) {
      await this.removeFile(entry.imagePath);
    }

    this.manifest.entries = [];
    await this.saveManifest();

    this.logger.info('Cleared all baselines');
  }

  /**
   * Compare current baselines with a fresh set of captures
   */
  diff(candidates: BaselineCandidate[]): BaselineDiff {
    const result: BaselineDiff = {
      added: [],
      removed: [],
      changed: [],
      unchanged: [],
    };

    const entries = this.list();
    const existingNames = new Set(entries.map(e => e.name));
    const byName = new Map(candidates.map(c => [c.name, c]));

    for (const candidate of candidates) {
      if (!existingNames.has(candidate.name)) {
        result.added.push(candidate);
      }
    }

    for (const existing of entries) {
      const candidate = byName.get(existing.name);
      if (!candidate) {
        result.removed.push(existing);
      } else if (candidate.contentHash !== existing.contentHash) {
        result.changed.push({ old: existing, new: candidate });
      } else {
        result.unchanged.push(existing);
      }
    }

    return result;
  }

  /**
   * Get baseline image as buffer
   */
  async getImage(name: string): Promise<Buffer | null> {
    await this.ensureManifest();
    const entry = this.get(name);
    if (!entry) return null;

    try {
      return await readFile(entry.imagePath);
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) return null;
      throw error;
    }
  }

  /**
   * Compare a new capture against the named baseline
   */
  async check(name: string, actual: Uint8Array, threshold: number = DEFAULT_THRESHOLD): Promise<BaselineCheckResult> {
    let baseline: Buffer | null;
    try {
      baseline = await this.getImage(name);
    } catch (error) {
      baseline = null;
      this.logger.error({ name, error: errorMessage(error) }, 'Failed to read baseline image');
    }

    const entry = this.get(name);
    if (!entry || !baseline) {
      return {
        ...failedComparison(threshold, { kind: 'DecodeFailure', message: `No baseline image for "${name}"` }),
        name,
        baselineVersion: entry?.version ?? null,
      };
    }

    const result = this.engine.compare(baseline, actual, threshold);
    this.logger.info({ name, version: entry.version, similar: result.similar }, 'Checked against baseline');

    return { ...result, name, baselineVersion: entry.version };
  }

  /**
   * Content hash used to detect changed captures
   */
  hashContent(buffer: Uint8Array): string {
    return createHash('sha256').update(buffer).digest('hex');
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async ensureManifest(): Promise<BaselineManifest> {
    if (!this.manifest) await this.init();
    if (!this.manifest) throw new Error('Baseline manifest could not be initialised');
    return this.manifest;
  }

  private async removeFile(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!isErrnoException(error, 'ENOENT')) throw error;
    }
  }

  private manifestPath(): string {
    return join(this.baselineDir, 'manifest.json');
  }

  private generateId(): string {
    return randomBytes(6).toString('hex');
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

export function createBaselineManager(
  baselineDir?: string,
  options?: BaselineManagerOptions
): BaselineManager {
  return new BaselineManager(baselineDir, options);
}
