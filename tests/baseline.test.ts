/**
 * Baseline Manager Tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  BaselineManager,
  createBaselineManager,
} from '../src/lib/baseline/index.js';
import { ImageDecodeError, createImage, encodePng, fillRect } from '../src/lib/image/index.js';
import { access, mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

const homePng = encodePng(
  fillRect(createImage(32, 24, 'RGB', [250, 250, 250]), { x: 0, y: 12, width: 32, height: 12 }, [30, 60, 90])
);
const homeV2Png = encodePng(
  fillRect(createImage(32, 24, 'RGB', [250, 250, 250]), { x: 0, y: 12, width: 32, height: 12 }, [30, 60, 91])
);
const blankPng = encodePng(createImage(32, 24, 'RGB', [0, 0, 0]));

describe('BaselineManager', () => {
  let root: string;
  let dir: string;
  let manager: BaselineManager;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'pixelverdict-baselines-'));
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(root, 'run-'));
    manager = createBaselineManager(dir);
    await manager.init();
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('init', () => {
    it('should create an empty manifest', async () => {
      const manifest = manager.getManifest();

      expect(manifest?.version).toBe('1.0');
      expect(manifest?.entries).toHaveLength(0);

      const onDisk: unknown = JSON.parse(await readFile(join(dir, 'manifest.json'), 'utf-8'));
      expect(onDisk).toMatchObject({ version: '1.0', entries: [] });
    });

    it('should load an existing manifest', async () => {
      await manager.set('Home', homePng);

      const reopened = createBaselineManager(dir);
      await reopened.init();

      expect(reopened.list().map(e => e.name)).toEqual(['Home']);
    });
  });

  describe('set', () => {
    it('should add new baseline entry', async () => {
      const entry = await manager.set('Home', homePng, { viewport: { width: 1280, height: 720 } });
      const hash = manager.hashContent(homePng);

      expect(entry.name).toBe('Home');
      expect(entry.version).toBe(1);
      expect(entry.width).toBe(32);
      expect(entry.height).toBe(24);
      expect(entry.contentHash).toBe(hash);
      expect(entry.imagePath).toBe(join(dir, 'images', `home_${entry.id}_${hash.slice(0, 8)}.png`));
      expect(entry.viewport).toEqual({ width: 1280, height: 720 });
      expect(await readFile(entry.imagePath)).toEqual(homePng);
    });

    it('should keep the version when content is unchanged', async () => {
      const first = await manager.set('Home', homePng);
      const second = await manager.set('Home', homePng);

      expect(second).toEqual(first);
      expect(second.version).toBe(1);
    });

    it('should bump the version and drop the old image on change', async () => {
      const first = await manager.set('Home', homePng);
      const second = await manager.set('Home', homeV2Png);

      expect(second.version).toBe(2);
      expect(second.id).toBe(first.id);
      expect(second.createdAt).toBe(first.createdAt);
      await expect(access(first.imagePath)).rejects.toThrow();
      expect(manager.list()).toHaveLength(1);
    });

    it('should give names that slugify alike their own image files', async () => {
      const upper = await manager.set('Home', homePng);
      const lower = await manager.set('home', homePng);

      expect(upper.imagePath).not.toBe(lower.imagePath);

      await manager.remove('Home');

      expect(await manager.getImage('home')).toEqual(Buffer.from(homePng));
      const result = await manager.check('home', homePng);
      expect(result.similar).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it('should reject data that is not a PNG', async () => {
      await expect(manager.set('Broken', Buffer.from('not a png'))).rejects.toThrow(ImageDecodeError);
      expect(manager.get('Broken')).toBeUndefined();
    });
  });

  describe('remove / clear', () => {
    it('should remove an entry and its image', async () => {
      const entry = await manager.set('Home', homePng);

      expect(await manager.remove('Home')).toBe(true);
      expect(await manager.remove('Home')).toBe(false);
      expect(manager.get('Home')).toBeUndefined();
      await expect(access(entry.imagePath)).rejects.toThrow();
    });

    it('should clear all baselines', async () => {
      await manager.set('Home', homePng);
      await manager.set('Blank', blankPng);

      await manager.clear();

      expect(manager.list()).toEqual([]);
    });
  });

  describe('diff', () => {
    it('should sort candidates into added, removed, changed and unchanged', async () => {
      await manager.set('Home', homePng);
      await manager.set('Blank', blankPng);
      await manager.set('Gone', homeV2Png);

      const diff = manager.diff([
        { name: 'Home', contentHash: manager.hashContent(homePng) },
        { name: 'Blank', contentHash: manager.hashContent(homeV2Png) },
        { name: 'New', contentHash: 'abc' },
      ]);

      expect(diff.added.map(c => c.name)).toEqual(['New']);
      expect(diff.removed.map(e => e.name)).toEqual(['Gone']);
      expect(diff.changed.map(c => c.old.name)).toEqual(['Blank']);
      expect(diff.unchanged.map(e => e.name)).toEqual(['Home']);
    });
  });

  describe('getImage', () => {
    it('should return null for unknown baselines', async () => {
      expect(await manager.getImage('Nope')).toBeNull();
    });
  });

  describe('check', () => {
    it('should compare a capture against the baseline', async () => {
      await manager.set('Home', homePng);

      const result = await manager.check('Home', homePng);

      expect(result.name).toBe('Home');
      expect(result.baselineVersion).toBe(1);
      expect(result.similar).toBe(true);
      expect(result.pixelDifferenceRatio).toBe(0);
    });

    it('should flag a different capture', async () => {
      await manager.set('Home', homePng);

      const result = await manager.check('Home', blankPng);

      expect(result.similar).toBe(false);
      expect(result.error).toBeUndefined();
    });

    it('should load the manifest from disk without an explicit init', async () => {
      await manager.set('Home', homePng);
      const fresh = createBaselineManager(dir);

      expect(await fresh.getImage('Home')).toEqual(Buffer.from(homePng));

      const result = await createBaselineManager(dir).check('Home', homePng);

      expect(result.similar).toBe(true);
      expect(result.baselineVersion).toBe(1);
      expect(result.error).toBeUndefined();
    });

    it('should fail without a baseline', async () => {
      const result = await manager.check('Missing', homePng, 0.9);

      expect(result.similar).toBe(false);
      expect(result.baselineVersion).toBeNull();
      expect(result.threshold).toBe(0.9);
      expect(result.error).toEqual({ kind: 'DecodeFailure', message: 'No baseline image for "Missing"' });
    });
  });
});
