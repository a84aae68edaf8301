import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  auxiliaryConfigRoot,
  removeNodeFolders,
  setupCompileResources,
  stageAuxiliaryConfig,
} from '@/lib/resources.js';
import { makeTestDir, removeTestDir } from '../helpers/mocks.js';

describe('resource staging', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await makeTestDir('precompile-resources');
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  describe('removeNodeFolders', () => {
    it('should remove both node and node_modules', async () => {
      await mkdir(join(testDir, 'node', 'bin'), { recursive: true });
      await mkdir(join(testDir, 'node_modules', 'left-pad'), { recursive: true });
      await writeFile(join(testDir, 'pom.xml'), '<project/>');

      const removed = await removeNodeFolders(testDir);

      expect(removed).toEqual([join(testDir, 'node'), join(testDir, 'node_modules')]);
      expect(await readdir(testDir)).toEqual(['pom.xml']);
    });

    it('should remove node_modules when node is absent', async () => {
      await mkdir(join(testDir, 'node_modules'), { recursive: true });

      expect(await removeNodeFolders(testDir)).toEqual([join(testDir, 'node_modules')]);
      expect(existsSync(join(testDir, 'node_modules'))).toBe(false);
    });
  });

  describe('setupCompileResources', () => {
    it('should return the compile log path inside the directory', async () => {
      expect(await setupCompileResources(testDir)).toBe(join(testDir, 'compilePluginLog.log'));
    });

    it('should be idempotent on a clean directory', async () => {
      await writeFile(join(testDir, 'pom.xml'), '<project/>');

      const first = await setupCompileResources(testDir);
      const second = await setupCompileResources(testDir);

      expect(second).toBe(first);
      expect(await readdir(testDir)).toEqual(['pom.xml']);
    });
  });

  describe('auxiliaryConfigRoot', () => {
    it('should use the checkout itself for several plugins', () => {
      expect(auxiliaryConfigRoot('/src/checkout', 2)).toBe('/src/checkout');
    });

    it('should use the checkout parent for a single plugin', () => {
      expect(auxiliaryConfigRoot('/src/checkout', 1)).toBe('/src');
    });

    it('should use the checkout parent when no plugins are listed', () => {
      expect(auxiliaryConfigRoot('/src/checkout', 0)).toBe('/src');
    });
  });

  describe('stageAuxiliaryConfig', () => {
    let checkout: string;
    let pluginDir: string;

    beforeEach(async () => {
      checkout = join(testDir, 'sources', 'checkout');
      pluginDir = join(testDir, 'work', 'plugin-x');
      await mkdir(checkout, { recursive: true });
      await mkdir(pluginDir, { recursive: true });
    });

    it('should copy from the checkout root when several plugins are tested', async () => {
      await writeFile(join(checkout, '.eslintrc'), 'root-config');
      await writeFile(join(testDir, 'sources', '.eslintrc'), 'parent-config');

      const copied = await stageAuxiliaryConfig(checkout, 3, pluginDir);

      expect(copied).toEqual([join(checkout, '.eslintrc')]);
      expect(await readFile(join(testDir, 'work', '.eslintrc'), 'utf-8')).toBe('root-config');
    });

    it('should copy from the checkout parent when one plugin is tested', async () => {
      await writeFile(join(checkout, '.eslintrc'), 'root-config');
      await writeFile(join(testDir, 'sources', '.eslintrc'), 'parent-config');

      await stageAuxiliaryConfig(checkout, 1, pluginDir);

      expect(await readFile(join(testDir, 'work', '.eslintrc'), 'utf-8')).toBe('parent-config');
    });

    it('should replace a previously staged file', async () => {
      await writeFile(join(checkout, '.eslintrc'), 'fresh');
      await writeFile(join(testDir, 'work', '.eslintrc'), 'stale');

      await stageAuxiliaryConfig(checkout, 2, pluginDir);

      expect(await readFile(join(testDir, 'work', '.eslintrc'), 'utf-8')).toBe('fresh');
    });

    it('should not look deeper than one level', async () => {
      await mkdir(join(checkout, 'nested'), { recursive: true });
      await writeFile(join(checkout, 'nested', '.eslintrc'), 'deep');

      expect(await stageAuxiliaryConfig(checkout, 2, pluginDir)).toEqual([]);
      expect(existsSync(join(testDir, 'work', '.eslintrc'))).toBe(false);
    });

    it('should do nothing when no file exists', async () => {
      expect(await stageAuxiliaryConfig(checkout, 1, pluginDir)).toEqual([]);
      expect(await readdir(join(testDir, 'work'))).toEqual(['plugin-x']);
    });
  });
});
