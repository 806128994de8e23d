import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { PluginLocator, listSubdirectories } from './PluginLocator.js';
import {
  createTempDir,
  makeTreeDir,
  removeTempDir,
  writeTreeFile,
  writeTreeJson
} from '../testing/tempTree.js';

describe('PluginLocator', () => {
  let root: string;
  let locator: PluginLocator;

  beforeEach(() => {
    root = createTempDir();
    locator = new PluginLocator({ pluginsRoot: root });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('manifest', () => {
    it('should prefer the manifest installPath over every other location', () => {
      const installed = makeTreeDir(root, 'elsewhere/legal');
      makeTreeDir(root, 'knowledge-work-plugins/legal');
      writeTreeJson(root, 'installed_plugins.json', {
        'legal@market': { name: 'legal', installPath: installed }
      });

      expect(locator.findPluginDir('legal')).toBe(installed);
    });

    it('should skip records whose installPath does not exist', () => {
      writeTreeJson(root, 'installed_plugins.json', {
        'legal@market': { name: 'legal', installPath: join(root, 'missing') }
      });
      const live = makeTreeDir(root, 'knowledge-work-plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(live);
    });

    it('should ignore records for other plugins', () => {
      const other = makeTreeDir(root, 'elsewhere/finance');
      writeTreeJson(root, 'installed_plugins.json', {
        'finance@market': { name: 'finance', installPath: other }
      });

      expect(locator.findPluginDir('legal')).toBeNull();
    });

    it('should treat a malformed manifest as empty', () => {
      writeTreeFile(root, 'installed_plugins.json', '{not json');
      const live = makeTreeDir(root, 'knowledge-work-plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(live);
    });

    it('should read the manifest from an explicit path', () => {
      const installed = makeTreeDir(root, 'elsewhere/legal');
      const manifest = writeTreeJson(root, 'config/plugins.json', {
        legal: { name: 'legal', installPath: installed }
      });
      const custom = new PluginLocator({ pluginsRoot: root, installedPluginsPath: manifest });

      expect(custom.findPluginDir('legal')).toBe(installed);
    });
  });

  describe('live copy and cache', () => {
    it('should find the live copy', () => {
      const live = makeTreeDir(root, 'knowledge-work-plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(live);
    });

    it('should prefer the live copy over the cache', () => {
      const live = makeTreeDir(root, 'knowledge-work-plugins/legal');
      makeTreeDir(root, 'cache/knowledge-work-plugins/legal/1.0.0');

      expect(locator.findPluginDir('legal')).toBe(live);
    });

    it('should pick the greatest cached version', () => {
      makeTreeDir(root, 'cache/knowledge-work-plugins/legal/1.0.0');
      const latest = makeTreeDir(root, 'cache/knowledge-work-plugins/legal/2.0.0');

      expect(locator.findPluginDir('legal')).toBe(latest);
    });

    it('should compare cached versions as strings', () => {
      const nine = makeTreeDir(root, 'cache/knowledge-work-plugins/legal/9.0.0');
      makeTreeDir(root, 'cache/knowledge-work-plugins/legal/10.0.0');

      expect(locator.findPluginDir('legal')).toBe(nine);
    });

    it('should ignore files in the cache directory', () => {
      writeTreeFile(root, 'cache/knowledge-work-plugins/legal/README', 'notes');

      expect(locator.findPluginDir('legal')).toBeNull();
    });
  });

  describe('marketplaces', () => {
    it('should find a plugin under plugins/', () => {
      const dir = makeTreeDir(root, 'marketplaces/official/plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(dir);
    });

    it('should find a plugin under external_plugins/', () => {
      const dir = makeTreeDir(root, 'marketplaces/official/external_plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(dir);
    });

    it('should prefer plugins/ over external_plugins/ in the same marketplace', () => {
      const dir = makeTreeDir(root, 'marketplaces/official/plugins/legal');
      makeTreeDir(root, 'marketplaces/official/external_plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(dir);
    });

    it('should prefer the cache over marketplaces', () => {
      const cached = makeTreeDir(root, 'cache/knowledge-work-plugins/legal/1.0.0');
      makeTreeDir(root, 'marketplaces/official/plugins/legal');

      expect(locator.findPluginDir('legal')).toBe(cached);
    });
  });

  it('should return null when no location has the plugin', () => {
    expect(locator.findPluginDir('legal')).toBeNull();
  });

  it('should return null for a missing plugins root', () => {
    const missing = new PluginLocator({ pluginsRoot: join(root, 'does-not-exist') });

    expect(missing.findPluginDir('legal')).toBeNull();
  });
});

describe('listSubdirectories', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should list directories and skip files', () => {
    makeTreeDir(root, 'beta');
    makeTreeDir(root, 'alpha');
    writeTreeFile(root, 'notes.txt', 'text');

    expect(listSubdirectories(root).sort()).toEqual(['alpha', 'beta']);
  });

  it('should return an empty list for a missing directory', () => {
    expect(listSubdirectories(join(root, 'missing'))).toEqual([]);
  });

  it('should return an empty list for a file', () => {
    const file = writeTreeFile(root, 'notes.txt', 'text');

    expect(listSubdirectories(file)).toEqual([]);
  });
});
