/**
 * PluginLocator - Finds the directory a plugin is installed in.
 *
 * Search order, first hit wins:
 * 1. installed_plugins.json manifest (installPath of the record named after the plugin)
 * 2. Live copy:  <root>/knowledge-work-plugins/<name>/
 * 3. Cache:      <root>/cache/knowledge-work-plugins/<name>/<version>/
 * 4. Marketplaces: <root>/marketplaces/<mp>/plugins/<name>/ then .../external_plugins/<name>/
 */

import { readdirSync } from 'fs';
import { join } from 'path';
import {
  CACHE_DIR,
  MARKETPLACES_DIR,
  MARKETPLACE_PLUGIN_DIRS,
  MANIFEST_FILE,
  PLUGIN_COLLECTION
} from '../core/constants.js';
import { createLogger } from '../core/logging.js';
import type { LocatorOptions } from '../core/types.js';
import { isDirectory, isJsonObject, readJsonObject } from '../utils/fs.js';

const log = createLogger('PluginLocator');

export class PluginLocator {
  private readonly pluginsRoot: string;
  private readonly installedPluginsPath: string;

  constructor(options: LocatorOptions) {
    this.pluginsRoot = options.pluginsRoot;
    this.installedPluginsPath = options.installedPluginsPath ?? join(options.pluginsRoot, MANIFEST_FILE);
  }

  /**
   * Locate a plugin directory by name, or null when no source has it.
   */
  findPluginDir(pluginName: string): string | null {
    const found =
      this.fromManifest(pluginName) ??
      this.fromLiveCopy(pluginName) ??
      this.fromCache(pluginName) ??
      this.fromMarketplaces(pluginName);

    if (found) {
      log.debug(`Resolved '${pluginName}' to ${found}`);
    } else {
      log.debug(`Plugin '${pluginName}' not found under ${this.pluginsRoot}`);
    }
    return found;
  }

  /**
   * A corrupt or missing manifest counts as an empty one.
   */
  private fromManifest(pluginName: string): string | null {
    const manifest = readJsonObject(this.installedPluginsPath);
    if (!manifest) {
      return null;
    }

    for (const entry of Object.values(manifest)) {
      if (!isJsonObject(entry)) {
        continue;
      }
      const { name, installPath } = entry;
      if (name === pluginName && typeof installPath === 'string' && installPath && isDirectory(installPath)) {
        return installPath;
      }
    }
    return null;
  }

  private fromLiveCopy(pluginName: string): string | null {
    const live = join(this.pluginsRoot, PLUGIN_COLLECTION, pluginName);
    return isDirectory(live) ? live : null;
  }

  /**
   * Picks the version directory with the greatest name by string
   * comparison, so "9.0.0" outranks "10.0.0".
   */
  private fromCache(pluginName: string): string | null {
    const cacheParent = join(this.pluginsRoot, CACHE_DIR, PLUGIN_COLLECTION, pluginName);
    const versions = listSubdirectories(cacheParent).sort().reverse();
    return versions.length > 0 ? join(cacheParent, versions[0]) : null;
  }

  private fromMarketplaces(pluginName: string): string | null {
    const marketplacesDir = join(this.pluginsRoot, MARKETPLACES_DIR);

    for (const marketplace of listSubdirectories(marketplacesDir)) {
      for (const pluginsDir of MARKETPLACE_PLUGIN_DIRS) {
        const candidate = join(marketplacesDir, marketplace, pluginsDir, pluginName);
        if (isDirectory(candidate)) {
          return candidate;
        }
      }
    }
    return null;
  }
}

/**
 * Names of the directories inside `dir`, in listing order. Empty when
 * `dir` is missing or unreadable.
 */
export function listSubdirectories(dir: string): string[] {
  if (!isDirectory(dir)) {
    return [];
  }
  try {
    return readdirSync(dir).filter(name => isDirectory(join(dir, name)));
  } catch (error) {
    log.debug(`Cannot list ${dir}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
}
