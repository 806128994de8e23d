/**
 * InterceptResolver - Decides whether a skill invocation is claimed by an MCP server.
 *
 * Flow: parse name → locate plugin → read intercepts → resolve paths → probe
 * runtime config → frozen InterceptMatch.
 *
 * Misses are values, never exceptions. A missing instruction file is
 * reported separately so callers can surface the misconfiguration.
 */

import { resolve as absolutePath } from 'path';
import { toolNameForServer } from '../core/constants.js';
import { InstructionFileMissingError } from '../core/errors.js';
import { manifestPath, type RelayConfig } from '../core/config.js';
import { createLogger } from '../core/logging.js';
import type { InterceptMatch, LocatorOptions, ResolutionOutcome, ResolvedPaths } from '../core/types.js';
import { readIntercepts } from './bindings.js';
import { parseQualifiedName } from './parse.js';
import { resolvePaths } from './paths.js';
import { PluginLocator } from './PluginLocator.js';
import { isServerConfigured } from './serverConfig.js';

const log = createLogger('InterceptResolver');

export interface InterceptResolverOptions extends LocatorOptions {
  /** Runtime MCP config probed for the claiming server */
  mcpConfigPath: string;
}

export class InterceptResolver {
  private readonly locator: PluginLocator;
  private readonly mcpConfigPath: string;

  constructor(options: InterceptResolverOptions) {
    this.locator = new PluginLocator(options);
    this.mcpConfigPath = options.mcpConfigPath;
  }

  static fromConfig(config: RelayConfig): InterceptResolver {
    return new InterceptResolver({
      pluginsRoot: config.pluginsRoot,
      installedPluginsPath: manifestPath(config),
      mcpConfigPath: config.mcpConfigPath
    });
  }

  /**
   * Resolve a qualified skill name (e.g. "legal:review-contract").
   */
  resolve(skillName: string): ResolutionOutcome {
    const parsed = parseQualifiedName(skillName);
    if (!parsed) {
      return { status: 'no-match', reason: 'unqualified' };
    }
    const { pluginName, commandName } = parsed;

    const pluginDir = this.locator.findPluginDir(pluginName);
    if (!pluginDir) {
      return { status: 'no-match', reason: 'plugin-not-found' };
    }

    const binding = readIntercepts(pluginDir, commandName);
    if (!binding) {
      log.debug(`No server intercepts '${commandName}' in ${pluginDir}`);
      return { status: 'no-match', reason: 'not-intercepted' };
    }

    let paths: ResolvedPaths;
    try {
      paths = resolvePaths(pluginDir, commandName);
    } catch (error) {
      if (error instanceof InstructionFileMissingError) {
        return { status: 'instruction-missing', error };
      }
      throw error;
    }

    const match: InterceptMatch = Object.freeze({
      pluginName,
      commandName,
      serverName: binding.serverName,
      toolName: toolNameForServer(binding.serverName),
      pluginDir: absolutePath(pluginDir),
      commandMdPath: paths.commandMdPath,
      skillMdPaths: Object.freeze([...paths.skillMdPaths]),
      serverConfigured: isServerConfigured(binding.serverName, this.mcpConfigPath)
    });

    log.debug(`'${skillName}' intercepted by ${match.serverName} (configured: ${match.serverConfigured})`);
    return { status: 'matched', match };
  }

  /**
   * Convenience wrapper: the match, or null for every other outcome.
   */
  findIntercept(skillName: string): InterceptMatch | null {
    const outcome = this.resolve(skillName);
    return outcome.status === 'matched' ? outcome.match : null;
  }
}
