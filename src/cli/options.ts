/**
 * Options shared by commands that read the plugin tree.
 */

import { Command } from 'commander';
import { getDefaultConfig, mergeConfig, validateConfig, type RelayConfig } from '../core/config.js';

export interface LocationOptions {
  pluginsRoot?: string;
  installedPlugins?: string;
  mcpConfig?: string;
  settings?: string;
}

export function withLocationOptions(command: Command): Command {
  return command
    .option('--plugins-root <path>', 'Plugin tree root (default: ~/.claude/plugins)')
    .option('--installed-plugins <path>', 'installed_plugins.json manifest')
    .option('--mcp-config <path>', 'Runtime MCP config (default: ~/.claude/mcp.json)')
    .option('--settings <path>', 'Host settings file (default: ~/.claude/settings.json)');
}

/**
 * Environment defaults overlaid with command-line locations.
 *
 * @throws Error when the resulting configuration is invalid
 */
export function configFromOptions(options: LocationOptions): RelayConfig {
  const config = mergeConfig(getDefaultConfig(), {
    pluginsRoot: options.pluginsRoot,
    installedPluginsPath: options.installedPlugins,
    mcpConfigPath: options.mcpConfig,
    settingsPath: options.settings
  });

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return config;
}

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
