/**
 * Configuration
 *
 * Default configuration and environment variable loading for Plugin Relay.
 */

import { config as loadDotenv } from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { MANIFEST_FILE } from './constants.js';

export interface RelayConfig {
  /** Root of the plugin tree searched by the locator */
  pluginsRoot: string;
  /** Installed-plugins manifest; derived from pluginsRoot when unset */
  installedPluginsPath?: string;
  /** Runtime MCP configuration probed for registered servers */
  mcpConfigPath: string;
  /** Host settings file holding PostToolUse hooks */
  settingsPath: string;
  model: string;
  maxTokens: number;
  debug: boolean;
}

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_MAX_TOKENS = 16384;

/**
 * Load a .env file into process.env. Existing variables win.
 */
export function loadEnvironment(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}

/**
 * Build the configuration from environment variables:
 * - PLUGIN_RELAY_PLUGINS_ROOT: plugin tree (default: ~/.claude/plugins)
 * - PLUGIN_RELAY_INSTALLED_PLUGINS: manifest path (default: <root>/installed_plugins.json)
 * - PLUGIN_RELAY_MCP_CONFIG: runtime MCP config (default: ~/.claude/mcp.json)
 * - PLUGIN_RELAY_SETTINGS: host settings (default: ~/.claude/settings.json)
 * - PLUGIN_RELAY_MODEL / PLUGIN_RELAY_MAX_TOKENS: generation defaults
 * - PLUGIN_RELAY_DEBUG: 'true' enables debug logging
 */
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const claudeDir = join(homedir(), '.claude');

  return {
    pluginsRoot: env.PLUGIN_RELAY_PLUGINS_ROOT || join(claudeDir, 'plugins'),
    installedPluginsPath: env.PLUGIN_RELAY_INSTALLED_PLUGINS || undefined,
    mcpConfigPath: env.PLUGIN_RELAY_MCP_CONFIG || join(claudeDir, 'mcp.json'),
    settingsPath: env.PLUGIN_RELAY_SETTINGS || join(claudeDir, 'settings.json'),
    model: env.PLUGIN_RELAY_MODEL || DEFAULT_MODEL,
    maxTokens: parseInt(env.PLUGIN_RELAY_MAX_TOKENS ?? String(DEFAULT_MAX_TOKENS), 10),
    debug: env.PLUGIN_RELAY_DEBUG === 'true'
  };
}

export function validateConfig(config: RelayConfig): string[] {
  const errors: string[] = [];

  if (!config.pluginsRoot) {
    errors.push('pluginsRoot must not be empty');
  }

  if (!config.mcpConfigPath) {
    errors.push('mcpConfigPath must not be empty');
  }

  if (!Number.isInteger(config.maxTokens) || config.maxTokens <= 0) {
    errors.push('maxTokens must be a positive integer');
  }

  if (!config.model) {
    errors.push('model must not be empty');
  }

  return errors;
}

export function mergeConfig(base: RelayConfig, overrides: Partial<RelayConfig>): RelayConfig {
  return {
    pluginsRoot: overrides.pluginsRoot ?? base.pluginsRoot,
    installedPluginsPath: overrides.installedPluginsPath ?? base.installedPluginsPath,
    mcpConfigPath: overrides.mcpConfigPath ?? base.mcpConfigPath,
    settingsPath: overrides.settingsPath ?? base.settingsPath,
    model: overrides.model ?? base.model,
    maxTokens: overrides.maxTokens ?? base.maxTokens,
    debug: overrides.debug ?? base.debug
  };
}

/**
 * Manifest path for a configuration, falling back to the plugin root.
 */
export function manifestPath(config: Pick<RelayConfig, 'pluginsRoot' | 'installedPluginsPath'>): string {
  return config.installedPluginsPath ?? join(config.pluginsRoot, MANIFEST_FILE);
}
