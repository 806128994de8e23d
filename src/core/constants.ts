/**
 * Core Constants
 *
 * Fixed names of the on-disk plugin layout and the interception protocol.
 */

/** Separator between plugin and command in a qualified skill name */
export const QUALIFIED_NAME_SEPARATOR = ':';

/** Collection directory that holds live and cached plugin copies */
export const PLUGIN_COLLECTION = 'knowledge-work-plugins';

export const CACHE_DIR = 'cache';
export const MARKETPLACES_DIR = 'marketplaces';

/**
 * Subdirectories of a marketplace checked for a plugin, in order
 */
export const MARKETPLACE_PLUGIN_DIRS = ['plugins', 'external_plugins'] as const;

export const MANIFEST_FILE = 'installed_plugins.json';

/** Per-plugin binding file declaring which servers intercept which commands */
export const BINDING_FILE = '.mcp.json';

/** Key holding the server mapping in both binding and runtime config files */
export const SERVERS_KEY = 'mcpServers';

export const COMMANDS_DIR = 'commands';
export const SKILLS_DIR = 'skills';
export const SKILL_FILE = 'SKILL.md';

export const TOOL_NAME_PREFIX = 'mcp__';
export const TOOL_NAME_SUFFIX = '__execute_plugin_command';

/**
 * Derive the tool name a host exposes for a server's command executor.
 */
export function toolNameForServer(serverName: string): string {
  return `${TOOL_NAME_PREFIX}${serverName}${TOOL_NAME_SUFFIX}`;
}

/** Tool whose invocations the PostToolUse hook inspects */
export const SKILL_TOOL_NAME = 'Skill';

/** Command string the hook is registered under in settings.json */
export const HOOK_COMMAND = 'plugin-relay hook';

/**
 * Headings and separators that may precede a JSON object in a generated
 * response. Checked in this order.
 */
export const STRUCTURED_DATA_MARKERS = [
  '## Structured Data',
  '## JSON Output',
  '## Structured JSON',
  '## JSON',
  '---\n\n{'
] as const;
