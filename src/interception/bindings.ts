/**
 * Intercept bindings declared in a plugin's .mcp.json.
 *
 * {
 *   "mcpServers": {
 *     "generate-redlined": { "command": "...", "intercepts": ["review-contract"] }
 *   }
 * }
 */

import { join } from 'path';
import { BINDING_FILE, SERVERS_KEY } from '../core/constants.js';
import type { InterceptBinding, JsonObject } from '../core/types.js';
import { isJsonObject, readJsonObject } from '../utils/fs.js';

function readServers(pluginDir: string): JsonObject | null {
  const data = readJsonObject(join(pluginDir, BINDING_FILE));
  if (!data) {
    return null;
  }
  const servers = data[SERVERS_KEY] ?? {};
  return isJsonObject(servers) ? servers : null;
}

function interceptsOf(serverConfig: unknown): string[] | null {
  if (!isJsonObject(serverConfig)) {
    return null;
  }
  const intercepts = serverConfig.intercepts ?? [];
  if (!Array.isArray(intercepts)) {
    return null;
  }
  return intercepts.filter((command): command is string => typeof command === 'string');
}

/**
 * Find the first server (in declaration order) whose intercepts list
 * claims the command. A missing or malformed file is no claim.
 */
export function readIntercepts(pluginDir: string, commandName: string): InterceptBinding | null {
  const servers = readServers(pluginDir);
  if (!servers) {
    return null;
  }

  for (const [serverName, serverConfig] of Object.entries(servers)) {
    const intercepts = interceptsOf(serverConfig);
    if (intercepts && intercepts.includes(commandName)) {
      return { serverName, intercepts };
    }
  }
  return null;
}

/**
 * Every server in the plugin that intercepts at least one command.
 */
export function readBindings(pluginDir: string): InterceptBinding[] {
  const servers = readServers(pluginDir);
  if (!servers) {
    return [];
  }

  const bindings: InterceptBinding[] = [];
  for (const [serverName, serverConfig] of Object.entries(servers)) {
    const intercepts = interceptsOf(serverConfig);
    if (intercepts && intercepts.length > 0) {
      bindings.push({ serverName, intercepts });
    }
  }
  return bindings;
}
