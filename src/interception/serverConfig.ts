import { SERVERS_KEY } from '../core/constants.js';
import { isJsonObject, readJsonObject } from '../utils/fs.js';

/**
 * Whether the runtime MCP config (normally ~/.claude/mcp.json) registers
 * a server under this name. Any read or shape problem counts as false.
 */
export function isServerConfigured(serverName: string, mcpConfigPath: string): boolean {
  const data = readJsonObject(mcpConfigPath);
  if (!data) {
    return false;
  }

  const servers = data[SERVERS_KEY] ?? {};
  return isJsonObject(servers) && Object.prototype.hasOwnProperty.call(servers, serverName);
}
