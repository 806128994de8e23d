import { QUALIFIED_NAME_SEPARATOR } from '../core/constants.js';
import type { QualifiedName } from '../core/types.js';

/**
 * Split a qualified skill name into plugin and command.
 *
 * Only the first separator splits, so "org:plugin:command" yields plugin
 * "org" and command "plugin:command". Returns null when either side is empty.
 */
export function parseQualifiedName(skillName: string): QualifiedName | null {
  const index = skillName.indexOf(QUALIFIED_NAME_SEPARATOR);
  if (index === -1) {
    return null;
  }

  const pluginName = skillName.slice(0, index);
  const commandName = skillName.slice(index + QUALIFIED_NAME_SEPARATOR.length);
  if (!pluginName || !commandName) {
    return null;
  }

  return { pluginName, commandName };
}
