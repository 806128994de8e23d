/**
 * Instruction file resolution.
 *
 * Expected structure:
 *   <pluginDir>/
 *     commands/<command>.md
 *     skills/<skill>/SKILL.md
 */

import { join, resolve } from 'path';
import { COMMANDS_DIR, SKILL_FILE, SKILLS_DIR } from '../core/constants.js';
import { InstructionFileMissingError } from '../core/errors.js';
import type { ResolvedPaths } from '../core/types.js';
import { isFile } from '../utils/fs.js';
import { listSubdirectories } from './PluginLocator.js';

/**
 * Resolve the command markdown and skill markdown paths of a plugin.
 * Skill directories are visited by name; those without SKILL.md are skipped.
 *
 * @throws InstructionFileMissingError when commands/<command>.md is absent
 */
export function resolvePaths(pluginDir: string, commandName: string): ResolvedPaths {
  const commandMd = join(pluginDir, COMMANDS_DIR, `${commandName}.md`);
  if (!isFile(commandMd)) {
    throw new InstructionFileMissingError(resolve(commandMd));
  }

  const skillsDir = join(pluginDir, SKILLS_DIR);
  const skillMdPaths = listSubdirectories(skillsDir)
    .sort()
    .map(skill => join(skillsDir, skill, SKILL_FILE))
    .filter(isFile)
    .map(skillMd => resolve(skillMd));

  return { commandMdPath: resolve(commandMd), skillMdPaths };
}
