/**
 * Read-only report of the hook registration and intercept bindings.
 */

import { join } from 'path';
import { z } from 'zod';
import { HOOK_COMMAND, PLUGIN_COLLECTION, SKILL_TOOL_NAME } from '../core/constants.js';
import { readBindings } from '../interception/bindings.js';
import { listSubdirectories } from '../interception/PluginLocator.js';
import { readJsonFile } from '../utils/fs.js';

const SettingsSchema = z.object({
  hooks: z.object({
    PostToolUse: z.array(z.object({
      matcher: z.string().optional(),
      hooks: z.array(z.object({
        command: z.string().optional()
      }).passthrough()).optional()
    }).passthrough()).optional()
  }).passthrough().optional()
}).passthrough();

export interface BindingStatus {
  plugin: string;
  server: string;
  intercepts: string[];
}

export interface RelayStatus {
  hookInstalled: boolean;
  bindings: BindingStatus[];
}

export interface StatusOptions {
  settingsPath: string;
  pluginsRoot: string;
}

/**
 * Whether settings.json registers the relay hook on Skill calls.
 */
export function isHookInstalled(settingsPath: string): boolean {
  const parsed = SettingsSchema.safeParse(readJsonFile(settingsPath));
  if (!parsed.success) {
    return false;
  }

  const entries = parsed.data.hooks?.PostToolUse ?? [];
  return entries.some(entry =>
    entry.matcher === SKILL_TOOL_NAME &&
    (entry.hooks ?? []).some(hook => (hook.command ?? '').includes(HOOK_COMMAND))
  );
}

/**
 * Intercept bindings of every live plugin copy, ordered by plugin name.
 */
export function listBindings(pluginsRoot: string): BindingStatus[] {
  const collection = join(pluginsRoot, PLUGIN_COLLECTION);

  return listSubdirectories(collection)
    .sort()
    .flatMap(plugin =>
      readBindings(join(collection, plugin)).map(binding => ({
        plugin,
        server: binding.serverName,
        intercepts: binding.intercepts
      }))
    );
}

export function getStatus(options: StatusOptions): RelayStatus {
  return {
    hookInstalled: isHookInstalled(options.settingsPath),
    bindings: listBindings(options.pluginsRoot)
  };
}
