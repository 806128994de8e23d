/**
 * Parameters of the delegated execute_plugin_command tool.
 *
 * The agent is told to pass path lists and context as JSON text, so every
 * list and object field accepts either the decoded value or its JSON encoding.
 */

import { z } from 'zod';
import { InvalidInvocationError } from '../core/errors.js';
import type { PluginInvocation } from '../core/types.js';

function jsonEncoded<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => {
    if (typeof value !== 'string') {
      return value;
    }
    try {
      return JSON.parse(value);
    } catch {
      // Left as a string so the schema reports the type mismatch
      return value;
    }
  }, schema);
}

const PathList = jsonEncoded(z.array(z.string()));

export const ExecutePluginCommandInputSchema = z.object({
  command_name: z.string().min(1).describe('Name of the intercepted command'),
  command_md_path: z.string().min(1).describe('Absolute path to the command instruction file'),
  skill_md_paths: PathList.optional().describe('JSON array of skill SKILL.md paths'),
  source_paths: PathList.optional().describe('JSON array of source file paths from the user'),
  config_paths: PathList.optional().describe('JSON array of playbook/config files'),
  source_texts: PathList.optional().describe('JSON array of raw texts to analyze'),
  supplemental: jsonEncoded(z.record(z.unknown())).optional().describe('JSON object with gathered context'),
  model: z.string().min(1).optional().describe('Model override'),
  max_tokens: z.number().int().positive().optional().describe('Maximum response tokens'),
  output_path: z.string().min(1).optional().describe('Where post-processing writes output files'),
  plugin_name: z.string().min(1).optional().describe('Plugin the command belongs to')
});

export type ExecutePluginCommandInput = z.infer<typeof ExecutePluginCommandInputSchema>;

/**
 * Validate tool arguments and convert them to a PluginInvocation.
 *
 * @throws InvalidInvocationError listing every schema issue
 */
export function parseInvocation(args: unknown): PluginInvocation {
  const parsed = ExecutePluginCommandInputSchema.safeParse(args);
  if (!parsed.success) {
    throw new InvalidInvocationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const input = parsed.data;
  const supplemental = input.supplemental && Object.keys(input.supplemental).length > 0
    ? input.supplemental
    : undefined;

  return {
    commandName: input.command_name,
    commandMdPath: input.command_md_path,
    skillMdPaths: input.skill_md_paths ?? [],
    configPaths: input.config_paths ?? [],
    sourcePaths: input.source_paths ?? [],
    sourceTexts: input.source_texts ?? [],
    supplemental,
    model: input.model,
    maxTokens: input.max_tokens,
    outputPath: input.output_path,
    pluginName: input.plugin_name
  };
}
