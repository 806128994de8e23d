/**
 * PromptBuilder - Assembles the generation prompt for an intercepted command.
 *
 * Reads the command instructions, skills, configuration and source files
 * named by a PluginInvocation and fills them into a template. Unreadable
 * files become inline markers instead of failures.
 */

import { readFileSync } from 'fs';
import { basename, dirname, extname } from 'path';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/logging.js';
import type { PluginInvocation, SourceReader } from '../core/types.js';
import { createDefaultSourceReaders } from './sourceReaders.js';

const log = createLogger('PromptBuilder');

export const PROMPT_TEMPLATE = `A user has invoked the "{command_name}" command.

## Command Instructions

{command_md_content}

## Expert Skills

{skills_md_content}

## Configuration

{config_content}

## Source Material

{source_content}

## Additional Context

{supplemental_content}

## Output Requirements

{output_requirements}
`;

export const SECTION_SEPARATOR = '\n\n---\n\n';

export type PromptValues = Record<
  | 'command_name'
  | 'command_md_content'
  | 'skills_md_content'
  | 'config_content'
  | 'source_content'
  | 'supplemental_content'
  | 'output_requirements',
  string
>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeReadFailure(path: string, error: unknown): string {
  if (isMissingFile(error)) {
    log.warn(`File not found: ${path}`);
    return `[File not found: ${path}]`;
  }
  log.warn(`Error reading ${path}: ${errorMessage(error)}`);
  return `[Error reading ${path}: ${errorMessage(error)}]`;
}

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left as written.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}

function joinSections(sections: string[], placeholder: string): string {
  return sections.length > 0 ? sections.join(SECTION_SEPARATOR) : placeholder;
}

export class PromptBuilder {
  private readonly sourceReaders: ReadonlyMap<string, SourceReader>;

  /**
   * @param sourceReaders - extension (".docx") to reader table for source files
   */
  constructor(sourceReaders: ReadonlyMap<string, SourceReader> = createDefaultSourceReaders()) {
    this.sourceReaders = new Map(
      [...sourceReaders].map(([extension, reader]): [string, SourceReader] => [extension.toLowerCase(), reader])
    );
  }

  build(invocation: PluginInvocation, outputRequirements: string, template: string = PROMPT_TEMPLATE): string {
    return fillTemplate(template, this.collectValues(invocation, outputRequirements));
  }

  collectValues(invocation: PluginInvocation, outputRequirements: string): PromptValues {
    const skills = invocation.skillMdPaths.map(
      (path, i) => `### Skill ${i + 1}: ${basename(dirname(path))}\n\n${this.readFile(path)}`
    );

    const configs = invocation.configPaths.map(
      path => `### ${basename(path)}\n\n${this.readFile(path)}`
    );

    const sources = [
      ...invocation.sourcePaths.map(path => `### ${basename(path)}\n\n${this.readSource(path)}`),
      ...invocation.sourceTexts.map((text, i) => `### Inline text ${i + 1}\n\n${text}`)
    ];

    return {
      command_name: invocation.commandName,
      command_md_content: this.readFile(invocation.commandMdPath),
      skills_md_content: joinSections(skills, 'No skills specified.'),
      config_content: joinSections(configs, 'No configuration provided.'),
      source_content: joinSections(sources, 'No source material provided.'),
      supplemental_content: invocation.supplemental
        ? JSON.stringify(invocation.supplemental, null, 2)
        : 'No additional context provided.',
      output_requirements: outputRequirements
    };
  }

  private readFile(path: string): string {
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      return describeReadFailure(path, error);
    }
  }

  /**
   * Read a source file with the reader registered for its extension,
   * falling back to plain text.
   */
  private readSource(path: string): string {
    const reader = this.sourceReaders.get(extname(path).toLowerCase());
    if (!reader) {
      return this.readFile(path);
    }
    try {
      return reader(path);
    } catch (error) {
      return describeReadFailure(path, error);
    }
  }
}
