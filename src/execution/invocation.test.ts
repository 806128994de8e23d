import { describe, it, expect } from 'vitest';
import { InvalidInvocationError } from '../core/errors.js';
import { parseInvocation } from './invocation.js';

describe('parseInvocation', () => {
  it('should accept the required fields alone', () => {
    expect(parseInvocation({
      command_name: 'review-contract',
      command_md_path: '/plugins/legal/commands/review-contract.md'
    })).toEqual({
      commandName: 'review-contract',
      commandMdPath: '/plugins/legal/commands/review-contract.md',
      skillMdPaths: [],
      configPaths: [],
      sourcePaths: [],
      sourceTexts: [],
      supplemental: undefined,
      model: undefined,
      maxTokens: undefined,
      outputPath: undefined,
      pluginName: undefined
    });
  });

  it('should decode JSON-encoded lists and objects', () => {
    const invocation = parseInvocation({
      command_name: 'review-contract',
      command_md_path: '/c.md',
      skill_md_paths: '["/skills/a/SKILL.md"]',
      source_paths: '["/docs/contract.docx"]',
      config_paths: ['/docs/playbook.md'],
      supplemental: '{"party": "buyer", "deadline": "Friday"}'
    });

    expect(invocation.skillMdPaths).toEqual(['/skills/a/SKILL.md']);
    expect(invocation.sourcePaths).toEqual(['/docs/contract.docx']);
    expect(invocation.configPaths).toEqual(['/docs/playbook.md']);
    expect(invocation.supplemental).toEqual({ party: 'buyer', deadline: 'Friday' });
  });

  it('should pass through optional overrides', () => {
    const invocation = parseInvocation({
      command_name: 'review-contract',
      command_md_path: '/c.md',
      model: 'test-model',
      max_tokens: 2048,
      output_path: '/out',
      plugin_name: 'legal'
    });

    expect(invocation.model).toBe('test-model');
    expect(invocation.maxTokens).toBe(2048);
    expect(invocation.outputPath).toBe('/out');
    expect(invocation.pluginName).toBe('legal');
  });

  it('should drop an empty supplemental object', () => {
    const invocation = parseInvocation({
      command_name: 'review-contract',
      command_md_path: '/c.md',
      supplemental: {}
    });

    expect(invocation.supplemental).toBeUndefined();
  });

  it('should list missing required fields', () => {
    expect(() => parseInvocation({ command_md_path: '/c.md' })).toThrow(
      'Invalid plugin invocation: command_name: Required'
    );
  });

  it('should reject a list that is not valid JSON', () => {
    let caught: unknown;
    try {
      parseInvocation({ command_name: 'review', command_md_path: '/c.md', skill_md_paths: 'not json' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidInvocationError);
    if (caught instanceof InvalidInvocationError) {
      expect(caught.issues).toEqual(['skill_md_paths: Expected array, received string']);
    }
  });

  it('should reject arguments that are not an object', () => {
    expect(() => parseInvocation('review')).toThrow(
      'Invalid plugin invocation: (root): Expected object, received string'
    );
  });

  it('should reject a non-positive token limit', () => {
    expect(() => parseInvocation({ command_name: 'review', command_md_path: '/c.md', max_tokens: 0 }))
      .toThrow(InvalidInvocationError);
  });
});
