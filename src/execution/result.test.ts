import { describe, it, expect } from 'vitest';
import type { PluginResult } from '../core/types.js';
import { serializePluginResult } from './result.js';

const result: PluginResult = {
  markdown: 'Summary',
  structuredData: { risk: 'low' },
  outputPaths: ['/out/review.docx'],
  metadata: {
    model: 'test-model',
    inputTokens: 10,
    outputTokens: 20,
    elapsedSeconds: 1.5,
    commandName: 'review-contract'
  },
  success: true
};

describe('serializePluginResult', () => {
  it('should render the tool response fields', () => {
    expect(JSON.parse(serializePluginResult(result))).toEqual({
      success: true,
      markdown: 'Summary',
      output_paths: ['/out/review.docx'],
      structured_data: { risk: 'low' },
      metadata: {
        model: 'test-model',
        input_tokens: 10,
        output_tokens: 20,
        elapsed_seconds: 1.5,
        command_name: 'review-contract'
      },
      error_message: null
    });
  });

  it('should report a result with an error message as unsuccessful', () => {
    const parsed = JSON.parse(serializePluginResult({ ...result, errorMessage: 'Post-processing error: disk full' }));

    expect(parsed.success).toBe(false);
    expect(parsed.error_message).toBe('Post-processing error: disk full');
  });

  it('should omit unset metadata and keep extra keys', () => {
    const parsed = JSON.parse(serializePluginResult({
      ...result,
      metadata: { elapsedSeconds: 0.25, pages: 3 }
    }));

    expect(parsed.metadata).toEqual({ elapsed_seconds: 0.25, pages: 3 });
  });

  it('should indent with two spaces', () => {
    expect(serializePluginResult(result).split('\n')[1]).toBe('  "success": true,');
  });
});
