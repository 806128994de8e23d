import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from './logging.js';

describe('createLogger', () => {
  const originalDebug = process.env.PLUGIN_RELAY_DEBUG;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    delete process.env.PLUGIN_RELAY_DEBUG;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.PLUGIN_RELAY_DEBUG;
    } else {
      process.env.PLUGIN_RELAY_DEBUG = originalDebug;
    }
  });

  it('should tag info lines with the component', () => {
    createLogger('Locator').info('Resolved legal');

    expect(console.error).toHaveBeenCalledWith('[Locator] Resolved legal');
  });

  it('should add the level to warnings and errors', () => {
    const log = createLogger('Locator');
    log.warn('Slow scan');
    log.error('Scan failed', 'details');

    expect(console.error).toHaveBeenNthCalledWith(1, '[Locator] WARN Slow scan');
    expect(console.error).toHaveBeenNthCalledWith(2, '[Locator] ERROR Scan failed', 'details');
  });

  it('should suppress debug lines unless enabled', () => {
    const log = createLogger('Locator');
    log.debug('hidden');

    process.env.PLUGIN_RELAY_DEBUG = 'true';
    log.debug('shown');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('[Locator] DEBUG shown');
  });

  it('should redact secrets in messages and details', () => {
    createLogger('Executor').error('Call failed with ANTHROPIC_API_KEY=test-secret', 'token: "test-secret-value"');

    expect(console.error).toHaveBeenCalledWith(
      '[Executor] ERROR Call failed with ANTHROPIC_API_KEY=***REDACTED***',
      'token: "***REDACTED***"'
    );
  });
});
