/**
 * Hook Command
 *
 * PostToolUse entry point registered in settings.json as `plugin-relay hook`.
 * Always exits 0 so a failed lookup never blocks the host.
 */

import { Command } from 'commander';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../core/logging.js';
import { runHook } from '../../hook/hook.js';
import { InterceptResolver } from '../../interception/InterceptResolver.js';
import { configFromOptions, readStdin, withLocationOptions, type LocationOptions } from '../options.js';

const log = createLogger('Hook');

export const hookCommand = withLocationOptions(
  new Command('hook').description('Handle a PostToolUse hook payload from stdin')
).action(async (options: LocationOptions) => {
  try {
    const raw = await readStdin();
    const output = runHook(raw, InterceptResolver.fromConfig(configFromOptions(options)));
    if (output) {
      process.stdout.write(output + '\n');
    }
  } catch (error) {
    log.error(`Hook failed: ${errorMessage(error)}`);
  }
});
