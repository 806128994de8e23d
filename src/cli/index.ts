#!/usr/bin/env node
/**
 * Plugin Relay CLI
 *
 * Command-line interface for plugin command interception.
 */

import { Command } from 'commander';
import { loadEnvironment } from '../core/config.js';
import { extractCommand } from './commands/extract.js';
import { hookCommand } from './commands/hook.js';
import { resolveCommand } from './commands/resolve.js';
import { statusCommand } from './commands/status.js';

loadEnvironment();

const program = new Command();

program
  .name('plugin-relay')
  .description('Route intercepted plugin commands to their MCP servers')
  .version('0.1.0');

program.addCommand(hookCommand);
program.addCommand(resolveCommand);
program.addCommand(extractCommand);
program.addCommand(statusCommand);

await program.parseAsync();
