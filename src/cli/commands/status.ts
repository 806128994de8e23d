/**
 * Status Command
 *
 * Display hook registration and intercept bindings.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '../../core/errors.js';
import { getStatus } from '../../status/status.js';
import { configFromOptions, withLocationOptions, type LocationOptions } from '../options.js';

interface StatusCommandOptions extends LocationOptions {
  json?: boolean;
}

export const statusCommand = withLocationOptions(
  new Command('status')
    .description('Show hook and intercept binding status')
    .option('--json', 'Print the status as JSON', false)
).action(async (options: StatusCommandOptions) => {
  const spinner = ora('Scanning plugins...').start();

  try {
    const config = configFromOptions(options);
    const status = getStatus({ settingsPath: config.settingsPath, pluginsRoot: config.pluginsRoot });
    spinner.succeed('Status gathered');

    if (options.json) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    console.log();
    console.log(chalk.dim('Hook installed:'), status.hookInstalled ? chalk.green('yes') : chalk.yellow('no'));
    if (status.bindings.length === 0) {
      console.log(chalk.dim('No intercept bindings found'));
      return;
    }
    console.log(chalk.cyan('Intercept bindings:'));
    for (const binding of status.bindings) {
      console.log(`  ${binding.plugin} -> ${binding.server}: ${binding.intercepts.join(', ')}`);
    }
  } catch (error) {
    spinner.fail(chalk.red('Failed to gather status'));
    console.error(errorMessage(error));
    process.exitCode = 1;
  }
});
