/**
 * Resolve Command
 *
 * Dry-run of the interception lookup for a qualified skill name.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage } from '../../core/errors.js';
import { InterceptResolver } from '../../interception/InterceptResolver.js';
import { buildSystemMessage } from '../../interception/systemMessage.js';
import { configFromOptions, withLocationOptions, type LocationOptions } from '../options.js';

interface ResolveOptions extends LocationOptions {
  json?: boolean;
  message?: boolean;
}

const NO_MATCH_DESCRIPTIONS = {
  'unqualified': 'not a qualified <plugin>:<command> name',
  'plugin-not-found': 'plugin directory not found',
  'not-intercepted': 'no server intercepts this command'
} as const;

export const resolveCommand = withLocationOptions(
  new Command('resolve')
    .description('Show how a qualified skill name would be intercepted')
    .argument('<skill>', 'Qualified skill name, e.g. legal:review-contract')
    .option('--json', 'Print the match as JSON', false)
    .option('--message', 'Print the systemMessage the hook would emit', false)
).action(async (skill: string, options: ResolveOptions) => {
  const spinner = ora(`Resolving ${skill}...`).start();

  try {
    const outcome = InterceptResolver.fromConfig(configFromOptions(options)).resolve(skill);

    if (outcome.status === 'no-match') {
      spinner.info(`${skill}: ${NO_MATCH_DESCRIPTIONS[outcome.reason]}`);
      process.exitCode = 1;
      return;
    }
    if (outcome.status === 'instruction-missing') {
      spinner.fail(chalk.red(outcome.error.message));
      process.exitCode = 2;
      return;
    }

    const { match } = outcome;
    spinner.succeed(`${skill} is intercepted by ${chalk.cyan(match.serverName)}`);

    if (options.json) {
      console.log(JSON.stringify(match, null, 2));
    } else if (options.message) {
      console.log(buildSystemMessage(match));
    } else {
      console.log();
      console.log(chalk.dim('Tool:'), match.toolName);
      console.log(chalk.dim('Plugin directory:'), match.pluginDir);
      console.log(chalk.dim('Command file:'), match.commandMdPath);
      console.log(chalk.dim('Skills:'), match.skillMdPaths.length > 0 ? match.skillMdPaths.join(', ') : '(none)');
      console.log(
        chalk.dim('Server configured:'),
        match.serverConfigured ? chalk.green('yes') : chalk.yellow('no (not in runtime MCP config)')
      );
    }
  } catch (error) {
    spinner.fail(chalk.red('Resolution failed'));
    console.error(errorMessage(error));
    process.exitCode = 1;
  }
});
