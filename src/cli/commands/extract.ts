/**
 * Extract Command
 *
 * Split a saved generation response into markdown and structured data.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { errorMessage } from '../../core/errors.js';
import { extractStructuredResponse } from '../../extraction/ResponseExtractor.js';
import { readStdin } from '../options.js';

export const extractCommand = new Command('extract')
  .description('Extract the JSON payload from a generated response')
  .argument('[file]', 'Response file (reads stdin when omitted)')
  .option('--json', 'Print markdown and structured data as one JSON object', false)
  .action(async (file: string | undefined, options: { json?: boolean }) => {
    try {
      const text = file ? readFileSync(file, 'utf-8') : await readStdin();
      const { markdown, structuredData } = extractStructuredResponse(text);

      if (options.json) {
        console.log(JSON.stringify({ markdown, structured_data: structuredData }, null, 2));
        return;
      }

      console.log(markdown);
      console.log();
      console.log(chalk.dim('─'.repeat(40)));
      console.log(structuredData ? JSON.stringify(structuredData, null, 2) : chalk.yellow('No structured data found'));
    } catch (error) {
      console.error(chalk.red(`Extraction failed: ${errorMessage(error)}`));
      process.exitCode = 1;
    }
  });
