#!/usr/bin/env node
/**
 * openmeteo-agent CLI
 */

import { Command } from 'commander';
import { logger } from '../utils/logger.js';
import { createServeCommand, createCardCommand, createForecastCommand } from './commands/index.js';

const VERSION = '1.0.0';

function createProgram(): Command {
  const program = new Command();

  program
    .name('openmeteo-agent')
    .description('A2A agent serving Open-Meteo weather forecasts')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Only log errors')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();

      if (opts.verbose) {
        logger.setLevel('debug');
      } else if (opts.quiet) {
        logger.setLevel('error');
      }
    });

  program.addCommand(createServeCommand(), { isDefault: true });
  program.addCommand(createCardCommand());
  program.addCommand(createForecastCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
