/**
 * card command - Print the agent card
 */

import { Command } from 'commander';
import { loadConfig } from '../../utils/config.js';
import { buildAgentCard } from '../../agent/card.js';

export function createCardCommand(): Command {
  return new Command('card')
    .description('Print the agent card as JSON')
    .option('-c, --config <path>', 'Path to a config file')
    .action((options: { config?: string }) => {
      const config = loadConfig(options.config);
      console.log(JSON.stringify(buildAgentCard(config.agent), null, 2));
    });
}
