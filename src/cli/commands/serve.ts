/**
 * serve command - Start the A2A agent server
 */

import { Command } from 'commander';
import { loadConfig } from '../../utils/config.js';
import { initErrorTracking, logger } from '../../utils/logger.js';
import { startAgentServer, stopAgentServer } from '../../web/index.js';

const log = logger.child('cli:serve');

interface ServeOptions {
  port?: string;
  host?: string;
  config?: string;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the A2A agent server')
    .option('-p, --port <port>', 'Port to listen on (overrides PORT)')
    .option('-H, --host <host>', 'Host to bind to (overrides HOST)')
    .option('-c, --config <path>', 'Path to a config file')
    .action(async (options: ServeOptions) => {
      try {
        initErrorTracking();

        const config = loadConfig(options.config);
        if (options.port !== undefined) {
          const port = Number.parseInt(options.port, 10);
          if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new Error(`Invalid port: ${options.port}`);
          }
          config.server.port = port;
        }
        if (options.host) {
          config.server.host = options.host;
        }

        const server = await startAgentServer(config);
        const status = server.getStatus();

        console.log(`${config.agent.name} listening on http://${status.host}:${status.port}`);
        console.log('  GET  /a2a/agent-card');
        console.log('  POST /a2a/task');
        console.log('  GET  /a2a/task/:id');
        console.log('  GET  /healthz');

        const shutdown = async (signal: string): Promise<void> => {
          log.info('Shutting down', { signal });
          await stopAgentServer();
          await server.service.drain();
          await logger.flush();
          process.exit(0);
        };

        const onSignal = (signal: string) => () => {
          shutdown(signal).catch((error: unknown) => {
            console.error('Shutdown failed:', error instanceof Error ? error.message : String(error));
            process.exit(1);
          });
        };

        process.once('SIGINT', onSignal('SIGINT'));
        process.once('SIGTERM', onSignal('SIGTERM'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error('Failed to start agent server', { error: message });
        console.error('Error:', message);
        process.exit(1);
      }
    });
}
