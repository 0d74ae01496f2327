/**
 * forecast command - Run one forecast task locally and print the result
 */

import { Command } from 'commander';
import { loadConfig } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import { FORECAST_TASK_TYPE } from '../../utils/validation.js';
import { TaskService } from '../../tasks/service.js';

const log = logger.child('cli:forecast');

interface ForecastOptions {
  lat: string;
  lon: string;
  hourly?: string;
  daily?: string;
  timezone?: string;
  days?: string;
  pastDays?: string;
  model?: string;
  config?: string;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function buildForecastTask(options: ForecastOptions): Record<string, unknown> {
  const inputs: Record<string, unknown> = {
    latitude: Number(options.lat),
    longitude: Number(options.lon),
  };

  const optional: Record<string, unknown> = {
    hourly: splitList(options.hourly),
    daily: splitList(options.daily),
    timezone: options.timezone,
    forecast_days: toNumber(options.days),
    past_days: toNumber(options.pastDays),
    model: options.model,
  };
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) inputs[key] = value;
  }

  return { type: FORECAST_TASK_TYPE, inputs };
}

export function createForecastCommand(): Command {
  return new Command('forecast')
    .description('Fetch a forecast through the task pipeline and print the task')
    .requiredOption('--lat <latitude>', 'Latitude in degrees')
    .requiredOption('--lon <longitude>', 'Longitude in degrees')
    .option('--hourly <vars>', 'Comma-separated hourly variables')
    .option('--daily <vars>', 'Comma-separated daily variables')
    .option('--timezone <tz>', 'Timezone name')
    .option('--days <n>', 'Forecast days (1-16)')
    .option('--past-days <n>', 'Past days (0-14)')
    .option('--model <name>', 'Weather model')
    .option('-c, --config <path>', 'Path to a config file')
    .action(async (options: ForecastOptions) => {
      const config = loadConfig(options.config);
      const service = new TaskService(config);

      const result = service.submit(buildForecastTask(options));
      if (result.kind === 'input_required') {
        console.error(JSON.stringify(result.body, null, 2));
        process.exitCode = 1;
        return;
      }
      if (result.kind === 'conflict') {
        console.error(`Task ${result.taskId} already exists`);
        process.exitCode = 1;
        return;
      }

      await service.drain();

      const view = service.getView(result.body.task_id);
      if (!view) {
        log.error('Task vanished before completion', { taskId: result.body.task_id });
        process.exitCode = 1;
        return;
      }

      console.log(JSON.stringify(view, null, 2));
      if (view.status !== 'completed') {
        process.exitCode = 1;
      }
    });
}
