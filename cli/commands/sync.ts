/**
 * Sync commands for revloop CLI
 */
import type { Command } from 'commander';
import { createSyncLoop, getLogger } from '../managers/engine-manager.js';
import { UsageError } from '../lib/errors.js';
import { fail, jsonOut, type JsonOptions } from './helpers.js';

interface StartOptions {
  interval?: string;
  now?: boolean;
}

function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new UsageError(`Invalid interval: ${value}`);
  }
  return seconds;
}

/**
 * Register sync commands
 */
export function registerSyncCommands(program: Command): void {
  const sync = program.command('sync').description('Periodic workspace synchronization');

  // sync:start
  sync.command('start')
    .description('Run the sync loop until interrupted')
    .option('--interval <seconds>', 'Seconds between ticks (default: sync.interval)')
    .option('--now', 'Run the first tick immediately')
    .action(async (options: StartOptions) => {
      try {
        const loop = createSyncLoop({ intervalSeconds: parseInterval(options.interval), runImmediately: options.now });
        const logger = getLogger();

        await new Promise<void>((resolve, reject) => {
          const shutdown = (signal: NodeJS.Signals) => {
            logger.info('Shutting down', { signal });
            loop.stop().then(resolve, reject);
          };
          process.once('SIGINT', shutdown);
          process.once('SIGTERM', shutdown);
          loop.start();
        });
      } catch (error) {
        fail(error);
      }
    });

  // sync:once
  sync.command('once')
    .description('Run a single tick and print its report')
    .option('--json', 'JSON output')
    .action(async (options: JsonOptions) => {
      try {
        const report = await createSyncLoop().tick();
        if (options.json) {
          jsonOut(report);
          return;
        }

        console.log(`Projects: ${report.projects}`);
        console.log(`Pulled:   ${report.pulled}`);
        console.log(`Reviewed: ${report.reviewed}`);
        console.log(`Applied:  ${report.applied}`);
        if (report.failures.length > 0) {
          console.log('\nFailures:');
          for (const failure of report.failures) {
            const where = [failure.project, failure.worktree].filter(Boolean).join(' ');
            console.log(`  [${failure.step}] ${where}: ${failure.error}`);
          }
        }
      } catch (error) {
        fail(error, options.json);
      }
    });
}
