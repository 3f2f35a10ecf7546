/**
 * Reference Rate Collector
 *
 * Usage:
 *   collector latest
 *   collector backfill <dir> [--no-archive]
 */

import {
  logger,
  config,
  newRunContext,
  runWithContextAsync,
  writeMetricsFile,
} from '@ratekeeper/shared';
import { createRunnerDeps, runBackfill, runLatest } from './lib/runner';

type Command =
  | { name: 'latest' }
  | { name: 'backfill'; directory: string; archive: boolean };

const USAGE = 'Usage: collector latest | collector backfill <dir> [--no-archive]';

export function parseArgs(argv: readonly string[]): Command | null {
  const flags = argv.filter((arg) => arg.startsWith('--'));
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const [command = 'latest', directory] = positional;

  if (command === 'latest' && positional.length <= 1 && flags.length === 0) {
    return { name: 'latest' };
  }

  if (
    command === 'backfill' &&
    directory &&
    positional.length === 2 &&
    flags.every((flag) => flag === '--no-archive')
  ) {
    return { name: 'backfill', directory, archive: !flags.includes('--no-archive') };
  }

  return null;
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (!command) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const context = newRunContext();
  await runWithContextAsync(context, async () => {
    try {
      const deps = createRunnerDeps();
      if (command.name === 'latest') {
        await runLatest(deps);
      } else {
        const summary = await runBackfill(command.directory, { archive: command.archive }, deps);
        if (summary.processed === 0 && summary.failed > 0) {
          process.exitCode = 1;
        }
      }
    } catch (error) {
      logger.error('Run failed', error, { command: command.name });
      process.exitCode = 1;
    } finally {
      if (config.metricsFile) {
        await writeMetricsFile(config.metricsFile);
      }
    }
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Unhandled error', error);
    process.exitCode = 1;
  });
}
