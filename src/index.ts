#!/usr/bin/env node
/**
 * Catalog Harvester CLI
 * Commands: crawl, entities, items, candidates, select, status
 */

import { Command } from 'commander';
import { HarvestContext } from './context.js';
import { Harvester, runFullCrawl } from './harvester.js';
import { StageSummary } from './types/index.js';
import { loadConfig } from './utils/config.js';
import { ConfigError, CredentialError, errorMessage } from './utils/errors.js';
import { closeLogger, createLogger, Logger } from './utils/logger.js';
import { captureError, flushSentry, initSentry } from './utils/sentry.js';
import { parseList } from './utils/urls.js';

type GlobalOptions = {
  cookie?: string;
  db?: string;
};

function buildContext(options: GlobalOptions): HarvestContext {
  const config = loadConfig();
  if (options.cookie) config.credentials.cookieFile = options.cookie;
  if (options.db) config.storage.dbPath = options.db;

  const logger = createLogger({ level: config.app.logLevel, logDir: config.app.logDir });
  initSentry({ dsn: config.app.sentryDsn, environment: config.app.sentryEnvironment });
  return { config, logger };
}

/**
 * First SIGINT/SIGTERM asks the running stage to stop after the current unit;
 * a second one exits immediately.
 */
function installStopHandler(logger: Logger): AbortController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn('Second stop request, exiting now', { signal });
      process.exit(130);
    }
    logger.warn('Stop requested, finishing the current unit', { signal });
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return controller;
}

function exitCodeFor(stages: StageSummary[]): number {
  return stages.every((stage) => stage.status === 'completed' || stage.status === 'skipped') ? 0 : 2;
}

/**
 * Runs a command body with a context and open stores, translating failures
 * into exit codes.
 */
async function withHarvester(
  program: Command,
  body: (harvester: Harvester, signal: AbortSignal) => Promise<number>
): Promise<void> {
  let ctx: HarvestContext;
  try {
    ctx = buildContext(program.opts<GlobalOptions>());
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  const { logger } = ctx;
  const controller = installStopHandler(logger);
  let harvester: Harvester | null = null;
  let exitCode = 0;

  try {
    harvester = new Harvester(ctx);
    exitCode = await body(harvester, controller.signal);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof CredentialError) {
      logger.error(error.message);
    } else {
      logger.error('Run failed', {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      captureError(error, { command: program.args[0] });
    }
    exitCode = 1;
  } finally {
    harvester?.close();
    await flushSentry();
    await closeLogger(logger);
  }

  process.exit(exitCode);
}

const program = new Command();

program
  .name('catalog-harvester')
  .description('Resumable three-stage catalog crawler')
  .version('1.0.0')
  .option('--cookie <path>', 'Cookie JSON file (overrides HARVEST_COOKIE_FILE)')
  .option('--db <path>', 'SQLite database file (overrides HARVEST_DB_PATH)');

program
  .command('crawl')
  .description('Run every stage in order, then select the best candidates')
  .option('--entity <names>', 'Comma separated entity names to restrict stages 2 and 3')
  .option('--tags <tags>', 'Comma separated tag filters for child item listings')
  .option('--sort-type <type>', 'Sort type for child item listings')
  .option('--skip-entities', 'Skip the entity stage')
  .option('--skip-items', 'Skip the child item stage')
  .option('--skip-candidates', 'Skip the candidate stage')
  .option('--skip-select', 'Skip candidate selection')
  .action(
    async (options: {
      entity?: string;
      tags?: string;
      sortType?: string;
      skipEntities?: boolean;
      skipItems?: boolean;
      skipCandidates?: boolean;
      skipSelect?: boolean;
    }) => {
      await withHarvester(program, async (harvester, signal) => {
        const scope = parseList(options.entity);
        const needsFetching = !(options.skipEntities && options.skipItems && options.skipCandidates);
        const result = needsFetching
          ? await runFullCrawl(harvester, harvester.coordinator(), {
              ...options,
              scope: scope.length > 0 ? scope : undefined,
              tags: parseList(options.tags),
              signal,
            })
          : { stages: [], selection: options.skipSelect ? null : harvester.select() };
        return exitCodeFor(result.stages);
      });
    }
  );

program
  .command('entities')
  .description('Stage 1: harvest the entity list')
  .action(async () => {
    await withHarvester(program, async (harvester, signal) => {
      const summary = await harvester.coordinator().runEntityStage({ signal });
      return exitCodeFor([summary]);
    });
  });

program
  .command('items')
  .description('Stage 2: harvest child items of every entity')
  .option('--entity <names>', 'Comma separated entity names (ignores the checkpoint)')
  .option('--tags <tags>', 'Comma separated tag filters')
  .option('--sort-type <type>', 'Sort type for the listing')
  .action(async (options: { entity?: string; tags?: string; sortType?: string }) => {
    await withHarvester(program, async (harvester, signal) => {
      const scope = parseList(options.entity);
      const summary = await harvester.coordinator().runChildItemStage({
        scope: scope.length > 0 ? scope : undefined,
        tags: parseList(options.tags),
        sortType: options.sortType,
        signal,
      });
      return exitCodeFor([summary]);
    });
  });

program
  .command('candidates')
  .description('Stage 3: harvest candidates of every stored child item')
  .option('--entity <names>', 'Comma separated entity names (ignores the checkpoint)')
  .action(async (options: { entity?: string }) => {
    await withHarvester(program, async (harvester, signal) => {
      const scope = parseList(options.entity);
      const summary = await harvester.coordinator().runCandidateStage({
        scope: scope.length > 0 ? scope : undefined,
        signal,
      });
      return exitCodeFor([summary]);
    });
  });

program
  .command('select')
  .description('Pick the best candidate per child item into per-entity text files')
  .option('--out <dir>', 'Output directory (overrides HARVEST_PICKS_DIR)')
  .action(async (options: { out?: string }) => {
    await withHarvester(program, async (harvester) => {
      harvester.select(options.out);
      return 0;
    });
  });

program
  .command('status')
  .description('Show checkpoints and stored row counts')
  .action(async () => {
    await withHarvester(program, async (harvester) => {
      const { counts, checkpoints } = harvester.status();
      console.log(JSON.stringify({ counts, checkpoints }, null, 2));
      return 0;
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
