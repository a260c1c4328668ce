import { HarvestContext } from './context.js';
import { CrawlCoordinator, ChildItemStageOptions } from './crawler/crawl-coordinator.js';
import { CatalogStore } from './database/catalog-store.js';
import { CheckpointStore } from './database/checkpoint-store.js';
import { openCatalogDatabase } from './database/client.js';
import { HistoryLog } from './database/history-log.js';
import { PageFetcher, HttpPageFetcher } from './scraper/page-fetcher.js';
import { CatalogExtractor, RecordExtractor } from './scraper/record-extractor.js';
import { runSelection, SelectionSummary } from './selector/candidate-selector.js';
import { CatalogCounts, CheckpointDocument, CredentialBundle, StageSummary } from './types/index.js';
import { loadCredentials } from './utils/credentials.js';

/**
 * Stores opened for one command. Close when the command is done.
 */
export class Harvester {
  readonly catalog: CatalogStore;
  readonly checkpoints: CheckpointStore;
  readonly history: HistoryLog;

  constructor(private readonly ctx: HarvestContext, catalog?: CatalogStore) {
    const { storage } = ctx.config;
    this.catalog = catalog ?? new CatalogStore(openCatalogDatabase({ dbPath: storage.dbPath, logger: ctx.logger }));
    this.checkpoints = new CheckpointStore(storage.checkpointFile, ctx.logger);
    this.history = new HistoryLog(storage.historyFile);
  }

  /**
   * Builds a coordinator. Credentials are read here, so commands that never
   * fetch (select, status) run without a cookie file.
   */
  coordinator(overrides: { fetcher?: PageFetcher; extractor?: CatalogExtractor; credentials?: CredentialBundle } = {}): CrawlCoordinator {
    const { config, logger } = this.ctx;
    const credentials =
      overrides.credentials ??
      loadCredentials(
        config.credentials.cookieFile,
        { required: config.credentials.requiredCookies, recommended: config.credentials.recommendedCookies },
        logger
      );

    return new CrawlCoordinator(this.ctx, {
      fetcher: overrides.fetcher ?? new HttpPageFetcher(this.ctx),
      extractor: overrides.extractor ?? new RecordExtractor(config.source.baseUrl),
      catalog: this.catalog,
      checkpoints: this.checkpoints,
      history: this.history,
      credentials,
    });
  }

  select(outputDir = this.ctx.config.storage.picksDir): SelectionSummary {
    return runSelection(this.catalog, outputDir, this.ctx.logger);
  }

  status(): { counts: CatalogCounts; checkpoints: CheckpointDocument } {
    return { counts: this.catalog.counts(), checkpoints: this.checkpoints.all() };
  }

  close(): void {
    this.catalog.close();
  }
}

export interface FullCrawlOptions extends ChildItemStageOptions {
  skipEntities?: boolean;
  skipItems?: boolean;
  skipCandidates?: boolean;
  skipSelect?: boolean;
  picksDir?: string;
}

export interface FullCrawlResult {
  stages: StageSummary[];
  selection: SelectionSummary | null;
}

/**
 * Runs the stages in order, then the selector. Stops after a stage that was
 * aborted; an incomplete stage does not stop the later ones.
 */
export async function runFullCrawl(
  harvester: Harvester,
  coordinator: CrawlCoordinator,
  options: FullCrawlOptions = {}
): Promise<FullCrawlResult> {
  const stages: StageSummary[] = [];
  const { signal, scope } = options;

  const steps: Array<[boolean | undefined, () => Promise<StageSummary>]> = [
    [options.skipEntities, () => coordinator.runEntityStage({ signal })],
    [
      options.skipItems,
      () => coordinator.runChildItemStage({ scope, signal, tags: options.tags, sortType: options.sortType }),
    ],
    [options.skipCandidates, () => coordinator.runCandidateStage({ scope, signal })],
  ];

  for (const [skip, run] of steps) {
    if (skip) continue;
    const summary = await run();
    stages.push(summary);
    if (summary.status === 'aborted') {
      return { stages, selection: null };
    }
  }

  const selection = options.skipSelect ? null : harvester.select(options.picksDir);
  return { stages, selection };
}
