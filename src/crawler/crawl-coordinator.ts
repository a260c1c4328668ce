/**
 * Crawl Coordinator
 * Drives the three crawl stages and their checkpoint state machine.
 *
 * Per stage: NotStarted -> InProgress (a checkpoint exists) -> Completed
 * (checkpoint removed, one history record appended).
 *
 * Ordering rule for every unit of work: write the data first, then advance the
 * checkpoint. A unit that fails with a transport error is skipped, and from
 * then on the checkpoint stays at that unit so a restart retries it. Any other
 * error (storage, programming) propagates and ends the run.
 */

import { HarvestContext } from '../context.js';
import { CatalogStore } from '../database/catalog-store.js';
import { CheckpointStore } from '../database/checkpoint-store.js';
import { HistoryLog } from '../database/history-log.js';
import { CatalogExtractor } from '../scraper/record-extractor.js';
import { PageFetcher } from '../scraper/page-fetcher.js';
import {
  ChildItemRecord,
  ChildItemRow,
  CredentialBundle,
  Cursor,
  DelayRange,
  EntityRow,
  StageName,
  StageStatus,
  StageSummary,
} from '../types/index.js';
import { politeDelay } from '../utils/delay.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { addBreadcrumb, captureError } from '../utils/sentry.js';
import { buildListingUrl } from '../utils/urls.js';
import { harvestPages } from './paginated-harvest.js';

export interface CrawlCoordinatorDeps {
  fetcher: PageFetcher;
  extractor: CatalogExtractor;
  catalog: CatalogStore;
  checkpoints: CheckpointStore;
  history: HistoryLog;
  credentials: CredentialBundle;
  /** Politeness sleep between fetches; defaults to a jittered delay */
  wait?: (range: DelayRange) => Promise<void>;
}

export interface StageRunOptions {
  /** Explicit entity names; bypasses the shared checkpoint */
  scope?: string[];
  /** Stop request, honored between units of work */
  signal?: AbortSignal;
}

export interface ChildItemStageOptions extends StageRunOptions {
  /** Tag filters appended to each entity listing URL as `t` */
  tags?: string[];
  sortType?: string;
}

interface StagePlan {
  entities: EntityRow[];
  scoped: boolean;
  startIndex: number;
  /** Stage 3 only: items of the entity at startIndex already completed */
  startItem: number;
}

/**
 * Tracks one stage run: counters, failures and whether the checkpoint may
 * still advance.
 */
class StageRun {
  readonly failures: StageSummary['failures'] = [];
  readonly stats: Record<string, number>;
  units = 0;
  aborted = false;

  constructor(
    readonly stage: StageName,
    readonly scoped: boolean,
    counters: readonly string[]
  ) {
    this.stats = Object.fromEntries(counters.map((name) => [name, 0]));
  }

  add(counter: string, amount = 1): void {
    this.stats[counter] = (this.stats[counter] ?? 0) + amount;
  }

  /** Checkpoints only move while no unit has failed and the run is unscoped */
  get canAdvance(): boolean {
    return !this.scoped && this.failures.length === 0;
  }
}

export class CrawlCoordinator {
  private readonly logger: Logger;
  private readonly wait: (range: DelayRange) => Promise<void>;

  constructor(
    private readonly ctx: HarvestContext,
    private readonly deps: CrawlCoordinatorDeps
  ) {
    this.logger = ctx.logger;
    this.wait = deps.wait ?? politeDelay;
  }

  // --- Stage 1: entities ------------------------------------------------

  /**
   * Harvests the full entity list. One page is one unit of work: its entities
   * are upserted, then the checkpoint moves to the next page.
   */
  async runEntityStage(options: Pick<StageRunOptions, 'signal'> = {}): Promise<StageSummary> {
    const stage: StageName = 'entities';
    const { baseUrl, entityListPath } = this.ctx.config.source;
    const run = new StageRun(stage, false, ['pages', 'entities_found', 'entities_written']);

    let startUrl = new URL(entityListPath, `${baseUrl}/`).toString();
    let pageOffset = 0;
    const checkpoint = this.deps.checkpoints.load(stage);
    if (checkpoint && typeof checkpoint.cursor.next_url === 'string') {
      startUrl = checkpoint.cursor.next_url;
      pageOffset = Math.max(Number(checkpoint.cursor.page ?? 1) - 1, 0);
      this.logger.info('Resuming entity stage from checkpoint', {
        nextUrl: startUrl,
        page: pageOffset + 1,
        updatedAt: checkpoint.updated_at,
      });
    }

    this.logger.info('Starting entity stage', { startUrl });

    let truncated = false;
    try {
      const result = await harvestPages({
        startUrl,
        credentials: this.deps.credentials,
        fetcher: this.deps.fetcher,
        extract: (html) => this.deps.extractor.extractEntities(html),
        nextPageUrl: (html) => this.deps.extractor.extractNextPageUrl(html),
        logger: this.logger,
        delay: this.ctx.config.crawl.delay,
        maxPages: this.ctx.config.crawl.maxPages,
        signal: options.signal,
        wait: this.wait,
        onPage: (page) => {
          const written = this.deps.catalog.upsertEntities(page.records);
          run.units++;
          run.add('pages');
          run.add('entities_found', page.records.length);
          run.add('entities_written', written);

          if (page.nextUrl) {
            this.deps.checkpoints.save(stage, {
              next_url: page.nextUrl,
              page: pageOffset + page.pageNumber + 1,
            });
          }
        },
      });
      run.aborted = result.aborted;
      truncated = result.truncated;
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      this.recordFailure(run, error.url, error);
    }

    if (truncated) {
      this.logger.warn('Entity stage hit the page limit; the next run continues from the checkpoint');
      return this.finish(run, 'incomplete');
    }
    return this.finish(run);
  }

  // --- Stage 2: child items ---------------------------------------------

  /**
   * For each entity, harvests its listing newest-first until an already
   * stored item is reached, then upserts the new items. One entity is one
   * unit of work. A listing cut off by the page limit counts as a failed
   * unit and stores nothing, so the next run walks it again from page one.
   */
  async runChildItemStage(options: ChildItemStageOptions = {}): Promise<StageSummary> {
    const stage: StageName = 'child_items';
    const tags = options.tags ?? [];
    const entities = this.deps.catalog.listEntities();
    if (entities.length === 0) {
      this.logger.warn('No entities stored yet, run the entity stage first');
      return this.skipped(stage, Boolean(options.scope?.length));
    }

    const plan = this.planStage(stage, entities, options.scope);
    if (!plan) return this.skipped(stage, true);

    const run = new StageRun(stage, plan.scoped, ['entities', 'items_found', 'items_written']);
    if (tags.length > 0 || options.sortType !== undefined) {
      this.logger.info('Listing filters in effect', { tags, sortType: options.sortType });
    }

    let fetched = 0;

    for (let index = plan.startIndex; index < plan.entities.length; index++) {
      if (options.signal?.aborted) {
        run.aborted = true;
        break;
      }

      const entity = plan.entities[index];
      this.logger.info(`Processing entity ${index + 1}/${plan.entities.length}`, { entity: entity.name });

      if (!entity.href) {
        this.logger.warn('Entity has no listing URL, skipping', { entity: entity.name });
      } else {
        if (fetched > 0) {
          await this.wait(this.ctx.config.crawl.delay);
        }
        fetched++;

        try {
          const known = this.deps.catalog.knownChildItemKeys(entity.id);
          const result = await harvestPages<ChildItemRecord>({
            startUrl: buildListingUrl(this.ctx.config.source.baseUrl, entity.href, tags, options.sortType),
            credentials: this.deps.credentials,
            fetcher: this.deps.fetcher,
            extract: (html) => this.deps.extractor.extractChildItems(html),
            nextPageUrl: (html) => this.deps.extractor.extractNextPageUrl(html),
            logger: this.logger,
            delay: this.ctx.config.crawl.delay,
            maxPages: this.ctx.config.crawl.maxPages,
            knownKeys: known,
            keyOf: (item) => item.code,
            earlyStop: this.ctx.config.crawl.earlyStop,
            wait: this.wait,
          });

          if (result.truncated) {
            this.recordTruncation(run, entity.name, result.pages);
            continue;
          }

          const written = this.deps.catalog.upsertChildItems(entity.id, result.records);
          run.add('items_found', result.records.length);
          run.add('items_written', written);
          this.logger.info('Stored child items', {
            entity: entity.name,
            found: result.records.length,
            written,
            known: known.size,
          });
        } catch (error) {
          if (!(error instanceof TransportError)) throw error;
          this.recordFailure(run, entity.name, error);
          continue;
        }
      }

      run.units++;
      run.add('entities');
      if (run.canAdvance) {
        this.deps.checkpoints.save(stage, { entity_index: index + 1, entity_key: entity.name });
      }
    }

    return this.finish(run);
  }

  // --- Stage 3: candidates ----------------------------------------------

  /**
   * Fetches every stored child item's page and replaces its candidate
   * snapshot. One child item is one unit of work; a resumed run also skips
   * the completed items inside the entity it stopped in.
   */
  async runCandidateStage(options: StageRunOptions = {}): Promise<StageSummary> {
    const stage: StageName = 'candidates';
    const grouped = this.deps.catalog.allChildItemsGroupedByEntity();
    if (grouped.size === 0) {
      this.logger.warn('No child items stored yet, run the child item stage first');
      return this.skipped(stage, Boolean(options.scope?.length));
    }

    const entities = [...grouped.values()].map((group) => group.entity);
    const plan = this.planStage(stage, entities, options.scope, (entity) => grouped.get(entity.name)?.items ?? []);
    if (!plan) return this.skipped(stage, true);

    const run = new StageRun(stage, plan.scoped, [
      'entities',
      'items',
      'candidates_written',
      'items_without_candidates',
    ]);
    let fetched = 0;

    entityLoop: for (let index = plan.startIndex; index < plan.entities.length; index++) {
      const entity = plan.entities[index];
      const items = grouped.get(entity.name)?.items ?? [];
      const firstItem = index === plan.startIndex ? plan.startItem : 0;
      this.logger.info(`Processing entity ${index + 1}/${plan.entities.length}`, {
        entity: entity.name,
        items: items.length,
        skipping: firstItem,
      });

      for (let itemIndex = firstItem; itemIndex < items.length; itemIndex++) {
        if (options.signal?.aborted) {
          run.aborted = true;
          break entityLoop;
        }

        const item = items[itemIndex];
        const unit = `${entity.name}/${item.code}`;
        if (!item.href) {
          this.logger.warn('Child item has no URL, skipping', { unit });
        } else {
          if (fetched > 0) {
            await this.wait(this.ctx.config.crawl.delay);
          }
          fetched++;

          try {
            this.storeCandidates(run, unit, item, await this.deps.fetcher.fetchPage(item.href, this.deps.credentials));
          } catch (error) {
            if (!(error instanceof TransportError)) throw error;
            this.recordFailure(run, unit, error);
            continue;
          }
        }

        run.units++;
        run.add('items');
        if (run.canAdvance) {
          this.deps.checkpoints.save(stage, {
            entity_index: index,
            entity_key: entity.name,
            item_index: itemIndex + 1,
            item_key: item.code,
          });
        }
      }
      run.add('entities');
    }

    return this.finish(run);
  }

  private storeCandidates(run: StageRun, unit: string, item: ChildItemRow, html: string): void {
    const extraction = this.deps.extractor.extractCandidates(html);
    for (const diagnostic of extraction.diagnostics) {
      this.logger.warn('Extraction diagnostic', { unit, diagnostic });
    }

    const written = this.deps.catalog.replaceCandidates(item.id, extraction.records);
    run.add('candidates_written', written);
    if (written === 0) {
      run.add('items_without_candidates');
      this.logger.warn('No candidates found', { unit });
    } else {
      this.logger.info('Stored candidates', { unit, written });
    }
  }

  // --- Shared state machine helpers -------------------------------------

  /**
   * Decides which entities a stage works on and where it starts.
   * A scope filter always starts fresh and ignores the checkpoint.
   * Returns null when a scope filter matches nothing.
   */
  private planStage(
    stage: StageName,
    entities: EntityRow[],
    scope: string[] | undefined,
    itemsOf?: (entity: EntityRow) => ChildItemRow[]
  ): StagePlan | null {
    if (scope && scope.length > 0) {
      const wanted = new Set(scope);
      const selected = entities.filter((entity) => wanted.has(entity.name));
      const present = new Set(selected.map((entity) => entity.name));
      const missing = scope.filter((name) => !present.has(name));

      if (selected.length === 0) {
        this.logger.warn('None of the requested entities are stored', { stage, requested: scope });
        return null;
      }
      if (missing.length > 0) {
        this.logger.warn('Some requested entities are not stored and will be skipped', { stage, missing });
      }
      this.logger.info('Running stage for selected entities only', { stage, entities: selected.map((e) => e.name) });
      return { entities: selected, scoped: true, startIndex: 0, startItem: 0 };
    }

    const checkpoint = this.deps.checkpoints.load(stage);
    if (!checkpoint) {
      return { entities, scoped: false, startIndex: 0, startItem: 0 };
    }

    const position = itemsOf
      ? this.resumeWithinEntity(entities, checkpoint.cursor, itemsOf)
      : this.resumeAfterEntity(entities, checkpoint.cursor);

    if (!position) {
      this.logger.warn('Checkpoint does not match the stored entities, starting from the beginning', {
        stage,
        cursor: checkpoint.cursor,
      });
      return { entities, scoped: false, startIndex: 0, startItem: 0 };
    }

    this.logger.info('Resuming from checkpoint', {
      stage,
      entity: entities[position.startIndex]?.name ?? null,
      entityIndex: position.startIndex,
      itemIndex: position.startItem,
      updatedAt: checkpoint.updated_at,
    });
    return { entities, scoped: false, ...position };
  }

  /** Stage 2 cursor: `entity_key` is the last completed entity */
  private resumeAfterEntity(
    entities: EntityRow[],
    cursor: Cursor
  ): Pick<StagePlan, 'startIndex' | 'startItem'> | null {
    const index = Number(cursor.entity_index);
    const key = cursor.entity_key;
    if (!Number.isInteger(index) || index < 0 || typeof key !== 'string') return null;

    if (entities[index - 1]?.name === key) {
      return { startIndex: index, startItem: 0 };
    }
    const found = entities.findIndex((entity) => entity.name === key);
    return found === -1 ? null : { startIndex: found + 1, startItem: 0 };
  }

  /** Stage 3 cursor: `entity_key` is the entity in progress, `item_index` its completed items */
  private resumeWithinEntity(
    entities: EntityRow[],
    cursor: Cursor,
    itemsOf: (entity: EntityRow) => ChildItemRow[]
  ): Pick<StagePlan, 'startIndex' | 'startItem'> | null {
    const index = Number(cursor.entity_index);
    const itemIndex = Number(cursor.item_index ?? 0);
    const key = cursor.entity_key;
    if (!Number.isInteger(index) || index < 0 || !Number.isInteger(itemIndex) || typeof key !== 'string') {
      return null;
    }

    const entityIndex = entities[index]?.name === key ? index : entities.findIndex((entity) => entity.name === key);
    if (entityIndex === -1) return null;

    // Items may have been added since; re-anchor on the last completed code
    const items = itemsOf(entities[entityIndex]);
    const itemKey = cursor.item_key;
    let startItem = Math.min(Math.max(itemIndex, 0), items.length);
    if (typeof itemKey === 'string' && startItem > 0 && items[startItem - 1]?.code !== itemKey) {
      const found = items.findIndex((item) => item.code === itemKey);
      startItem = found === -1 ? 0 : found + 1;
    }
    return { startIndex: entityIndex, startItem };
  }

  private recordFailure(run: StageRun, unit: string, error: TransportError): void {
    run.failures.push({ unit, error: errorMessage(error) });
    this.logger.error('Unit failed, continuing with the next one', {
      stage: run.stage,
      unit,
      url: error.url,
      status: error.status,
      error: error.message,
    });
    captureError(error, { stage: run.stage, unit, url: error.url });
  }

  private recordTruncation(run: StageRun, unit: string, pages: number): void {
    const maxPages = this.ctx.config.crawl.maxPages;
    run.failures.push({ unit, error: `Listing has more than ${maxPages} pages` });
    this.logger.warn('Listing hit the page limit, nothing stored for this entity; raise HARVEST_MAX_PAGES', {
      stage: run.stage,
      unit,
      pages,
      maxPages,
    });
  }

  private finish(run: StageRun, forced?: StageStatus): StageSummary {
    let status: StageStatus;
    if (forced) {
      status = forced;
    } else if (run.aborted) {
      status = 'aborted';
    } else if (run.failures.length > 0) {
      status = 'incomplete';
    } else {
      status = 'completed';
    }

    if (status === 'completed') {
      if (!run.scoped) {
        this.deps.checkpoints.clear(run.stage);
      }
      this.deps.history.append(run.stage, run.stats, { scoped: run.scoped });
    }

    const summary: StageSummary = {
      stage: run.stage,
      status,
      scoped: run.scoped,
      units: run.units,
      failures: run.failures,
      stats: run.stats,
    };

    const meta = { stage: run.stage, units: run.units, failures: run.failures.length, ...run.stats };
    addBreadcrumb({
      category: 'stage',
      message: `${run.stage} ${status}`,
      level: status === 'completed' ? 'info' : 'warning',
      data: meta,
    });
    if (status === 'completed') {
      this.logger.info('Stage completed', meta);
    } else {
      this.logger.warn(`Stage ${status}; re-run to resume from the checkpoint`, meta);
    }
    return summary;
  }

  private skipped(stage: StageName, scoped: boolean): StageSummary {
    return { stage, status: 'skipped', scoped, units: 0, failures: [], stats: {} };
  }
}
