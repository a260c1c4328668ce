/**
 * Paginated Harvest
 * Walks a paginated listing forward and collects the records it has not seen.
 *
 * Precondition: the source lists records newest-first. With early stop enabled
 * the first already-known record means everything after it is known too, so
 * the walk ends there. Sources that cannot guarantee this ordering should run
 * with `earlyStop: false`, which skips known records instead.
 */

import { CatalogRecord, CredentialBundle, DelayRange, Extraction } from '../types/index.js';
import { politeDelay } from '../utils/delay.js';
import { Logger } from '../utils/logger.js';
import { PageFetcher } from '../scraper/page-fetcher.js';

export interface HarvestedPage<T> {
  url: string;
  pageNumber: number;
  /** New records accepted from this page */
  records: T[];
  /** Page the walk continues with, or null when this page is the last one */
  nextUrl: string | null;
}

export interface HarvestPagesOptions<T extends CatalogRecord> {
  startUrl: string;
  credentials: CredentialBundle;
  fetcher: PageFetcher;
  extract: (html: string) => Extraction<T>;
  nextPageUrl: (html: string) => string | null;
  logger: Logger;
  delay: DelayRange;
  /** Keys already stored; required together with keyOf */
  knownKeys?: ReadonlySet<string>;
  keyOf?: (record: T) => string;
  /** Stop at the first known record (default: true) */
  earlyStop?: boolean;
  /** Safety limit on pages fetched in one walk (default: 500) */
  maxPages?: number;
  /** Checked before every fetch; an aborted signal ends the walk */
  signal?: AbortSignal;
  /** Runs after each page is accepted, before the next fetch */
  onPage?: (page: HarvestedPage<T>) => void | Promise<void>;
  /** Sleep between page fetches; defaults to a jittered delay within `delay` */
  wait?: (range: DelayRange) => Promise<void>;
}

export interface HarvestPagesResult<T> {
  records: T[];
  pages: number;
  /** True when the walk ended on a known record */
  stoppedEarly: boolean;
  /** True when the page limit ended the walk while a next page existed */
  truncated: boolean;
  /** True when the signal ended the walk while a next page existed */
  aborted: boolean;
}

/**
 * Fetch errors are not retried: they propagate to the caller, which decides
 * whether the unit of work is skipped.
 */
export async function harvestPages<T extends CatalogRecord>(
  options: HarvestPagesOptions<T>
): Promise<HarvestPagesResult<T>> {
  const { logger, fetcher, credentials } = options;
  const knownKeys = options.knownKeys ?? new Set<string>();
  const keyOf = options.keyOf;
  const earlyStop = options.earlyStop ?? true;
  const maxPages = options.maxPages ?? 500;
  const wait = options.wait ?? politeDelay;

  const records: T[] = [];
  const visited = new Set<string>();
  let url: string | null = options.startUrl;
  let pages = 0;
  let stoppedEarly = false;
  let truncated = false;
  let aborted = false;

  while (url) {
    if (options.signal?.aborted) {
      logger.warn('Traversal aborted', { nextUrl: url });
      aborted = true;
      break;
    }
    if (pages >= maxPages) {
      logger.warn('Page limit reached, ending traversal', { maxPages, nextUrl: url });
      truncated = true;
      break;
    }
    if (pages > 0) {
      await wait(options.delay);
    }

    visited.add(url);
    pages++;
    logger.info(`Fetching page ${pages}`, { url });

    const html = await fetcher.fetchPage(url, credentials);
    const extraction = options.extract(html);
    for (const diagnostic of extraction.diagnostics) {
      logger.warn('Extraction diagnostic', { url, diagnostic });
    }

    const accepted: T[] = [];
    for (const record of extraction.records) {
      if (keyOf && knownKeys.has(keyOf(record))) {
        if (earlyStop) {
          stoppedEarly = true;
          break;
        }
        continue;
      }
      accepted.push(record);
    }
    records.push(...accepted);

    logger.info(`Parsed page ${pages}`, {
      url,
      extracted: extraction.records.length,
      accepted: accepted.length,
    });

    let nextUrl: string | null = null;
    if (stoppedEarly) {
      logger.info('Reached an already-known record, stopping pagination', { url });
    } else {
      const candidate = options.nextPageUrl(html);
      if (candidate && candidate !== url && !visited.has(candidate)) {
        nextUrl = candidate;
      } else if (candidate) {
        logger.warn('Next page link points to an already visited page, stopping', { url, nextUrl: candidate });
      }
    }

    if (options.onPage) {
      await options.onPage({ url, pageNumber: pages, records: accepted, nextUrl });
    }
    url = nextUrl;
  }

  logger.info('Traversal finished', { startUrl: options.startUrl, pages, records: records.length, stoppedEarly });
  return { records, pages, stoppedEarly, truncated, aborted };
}
