/**
 * Record Extractor
 * Turns catalog page HTML into typed records for each level of the catalog.
 * All methods are pure over their input; a missing container yields an empty
 * result plus a diagnostic instead of an exception.
 */

import * as cheerio from 'cheerio';
import {
  CandidateRecord,
  ChildItemRecord,
  EntityRecord,
  Extraction,
} from '../types/index.js';
import { resolveUrl } from '../utils/urls.js';
import { CatalogSelectors, catalogSelectors } from './catalog-selectors.js';

export interface CatalogExtractor {
  extractEntities(html: string): Extraction<EntityRecord>;
  extractChildItems(html: string): Extraction<ChildItemRecord>;
  extractCandidates(html: string): Extraction<CandidateRecord>;
  extractNextPageUrl(html: string): string | null;
}

export class RecordExtractor implements CatalogExtractor {
  constructor(
    private readonly baseUrl: string,
    private readonly selectors: CatalogSelectors = catalogSelectors
  ) {}

  extractEntities(html: string): Extraction<EntityRecord> {
    const $ = cheerio.load(html);
    const diagnostics: string[] = [];

    if ($(this.selectors.entityPageMarker).length === 0) {
      diagnostics.push(
        `No <${this.selectors.entityPageMarker}> found; the page is probably a challenge or login interstitial`
      );
    }

    const records: EntityRecord[] = [];
    $(this.selectors.entityCard).each((_, card) => {
      const $card = $(card);
      const $link = $card.find(this.selectors.entityLink).first();
      const href = $link.length ? resolveUrl($link.attr('href') ?? '', this.baseUrl) : null;

      // Name usually lives in <strong>, fall back to the link text
      const $name = $card.find(this.selectors.entityName).first();
      const name = ($name.length ? $name.text() : $link.text()).trim();

      if (href && name) {
        records.push({ kind: 'entity', key: name, href });
      }
    });

    return { records, diagnostics };
  }

  extractChildItems(html: string): Extraction<ChildItemRecord> {
    const $ = cheerio.load(html);

    const gridSelector = this.selectors.itemGrid.find((selector) => $(selector).length > 0);
    if (!gridSelector) {
      return {
        records: [],
        diagnostics: [`Child item grid not found (tried ${this.selectors.itemGrid.join(' | ')})`],
      };
    }

    const records: ChildItemRecord[] = [];
    $(gridSelector)
      .first()
      .children('div')
      .each((_, card) => {
        const $link = $(card).find(this.selectors.itemLink).first();
        if ($link.length === 0) return;

        const href = resolveUrl($link.attr('href') ?? '', this.baseUrl);
        const code = $link.find(this.selectors.itemCode).first().text().trim();
        // Title text segments joined by single spaces
        let title = code;
        const $title = $link.find(this.selectors.itemTitle).first().clone();
        if ($title.length) {
          $title.find('*').each((_, el) => {
            $(el).prepend(' ').append(' ');
          });
          title = $title.text().replace(/\s+/g, ' ').trim();
        }

        if (code && href) {
          records.push({ kind: 'child-item', code, title, href });
        }
      });

    return { records, diagnostics: [] };
  }

  extractCandidates(html: string): Extraction<CandidateRecord> {
    const $ = cheerio.load(html);
    const { candidateUriPrefix: prefix } = this.selectors;

    const $root = $(this.selectors.candidateRoot).first();
    if ($root.length === 0) {
      return {
        records: [],
        diagnostics: [`${this.selectors.candidateRoot} not found (blocked page or layout change)`],
      };
    }

    const anchorSelector = `a[href^='${prefix}']`;
    const found: CandidateRecord[] = [];

    $root.children('div').each((_, entry) => {
      const $entry = $(entry);
      let $anchor = $entry.find(this.selectors.candidateAnchor).filter(`[href^='${prefix}']`).first();
      if ($anchor.length === 0) {
        $anchor = $entry.find(anchorSelector).first();
      }
      if ($anchor.length === 0) return;

      const uri = ($anchor.attr('href') ?? '').trim();
      if (!uri.startsWith(prefix)) return;

      const tags: string[] = [];
      $anchor.find(this.selectors.candidateTagSpans).each((_, span) => {
        const $span = $(span);
        const classes = ($span.attr('class') ?? '').split(/\s+/);
        if (classes.some((cls) => this.selectors.candidateSkippedTagClasses.includes(cls))) return;
        const text = $span.text().trim();
        if (text) tags.push(text);
      });

      const sizeText = $anchor.find(this.selectors.candidateSize).first().text().trim();
      found.push({ kind: 'candidate', uri, tags, sizeText });
    });

    // Unknown entry layout: keep the bare links
    if (found.length === 0) {
      $root.find(anchorSelector).each((_, anchor) => {
        const uri = ($(anchor).attr('href') ?? '').trim();
        if (uri) found.push({ kind: 'candidate', uri, tags: [], sizeText: '' });
      });
    }

    const seen = new Set<string>();
    const records = found.filter((record) => {
      if (seen.has(record.uri)) return false;
      seen.add(record.uri);
      return true;
    });

    return { records, diagnostics: [] };
  }

  extractNextPageUrl(html: string): string | null {
    const $ = cheerio.load(html);

    let $next = $(this.selectors.nextPageLink).first();
    if ($next.length === 0) {
      $next = $('a[href]')
        .filter((_, anchor) => {
          const text = $(anchor).text();
          return this.selectors.nextPageLabels.some((label) => text.includes(label));
        })
        .first();
    }

    const href = $next.attr('href');
    return href ? resolveUrl(href, this.baseUrl) : null;
  }
}

