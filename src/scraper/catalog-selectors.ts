/**
 * CSS selectors for the catalog source's three page types
 * Primary selectors are tried first, fallbacks cover wrapper/class-order changes
 */

export interface CatalogSelectors {
  /** Entity list page */
  entityPageMarker: string;
  entityCard: string;
  entityLink: string;
  entityName: string;
  /** Child item listing page */
  itemGrid: string[];
  itemLink: string;
  itemCode: string;
  itemTitle: string;
  /** Child item detail page */
  candidateRoot: string;
  candidateAnchor: string;
  candidateUriPrefix: string;
  candidateTagSpans: string;
  candidateSkippedTagClasses: string[];
  candidateSize: string;
  /** Pagination */
  nextPageLink: string;
  nextPageLabels: string[];
}

export const catalogSelectors: CatalogSelectors = {
  // Missing <section> usually means a challenge or login interstitial
  entityPageMarker: 'section',
  entityCard: 'div#actors div.box.actor-box',
  entityLink: 'a[href]',
  entityName: 'strong',

  itemGrid: [
    'body > section > div > div.movie-list.h.cols-4.vcols-8',
    'div.movie-list.h.cols-4.vcols-8',
    'div.movie-list',
  ],
  itemLink: 'a[href]',
  itemCode: 'div.video-title > strong',
  itemTitle: 'div.video-title',

  candidateRoot: '#magnets-content',
  candidateAnchor: 'div.magnet-name.column.is-four-fifths a[href]',
  candidateUriPrefix: 'magnet:',
  candidateTagSpans: 'div span',
  candidateSkippedTagClasses: ['name', 'meta'],
  candidateSize: 'span.meta',

  nextPageLink: 'a[rel="next"][href]',
  nextPageLabels: ['下一頁', '下一页', 'Next'],
};
