/**
 * Candidate Selector
 * Offline pass over stored candidates: picks at most one artifact per child
 * item and appends the picks to one text file per entity.
 */

import { existsSync, mkdirSync, readFileSync, appendFileSync } from 'fs';
import path from 'path';
import { CatalogStore, deserializeTags } from '../database/catalog-store.js';
import { CandidateRow } from '../types/index.js';
import { Logger } from '../utils/logger.js';
import { sanitizeFilename } from '../utils/urls.js';

/** Tags that make a candidate preferable among equally sized ones */
export const PRIORITY_KEYWORDS: ReadonlySet<string> = new Set(['高清', '字幕']);

const SIZE_PATTERN = /([\d.]+)\s*GB/i;

/**
 * Size in GB from free-form text such as "3.5GB, 12個文件".
 * Returns null when no size is present or the number is malformed.
 */
export function parseSizeGb(text: string | null): number | null {
  if (!text) return null;
  const match = SIZE_PATTERN.exec(text);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

export function countKeywordHits(tags: readonly string[], keywords: ReadonlySet<string> = PRIORITY_KEYWORDS): number {
  return tags.filter((tag) => keywords.has(tag)).length;
}

/**
 * Largest size wins, then most keyword hits, then the earliest candidate.
 * Candidates without a parsable size are never picked.
 */
export function pickBestCandidate(candidates: readonly CandidateRow[]): CandidateRow | null {
  let best: CandidateRow | null = null;
  let bestSize = -1;
  let bestHits = -1;

  for (const candidate of candidates) {
    const size = parseSizeGb(candidate.size_text);
    if (size === null) continue;

    const hits = countKeywordHits(deserializeTags(candidate.tags));
    if (size > bestSize || (size === bestSize && hits > bestHits)) {
      best = candidate;
      bestSize = size;
      bestHits = hits;
    }
  }

  return best;
}

export interface SelectionSummary {
  entities: number;
  picked: number;
  added: number;
}

interface PicksFile {
  lines: Set<string>;
  /** Whether appending needs a line break first */
  openLine: boolean;
}

function readPicksFile(filePath: string): PicksFile {
  if (!existsSync(filePath)) return { lines: new Set(), openLine: false };
  const content = readFileSync(filePath, 'utf-8');
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return { lines: new Set(lines), openLine: content.length > 0 && !content.endsWith('\n') };
}

/**
 * File name for an entity that no other entity of this run has claimed.
 * Names are compared case-insensitively; a clash gets `_2`, `_3`, ...
 */
function claimFileName(entityName: string, claimed: Set<string>): string {
  const base = sanitizeFilename(entityName, 'entity');
  let name = base;
  for (let suffix = 2; claimed.has(name.toLowerCase()); suffix++) {
    name = `${base}_${suffix}`;
  }
  claimed.add(name.toLowerCase());
  return `${name}.txt`;
}

/**
 * Writes the best pick of every child item to `<outputDir>/<entity>.txt`.
 * Picks already in the file are not written again, so re-runs only append
 * what is new. Within an entity the picks follow ascending item code.
 * Entities whose sanitized names clash are suffixed in entity name order.
 */
export function runSelection(catalog: CatalogStore, outputDir: string, logger: Logger): SelectionSummary {
  const grouped = catalog.groupedCandidatesByEntityAndItem();
  const summary: SelectionSummary = { entities: 0, picked: 0, added: 0 };

  if (grouped.size === 0) {
    logger.warn('No stored candidates to select from');
    return summary;
  }

  mkdirSync(outputDir, { recursive: true });
  const claimed = new Set<string>();

  for (const [entityName, items] of grouped) {
    const fileName = claimFileName(entityName, claimed);
    const picks: string[] = [];
    const codes = [...items.keys()].sort();
    for (const code of codes) {
      const best = pickBestCandidate(items.get(code) ?? []);
      if (best && !picks.includes(best.uri)) {
        picks.push(best.uri);
      }
    }

    summary.entities++;
    summary.picked += picks.length;
    if (picks.length === 0) {
      logger.debug('No selectable candidates', { entity: entityName });
      continue;
    }

    const filePath = path.join(outputDir, fileName);
    const existing = readPicksFile(filePath);
    const fresh = picks.filter((uri) => !existing.lines.has(uri));

    if (fresh.length > 0) {
      appendFileSync(filePath, `${existing.openLine ? '\n' : ''}${fresh.join('\n')}\n`, 'utf-8');
    }

    summary.added += fresh.length;
    logger.info('Selected candidates', { entity: entityName, picked: picks.length, added: fresh.length, file: filePath });
  }

  logger.info('Selection finished', { ...summary });
  return summary;
}
