// Database Models
export interface EntityRow {
  id: number;
  name: string;
  href: string | null;
}

export interface ChildItemRow {
  id: number;
  entity_id: number;
  code: string;
  title: string | null;
  href: string | null;
}

export interface CandidateRow {
  id: number;
  child_item_id: number;
  uri: string;
  tags: string | null;
  size_text: string | null;
}

export interface CatalogCounts {
  entities: number;
  childItems: number;
  candidates: number;
}

// Extracted Records
export interface EntityRecord {
  kind: 'entity';
  key: string;
  href: string;
}

export interface ChildItemRecord {
  kind: 'child-item';
  code: string;
  title: string;
  href: string;
}

export interface CandidateRecord {
  kind: 'candidate';
  uri: string;
  tags: string[];
  sizeText: string;
}

export type CatalogRecord = EntityRecord | ChildItemRecord | CandidateRecord;

/**
 * Output of a record extractor. Diagnostics describe anomalies such as a
 * missing list container; they never abort a stage.
 */
export interface Extraction<T extends CatalogRecord> {
  records: T[];
  diagnostics: string[];
}

// Credentials
export type CredentialBundle = Readonly<Record<string, string>>;

// Checkpoints & History
export type StageName = 'entities' | 'child_items' | 'candidates';

export type CursorValue = string | number;
export type Cursor = Record<string, CursorValue>;

export interface Checkpoint {
  cursor: Cursor;
  updated_at: string;
}

export type CheckpointDocument = Partial<Record<StageName, Checkpoint>>;

export interface HistoryRecord {
  timestamp: string;
  event: 'stage_completed';
  stage: StageName;
  scoped: boolean;
  stats: Record<string, number>;
}

export type StageStatus = 'completed' | 'incomplete' | 'aborted' | 'skipped';

export interface StageSummary {
  stage: StageName;
  status: StageStatus;
  /** Whether the run was restricted by an explicit entity filter */
  scoped: boolean;
  /** Units of work completed in this run */
  units: number;
  failures: Array<{ unit: string; error: string }>;
  stats: Record<string, number>;
}

// Configuration
export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface HarvestConfig {
  source: {
    baseUrl: string;
    entityListPath: string;
    userAgent: string;
    requestTimeoutMs: number;
  };
  crawl: {
    delay: DelayRange;
    earlyStop: boolean;
    maxPages: number;
  };
  credentials: {
    cookieFile: string;
    requiredCookies: string[];
    recommendedCookies: string[];
  };
  storage: {
    dbPath: string;
    checkpointFile: string;
    historyFile: string;
    picksDir: string;
  };
  app: {
    logLevel: string;
    logDir: string;
    sentryDsn: string;
    sentryEnvironment: string;
  };
}
