import { HarvestConfig } from './types/index.js';
import { Logger } from './utils/logger.js';

/**
 * Carried by every component instead of process-wide singletons.
 */
export interface HarvestContext {
  config: HarvestConfig;
  logger: Logger;
}
