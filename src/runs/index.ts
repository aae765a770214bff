export { ScrapingRunLog, type RunCounters } from './run-log.js';
export type { ScrapingRunRepository } from './repository.js';
