export { IngestionGateway, rawArticleSchema } from './gateway.js';
export type { IngestOptions, IngestResult, IngestBatchResult } from './gateway.js';
