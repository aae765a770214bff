export { PublishTransaction, slugCandidates } from './publisher.js';
export type { PublishRequest, PublishResult, PublishOverrides } from './publisher.js';
