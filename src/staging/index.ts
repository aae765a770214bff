export { StagingStore } from './store.js';
export type { StagingStoreOptions, UpdateOptions, StagingUpsertResult, DedupResult } from './store.js';
export { TERMINAL_STATES, isTerminal, canTransition, allowedTargets, assertTransition } from './state-machine.js';
export type { TransitionChannel } from './state-machine.js';
export type {
  StagingRepository,
  PublishScope,
  PublicationWriter,
  PublicationLink,
  PageRequest,
  StatsSnapshot,
  UpsertOutcome,
  UpsertResult,
} from './repository.js';
