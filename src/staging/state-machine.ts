/**
 * Pipeline State Machine
 *
 * The transition table for staging items, checked centrally by the
 * staging store. Some edges are reserved for a dedicated operation:
 * `published` is entered only by the publish transaction (it needs the
 * publication link in the same write) and `duplicate` only by the dedup
 * sweep or, from ai_completed, the title similarity check.
 *
 *   scraped ──approve──▶ ready_for_ai ──begin──▶ processing_ai
 *                          ▲                      │        │
 *                          └──────retry── error ◀─┘        ▼
 *                                               ai_completed
 *                                                   │ promote
 *                                                   ▼
 *                                           ready_to_publish ──publish──▶ published
 *
 *   any non-terminal ──discard──▶ discarded
 *   any non-terminal ──dedup sweep──▶ duplicate
 *   ai_completed ──title check──▶ duplicate
 */

import { InvalidTransitionError } from '../errors/index.js';
import type { PipelineState, TerminalState } from '../types/index.js';

/**
 * Operation allowed to drive an edge
 */
export type TransitionChannel = 'update' | 'publish' | 'dedupSweep' | 'titleDedup';

interface Edge {
  to: PipelineState;
  via: TransitionChannel;
}

const discard: Edge = { to: 'discarded', via: 'update' };
const markDuplicate: Edge = { to: 'duplicate', via: 'dedupSweep' };

const TRANSITIONS: Record<PipelineState, readonly Edge[]> = {
  scraped: [{ to: 'ready_for_ai', via: 'update' }, discard, markDuplicate],
  ready_for_ai: [{ to: 'processing_ai', via: 'update' }, discard, markDuplicate],
  processing_ai: [
    { to: 'ai_completed', via: 'update' },
    { to: 'error', via: 'update' },
    discard,
    markDuplicate,
  ],
  ai_completed: [
    { to: 'ready_to_publish', via: 'update' },
    discard,
    markDuplicate,
    { to: 'duplicate', via: 'titleDedup' },
  ],
  error: [{ to: 'ready_for_ai', via: 'update' }, discard, markDuplicate],
  ready_to_publish: [{ to: 'published', via: 'publish' }, discard, markDuplicate],
  published: [],
  discarded: [],
  duplicate: [],
};

const CHANNEL_NAMES: Record<TransitionChannel, string> = {
  update: 'an update',
  publish: 'the publish operation',
  dedupSweep: 'the duplicate sweep',
  titleDedup: 'the title similarity check',
};

export const TERMINAL_STATES: readonly TerminalState[] = ['published', 'discarded', 'duplicate'];

export function isTerminal(state: PipelineState): state is TerminalState {
  return (TERMINAL_STATES as readonly PipelineState[]).includes(state);
}

/**
 * Whether `from -> to` is an edge reachable through `via`
 */
export function canTransition(
  from: PipelineState,
  to: PipelineState,
  via: TransitionChannel = 'update'
): boolean {
  return TRANSITIONS[from].some((edge) => edge.to === to && edge.via === via);
}

/**
 * States reachable from `from` through `via`
 */
export function allowedTargets(from: PipelineState, via: TransitionChannel = 'update'): PipelineState[] {
  return TRANSITIONS[from].filter((edge) => edge.via === via).map((edge) => edge.to);
}

export function assertTransition(
  from: PipelineState,
  to: PipelineState,
  via: TransitionChannel = 'update'
): void {
  if (canTransition(from, to, via)) {
    return;
  }

  if (isTerminal(from)) {
    throw new InvalidTransitionError(from, to, `'${from}' is a terminal state`);
  }

  const reserved = TRANSITIONS[from].filter((edge) => edge.to === to).map((edge) => CHANNEL_NAMES[edge.via]);
  if (reserved.length > 0) {
    throw new InvalidTransitionError(from, to, `only ${reserved.join(' or ')} may enter '${to}'`);
  }

  throw new InvalidTransitionError(from, to);
}
