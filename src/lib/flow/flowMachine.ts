/**
 * Pure transition logic for the question / outcome flow.
 *
 * Kept free of media and React so every branch can be exercised directly;
 * `FlowController` performs the returned effects.
 */

import type { BundleKind, ChoiceOutcome, MediaBundle, Phase, QuestionSet } from '../../types/flow';
import { hasVideo, selectBundle } from './mediaBundle';

// ─── Types ────────────────────────────────────────────────────────────

export type FlowStatus = 'idle' | 'playing' | 'awaiting-choice' | 'complete' | 'error';

export interface FlowState {
  readonly currentIndex: number;
  readonly phase: Phase;
  readonly status: FlowStatus;
  /** Bundle whose `finished` signal the machine is waiting for. */
  readonly bundleId: string | null;
  /** Number of bundles selected so far; feeds bundle ids. */
  readonly loads: number;
}

export type FlowEvent =
  | { type: 'start' }
  | { type: 'choice'; outcome: ChoiceOutcome }
  | { type: 'finished'; bundleId: string };

export type CompletionReason = 'end-of-sequence' | 'missing-question-video';

export type FlowEffect =
  | { type: 'load'; bundle: MediaBundle }
  | { type: 'show-choices' }
  | { type: 'hide-choices' }
  | { type: 'complete'; reason: CompletionReason }
  | { type: 'configuration-error'; message: string; questionIndex: number };

export interface FlowTransition {
  state: FlowState;
  effects: FlowEffect[];
}

// ─── Helpers ──────────────────────────────────────────────────────────

export function createInitialFlowState(): FlowState {
  return {
    currentIndex: 0,
    phase: 'Question',
    status: 'idle',
    bundleId: null,
    loads: 0,
  };
}

function unchanged(state: FlowState): FlowTransition {
  return { state, effects: [] };
}

function loadBundle(
  sequence: readonly QuestionSet[],
  state: FlowState,
  kind: BundleKind,
  index: number,
): FlowTransition {
  const loads = state.loads + 1;
  const bundle = selectBundle(sequence[index], kind, index, loads);
  return {
    state: {
      currentIndex: index,
      phase: bundle.phase,
      status: 'playing',
      bundleId: bundle.id,
      loads,
    },
    effects: [{ type: 'hide-choices' }, { type: 'load', bundle }],
  };
}

function configurationError(state: FlowState, message: string, questionIndex: number): FlowTransition {
  return {
    state,
    effects: [{ type: 'configuration-error', message, questionIndex }],
  };
}

// ─── Transitions ──────────────────────────────────────────────────────

function handleStart(sequence: readonly QuestionSet[], state: FlowState): FlowTransition {
  if (state.status === 'playing' || state.status === 'awaiting-choice') {
    return unchanged(state);
  }
  const fresh: FlowState = { ...createInitialFlowState(), loads: state.loads };
  if (sequence.length === 0) {
    return configurationError({ ...fresh, status: 'error' }, 'Sequence is empty', 0);
  }
  if (!hasVideo(sequence[0].question)) {
    return configurationError(
      { ...fresh, status: 'error' },
      'Missing question video for the first question',
      0,
    );
  }
  return loadBundle(sequence, fresh, 'question', 0);
}

function handleChoice(
  sequence: readonly QuestionSet[],
  state: FlowState,
  outcome: ChoiceOutcome,
): FlowTransition {
  if (state.status !== 'awaiting-choice') {
    return unchanged(state);
  }
  const set = sequence[state.currentIndex];
  if (!set || !hasVideo(set[outcome])) {
    return configurationError(
      state,
      `Missing ${outcome} video for question ${state.currentIndex + 1}`,
      state.currentIndex,
    );
  }
  return loadBundle(sequence, state, outcome, state.currentIndex);
}

function handleFinished(
  sequence: readonly QuestionSet[],
  state: FlowState,
  bundleId: string,
): FlowTransition {
  if (state.status !== 'playing' || state.bundleId !== bundleId) {
    return unchanged(state);
  }
  switch (state.phase) {
    case 'Question':
      return {
        state: { ...state, status: 'awaiting-choice' },
        effects: [{ type: 'show-choices' }],
      };
    case 'OutcomeSuccess': {
      const nextIndex = state.currentIndex + 1;
      if (nextIndex < sequence.length && hasVideo(sequence[nextIndex].question)) {
        return loadBundle(sequence, state, 'question', nextIndex);
      }
      return {
        state: { ...state, currentIndex: nextIndex, status: 'complete', bundleId: null },
        effects: [
          { type: 'hide-choices' },
          {
            type: 'complete',
            reason: nextIndex < sequence.length ? 'missing-question-video' : 'end-of-sequence',
          },
        ],
      };
    }
    case 'OutcomeFailure':
      return loadBundle(sequence, state, 'question', state.currentIndex);
  }
}

/**
 * Apply one event to the flow. Events that do not fit the current status
 * (a choice while media plays, a `finished` for a superseded bundle) leave the
 * state untouched and produce no effects.
 */
export function transitionFlow(
  sequence: readonly QuestionSet[],
  state: FlowState,
  event: FlowEvent,
): FlowTransition {
  switch (event.type) {
    case 'start':
      return handleStart(sequence, state);
    case 'choice':
      return handleChoice(sequence, state, event.outcome);
    case 'finished':
      return handleFinished(sequence, state, event.bundleId);
  }
}
