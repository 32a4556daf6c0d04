import { createInitialFlowState, transitionFlow } from '../lib/flow';
import type { FlowEffect, FlowEvent, FlowState } from '../lib/flow';
import { useFlowStore } from '../stores/flowStore';
import type { ChoiceOutcome, FlowConfig, MediaBundle } from '../types/flow';
import type { AudioBackend, CaptionDisplay, ChoiceUi, VideoBackend } from './backends';
import { ConfigurationError } from './errors';
import { PlaybackSession } from './PlaybackSession';
import { SubtitleDriver } from './SubtitleDriver';

type FlowStoreHandle = Pick<typeof useFlowStore, 'getState'>;

// DOMExceptions from media elements carry a message without always being Errors.
function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export type FlowControllerOptions = {
  config: FlowConfig;
  video: VideoBackend;
  narration: AudioBackend;
  music: AudioBackend;
  /** Extra choice surface; the flow store always tracks visibility. */
  choices?: ChoiceUi | null;
  /** Extra caption surface; the flow store always tracks the text. */
  captions?: CaptionDisplay | null;
  store?: FlowStoreHandle;
  onComplete?: () => void;
  onError?: (error: unknown) => void;
};

/**
 * Runs the question sequence: feeds choice and end-of-clip events through
 * the flow machine and carries out the resulting effects on the playback
 * session, the choice panel and the flow store.
 */
export class FlowController {
  readonly session: PlaybackSession;
  readonly subtitles: SubtitleDriver;
  private readonly config: FlowConfig;
  private readonly choices: ChoiceUi | null;
  private readonly store: FlowStoreHandle;
  private readonly onComplete?: () => void;
  private readonly onError?: (error: unknown) => void;
  private state: FlowState = createInitialFlowState();
  private failedBundle: MediaBundle | null = null;
  private disposed = false;

  constructor(opts: FlowControllerOptions) {
    this.config = opts.config;
    this.choices = opts.choices ?? null;
    this.store = opts.store ?? useFlowStore;
    this.onComplete = opts.onComplete;
    this.onError = opts.onError;

    const captions = opts.captions ?? null;
    const store = this.store;
    this.subtitles = new SubtitleDriver({
      display: {
        setText: (text) => {
          captions?.setText(text);
          store.getState().setCaptionText(text);
        },
      },
      clock: () => this.session.clock(),
      offsetSeconds: opts.config.offsetSeconds,
      clearInGaps: opts.config.clearCaptionsInGaps,
    });
    this.session = new PlaybackSession({
      video: opts.video,
      narration: opts.narration,
      music: opts.music,
      subtitles: this.subtitles,
      onFinished: (bundle) => this.dispatch({ type: 'finished', bundleId: bundle.id }),
      onError: (error, bundle) => {
        this.failedBundle = bundle;
        this.report(error);
      },
    });

    this.hideChoices();
    this.publish();
  }

  getState(): FlowState {
    return this.state;
  }

  /** Begin at the first question. Returns false when the sequence cannot start. */
  start(): boolean {
    this.dispatch({ type: 'start' });
    return this.state.status === 'playing';
  }

  choose(outcome: ChoiceOutcome): void {
    this.dispatch({ type: 'choice', outcome });
  }

  /**
   * Reload the bundle whose playback failed, typically after the browser
   * refused to start it without a user gesture. Returns false when there is
   * nothing to retry.
   */
  retry(): boolean {
    const bundle = this.failedBundle;
    if (this.disposed || !bundle || bundle.id !== this.state.bundleId) {
      return false;
    }
    this.loadBundle(bundle);
    return true;
  }

  /** Per-frame update; captions wait until the clip is actually running. */
  tick(): void {
    if (this.disposed || this.session.getState() === 'preparing') {
      return;
    }
    this.subtitles.tick();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.session.stop();
    this.subtitles.reset();
    this.hideChoices();
  }

  private dispatch(event: FlowEvent): void {
    if (this.disposed) {
      return;
    }
    const { state, effects } = transitionFlow(this.config.questions, this.state, event);
    this.state = state;
    effects.forEach((effect) => this.apply(effect));
    this.publish();
  }

  private apply(effect: FlowEffect): void {
    switch (effect.type) {
      case 'load':
        this.loadBundle(effect.bundle);
        return;
      case 'show-choices':
        this.choices?.show();
        this.store.getState().setChoicesVisible(true);
        return;
      case 'hide-choices':
        this.hideChoices();
        return;
      case 'complete':
        this.session.stop();
        this.subtitles.reset();
        if (effect.reason === 'missing-question-video') {
          console.warn('Stopping early: next question has no video', this.state.currentIndex);
        }
        console.info('Sequence complete');
        this.onComplete?.();
        return;
      case 'configuration-error':
        this.report(new ConfigurationError(effect.message, effect.questionIndex));
        return;
    }
  }

  private loadBundle(bundle: MediaBundle): void {
    this.failedBundle = null;
    this.store.getState().setLastError(null);
    try {
      this.session.load(bundle);
    } catch (error) {
      this.report(error);
    }
  }

  private hideChoices(): void {
    this.choices?.hide();
    this.store.getState().setChoicesVisible(false);
  }

  private report(error: unknown): void {
    const message = describeError(error);
    console.warn('Flow did not advance:', message);
    this.store.getState().setLastError(message);
    this.onError?.(error);
  }

  private publish(): void {
    this.store.getState().setSnapshot({
      status: this.state.status,
      phase: this.state.phase,
      currentIndex: this.state.currentIndex,
      total: this.config.questions.length,
    });
  }
}
