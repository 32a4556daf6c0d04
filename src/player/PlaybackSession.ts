import type { MediaBundle } from '../types/flow';
import type { AudioBackend, VideoBackend } from './backends';
import { ConfigurationError } from './errors';
import type { SubtitleDriver } from './SubtitleDriver';
import { resolveCaptionDocument } from '../lib/captions';

export type SessionState = 'idle' | 'preparing' | 'playing';

export type PlaybackSessionOptions = {
  video: VideoBackend;
  narration: AudioBackend;
  music: AudioBackend;
  /** Receives each bundle's caption document (or null) on load. */
  subtitles?: Pick<SubtitleDriver, 'load'> | null;
  onFinished?: (bundle: MediaBundle) => void;
  onError?: (error: unknown, bundle: MediaBundle) => void;
};

/**
 * Plays one media bundle at a time across the video, narration and music
 * tracks.
 *
 * Every `load` bumps the session generation; prepare/end signals that resolve
 * for an older generation are dropped, so a superseded clip can never start
 * or report completion.
 */
export class PlaybackSession {
  private readonly video: VideoBackend;
  private readonly narration: AudioBackend;
  private readonly music: AudioBackend;
  private readonly subtitles: Pick<SubtitleDriver, 'load'> | null;
  private generation = 0;
  private state: SessionState = 'idle';
  private bundle: MediaBundle | null = null;

  onFinished?: (bundle: MediaBundle) => void;
  onError?: (error: unknown, bundle: MediaBundle) => void;

  constructor(opts: PlaybackSessionOptions) {
    this.video = opts.video;
    this.narration = opts.narration;
    this.music = opts.music;
    this.subtitles = opts.subtitles ?? null;
    this.onFinished = opts.onFinished;
    this.onError = opts.onError;
  }

  getState(): SessionState {
    return this.state;
  }

  getActiveBundle(): MediaBundle | null {
    return this.bundle;
  }

  /** Narration drives the caption clock when present; otherwise the video does. */
  clock(): number {
    if (this.narration.hasClip()) {
      return this.narration.currentTime();
    }
    return this.video.currentTime();
  }

  /**
   * Stop whatever is playing and start `bundle`. Returns the generation token
   * the bundle's signals are tagged with.
   */
  load(bundle: MediaBundle): number {
    if (!bundle.video) {
      throw new ConfigurationError(
        `Missing ${bundle.kind} video for question ${bundle.questionIndex + 1}`,
        bundle.questionIndex,
      );
    }
    const video = bundle.video;
    this.stop();

    const token = this.generation;
    this.bundle = bundle;

    this.narration.setClip(bundle.narration);
    this.music.setClip(bundle.music);
    this.narration.setTime(0);
    this.music.setTime(0);

    this.video.setClip(video);
    const prepared = this.video.prepare();
    this.subtitles?.load(resolveCaptionDocument(bundle.captions));
    this.state = 'preparing';

    void this.run(token, bundle, prepared);
    return token;
  }

  stop(): void {
    this.generation += 1;
    this.state = 'idle';
    this.bundle = null;
    this.video.stop();
    this.stopAudio();
  }

  private isCurrent(token: number): boolean {
    return token === this.generation;
  }

  private async run(token: number, bundle: MediaBundle, prepared: Promise<void>): Promise<void> {
    let finished: boolean;
    try {
      finished = await this.playThrough(token, bundle, prepared);
    } catch (error) {
      if (!this.isCurrent(token)) {
        return;
      }
      console.error('Playback failed', bundle.id, error);
      this.state = 'idle';
      this.stopAudio();
      this.onError?.(error, bundle);
      return;
    }
    if (!finished) {
      return;
    }
    // audio tails (music under the choice panel) keep going until the next load
    this.state = 'idle';
    try {
      this.onFinished?.(bundle);
    } catch (error) {
      console.error('Finished handler failed', bundle.id, error);
    }
  }

  /** Resolves true once the bundle's video ends, false when it was superseded. */
  private async playThrough(token: number, bundle: MediaBundle, prepared: Promise<void>): Promise<boolean> {
    await prepared;
    if (!this.isCurrent(token)) {
      console.debug('Ignoring prepared signal for superseded bundle', bundle.id);
      return false;
    }
    await this.startAll();
    if (!this.isCurrent(token)) {
      console.debug('Ignoring playback start for superseded bundle', bundle.id);
      return false;
    }
    await this.video.waitForEnd();
    if (!this.isCurrent(token)) {
      console.debug('Ignoring finished signal for superseded bundle', bundle.id);
      return false;
    }
    return true;
  }

  // Everything is started in one synchronous block so the tracks stay in phase.
  private startAll(): Promise<void> {
    if (this.narration.hasClip()) {
      this.narration.setTime(0);
    }
    if (this.music.hasClip()) {
      this.music.setTime(0);
    }
    const started = this.video.play();
    if (this.narration.hasClip()) {
      this.narration.play();
    }
    if (this.music.hasClip()) {
      this.music.play();
    }
    this.state = 'playing';
    return started;
  }

  private stopAudio(): void {
    if (this.narration.isPlaying()) {
      this.narration.stop();
    }
    if (this.music.isPlaying()) {
      this.music.stop();
    }
  }
}
