import type { MediaRef } from '../types/flow';

/**
 * Transport surface of the video renderer. `prepare`, `play` and `waitForEnd`
 * are single-shot: each call settles once for the clip assigned at call time.
 */
export interface VideoBackend {
  setClip(ref: MediaRef): void;
  prepare(): Promise<void>;
  /** Rejects when the host refuses to start playback (e.g. autoplay policy). */
  play(): Promise<void>;
  stop(): void;
  isPlaying(): boolean;
  currentTime(): number;
  waitForEnd(): Promise<void>;
}

export interface AudioBackend {
  setClip(ref: MediaRef | null): void;
  hasClip(): boolean;
  play(): void;
  stop(): void;
  setTime(seconds: number): void;
  currentTime(): number;
  isPlaying(): boolean;
}

export interface ChoiceUi {
  show(): void;
  hide(): void;
}

export interface CaptionDisplay {
  /** An empty string clears the display. */
  setText(text: string): void;
}

export type PlaybackClock = () => number;
