import { parseSrtCaptions } from '../lib/captions';
import type { Cue } from '../lib/captions';
import { lastCueStartingAtOrBefore, locateCue } from '../lib/timing/timeSearch';
import type { CaptionDisplay, PlaybackClock } from './backends';

export type SubtitleDriverOptions = {
  display: CaptionDisplay;
  clock: PlaybackClock;
  /** Added to the clock before lookup; negative values show captions later. */
  offsetSeconds?: number;
  /** Clear the display while the clock sits between cues. */
  clearInGaps?: boolean;
};

/**
 * Maps the playback clock onto caption text once per tick.
 *
 * Owns the cue list and the remembered cue position; both are replaced
 * wholesale on every `load`.
 */
export class SubtitleDriver {
  private readonly display: CaptionDisplay;
  private readonly clock: PlaybackClock;
  private readonly offsetSeconds: number;
  private readonly clearInGaps: boolean;
  private cues: readonly Cue[] = [];
  private activeIndex = -1;
  // Last cue starting at or before the clock while in a gap; null when unknown.
  private gapCursor: number | null = null;
  private shownText: string | null = null;

  constructor(opts: SubtitleDriverOptions) {
    this.display = opts.display;
    this.clock = opts.clock;
    const offset = opts.offsetSeconds ?? 0;
    this.offsetSeconds = Number.isFinite(offset) ? offset : 0;
    this.clearInGaps = opts.clearInGaps ?? true;
  }

  load(document: string | null): void {
    this.cues = document ? parseSrtCaptions(document) : [];
    this.activeIndex = -1;
    this.gapCursor = null;
    this.show('');
  }

  reset(): void {
    this.load(null);
  }

  getCues(): readonly Cue[] {
    return this.cues;
  }

  getActiveIndex(): number {
    return this.activeIndex;
  }

  tick(): void {
    if (this.cues.length === 0) {
      this.show('');
      return;
    }
    const t = this.clock() + this.offsetSeconds;
    if (!Number.isFinite(t)) {
      return;
    }

    const active = this.activeIndex >= 0 ? this.cues[this.activeIndex] : undefined;
    if (active) {
      if (t >= active.start && t <= active.end) {
        return;
      }
      // left the cue: clear before searching so gaps never show stale text
      this.activeIndex = -1;
      if (this.clearInGaps) {
        this.show('');
      }
    }

    if (this.isInKnownGap(t)) {
      return;
    }

    const index = locateCue(this.cues, t);
    if (index !== -1) {
      this.activeIndex = index;
      this.gapCursor = null;
      this.show(this.cues[index].text);
      return;
    }
    this.gapCursor = lastCueStartingAtOrBefore(this.cues, t);
    if (this.clearInGaps) {
      this.show('');
    }
  }

  private isInKnownGap(t: number): boolean {
    if (this.gapCursor === null) {
      return false;
    }
    const previous = this.gapCursor >= 0 ? this.cues[this.gapCursor] : undefined;
    const next = this.cues[this.gapCursor + 1];
    if (previous && t <= previous.end) {
      return false;
    }
    if (next && t >= next.start) {
      return false;
    }
    return true;
  }

  private show(text: string): void {
    if (this.shownText === text) {
      return;
    }
    this.shownText = text;
    this.display.setText(text);
  }
}
