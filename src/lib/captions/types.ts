/** A single timed caption entry. Times are in seconds, `end >= start`. */
export interface Cue {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}
