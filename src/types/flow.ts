/** Opaque reference to a media asset (URL, object URL, etc.). */
export type MediaRef = string;

export type BundleKind = 'question' | 'success' | 'failure';

export type Phase = 'Question' | 'OutcomeSuccess' | 'OutcomeFailure';

export type ChoiceOutcome = 'success' | 'failure';

/** Media for one phase of one question. Only the question video is mandatory. */
export interface PhaseMedia {
  readonly video?: MediaRef;
  readonly narration?: MediaRef;
  readonly music?: MediaRef;
  /** SRT document, inline or as a `data:` URL. */
  readonly captions?: string;
}

export type QuestionSet = Readonly<Record<BundleKind, PhaseMedia>>;

export interface MediaBundle {
  /** Unique per selection; signals are matched against it. */
  readonly id: string;
  readonly kind: BundleKind;
  readonly phase: Phase;
  readonly questionIndex: number;
  readonly video: MediaRef | null;
  readonly narration: MediaRef | null;
  readonly music: MediaRef | null;
  readonly captions: string | null;
}

export interface FlowConfig {
  readonly questions: readonly QuestionSet[];
  /** Signed shift applied to the playback clock before caption lookup. */
  readonly offsetSeconds: number;
  readonly clearCaptionsInGaps: boolean;
}
