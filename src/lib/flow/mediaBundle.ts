import type { BundleKind, MediaBundle, MediaRef, Phase, PhaseMedia, QuestionSet } from '../../types/flow';

const PHASE_BY_KIND: Readonly<Record<BundleKind, Phase>> = {
  question: 'Question',
  success: 'OutcomeSuccess',
  failure: 'OutcomeFailure',
};

function phaseForKind(kind: BundleKind): Phase {
  return PHASE_BY_KIND[kind];
}

function presentRef(value: MediaRef | undefined): MediaRef | null {
  if (typeof value !== 'string') {
    return null;
  }
  return value.trim() ? value : null;
}

export function hasVideo(media: PhaseMedia | undefined): boolean {
  return presentRef(media?.video) !== null;
}

/**
 * Pick one phase's media out of a question set.
 *
 * `serial` distinguishes repeated selections of the same phase (a failure
 * retry reloads the same question), so late signals from the previous load
 * can be told apart.
 */
export function selectBundle(
  set: QuestionSet,
  kind: BundleKind,
  questionIndex: number,
  serial: number,
): MediaBundle {
  const media = set[kind];
  return Object.freeze({
    id: `${questionIndex}:${kind}:${serial}`,
    kind,
    phase: phaseForKind(kind),
    questionIndex,
    video: presentRef(media?.video),
    narration: presentRef(media?.narration),
    music: presentRef(media?.music),
    captions: presentRef(media?.captions),
  });
}
