import { describe, expect, it } from 'vitest';
import { hasVideo, selectBundle } from '../mediaBundle';
import type { QuestionSet } from '../../../types/flow';

const set: QuestionSet = {
  question: {
    video: 'q.mp4',
    narration: 'q-narration.mp3',
    music: 'q-music.mp3',
    captions: '1\n00:00:00,000 --> 00:00:01,000\nHi\n',
  },
  success: { video: 's.mp4' },
  failure: { video: '  ', narration: '' },
};

describe('selectBundle', () => {
  it('picks every field of the requested phase', () => {
    expect(selectBundle(set, 'question', 2, 7)).toEqual({
      id: '2:question:7',
      kind: 'question',
      phase: 'Question',
      questionIndex: 2,
      video: 'q.mp4',
      narration: 'q-narration.mp3',
      music: 'q-music.mp3',
      captions: '1\n00:00:00,000 --> 00:00:01,000\nHi\n',
    });
  });

  it('maps absent optional media to null', () => {
    const bundle = selectBundle(set, 'success', 0, 1);
    expect(bundle.phase).toBe('OutcomeSuccess');
    expect(bundle.video).toBe('s.mp4');
    expect(bundle.narration).toBeNull();
    expect(bundle.music).toBeNull();
    expect(bundle.captions).toBeNull();
  });

  it('treats blank references as absent', () => {
    const bundle = selectBundle(set, 'failure', 0, 1);
    expect(bundle.phase).toBe('OutcomeFailure');
    expect(bundle.video).toBeNull();
    expect(bundle.narration).toBeNull();
  });

  it('gives repeated selections distinct ids', () => {
    expect(selectBundle(set, 'question', 0, 1).id).not.toBe(selectBundle(set, 'question', 0, 2).id);
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(selectBundle(set, 'question', 0, 1))).toBe(true);
  });
});

describe('bundle helpers', () => {
  it('maps each kind to its phase', () => {
    expect(selectBundle(set, 'question', 0, 1).phase).toBe('Question');
    expect(selectBundle(set, 'success', 0, 1).phase).toBe('OutcomeSuccess');
    expect(selectBundle(set, 'failure', 0, 1).phase).toBe('OutcomeFailure');
  });

  it('detects a usable video reference', () => {
    expect(hasVideo(set.question)).toBe(true);
    expect(hasVideo(set.failure)).toBe(false);
    expect(hasVideo(undefined)).toBe(false);
  });
});
