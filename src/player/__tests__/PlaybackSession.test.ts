import { vi } from 'vitest';
import { selectBundle } from '../../lib/flow/mediaBundle';
import type { QuestionSet } from '../../types/flow';
import { ConfigurationError } from '../errors';
import { PlaybackSession } from '../PlaybackSession';
import { FakeAudio, FakeVideo, flushPromises } from './fakeBackends';

const SET: QuestionSet = {
  question: { video: 'q.mp4', narration: 'q-voice.mp3', captions: '00:00:00,000 --> 00:00:01,000\nHi' },
  success: { video: 's.mp4', music: 's-music.mp3' },
  failure: {},
};

function setup() {
  const calls: string[] = [];
  const video = new FakeVideo(calls);
  const narration = new FakeAudio('narration', calls);
  const music = new FakeAudio('music', calls);
  const subtitles = { load: vi.fn<(ref: string | null) => void>() };
  const onFinished = vi.fn();
  const onError = vi.fn();
  const session = new PlaybackSession({ video, narration, music, subtitles, onFinished, onError });
  return { calls, video, narration, music, subtitles, onFinished, onError, session };
}

describe('PlaybackSession', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('assigns every track before waiting for the video to prepare', () => {
    const { calls, session, subtitles } = setup();

    session.load(selectBundle(SET, 'question', 0, 1));

    expect(calls).toEqual([
      'video.stop',
      'narration.setClip:q-voice.mp3',
      'music.setClip:none',
      'video.setClip:q.mp4',
    ]);
    expect(subtitles.load).toHaveBeenCalledWith('00:00:00,000 --> 00:00:01,000\nHi');
    expect(session.getState()).toBe('preparing');
  });

  it('starts the tracks together once the video is ready', async () => {
    const { calls, video, session } = setup();
    session.load(selectBundle(SET, 'question', 0, 1));
    calls.length = 0;

    video.resolvePrepare('q.mp4');
    await flushPromises();

    expect(calls).toEqual(['video.play', 'narration.play']);
    expect(session.getState()).toBe('playing');
  });

  it('plays music for bundles that carry it', async () => {
    const { calls, video, session } = setup();
    session.load(selectBundle(SET, 'success', 0, 1));
    calls.length = 0;

    video.resolvePrepare('s.mp4');
    await flushPromises();

    expect(calls).toEqual(['video.play', 'music.play']);
  });

  it('reports the finished bundle once the video ends', async () => {
    const { video, session, onFinished } = setup();
    const bundle = selectBundle(SET, 'question', 0, 1);
    session.load(bundle);
    video.resolvePrepare('q.mp4');
    await flushPromises();

    video.resolveEnd('q.mp4');
    await flushPromises();

    expect(onFinished).toHaveBeenCalledTimes(1);
    expect(onFinished).toHaveBeenCalledWith(bundle);
    expect(session.getState()).toBe('idle');
  });

  it('keeps audio tails running after the video ends', async () => {
    const { calls, video, session } = setup();
    session.load(selectBundle(SET, 'question', 0, 1));
    video.resolvePrepare('q.mp4');
    await flushPromises();
    calls.length = 0;

    video.resolveEnd('q.mp4');
    await flushPromises();

    expect(calls).toEqual([]);
  });

  it('never starts a bundle that was replaced while preparing', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const { calls, video, session } = setup();
    session.load(selectBundle(SET, 'question', 0, 1));
    session.load(selectBundle(SET, 'success', 0, 2));
    calls.length = 0;

    video.resolvePrepare('q.mp4');
    await flushPromises();
    expect(calls).toEqual([]);
    expect(session.getState()).toBe('preparing');

    video.resolvePrepare('s.mp4');
    await flushPromises();
    expect(calls).toEqual(['video.play', 'music.play']);
  });

  it('drops the end signal of a replaced bundle', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const { video, session, onFinished } = setup();
    const first = selectBundle(SET, 'question', 0, 1);
    session.load(first);
    video.resolvePrepare('q.mp4');
    await flushPromises();

    session.load(selectBundle(SET, 'success', 0, 2));
    video.resolveEnd('q.mp4');
    await flushPromises();

    expect(onFinished).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledWith('Ignoring finished signal for superseded bundle', first.id);
  });

  it('stops playing audio before switching bundles', async () => {
    const { calls, video, session } = setup();
    session.load(selectBundle(SET, 'question', 0, 1));
    video.resolvePrepare('q.mp4');
    await flushPromises();
    calls.length = 0;

    session.load(selectBundle(SET, 'success', 0, 2));

    expect(calls.slice(0, 2)).toEqual(['video.stop', 'narration.stop']);
  });

  it('throws before touching the tracks when the bundle has no video', () => {
    const { calls, session } = setup();

    expect(() => session.load(selectBundle(SET, 'failure', 2, 1))).toThrow(ConfigurationError);
    expect(() => session.load(selectBundle(SET, 'failure', 2, 1))).toThrow(
      'Missing failure video for question 3',
    );
    expect(calls).toEqual([]);
    expect(session.getState()).toBe('idle');
  });

  it('reports a playback failure and stops the audio', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { video, narration, session, onError } = setup();
    const bundle = selectBundle(SET, 'question', 0, 1);
    session.load(bundle);
    video.resolvePrepare('q.mp4');
    await flushPromises();

    const failure = new Error('decode failed');
    video.rejectEnd('q.mp4', failure);
    await flushPromises();

    expect(onError).toHaveBeenCalledWith(failure, bundle);
    expect(narration.isPlaying()).toBe(false);
    expect(session.getState()).toBe('idle');
  });

  it('reports a refused video start through onError', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { video, narration, session, onError, onFinished } = setup();
    const refusal = new Error('play() needs a user gesture');
    video.refuseNextPlay(refusal);
    const bundle = selectBundle(SET, 'question', 0, 1);
    session.load(bundle);

    video.resolvePrepare('q.mp4');
    await flushPromises();

    expect(onError).toHaveBeenCalledWith(refusal, bundle);
    expect(onFinished).not.toHaveBeenCalled();
    expect(narration.isPlaying()).toBe(false);
    expect(session.getState()).toBe('idle');
  });

  it('keeps a throwing finished handler apart from playback failures', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { video, narration, session, onFinished, onError } = setup();
    const bug = new Error('handler bug');
    onFinished.mockImplementation(() => {
      throw bug;
    });
    const bundle = selectBundle(SET, 'question', 0, 1);
    session.load(bundle);
    video.resolvePrepare('q.mp4');
    await flushPromises();

    video.resolveEnd('q.mp4');
    await flushPromises();

    expect(onError).not.toHaveBeenCalled();
    expect(logged).toHaveBeenCalledWith('Finished handler failed', bundle.id, bug);
    expect(narration.isPlaying()).toBe(true);
  });

  it('reads the clock from narration when present, else from the video', () => {
    const { video, narration, session } = setup();

    session.load(selectBundle(SET, 'success', 0, 1));
    video.time = 7;
    expect(session.clock()).toBe(7);

    session.load(selectBundle(SET, 'question', 0, 2));
    narration.time = 1.25;
    expect(session.clock()).toBe(1.25);
  });

  it('stop clears the active bundle', () => {
    const { session } = setup();
    session.load(selectBundle(SET, 'question', 0, 1));
    expect(session.getActiveBundle()?.id).toBe('0:question:1');

    session.stop();

    expect(session.getActiveBundle()).toBeNull();
    expect(session.getState()).toBe('idle');
  });
});
