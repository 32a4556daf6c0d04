import { vi } from 'vitest';
import { startTickLoop } from '../tickLoop';

describe('startTickLoop', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('steps once per animation frame until stopped', () => {
    const frames: FrameRequestCallback[] = [];
    const cancel = vi.fn<(handle: number) => void>();
    vi.stubGlobal('requestAnimationFrame', (callback: FrameRequestCallback) => {
      frames.push(callback);
      return frames.length;
    });
    vi.stubGlobal('cancelAnimationFrame', cancel);
    const step = vi.fn();

    const stop = startTickLoop(step);
    frames[0](0);
    frames[1](16);

    expect(step).toHaveBeenCalledTimes(2);
    expect(frames).toHaveLength(3);

    stop();
    expect(cancel).toHaveBeenCalledWith(3);
    frames[2](32);
    expect(step).toHaveBeenCalledTimes(2);
  });

  it('falls back to a timer without requestAnimationFrame', () => {
    vi.useFakeTimers();
    vi.stubGlobal('requestAnimationFrame', undefined);
    const step = vi.fn();

    const stop = startTickLoop(step);
    vi.advanceTimersByTime(48);
    expect(step).toHaveBeenCalledTimes(3);

    stop();
    vi.advanceTimersByTime(48);
    expect(step).toHaveBeenCalledTimes(3);
  });
});
