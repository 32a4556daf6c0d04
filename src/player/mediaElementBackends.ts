import type { MediaRef } from '../types/flow';
import type { AudioBackend, VideoBackend } from './backends';

const HAVE_FUTURE_DATA = 3;

function sanitiseTime(value: number | null | undefined): number {
  if (typeof value !== 'number' || Number.isNaN(value) || !Number.isFinite(value)) {
    return 0;
  }
  return value < 0 ? 0 : value;
}

function describeMediaError(element: HTMLMediaElement): Error {
  const detail = element.error?.message || `code ${element.error?.code ?? 'unknown'}`;
  return new Error(`Media failed to load (${detail}): ${element.currentSrc || element.src}`);
}

/**
 * Resolve on the next `eventName`, reject on a media error or when `signal`
 * aborts because another clip was assigned.
 */
function waitForMediaEvent(
  element: HTMLMediaElement,
  eventName: 'canplay' | 'ended',
  signal: AbortSignal,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('Media clip replaced'));
      return;
    }
    const cleanup = () => {
      element.removeEventListener(eventName, handleEvent);
      element.removeEventListener('error', handleError);
      signal.removeEventListener('abort', handleAbort);
    };
    const handleEvent = () => {
      cleanup();
      resolve();
    };
    const handleError = () => {
      cleanup();
      reject(describeMediaError(element));
    };
    const handleAbort = () => {
      cleanup();
      reject(new Error('Media clip replaced'));
    };
    element.addEventListener(eventName, handleEvent);
    element.addEventListener('error', handleError);
    signal.addEventListener('abort', handleAbort);
  });
}

function requestPlayback(element: HTMLMediaElement): Promise<void> {
  const result = element.play();
  return result && typeof result.then === 'function' ? result : Promise.resolve();
}

// Optional tracks: a refused start is logged and the clip continues without them.
function startOptionalPlayback(element: HTMLMediaElement, label: string): void {
  requestPlayback(element).catch((error: unknown) => {
    console.warn(`Unable to start ${label} playback`, error);
  });
}

function isElementPlaying(element: HTMLMediaElement): boolean {
  return !element.paused && !element.ended;
}

export function createVideoBackend(element: HTMLVideoElement): VideoBackend {
  let clipController = new AbortController();

  return {
    setClip(ref: MediaRef) {
      clipController.abort();
      clipController = new AbortController();
      element.src = ref;
      element.load();
    },
    prepare() {
      if (element.readyState >= HAVE_FUTURE_DATA) {
        return Promise.resolve();
      }
      return waitForMediaEvent(element, 'canplay', clipController.signal);
    },
    play() {
      return requestPlayback(element);
    },
    stop() {
      clipController.abort();
      clipController = new AbortController();
      element.pause();
    },
    isPlaying() {
      return isElementPlaying(element);
    },
    currentTime() {
      return sanitiseTime(element.currentTime);
    },
    waitForEnd() {
      return waitForMediaEvent(element, 'ended', clipController.signal);
    },
  };
}

export function createAudioBackend(element: HTMLAudioElement, label = 'audio'): AudioBackend {
  let clip: MediaRef | null = null;

  return {
    setClip(ref: MediaRef | null) {
      clip = ref;
      element.pause();
      if (ref) {
        element.src = ref;
      } else {
        element.removeAttribute('src');
      }
      element.load();
    },
    hasClip() {
      return clip !== null;
    },
    play() {
      if (clip) {
        startOptionalPlayback(element, label);
      }
    },
    stop() {
      element.pause();
    },
    setTime(seconds: number) {
      element.currentTime = sanitiseTime(seconds);
    },
    currentTime() {
      return sanitiseTime(element.currentTime);
    },
    isPlaying() {
      return clip !== null && isElementPlaying(element);
    },
  };
}
