import { useEffect, useRef } from 'react';
import { FlowController } from '../player/FlowController';
import { createAudioBackend, createVideoBackend } from '../player/mediaElementBackends';
import { startTickLoop } from '../player/tickLoop';
import { useFlowStore } from '../stores/flowStore';
import type { ChoiceOutcome, FlowConfig } from '../types/flow';

interface BranchingVideoPlayerProps {
  config: FlowConfig;
  /** Start the first question as soon as the media elements mount. */
  autoStart?: boolean;
  onComplete?: () => void;
  onError?: (error: unknown) => void;
}

export default function BranchingVideoPlayer({
  config,
  autoStart = true,
  onComplete,
  onError,
}: BranchingVideoPlayerProps) {
  const videoRef = useRef<HTMLVideoElement | null>(null);
  const narrationRef = useRef<HTMLAudioElement | null>(null);
  const musicRef = useRef<HTMLAudioElement | null>(null);
  const controllerRef = useRef<FlowController | null>(null);
  const callbacksRef = useRef({ onComplete, onError });
  callbacksRef.current = { onComplete, onError };

  const status = useFlowStore((state) => state.status);
  const currentIndex = useFlowStore((state) => state.currentIndex);
  const total = useFlowStore((state) => state.total);
  const captionText = useFlowStore((state) => state.captionText);
  const choicesVisible = useFlowStore((state) => state.choicesVisible);
  const lastError = useFlowStore((state) => state.lastError);

  useEffect(() => {
    const video = videoRef.current;
    const narration = narrationRef.current;
    const music = musicRef.current;
    if (!video || !narration || !music) {
      return;
    }
    useFlowStore.getState().reset();
    const controller = new FlowController({
      config,
      video: createVideoBackend(video),
      narration: createAudioBackend(narration, 'narration'),
      music: createAudioBackend(music, 'music'),
      onComplete: () => callbacksRef.current.onComplete?.(),
      onError: (error) => callbacksRef.current.onError?.(error),
    });
    controllerRef.current = controller;
    const stopLoop = startTickLoop(() => controller.tick());
    if (autoStart) {
      controller.start();
    }
    return () => {
      stopLoop();
      controller.dispose();
      if (controllerRef.current === controller) {
        controllerRef.current = null;
      }
    };
  }, [config, autoStart]);

  const handleChoice = (outcome: ChoiceOutcome) => {
    controllerRef.current?.choose(outcome);
  };

  const handleStart = () => {
    controllerRef.current?.start();
  };

  const handleRetry = () => {
    controllerRef.current?.retry();
  };

  // A clip that failed to play leaves the flow mid-bundle until it is reloaded.
  const playbackStalled = status === 'playing' && lastError !== null;

  const questionNumber = total > 0 ? Math.min(currentIndex + 1, total) : 0;

  return (
    <div className="branching-player" data-testid="branching-player">
      <div className="branching-player__stage">
        <video
          ref={videoRef}
          className="branching-player__video"
          data-testid="flow-video"
          playsInline
          preload="auto"
        />
        <div
          className="branching-player__caption"
          data-testid="flow-caption"
          role="status"
          aria-live="polite"
        >
          {captionText}
        </div>
      </div>
      <audio ref={narrationRef} data-testid="flow-narration" preload="auto" />
      <audio ref={musicRef} data-testid="flow-music" preload="auto" />

      {choicesVisible ? (
        <div className="branching-player__choices" role="group" aria-label="Choose an outcome">
          <button type="button" onClick={() => handleChoice('success')}>
            Success
          </button>
          <button type="button" onClick={() => handleChoice('failure')}>
            Failure
          </button>
        </div>
      ) : null}

      {status === 'idle' && !autoStart ? (
        <button type="button" className="branching-player__start" onClick={handleStart}>
          Start
        </button>
      ) : null}
      {playbackStalled ? (
        <button type="button" className="branching-player__retry" onClick={handleRetry}>
          Retry
        </button>
      ) : null}
      {status === 'complete' ? <p className="branching-player__done">Sequence complete</p> : null}
      {lastError ? (
        <p className="branching-player__error" role="alert">
          {lastError}
        </p>
      ) : null}
      <p className="branching-player__progress">
        Question {questionNumber} of {total}
      </p>
    </div>
  );
}
