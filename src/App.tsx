import { useMemo } from 'react';
import BranchingVideoPlayer from './components/BranchingVideoPlayer';
import { ErrorBoundary } from './components/ErrorBoundary';
import { parseFlowConfig, resolveEnvOverrides } from './config/flowConfig';
import sequence from './config/sequence.json';
import type { FlowConfig } from './types/flow';

type ConfigResult = { config: FlowConfig; error: null } | { config: null; error: string };

function loadConfig(): ConfigResult {
  try {
    const config = parseFlowConfig(sequence, resolveEnvOverrides(import.meta.env));
    return { config, error: null };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('Unable to load sequence configuration', error);
    return { config: null, error: message };
  }
}

export default function App() {
  const result = useMemo(loadConfig, []);

  if (!result.config) {
    return (
      <main className="app-shell">
        <p className="app-shell__error" role="alert">
          {result.error}
        </p>
      </main>
    );
  }

  return (
    <main className="app-shell">
      <ErrorBoundary>
        <BranchingVideoPlayer config={result.config} autoStart={false} />
      </ErrorBoundary>
    </main>
  );
}
